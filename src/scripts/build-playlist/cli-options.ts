import { parseArgs } from "node:util";

import type { AppConfig } from "../../core/types.js";
import { ConfigurationError } from "../../core/errors.js";

export interface BuildPlaylistOptions {
  configPath: string;
  top?: number;
  maxRecordings?: number;
  playlistName?: string;
  nonInteractive: boolean;
  acceptWeak: boolean;
  dryRun: boolean;
}

function positiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`--${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(
  args: string[],
  defaultConfigPath: string,
): BuildPlaylistOptions {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", default: defaultConfigPath },
      top: { type: "string" },
      "max-recordings": { type: "string" },
      "playlist-name": { type: "string" },
      "non-interactive": { type: "boolean", default: false },
      "accept-weak": { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
    },
    strict: true,
  });

  return {
    configPath: values.config ?? defaultConfigPath,
    top: positiveInt("top", values.top),
    maxRecordings: positiveInt("max-recordings", values["max-recordings"]),
    playlistName: values["playlist-name"],
    nonInteractive: values["non-interactive"] ?? false,
    acceptWeak: values["accept-weak"] ?? false,
    dryRun: values["dry-run"] ?? false,
  };
}

/** Layer command-line flags over the loaded configuration. */
export function applyCliOverrides(
  config: AppConfig,
  opts: BuildPlaylistOptions,
): AppConfig {
  return {
    ...config,
    source: {
      ...config.source,
      topN: opts.top ?? config.source.topN,
      maxRecordings: opts.maxRecordings ?? config.source.maxRecordings,
    },
    playlist: {
      ...config.playlist,
      name: opts.playlistName ?? config.playlist.name,
    },
    resolver: {
      interactive: opts.nonInteractive ? false : config.resolver.interactive,
      acceptWeakMatches: opts.acceptWeak || config.resolver.acceptWeakMatches,
    },
  };
}
