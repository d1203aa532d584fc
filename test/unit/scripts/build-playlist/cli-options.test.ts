import { describe, it, expect } from "vitest";

import {
  applyCliOverrides,
  parseCliArgs,
} from "../../../../src/scripts/build-playlist/cli-options.js";
import { parseConfig } from "../../../../src/config/config.js";
import { ConfigurationError } from "../../../../src/core/errors.js";

const DEFAULT_CONFIG_PATH = "/opt/standards/config/standards-playlist.yaml";

describe("parseCliArgs", () => {
  it("applies defaults when no flags are given", () => {
    expect(parseCliArgs([], DEFAULT_CONFIG_PATH)).toEqual({
      configPath: DEFAULT_CONFIG_PATH,
      top: undefined,
      maxRecordings: undefined,
      playlistName: undefined,
      nonInteractive: false,
      acceptWeak: false,
      dryRun: false,
    });
  });

  it("reads every flag", () => {
    const opts = parseCliArgs(
      [
        "--config",
        "run.yaml",
        "--top",
        "10",
        "--max-recordings",
        "3",
        "--playlist-name",
        "Ten Standards",
        "--non-interactive",
        "--accept-weak",
        "--dry-run",
      ],
      DEFAULT_CONFIG_PATH,
    );

    expect(opts).toEqual({
      configPath: "run.yaml",
      top: 10,
      maxRecordings: 3,
      playlistName: "Ten Standards",
      nonInteractive: true,
      acceptWeak: true,
      dryRun: true,
    });
  });

  it("rejects a non-numeric count", () => {
    expect(() => parseCliArgs(["--top", "ten"], DEFAULT_CONFIG_PATH)).toThrow(
      new ConfigurationError('--top expects a positive integer, got "ten"'),
    );
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--verbose"], DEFAULT_CONFIG_PATH)).toThrow();
  });
});

describe("applyCliOverrides", () => {
  it("layers flags over the loaded configuration", () => {
    const config = parseConfig({}, {});
    const opts = parseCliArgs(
      ["--top", "10", "--playlist-name", "Ten Standards", "--non-interactive", "--accept-weak"],
      DEFAULT_CONFIG_PATH,
    );

    const merged = applyCliOverrides(config, opts);

    expect(merged.source.topN).toBe(10);
    expect(merged.source.maxRecordings).toBe(6);
    expect(merged.playlist.name).toBe("Ten Standards");
    expect(merged.resolver).toEqual({ interactive: false, acceptWeakMatches: true });
  });

  it("leaves the configuration untouched without flags", () => {
    const config = parseConfig({}, {});

    expect(applyCliOverrides(config, parseCliArgs([], DEFAULT_CONFIG_PATH))).toEqual(config);
  });
});
