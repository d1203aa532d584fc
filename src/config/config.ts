// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads an optional YAML file, resolves `${ENV_VAR}` placeholders, applies
// environment overrides and validates the result with Zod.  Every setting
// has a default so a run needs nothing beyond the Spotify credentials.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type { AppConfig } from "../core/types.js";
import { MAX_APPEND_BATCH } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const LoggingSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  prettyPrint: z.boolean().default(false),
  redactSecrets: z.boolean().default(true),
});

export const SourceSchema = z.object({
  baseUrl: z.string().url().default("https://www.jazzstandards.com"),
  indexPath: z.string().min(1).default("/compositions/index.htm"),
  workLinkPattern: z
    .string()
    .min(1)
    .refine(isValidPattern, "must be a valid regular expression")
    .default("compositions-0/.*\\.htm"),
  topN: z.number().int().positive().default(100),
  maxRecordings: z.number().int().positive().default(6),
  minIntervalMs: z.number().int().nonnegative().default(500),
  requestTimeoutMs: z.number().int().positive().default(15_000),
  maxRetries: z.number().int().nonnegative().default(2),
  retryBaseDelayMs: z.number().int().nonnegative().default(500),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export const CatalogSchema = z.object({
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional(),
  refreshToken: z.string().min(1).optional(),
  redirectUri: z.string().url().default("http://127.0.0.1:8888/callback"),
  searchLimit: z.number().int().min(1).max(50).default(10),
});

export const PlaylistSchema = z.object({
  name: z
    .string()
    .min(1)
    .default("Top 100 Jazz Standards - Recommended Recordings"),
  description: z
    .string()
    .default(
      "Recommended recordings of the top 100 jazz standards from jazzstandards.com",
    ),
  public: z.boolean().default(true),
  batchSize: z.number().int().min(1).max(MAX_APPEND_BATCH).default(MAX_APPEND_BATCH),
});

export const ResolverSchema = z.object({
  interactive: z.boolean().default(true),
  acceptWeakMatches: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  logging: LoggingSchema.default({}),
  source: SourceSchema.default({}),
  catalog: CatalogSchema.default({}),
  playlist: PlaylistSchema.default({}),
  resolver: ResolverSchema.default({}),
});

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

// ── Environment-variable placeholder resolver ───────────────────────────────

const ENV_PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)}/g;

/**
 * Recursively walk a value and replace `${ENV_VAR}` placeholders in strings
 * with the matching environment value.  Throws if a referenced variable is
 * not defined.
 */
export function resolveEnvPlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv,
): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PLACEHOLDER, (_match, varName: string) => {
      const envValue = env[varName];
      if (envValue === undefined) {
        throw new ConfigurationError(
          `Environment variable "${varName}" is referenced in the config file but is not defined`,
        );
      }
      return envValue;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value !== null && typeof value === "object") {
    const resolved: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      resolved[k] = resolveEnvPlaceholders(v, env);
    }
    return resolved;
  }
  return value;
}

// ── Environment overrides ───────────────────────────────────────────────────

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Layer environment variables over the file contents.  Unset variables leave
 * the file value (or the schema default) in place.
 */
function applyEnvOverrides(
  raw: unknown,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const root = asRecord(raw);
  const logging = asRecord(root["logging"]);
  const catalog = asRecord(root["catalog"]);

  const level = env["STANDARDS_PLAYLIST_LOG_LEVEL"];
  if (level) logging["level"] = level;

  const pretty = env["STANDARDS_PLAYLIST_LOG_PRETTY"];
  if (pretty) logging["prettyPrint"] = pretty === "true" || pretty === "1";

  const overrides: Array<[string, string]> = [
    ["SPOTIFY_CLIENT_ID", "clientId"],
    ["SPOTIFY_CLIENT_SECRET", "clientSecret"],
    ["SPOTIFY_REFRESH_TOKEN", "refreshToken"],
    ["SPOTIFY_REDIRECT_URI", "redirectUri"],
  ];
  for (const [envVar, key] of overrides) {
    const value = env[envVar];
    if (value) catalog[key] = value;
  }

  return { ...root, logging, catalog };
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** YAML file to read; a missing file means "defaults only". */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate an already-parsed config object (as read from YAML) against the
 * schema after placeholder resolution and environment overrides.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const resolved = resolveEnvPlaceholders(raw ?? {}, env);
  const result = AppConfigSchema.safeParse(applyEnvOverrides(resolved, env));

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  return result.data;
}

/**
 * Load the application configuration from an optional YAML file plus the
 * environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  let raw: unknown = {};

  if (options.configPath) {
    const absolutePath = path.resolve(options.configPath);
    if (fs.existsSync(absolutePath)) {
      const text = fs.readFileSync(absolutePath, "utf-8");
      try {
        raw = parse(text);
      } catch (err) {
        throw new ConfigurationError(
          `Could not parse ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    }
  }

  return parseConfig(raw, env);
}

/** Absolute URL of the composition index page. */
export function indexUrl(config: AppConfig): string {
  return new URL(config.source.indexPath, config.source.baseUrl).toString();
}
