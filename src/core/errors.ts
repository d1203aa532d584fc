// ---------------------------------------------------------------------------
// Error hierarchy for the standards playlist builder.
// ---------------------------------------------------------------------------

import type { PlaylistId } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all domain errors raised by this project.
 */
export class StandardsPlaylistError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StandardsPlaylistError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Source (scraped site) errors ────────────────────────────────────────────

/**
 * Base class for failures while reading the composition site.
 */
export class SourceError extends StandardsPlaylistError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceError";
    this.url = url;
  }
}

/** Network failure, timeout, or a non-2xx response. */
export class SourceFetchError extends SourceError {
  /** HTTP status when the server answered; `null` for network failures. */
  public readonly status: number | null;

  constructor(
    message: string,
    url: string,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, url, options);
    this.name = "SourceFetchError";
    this.status = status;
  }
}

/** The page arrived but could not be turned into a document. */
export class SourceParseError extends SourceError {
  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, url, options);
    this.name = "SourceParseError";
  }
}

// ── Catalog errors ──────────────────────────────────────────────────────────

export class CatalogError extends StandardsPlaylistError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogError";
  }
}

export class CatalogSearchError extends CatalogError {
  public readonly query: string;

  constructor(query: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogSearchError";
    this.query = query;
  }
}

/** Token acquisition failed or the catalog refused our credentials. */
export class CatalogAuthError extends CatalogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogAuthError";
  }
}

export class PlaylistWriteError extends CatalogError {
  public readonly playlistId: PlaylistId | null;

  constructor(
    message: string,
    playlistId: PlaylistId | null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PlaylistWriteError";
    this.playlistId = playlistId;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends StandardsPlaylistError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The operator abandoned the run at an interactive prompt. */
export class RunAbortedError extends StandardsPlaylistError {
  constructor(message = "Run aborted by operator", options?: ErrorOptions) {
    super(message, options);
    this.name = "RunAbortedError";
  }
}
