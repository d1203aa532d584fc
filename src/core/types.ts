// ---------------------------------------------------------------------------
// Core types for the standards playlist builder.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Catalog identifier of a single track (the bare id, not the URI). */
export type TrackId = string & { readonly __brand: "TrackId" };

/** Catalog identifier of a playlist. */
export type PlaylistId = string & { readonly __brand: "PlaylistId" };

// ── Source model ────────────────────────────────────────────────────────────

/** One composition entry harvested from the index page. */
export interface Work {
  readonly title: string;
  /** Absolute URL of the composition's detail page. */
  readonly sourceLocation: string;
}

/** One recommended-recording mention recovered from a work's page text. */
export interface Citation {
  readonly artist: string;
  /** Year or free-text recording info; empty when the rule captured none. */
  readonly info: string;
  readonly displayText: string;
}

export interface PageLink {
  text: string;
  href: string;
}

/** Text/tag-queryable view of a fetched HTML page. */
export interface ParsedDocument {
  /** Anchors whose `href` matches `pattern`, in document order. */
  findLinks(pattern: RegExp): PageLink[];
  /** Visible text of the page with markup removed. */
  flattenedText(): string;
}

export interface PageSource {
  fetchPage(uri: string): Promise<ParsedDocument>;
}

// ── Catalog model ───────────────────────────────────────────────────────────

/** Read-only projection of one catalog search hit. */
export interface Candidate {
  readonly trackId: TrackId;
  readonly trackName: string;
  readonly albumName: string;
  readonly artistNames: readonly string[];
}

export interface Resolution {
  trackId: TrackId;
  acceptedAutomatically: boolean;
}

export interface CreatedPlaylist {
  id: PlaylistId;
  webUrl: string;
}

export interface PlaylistOptions {
  public: boolean;
  description: string;
}

export interface CatalogSearch {
  searchTracks(query: string, limit: number): Promise<Candidate[]>;
}

/**
 * Destination for accepted tracks.  Implementations must reject calls
 * carrying more than {@link MAX_APPEND_BATCH} ids.
 */
export interface PlaylistWriter {
  appendTracks(playlistId: PlaylistId, trackIds: readonly TrackId[]): Promise<void>;
}

/**
 * Everything the pipeline needs from the streaming catalog.  Authentication
 * happens before an instance is handed to the pipeline.
 */
export interface CatalogClient extends CatalogSearch, PlaylistWriter {
  currentUserId(): Promise<string>;
  createPlaylist(
    ownerId: string,
    name: string,
    options: PlaylistOptions,
  ): Promise<CreatedPlaylist>;
}

/** Largest number of track ids a single append call may carry. */
export const MAX_APPEND_BATCH = 50;

// ── Resolution decisions ────────────────────────────────────────────────────

export const MatchTier = {
  STRONG: 1,
  WEAK: 2,
  FALLBACK: 3,
} as const;
export type MatchTier = (typeof MatchTier)[keyof typeof MatchTier];

export const MatchDecision = {
  ACCEPT: "accept",
  REJECT: "reject",
  SKIP: "skip",
} as const;
export type MatchDecision = (typeof MatchDecision)[keyof typeof MatchDecision];

/** A non-automatic match waiting for a decision. */
export interface MatchProposal {
  workTitle: string;
  citation: Citation;
  candidate: Candidate;
  tier: typeof MatchTier.WEAK | typeof MatchTier.FALLBACK;
  query: string;
}

export interface DecisionProvider {
  decide(proposal: MatchProposal): Promise<MatchDecision>;
}

// ── Run summary ─────────────────────────────────────────────────────────────

export type RunStatus = "completed" | "aborted" | "empty";

export interface RunSummary {
  status: RunStatus;
  playlistId: PlaylistId | null;
  playlistUrl: string | null;
  worksTotal: number;
  worksProcessed: number;
  citations: number;
  acceptedAutomatically: number;
  acceptedByUser: number;
  unmatched: number;
  duplicates: number;
  tracksAppended: number;
  tracksLost: number;
  durationMs: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  logging: LoggingConfig;
  source: SourceConfig;
  catalog: CatalogConfig;
  playlist: PlaylistConfig;
  resolver: ResolverConfig;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}

export interface SourceConfig {
  baseUrl: string;
  indexPath: string;
  /** Regular-expression source matched (unanchored) against link targets. */
  workLinkPattern: string;
  topN: number;
  maxRecordings: number;
  /** Pause taken after every detail-page extraction. */
  minIntervalMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  userAgent: string;
}

export interface CatalogConfig {
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  redirectUri: string;
  searchLimit: number;
}

export interface PlaylistConfig {
  name: string;
  description: string;
  public: boolean;
  batchSize: number;
}

export interface ResolverConfig {
  interactive: boolean;
  /** Non-interactive runs only: accept tier-2 proposals instead of rejecting. */
  acceptWeakMatches: boolean;
}
