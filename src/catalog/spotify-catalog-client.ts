// ---------------------------------------------------------------------------
// SpotifyCatalogClient – the CatalogClient contract over spotify-web-api-node.
// ---------------------------------------------------------------------------

import SpotifyWebApi from "spotify-web-api-node";
import type { Logger } from "pino";

import type {
  Candidate,
  CatalogClient,
  CatalogConfig,
  CreatedPlaylist,
  PlaylistId,
  PlaylistOptions,
  TrackId,
} from "../core/types.js";
import { MAX_APPEND_BATCH } from "../core/types.js";
import {
  CatalogAuthError,
  CatalogSearchError,
  ConfigurationError,
  PlaylistWriteError,
} from "../core/errors.js";

/** The subset of a Spotify track object the resolver looks at. */
export interface SpotifyTrackLike {
  id: string;
  name: string;
  album: { name: string };
  artists: ReadonlyArray<{ name: string }>;
}

export function toCandidate(track: SpotifyTrackLike): Candidate {
  return {
    trackId: track.id as TrackId,
    trackName: track.name,
    albumName: track.album.name,
    artistNames: track.artists.map((a) => a.name),
  };
}

export function trackUri(trackId: TrackId): string {
  return `spotify:track:${trackId}`;
}

/** HTTP status carried by spotify-web-api-node errors, when present. */
function statusOf(error: unknown): number | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }
  return null;
}

function describeError(error: unknown): string {
  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  return status === null ? message : `HTTP ${status}: ${message}`;
}

export class SpotifyCatalogClient implements CatalogClient {
  private readonly logger: Logger;

  constructor(
    private readonly api: SpotifyWebApi,
    private readonly refreshToken: string | undefined,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "SpotifyCatalogClient" });
  }

  static fromConfig(config: CatalogConfig, logger: Logger): SpotifyCatalogClient {
    if (!config.clientId || !config.clientSecret) {
      throw new ConfigurationError(
        "Spotify credentials missing: set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET",
      );
    }
    const api = new SpotifyWebApi({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri,
    });
    return new SpotifyCatalogClient(api, config.refreshToken, logger);
  }

  /** Whether `connect()` can obtain a user token (needed for playlists). */
  get canModifyPlaylists(): boolean {
    return Boolean(this.refreshToken);
  }

  /**
   * Obtain an access token.  A refresh token gives user scope; without one
   * the client-credentials grant allows searching only.
   */
  async connect(): Promise<void> {
    try {
      if (this.refreshToken) {
        this.api.setRefreshToken(this.refreshToken);
        const { body } = await this.api.refreshAccessToken();
        this.api.setAccessToken(body.access_token);
        this.logger.info("Authorized with refresh token");
      } else {
        const { body } = await this.api.clientCredentialsGrant();
        this.api.setAccessToken(body.access_token);
        this.logger.info("Authorized with client credentials (search only)");
      }
    } catch (err: unknown) {
      throw new CatalogAuthError(`Spotify authorization failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async searchTracks(query: string, limit: number): Promise<Candidate[]> {
    try {
      const { body } = await this.api.searchTracks(query, { limit });
      return (body.tracks?.items ?? []).map(toCandidate);
    } catch (err: unknown) {
      throw new CatalogSearchError(query, `Search "${query}" failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async currentUserId(): Promise<string> {
    try {
      const { body } = await this.api.getMe();
      return body.id;
    } catch (err: unknown) {
      throw new CatalogAuthError(`Could not read current user: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Create a playlist.  The Web API always creates it for the token's user;
   * `ownerId` is recorded in the log for traceability.
   */
  async createPlaylist(
    ownerId: string,
    name: string,
    options: PlaylistOptions,
  ): Promise<CreatedPlaylist> {
    try {
      const { body } = await this.api.createPlaylist(name, {
        public: options.public,
        description: options.description,
      });
      this.logger.info({ ownerId, playlistId: body.id, name }, "Created playlist");
      return {
        id: body.id as PlaylistId,
        webUrl: body.external_urls.spotify,
      };
    } catch (err: unknown) {
      throw new PlaylistWriteError(
        `Could not create playlist "${name}": ${describeError(err)}`,
        null,
        { cause: err },
      );
    }
  }

  async appendTracks(
    playlistId: PlaylistId,
    trackIds: readonly TrackId[],
  ): Promise<void> {
    if (trackIds.length > MAX_APPEND_BATCH) {
      throw new PlaylistWriteError(
        `Refusing to append ${trackIds.length} tracks in one call (limit ${MAX_APPEND_BATCH})`,
        playlistId,
      );
    }
    try {
      await this.api.addTracksToPlaylist(playlistId, trackIds.map(trackUri));
    } catch (err: unknown) {
      throw new PlaylistWriteError(
        `Could not add ${trackIds.length} tracks: ${describeError(err)}`,
        playlistId,
        { cause: err },
      );
    }
  }
}
