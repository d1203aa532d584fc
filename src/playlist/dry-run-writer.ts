import type { Logger } from "pino";

import type { PlaylistId, PlaylistWriter, TrackId } from "../core/types.js";
import { MAX_APPEND_BATCH } from "../core/types.js";
import { PlaylistWriteError } from "../core/errors.js";

/** Placeholder id used when no playlist is created. */
export const DRY_RUN_PLAYLIST_ID = "dry-run" as PlaylistId;

/**
 * Writer for `--dry-run`: records and logs each batch instead of sending it.
 * Enforces the same per-call ceiling as the real catalog.
 */
export class DryRunPlaylistWriter implements PlaylistWriter {
  readonly batches: TrackId[][] = [];

  constructor(private readonly logger: Logger) {}

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
    this.batches.push([...trackIds]);
    this.logger.info({ playlistId, trackIds }, "Dry run: would add tracks");
  }
}
