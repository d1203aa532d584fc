// ---------------------------------------------------------------------------
// Playlist assembler: run-scoped buffer of accepted tracks, flushed to the
// playlist in batches no larger than the append ceiling.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type { Logger } from "pino";

import type { PlaylistId, PlaylistWriter, TrackId } from "../core/types.js";
import { MAX_APPEND_BATCH } from "../core/types.js";

/**
 * Owns the pending-track buffer and the `seen` set for one run.
 *
 * Appends go through a single-slot limiter, so overlapping flush calls are
 * sent one after another and each batch is taken from the buffer at send
 * time.  A failed append is logged and its tracks are counted as lost.
 */
export class PlaylistAssembler {
  private readonly buffer: TrackId[] = [];
  private readonly seen = new Set<TrackId>();
  private readonly serial = pLimit(1);
  private readonly batchSize: number;
  private readonly logger: Logger;

  private appendedCount = 0;
  private lostCount = 0;
  private duplicateCount = 0;

  constructor(
    private readonly writer: PlaylistWriter,
    private readonly playlistId: PlaylistId,
    logger: Logger,
    batchSize: number = MAX_APPEND_BATCH,
  ) {
    this.batchSize = Math.min(Math.max(1, batchSize), MAX_APPEND_BATCH);
    this.logger = logger.child({ component: "PlaylistAssembler", playlistId });
  }

  /**
   * Queue `trackId` unless it was offered earlier in the run.
   * Returns whether it was newly added.
   */
  offer(trackId: TrackId): boolean {
    if (this.seen.has(trackId)) {
      this.duplicateCount++;
      return false;
    }
    this.seen.add(trackId);
    this.buffer.push(trackId);
    return true;
  }

  /** Send one full batch if the buffer has reached the batch size. */
  flushIfFull(): Promise<void> {
    return this.serial(async () => {
      if (this.buffer.length < this.batchSize) return;
      await this.send(this.buffer.splice(0, this.batchSize));
    });
  }

  /** Send everything still pending. No-op when the buffer is empty. */
  flushRemainder(): Promise<void> {
    return this.serial(async () => {
      while (this.buffer.length > 0) {
        await this.send(this.buffer.splice(0, this.batchSize));
      }
    });
  }

  get pending(): number {
    return this.buffer.length;
  }

  get appended(): number {
    return this.appendedCount;
  }

  get lost(): number {
    return this.lostCount;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }

  private async send(batch: TrackId[]): Promise<void> {
    try {
      await this.writer.appendTracks(this.playlistId, batch);
      this.appendedCount += batch.length;
      this.logger.info({ count: batch.length }, "Added tracks to playlist");
    } catch (err: unknown) {
      this.lostCount += batch.length;
      this.logger.error(
        { err, count: batch.length },
        "Failed to add tracks to playlist",
      );
    }
  }
}
