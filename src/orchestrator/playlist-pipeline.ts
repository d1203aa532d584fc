// ---------------------------------------------------------------------------
// Playlist pipeline: harvest → extract → resolve → assemble, one work and
// one citation at a time.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  CatalogClient,
  Citation,
  PlaylistConfig,
  PlaylistId,
  PlaylistWriter,
  Resolution,
  RunSummary,
  Work,
} from "../core/types.js";
import { RunAbortedError } from "../core/errors.js";
import { PlaylistAssembler } from "../playlist/playlist-assembler.js";
import {
  DRY_RUN_PLAYLIST_ID,
  DryRunPlaylistWriter,
} from "../playlist/dry-run-writer.js";

// ── Types ──────────────────────────────────────────────────────────────────

export type PipelineEvent =
  | { type: "work"; index: number; total: number; work: Work; citations: number }
  | {
      type: "citation";
      work: Work;
      citation: Citation;
      outcome: "added" | "duplicate" | "unmatched";
      resolution: Resolution | null;
    };

export interface PipelineDeps {
  harvester: { harvest(): Promise<Work[]> };
  extractor: { extract(location: string): Promise<Citation[]> };
  resolver: { resolve(workTitle: string, citation: Citation): Promise<Resolution | null> };
  catalog: Pick<CatalogClient, "currentUserId" | "createPlaylist" | "appendTracks">;
  logger: Logger;
}

export interface PipelineOptions {
  playlist: PlaylistConfig;
  /** Resolve only: no playlist is created and batches are just logged. */
  dryRun?: boolean;
  onProgress?: (event: PipelineEvent) => void;
}

interface OpenedPlaylist {
  id: PlaylistId;
  webUrl: string | null;
  writer: PlaylistWriter;
}

// ── PlaylistPipeline ───────────────────────────────────────────────────────

/**
 * Runs one forward pass over the work list.
 *
 * Per-work and per-citation failures never stop the run.  Only playlist
 * creation failures propagate; a {@link RunAbortedError} from the decision
 * prompt ends the loop early, after which pending tracks are still flushed.
 */
export class PlaylistPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions,
  ) {
    this.logger = deps.logger.child({ component: "PlaylistPipeline" });
  }

  async run(): Promise<RunSummary> {
    const startMs = Date.now();
    const summary: RunSummary = {
      status: "completed",
      playlistId: null,
      playlistUrl: null,
      worksTotal: 0,
      worksProcessed: 0,
      citations: 0,
      acceptedAutomatically: 0,
      acceptedByUser: 0,
      unmatched: 0,
      duplicates: 0,
      tracksAppended: 0,
      tracksLost: 0,
      durationMs: 0,
    };

    // 1. Work list
    this.logger.info("Harvesting work list");
    const works = await this.deps.harvester.harvest();
    summary.worksTotal = works.length;

    if (works.length === 0) {
      this.logger.error("No works found; check the index page structure");
      summary.status = "empty";
      summary.durationMs = Date.now() - startMs;
      return summary;
    }
    this.logger.info({ works: works.length }, "Work list harvested");

    // 2. Playlist
    const playlist = await this.openPlaylist();
    summary.playlistId = playlist.id;
    summary.playlistUrl = playlist.webUrl;

    const assembler = new PlaylistAssembler(
      playlist.writer,
      playlist.id,
      this.deps.logger,
      this.options.playlist.batchSize,
    );

    // 3. Works, then citations, strictly in order
    try {
      for (const [index, work] of works.entries()) {
        await this.processWork(work, index, works.length, assembler, summary);
        summary.worksProcessed++;
      }
    } catch (err: unknown) {
      if (!(err instanceof RunAbortedError)) throw err;
      summary.status = "aborted";
      this.logger.warn(
        { worksProcessed: summary.worksProcessed },
        "Run aborted; flushing accepted tracks",
      );
    } finally {
      // 4. Whatever is still pending, including after an abort
      await assembler.flushRemainder();
    }

    summary.duplicates = assembler.duplicates;
    summary.tracksAppended = assembler.appended;
    summary.tracksLost = assembler.lost;
    summary.durationMs = Date.now() - startMs;

    this.logger.info(
      {
        status: summary.status,
        tracksAppended: summary.tracksAppended,
        tracksLost: summary.tracksLost,
      },
      "Playlist run finished",
    );
    return summary;
  }

  private async processWork(
    work: Work,
    index: number,
    total: number,
    assembler: PlaylistAssembler,
    summary: RunSummary,
  ): Promise<void> {
    const citations = await this.deps.extractor.extract(work.sourceLocation);
    summary.citations += citations.length;
    this.options.onProgress?.({ type: "work", index, total, work, citations: citations.length });

    if (citations.length === 0) {
      this.logger.info({ work: work.title }, "No recordings found");
      return;
    }

    for (const citation of citations) {
      const resolution = await this.deps.resolver.resolve(work.title, citation);

      if (!resolution) {
        summary.unmatched++;
        this.options.onProgress?.({
          type: "citation",
          work,
          citation,
          outcome: "unmatched",
          resolution,
        });
        continue;
      }

      if (resolution.acceptedAutomatically) summary.acceptedAutomatically++;
      else summary.acceptedByUser++;

      const added = assembler.offer(resolution.trackId);
      this.options.onProgress?.({
        type: "citation",
        work,
        citation,
        outcome: added ? "added" : "duplicate",
        resolution,
      });
      await assembler.flushIfFull();
    }
  }

  private async openPlaylist(): Promise<OpenedPlaylist> {
    if (this.options.dryRun) {
      this.logger.info("Dry run: no playlist will be created");
      return {
        id: DRY_RUN_PLAYLIST_ID,
        webUrl: null,
        writer: new DryRunPlaylistWriter(this.deps.logger),
      };
    }

    const { catalog } = this.deps;
    const { name, description } = this.options.playlist;
    const ownerId = await catalog.currentUserId();
    const created = await catalog.createPlaylist(ownerId, name, {
      public: this.options.playlist.public,
      description,
    });
    this.logger.info(
      { playlistId: created.id, url: created.webUrl },
      "Playlist ready",
    );
    return { id: created.id, webUrl: created.webUrl, writer: catalog };
  }
}
