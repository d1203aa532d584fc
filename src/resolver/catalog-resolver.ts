// ---------------------------------------------------------------------------
// Catalog resolver: maps one citation of one work to at most one track.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  Candidate,
  CatalogSearch,
  Citation,
  DecisionProvider,
  MatchProposal,
  Resolution,
  TrackId,
} from "../core/types.js";
import { MatchDecision } from "../core/types.js";
import { findStrongMatch, pickProposal } from "./match-policy.js";

export interface CatalogResolverOptions {
  /** Candidates requested per query. */
  searchLimit: number;
}

/**
 * Search queries for a citation, in the order they are tried.
 */
export function buildQueries(workTitle: string, citation: Citation): string[] {
  return [
    `${citation.artist} ${workTitle}`,
    `${citation.artist} ${citation.info}`,
    `${workTitle} ${citation.artist}`,
  ].map((q) => q.trim());
}

/**
 * Resolves citations against the catalog.
 *
 * Queries run in order until one yields a tier-1 candidate, which is
 * accepted on the spot.  Without one, each non-empty result list contributes
 * a single tier-2/3 proposal; proposals go to the {@link DecisionProvider}
 * in query order until one is accepted, the operator skips, or none remain.
 *
 * Search failures count as empty results.  Errors thrown by the decision
 * provider (an aborted prompt) propagate.
 */
export class CatalogResolver {
  private readonly logger: Logger;

  constructor(
    private readonly catalog: CatalogSearch,
    private readonly decisions: DecisionProvider,
    private readonly options: CatalogResolverOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "CatalogResolver" });
  }

  async resolve(workTitle: string, citation: Citation): Promise<Resolution | null> {
    const log = this.logger.child({ work: workTitle, artist: citation.artist });
    const proposals: MatchProposal[] = [];

    for (const query of buildQueries(workTitle, citation)) {
      const candidates = await this.search(query, log);
      if (candidates.length === 0) continue;

      const strong = findStrongMatch(workTitle, citation, candidates);
      if (strong) {
        log.info(
          { query, track: strong.trackName, trackId: strong.trackId },
          "Auto-accepted strong match",
        );
        return { trackId: strong.trackId, acceptedAutomatically: true };
      }

      const ranked = pickProposal(workTitle, citation, candidates);
      if (ranked) {
        proposals.push({ workTitle, citation, query, ...ranked });
      }
    }

    const rejected = new Set<TrackId>();
    for (const proposal of proposals) {
      const { candidate } = proposal;
      if (rejected.has(candidate.trackId)) continue;

      const decision = await this.decisions.decide(proposal);
      log.debug(
        { decision, tier: proposal.tier, trackId: candidate.trackId },
        "Proposal decided",
      );

      if (decision === MatchDecision.ACCEPT) {
        log.info(
          { track: candidate.trackName, trackId: candidate.trackId, tier: proposal.tier },
          "Accepted proposed match",
        );
        return { trackId: candidate.trackId, acceptedAutomatically: false };
      }
      if (decision === MatchDecision.SKIP) {
        log.info("Resolution skipped for this citation");
        return null;
      }
      rejected.add(candidate.trackId);
    }

    log.info({ proposals: proposals.length }, "No suitable match found");
    return null;
  }

  private async search(query: string, log: Logger): Promise<Candidate[]> {
    try {
      return await this.catalog.searchTracks(query, this.options.searchLimit);
    } catch (err: unknown) {
      log.warn({ err, query }, "Catalog search failed");
      return [];
    }
  }
}
