// ---------------------------------------------------------------------------
// Tiered match policy used by the catalog resolver.
//
//   Tier 1 (strong)   – artist overlaps in either direction AND every title
//                       word (or the whole title) occurs in the track name.
//                       Accepted without asking.
//   Tier 2 (weak)     – some title word occurs in the track name AND the
//                       cited artist occurs inside a candidate artist name.
//   Tier 3 (fallback) – the first search result.
//
// Tier 1 tests artist containment both ways; tier 2 only one way.
// ---------------------------------------------------------------------------

import type { Candidate, Citation, MatchProposal } from "../core/types.js";
import { MatchTier } from "../core/types.js";

export interface RankedCandidate {
  candidate: Candidate;
  tier: MatchProposal["tier"];
}

function titleWords(workTitle: string): string[] {
  return workTitle.toLowerCase().split(/\s+/).filter(Boolean);
}

/** Citation artist contains, or is contained by, some candidate artist. */
export function artistOverlaps(artist: string, candidate: Candidate): boolean {
  const cited = artist.toLowerCase();
  return candidate.artistNames.some((name) => {
    const lower = name.toLowerCase();
    return lower.includes(cited) || cited.includes(lower);
  });
}

/** Citation artist occurs inside some candidate artist (one direction). */
export function artistContained(artist: string, candidate: Candidate): boolean {
  const cited = artist.toLowerCase();
  return candidate.artistNames.some((name) => name.toLowerCase().includes(cited));
}

export function titleFullyMatches(workTitle: string, candidate: Candidate): boolean {
  const trackName = candidate.trackName.toLowerCase();
  return (
    titleWords(workTitle).every((word) => trackName.includes(word)) ||
    trackName.includes(workTitle.toLowerCase())
  );
}

export function titlePartiallyMatches(workTitle: string, candidate: Candidate): boolean {
  const trackName = candidate.trackName.toLowerCase();
  return titleWords(workTitle).some((word) => trackName.includes(word));
}

export function isStrongMatch(
  workTitle: string,
  citation: Citation,
  candidate: Candidate,
): boolean {
  return (
    artistOverlaps(citation.artist, candidate) &&
    titleFullyMatches(workTitle, candidate)
  );
}

export function isWeakMatch(
  workTitle: string,
  citation: Citation,
  candidate: Candidate,
): boolean {
  return (
    titlePartiallyMatches(workTitle, candidate) &&
    artistContained(citation.artist, candidate)
  );
}

/** First tier-1 candidate in result order, if any. */
export function findStrongMatch(
  workTitle: string,
  citation: Citation,
  candidates: readonly Candidate[],
): Candidate | undefined {
  return candidates.find((c) => isStrongMatch(workTitle, citation, c));
}

/**
 * Pick the proposal a non-strong result list contributes: the first tier-2
 * candidate, else the first candidate.  Returns `null` for an empty list.
 */
export function pickProposal(
  workTitle: string,
  citation: Citation,
  candidates: readonly Candidate[],
): RankedCandidate | null {
  const weak = candidates.find((c) => isWeakMatch(workTitle, citation, c));
  if (weak) return { candidate: weak, tier: MatchTier.WEAK };

  const first = candidates[0];
  return first ? { candidate: first, tier: MatchTier.FALLBACK } : null;
}
