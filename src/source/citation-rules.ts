// ---------------------------------------------------------------------------
// Citation rules – named text patterns that recover (artist, info) pairs
// from the flattened text of a composition page.
//
// Composition pages mention recordings in running prose, e.g.
//
//   ... Bill Evans (1959) Portrait in Jazz ...
//   ... Miles Davis - Kind of Blue ...
//   ... Duke Ellington and His Orchestra ...
//
// Each rule owns one of these shapes.  The artist token is always two or
// three capitalized words; names outside that shape are not recovered.
// ---------------------------------------------------------------------------

import type { Citation } from "../core/types.js";

/** Two or three capitalized words, e.g. "Bill Evans", "John Lewis Jr". */
const ARTIST = String.raw`([A-Z][a-z]+ [A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)`;

export interface CitationRule {
  readonly name: string;
  /** Must carry the `g` flag; evaluated with `matchAll`. */
  readonly pattern: RegExp;
}

/** "Artist (1959" – artist followed by a parenthesised four-digit year. */
export const ARTIST_YEAR_RULE: CitationRule = {
  name: "artist-year",
  pattern: new RegExp(String.raw`${ARTIST}\s*\((\d{4})`, "g"),
};

/** "Artist - free text" – the tail runs up to the next "(" or end of text. */
export const ARTIST_DASH_RULE: CitationRule = {
  name: "artist-dash",
  pattern: new RegExp(String.raw`${ARTIST}\s*[-–]\s*([^(]+)`, "g"),
};

/** "Artist and His Orchestra" – big-band credits carry no info. */
export const BIG_BAND_RULE: CitationRule = {
  name: "big-band",
  pattern: new RegExp(String.raw`${ARTIST}\s+and\s+His\s+Orchestra`, "g"),
};

/** Evaluation order matters: earlier rules win the per-artist dedup. */
export const CITATION_RULES: readonly CitationRule[] = [
  ARTIST_YEAR_RULE,
  ARTIST_DASH_RULE,
  BIG_BAND_RULE,
];

/**
 * Run a single rule over `text`, returning one citation per match in
 * document order.  Duplicates are kept.
 */
export function applyRule(rule: CitationRule, text: string): Citation[] {
  const citations: Citation[] = [];

  for (const match of text.matchAll(rule.pattern)) {
    const groups = match.slice(1).filter((g): g is string => g !== undefined);
    const artist = (groups[0] ?? "").trim();
    if (!artist) continue;

    const info = (groups[1] ?? "").trim();
    citations.push({
      artist,
      info,
      displayText: info ? `${artist} - ${info}` : artist,
    });
  }

  return citations;
}

/**
 * Apply every rule independently, concatenate their matches (rule order,
 * then document order), keep the first citation per case-insensitive
 * artist, and cap the result at `maxRecordings`.
 */
export function extractCitations(
  text: string,
  maxRecordings: number,
  rules: readonly CitationRule[] = CITATION_RULES,
): Citation[] {
  const seen = new Set<string>();
  const unique: Citation[] = [];

  for (const rule of rules) {
    for (const citation of applyRule(rule, text)) {
      const key = citation.artist.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      unique.push(citation);
    }
  }

  return unique.slice(0, maxRecordings);
}
