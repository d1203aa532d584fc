import { describe, it, expect } from "vitest";

import {
  artistContained,
  artistOverlaps,
  findStrongMatch,
  isStrongMatch,
  isWeakMatch,
  pickProposal,
  titleFullyMatches,
} from "../../../src/resolver/match-policy.js";
import { MatchTier } from "../../../src/core/types.js";
import type { Candidate, Citation, TrackId } from "../../../src/core/types.js";

function candidate(id: string, trackName: string, artistNames: string[]): Candidate {
  return {
    trackId: id as TrackId,
    trackName,
    albumName: "Test Album",
    artistNames,
  };
}

const BILL_EVANS: Citation = {
  artist: "Bill Evans",
  info: "1959",
  displayText: "Bill Evans - 1959",
};

describe("artist checks", () => {
  const trio = candidate("t1", "Autumn Leaves", ["Bill Evans Trio"]);
  const short = candidate("t2", "Autumn Leaves", ["Evans"]);

  it("artistOverlaps accepts containment in either direction", () => {
    expect(artistOverlaps("Bill Evans", trio)).toBe(true);
    expect(artistOverlaps("Bill Evans", short)).toBe(true);
  });

  it("artistContained only accepts the cited artist inside a candidate artist", () => {
    expect(artistContained("Bill Evans", trio)).toBe(true);
    expect(artistContained("Bill Evans", short)).toBe(false);
  });

  it("ignores case", () => {
    expect(artistContained("bill evans", candidate("t3", "x", ["BILL EVANS"]))).toBe(true);
  });
});

describe("titleFullyMatches", () => {
  it("requires every title word in the track name", () => {
    expect(titleFullyMatches("Autumn Leaves", candidate("a", "Autumn Leaves - Take 2", []))).toBe(
      true,
    );
    expect(titleFullyMatches("Autumn Leaves", candidate("b", "Autumn in New York", []))).toBe(
      false,
    );
  });

  it("matches words as substrings", () => {
    expect(titleFullyMatches("Body and Soul", candidate("c", "Body And Soulful", []))).toBe(true);
  });
});

describe("tier checks", () => {
  it("tier 1 needs every title word and an overlapping artist", () => {
    expect(
      isStrongMatch("Autumn Leaves", BILL_EVANS, candidate("a", "Autumn Leaves", ["Bill Evans"])),
    ).toBe(true);
    expect(
      isStrongMatch("Autumn Leaves", BILL_EVANS, candidate("b", "Autumn Leaves", ["Miles Davis"])),
    ).toBe(false);
  });

  it("tier 2 needs one title word and the cited artist inside a candidate artist", () => {
    const partial = candidate("c", "Leaves (Live)", ["Bill Evans Trio"]);
    expect(isStrongMatch("Autumn Leaves", BILL_EVANS, partial)).toBe(false);
    expect(isWeakMatch("Autumn Leaves", BILL_EVANS, partial)).toBe(true);
  });
});

describe("findStrongMatch", () => {
  it("returns the first tier-1 candidate in result order", () => {
    const results = [
      candidate("x", "Waltz for Debby", ["Bill Evans"]),
      candidate("y", "Autumn Leaves", ["Bill Evans"]),
      candidate("z", "Autumn Leaves (Take 2)", ["Bill Evans"]),
    ];

    expect(findStrongMatch("Autumn Leaves", BILL_EVANS, results)?.trackId).toBe("y");
  });

  it("returns undefined when nothing qualifies", () => {
    expect(
      findStrongMatch("Autumn Leaves", BILL_EVANS, [candidate("x", "Peace Piece", ["Bill Evans"])]),
    ).toBeUndefined();
  });
});

describe("pickProposal", () => {
  it("prefers the first tier-2 candidate", () => {
    const results = [
      candidate("x", "Peace Piece", ["Bill Evans"]),
      candidate("y", "Leaves", ["Bill Evans Trio"]),
    ];

    expect(pickProposal("Autumn Leaves", BILL_EVANS, results)).toEqual({
      candidate: results[1],
      tier: MatchTier.WEAK,
    });
  });

  it("falls back to the first candidate as tier 3", () => {
    const results = [
      candidate("x", "Peace Piece", ["Bill Evans"]),
      candidate("y", "So What", ["Miles Davis"]),
    ];

    expect(pickProposal("Autumn Leaves", BILL_EVANS, results)).toEqual({
      candidate: results[0],
      tier: MatchTier.FALLBACK,
    });
  });

  it("returns null for an empty result list", () => {
    expect(pickProposal("Autumn Leaves", BILL_EVANS, [])).toBeNull();
  });
});
