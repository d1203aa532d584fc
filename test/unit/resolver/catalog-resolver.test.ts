import { describe, it, expect, vi } from "vitest";
import pino from "pino";

import { CatalogResolver, buildQueries } from "../../../src/resolver/catalog-resolver.js";
import { CatalogSearchError, RunAbortedError } from "../../../src/core/errors.js";
import { MatchDecision, MatchTier } from "../../../src/core/types.js";
import type {
  Candidate,
  CatalogSearch,
  Citation,
  DecisionProvider,
  MatchProposal,
  TrackId,
} from "../../../src/core/types.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const WORK = "Autumn Leaves";

const BILL_EVANS: Citation = {
  artist: "Bill Evans",
  info: "1959",
  displayText: "Bill Evans - 1959",
};

const Q1 = "Bill Evans Autumn Leaves";
const Q2 = "Bill Evans 1959";
const Q3 = "Autumn Leaves Bill Evans";

function candidate(id: string, trackName: string, artistNames: string[]): Candidate {
  return { trackId: id as TrackId, trackName, albumName: "Test Album", artistNames };
}

const STRONG = candidate("strong", "Autumn Leaves", ["Bill Evans"]);
const WEAK = candidate("weak", "Leaves (Live)", ["Bill Evans Trio"]);
const UNRELATED = candidate("other", "Peace Piece", ["Bill Evans"]);

function createSilentLogger() {
  return pino({ level: "silent" });
}

/** Catalog answering each query from a fixed table; unknown queries → []. */
function catalogWith(results: Record<string, Candidate[] | Error>) {
  const searchTracks = vi.fn(async (query: string, _limit: number) => {
    const entry = results[query];
    if (entry instanceof Error) throw entry;
    return entry ?? [];
  });
  const catalog: CatalogSearch = { searchTracks };
  return { catalog, searchTracks };
}

function decisionsReturning(...answers: MatchDecision[]) {
  const decide = vi.fn(async (_proposal: MatchProposal) => {
    return answers.shift() ?? MatchDecision.REJECT;
  });
  const decisions: DecisionProvider = { decide };
  return { decisions, decide };
}

function createResolver(catalog: CatalogSearch, decisions: DecisionProvider) {
  return new CatalogResolver(catalog, decisions, { searchLimit: 10 }, createSilentLogger());
}

// ── Tests ─────────────────────────────────────────────────────────────────

describe("buildQueries", () => {
  it("builds the three queries in order", () => {
    expect(buildQueries(WORK, BILL_EVANS)).toEqual([Q1, Q2, Q3]);
  });

  it("trims the artist/info query when info is empty", () => {
    const bigBand: Citation = { artist: "Duke Ellington", info: "", displayText: "Duke Ellington" };
    expect(buildQueries("Caravan", bigBand)).toEqual([
      "Duke Ellington Caravan",
      "Duke Ellington",
      "Caravan Duke Ellington",
    ]);
  });
});

describe("CatalogResolver", () => {
  it("accepts a tier-1 match on the first query without asking", async () => {
    const { catalog, searchTracks } = catalogWith({ [Q1]: [UNRELATED, STRONG] });
    const { decisions, decide } = decisionsReturning();

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toEqual({ trackId: "strong", acceptedAutomatically: true });
    expect(searchTracks).toHaveBeenCalledTimes(1);
    expect(searchTracks).toHaveBeenCalledWith(Q1, 10);
    expect(decide).not.toHaveBeenCalled();
  });

  it("falls through to the next query and never issues the third", async () => {
    const { catalog, searchTracks } = catalogWith({ [Q2]: [STRONG] });
    const { decisions, decide } = decisionsReturning();

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toEqual({ trackId: "strong", acceptedAutomatically: true });
    expect(searchTracks.mock.calls.map(([query]) => query)).toEqual([Q1, Q2]);
    expect(decide).not.toHaveBeenCalled();
  });

  it("treats a failed search as empty and keeps going", async () => {
    const { catalog, searchTracks } = catalogWith({
      [Q1]: new CatalogSearchError(Q1, "HTTP 500"),
      [Q2]: [STRONG],
    });
    const { decisions } = decisionsReturning();

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution?.trackId).toBe("strong");
    expect(searchTracks).toHaveBeenCalledTimes(2);
  });

  it("offers one proposal per non-empty query in query order", async () => {
    const { catalog } = catalogWith({ [Q1]: [UNRELATED], [Q2]: [WEAK] });
    const { decisions, decide } = decisionsReturning(MatchDecision.REJECT, MatchDecision.ACCEPT);

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toEqual({ trackId: "weak", acceptedAutomatically: false });
    expect(decide).toHaveBeenCalledTimes(2);
    expect(decide.mock.calls.map(([p]) => [p.candidate.trackId, p.tier, p.query])).toEqual([
      ["other", MatchTier.FALLBACK, Q1],
      ["weak", MatchTier.WEAK, Q2],
    ]);
  });

  it("passes the work and citation through on each proposal", async () => {
    const { catalog } = catalogWith({ [Q3]: [WEAK] });
    const { decisions, decide } = decisionsReturning(MatchDecision.ACCEPT);

    await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(decide).toHaveBeenCalledWith({
      workTitle: WORK,
      citation: BILL_EVANS,
      candidate: WEAK,
      tier: MatchTier.WEAK,
      query: Q3,
    });
  });

  it("proposes an unrelated track by a broader artist as a fallback", async () => {
    const other = candidate("fallback", "Some Other Song", ["Bill Evans Trio"]);
    const { catalog } = catalogWith({ [Q3]: [other] });
    const { decisions, decide } = decisionsReturning(MatchDecision.ACCEPT);

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toEqual({ trackId: "fallback", acceptedAutomatically: false });
    expect(decide).toHaveBeenCalledTimes(1);
    expect(decide.mock.calls[0]?.[0].tier).toBe(MatchTier.FALLBACK);
    expect(decide.mock.calls[0]?.[0].query).toBe(Q3);
  });

  it("returns null as soon as the operator skips", async () => {
    const { catalog } = catalogWith({ [Q1]: [UNRELATED], [Q2]: [WEAK] });
    const { decisions, decide } = decisionsReturning(MatchDecision.SKIP);

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toBeNull();
    expect(decide).toHaveBeenCalledTimes(1);
  });

  it("does not re-offer a candidate the operator already rejected", async () => {
    const { catalog } = catalogWith({ [Q1]: [UNRELATED], [Q2]: [UNRELATED], [Q3]: [UNRELATED] });
    const { decisions, decide } = decisionsReturning(MatchDecision.REJECT);

    const resolution = await createResolver(catalog, decisions).resolve(WORK, BILL_EVANS);

    expect(resolution).toBeNull();
    expect(decide).toHaveBeenCalledTimes(1);
  });

  it("returns null without asking when every query comes back empty", async () => {
    const { catalog, searchTracks } = catalogWith({});
    const { decisions, decide } = decisionsReturning();

    await expect(
      createResolver(catalog, decisions).resolve(WORK, BILL_EVANS),
    ).resolves.toBeNull();
    expect(searchTracks).toHaveBeenCalledTimes(3);
    expect(decide).not.toHaveBeenCalled();
  });

  it("propagates an abort raised by the decision provider", async () => {
    const { catalog } = catalogWith({ [Q1]: [WEAK] });
    const decisions: DecisionProvider = {
      decide: vi.fn(async () => {
        throw new RunAbortedError();
      }),
    };

    await expect(
      createResolver(catalog, decisions).resolve(WORK, BILL_EVANS),
    ).rejects.toBeInstanceOf(RunAbortedError);
  });
});
