// ---------------------------------------------------------------------------
// Decision providers: who settles weak (tier 2/3) matches.
// ---------------------------------------------------------------------------

import * as readline from "node:readline/promises";

import type {
  DecisionProvider,
  MatchProposal,
} from "../core/types.js";
import { MatchDecision, MatchTier } from "../core/types.js";
import { RunAbortedError } from "../core/errors.js";

// ── Interactive ─────────────────────────────────────────────────────────────

/** Asks one question and resolves with the raw answer. */
export type Prompt = (question: string) => Promise<string>;

export const DECISION_QUESTION =
  "   Accept this match? (y/n/s to skip all for this song): ";

const ANSWERS: Record<string, MatchDecision> = {
  y: MatchDecision.ACCEPT,
  yes: MatchDecision.ACCEPT,
  n: MatchDecision.REJECT,
  no: MatchDecision.REJECT,
  s: MatchDecision.SKIP,
  skip: MatchDecision.SKIP,
};

/** Map a typed answer to a decision; `null` for anything unrecognised. */
export function parseDecision(answer: string): MatchDecision | null {
  return ANSWERS[answer.trim().toLowerCase()] ?? null;
}

export function describeProposal(proposal: MatchProposal): string[] {
  const { candidate } = proposal;
  const artist = candidate.artistNames[0] ?? "Unknown artist";
  return [
    `Found match: ${artist} - ${candidate.trackName}`,
    `   Album: ${candidate.albumName}`,
    `   Match tier: ${proposal.tier} (query "${proposal.query}")`,
  ];
}

/**
 * Console-driven provider.  Re-asks until it gets y/n/s; the prompt
 * function throws {@link RunAbortedError} when the operator closes input.
 */
export class ConsoleDecisionProvider implements DecisionProvider {
  constructor(
    private readonly prompt: Prompt,
    private readonly print: (line: string) => void = (line) => console.log(line),
  ) {}

  async decide(proposal: MatchProposal): Promise<MatchDecision> {
    for (const line of describeProposal(proposal)) this.print(line);

    for (;;) {
      const decision = parseDecision(await this.prompt(DECISION_QUESTION));
      if (decision === MatchDecision.REJECT) {
        this.print("   Skipping this match, looking for alternatives...");
      } else if (decision === MatchDecision.SKIP) {
        this.print("   Skipping all matches for this song...");
      }
      if (decision) return decision;
      this.print("   Please enter 'y' (yes), 'n' (no), or 's' (skip)");
    }
  }
}

/**
 * Build a {@link Prompt} on top of readline.  An interface exists only while
 * a question is pending, so between prompts the terminal stays in cooked
 * mode and Ctrl-C terminates the process as usual.  Ctrl-C or closing the
 * input during a question rejects with {@link RunAbortedError}.
 */
export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): { prompt: Prompt; close: () => void } {
  let closed = false;
  let active: readline.Interface | null = null;

  const prompt: Prompt = async (question) => {
    if (closed) throw new RunAbortedError();

    const rl = readline.createInterface({ input, output });
    const controller = new AbortController();
    rl.on("SIGINT", () => controller.abort());
    rl.on("close", () => controller.abort());
    active = rl;

    try {
      return await rl.question(question, { signal: controller.signal });
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        closed = true;
        throw new RunAbortedError("Run aborted at the match prompt", { cause: err });
      }
      throw err;
    } finally {
      active = null;
      rl.close();
    }
  };

  const close = (): void => {
    closed = true;
    active?.close();
  };

  return { prompt, close };
}

// ── Non-interactive ─────────────────────────────────────────────────────────

/**
 * Batch-mode provider: never blocks.  Tier-3 fallbacks are always rejected;
 * tier-2 proposals are accepted only when `acceptWeakMatches` is set.
 */
export class AutoDecisionProvider implements DecisionProvider {
  constructor(private readonly acceptWeakMatches = false) {}

  async decide(proposal: MatchProposal): Promise<MatchDecision> {
    if (proposal.tier === MatchTier.WEAK && this.acceptWeakMatches) {
      return MatchDecision.ACCEPT;
    }
    return MatchDecision.REJECT;
  }
}
