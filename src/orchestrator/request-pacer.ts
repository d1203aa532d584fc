// ---------------------------------------------------------------------------
// Back-pressure against the scraped site: a fixed pause after each page.
// ---------------------------------------------------------------------------

export type Sleeper = (ms: number) => Promise<void>;

const defaultSleep: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum interval between consecutive detail-page requests by
 * pausing for `intervalMs` after each one.  An interval of 0 disables it.
 */
export class RequestPacer {
  private pauses = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly sleep: Sleeper = defaultSleep,
  ) {}

  async pause(): Promise<void> {
    this.pauses++;
    if (this.intervalMs <= 0) return;
    await this.sleep(this.intervalMs);
  }

  /** Number of pauses taken so far, including zero-length ones. */
  get count(): number {
    return this.pauses;
  }
}
