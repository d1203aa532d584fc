// ---------------------------------------------------------------------------
// Work-list harvester: reads the composition index and yields the top-N
// works with their detail-page URLs.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { PageSource, Work } from "../core/types.js";

export interface WorkListHarvesterOptions {
  indexUrl: string;
  /** Matched (unanchored) against each anchor's raw `href`. */
  linkPattern: RegExp;
  topN: number;
}

export class WorkListHarvester {
  private readonly logger: Logger;

  constructor(
    private readonly source: PageSource,
    private readonly options: WorkListHarvesterOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "WorkListHarvester" });
  }

  /**
   * Fetch the index page and return up to `topN` works in document order.
   *
   * Never throws: a fetch or parse failure is logged and produces an empty
   * list, which the caller treats as "nothing to do".
   */
  async harvest(): Promise<Work[]> {
    const { indexUrl, linkPattern, topN } = this.options;

    try {
      const document = await this.source.fetchPage(indexUrl);
      const works: Work[] = [];

      for (const link of document.findLinks(linkPattern)) {
        if (works.length >= topN) break;

        if (!link.text) {
          this.logger.debug({ href: link.href }, "Skipping link without text");
          continue;
        }

        const sourceLocation = resolveLocation(link.href, indexUrl);
        if (!sourceLocation) {
          this.logger.warn({ href: link.href }, "Skipping unresolvable link");
          continue;
        }

        works.push({ title: link.text, sourceLocation });
        this.logger.info({ title: link.text, url: sourceLocation }, "Found work");
      }

      return works;
    } catch (err: unknown) {
      this.logger.error({ err, url: indexUrl }, "Failed to harvest work list");
      return [];
    }
  }
}

/** Resolve `href` against the page it was found on; absolute hrefs pass through. */
export function resolveLocation(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}
