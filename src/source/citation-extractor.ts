// ---------------------------------------------------------------------------
// Citation extractor: turns a composition detail page into at most
// `maxRecordings` recommended-recording citations.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { Citation, PageSource } from "../core/types.js";
import type { RequestPacer } from "../orchestrator/request-pacer.js";
import { CITATION_RULES, extractCitations } from "./citation-rules.js";
import type { CitationRule } from "./citation-rules.js";

export interface CitationExtractorOptions {
  maxRecordings: number;
  rules?: readonly CitationRule[];
}

export class CitationExtractor {
  private readonly logger: Logger;
  private readonly rules: readonly CitationRule[];

  constructor(
    private readonly source: PageSource,
    private readonly pacer: RequestPacer,
    private readonly options: CitationExtractorOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "CitationExtractor" });
    this.rules = options.rules ?? CITATION_RULES;
  }

  /**
   * Fetch `location` and extract its citations.
   *
   * Failures are logged and yield `[]`.  The pacer pause is taken on every
   * call, successful or not, before the promise resolves.
   */
  async extract(location: string): Promise<Citation[]> {
    let citations: Citation[] = [];

    try {
      const document = await this.source.fetchPage(location);
      citations = extractCitations(
        document.flattenedText(),
        this.options.maxRecordings,
        this.rules,
      );
      this.logger.debug(
        { url: location, citations: citations.length },
        "Extracted citations",
      );
    } catch (err: unknown) {
      this.logger.error({ err, url: location }, "Failed to extract recordings");
    }

    await this.pacer.pause();
    return citations;
  }
}
