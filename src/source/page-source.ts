// ---------------------------------------------------------------------------
// HttpPageSource – fetches composition-site pages and parses them with
// cheerio into the ParsedDocument view the harvesters consume.
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";
import type { Logger } from "pino";

import type {
  PageLink,
  PageSource,
  ParsedDocument,
  SourceConfig,
} from "../core/types.js";
import { SourceFetchError, SourceParseError } from "../core/errors.js";
import { withRetry } from "../orchestrator/retry.js";

/** Elements whose text never renders. */
const INVISIBLE_ELEMENTS = "script, style, noscript, template";

/**
 * Cheerio-backed document.  Link and text queries run against the parsed
 * tree; nothing is fetched lazily.
 */
export class CheerioDocument implements ParsedDocument {
  private constructor(private readonly $: cheerio.CheerioAPI) {}

  static fromHtml(html: string): CheerioDocument {
    return new CheerioDocument(cheerio.load(html));
  }

  findLinks(pattern: RegExp): PageLink[] {
    // A global/sticky regex keeps lastIndex between test() calls.
    const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
    const links: PageLink[] = [];

    this.$("a[href]").each((_index, element) => {
      const $a = this.$(element);
      const href = ($a.attr("href") ?? "").trim();
      if (!href || !matcher.test(href)) return;

      links.push({
        text: $a.text().replace(/\s+/g, " ").trim(),
        href,
      });
    });

    return links;
  }

  flattenedText(): string {
    this.$(INVISIBLE_ELEMENTS).remove();
    return this.$.root().text();
  }
}

export type HttpPageSourceOptions = Pick<
  SourceConfig,
  "requestTimeoutMs" | "userAgent" | "maxRetries" | "retryBaseDelayMs"
>;

/**
 * {@link PageSource} over the global `fetch`.  Transient failures (network,
 * timeout, 429, 5xx) are retried with backoff; anything else surfaces as a
 * {@link SourceFetchError} or {@link SourceParseError}.
 */
export class HttpPageSource implements PageSource {
  private readonly logger: Logger;

  constructor(
    private readonly options: HttpPageSourceOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "HttpPageSource" });
  }

  async fetchPage(uri: string): Promise<ParsedDocument> {
    return withRetry(() => this.fetchOnce(uri), {
      maxRetries: this.options.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
    });
  }

  private async fetchOnce(uri: string): Promise<ParsedDocument> {
    this.logger.debug({ url: uri }, "Fetching page");

    let response: Response;
    try {
      response = await fetch(uri, {
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        headers: {
          Accept: "text/html",
          "User-Agent": this.options.userAgent,
        },
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceFetchError(`Request to ${uri} failed: ${message}`, uri, null, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new SourceFetchError(
        `Request to ${uri} failed with HTTP ${response.status}`,
        uri,
        response.status,
      );
    }

    let html: string;
    try {
      html = await response.text();
    } catch (error: unknown) {
      throw new SourceFetchError(`Could not read body of ${uri}`, uri, response.status, {
        cause: error,
      });
    }

    try {
      return CheerioDocument.fromHtml(html);
    } catch (error: unknown) {
      throw new SourceParseError(`Could not parse HTML from ${uri}`, uri, {
        cause: error,
      });
    }
  }
}
