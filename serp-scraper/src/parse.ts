import { load } from "cheerio";
import type { Logger } from "./logger";
import type { PageParser, PageResult, Query, ResultRecord } from "./types";
import { trimTo } from "./utils";

export const NO_TITLE = "No title";
export const DEFAULT_CONTAINER_SELECTOR = 'div:not([class*="ad"]):not([class*="cookie"])';
export const DEFAULT_SPONSOR_MARKERS = ["provided by google", "sponsored"];

const DESCRIPTION_CLASS = /description|snippet|result/i;

export type ResultPageParserOptions = {
  logger: Logger;
  containerSelector?: string;
  sponsorMarkers?: string[];
};

const AUTHORITY = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

/** Uses the authority exactly as written in the link, without punycode or case folding. */
export function faviconFor(href: string): string {
  const domain = AUTHORITY.exec(href)?.[1] ?? "";
  return `https://www.google.com/s2/favicons?domain=${domain}`;
}

export function toAbsoluteLink(href: string | undefined): URL | undefined {
  if (!href || !/^https?:\/\//i.test(href)) return undefined;
  try {
    return new URL(href);
  } catch {
    return undefined;
  }
}

export class ResultPageParser implements PageParser {
  private readonly logger: Logger;
  private readonly containerSelector: string;
  private readonly sponsorMarkers: string[];

  constructor(opts: ResultPageParserOptions) {
    this.logger = opts.logger;
    this.containerSelector = opts.containerSelector ?? DEFAULT_CONTAINER_SELECTOR;
    this.sponsorMarkers = (opts.sponsorMarkers ?? DEFAULT_SPONSOR_MARKERS).map((m) => m.toLowerCase());
  }

  parse(html: string | undefined, query: Query, page: number): PageResult {
    if (html === undefined) {
      this.logger.debug(`No HTML for page ${page} of "${query}"`);
      return { page, results: [] };
    }

    const $ = load(html);
    const results: ResultRecord[] = [];
    const candidates = $(this.containerSelector);
    this.logger.debug(`Found ${candidates.length} candidate containers on page ${page} of "${query}"`);

    candidates.each((_, el) => {
      const container = $(el);
      const text = container.text();

      if (this.isSponsored(text)) {
        this.logger.debug(`Skipped sponsored result: ${trimTo(text) ?? ""}`);
        return;
      }

      const anchor = container.find("a[href]").first();
      const link = toAbsoluteLink(anchor.attr("href"));
      if (!link) {
        this.logger.debug(`No valid link in result: ${trimTo(text) ?? ""}`);
        return;
      }

      const title = anchor.text().trim() || NO_TITLE;
      const description = container
        .find("div")
        .filter((_, d) => DESCRIPTION_CLASS.test($(d).attr("class") ?? ""))
        .first()
        .text()
        .trim();

      const href = anchor.attr("href") ?? link.href;
      results.push({
        title,
        link: href,
        description,
        faviconPath: faviconFor(href),
        keyword: query,
      });
    });

    this.logger.info(`Extracted ${results.length} results for page ${page} of "${query}"`);
    return { page, results };
  }

  private isSponsored(text: string): boolean {
    const lower = text.toLowerCase();
    return this.sponsorMarkers.some((m) => lower.includes(m));
  }
}
