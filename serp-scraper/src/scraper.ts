import { describeError } from "./errors";
import type { Logger } from "./logger";
import { buildPageRequests, type SearchUrlOptions } from "./search";
import type { PageFetcher, PageParser, PageResult, Query, QueryDocument, QueryScraper } from "./types";

export type SearchQueryScraperOptions = {
  fetcher: PageFetcher;
  parser: PageParser;
  logger: Logger;
  pages?: number;
  search?: SearchUrlOptions;
};

export class SearchQueryScraper implements QueryScraper {
  private readonly fetcher: PageFetcher;
  private readonly parser: PageParser;
  private readonly logger: Logger;
  private readonly pages: number;
  private readonly search: SearchUrlOptions;

  constructor(opts: SearchQueryScraperOptions) {
    this.fetcher = opts.fetcher;
    this.parser = opts.parser;
    this.logger = opts.logger;
    this.pages = opts.pages ?? 5;
    this.search = opts.search ?? {};
  }

  async scrape(query: Query): Promise<QueryDocument> {
    const requests = buildPageRequests(query, this.pages, this.search);
    const settled = await Promise.allSettled(requests.map((r) => this.fetcher.fetch(r.url)));

    const pages = requests.map((req, i): PageResult => {
      const outcome = settled[i];
      let html: string | undefined;

      if (outcome.status === "rejected") {
        this.logger.error(`Error in page ${req.page} for "${query}": ${describeError(outcome.reason)}`);
      } else if (outcome.value.kind === "content") {
        html = outcome.value.html;
      }

      try {
        return this.parser.parse(html, query, req.page);
      } catch (err) {
        this.logger.error(`Parser failed on page ${req.page} for "${query}": ${describeError(err)}`);
        return { page: req.page, results: [] };
      }
    });

    return { query, pages };
  }
}
