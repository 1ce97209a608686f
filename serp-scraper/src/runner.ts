import { createHash } from "node:crypto";
import { describeError } from "./errors";
import type { Limiter } from "./limiter";
import type { Logger } from "./logger";
import type { BatchReport, Query, QueryScraper, Sink } from "./types";

/**
 * Stable file-safe name for a query: letters, digits, spaces and underscores
 * survive, spaces become underscores.
 */
export function destinationFor(query: Query): string {
  const kept = query.replace(/[^\p{L}\p{N} _]/gu, "").replace(/ /g, "_");
  if (kept.length > 0) return kept;
  return `query_${createHash("sha1").update(query).digest("hex").slice(0, 10)}`;
}

export type BatchRunnerOptions = {
  scraper: QueryScraper;
  sink: Sink;
  limiter: Limiter;
  logger: Logger;
};

export class BatchRunner {
  private readonly scraper: QueryScraper;
  private readonly sink: Sink;
  private readonly limiter: Limiter;
  private readonly logger: Logger;

  constructor(opts: BatchRunnerOptions) {
    this.scraper = opts.scraper;
    this.sink = opts.sink;
    this.limiter = opts.limiter;
    this.logger = opts.logger;
  }

  async run(queries: Query[]): Promise<BatchReport> {
    const report: BatchReport = { stored: [], failed: [] };

    await Promise.all(
      queries.map((query) =>
        this.limiter.run(async () => {
          const destination = destinationFor(query);
          try {
            this.logger.info(`Scraping "${query}"`);
            const document = await this.scraper.scrape(query);
            const receipt = await this.sink.store(destination, document);
            report.stored.push({ query, destination, ...receipt });
          } catch (err) {
            const error = describeError(err);
            this.logger.error(`Query "${query}" failed: ${error}`);
            report.failed.push({ query, destination, error });
          }
        })
      )
    );

    this.logger.info(`Batch done: ${report.stored.length} stored, ${report.failed.length} failed`);
    return report;
  }
}
