import type { ScraperConfig } from "./config";
import { ProxyPageFetcher } from "./fetcher";
import { createProxyTransport, type Transport } from "./http";
import { createLimiter } from "./limiter";
import type { Logger } from "./logger";
import { ResultPageParser } from "./parse";
import { BatchRunner } from "./runner";
import { CsvFileSink, JsonFileSink } from "./save";
import { SearchQueryScraper } from "./scraper";
import type { PageParser, Sink } from "./types";

export type PipelineConfig = Pick<
  ScraperConfig,
  "searchBaseUrl" | "searchPageParam" | "pages" | "retries" | "backoffMs" | "pageConcurrency" | "queryConcurrency"
>;

export type PipelineParts = {
  transport: Transport;
  sink: Sink;
  logger: Logger;
  parser?: PageParser;
  delay?: (ms: number) => Promise<void>;
};

export function createSink(config: Pick<ScraperConfig, "outputDir" | "outputFormat">, logger: Logger): Sink {
  const opts = { dir: config.outputDir, logger };
  return config.outputFormat === "csv" ? new CsvFileSink(opts) : new JsonFileSink(opts);
}

export function createBatchRunner(config: PipelineConfig, parts: PipelineParts): BatchRunner {
  const { transport, sink, logger } = parts;

  const fetcher = new ProxyPageFetcher({
    transport,
    limiter: createLimiter(config.pageConcurrency),
    logger,
    retries: config.retries,
    backoffMs: config.backoffMs,
    delay: parts.delay,
  });

  const scraper = new SearchQueryScraper({
    fetcher,
    parser: parts.parser ?? new ResultPageParser({ logger }),
    logger,
    pages: config.pages,
    search: { baseUrl: config.searchBaseUrl, pageParam: config.searchPageParam },
  });

  return new BatchRunner({
    scraper,
    sink,
    limiter: createLimiter(config.queryConcurrency),
    logger,
  });
}

export function createProxyBatchRunner(config: ScraperConfig, logger: Logger): BatchRunner {
  return createBatchRunner(config, {
    transport: createProxyTransport({ proxyUrl: config.proxyUrl, timeoutMs: config.requestTimeoutMs }),
    sink: createSink(config, logger),
    logger,
  });
}
