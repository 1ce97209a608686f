import { describe, it, expect } from "vitest";
import { silentLogger } from "../logger";
import { createBatchRunner, createSink, type PipelineConfig } from "../pipeline";
import { CsvFileSink, JsonFileSink } from "../save";
import { MemorySink, RESULT_PAGE_HTML, noDelay, ok, status, stubTransport } from "./helpers";

const config: PipelineConfig = {
  searchBaseUrl: "https://search.example/search",
  searchPageParam: "p",
  pages: 2,
  retries: 3,
  backoffMs: 2000,
  pageConcurrency: 10,
  queryConcurrency: 3,
};

describe("batch pipeline", () => {
  it("stores one document per query with every page holding the organic result", async () => {
    const transport = stubTransport(() => ok(RESULT_PAGE_HTML, 1));
    const sink = new MemorySink();
    const runner = createBatchRunner(config, { transport, sink, logger: silentLogger, delay: noDelay });

    const report = await runner.run(["cats", "dogs"]);

    expect(report.failed).toEqual([]);
    expect([...sink.stored.keys()].sort()).toEqual(["cats", "dogs"]);
    for (const query of ["cats", "dogs"]) {
      const doc = sink.stored.get(query);
      expect(doc?.pages.map((p) => p.page)).toEqual([1, 2]);
      for (const page of doc?.pages ?? []) {
        expect(page.results).toEqual([
          {
            title: "Example page",
            link: "https://example.com/page",
            description: "A plain result",
            faviconPath: "https://www.google.com/s2/favicons?domain=example.com",
            keyword: query,
          },
        ]);
      }
    }
    expect(transport.calls.map((c) => c.url).sort()).toEqual([
      "https://search.example/search?q=cats",
      "https://search.example/search?q=cats&p=1",
      "https://search.example/search?q=dogs",
      "https://search.example/search?q=dogs&p=1",
    ]);
  });

  it("still stores a document of empty pages when every fetch fails", async () => {
    const transport = stubTransport(() => status(503));
    const sink = new MemorySink();
    const runner = createBatchRunner(config, { transport, sink, logger: silentLogger, delay: noDelay });

    const report = await runner.run(["unlucky"]);

    expect(report.stored).toEqual([
      { query: "unlucky", destination: "unlucky", location: "memory://unlucky", records: 0 },
    ]);
    expect(sink.stored.get("unlucky")?.pages).toEqual([
      { page: 1, results: [] },
      { page: 2, results: [] },
    ]);
    expect(transport.calls).toHaveLength(config.pages * config.retries);
    expect(transport.closed).toBe(transport.opened);
  });

  it("keeps page fetches within the shared limit across concurrent queries", async () => {
    const transport = stubTransport(() => ok("<html></html>", 5));
    const runner = createBatchRunner(
      { ...config, pages: 5, pageConcurrency: 4, queryConcurrency: 3 },
      { transport, sink: new MemorySink(), logger: silentLogger, delay: noDelay }
    );

    const report = await runner.run(["a", "b", "c", "d"]);

    expect(report.stored).toHaveLength(4);
    expect(transport.calls).toHaveLength(20);
    expect(transport.peak).toBe(4);
  });
});

describe("createSink", () => {
  it("picks the sink by output format", () => {
    expect(createSink({ outputDir: "out", outputFormat: "json" }, silentLogger)).toBeInstanceOf(JsonFileSink);
    expect(createSink({ outputDir: "out", outputFormat: "csv" }, silentLogger)).toBeInstanceOf(CsvFileSink);
  });
});
