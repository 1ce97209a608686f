import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import { SinkError } from "./errors";
import type { Logger } from "./logger";
import type { QueryDocument, Sink, StoreReceipt } from "./types";
import { countRecords } from "./utils";

export const CSV_COLUMNS = ["page", "title", "link", "description", "faviconPath", "keyword"] as const;

export type FileSinkOptions = {
  dir: string;
  logger: Logger;
};

async function writeOut(dir: string, filename: string, contents: string): Promise<string> {
  const path = join(dir, filename);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(path, contents, "utf-8");
  } catch (err) {
    throw new SinkError(path, { cause: err });
  }
  return path;
}

export function toJson(document: QueryDocument): string {
  return JSON.stringify({ [document.query]: document.pages }, null, 4);
}

export function toCsv(document: QueryDocument): string {
  const rows = document.pages.flatMap((p) =>
    p.results.map((r) => ({
      page: p.page,
      title: r.title,
      link: r.link,
      description: r.description,
      faviconPath: r.faviconPath,
      keyword: r.keyword,
    }))
  );
  return Papa.unparse({ fields: [...CSV_COLUMNS], data: rows.map((r) => CSV_COLUMNS.map((c) => r[c])) });
}

export class JsonFileSink implements Sink {
  constructor(private readonly opts: FileSinkOptions) {}

  async store(destination: string, document: QueryDocument): Promise<StoreReceipt> {
    const location = await writeOut(this.opts.dir, `${destination}.json`, toJson(document));
    const records = countRecords(document.pages);
    this.opts.logger.info(`Saved ${location} with ${records} results`);
    return { location, records };
  }
}

export class CsvFileSink implements Sink {
  constructor(private readonly opts: FileSinkOptions) {}

  async store(destination: string, document: QueryDocument): Promise<StoreReceipt> {
    const location = await writeOut(this.opts.dir, `${destination}.csv`, toCsv(document));
    const records = countRecords(document.pages);
    this.opts.logger.info(`Saved ${location} with ${records} results`);
    return { location, records };
  }
}
