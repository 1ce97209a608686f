import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import { ConfigError } from "./errors";
import type { Query } from "./types";

export function parseQueries(text: string, delimiter = ";"): Query[] {
  const { data } = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: "greedy" });
  return data.map((row) => (row[0] ?? "").trim()).filter((q) => q.length > 0);
}

export async function readQueries(path: string, delimiter = ";"): Promise<Query[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read queries from ${path}`, { cause: err });
  }
  return parseQueries(text.replace(/^\uFEFF/, ""), delimiter);
}
