import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS } from "./logger";
import { DEFAULT_SEARCH_BASE_URL } from "./search";

const SOCKS_PROTOCOLS = ["socks:", "socks4:", "socks4a:", "socks5:", "socks5h:"];

function protocolOf(v: string): string | undefined {
  try {
    return new URL(v).protocol;
  } catch {
    return undefined;
  }
}

const int = (min: number, max = Number.MAX_SAFE_INTEGER) => z.coerce.number().int().min(min).max(max);

const ConfigSchema = z.object({
  PROXY_URL: z
    .string({ required_error: "PROXY_URL is required" })
    .url("PROXY_URL must be a URL")
    .refine((v) => SOCKS_PROTOCOLS.includes(protocolOf(v) ?? ""), {
      message: "PROXY_URL must use a socks, socks4, socks4a, socks5 or socks5h scheme",
    }),
  SEARCH_BASE_URL: z
    .string()
    .url()
    .refine((v) => /^https?:\/\//i.test(v), { message: "SEARCH_BASE_URL must be http(s)" })
    .default(DEFAULT_SEARCH_BASE_URL),
  SEARCH_PAGE_PARAM: z.string().min(1).default("p"),
  PAGES: int(1, 50).default(5),
  RETRIES: int(1, 10).default(3),
  BACKOFF_MS: int(0).default(2000),
  REQUEST_TIMEOUT_MS: int(1).default(30000),
  PAGE_CONCURRENCY: int(1).default(10),
  QUERY_CONCURRENCY: int(1).default(3),
  QUERIES_FILE: z.string().min(1).default("./data.csv"),
  QUERIES_DELIMITER: z.string().length(1).default(";"),
  OUTPUT_DIR: z.string().min(1).default("data/out"),
  OUTPUT_FORMAT: z.enum(["json", "csv"]).default("json"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type ScraperConfig = {
  proxyUrl: string;
  searchBaseUrl: string;
  searchPageParam: string;
  pages: number;
  retries: number;
  backoffMs: number;
  requestTimeoutMs: number;
  pageConcurrency: number;
  queryConcurrency: number;
  queriesFile: string;
  queriesDelimiter: string;
  outputDir: string;
  outputFormat: "json" | "csv";
  logLevel: (typeof LOG_LEVELS)[number];
};

export type CliOverrides = {
  input?: string;
  out?: string;
  format?: string;
};

type Env = Record<string, string | undefined>;

/** Empty strings count as unset, the way a blank line in .env reads. */
function present(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
}

export function loadConfig(env: Env = process.env, overrides: CliOverrides = {}): ScraperConfig {
  const parsed = ConfigSchema.safeParse({
    ...present(env),
    ...present({ QUERIES_FILE: overrides.input, OUTPUT_DIR: overrides.out, OUTPUT_FORMAT: overrides.format }),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const c = parsed.data;
  return {
    proxyUrl: c.PROXY_URL,
    searchBaseUrl: c.SEARCH_BASE_URL,
    searchPageParam: c.SEARCH_PAGE_PARAM,
    pages: c.PAGES,
    retries: c.RETRIES,
    backoffMs: c.BACKOFF_MS,
    requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
    pageConcurrency: c.PAGE_CONCURRENCY,
    queryConcurrency: c.QUERY_CONCURRENCY,
    queriesFile: c.QUERIES_FILE,
    queriesDelimiter: c.QUERIES_DELIMITER,
    outputDir: c.OUTPUT_DIR,
    outputFormat: c.OUTPUT_FORMAT,
    logLevel: c.LOG_LEVEL,
  };
}

export function parseArgs(argv: string[]): CliOverrides {
  const flag = (name: string) => {
    const idx = argv.findIndex((a) => a === `--${name}`);
    return idx >= 0 ? argv[idx + 1] : undefined;
  };
  return { input: flag("input"), out: flag("out"), format: flag("format") };
}
