export type Query = string;

export type PageRequest = {
  query: Query;
  page: number; // 1-based
  url: string;
};

export type AttemptFailure = "status" | "transport" | "timeout";

export type AttemptOutcome =
  | { ok: true; body: string }
  | { ok: false; failure: AttemptFailure; detail: string };

export type FetchOutcome =
  | { kind: "content"; html: string }
  | { kind: "absent"; reason: string; attempts: number };

export type ResultRecord = {
  title: string;
  link: string;
  description: string;
  faviconPath: string;
  keyword: Query;
};

export type PageResult = {
  page: number;
  results: ResultRecord[];
};

export type QueryDocument = {
  query: Query;
  pages: PageResult[];
};

export interface PageFetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

export interface PageParser {
  parse(html: string | undefined, query: Query, page: number): PageResult;
}

export interface QueryScraper {
  scrape(query: Query): Promise<QueryDocument>;
}

export type StoreReceipt = {
  location: string;
  records: number;
};

export interface Sink {
  store(destination: string, document: QueryDocument): Promise<StoreReceipt>;
}

export type StoredQuery = StoreReceipt & {
  query: Query;
  destination: string;
};

export type FailedQuery = {
  query: Query;
  destination: string;
  error: string;
};

export type BatchReport = {
  stored: StoredQuery[];
  failed: FailedQuery[];
};
