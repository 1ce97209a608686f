import type { HttpResponse, Transport } from "../http";
import type { Logger } from "../logger";
import type { QueryDocument, Sink, StoreReceipt } from "../types";
import { countRecords } from "../utils";

export const RESULT_PAGE_HTML = `<html><body>
<div class="result">
  <a href="https://example.com/page">Example page</a>
  <div class="result-snippet">A plain result</div>
</div>
<div class="result">
  <span>Provided by Google</span>
  <a href="https://shop.example.net/deal">Buy now</a>
</div>
</body></html>`;

export type Responder = (url: string, headers: Record<string, string>, call: number) => Promise<HttpResponse>;

export type StubTransport = Transport & {
  opened: number;
  closed: number;
  calls: { url: string; headers: Record<string, string> }[];
  active: number;
  peak: number;
};

/** In-process stand-in for the proxy: counts sessions and in-flight requests. */
export function stubTransport(respond: Responder): StubTransport {
  const t: StubTransport = {
    opened: 0,
    closed: 0,
    calls: [],
    active: 0,
    peak: 0,
    open() {
      t.opened++;
      return {
        async get(url, headers) {
          t.calls.push({ url, headers });
          t.active++;
          t.peak = Math.max(t.peak, t.active);
          try {
            return await respond(url, headers, t.calls.length);
          } finally {
            t.active--;
          }
        },
        close() {
          t.closed++;
        },
      };
    },
  };
  return t;
}

export function ok(body: string, afterMs = 0): Promise<HttpResponse> {
  return wait(afterMs).then(() => ({ status: 200, body }));
}

export function status(code: number): Promise<HttpResponse> {
  return Promise.resolve({ status: code, body: "" });
}

export function wait(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export class MemorySink implements Sink {
  readonly stored = new Map<string, QueryDocument>();

  async store(destination: string, document: QueryDocument): Promise<StoreReceipt> {
    this.stored.set(destination, document);
    return { location: `memory://${destination}`, records: countRecords(document.pages) };
  }
}

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(`debug ${m}`),
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
}

export const noDelay = async (_ms: number): Promise<void> => {};
