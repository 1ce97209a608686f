import type { Transport, TransportSession } from "./http";
import { isTimeoutError } from "./http";
import type { Limiter } from "./limiter";
import type { Logger } from "./logger";
import type { AttemptOutcome, FetchOutcome, PageFetcher } from "./types";
import { randomUserAgent } from "./userAgents";
import { sleep, trimTo } from "./utils";
import { describeError } from "./errors";

export type ProxyPageFetcherOptions = {
  transport: Transport;
  /** Shared across every query of the run. */
  limiter: Limiter;
  logger: Logger;
  retries?: number;
  backoffMs?: number;
  userAgent?: () => string;
  delay?: (ms: number) => Promise<void>;
};

export class ProxyPageFetcher implements PageFetcher {
  private readonly transport: Transport;
  private readonly limiter: Limiter;
  private readonly logger: Logger;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly userAgent: () => string;
  private readonly delay: (ms: number) => Promise<void>;

  constructor(opts: ProxyPageFetcherOptions) {
    if (opts.retries !== undefined && opts.retries < 1) {
      throw new RangeError(`retries must be at least 1, got ${opts.retries}`);
    }
    this.transport = opts.transport;
    this.limiter = opts.limiter;
    this.logger = opts.logger;
    this.retries = opts.retries ?? 3;
    this.backoffMs = opts.backoffMs ?? 2000;
    this.userAgent = opts.userAgent ?? randomUserAgent;
    this.delay = opts.delay ?? sleep;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    let last = "no attempt made";

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const outcome = await this.limiter.run(() => this.attempt(url));

      if (outcome.ok) {
        this.logger.debug(
          `Fetched ${url}, HTML length: ${outcome.body.length}, starts with: ${trimTo(outcome.body, 100) ?? ""}`
        );
        return { kind: "content", html: outcome.body };
      }

      last = `${outcome.failure}: ${outcome.detail}`;
      this.logger.error(`Attempt ${attempt}/${this.retries} failed for ${url} (${last})`);

      if (attempt < this.retries) {
        await this.delay(this.backoffMs);
      }
    }

    this.logger.error(`All ${this.retries} attempts failed for ${url}`);
    return { kind: "absent", reason: last, attempts: this.retries };
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    const headers = { "User-Agent": this.userAgent() };
    this.logger.debug(`Requesting ${url} as "${headers["User-Agent"]}"`);

    let session: TransportSession | undefined;
    try {
      session = this.transport.open();
      const res = await session.get(url, headers);
      if (res.status !== 200) {
        return { ok: false, failure: "status", detail: `status ${res.status}` };
      }
      return { ok: true, body: res.body };
    } catch (err) {
      return {
        ok: false,
        failure: isTimeoutError(err) ? "timeout" : "transport",
        detail: describeError(err),
      };
    } finally {
      session?.close();
    }
  }
}
