import axios, { type AxiosInstance } from "axios";
import { SocksProxyAgent } from "socks-proxy-agent";

export const ACCEPT_HTML = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

export type HttpResponse = {
  status: number;
  body: string;
};

/** One proxied connection scope. Must be closed once the attempt is over. */
export interface TransportSession {
  get(url: string, headers: Record<string, string>): Promise<HttpResponse>;
  close(): void;
}

export interface Transport {
  open(): TransportSession;
}

export type ProxyTransportOptions = {
  proxyUrl: string;
  timeoutMs: number;
};

const REMOTE_DNS: Record<string, string> = {
  "socks4:": "socks4a:",
  "socks5:": "socks5h:",
};

/** Host names are resolved by the proxy, never on this machine. */
export function withRemoteDns(proxyUrl: string): string {
  const url = new URL(proxyUrl);
  const remote = REMOTE_DNS[url.protocol];
  if (!remote) return proxyUrl;
  return remote + proxyUrl.slice(url.protocol.length);
}

/**
 * Opens a fresh SOCKS agent per session so no connection outlives the
 * attempt that created it. Non-2xx statuses resolve; only transport errors
 * and timeouts reject.
 */
export function createProxyTransport({ proxyUrl, timeoutMs }: ProxyTransportOptions): Transport {
  const proxy = withRemoteDns(proxyUrl);
  return {
    open() {
      const agent = new SocksProxyAgent(proxy);
      const http: AxiosInstance = axios.create({
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        timeout: timeoutMs,
        responseType: "text",
        validateStatus: () => true,
        headers: { Accept: ACCEPT_HTML },
      });

      return {
        async get(url, headers) {
          const res = await http.get<unknown>(url, { headers });
          const body = typeof res.data === "string" ? res.data : "";
          return { status: res.status, body };
        },
        close() {
          agent.destroy();
        },
      };
    },
  };
}

export function isTimeoutError(err: unknown): boolean {
  if (axios.isAxiosError(err)) {
    return err.code === "ECONNABORTED" || err.code === "ETIMEDOUT";
  }
  return err instanceof Error && /timeout/i.test(err.message);
}
