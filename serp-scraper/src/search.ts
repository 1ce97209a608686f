import type { PageRequest, Query } from "./types";

export const DEFAULT_SEARCH_BASE_URL = "https://www.ecosia.org/search";

export type SearchUrlOptions = {
  baseUrl?: string;
  pageParam?: string;
};

export function searchUrl(query: Query, page: number, opts: SearchUrlOptions = {}): string {
  const base = opts.baseUrl ?? DEFAULT_SEARCH_BASE_URL;
  const url = `${base}?q=${encodeURIComponent(query)}`;
  if (page <= 1) return url;
  return `${url}&${opts.pageParam ?? "p"}=${page - 1}`;
}

export function buildPageRequests(query: Query, pages: number, opts: SearchUrlOptions = {}): PageRequest[] {
  return Array.from({ length: pages }, (_, i) => ({
    query,
    page: i + 1,
    url: searchUrl(query, i + 1, opts),
  }));
}
