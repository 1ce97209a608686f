export function trimTo(s: string | undefined, n = 50): string | undefined {
  if (!s) return s;
  const t = s.replace(/\s+/g, " ").trim();
  return t.length > n ? t.slice(0, n - 1) + "…" : t;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function countRecords(pages: { results: unknown[] }[]): number {
  return pages.reduce((sum, p) => sum + p.results.length, 0);
}
