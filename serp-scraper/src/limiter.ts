import pLimit from "p-limit";

/**
 * Counting limiter shared by every task that runs through it. One handle is
 * created per bound at startup and passed to whoever needs the slot.
 */
export type Limiter = {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
};

export function createLimiter(concurrency: number): Limiter {
  const limit = pLimit(concurrency);
  return {
    run: <T>(task: () => Promise<T>) => limit<[], T>(task),
    get active() {
      return limit.activeCount;
    },
    get pending() {
      return limit.pendingCount;
    },
  };
}
