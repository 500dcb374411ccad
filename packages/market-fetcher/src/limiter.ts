/**
 * @fileoverview Request spacing and bounded fan-out on Bottleneck.
 *
 * @module @etfpulse/market-fetcher/limiter
 */

import Bottleneck from 'bottleneck';

export interface RequestLimiterOptions {
  /** Minimum milliseconds between the starts of two provider calls */
  minIntervalMs: number;
  /** Calls in flight at once; unlimited when absent */
  maxConcurrent?: number;
}

/**
 * Global pacing gate shared by every provider call of one fetcher. Jobs
 * start in submission order, `minIntervalMs` apart.
 */
export function createRequestLimiter(options: RequestLimiterOptions): Bottleneck {
  return new Bottleneck({
    minTime: options.minIntervalMs,
    maxConcurrent: options.maxConcurrent ?? null,
  });
}

/**
 * Schedules `worker` for every item on `limiter` and waits for all of them.
 *
 * Results are settled outcomes in input order; a rejected worker never
 * stops the others.
 */
export function settleAll<T, R>(
  limiter: Bottleneck,
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  return Promise.allSettled(items.map((item, index) => limiter.schedule(() => worker(item, index))));
}

/**
 * Applies `worker` to every item with at most `limit` calls in flight.
 */
export function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  return settleAll(new Bottleneck({ maxConcurrent: limit }), items, worker);
}

/**
 * Splits items into consecutive chunks of at most `size`.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
