/**
 * Combined runtime status for operators
 */

import type { CacheStats, FileCache } from '@etfpulse/file-cache';
import type { DataSummary, MarketDataFetcher } from '@etfpulse/market-fetcher';
import type { StatusSummary, TaskScheduler } from '@etfpulse/scheduler';

export interface OptimizationStatus {
  generatedAt: string;
  fetcher: DataSummary;
  cache: CacheStats;
  scheduler: StatusSummary;
}

export interface StatusSources {
  fetcher: MarketDataFetcher;
  cache: FileCache;
  scheduler: TaskScheduler;
  watchlist: readonly string[];
  now?: () => number;
}

export async function getOptimizationStatus(sources: StatusSources): Promise<OptimizationStatus> {
  const now = sources.now ?? Date.now;
  return {
    generatedAt: new Date(now()).toISOString(),
    fetcher: sources.fetcher.getDataSummary(sources.watchlist),
    cache: await sources.cache.stats(),
    scheduler: sources.scheduler.getStatusSummary(),
  };
}
