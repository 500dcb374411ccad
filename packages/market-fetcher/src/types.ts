/**
 * @fileoverview Market fetcher option and status types.
 *
 * @module @etfpulse/market-fetcher/types
 */

import type { BarInterval, Clock, MarketDataProvider } from '@etfpulse/contracts';
import type { FileCache } from '@etfpulse/file-cache';
import type { Logger } from '@etfpulse/logger';

/**
 * The cache operations the fetcher reads through.
 */
export type FetcherCache = Pick<FileCache, 'get' | 'put'>;

export interface MarketDataFetcherOptions {
  provider: MarketDataProvider;

  /** Read-through cache; omitted or null disables caching */
  cache?: FetcherCache | null;

  logger?: Logger;
  clock?: Clock;

  /**
   * Attempts per network step.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Backoff base; attempt n waits base * 2^n.
   * @default 1000
   */
  retryBaseDelayMs?: number;

  /**
   * Minimum spacing between any two provider calls.
   * @default 100
   */
  minRequestIntervalMs?: number;

  /**
   * Symbols per chunk when the bulk list is unavailable.
   * @default 10
   */
  batchSize?: number;

  /**
   * Per-symbol lookups in flight within a fallback chunk.
   * @default 3
   */
  fallbackConcurrency?: number;

  /**
   * Pause between fallback chunks.
   * @default 1000
   */
  chunkPauseMs?: number;

  /**
   * Lifetime of the in-memory bulk list.
   * @default 21600000 (6 hours)
   */
  instrumentListTtlMs?: number;

  /**
   * Bar interval requested for historical series.
   * @default '5m'
   */
  historicalInterval?: BarInterval;

  /**
   * Default concurrency of batchGetHistorical.
   * @default 3
   */
  historicalConcurrency?: number;
}

export interface InstrumentListStatus {
  cached: boolean;
  fetchedAt: string | null;
  size: number;
  expired: boolean;
  ageHours: number | null;
  ttlHours: number;
}

export interface DataSummary {
  provider: string;
  totalSymbols: number;
  validSymbols: string[];
  invalidSymbols: string[];
  instrumentList: InstrumentListStatus;
}
