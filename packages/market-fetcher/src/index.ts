/**
 * @fileoverview Main entry point for @etfpulse/market-fetcher.
 *
 * @module @etfpulse/market-fetcher
 */

export { MarketDataFetcher } from './fetcher.js';
export { RetryPolicy, exponentialBackoff, isTransient } from './retry.js';
export type { BackoffFn, RetryPolicyOptions } from './retry.js';
export { InstrumentListCache } from './instrument-list.js';
export type { InstrumentListSnapshot, RefreshOutcome } from './instrument-list.js';
export { parsePeriod, periodRange } from './periods.js';
export type { DateRange } from './periods.js';
export { createRequestLimiter, settleAll, runWithConcurrency, chunk } from './limiter.js';
export type { RequestLimiterOptions } from './limiter.js';
export type { DataSummary, FetcherCache, InstrumentListStatus, MarketDataFetcherOptions } from './types.js';
