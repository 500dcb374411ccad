/**
 * @fileoverview Market data fetcher: validation, pacing, retries, bulk reuse
 * and read-through caching in front of one MarketDataProvider.
 *
 * @module @etfpulse/market-fetcher/fetcher
 */

import type Bottleneck from 'bottleneck';
import {
  ConfigurationError,
  EmptyResponseError,
  createSeries,
  describeError,
  systemClock,
} from '@etfpulse/contracts';
import type {
  BarInterval,
  Clock,
  HistoricalSeries,
  InstrumentInfo,
  InstrumentQuote,
  InstrumentSnapshot,
  MarketDataProvider,
} from '@etfpulse/contracts';
import { createNullLogger, startTimer } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';
import { isValidSymbol, partitionSymbols } from '@etfpulse/symbol-registry';
import { InstrumentListCache } from './instrument-list.js';
import { chunk, createRequestLimiter, runWithConcurrency, settleAll } from './limiter.js';
import { periodRange } from './periods.js';
import type { DateRange } from './periods.js';
import { RetryPolicy } from './retry.js';
import type { DataSummary, FetcherCache, InstrumentListStatus, MarketDataFetcherOptions } from './types.js';

const DEFAULTS = {
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  minRequestIntervalMs: 100,
  batchSize: 10,
  fallbackConcurrency: 3,
  chunkPauseMs: 1000,
  instrumentListTtlMs: 6 * 60 * 60 * 1000,
  historicalInterval: '5m',
  historicalConcurrency: 3,
} as const;

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer`, { option: name, value });
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number`, { option: name, value });
  }
  return value;
}

function toSnapshot(quote: InstrumentQuote, currency: string, asOf: number): InstrumentSnapshot {
  return {
    symbol: quote.symbol,
    name: quote.name,
    lastPrice: quote.lastPrice,
    previousClose: quote.previousClose,
    changePercent: quote.changePercent,
    volume: quote.volume,
    marketCap: quote.marketCap,
    currency,
    asOf: new Date(asOf).toISOString(),
  };
}

/**
 * Fetches current snapshots, historical series and metadata for exchange
 * symbols.
 *
 * Every provider call passes the pacing gate and runs inside the retry
 * policy. Per-symbol failures come back as null (or are omitted from batch
 * results); only invalid options throw.
 *
 * @example
 * ```typescript
 * const fetcher = new MarketDataFetcher({ provider: new EastmoneyProvider(), cache, logger });
 * const quotes = await fetcher.batchGetCurrent(['510300', '159915']);
 * const series = await fetcher.getHistorical('510300', '60d');
 * ```
 */
export class MarketDataFetcher {
  private readonly provider: MarketDataProvider;
  private readonly cache: FetcherCache | null;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryPolicy;
  private readonly limiter: Bottleneck;
  private readonly fallbackLimiter: Bottleneck;
  private readonly instrumentList: InstrumentListCache;
  private readonly batchSize: number;
  private readonly fallbackConcurrency: number;
  private readonly chunkPauseMs: number;
  private readonly historicalInterval: BarInterval;
  private readonly historicalConcurrency: number;

  constructor(options: MarketDataFetcherOptions) {
    this.provider = options.provider;
    this.cache = options.cache ?? null;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createNullLogger()).child({
      component: 'market-fetcher',
      provider: options.provider.id,
    });

    const maxRetries = requirePositiveInteger('maxRetries', options.maxRetries ?? DEFAULTS.maxRetries);
    const retryBaseDelayMs = requireNonNegative('retryBaseDelayMs', options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs);
    const minRequestIntervalMs = requireNonNegative(
      'minRequestIntervalMs',
      options.minRequestIntervalMs ?? DEFAULTS.minRequestIntervalMs
    );
    const listTtlMs = options.instrumentListTtlMs ?? DEFAULTS.instrumentListTtlMs;
    if (!Number.isFinite(listTtlMs) || listTtlMs <= 0) {
      throw new ConfigurationError('instrumentListTtlMs must be a positive number', {
        option: 'instrumentListTtlMs',
        value: listTtlMs,
      });
    }

    this.batchSize = requirePositiveInteger('batchSize', options.batchSize ?? DEFAULTS.batchSize);
    this.fallbackConcurrency = requirePositiveInteger(
      'fallbackConcurrency',
      options.fallbackConcurrency ?? DEFAULTS.fallbackConcurrency
    );
    this.chunkPauseMs = requireNonNegative('chunkPauseMs', options.chunkPauseMs ?? DEFAULTS.chunkPauseMs);
    this.historicalConcurrency = requirePositiveInteger(
      'historicalConcurrency',
      options.historicalConcurrency ?? DEFAULTS.historicalConcurrency
    );
    this.historicalInterval = options.historicalInterval ?? DEFAULTS.historicalInterval;

    this.retry = new RetryPolicy({
      maxAttempts: maxRetries,
      baseDelayMs: retryBaseDelayMs,
      clock: this.clock,
      logger: this.logger,
    });
    this.limiter = createRequestLimiter({ minIntervalMs: minRequestIntervalMs });
    this.fallbackLimiter = createRequestLimiter({ minIntervalMs: 0, maxConcurrent: this.fallbackConcurrency });
    this.instrumentList = new InstrumentListCache(
      () => this.call('listInstruments', () => this.provider.listInstruments()),
      listTtlMs,
      this.clock,
      this.logger
    );
  }

  /**
   * Latest snapshot for one symbol.
   *
   * Served from the bulk list when possible; otherwise a degraded snapshot
   * (zero prices and volume) built from instrument metadata.
   */
  async getCurrent(symbol: string): Promise<InstrumentSnapshot | null> {
    if (!isValidSymbol(symbol)) {
      this.logger.warn('Rejected invalid symbol', { symbol, operation: 'getCurrent' });
      return null;
    }

    const list = await this.instrumentList.get();
    const quote = list?.rows.get(symbol);
    if (list && quote) {
      return toSnapshot(quote, this.provider.currency, list.fetchedAt);
    }

    this.logger.debug('Symbol not in instrument list, using metadata', { symbol, list_available: list !== null });
    return this.degradedSnapshot(symbol);
  }

  /**
   * Snapshots for many symbols from one bulk call.
   *
   * Only when the bulk list cannot be obtained at all are symbols looked up
   * one by one, in chunks with bounded concurrency. Invalid and unresolved
   * symbols are omitted.
   */
  async batchGetCurrent(symbols: readonly string[]): Promise<Map<string, InstrumentSnapshot>> {
    const timer = startTimer();
    const results = new Map<string, InstrumentSnapshot>();
    const { valid, invalid } = partitionSymbols(symbols);

    if (invalid.length > 0) {
      this.logger.warn('Skipping invalid symbols', { operation: 'batchGetCurrent', symbols: invalid });
    }
    if (valid.length === 0) {
      return results;
    }

    const list = await this.instrumentList.get();
    if (list) {
      const missing: string[] = [];
      for (const symbol of valid) {
        const quote = list.rows.get(symbol);
        if (quote) {
          results.set(symbol, toSnapshot(quote, this.provider.currency, list.fetchedAt));
        } else {
          missing.push(symbol);
        }
      }
      this.logger.info('Batch snapshot from instrument list', {
        operation: 'batchGetCurrent',
        count: results.size,
        missing,
        duration_ms: timer.stop(),
      });
      return results;
    }

    this.logger.warn('Instrument list unavailable, falling back to per-symbol lookups', {
      operation: 'batchGetCurrent',
      count: valid.length,
    });

    const chunks = chunk(valid, this.batchSize);
    for (const [index, symbolsInChunk] of chunks.entries()) {
      const settled = await settleAll(this.fallbackLimiter, symbolsInChunk, (symbol) =>
        this.degradedSnapshot(symbol)
      );
      settled.forEach((outcome, i) => {
        const symbol = symbolsInChunk[i];
        if (outcome.status === 'fulfilled' && outcome.value !== null && symbol !== undefined) {
          results.set(symbol, outcome.value);
        }
      });
      if (index < chunks.length - 1 && this.chunkPauseMs > 0) {
        await this.clock.sleep(this.chunkPauseMs);
      }
    }

    this.logger.info('Batch snapshot from fallback lookups', {
      operation: 'batchGetCurrent',
      count: results.size,
      requested: valid.length,
      duration_ms: timer.stop(),
    });
    return results;
  }

  /**
   * Historical series for a named period ("60d", "4w", "6m", "1y"), cache first.
   */
  async getHistorical(symbol: string, period: string): Promise<HistoricalSeries | null> {
    if (!isValidSymbol(symbol)) {
      this.logger.warn('Rejected invalid symbol', { symbol, period, operation: 'getHistorical' });
      return null;
    }
    const range = periodRange(period, this.clock.now());
    if (range === null) {
      this.logger.warn('Rejected invalid period', { symbol, period, operation: 'getHistorical' });
      return null;
    }

    const cached = await this.cache?.get('historical', { symbol, period });
    if (cached) {
      this.logger.debug('Historical cache hit', { symbol, period, cache: 'hit' });
      return cached;
    }
    return this.fetchHistorical(symbol, period, range);
  }

  /**
   * Historical series for many symbols. Cached entries are reused and only
   * misses reach the provider, at most `maxConcurrency` at a time.
   */
  async batchGetHistorical(
    symbols: readonly string[],
    period: string,
    maxConcurrency: number = this.historicalConcurrency
  ): Promise<Map<string, HistoricalSeries>> {
    requirePositiveInteger('maxConcurrency', maxConcurrency);
    const timer = startTimer();
    const results = new Map<string, HistoricalSeries>();
    const { valid, invalid } = partitionSymbols(symbols);

    if (invalid.length > 0) {
      this.logger.warn('Skipping invalid symbols', { operation: 'batchGetHistorical', period, symbols: invalid });
    }
    const range = periodRange(period, this.clock.now());
    if (range === null) {
      this.logger.warn('Rejected invalid period', { period, operation: 'batchGetHistorical' });
      return results;
    }
    if (valid.length === 0) {
      return results;
    }

    const misses: string[] = [];
    for (const symbol of valid) {
      const cached = await this.cache?.get('historical', { symbol, period });
      if (cached) {
        results.set(symbol, cached);
      } else {
        misses.push(symbol);
      }
    }
    const cacheHits = results.size;

    const settled = await runWithConcurrency(misses, maxConcurrency, (symbol) =>
      this.fetchHistorical(symbol, period, range)
    );
    const failed: string[] = [];
    settled.forEach((outcome, i) => {
      const symbol = misses[i];
      if (symbol === undefined) {
        return;
      }
      if (outcome.status === 'fulfilled' && outcome.value !== null) {
        results.set(symbol, outcome.value);
      } else {
        failed.push(symbol);
      }
    });

    this.logger.info('Historical batch complete', {
      operation: 'batchGetHistorical',
      period,
      count: results.size,
      cache_hits: cacheHits,
      hit_ratio: Math.round((cacheHits / valid.length) * 1000) / 1000,
      fetched: results.size - cacheHits,
      failed,
      duration_ms: timer.stop(),
    });
    return results;
  }

  /**
   * Descriptive metadata, read through the `info` cache namespace.
   */
  async getInfo(symbol: string): Promise<InstrumentInfo | null> {
    if (!isValidSymbol(symbol)) {
      this.logger.warn('Rejected invalid symbol', { symbol, operation: 'getInfo' });
      return null;
    }

    const cached = await this.cache?.get('info', { symbol });
    if (cached) {
      return cached;
    }

    try {
      const info = await this.call(`getInstrumentInfo ${symbol}`, () => this.provider.getInstrumentInfo(symbol));
      if (info === null) {
        this.logger.info('Provider has no metadata for symbol', { symbol, operation: 'getInfo' });
        return null;
      }
      await this.cache?.put('info', { symbol }, info);
      return info;
    } catch (error) {
      this.logger.warn('Metadata lookup failed', { symbol, operation: 'getInfo', error: describeError(error) });
      return null;
    }
  }

  /**
   * Forces a bulk list refresh. On failure the previous copy stays in use.
   *
   * @returns Whether a new list was fetched
   */
  async refreshInstrumentList(): Promise<boolean> {
    const outcome = await this.instrumentList.refresh();
    return outcome.refreshed;
  }

  invalidateInstrumentList(): void {
    this.instrumentList.invalidate();
    this.logger.info('Instrument list invalidated');
  }

  getInstrumentListStatus(): InstrumentListStatus {
    return this.instrumentList.status();
  }

  getDataSummary(symbols: readonly string[]): DataSummary {
    const { valid, invalid } = partitionSymbols(symbols);
    return {
      provider: this.provider.id,
      totalSymbols: symbols.length,
      validSymbols: valid,
      invalidSymbols: invalid,
      instrumentList: this.instrumentList.status(),
    };
  }

  private async degradedSnapshot(symbol: string): Promise<InstrumentSnapshot | null> {
    const info = await this.getInfo(symbol);
    if (info === null) {
      return null;
    }
    return {
      symbol,
      name: info.name,
      lastPrice: 0,
      previousClose: 0,
      changePercent: 0,
      volume: 0,
      marketCap: info.marketCap ?? null,
      currency: info.currency,
      asOf: new Date(this.clock.now()).toISOString(),
    };
  }

  /**
   * Provider bars for a cache miss. Never throws.
   */
  private async fetchHistorical(symbol: string, period: string, range: DateRange): Promise<HistoricalSeries | null> {
    const timer = startTimer();
    try {
      const bars = await this.call(`getBars ${symbol} ${period}`, async () => {
        const fetched = await this.provider.getBars({
          symbol,
          start: range.start,
          end: range.end,
          interval: this.historicalInterval,
        });
        if (fetched.length === 0) {
          throw new EmptyResponseError(this.provider.id, 'getBars', { symbol });
        }
        return fetched;
      });

      const series = createSeries(symbol, period, bars);
      await this.cache?.put('historical', { symbol, period }, series);
      this.logger.info('Historical series fetched', {
        symbol,
        period,
        cache: 'miss',
        count: series.bars.length,
        duration_ms: timer.stop(),
      });
      return series;
    } catch (error) {
      this.logger.warn('Historical fetch failed', {
        symbol,
        period,
        operation: 'getHistorical',
        error: describeError(error),
      });
      return null;
    }
  }

  /**
   * Paced, retried provider call.
   */
  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.retry.execute(operation, () => this.limiter.schedule(fn));
  }
}
