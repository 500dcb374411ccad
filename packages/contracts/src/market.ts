/**
 * @fileoverview Market data types and provider contract.
 *
 * Pure data structures: snapshots, bars, series, descriptive metadata and
 * the capabilities a market-data provider must offer. No I/O here.
 *
 * @module @etfpulse/contracts/market
 */

/**
 * Current market state for one instrument.
 *
 * Immutable once constructed; superseded by the next fetch, never mutated.
 *
 * @example
 * ```typescript
 * const snapshot: InstrumentSnapshot = {
 *   symbol: '510300',
 *   name: 'CSI 300 ETF',
 *   lastPrice: 3.912,
 *   previousClose: 3.887,
 *   changePercent: 0.64,
 *   volume: 8_412_330,
 *   marketCap: null,
 *   currency: 'CNY',
 *   asOf: '2025-01-15T07:00:00.000Z'
 * };
 * ```
 */
export interface InstrumentSnapshot {
  readonly symbol: string;
  readonly name: string;
  readonly lastPrice: number;
  readonly previousClose: number;
  readonly changePercent: number;
  readonly volume: number;
  readonly marketCap: number | null;
  readonly currency: string;
  /** ISO 8601 observation time */
  readonly asOf: string;
}

/**
 * A single OHLCV bar.
 *
 * @invariant high >= low
 * @invariant volume >= 0
 * @invariant timestamp is valid ISO 8601 string
 */
export interface PriceBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  readonly timestamp: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Ordered bars for one symbol over a named period ("60d", "1y", ...).
 *
 * @invariant bars are strictly increasing by timestamp
 * @invariant start === bars[0].timestamp and end === bars[bars.length - 1].timestamp
 */
export interface HistoricalSeries {
  readonly symbol: string;
  readonly period: string;
  readonly bars: readonly PriceBar[];
  readonly start: string;
  readonly end: string;
}

/**
 * Static descriptive metadata for an instrument.
 */
export interface InstrumentInfo {
  readonly symbol: string;
  readonly name: string;
  readonly fullName?: string;
  readonly fundType?: string;
  readonly company?: string;
  readonly listingDate?: string;
  readonly marketCap?: number | null;
  readonly currency: string;
  /** ISO 8601 time the metadata was retrieved */
  readonly asOf: string;
}

/**
 * One row of the provider's bulk "all instruments" response.
 */
export interface InstrumentQuote {
  readonly symbol: string;
  readonly name: string;
  readonly lastPrice: number;
  readonly previousClose: number;
  readonly changePercent: number;
  readonly volume: number;
  readonly marketCap: number | null;
}

/**
 * Bar granularity requested from a provider.
 */
export type BarInterval = '1m' | '5m' | '15m' | '30m' | '60m' | '1d';

/**
 * Parameters for a per-symbol historical bar request.
 */
export interface BarsRequest {
  symbol: string;
  start: Date;
  end: Date;
  interval: BarInterval;
}

/**
 * Contract every market-data provider implements.
 *
 * Implementations may fail transiently (timeouts, empty payloads, schema
 * drift); callers are expected to wrap each call in a retry policy.
 */
export interface MarketDataProvider {
  /** Stable identifier used in logs and status output */
  readonly id: string;

  /** Currency reported for instruments from this provider */
  readonly currency: string;

  /** One bulk call returning current quotes for every tradeable instrument */
  listInstruments(): Promise<InstrumentQuote[]>;

  /** Dated OHLCV bars for one symbol over a date range, ascending */
  getBars(request: BarsRequest): Promise<PriceBar[]>;

  /** Descriptive metadata for one symbol, or null when the provider does not know it */
  getInstrumentInfo(symbol: string): Promise<InstrumentInfo | null>;
}
