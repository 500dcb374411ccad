/**
 * @fileoverview Construction and derived views for historical series.
 *
 * @module @etfpulse/contracts/series
 */

import type { HistoricalSeries, PriceBar } from './market.js';

/**
 * Builds a series from bars in any order.
 *
 * Bars are sorted by timestamp; when two bars share a timestamp the one
 * appearing later in the input wins. Bars with an unparseable timestamp are
 * dropped.
 *
 * @throws {Error} If no usable bars remain
 *
 * @example
 * ```typescript
 * const series = createSeries('510300', '60d', bars);
 * series.start; // first bar timestamp
 * ```
 */
export function createSeries(symbol: string, period: string, bars: readonly PriceBar[]): HistoricalSeries {
  const byTime = new Map<number, PriceBar>();

  for (const bar of bars) {
    const time = Date.parse(bar.timestamp);
    if (Number.isNaN(time)) {
      continue;
    }
    byTime.set(time, bar);
  }

  const ordered = [...byTime.entries()].sort((a, b) => a[0] - b[0]).map(([, bar]) => bar);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];

  if (!first || !last) {
    throw new Error(`Cannot build series for ${symbol} (${period}): no bars`);
  }

  return {
    symbol,
    period,
    bars: ordered,
    start: first.timestamp,
    end: last.timestamp,
  };
}

function trailingCloses(series: HistoricalSeries, count?: number): number[] {
  const closes = series.bars.map((bar) => bar.close);
  if (count !== undefined && count > 0 && closes.length > count) {
    return closes.slice(-count);
  }
  return closes;
}

/**
 * Mean close over the trailing `count` bars (all bars when omitted or when
 * the series is shorter). Returns NaN for an empty series.
 */
export function meanClose(series: HistoricalSeries, count?: number): number {
  const closes = trailingCloses(series, count);
  if (closes.length === 0) {
    return Number.NaN;
  }
  return closes.reduce((sum, value) => sum + value, 0) / closes.length;
}

/**
 * Sample standard deviation (n - 1) of closes over the trailing `count` bars.
 * Returns NaN with fewer than two bars.
 */
export function closeStdDev(series: HistoricalSeries, count?: number): number {
  const closes = trailingCloses(series, count);
  if (closes.length < 2) {
    return Number.NaN;
  }
  const mean = closes.reduce((sum, value) => sum + value, 0) / closes.length;
  const squared = closes.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return Math.sqrt(squared / (closes.length - 1));
}
