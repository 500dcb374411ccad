/**
 * Trailing-mean analysis and the in-memory result store
 */

import { closeStdDev, meanClose } from '@etfpulse/contracts';
import type { HistoricalSeries, InstrumentSnapshot } from '@etfpulse/contracts';

export type Recommendation = 'buy' | 'sell' | 'hold';

export interface AnalysisResult {
  symbol: string;
  name: string;
  /** Snapshot price, or the last close when the snapshot carries none */
  price: number;
  mean: number;
  stdDev: number;
  /** null when the deviation is zero or undefined */
  zScore: number | null;
  recommendation: Recommendation;
  window: number;
  analyzedAt: string;
}

export interface Analyzer {
  analyze(snapshot: InstrumentSnapshot, series: HistoricalSeries): AnalysisResult;
}

export interface TrailingMeanAnalyzerOptions {
  /** Trailing bars considered (default 20) */
  window?: number;
  /** |z| at or beyond which buy/sell is emitted (default 1.5) */
  threshold?: number;
  now?: () => number;
}

/**
 * Labels an instrument by how far its price sits from the trailing mean of
 * closes, in standard deviations: buy at or below -threshold, sell at or
 * above +threshold, hold otherwise.
 */
export class TrailingMeanAnalyzer implements Analyzer {
  private readonly window: number;
  private readonly threshold: number;
  private readonly now: () => number;

  constructor(options: TrailingMeanAnalyzerOptions = {}) {
    this.window = options.window ?? 20;
    this.threshold = options.threshold ?? 1.5;
    this.now = options.now ?? Date.now;
  }

  analyze(snapshot: InstrumentSnapshot, series: HistoricalSeries): AnalysisResult {
    const mean = meanClose(series, this.window);
    const stdDev = closeStdDev(series, this.window);
    const lastClose = series.bars[series.bars.length - 1]?.close ?? 0;
    const price = snapshot.lastPrice > 0 ? snapshot.lastPrice : lastClose;

    const zScore = Number.isFinite(stdDev) && stdDev > 0 ? (price - mean) / stdDev : null;
    let recommendation: Recommendation = 'hold';
    if (zScore !== null && zScore <= -this.threshold) {
      recommendation = 'buy';
    } else if (zScore !== null && zScore >= this.threshold) {
      recommendation = 'sell';
    }

    return {
      symbol: snapshot.symbol,
      name: snapshot.name,
      price,
      mean,
      stdDev,
      zScore,
      recommendation,
      window: Math.min(this.window, series.bars.length),
      analyzedAt: new Date(this.now()).toISOString(),
    };
  }
}

/**
 * Latest analysis result per symbol.
 */
export class AnalysisStore {
  private readonly results = new Map<string, AnalysisResult>();

  set(result: AnalysisResult): void {
    this.results.set(result.symbol, result);
  }

  get(symbol: string): AnalysisResult | undefined {
    return this.results.get(symbol);
  }

  /** All results ordered by symbol */
  all(): AnalysisResult[] {
    return [...this.results.values()].sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  get size(): number {
    return this.results.size;
  }

  clear(): void {
    this.results.clear();
  }
}
