/**
 * @fileoverview In-memory snapshot of the provider's bulk instrument list.
 *
 * @module @etfpulse/market-fetcher/instrument-list
 */

import { describeError } from '@etfpulse/contracts';
import type { Clock, InstrumentQuote } from '@etfpulse/contracts';
import type { Logger } from '@etfpulse/logger';
import type { InstrumentListStatus } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Rows and the time they were fetched, replaced as one value.
 */
export interface InstrumentListSnapshot {
  readonly rows: ReadonlyMap<string, InstrumentQuote>;
  readonly fetchedAt: number;
}

export interface RefreshOutcome {
  /** Freshly fetched, or the previous copy when the fetch failed */
  snapshot: InstrumentListSnapshot | null;
  refreshed: boolean;
}

/**
 * Bulk list holder with a TTL, stale fallback and single-flight refresh.
 *
 * `load` is expected to carry its own retries; one failed `load` marks the
 * refresh as failed.
 */
export class InstrumentListCache {
  private snapshot: InstrumentListSnapshot | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;

  constructor(
    private readonly load: () => Promise<InstrumentQuote[]>,
    private readonly ttlMs: number,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {}

  isFresh(): boolean {
    return this.snapshot !== null && this.clock.now() - this.snapshot.fetchedAt < this.ttlMs;
  }

  /**
   * Current snapshot, refreshing first when missing or expired.
   */
  async get(): Promise<InstrumentListSnapshot | null> {
    if (this.snapshot !== null && this.isFresh()) {
      return this.snapshot;
    }
    const outcome = await this.refresh();
    return outcome.snapshot;
  }

  /**
   * Fetches a new list. Concurrent callers share one request.
   */
  refresh(): Promise<RefreshOutcome> {
    if (this.inFlight === null) {
      this.inFlight = this.fetchList().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  invalidate(): void {
    this.snapshot = null;
  }

  status(): InstrumentListStatus {
    const snapshot = this.snapshot;
    if (snapshot === null) {
      return {
        cached: false,
        fetchedAt: null,
        size: 0,
        expired: true,
        ageHours: null,
        ttlHours: this.ttlMs / HOUR_MS,
      };
    }
    const ageMs = this.clock.now() - snapshot.fetchedAt;
    return {
      cached: true,
      fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
      size: snapshot.rows.size,
      expired: ageMs >= this.ttlMs,
      ageHours: Math.round((ageMs / HOUR_MS) * 100) / 100,
      ttlHours: this.ttlMs / HOUR_MS,
    };
  }

  private async fetchList(): Promise<RefreshOutcome> {
    try {
      const quotes = await this.load();
      const rows = new Map<string, InstrumentQuote>();
      for (const quote of quotes) {
        rows.set(quote.symbol, quote);
      }
      this.snapshot = { rows, fetchedAt: this.clock.now() };
      this.logger.info('Instrument list refreshed', { count: rows.size });
      return { snapshot: this.snapshot, refreshed: true };
    } catch (error) {
      if (this.snapshot !== null) {
        this.logger.warn('Instrument list refresh failed, using stale copy', {
          error: describeError(error),
          fetched_at: new Date(this.snapshot.fetchedAt).toISOString(),
        });
      } else {
        this.logger.error('Instrument list unavailable', { error: describeError(error) });
      }
      return { snapshot: this.snapshot, refreshed: false };
    }
  }
}
