/**
 * Shared fakes for app tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createSeries } from '@etfpulse/contracts';
import type {
  BarsRequest,
  Clock,
  HistoricalSeries,
  InstrumentInfo,
  InstrumentQuote,
  InstrumentSnapshot,
  MarketDataProvider,
  PriceBar,
} from '@etfpulse/contracts';
import type { ScheduledTask, TaskKind } from '@etfpulse/scheduler';

export const T0 = Date.parse('2025-03-03T02:00:00.000Z');

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

/**
 * Clock whose sleeps return at once and move time forward
 */
export class FakeClock implements Clock {
  constructor(public time: number = T0) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.time += ms;
  }
}

/**
 * Clock that never advances; sleeps end only when their signal aborts
 */
export class StillClock implements Clock {
  constructor(public time: number = T0) {}

  now(): number {
    return this.time;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      signal?.addEventListener('abort', () => resolve(), { once: true });
    });
  }
}

export function quote(symbol: string, lastPrice: number): InstrumentQuote {
  return {
    symbol,
    name: `Fund ${symbol}`,
    lastPrice,
    previousClose: lastPrice,
    changePercent: 0,
    volume: 100,
    marketCap: null,
  };
}

export function bar(timestamp: string, close: number): PriceBar {
  return { timestamp, open: close, high: close, low: close, close, volume: 10 };
}

export function snapshot(symbol: string, lastPrice: number, overrides: Partial<InstrumentSnapshot> = {}): InstrumentSnapshot {
  return {
    symbol,
    name: `Fund ${symbol}`,
    lastPrice,
    previousClose: lastPrice,
    changePercent: 0,
    volume: 100,
    marketCap: null,
    currency: 'CNY',
    asOf: new Date(T0).toISOString(),
    ...overrides,
  };
}

/**
 * Daily series with one bar per close, starting 2025-02-01.
 */
export function seriesOf(symbol: string, closes: readonly number[]): HistoricalSeries {
  const start = Date.parse('2025-02-01T07:00:00.000Z');
  const bars = closes.map((close, i) => bar(new Date(start + i * 86_400_000).toISOString(), close));
  return createSeries(symbol, '60d', bars);
}

/**
 * Provider double with swappable behaviour and recorded calls
 */
export class FakeProvider implements MarketDataProvider {
  readonly id = 'fake';
  readonly currency = 'CNY';

  listCalls = 0;
  readonly barRequests: BarsRequest[] = [];
  readonly infoRequests: string[] = [];

  listImpl: () => Promise<InstrumentQuote[]> = async () => [quote('510300', 3.9), quote('159915', 2.1)];

  barsImpl: (request: BarsRequest) => Promise<PriceBar[]> = async () => [
    bar('2025-02-28T01:40:00.000Z', 2),
    bar('2025-02-28T01:35:00.000Z', 1),
  ];

  infoImpl: (symbol: string) => Promise<InstrumentInfo | null> = async (symbol) => ({
    symbol,
    name: `Info ${symbol}`,
    fundType: 'ETF',
    marketCap: 5e9,
    currency: 'CNY',
    asOf: '2025-03-01T00:00:00.000Z',
  });

  async listInstruments(): Promise<InstrumentQuote[]> {
    this.listCalls++;
    return this.listImpl();
  }

  async getBars(request: BarsRequest): Promise<PriceBar[]> {
    this.barRequests.push(request);
    return this.barsImpl(request);
  }

  async getInstrumentInfo(symbol: string): Promise<InstrumentInfo | null> {
    this.infoRequests.push(symbol);
    return this.infoImpl(symbol);
  }
}

export function scheduledTask(id: string, kind: TaskKind): ScheduledTask {
  return {
    id,
    name: id,
    description: '',
    kind,
    scheduledAt: T0,
    nextDue: T0,
    intervalMs: 0,
    runCount: 0,
    maxRuns: null,
    state: 'running',
    lastRunAt: T0,
    lastError: null,
    createdAt: T0,
    updatedAt: T0,
  };
}

/**
 * Fresh temporary directory plus its cleanup.
 */
export async function tempDir(): Promise<{ dir: string; remove: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), 'etfpulse-app-'));
  return { dir, remove: () => rm(dir, { recursive: true, force: true }) };
}
