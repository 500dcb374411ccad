/**
 * Shared fakes for market-fetcher tests.
 */

import type {
  BarsRequest,
  Clock,
  InstrumentInfo,
  InstrumentQuote,
  MarketDataProvider,
  PriceBar,
} from '@etfpulse/contracts';

/**
 * Clock whose sleeps return at once and move time forward.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public time: number) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

export function quote(symbol: string, lastPrice = 1): InstrumentQuote {
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

/**
 * Provider double with swappable behaviour and recorded calls.
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

  get totalCalls(): number {
    return this.listCalls + this.barRequests.length + this.infoRequests.length;
  }
}
