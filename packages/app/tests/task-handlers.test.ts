/**
 * Tests for scheduled task handlers over a real file cache
 */

import { readFile, readdir, utimes } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCache } from '@etfpulse/file-cache';
import { createNullLogger } from '@etfpulse/logger';
import { MarketDataFetcher } from '@etfpulse/market-fetcher';
import { AnalysisStore, TrailingMeanAnalyzer } from '../src/services/analysis.js';
import { ReportWriter } from '../src/services/report-writer.js';
import { createTaskHandlers } from '../src/services/task-handlers.js';
import { FakeClock, FakeProvider, T0, scheduledTask, tempDir } from './helpers.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('createTaskHandlers', () => {
  let dir: string;
  let remove: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, remove } = await tempDir());
  });

  afterEach(async () => {
    await remove();
  });

  async function setup() {
    const clock = new FakeClock();
    const now = () => clock.now();
    const provider = new FakeProvider();
    const cache = await FileCache.open({ cacheDir: path.join(dir, 'cache'), now });
    const fetcher = new MarketDataFetcher({ provider, cache, clock, minRequestIntervalMs: 0 });
    const store = new AnalysisStore();
    const reportsDir = path.join(dir, 'reports');
    const handlers = createTaskHandlers({
      fetcher,
      cache,
      analyzer: new TrailingMeanAnalyzer({ now }),
      store,
      reports: new ReportWriter({ dir: reportsDir, now }),
      watchlist: ['510300', '159915'],
      historyPeriod: '60d',
      logger: createNullLogger(),
    });
    return { clock, provider, cache, store, reportsDir, handlers };
  }

  describe('dataUpdate', () => {
    it('should persist snapshots and series for the watchlist', async () => {
      const { provider, cache, handlers } = await setup();

      await handlers.dataUpdate({ type: 'data-update' }, scheduledTask('daily-data-update', { type: 'data-update' }));

      expect(provider.listCalls).toBe(1);
      expect(provider.barRequests.map((r) => r.symbol)).toEqual(['510300', '159915']);
      expect((await cache.get('current', { symbol: '510300' }))?.lastPrice).toBe(3.9);
      expect((await cache.get('historical', { symbol: '159915', period: '60d' }))?.bars.map((b) => b.close)).toEqual([1, 2]);
    });

    it('should restrict the sweep to the task symbols', async () => {
      const { provider, handlers } = await setup();
      const kind = { type: 'data-update', symbols: ['159915'] } as const;

      await handlers.dataUpdate(kind, scheduledTask('symbol-refresh-159915', kind));

      expect(provider.barRequests.map((r) => r.symbol)).toEqual(['159915']);
    });

    it('should fail when nothing at all could be fetched', async () => {
      const { provider, handlers } = await setup();
      provider.listImpl = async () => {
        throw new Error('list down');
      };
      provider.barsImpl = async () => {
        throw new Error('bars down');
      };
      provider.infoImpl = async () => {
        throw new Error('info down');
      };

      await expect(
        handlers.dataUpdate({ type: 'data-update' }, scheduledTask('daily-data-update', { type: 'data-update' }))
      ).rejects.toThrow('No data fetched for 2 symbol(s)');
    });
  });

  describe('analysis', () => {
    it('should analyze every watched symbol from cached data', async () => {
      const { provider, store, handlers } = await setup();
      await handlers.dataUpdate({ type: 'data-update' }, scheduledTask('daily-data-update', { type: 'data-update' }));

      await handlers.analysis(scheduledTask('daily-analysis', { type: 'analysis' }));

      // series closes 1 and 2: mean 1.5, std sqrt(0.5)
      expect(store.size).toBe(2);
      expect(store.get('510300')).toMatchObject({ price: 3.9, mean: 1.5, recommendation: 'sell' });
      expect(store.get('159915')).toMatchObject({ price: 2.1, recommendation: 'hold' });
      expect(provider.listCalls).toBe(1);
      expect(provider.barRequests).toHaveLength(2);
    });

    it('should fail when no symbol has data', async () => {
      const { provider, store, handlers } = await setup();
      provider.barsImpl = async () => [];

      await expect(handlers.analysis(scheduledTask('daily-analysis', { type: 'analysis' }))).rejects.toThrow(
        'No instrument could be analyzed'
      );
      expect(store.size).toBe(0);
    });
  });

  describe('report', () => {
    it('should write the stored results', async () => {
      const { reportsDir, handlers } = await setup();
      await handlers.dataUpdate({ type: 'data-update' }, scheduledTask('daily-data-update', { type: 'data-update' }));
      await handlers.analysis(scheduledTask('daily-analysis', { type: 'analysis' }));

      await handlers.report(scheduledTask('weekly-report', { type: 'report' }));

      expect(await readdir(reportsDir)).toEqual(['report-20250303-020000.json']);
      const report: unknown = JSON.parse(await readFile(path.join(reportsDir, 'report-20250303-020000.json'), 'utf-8'));
      expect(report).toMatchObject({ total: 2, counts: { buy: 0, sell: 1, hold: 1 } });
    });
  });

  describe('cleanup', () => {
    it('should drop expired entries only', async () => {
      const { cache, handlers } = await setup();
      await handlers.dataUpdate({ type: 'data-update' }, scheduledTask('daily-data-update', { type: 'data-update' }));
      const stale = cache.entryPath('current', { symbol: '510300' });
      if (stale === null) {
        throw new Error('expected an entry path');
      }
      const twoDaysAgo = new Date(T0 - 2 * DAY_MS);
      await utimes(stale, twoDaysAgo, twoDaysAgo);

      await handlers.cleanup({ type: 'cleanup' }, scheduledTask('daily-cleanup', { type: 'cleanup' }));

      expect(await cache.get('current', { symbol: '510300' })).toBeNull();
      expect(await cache.get('current', { symbol: '159915' })).not.toBeNull();
    });
  });
});
