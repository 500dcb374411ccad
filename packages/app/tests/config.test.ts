/**
 * Tests for configuration loading
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '@etfpulse/contracts';
import { getConfigSummary, loadConfig, toCacheOptions, toFetcherOptions } from '../src/config/index.js';
import { tempDir } from './helpers.js';

describe('loadConfig', () => {
  let dir: string;
  let remove: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, remove } = await tempDir());
  });

  afterEach(async () => {
    await remove();
  });

  it('should apply defaults with an empty environment', () => {
    const config = loadConfig({ env: {} });

    expect(config.app.env).toBe('development');
    expect(config.provider.type).toBe('eastmoney');
    expect(config.provider.maxRetries).toBe(3);
    expect(config.cache.dir).toBe('./data/cache');
    expect(config.cache.ttlHours).toEqual({ current: 24, historical: 24, info: 168 });
    expect(config.instruments.watchlist).toEqual(['510300', '510500', '159915', '512880', '588000']);
    expect(config.instruments.historyPeriod).toBe('60d');
    expect(config.scheduler.tasks).toEqual({ dataUpdate: true, analysis: true, report: true, cleanup: true });
  });

  it('should map environment variables onto nested paths', () => {
    const config = loadConfig({
      env: {
        LOG_LEVEL: 'debug',
        CACHE_MAX_SIZE_MB: '50',
        PROVIDER_MAX_RETRIES: '5',
        WATCHLIST: 'sh510300, 159915.SZ,,',
        HISTORY_PERIOD: '4w',
        REPORTS_DIR: '   ',
      },
    });

    expect(config.logging.level).toBe('debug');
    expect(config.cache.maxSizeMb).toBe(50);
    expect(config.provider.maxRetries).toBe(5);
    expect(config.instruments.watchlist).toEqual(['510300', '159915']);
    expect(config.instruments.historyPeriod).toBe('4w');
    expect(config.reports.dir).toBe('./data/reports');
  });

  it('should report every invalid path at once', () => {
    const load = () =>
      loadConfig({ env: { HISTORY_PERIOD: '60x', WATCHLIST: '510300,abc', PROVIDER_MAX_RETRIES: 'many' } });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow('provider.maxRetries: Expected number, received string');
    expect(load).toThrow('instruments.watchlist.1: Invalid symbol "abc"');
    expect(load).toThrow('instruments.historyPeriod: Expected a period such as 60d, 4w, 6m or 1y');
  });

  it('should layer environment over the config file', async () => {
    const file = path.join(dir, 'etfpulse.json');
    await writeFile(
      file,
      JSON.stringify({ cache: { dir: '/var/cache/etf', maxSizeMb: 20 }, instruments: { watchlist: ['588000'] } })
    );

    const config = loadConfig({ env: { ETFPULSE_CONFIG: file, CACHE_MAX_SIZE_MB: '30' } });

    expect(config.cache.dir).toBe('/var/cache/etf');
    expect(config.cache.maxSizeMb).toBe(30);
    expect(config.instruments.watchlist).toEqual(['588000']);
  });

  it('should prefer an explicit file over ETFPULSE_CONFIG', async () => {
    const file = path.join(dir, 'explicit.json');
    await writeFile(file, JSON.stringify({ reports: { dir: '/tmp/reports' } }));

    const config = loadConfig({ env: { ETFPULSE_CONFIG: path.join(dir, 'missing.json') }, configFile: file });

    expect(config.reports.dir).toBe('/tmp/reports');
  });

  it('should reject unreadable and non-object files', async () => {
    const missing = path.join(dir, 'missing.json');
    const array = path.join(dir, 'array.json');
    await writeFile(array, '[1, 2]');

    expect(() => loadConfig({ env: {}, configFile: missing })).toThrow(`Cannot read config file ${missing}`);
    expect(() => loadConfig({ env: {}, configFile: array })).toThrow(`Config file ${array} must contain a JSON object`);
  });
});

describe('derived options', () => {
  it('should convert cache sizes and hours to bytes and milliseconds', () => {
    const config = loadConfig({ env: { CACHE_DIR: '/data/cache' } });

    expect(toCacheOptions(config)).toEqual({
      cacheDir: '/data/cache',
      maxTotalBytes: 104_857_600,
      targetRatio: 0.8,
      ttlMs: { current: 86_400_000, historical: 86_400_000, info: 604_800_000 },
    });
  });

  it('should convert fetcher settings', () => {
    const config = loadConfig({ env: { PROVIDER_MIN_INTERVAL_MS: '250' } });

    expect(toFetcherOptions(config)).toEqual({
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      minRequestIntervalMs: 250,
      batchSize: 10,
      fallbackConcurrency: 3,
      chunkPauseMs: 1000,
      instrumentListTtlMs: 21_600_000,
      historicalInterval: '5m',
      historicalConcurrency: 3,
    });
  });

  it('should summarize without nested detail', () => {
    const config = loadConfig({ env: { PRIORITY_SYMBOLS: '510300' } });

    expect(getConfigSummary(config)).toEqual({
      environment: 'development',
      provider: 'eastmoney',
      cacheDir: './data/cache',
      reportsDir: './data/reports',
      watchlist: 5,
      prioritySymbols: ['510300'],
      historyPeriod: '60d',
      logging: { level: 'info', format: 'pretty', file: null },
    });
  });
});
