/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { parsePeriod } from '@etfpulse/market-fetcher';
import { stripDecoration } from '@etfpulse/symbol-registry';

/**
 * Accepts "510300", "sh510300" or "510300.SH" and yields the bare code.
 */
const symbolSchema = z.string().transform((value, ctx) => {
  const symbol = stripDecoration(value);
  if (symbol === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid symbol "${value}"` });
    return z.NEVER;
  }
  return symbol;
});

const periodSchema = z.string().refine((value) => parsePeriod(value) !== null, {
  message: 'Expected a period such as 60d, 4w, 6m or 1y',
});

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'staging', 'production']).default('development'),
      name: z.string().default('ETF Pulse'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['eastmoney']).default('eastmoney'),
      timeoutMs: z.number().int().positive().default(10000),
      maxRetries: z.number().int().positive().default(3),
      retryBaseDelayMs: z.number().nonnegative().default(1000),
      minRequestIntervalMs: z.number().nonnegative().default(100),
      batchSize: z.number().int().positive().default(10),
      fallbackConcurrency: z.number().int().positive().default(3),
      chunkPauseMs: z.number().nonnegative().default(1000),
      historicalConcurrency: z.number().int().positive().default(3),
      instrumentListTtlHours: z.number().positive().default(6),
      historicalInterval: z.enum(['1m', '5m', '15m', '30m', '60m', '1d']).default('5m'),
    })
    .default({}),

  cache: z
    .object({
      dir: z.string().min(1).default('./data/cache'),
      maxSizeMb: z.number().positive().default(100),
      targetRatio: z.number().gt(0).max(1).default(0.8),
      ttlHours: z
        .object({
          current: z.number().positive().default(24),
          historical: z.number().positive().default(24),
          info: z.number().positive().default(168),
        })
        .default({}),
    })
    .default({}),

  scheduler: z
    .object({
      pollIntervalSeconds: z.number().positive().default(30),
      stopTimeoutSeconds: z.number().nonnegative().default(5),
      tasks: z
        .object({
          dataUpdate: z.boolean().default(true),
          analysis: z.boolean().default(true),
          report: z.boolean().default(true),
          cleanup: z.boolean().default(true),
        })
        .default({}),
      priorityIntervalMinutes: z.number().positive().default(30),
      /** Anchor the weekly report to a weekday (0 = Sunday) at reportTime, exchange time */
      reportWeekday: z.number().int().min(0).max(6).optional(),
      reportTime: z
        .string()
        .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM')
        .default('16:00'),
    })
    .default({}),

  instruments: z
    .object({
      watchlist: z.array(symbolSchema).default(['510300', '510500', '159915', '512880', '588000']),
      prioritySymbols: z.array(symbolSchema).default([]),
      historyPeriod: periodSchema.default('60d'),
    })
    .default({}),

  analysis: z
    .object({
      window: z.number().int().min(2).default(20),
      threshold: z.number().positive().default(1.5),
    })
    .default({}),

  reports: z
    .object({
      dir: z.string().min(1).default('./data/reports'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

export type EnvValueType = 'string' | 'number' | 'boolean' | 'list';

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, { path: string; type: EnvValueType }> = {
  NODE_ENV: { path: 'app.env', type: 'string' },
  LOG_LEVEL: { path: 'logging.level', type: 'string' },
  LOG_FORMAT: { path: 'logging.format', type: 'string' },
  LOG_FILE: { path: 'logging.filePath', type: 'string' },
  PROVIDER_TIMEOUT_MS: { path: 'provider.timeoutMs', type: 'number' },
  PROVIDER_MAX_RETRIES: { path: 'provider.maxRetries', type: 'number' },
  PROVIDER_MIN_INTERVAL_MS: { path: 'provider.minRequestIntervalMs', type: 'number' },
  CACHE_DIR: { path: 'cache.dir', type: 'string' },
  CACHE_MAX_SIZE_MB: { path: 'cache.maxSizeMb', type: 'number' },
  SCHEDULER_POLL_SECONDS: { path: 'scheduler.pollIntervalSeconds', type: 'number' },
  WATCHLIST: { path: 'instruments.watchlist', type: 'list' },
  PRIORITY_SYMBOLS: { path: 'instruments.prioritySymbols', type: 'list' },
  HISTORY_PERIOD: { path: 'instruments.historyPeriod', type: 'string' },
  ANALYSIS_THRESHOLD: { path: 'analysis.threshold', type: 'number' },
  REPORTS_DIR: { path: 'reports.dir', type: 'string' },
};
