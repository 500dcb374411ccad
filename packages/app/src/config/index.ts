/**
 * Configuration loading and management
 *
 * Sources, lowest precedence first: schema defaults, an optional JSON file
 * (`ETFPULSE_CONFIG` or an explicit path), environment variables.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, describeError } from '@etfpulse/contracts';
import type { FileCacheOptions } from '@etfpulse/file-cache';
import type { MarketDataFetcherOptions } from '@etfpulse/market-fetcher';
import { configSchema, envMapping, type Config, type EnvValueType } from './schema.js';

const HOUR_MS = 60 * 60 * 1000;

export interface LoadConfigOptions {
  /** Environment to read; defaults to process.env */
  env?: Record<string, string | undefined>;

  /** JSON file path; overrides ETFPULSE_CONFIG */
  configFile?: string;
}

/**
 * Load configuration from file, environment and defaults
 *
 * @throws {ConfigurationError} Listing every invalid path, or when the file cannot be read
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env['ETFPULSE_CONFIG'];
  const rawConfig: Record<string, unknown> = configFile ? readConfigFile(configFile) : {};

  for (const [envKey, { path, type }] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, path, parseEnvValue(value, type));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, { errors });
  }

  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${describeError(error)}`, { filePath });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`, { filePath });
  }
  return parsed;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to the mapped type
 *
 * Values that do not convert are passed through so validation reports them.
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'boolean':
      if (value === 'true') return true;
      if (value === 'false') return false;
      return value;
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '');
    case 'string':
      return value;
  }
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    provider: config.provider.type,
    cacheDir: config.cache.dir,
    reportsDir: config.reports.dir,
    watchlist: config.instruments.watchlist.length,
    prioritySymbols: config.instruments.prioritySymbols,
    historyPeriod: config.instruments.historyPeriod,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export function toCacheOptions(config: Config): Omit<FileCacheOptions, 'logger' | 'now'> {
  return {
    cacheDir: config.cache.dir,
    maxTotalBytes: config.cache.maxSizeMb * 1024 * 1024,
    targetRatio: config.cache.targetRatio,
    ttlMs: {
      current: config.cache.ttlHours.current * HOUR_MS,
      historical: config.cache.ttlHours.historical * HOUR_MS,
      info: config.cache.ttlHours.info * HOUR_MS,
    },
  };
}

export function toFetcherOptions(
  config: Config
): Omit<MarketDataFetcherOptions, 'provider' | 'cache' | 'logger' | 'clock'> {
  const { provider } = config;
  return {
    maxRetries: provider.maxRetries,
    retryBaseDelayMs: provider.retryBaseDelayMs,
    minRequestIntervalMs: provider.minRequestIntervalMs,
    batchSize: provider.batchSize,
    fallbackConcurrency: provider.fallbackConcurrency,
    chunkPauseMs: provider.chunkPauseMs,
    instrumentListTtlMs: provider.instrumentListTtlHours * HOUR_MS,
    historicalInterval: provider.historicalInterval,
    historicalConcurrency: provider.historicalConcurrency,
  };
}

// Re-export types
export type { Config } from './schema.js';
