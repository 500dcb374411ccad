/**
 * Composition root: builds every service from validated configuration
 */

import { systemClock } from '@etfpulse/contracts';
import type { Clock, MarketDataProvider } from '@etfpulse/contracts';
import { FileCache } from '@etfpulse/file-cache';
import type { Logger } from '@etfpulse/logger';
import { MarketDataFetcher } from '@etfpulse/market-fetcher';
import { EastmoneyProvider } from '@etfpulse/provider-eastmoney';
import {
  TaskScheduler,
  createDefaultTasks,
  createSymbolRefreshTask,
  nextWeekdayAt,
} from '@etfpulse/scheduler';
import type { ScheduledTask } from '@etfpulse/scheduler';
import { toCacheOptions, toFetcherOptions, type Config } from '../config/index.js';
import { AnalysisStore, TrailingMeanAnalyzer } from '../services/analysis.js';
import { ReportWriter } from '../services/report-writer.js';
import { getOptimizationStatus, type OptimizationStatus } from '../services/status.js';
import { createTaskHandlers } from '../services/task-handlers.js';

/** Exchange wall clock, UTC+8 */
const EXCHANGE_UTC_OFFSET_MINUTES = 480;

export interface RuntimeOverrides {
  /** Replaces the configured provider (tests use an in-process fake) */
  provider?: MarketDataProvider;
  clock?: Clock;
}

export interface Runtime {
  readonly config: Config;
  readonly logger: Logger;
  readonly provider: MarketDataProvider;
  readonly cache: FileCache;
  readonly fetcher: MarketDataFetcher;
  readonly scheduler: TaskScheduler;
  readonly store: AnalysisStore;
  readonly reports: ReportWriter;

  /** Registers the default task set plus one refresh task per priority symbol */
  registerDefaultTasks(): ScheduledTask[];

  status(): Promise<OptimizationStatus>;

  /** Stops the scheduler; false if an iteration outlived the stop timeout */
  shutdown(): Promise<boolean>;
}

function createProvider(config: Config, logger: Logger): MarketDataProvider {
  switch (config.provider.type) {
    case 'eastmoney':
      return new EastmoneyProvider({ timeoutMs: config.provider.timeoutMs, logger });
  }
}

/**
 * Wire all services together
 *
 * @throws {ConfigurationError} If the cache directory is unusable or options are invalid
 */
export async function createRuntime(
  config: Config,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const clock = overrides.clock ?? systemClock;
  const now = (): number => clock.now();

  const provider = overrides.provider ?? createProvider(config, logger);
  const cache = await FileCache.open({ ...toCacheOptions(config), logger, now });
  const fetcher = new MarketDataFetcher({ ...toFetcherOptions(config), provider, cache, logger, clock });
  const store = new AnalysisStore();
  const reports = new ReportWriter({ dir: config.reports.dir, logger, now });
  const analyzer = new TrailingMeanAnalyzer({
    window: config.analysis.window,
    threshold: config.analysis.threshold,
    now,
  });

  const scheduler = new TaskScheduler({
    handlers: createTaskHandlers({
      fetcher,
      cache,
      analyzer,
      store,
      reports,
      watchlist: config.instruments.watchlist,
      historyPeriod: config.instruments.historyPeriod,
      logger,
    }),
    logger,
    clock,
    pollIntervalMs: config.scheduler.pollIntervalSeconds * 1000,
    stopTimeoutMs: config.scheduler.stopTimeoutSeconds * 1000,
  });

  return {
    config,
    logger,
    provider,
    cache,
    fetcher,
    scheduler,
    store,
    reports,

    registerDefaultTasks() {
      const start = clock.now();
      const { tasks, reportWeekday, reportTime, priorityIntervalMinutes } = config.scheduler;

      let reportFirstRunAt: number | undefined;
      if (reportWeekday !== undefined) {
        const [hour = 0, minute = 0] = reportTime.split(':').map(Number);
        reportFirstRunAt = nextWeekdayAt(start, reportWeekday, hour, minute, EXCHANGE_UTC_OFFSET_MINUTES);
      }

      const definitions = [
        ...createDefaultTasks({
          now: start,
          refreshInstrumentList: () => fetcher.refreshInstrumentList(),
          enabled: tasks,
          reportFirstRunAt,
        }),
        ...config.instruments.prioritySymbols.map((symbol) =>
          createSymbolRefreshTask(symbol, start, priorityIntervalMinutes * 60 * 1000)
        ),
      ];
      return definitions.map((definition) => scheduler.register(definition));
    },

    status() {
      return getOptimizationStatus({
        fetcher,
        cache,
        scheduler,
        watchlist: config.instruments.watchlist,
        now,
      });
    },

    shutdown() {
      return scheduler.stop();
    },
  };
}
