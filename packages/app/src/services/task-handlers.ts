/**
 * Scheduled task handlers: data update, analysis, report and cache cleanup
 */

import type { FileCache } from '@etfpulse/file-cache';
import { startTimer } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';
import type { MarketDataFetcher } from '@etfpulse/market-fetcher';
import type { TaskHandlers } from '@etfpulse/scheduler';
import type { AnalysisStore, Analyzer } from './analysis.js';
import type { ReportWriter } from './report-writer.js';

export interface TaskHandlerDeps {
  fetcher: MarketDataFetcher;
  cache: FileCache;
  analyzer: Analyzer;
  store: AnalysisStore;
  reports: ReportWriter;
  watchlist: readonly string[];
  historyPeriod: string;
  logger: Logger;
}

/**
 * Binds the scheduler's built-in task kinds to the fetcher, cache and
 * analysis collaborators.
 *
 * A handler throws only when its whole run produced nothing, so the task is
 * recorded as failed; partial results are logged and kept.
 */
export function createTaskHandlers(deps: TaskHandlerDeps): TaskHandlers {
  const { fetcher, cache, analyzer, store, reports, historyPeriod } = deps;
  const logger = deps.logger.child({ component: 'tasks' });

  return {
    async dataUpdate(kind) {
      const timer = startTimer();
      const symbols = kind.symbols ?? deps.watchlist;

      const snapshots = await fetcher.batchGetCurrent(symbols);
      let persisted = 0;
      for (const [symbol, snapshot] of snapshots) {
        if (await cache.put('current', { symbol }, snapshot)) {
          persisted++;
        }
      }
      const series = await fetcher.batchGetHistorical(symbols, historyPeriod);

      logger.info('Data update complete', {
        operation: 'dataUpdate',
        period: historyPeriod,
        count: symbols.length,
        snapshots: snapshots.size,
        persisted,
        series: series.size,
        duration_ms: timer.stop(),
      });

      if (symbols.length > 0 && snapshots.size === 0 && series.size === 0) {
        throw new Error(`No data fetched for ${symbols.length} symbol(s)`);
      }
    },

    async analysis() {
      const timer = startTimer();
      const skipped: string[] = [];

      for (const symbol of deps.watchlist) {
        const snapshot = (await cache.get('current', { symbol })) ?? (await fetcher.getCurrent(symbol));
        const series = await fetcher.getHistorical(symbol, historyPeriod);
        if (snapshot === null || series === null) {
          skipped.push(symbol);
          continue;
        }
        store.set(analyzer.analyze(snapshot, series));
      }

      logger.info('Analysis complete', {
        operation: 'analysis',
        count: deps.watchlist.length - skipped.length,
        skipped,
        duration_ms: timer.stop(),
      });

      if (deps.watchlist.length > 0 && skipped.length === deps.watchlist.length) {
        throw new Error('No instrument could be analyzed');
      }
    },

    async report() {
      const results = store.all();
      if (results.length === 0) {
        logger.warn('Writing report without analysis results', { operation: 'report' });
      }
      await reports.write(results);
    },

    async cleanup(kind) {
      const { expired, budget } = await cache.cleanup(kind.force ?? false);
      logger.info('Cache cleanup complete', {
        operation: 'cleanup',
        expired,
        evicted: budget.deleted,
        freed_bytes: budget.freedBytes,
        total_bytes: budget.totalBytes,
      });
    },
  };
}
