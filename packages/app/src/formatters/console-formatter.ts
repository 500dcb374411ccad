/**
 * Terminal output for CLI commands
 * Text output is colorized with chalk; json output is plain
 */

import chalk from 'chalk';
import { closeStdDev, meanClose } from '@etfpulse/contracts';
import type { HistoricalSeries, InstrumentSnapshot } from '@etfpulse/contracts';
import type { CacheStats, CleanupResult } from '@etfpulse/file-cache';
import { NAMESPACES } from '@etfpulse/file-cache';
import { TASK_STATES } from '@etfpulse/scheduler';
import type { OptimizationStatus } from '../services/status.js';

export type OutputFormat = 'text' | 'json';

const HOUR_MS = 60 * 60 * 1000;

export function formatBytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

function formatChange(changePercent: number): string {
  const text = `${changePercent > 0 ? '+' : ''}${changePercent.toFixed(2)}%`;
  if (changePercent > 0) return chalk.green(text);
  if (changePercent < 0) return chalk.red(text);
  return text;
}

/**
 * One line per requested symbol, in request order
 */
export function formatQuotes(
  symbols: readonly string[],
  snapshots: ReadonlyMap<string, InstrumentSnapshot>,
  format: OutputFormat = 'text'
): string {
  if (format === 'json') {
    return JSON.stringify(Object.fromEntries(snapshots), null, 2);
  }

  return symbols
    .map((symbol) => {
      const snapshot = snapshots.get(symbol);
      if (!snapshot) {
        return `${chalk.bold(symbol)}  ${chalk.gray('no data')}`;
      }
      const line = [
        chalk.bold(snapshot.symbol),
        snapshot.name,
        snapshot.lastPrice.toFixed(3),
        formatChange(snapshot.changePercent),
        `vol ${snapshot.volume}`,
      ].join('  ');
      return snapshot.lastPrice === 0 ? `${line}  ${chalk.yellow('(metadata only)')}` : line;
    })
    .join('\n');
}

export function formatHistory(
  symbol: string,
  period: string,
  series: HistoricalSeries | null,
  format: OutputFormat = 'text'
): string {
  if (format === 'json') {
    return JSON.stringify(series, null, 2);
  }
  if (!series) {
    return `${chalk.bold(`${symbol} ${period}`)}: ${chalk.gray('no data')}`;
  }

  const last = series.bars[series.bars.length - 1];
  return [
    `${chalk.bold(`${symbol} ${period}`)}: ${series.bars.length} bars from ${series.start} to ${series.end}`,
    `close mean ${meanClose(series).toFixed(3)}  std ${closeStdDev(series).toFixed(3)}  last ${(last?.close ?? 0).toFixed(3)}`,
  ].join('\n');
}

export function formatCacheStats(stats: CacheStats, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(stats, null, 2);
  }

  const lines = [chalk.bold(`Cache ${stats.cacheDir}`)];
  for (const namespace of NAMESPACES) {
    const entry = stats.namespaces[namespace];
    lines.push(`${namespace.padEnd(10)} ${entry.files} files  ${formatBytes(entry.bytes)}  ttl ${entry.ttlMs / HOUR_MS}h`);
  }
  lines.push(`total      ${stats.totalFiles} files  ${formatBytes(stats.totalBytes)} of ${formatBytes(stats.maxTotalBytes)}`);
  return lines.join('\n');
}

export function formatCleanup(result: CleanupResult): string {
  const { expired, budget } = result;
  return [
    `Expired: current ${expired.current}, historical ${expired.historical}, info ${expired.info}`,
    `Evicted: ${budget.deleted} files, freed ${formatBytes(budget.freedBytes)}, total ${formatBytes(budget.totalBytes)}`,
  ].join('\n');
}

export function formatStatus(status: OptimizationStatus, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(status, null, 2);
  }

  const { fetcher, cache, scheduler } = status;
  const list = fetcher.instrumentList;
  const listText = list.cached
    ? `${list.size} rows, age ${list.ageHours ?? 0}h${list.expired ? chalk.yellow(' (expired)') : ''}`
    : chalk.gray('not cached');
  const states = TASK_STATES.filter((state) => scheduler.byState[state] > 0)
    .map((state) => `${state} ${scheduler.byState[state]}`)
    .join(', ');

  const lines = [
    chalk.bold(`ETF Pulse status at ${status.generatedAt}`),
    `Provider: ${fetcher.provider}, instrument list ${listText}`,
    `Symbols: ${fetcher.validSymbols.length} valid, ${fetcher.invalidSymbols.length} invalid`,
    `Cache: ${cache.totalFiles} files, ${formatBytes(cache.totalBytes)} of ${formatBytes(cache.maxTotalBytes)}`,
    `Scheduler: ${scheduler.running ? chalk.green('running') : 'stopped'}, ${scheduler.total} tasks${states ? ` (${states})` : ''}`,
  ];
  if (scheduler.nextDue) {
    lines.push(`Next: ${scheduler.nextDue.name} at ${scheduler.nextDue.at}`);
  }
  return lines.join('\n');
}
