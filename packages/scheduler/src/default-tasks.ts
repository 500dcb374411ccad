/**
 * @fileoverview Standard task set and calendar helpers.
 *
 * @module @etfpulse/scheduler/default-tasks
 */

import { ProviderError } from '@etfpulse/contracts';
import { bindCustomTask } from './scheduler.js';
import type { TaskDefinition } from './types.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_TASK_IDS = {
  instrumentList: 'instrument-list-refresh',
  dataUpdate: 'daily-data-update',
  analysis: 'daily-analysis',
  report: 'weekly-report',
  cleanup: 'daily-cleanup',
} as const;

export type DefaultTaskName = keyof typeof DEFAULT_TASK_IDS;

export interface DefaultTaskOptions {
  /** Reference time for first runs (Unix ms) */
  now: number;

  /** Forced bulk list refresh; resolves false when the provider failed */
  refreshInstrumentList: () => Promise<boolean>;

  /** Disable individual tasks; the list refresh always runs */
  enabled?: Partial<Record<Exclude<DefaultTaskName, 'instrumentList'>, boolean>>;

  /** Interval overrides in milliseconds */
  intervalsMs?: Partial<Record<DefaultTaskName, number>>;

  /** Anchor the weekly report's first run instead of now + 10 minutes */
  reportFirstRunAt?: number;
}

async function refreshOrThrow(refresh: () => Promise<boolean>): Promise<void> {
  if (!(await refresh())) {
    throw new ProviderError('Instrument list refresh failed', {
      provider: 'market-fetcher',
      operation: 'listInstruments',
    });
  }
}

/**
 * Instrument-list refresh (6h), data update (24h), analysis (24h), weekly
 * report (168h) and cleanup (24h), staggered after `now`.
 */
export function createDefaultTasks(options: DefaultTaskOptions): TaskDefinition[] {
  const { now } = options;
  const enabled = options.enabled ?? {};
  const interval = (name: DefaultTaskName, fallback: number): number => options.intervalsMs?.[name] ?? fallback;

  const tasks: TaskDefinition[] = [
    {
      id: DEFAULT_TASK_IDS.instrumentList,
      name: 'Instrument list refresh',
      description: 'Refresh the bulk instrument list',
      kind: bindCustomTask(refreshOrThrow, options.refreshInstrumentList),
      scheduledAt: now + 30 * MINUTE_MS,
      intervalMs: interval('instrumentList', 6 * HOUR_MS),
    },
  ];

  if (enabled.dataUpdate !== false) {
    tasks.push({
      id: DEFAULT_TASK_IDS.dataUpdate,
      name: 'Daily data update',
      description: 'Fetch snapshots and refresh historical series for the watchlist',
      kind: { type: 'data-update' },
      scheduledAt: now + MINUTE_MS,
      intervalMs: interval('dataUpdate', DAY_MS),
    });
  }

  if (enabled.analysis !== false) {
    tasks.push({
      id: DEFAULT_TASK_IDS.analysis,
      name: 'Daily analysis',
      description: 'Label every watched instrument from its latest data',
      kind: { type: 'analysis' },
      scheduledAt: now + 5 * MINUTE_MS,
      intervalMs: interval('analysis', DAY_MS),
    });
  }

  if (enabled.report !== false) {
    tasks.push({
      id: DEFAULT_TASK_IDS.report,
      name: 'Weekly report',
      description: 'Write the recommendation summary',
      kind: { type: 'report' },
      scheduledAt: options.reportFirstRunAt ?? now + 10 * MINUTE_MS,
      intervalMs: interval('report', 7 * DAY_MS),
    });
  }

  if (enabled.cleanup !== false) {
    tasks.push({
      id: DEFAULT_TASK_IDS.cleanup,
      name: 'Daily cleanup',
      description: 'Drop expired cache entries and enforce the size budget',
      kind: { type: 'cleanup' },
      scheduledAt: now + HOUR_MS,
      intervalMs: interval('cleanup', DAY_MS),
    });
  }

  return tasks;
}

/**
 * High-frequency update of one priority instrument.
 */
export function createSymbolRefreshTask(symbol: string, now: number, intervalMs = 30 * MINUTE_MS): TaskDefinition {
  return {
    id: `symbol-refresh-${symbol}`,
    name: `Priority refresh ${symbol}`,
    description: `Refresh data for ${symbol}`,
    kind: { type: 'data-update', symbols: [symbol] },
    scheduledAt: now + 5 * MINUTE_MS,
    intervalMs,
  };
}

/**
 * Next occurrence of a weekday and wall-clock time strictly after `now`.
 *
 * @param weekday - 0 (Sunday) to 6 (Saturday)
 * @param utcOffsetMinutes - Offset of the wall clock from UTC (480 for exchange time)
 */
export function nextWeekdayAt(now: number, weekday: number, hour: number, minute: number, utcOffsetMinutes = 0): number {
  const offsetMs = utcOffsetMinutes * MINUTE_MS;
  const local = new Date(now + offsetMs);
  const daysAhead = (weekday - local.getUTCDay() + 7) % 7;
  let candidate = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate() + daysAhead, hour, minute);
  if (candidate <= local.getTime()) {
    candidate += 7 * DAY_MS;
  }
  return candidate - offsetMs;
}
