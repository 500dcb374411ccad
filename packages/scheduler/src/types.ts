/**
 * @fileoverview Scheduled task model.
 *
 * @module @etfpulse/scheduler/types
 */

import type { Clock } from '@etfpulse/contracts';
import type { Logger } from '@etfpulse/logger';

/**
 * pending -> running -> completed | failed, then back to pending while the
 * task recurs. cancelled is reachable from pending only.
 */
export type TaskState = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TASK_STATES: readonly TaskState[] = ['pending', 'running', 'completed', 'failed', 'cancelled'];

export interface DataUpdateTask {
  readonly type: 'data-update';
  /** Restrict the sweep to these symbols; the whole watchlist when absent */
  readonly symbols?: readonly string[];
}

export interface AnalysisTask {
  readonly type: 'analysis';
}

export interface ReportTask {
  readonly type: 'report';
}

export interface CleanupTask {
  readonly type: 'cleanup';
  /** Evict down to the size target even when under budget */
  readonly force?: boolean;
}

/**
 * Arbitrary work with its arguments already bound. Build with bindCustomTask().
 */
export interface CustomTask {
  readonly type: 'custom';
  readonly callback: () => unknown;
  readonly args: readonly unknown[];
}

export type TaskKind = DataUpdateTask | AnalysisTask | ReportTask | CleanupTask | CustomTask;

/**
 * Input to TaskScheduler.register().
 */
export interface TaskDefinition {
  id: string;
  name: string;
  description?: string;
  kind: TaskKind;
  /** First due time (Unix ms or Date) */
  scheduledAt: number | Date;
  /** Milliseconds between runs; absent or 0 runs once */
  intervalMs?: number;
  /** Stop recurring after this many runs */
  maxRuns?: number;
}

/**
 * Read-only view of a registered task.
 */
export interface ScheduledTask {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly kind: TaskKind;
  readonly scheduledAt: number;
  readonly nextDue: number;
  readonly intervalMs: number;
  readonly runCount: number;
  readonly maxRuns: number | null;
  readonly state: TaskState;
  readonly lastRunAt: number | null;
  readonly lastError: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/**
 * Work behind the built-in task kinds. Custom tasks carry their own callback.
 */
export interface TaskHandlers {
  dataUpdate(kind: DataUpdateTask, task: ScheduledTask): Promise<void>;
  analysis(task: ScheduledTask): Promise<void>;
  report(task: ScheduledTask): Promise<void>;
  cleanup(kind: CleanupTask, task: ScheduledTask): Promise<void>;
}

export interface TaskSchedulerOptions {
  handlers: TaskHandlers;
  logger?: Logger;
  clock?: Clock;

  /**
   * Time between loop iterations.
   * @default 30000
   */
  pollIntervalMs?: number;

  /**
   * How long stop() waits for an in-flight iteration.
   * @default 5000
   */
  stopTimeoutMs?: number;
}

export interface TaskEvent {
  task: ScheduledTask;
  durationMs?: number;
  error?: string;
}

export interface StatusSummary {
  running: boolean;
  total: number;
  byState: Record<TaskState, number>;
  nextDue: { id: string; name: string; at: string } | null;
  pollIntervalMs: number;
}
