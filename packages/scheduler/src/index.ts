/**
 * @etfpulse/scheduler
 *
 * Polling scheduler for recurring and one-shot tasks
 *
 * @example
 * ```typescript
 * import { TaskScheduler, createDefaultTasks } from '@etfpulse/scheduler';
 *
 * const scheduler = new TaskScheduler({ handlers, logger });
 * for (const task of createDefaultTasks({ now: Date.now(), refreshInstrumentList })) {
 *   scheduler.register(task);
 * }
 * scheduler.start();
 * ```
 */

export { TaskScheduler, bindCustomTask } from './scheduler.js';
export { createDefaultTasks, createSymbolRefreshTask, nextWeekdayAt, DEFAULT_TASK_IDS } from './default-tasks.js';
export type { DefaultTaskName, DefaultTaskOptions } from './default-tasks.js';
export { TASK_STATES } from './types.js';
export type {
  TaskState,
  TaskKind,
  DataUpdateTask,
  AnalysisTask,
  ReportTask,
  CleanupTask,
  CustomTask,
  TaskDefinition,
  ScheduledTask,
  TaskHandlers,
  TaskSchedulerOptions,
  TaskEvent,
  StatusSummary,
} from './types.js';
