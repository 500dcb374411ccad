/**
 * @fileoverview Polling task scheduler.
 *
 * One long-lived loop wakes every poll interval, runs due tasks one after
 * another and sleeps on a cancellable timer. Handler failures are recorded on
 * the task and never stop the loop.
 *
 * @module @etfpulse/scheduler/scheduler
 */

import { EventEmitter } from 'node:events';
import { ConfigurationError, describeError, systemClock } from '@etfpulse/contracts';
import type { Clock } from '@etfpulse/contracts';
import { createNullLogger } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';
import type {
  CustomTask,
  ScheduledTask,
  StatusSummary,
  TaskDefinition,
  TaskEvent,
  TaskHandlers,
  TaskKind,
  TaskSchedulerOptions,
  TaskState,
} from './types.js';

type TaskRecord = { -readonly [K in keyof ScheduledTask]: ScheduledTask[K] };

/**
 * Binds arguments to a callback for a `custom` task.
 *
 * @example
 * ```typescript
 * scheduler.register({
 *   id: 'warm-cache',
 *   name: 'Warm cache',
 *   kind: bindCustomTask(fetcher.batchGetHistorical.bind(fetcher), ['510300'], '60d'),
 *   scheduledAt: Date.now()
 * });
 * ```
 */
export function bindCustomTask<A extends unknown[]>(callback: (...args: A) => unknown, ...args: A): CustomTask {
  return { type: 'custom', callback: () => callback(...args), args };
}

/**
 * Task scheduler.
 *
 * Emits `started`, `stopped`, `task:started`, `task:completed` and
 * `task:failed` (with a TaskEvent payload).
 */
export class TaskScheduler extends EventEmitter {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly handlers: TaskHandlers;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private running = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;

  constructor(options: TaskSchedulerOptions) {
    super();
    this.handlers = options.handlers;
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'scheduler' });
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? 30_000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5_000;

    if (!Number.isFinite(this.pollIntervalMs) || this.pollIntervalMs <= 0) {
      throw new ConfigurationError('pollIntervalMs must be a positive number', { value: this.pollIntervalMs });
    }
    if (!Number.isFinite(this.stopTimeoutMs) || this.stopTimeoutMs < 0) {
      throw new ConfigurationError('stopTimeoutMs must be a non-negative number', { value: this.stopTimeoutMs });
    }
  }

  /**
   * Adds a task, replacing any task with the same id.
   *
   * @throws {ConfigurationError} If the definition is unusable
   */
  register(definition: TaskDefinition): ScheduledTask {
    const scheduledAt =
      typeof definition.scheduledAt === 'number' ? definition.scheduledAt : definition.scheduledAt.getTime();
    const intervalMs = definition.intervalMs ?? 0;

    if (definition.id.trim() === '') {
      throw new ConfigurationError('Task id must not be empty', { name: definition.name });
    }
    if (!Number.isFinite(scheduledAt)) {
      throw new ConfigurationError('Task scheduledAt is not a valid time', { task_id: definition.id });
    }
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new ConfigurationError('Task intervalMs must be a non-negative number', {
        task_id: definition.id,
        intervalMs,
      });
    }
    if (definition.maxRuns !== undefined && (!Number.isInteger(definition.maxRuns) || definition.maxRuns < 1)) {
      throw new ConfigurationError('Task maxRuns must be a positive integer', {
        task_id: definition.id,
        maxRuns: definition.maxRuns,
      });
    }

    if (this.tasks.has(definition.id)) {
      this.logger.info('Replacing task', { task_id: definition.id });
    }

    const now = this.clock.now();
    const record: TaskRecord = {
      id: definition.id,
      name: definition.name,
      description: definition.description ?? '',
      kind: definition.kind,
      scheduledAt,
      nextDue: scheduledAt,
      intervalMs,
      runCount: 0,
      maxRuns: definition.maxRuns ?? null,
      state: 'pending',
      lastRunAt: null,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(record.id, record);
    this.logger.debug('Task registered', {
      task_id: record.id,
      kind: record.kind.type,
      next_due: new Date(record.nextDue).toISOString(),
      interval_ms: record.intervalMs,
    });
    return { ...record };
  }

  remove(id: string): boolean {
    const removed = this.tasks.delete(id);
    if (removed) {
      this.logger.info('Task removed', { task_id: id });
    }
    return removed;
  }

  /**
   * Cancels a pending task. Running and finished tasks are left alone.
   */
  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task || task.state !== 'pending') {
      return false;
    }
    task.state = 'cancelled';
    task.updatedAt = this.clock.now();
    this.logger.info('Task cancelled', { task_id: id });
    return true;
  }

  get(id: string): ScheduledTask | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  /**
   * All tasks, soonest due first.
   */
  list(): ScheduledTask[] {
    return [...this.tasks.values()].sort((a, b) => a.nextDue - b.nextDue).map((task) => ({ ...task }));
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Starts the polling loop. The first iteration runs immediately.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Scheduler already running');
      return;
    }

    this.running = true;
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.runLoop(abort.signal);
    this.logger.info('Scheduler started', { tasks: this.tasks.size, poll_interval_ms: this.pollIntervalMs });
    this.emit('started');
  }

  /**
   * Stops the loop, waiting up to the stop timeout for the current iteration.
   *
   * @returns false if the iteration was still running when the timeout expired
   */
  async stop(): Promise<boolean> {
    const loop = this.loop;
    if (!this.running || loop === null) {
      return true;
    }

    this.running = false;
    this.abort?.abort();

    const timeout = new AbortController();
    const finished = await Promise.race([
      loop.then(() => true),
      this.clock.sleep(this.stopTimeoutMs, timeout.signal).then(() => false),
    ]);
    timeout.abort();

    this.loop = null;
    this.abort = null;
    if (finished) {
      this.logger.info('Scheduler stopped');
    } else {
      this.logger.warn('Scheduler stop timed out, iteration still in flight', { timeout_ms: this.stopTimeoutMs });
    }
    this.emit('stopped', { clean: finished });
    return finished;
  }

  /**
   * Runs every pending task whose due time has passed, one at a time,
   * soonest first.
   *
   * @returns Number of tasks run
   */
  async runDueTasks(signal?: AbortSignal): Promise<number> {
    const now = this.clock.now();
    const due = [...this.tasks.values()]
      .filter((task) => task.state === 'pending' && task.nextDue <= now && !this.ceilingReached(task))
      .sort((a, b) => a.nextDue - b.nextDue);

    let ran = 0;
    for (const task of due) {
      if (signal?.aborted) {
        break;
      }
      // removed or cancelled by an earlier task in this pass
      if (task.state !== 'pending' || this.tasks.get(task.id) !== task) {
        continue;
      }
      await this.execute(task);
      ran++;
    }
    return ran;
  }

  getStatusSummary(): StatusSummary {
    const byState: Record<TaskState, number> = { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 };
    let next: TaskRecord | null = null;

    for (const task of this.tasks.values()) {
      byState[task.state] += 1;
      if (task.state === 'pending' && (next === null || task.nextDue < next.nextDue)) {
        next = task;
      }
    }

    return {
      running: this.running,
      total: this.tasks.size,
      byState,
      nextDue: next ? { id: next.id, name: next.name, at: new Date(next.nextDue).toISOString() } : null,
      pollIntervalMs: this.pollIntervalMs,
    };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runDueTasks(signal);
      } catch (error) {
        this.logger.error('Scheduler iteration failed', { error: describeError(error) });
      }
      await this.clock.sleep(this.pollIntervalMs, signal);
    }
  }

  private ceilingReached(task: TaskRecord): boolean {
    return task.maxRuns !== null && task.runCount >= task.maxRuns;
  }

  private async execute(task: TaskRecord): Promise<void> {
    const startedAt = this.clock.now();
    task.state = 'running';
    task.lastRunAt = startedAt;
    task.updatedAt = startedAt;
    this.logger.info('Task started', { task_id: task.id, kind: task.kind.type, run: task.runCount + 1 });

    let failure: string | null = null;
    try {
      // A throwing listener counts as a failed run.
      this.emit('task:started', { task: { ...task } } satisfies TaskEvent);
      await this.dispatch(task.kind, { ...task });
    } catch (error) {
      failure = describeError(error);
    }

    const finishedAt = this.clock.now();
    const durationMs = finishedAt - startedAt;
    task.runCount += 1;
    task.lastError = failure;
    task.state = failure === null ? 'completed' : 'failed';
    task.updatedAt = finishedAt;

    if (failure === null) {
      this.logger.info('Task completed', { task_id: task.id, duration_ms: durationMs });
    } else {
      this.logger.error('Task failed', { task_id: task.id, duration_ms: durationMs, error: failure });
    }

    if (task.intervalMs > 0) {
      if (this.ceilingReached(task)) {
        task.state = 'completed';
      } else {
        task.state = 'pending';
        task.nextDue = finishedAt + task.intervalMs;
      }
    }

    if (failure === null) {
      this.emit('task:completed', { task: { ...task }, durationMs } satisfies TaskEvent);
    } else {
      this.emit('task:failed', { task: { ...task }, durationMs, error: failure } satisfies TaskEvent);
    }
  }

  private async dispatch(kind: TaskKind, task: ScheduledTask): Promise<void> {
    switch (kind.type) {
      case 'data-update':
        return this.handlers.dataUpdate(kind, task);
      case 'analysis':
        return this.handlers.analysis(task);
      case 'report':
        return this.handlers.report(task);
      case 'cleanup':
        return this.handlers.cleanup(kind, task);
      case 'custom':
        await kind.callback();
        return;
      default: {
        const unknownKind: never = kind;
        throw new Error(`Unknown task kind: ${JSON.stringify(unknownKind)}`);
      }
    }
  }
}
