/**
 * Shared fakes for scheduler tests.
 */

import type { Clock } from '@etfpulse/contracts';
import type { TaskHandlers } from '../src/index.js';

interface Sleeper {
  until: number;
  resolve: () => void;
}

/**
 * Clock whose sleeps only resolve when the test advances time past their
 * deadline, or when their signal aborts.
 */
export class ManualClock implements Clock {
  private sleepers: Sleeper[] = [];

  constructor(public time: number) {}

  now(): number {
    return this.time;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const sleeper: Sleeper = { until: this.time + ms, resolve };
      this.sleepers.push(sleeper);
      signal?.addEventListener(
        'abort',
        () => {
          this.sleepers = this.sleepers.filter((s) => s !== sleeper);
          resolve();
        },
        { once: true }
      );
    });
  }

  async advance(ms: number): Promise<void> {
    this.time += ms;
    const ready = this.sleepers.filter((s) => s.until <= this.time);
    this.sleepers = this.sleepers.filter((s) => s.until > this.time);
    for (const sleeper of ready) {
      sleeper.resolve();
    }
    await flush();
  }

  get pendingSleeps(): number {
    return this.sleepers.length;
  }
}

/**
 * Lets every queued promise continuation run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function recordingHandlers() {
  const calls: string[] = [];
  const handlers: TaskHandlers = {
    dataUpdate: async (kind, task) => {
      calls.push(`data-update:${task.id}:${kind.symbols?.join(',') ?? '*'}`);
    },
    analysis: async (task) => {
      calls.push(`analysis:${task.id}`);
    },
    report: async (task) => {
      calls.push(`report:${task.id}`);
    },
    cleanup: async (kind, task) => {
      calls.push(`cleanup:${task.id}:${kind.force === true}`);
    },
  };
  return { calls, handlers };
}
