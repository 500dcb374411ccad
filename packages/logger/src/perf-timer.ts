/**
 * @fileoverview Performance timing utilities for measuring operation durations
 * Uses high-resolution timers (performance.now()) by default
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds */
  readonly startTime: number;

  /** Elapsed milliseconds since start (frozen once stopped) */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer
 *
 * @param now - Time source; defaults to performance.now()
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * await fetcher.batchGetCurrent(symbols);
 * logger.info('Batch complete', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(now: () => number = () => performance.now()): PerfTimer {
  const state: TimerState = {
    startTime: now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of an async function
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => cache.cleanup(false));
 * logger.info('Cleanup complete', { duration_ms, deleted: result.deleted });
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>,
  now?: () => number
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer(now);
  const result = await fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
