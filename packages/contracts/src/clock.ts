/**
 * @fileoverview Time source abstraction.
 *
 * Components that sleep or compare against "now" take a Clock so tests can
 * simulate elapsed time without real delays.
 *
 * @module @etfpulse/contracts/clock
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  /** Current time in Unix milliseconds */
  now(): number;

  /**
   * Resolves after `ms` milliseconds, or early (without rejecting) when
   * `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Wall-clock implementation backed by Date.now() and Node timers.
 */
export const systemClock: Clock = {
  now: () => Date.now(),

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return;
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return;
      }
      throw error;
    }
  },
};
