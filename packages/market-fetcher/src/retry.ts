/**
 * @fileoverview Retry policy with exponential backoff.
 *
 * @module @etfpulse/market-fetcher/retry
 */

import {
  ConfigurationError,
  RetryExhaustedError,
  describeError,
  isConfigurationError,
  isInvalidSymbolError,
  isProviderRateLimitError,
  systemClock,
} from '@etfpulse/contracts';
import type { Clock } from '@etfpulse/contracts';
import { createNullLogger } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';

/**
 * Delay before the attempt after `attempt` (zero-based) failed.
 */
export type BackoffFn = (attempt: number, baseDelayMs: number) => number;

export interface RetryPolicyOptions {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  baseDelayMs: number;
  backoff?: BackoffFn;
  /** Returns false for errors that must surface immediately */
  shouldRetry?: (error: unknown) => boolean;
  clock?: Clock;
  logger?: Logger;
}

export const exponentialBackoff: BackoffFn = (attempt, baseDelayMs) => baseDelayMs * 2 ** attempt;

/**
 * Bad input and misconfiguration fail the same way on every attempt.
 */
export function isTransient(error: unknown): boolean {
  return !isInvalidSymbolError(error) && !isConfigurationError(error);
}

/**
 * Runs an async operation up to `maxAttempts` times, sleeping on the injected
 * clock between attempts (never after the last one).
 *
 * A rate-limit error carrying `retryAfter` (seconds) stretches the delay to at
 * least that long.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1000 });
 * const quotes = await policy.execute('listInstruments', () => provider.listInstruments());
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private readonly backoff: BackoffFn;
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ConfigurationError('maxAttempts must be a positive integer', { maxAttempts: options.maxAttempts });
    }
    if (!Number.isFinite(options.baseDelayMs) || options.baseDelayMs < 0) {
      throw new ConfigurationError('baseDelayMs must be a non-negative number', { baseDelayMs: options.baseDelayMs });
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.backoff = options.backoff ?? exponentialBackoff;
    this.shouldRetry = options.shouldRetry ?? isTransient;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * @throws The first non-retryable error as is
   * @throws {RetryExhaustedError} Once every attempt has failed; `cause` is the last error
   */
  async execute<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!this.shouldRetry(error)) {
          throw error;
        }
        lastError = error;

        if (attempt < this.maxAttempts - 1) {
          const delayMs = this.delayFor(attempt, error);
          this.logger.warn('Attempt failed, retrying', {
            operation,
            attempt: attempt + 1,
            max_attempts: this.maxAttempts,
            delay_ms: delayMs,
            error: describeError(error),
          });
          await this.clock.sleep(delayMs);
        }
      }
    }

    throw new RetryExhaustedError(operation, this.maxAttempts, lastError);
  }

  private delayFor(attempt: number, error: unknown): number {
    const delayMs = this.backoff(attempt, this.baseDelayMs);
    if (isProviderRateLimitError(error)) {
      const retryAfter = error.data?.['retryAfter'];
      if (typeof retryAfter === 'number' && retryAfter > 0) {
        return Math.max(delayMs, retryAfter * 1000);
      }
    }
    return delayMs;
  }
}
