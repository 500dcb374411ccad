/**
 * @fileoverview Error taxonomy for ETF Pulse.
 *
 * Every error carries a machine-readable code, structured data and the time
 * it was raised, so callers can branch on the category (invalid input,
 * transient provider failure, misconfiguration) instead of parsing messages.
 *
 * @module @etfpulse/contracts/errors
 */

/**
 * Base error class for all ETF Pulse errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new EtfPulseError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class EtfPulseError extends Error {
  /** Machine-readable error code (e.g., 'PROVIDER_RATE_LIMIT'). */
  readonly code: string;

  /** Structured error data for debugging and retry decisions. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'EtfPulseError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a symbol does not match the expected exchange code format.
 *
 * Raised before any network call is made; never retried.
 */
export class InvalidSymbolError extends EtfPulseError {
  constructor(symbol: string, reason = 'expected a six-digit exchange code') {
    super('INVALID_SYMBOL', `Invalid symbol "${symbol}": ${reason}`, { symbol, reason });
    this.name = 'InvalidSymbolError';
  }
}

/**
 * Thrown when a provider call fails for a transport or HTTP reason.
 *
 * Treated as transient: the fetcher retries it with backoff.
 *
 * @example
 * ```typescript
 * throw new ProviderError('Request timed out', {
 *   provider: 'eastmoney',
 *   operation: 'listInstruments',
 *   statusCode: 504
 * });
 * ```
 */
export class ProviderError extends EtfPulseError {
  constructor(
    message: string,
    data: {
      provider: string;
      operation?: string;
      statusCode?: number;
      [key: string]: unknown;
    },
    code = 'PROVIDER_ERROR'
  ) {
    super(code, message, data);
    this.name = 'ProviderError';
  }
}

/**
 * Thrown when a provider's rate limit is exceeded (HTTP 429).
 */
export class ProviderRateLimitError extends ProviderError {
  constructor(
    message: string,
    data: {
      provider: string;
      retryAfter?: number;
      [key: string]: unknown;
    }
  ) {
    super(message, data, 'PROVIDER_RATE_LIMIT');
    this.name = 'ProviderRateLimitError';
  }
}

/**
 * Thrown when a provider response cannot be decoded into the canonical schema.
 */
export class ProviderParseError extends ProviderError {
  constructor(
    message: string,
    data: {
      provider: string;
      field?: string;
      [key: string]: unknown;
    }
  ) {
    super(message, data, 'PROVIDER_PARSE_ERROR');
    this.name = 'ProviderParseError';
  }
}

/**
 * Thrown when a provider answers successfully but with no usable rows.
 */
export class EmptyResponseError extends ProviderError {
  constructor(provider: string, operation: string, data: Record<string, unknown> = {}) {
    super(`Empty response from ${provider} (${operation})`, { provider, operation, ...data }, 'PROVIDER_EMPTY_RESPONSE');
    this.name = 'EmptyResponseError';
  }
}

/**
 * Thrown by a retry policy once every attempt has failed.
 *
 * `cause` holds the error from the final attempt.
 */
export class RetryExhaustedError extends EtfPulseError {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('RETRY_EXHAUSTED', `${operation} failed after ${attempts} attempt(s): ${reason}`, {
      operation,
      attempts,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.cause = cause;
  }
}

/**
 * Thrown at construction time when options or configuration are unusable.
 *
 * The only error category that is fatal to the caller.
 */
export class ConfigurationError extends EtfPulseError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, data);
    this.name = 'ConfigurationError';
  }
}

export function isEtfPulseError(error: unknown): error is EtfPulseError {
  return error instanceof EtfPulseError;
}

export function isInvalidSymbolError(error: unknown): error is InvalidSymbolError {
  return error instanceof InvalidSymbolError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return error instanceof RetryExhaustedError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Extracts a printable message from any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
