/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  EtfPulseError,
  InvalidSymbolError,
  ProviderError,
  ProviderRateLimitError,
  ProviderParseError,
  EmptyResponseError,
  RetryExhaustedError,
  ConfigurationError,
  isEtfPulseError,
  isInvalidSymbolError,
  isProviderError,
  isProviderRateLimitError,
  isRetryExhaustedError,
  isConfigurationError,
  describeError,
} from '../src/errors.js';

describe('EtfPulseError', () => {
  it('should create error with code and message', () => {
    const error = new EtfPulseError('TEST_CODE', 'Test message');

    expect(error.name).toBe('EtfPulseError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new EtfPulseError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new EtfPulseError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new EtfPulseError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json.name).toBe('EtfPulseError');
    expect(json.code).toBe('TEST_CODE');
    expect(json.message).toBe('Test message');
    expect(json.data).toEqual({ key: 'value' });
    expect(json.timestamp).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new EtfPulseError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed: unknown = JSON.parse(JSON.stringify(error));

    expect(parsed).toMatchObject({ code: 'TEST_CODE', message: 'Test message', data: { key: 'value' } });
  });
});

describe('InvalidSymbolError', () => {
  it('should name the offending symbol', () => {
    const error = new InvalidSymbolError('ABC');

    expect(error.code).toBe('INVALID_SYMBOL');
    expect(error.message).toBe('Invalid symbol "ABC": expected a six-digit exchange code');
    expect(error.data).toEqual({ symbol: 'ABC', reason: 'expected a six-digit exchange code' });
    expect(isInvalidSymbolError(error)).toBe(true);
    expect(isProviderError(error)).toBe(false);
  });
});

describe('ProviderError family', () => {
  it('should default to PROVIDER_ERROR code', () => {
    const error = new ProviderError('boom', { provider: 'eastmoney', statusCode: 502 });

    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.data?.['statusCode']).toBe(502);
  });

  it('should classify rate limit errors as provider errors', () => {
    const error = new ProviderRateLimitError('slow down', { provider: 'eastmoney', retryAfter: 30 });

    expect(error.name).toBe('ProviderRateLimitError');
    expect(error.code).toBe('PROVIDER_RATE_LIMIT');
    expect(isProviderRateLimitError(error)).toBe(true);
    expect(isProviderError(error)).toBe(true);
    expect(isEtfPulseError(error)).toBe(true);
  });

  it('should carry parse error field', () => {
    const error = new ProviderParseError('bad column', { provider: 'eastmoney', field: 'f2' });

    expect(error.code).toBe('PROVIDER_PARSE_ERROR');
    expect(error.data).toEqual({ provider: 'eastmoney', field: 'f2' });
  });

  it('should build empty response message', () => {
    const error = new EmptyResponseError('eastmoney', 'getBars', { symbol: '510300' });

    expect(error.message).toBe('Empty response from eastmoney (getBars)');
    expect(error.code).toBe('PROVIDER_EMPTY_RESPONSE');
    expect(error.data).toEqual({ provider: 'eastmoney', operation: 'getBars', symbol: '510300' });
    expect(isProviderError(error)).toBe(true);
  });
});

describe('RetryExhaustedError', () => {
  it('should keep the final cause and attempt count', () => {
    const cause = new Error('socket hang up');
    const error = new RetryExhaustedError('getBars 510300', 3, cause);

    expect(error.message).toBe('getBars 510300 failed after 3 attempt(s): socket hang up');
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(cause);
    expect(isRetryExhaustedError(error)).toBe(true);
  });

  it('should describe non-Error causes', () => {
    const error = new RetryExhaustedError('listInstruments', 1, 'timeout');

    expect(error.message).toBe('listInstruments failed after 1 attempt(s): timeout');
  });
});

describe('ConfigurationError', () => {
  it('should be recognized by its guard', () => {
    const error = new ConfigurationError('batchSize must be positive', { batchSize: 0 });

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(isConfigurationError(error)).toBe(true);
    expect(isConfigurationError(new Error('x'))).toBe(false);
  });
});

describe('describeError', () => {
  it('should use message for Error instances and String otherwise', () => {
    expect(describeError(new Error('a'))).toBe('a');
    expect(describeError(42)).toBe('42');
  });
});
