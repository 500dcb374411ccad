/**
 * @fileoverview Tests for secret redaction
 */

import { describe, it, expect } from 'vitest';
import { redactPII, redactSensitiveFields, isSensitiveFieldName, REDACTED } from '../src/formats.js';

describe('isSensitiveFieldName', () => {
  it('should match password, key and token variants', () => {
    for (const key of ['password', 'PASSWORD', 'passwd', 'pwd', 'api_key', 'apiKey', 'token', 'clientSecret', 'Authorization', 'cookie']) {
      expect(isSensitiveFieldName(key)).toBe(true);
    }
  });

  it('should leave market fields alone', () => {
    for (const key of ['symbol', 'period', 'count', 'duration_ms', 'cache', 'component']) {
      expect(isSensitiveFieldName(key)).toBe(false);
    }
  });
});

describe('redactSensitiveFields', () => {
  it('should redact nested objects and arrays without mutating input', () => {
    const input = {
      user: 'ops',
      headers: { Authorization: 'Bearer test-secret', accept: 'json' },
      attempts: [{ token: 'test-token' }],
    };

    expect(redactSensitiveFields(input)).toEqual({
      user: 'ops',
      headers: { Authorization: REDACTED, accept: 'json' },
      attempts: [{ token: REDACTED }],
    });
    expect(input.headers.Authorization).toBe('Bearer test-secret');
  });

  it('should pass Error instances through', () => {
    const error = new Error('boom');

    expect(redactSensitiveFields(error)).toBe(error);
  });
});

describe('redactPII format', () => {
  it('should redact top-level and nested metadata', () => {
    const out = redactPII().transform(
      {
        level: 'info',
        message: 'Provider configured',
        apiKey: 'test-secret',
        request: { params: { token: 'test-token', secid: '1.510300' } },
      },
      {}
    );

    expect(out).toMatchObject({
      level: 'info',
      message: 'Provider configured',
      apiKey: REDACTED,
      request: { params: { token: REDACTED, secid: '1.510300' } },
    });
  });

  it('should never touch the message', () => {
    const out = redactPII().transform({ level: 'info', message: 'password reset' }, {});

    expect(out).toMatchObject({ message: 'password reset' });
  });
});
