/**
 * @fileoverview Custom Winston formats
 * Includes secret redaction, field normalization and output formatting.
 */

import { format } from 'winston';

/**
 * Field name patterns whose values must never reach a log sink.
 * Matches are case-insensitive to catch common variations.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

/**
 * Replacement value for redacted data.
 */
export const REDACTED = '[REDACTED]';

/**
 * Winston-owned fields that are never inspected.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with sensitive keys replaced, recursing into
 * arrays and plain objects. Errors, dates and class instances pass through.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ user: 'ops', headers: { Authorization: 'Bearer test-secret' } });
 * // → { user: 'ops', headers: { Authorization: '[REDACTED]' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the chain so secrets never reach later formats.
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Winston format that adds an ISO timestamp and expands Error messages.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Fields printed first, in this order, by the pretty printer.
 */
const LEADING_FIELDS = ['component', 'symbol', 'period', 'operation', 'task_id'];

/**
 * Renders one entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * // [2025-01-15T07:00:00.000+00:00] info: Bulk list refreshed component=market-fetcher count=912
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of LEADING_FIELDS) {
    const value = info[key];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${key}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (CORE_FIELDS.has(key) || LEADING_FIELDS.includes(key) || key === 'splat') {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Winston format for colorized human-readable output in development.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
