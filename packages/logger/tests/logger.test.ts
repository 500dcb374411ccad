/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { createLogger, createChildLogger, createNullLogger } from '../src/createLogger.js';
import { renderLine } from '../src/formats.js';
import type { LoggerConfig } from '../src/types.js';

describe('createLogger', () => {
  it('should create a logger with basic configuration', () => {
    const logger = createLogger({ level: 'info', json: true, console: false });

    expect(logger.level).toBe('info');
    expect(logger.transports).toHaveLength(0);
  });

  it('should support every log level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should add a console transport by default', () => {
    const logger = createLogger({ level: 'warn' });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('should honour the silent flag', () => {
    const logger = createLogger({ level: 'info', silent: true });

    expect(logger.silent).toBe(true);
  });

  it('should build a discarding null logger', () => {
    const logger = createNullLogger();

    expect(logger.silent).toBe(true);
    expect(logger.transports).toHaveLength(0);
  });

  it('should create child loggers that stay usable', () => {
    const child = createChildLogger(createNullLogger(), { component: 'scheduler' });

    expect(() => child.info('tick', { count: 1 })).not.toThrow();
  });
});

describe('renderLine', () => {
  it('should print leading context fields before the rest', () => {
    const line = renderLine({
      timestamp: '2025-01-15T07:00:00.000+00:00',
      level: 'info',
      message: 'Cache hit',
      cache: 'hit',
      symbol: '510300',
      component: 'file-cache',
    });

    expect(line).toBe(
      '[2025-01-15T07:00:00.000+00:00] info: Cache hit component=file-cache symbol=510300 cache="hit"'
    );
  });

  it('should append the stack when present', () => {
    const line = renderLine({
      timestamp: 't',
      level: 'error',
      message: 'boom',
      stack: 'Error: boom\n    at x',
    });

    expect(line).toBe('[t] error: boom\nError: boom\n    at x');
  });
});
