/**
 * @fileoverview Type definitions for the ETF Pulse logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Warning conditions that should be reviewed
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/etfpulse.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON (recommended for production)
   * - false: Human-readable pretty-print (recommended for development)
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output regardless of transports. Used by tests and by
   * commands whose stdout must stay machine-readable.
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields, included in every entry from the child.
 *
 * @example
 * ```typescript
 * const fetchLogger = logger.child({ component: 'market-fetcher', provider: 'eastmoney' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  provider?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so consumers do not import winston directly.
 */
export type Logger = WinstonLogger;
