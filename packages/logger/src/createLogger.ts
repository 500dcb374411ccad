/**
 * @fileoverview Main logger factory
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging and redaction.
 *
 * JSON output in production, colorized single-line output otherwise.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Scheduler started', { tasks: 5 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/etfpulse.log',
 * });
 *
 * const cacheLogger = logger.child({ component: 'file-cache' });
 * cacheLogger.debug('Cache hit', { symbol: '510300', cache: 'hit' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order matters: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON
        format: format.combine(redactPII(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Exits are handled by attachGlobalHandlers
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const schedulerLogger = createChildLogger(logger, { component: 'scheduler' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Logger that discards everything. Default for components constructed
 * without one, and for tests.
 */
export function createNullLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}
