/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Time to wait for logger flush before forceful exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches process-level handlers that log uncaught exceptions and
 * unhandled rejections with stack traces, then exit with code 1.
 * Process warnings are logged at warn level without exiting.
 *
 * Returns a function that detaches the handlers again.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const detach = attachGlobalHandlers(logger);
 * // ...
 * detach();
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const warningHandler = (warning: Error): void => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);
  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    handlersAttached = false;
  };
}

/**
 * Ends the logger and exits once transports have flushed, or after
 * FLUSH_TIMEOUT_MS at the latest.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.stderr.write(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit\n`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
