/**
 * @fileoverview Public API exports for @etfpulse/logger
 * Structured logging and error handling for ETF Pulse
 */

// Core logger creation
export { createLogger, createChildLogger, createNullLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';

// Formats
export { redactPII, redactSensitiveFields, isSensitiveFieldName, renderLine, REDACTED } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
