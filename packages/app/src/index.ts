/**
 * Main exports for @etfpulse/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, toCacheOptions, toFetcherOptions } from './config/index.js';
export type { LoadConfigOptions } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config, EnvValueType } from './config/schema.js';

// Composition root
export { createRuntime } from './container/index.js';
export type { Runtime, RuntimeOverrides } from './container/index.js';

// Service exports
export { TrailingMeanAnalyzer, AnalysisStore } from './services/analysis.js';
export type { Analyzer, AnalysisResult, Recommendation, TrailingMeanAnalyzerOptions } from './services/analysis.js';
export { ReportWriter, buildReport, reportStamp } from './services/report-writer.js';
export type { RecommendationReport, ReportWriterOptions } from './services/report-writer.js';
export { createTaskHandlers } from './services/task-handlers.js';
export type { TaskHandlerDeps } from './services/task-handlers.js';
export { getOptimizationStatus } from './services/status.js';
export type { OptimizationStatus, StatusSources } from './services/status.js';

// Command exports
export { quoteCommand } from './commands/quote.command.js';
export { historyCommand } from './commands/history.command.js';
export { statusCommand } from './commands/status.command.js';
export { cacheStatsCommand, cacheCleanupCommand } from './commands/cache.command.js';
export { startCommand, waitForShutdownSignal } from './commands/start.command.js';

// Formatter exports
export {
  formatBytes,
  formatQuotes,
  formatHistory,
  formatCacheStats,
  formatCleanup,
  formatStatus,
} from './formatters/console-formatter.js';
export type { OutputFormat } from './formatters/console-formatter.js';
