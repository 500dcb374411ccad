/**
 * cache commands - inspect and clean the on-disk cache
 */

import type { Runtime } from '../container/index.js';
import { formatCacheStats, formatCleanup, type OutputFormat } from '../formatters/console-formatter.js';

export async function cacheStatsCommand(runtime: Runtime, format: OutputFormat): Promise<string> {
  return formatCacheStats(await runtime.cache.stats(), format);
}

export async function cacheCleanupCommand(runtime: Runtime, force: boolean, format: OutputFormat): Promise<string> {
  const result = await runtime.cache.cleanup(force);
  return format === 'json' ? JSON.stringify(result, null, 2) : formatCleanup(result);
}
