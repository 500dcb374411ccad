/**
 * status command - fetcher, cache and scheduler state
 */

import type { Runtime } from '../container/index.js';
import { formatStatus, type OutputFormat } from '../formatters/console-formatter.js';

export async function statusCommand(runtime: Runtime, format: OutputFormat): Promise<string> {
  return formatStatus(await runtime.status(), format);
}
