/**
 * quote command - latest snapshots for one or more symbols
 */

import { stripDecoration } from '@etfpulse/symbol-registry';
import type { Runtime } from '../container/index.js';
import { formatQuotes, type OutputFormat } from '../formatters/console-formatter.js';

export async function quoteCommand(runtime: Runtime, symbols: readonly string[], format: OutputFormat): Promise<string> {
  // "sh510300" and "510300.SH" resolve to the bare code; anything else is shown as-is with no data
  const requested = symbols.map((symbol) => stripDecoration(symbol) ?? symbol);
  const snapshots = await runtime.fetcher.batchGetCurrent(requested);
  return formatQuotes(requested, snapshots, format);
}
