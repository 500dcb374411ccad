/**
 * history command - historical series summary for one symbol
 */

import { stripDecoration } from '@etfpulse/symbol-registry';
import type { Runtime } from '../container/index.js';
import { formatHistory, type OutputFormat } from '../formatters/console-formatter.js';

export async function historyCommand(
  runtime: Runtime,
  symbol: string,
  period: string | undefined,
  format: OutputFormat
): Promise<string> {
  const code = stripDecoration(symbol) ?? symbol;
  const resolvedPeriod = period ?? runtime.config.instruments.historyPeriod;
  const series = await runtime.fetcher.getHistorical(code, resolvedPeriod);
  return formatHistory(code, resolvedPeriod, series, format);
}
