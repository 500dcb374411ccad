/**
 * @fileoverview Main entry point for @etfpulse/provider-eastmoney.
 *
 * @module @etfpulse/provider-eastmoney
 */

export { EastmoneyProvider, toSecId, toExchangeDate } from './eastmoney-provider.js';
export { PROVIDER_ID } from './client.js';
export {
  parseQuoteRow,
  parseQuoteRows,
  parseKline,
  parseKlines,
  parseInfo,
  parseMarketTime,
  extractRows,
  toNumber,
} from './parser.js';
export type { QuoteParseResult, BarParseResult } from './parser.js';
export type { EastmoneyProviderOptions, RowError } from './types.js';
