/**
 * @fileoverview Eastmoney market data provider implementation.
 *
 * Implements the MarketDataProvider contract from @etfpulse/contracts over
 * three endpoints: the fund board list (bulk snapshot), the k-line history
 * endpoint, and the single-security quote.
 *
 * @module @etfpulse/provider-eastmoney
 */

import axios from 'axios';
import { EmptyResponseError, ProviderParseError } from '@etfpulse/contracts';
import type {
  BarInterval,
  BarsRequest,
  InstrumentInfo,
  InstrumentQuote,
  MarketDataProvider,
  PriceBar,
} from '@etfpulse/contracts';
import { createNullLogger } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';
import { resolveExchange } from '@etfpulse/symbol-registry';
import { FUND_BOARDS, INFO_FIELDS, KLINE_FIELDS1, KLINE_FIELDS2, LIST_FIELDS } from './aliases.js';
import { EastmoneyClient, PROVIDER_ID } from './client.js';
import { extractRows, isRecord, parseInfo, parseKlines, parseQuoteRows } from './parser.js';
import type { EastmoneyProviderOptions } from './types.js';

const DEFAULT_QUOTE_BASE_URL = 'https://push2.eastmoney.com';
const DEFAULT_HISTORY_BASE_URL = 'https://push2his.eastmoney.com';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_PAGE_SIZE = 5000;

/**
 * K-line type codes per interval.
 */
const KLINE_TYPES: Record<BarInterval, number> = {
  '1m': 1,
  '5m': 5,
  '15m': 15,
  '30m': 30,
  '60m': 60,
  '1d': 101,
};

/** Forward-adjusted prices */
const FORWARD_ADJUSTED = 1;

/**
 * Security id: market prefix (1 = Shanghai, 0 = Shenzhen) and code.
 */
export function toSecId(symbol: string): string {
  return `${resolveExchange(symbol) === 'SH' ? 1 : 0}.${symbol}`;
}

/**
 * Formats a date as YYYYMMDD in exchange local time (UTC+8).
 */
export function toExchangeDate(date: Date): string {
  const local = new Date(date.getTime() + 8 * 60 * 60 * 1000);
  const y = local.getUTCFullYear();
  const m = String(local.getUTCMonth() + 1).padStart(2, '0');
  const d = String(local.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

/**
 * Eastmoney data provider.
 *
 * @example
 * ```typescript
 * const provider = new EastmoneyProvider({ timeoutMs: 8000, logger });
 * const quotes = await provider.listInstruments();
 * const bars = await provider.getBars({
 *   symbol: '510300',
 *   start: new Date('2025-01-01'),
 *   end: new Date('2025-03-01'),
 *   interval: '5m'
 * });
 * ```
 */
export class EastmoneyProvider implements MarketDataProvider {
  readonly id = PROVIDER_ID;
  readonly currency = 'CNY';

  private readonly client: EastmoneyClient;
  private readonly quoteBaseUrl: string;
  private readonly historyBaseUrl: string;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: EastmoneyProviderOptions = {}) {
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'provider-eastmoney' });
    const http = options.httpClient ?? axios.create({ timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });
    this.client = new EastmoneyClient(http, this.logger);
    this.quoteBaseUrl = options.quoteBaseUrl ?? DEFAULT_QUOTE_BASE_URL;
    this.historyBaseUrl = options.historyBaseUrl ?? DEFAULT_HISTORY_BASE_URL;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.now = options.now ?? Date.now;
  }

  /**
   * One call returning current quotes for every listed fund.
   *
   * @throws {EmptyResponseError} If the payload carries no rows
   * @throws {ProviderParseError} If no row can be normalized
   */
  async listInstruments(): Promise<InstrumentQuote[]> {
    const operation = 'listInstruments';
    const body = await this.client.getJson(
      `${this.quoteBaseUrl}/api/qt/clist/get`,
      {
        pn: 1,
        pz: this.pageSize,
        po: 1,
        np: 1,
        fltt: 2,
        invt: 2,
        fid: 'f3',
        fs: FUND_BOARDS,
        fields: LIST_FIELDS,
      },
      operation
    );

    const data = isRecord(body) ? body['data'] : undefined;
    if (!isRecord(data)) {
      throw new EmptyResponseError(PROVIDER_ID, operation);
    }

    const rows = extractRows(data['diff']);
    if (rows === null || rows.length === 0) {
      throw new EmptyResponseError(PROVIDER_ID, operation);
    }

    const { quotes, errors } = parseQuoteRows(rows);
    if (errors.length > 0) {
      this.logger.debug('Skipped unparseable list rows', {
        operation,
        count: errors.length,
        sample: errors[0]?.error.message,
      });
    }
    if (quotes.length === 0) {
      throw new ProviderParseError('No usable rows in instrument list', {
        provider: PROVIDER_ID,
        operation,
        rows: rows.length,
      });
    }

    return quotes;
  }

  /**
   * Forward-adjusted bars for one symbol between two dates (inclusive,
   * exchange-local calendar days), ascending.
   *
   * @throws {EmptyResponseError} If the symbol is unknown or has no bars in range
   * @throws {ProviderParseError} If none of the returned k-lines parse
   */
  async getBars(request: BarsRequest): Promise<PriceBar[]> {
    const operation = 'getBars';
    const body = await this.client.getJson(
      `${this.historyBaseUrl}/api/qt/stock/kline/get`,
      {
        secid: toSecId(request.symbol),
        klt: KLINE_TYPES[request.interval],
        fqt: FORWARD_ADJUSTED,
        beg: toExchangeDate(request.start),
        end: toExchangeDate(request.end),
        fields1: KLINE_FIELDS1,
        fields2: KLINE_FIELDS2,
      },
      operation
    );

    const data = isRecord(body) ? body['data'] : undefined;
    const klines = isRecord(data) ? data['klines'] : undefined;
    if (!Array.isArray(klines) || klines.length === 0) {
      throw new EmptyResponseError(PROVIDER_ID, operation, { symbol: request.symbol });
    }

    const { bars, errors } = parseKlines(klines);
    if (errors.length > 0) {
      this.logger.debug('Skipped unparseable k-lines', {
        operation,
        symbol: request.symbol,
        count: errors.length,
        sample: errors[0]?.error.message,
      });
    }
    if (bars.length === 0) {
      throw new ProviderParseError('No usable k-lines in response', {
        provider: PROVIDER_ID,
        operation,
        symbol: request.symbol,
      });
    }

    return bars;
  }

  /**
   * Descriptive metadata for one symbol, or null if the provider does not know it.
   */
  async getInstrumentInfo(symbol: string): Promise<InstrumentInfo | null> {
    const body = await this.client.getJson(
      `${this.quoteBaseUrl}/api/qt/stock/get`,
      { secid: toSecId(symbol), fltt: 2, invt: 2, fields: INFO_FIELDS },
      'getInstrumentInfo'
    );

    const data = isRecord(body) ? body['data'] : undefined;
    return parseInfo(data, this.currency, new Date(this.now()).toISOString());
  }
}
