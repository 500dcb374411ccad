/**
 * @fileoverview Parser utilities for Eastmoney payloads.
 *
 * Converts raw quote rows, k-lines and security records into the canonical
 * shapes from @etfpulse/contracts. Numeric strings are coerced, `"-"`
 * placeholders read as missing, and field names are resolved through the
 * alias tables.
 *
 * @module @etfpulse/provider-eastmoney/parser
 */

import type { InstrumentInfo, InstrumentQuote, PriceBar } from '@etfpulse/contracts';
import { isValidSymbol } from '@etfpulse/symbol-registry';
import { BAR_FIELD_ALIASES, INFO_FIELD_ALIASES, KLINE_CSV_COLUMNS, QUOTE_FIELD_ALIASES } from './aliases.js';
import type { RowError } from './types.js';

/** Exchange local time is UTC+8 year round. */
const EXCHANGE_UTC_OFFSET_HOURS = 8;

const MARKET_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerces a numeric field. Empty strings, `"-"` and non-finite values are null.
 *
 * @example
 * ```typescript
 * toNumber('3.912') // → 3.912
 * toNumber('-')     // → null
 * toNumber(12)      // → 12
 * ```
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || trimmed === '-') {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Returns the value of the first alias present in `row`.
 */
export function pickField(row: Record<string, unknown>, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    if (row[alias] !== undefined) {
      return row[alias];
    }
  }
  return undefined;
}

function toSymbol(value: unknown): string {
  const text = typeof value === 'number' ? String(value).padStart(6, '0') : typeof value === 'string' ? value.trim() : '';
  if (!isValidSymbol(text)) {
    throw new Error(`Invalid symbol field: ${JSON.stringify(value)}`);
  }
  return text;
}

function toText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Missing required field: ${field}`);
  }
  return value.trim();
}

/**
 * Converts exchange-local "YYYY-MM-DD[ HH:mm[:ss]]" to an ISO 8601 UTC
 * timestamp. Strings that already carry a zone are passed through Date.
 *
 * @throws {Error} If the text is not a recognizable date
 *
 * @example
 * ```typescript
 * parseMarketTime('2024-01-15 09:35') // → '2024-01-15T01:35:00.000Z'
 * ```
 */
export function parseMarketTime(text: string): string {
  const match = MARKET_TIME_PATTERN.exec(text.trim());
  if (match) {
    const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
    const time = Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour) - EXCHANGE_UTC_OFFSET_HOURS,
      Number(minute),
      Number(second)
    );
    if (!Number.isNaN(time)) {
      return new Date(time).toISOString();
    }
  }

  const fallback = Date.parse(text);
  if (Number.isNaN(fallback)) {
    throw new Error(`Invalid timestamp: ${text}`);
  }
  return new Date(fallback).toISOString();
}

/**
 * Parses one row of the bulk list.
 *
 * Missing prices (suspended funds report `"-"`) read as 0; a missing market
 * cap reads as null. Symbol and name are required.
 *
 * @throws {Error} If the row is not an object or lacks a usable symbol or name
 */
export function parseQuoteRow(row: unknown): InstrumentQuote {
  if (!isRecord(row)) {
    throw new Error('Quote row is not an object');
  }

  return {
    symbol: toSymbol(pickField(row, QUOTE_FIELD_ALIASES.symbol)),
    name: toText(pickField(row, QUOTE_FIELD_ALIASES.name), 'name'),
    lastPrice: toNumber(pickField(row, QUOTE_FIELD_ALIASES.lastPrice)) ?? 0,
    previousClose: toNumber(pickField(row, QUOTE_FIELD_ALIASES.previousClose)) ?? 0,
    changePercent: toNumber(pickField(row, QUOTE_FIELD_ALIASES.changePercent)) ?? 0,
    volume: toNumber(pickField(row, QUOTE_FIELD_ALIASES.volume)) ?? 0,
    marketCap: toNumber(pickField(row, QUOTE_FIELD_ALIASES.marketCap)),
  };
}

export interface QuoteParseResult {
  quotes: InstrumentQuote[];
  errors: RowError[];
}

/**
 * Parses every row, collecting failures instead of throwing.
 */
export function parseQuoteRows(rows: readonly unknown[]): QuoteParseResult {
  const quotes: InstrumentQuote[] = [];
  const errors: RowError[] = [];

  for (const row of rows) {
    try {
      quotes.push(parseQuoteRow(row));
    } catch (error) {
      errors.push({ row, error: error instanceof Error ? error : new Error(String(error)) });
    }
  }

  return { quotes, errors };
}

/**
 * The list endpoint returns `diff` either as an array or as an object keyed
 * by row index. Returns null for anything else.
 */
export function extractRows(diff: unknown): unknown[] | null {
  if (Array.isArray(diff)) {
    return diff;
  }
  if (isRecord(diff)) {
    return Object.values(diff);
  }
  return null;
}

function barFromFields(fields: Record<string, unknown>): PriceBar {
  const rawTime = fields['timestamp'];
  if (typeof rawTime !== 'string') {
    throw new Error('Bar missing required field: timestamp');
  }

  const open = toNumber(fields['open']);
  const high = toNumber(fields['high']);
  const low = toNumber(fields['low']);
  const close = toNumber(fields['close']);
  if (open === null || high === null || low === null || close === null) {
    throw new Error('Bar has invalid OHLC data');
  }
  if (high < low) {
    throw new Error(`Invalid bar: high (${high}) < low (${low})`);
  }

  const volume = toNumber(fields['volume']) ?? 0;
  if (volume < 0) {
    throw new Error(`Invalid bar: negative volume (${volume})`);
  }

  return { timestamp: parseMarketTime(rawTime), open, high, low, close, volume };
}

/**
 * Parses one k-line, either the comma-separated string form or an object
 * with aliased column names.
 *
 * @throws {Error} If required fields are missing or inconsistent
 *
 * @example
 * ```typescript
 * parseKline('2024-01-15 09:35,3.401,3.405,3.409,3.398,12034,4093020.00')
 * // → { timestamp: '2024-01-15T01:35:00.000Z', open: 3.401, close: 3.405, high: 3.409, low: 3.398, volume: 12034 }
 * ```
 */
export function parseKline(row: unknown): PriceBar {
  if (typeof row === 'string') {
    const cells = row.split(',');
    if (cells.length < KLINE_CSV_COLUMNS.length) {
      throw new Error(`K-line has ${cells.length} columns, expected at least ${KLINE_CSV_COLUMNS.length}`);
    }
    const fields: Record<string, unknown> = {};
    KLINE_CSV_COLUMNS.forEach((column, i) => {
      fields[column] = cells[i];
    });
    return barFromFields(fields);
  }

  if (isRecord(row)) {
    return barFromFields({
      timestamp: pickField(row, BAR_FIELD_ALIASES.timestamp),
      open: pickField(row, BAR_FIELD_ALIASES.open),
      high: pickField(row, BAR_FIELD_ALIASES.high),
      low: pickField(row, BAR_FIELD_ALIASES.low),
      close: pickField(row, BAR_FIELD_ALIASES.close),
      volume: pickField(row, BAR_FIELD_ALIASES.volume),
    });
  }

  throw new Error('K-line is neither a string nor an object');
}

export interface BarParseResult {
  bars: PriceBar[];
  errors: RowError[];
}

/**
 * Parses an array of k-lines, collecting failures for caller handling.
 */
export function parseKlines(rows: readonly unknown[]): BarParseResult {
  const bars: PriceBar[] = [];
  const errors: RowError[] = [];

  for (const row of rows) {
    try {
      bars.push(parseKline(row));
    } catch (error) {
      errors.push({ row, error: error instanceof Error ? error : new Error(String(error)) });
    }
  }

  return { bars, errors };
}

function toListingDate(value: unknown): string | undefined {
  const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(text);
  if (!match) {
    return undefined;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

/**
 * Parses the single-security record. Returns null when the record is absent
 * or lacks a symbol or name.
 */
export function parseInfo(data: unknown, currency: string, asOf: string): InstrumentInfo | null {
  if (!isRecord(data)) {
    return null;
  }

  let symbol: string;
  let name: string;
  try {
    symbol = toSymbol(pickField(data, INFO_FIELD_ALIASES.symbol));
    name = toText(pickField(data, INFO_FIELD_ALIASES.name), 'name');
  } catch {
    return null;
  }

  const info: InstrumentInfo = {
    symbol,
    name,
    fundType: 'ETF',
    listingDate: toListingDate(pickField(data, INFO_FIELD_ALIASES.listingDate)),
    marketCap: toNumber(pickField(data, INFO_FIELD_ALIASES.marketCap)),
    currency,
    asOf,
  };
  return info;
}
