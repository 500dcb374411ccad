/**
 * @fileoverview Tests for Eastmoney payload normalization.
 */

import { describe, it, expect } from 'vitest';
import {
  extractRows,
  parseInfo,
  parseKline,
  parseKlines,
  parseMarketTime,
  parseQuoteRow,
  parseQuoteRows,
  toNumber,
} from '../src/parser.js';

describe('toNumber', () => {
  it('should coerce numbers and numeric strings', () => {
    expect(toNumber(3.5)).toBe(3.5);
    expect(toNumber(' 3.912 ')).toBe(3.912);
    expect(toNumber('1e3')).toBe(1000);
  });

  it('should read placeholders and junk as null', () => {
    expect(toNumber('-')).toBeNull();
    expect(toNumber('')).toBeNull();
    expect(toNumber('abc')).toBeNull();
    expect(toNumber(Number.NaN)).toBeNull();
    expect(toNumber(null)).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });
});

describe('parseMarketTime', () => {
  it('should convert exchange local minutes to UTC', () => {
    expect(parseMarketTime('2024-01-15 09:35')).toBe('2024-01-15T01:35:00.000Z');
  });

  it('should treat a bare date as local midnight', () => {
    expect(parseMarketTime('2024-01-15')).toBe('2024-01-14T16:00:00.000Z');
  });

  it('should pass zoned ISO strings through', () => {
    expect(parseMarketTime('2024-01-15T01:35:00.000Z')).toBe('2024-01-15T01:35:00.000Z');
  });

  it('should reject garbage', () => {
    expect(() => parseMarketTime('yesterday')).toThrow('Invalid timestamp: yesterday');
  });
});

describe('parseQuoteRow', () => {
  it('should read numeric field codes', () => {
    expect(
      parseQuoteRow({ f12: '510300', f14: 'CSI 300 ETF', f2: 3.912, f18: 3.887, f3: 0.64, f5: 8412330, f20: 1.2e11 })
    ).toEqual({
      symbol: '510300',
      name: 'CSI 300 ETF',
      lastPrice: 3.912,
      previousClose: 3.887,
      changePercent: 0.64,
      volume: 8412330,
      marketCap: 1.2e11,
    });
  });

  it('should absorb renamed columns and string numbers', () => {
    expect(parseQuoteRow({ 代码: '159915', 名称: 'ChiNext ETF', 最新价: '2.150', 昨收: '2.100', 涨跌幅: '2.38', 成交量: '1000' })).toEqual({
      symbol: '159915',
      name: 'ChiNext ETF',
      lastPrice: 2.15,
      previousClose: 2.1,
      changePercent: 2.38,
      volume: 1000,
      marketCap: null,
    });
  });

  it('should zero missing prices of suspended funds', () => {
    const quote = parseQuoteRow({ f12: '512880', f14: 'Securities ETF', f2: '-', f18: '-', f3: '-', f5: '-', f20: '-' });

    expect(quote.lastPrice).toBe(0);
    expect(quote.volume).toBe(0);
    expect(quote.marketCap).toBeNull();
  });

  it('should pad numeric symbols', () => {
    expect(parseQuoteRow({ f12: 1001, f14: 'Fund' }).symbol).toBe('001001');
  });

  it('should reject rows without a usable symbol or name', () => {
    expect(() => parseQuoteRow({ f12: 'ABC', f14: 'x' })).toThrow('Invalid symbol field: "ABC"');
    expect(() => parseQuoteRow({ f12: '510300' })).toThrow('Missing required field: name');
    expect(() => parseQuoteRow('510300')).toThrow('Quote row is not an object');
  });
});

describe('parseQuoteRows', () => {
  it('should collect errors without dropping good rows', () => {
    const { quotes, errors } = parseQuoteRows([{ f12: '510300', f14: 'A' }, { f12: 'bad', f14: 'B' }]);

    expect(quotes.map((q) => q.symbol)).toEqual(['510300']);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.row).toEqual({ f12: 'bad', f14: 'B' });
  });
});

describe('extractRows', () => {
  it('should accept arrays and index-keyed objects', () => {
    expect(extractRows([1, 2])).toEqual([1, 2]);
    expect(extractRows({ '0': 'a', '1': 'b' })).toEqual(['a', 'b']);
    expect(extractRows(null)).toBeNull();
    expect(extractRows('x')).toBeNull();
  });
});

describe('parseKline', () => {
  it('should parse the comma-separated form', () => {
    expect(parseKline('2024-01-15 09:35,3.401,3.405,3.409,3.398,12034,4093020.00')).toEqual({
      timestamp: '2024-01-15T01:35:00.000Z',
      open: 3.401,
      close: 3.405,
      high: 3.409,
      low: 3.398,
      volume: 12034,
    });
  });

  it('should parse aliased object rows', () => {
    expect(parseKline({ 时间: '2024-01-15 09:40', 开盘: '3.405', 收盘: '3.41', 最高: '3.412', 最低: '3.404' })).toEqual({
      timestamp: '2024-01-15T01:40:00.000Z',
      open: 3.405,
      close: 3.41,
      high: 3.412,
      low: 3.404,
      volume: 0,
    });
  });

  it('should reject short rows and inverted ranges', () => {
    expect(() => parseKline('2024-01-15 09:35,3.4,3.4')).toThrow('K-line has 3 columns, expected at least 6');
    expect(() => parseKline('2024-01-15 09:35,3.4,3.4,3.3,3.5,10')).toThrow('Invalid bar: high (3.3) < low (3.5)');
    expect(() => parseKline('2024-01-15 09:35,-,3.4,3.5,3.3,10')).toThrow('Bar has invalid OHLC data');
  });
});

describe('parseKlines', () => {
  it('should keep good bars and report bad ones', () => {
    const { bars, errors } = parseKlines(['2024-01-15 09:35,1,1,1,1,1', 42]);

    expect(bars).toHaveLength(1);
    expect(errors[0]?.error.message).toBe('K-line is neither a string nor an object');
  });
});

describe('parseInfo', () => {
  it('should map the security record', () => {
    expect(parseInfo({ f57: '510300', f58: 'CSI 300 ETF', f116: 9.1e10, f189: 20120528 }, 'CNY', '2025-01-01T00:00:00.000Z')).toEqual({
      symbol: '510300',
      name: 'CSI 300 ETF',
      fundType: 'ETF',
      listingDate: '2012-05-28',
      marketCap: 9.1e10,
      currency: 'CNY',
      asOf: '2025-01-01T00:00:00.000Z',
    });
  });

  it('should return null for absent or incomplete records', () => {
    expect(parseInfo(null, 'CNY', 't')).toBeNull();
    expect(parseInfo({ f57: '510300' }, 'CNY', 't')).toBeNull();
  });
});
