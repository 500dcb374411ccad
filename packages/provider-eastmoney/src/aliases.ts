/**
 * @fileoverview Field alias tables.
 *
 * The provider has renamed columns more than once (numeric `fNN` codes,
 * English names, Chinese headings). Each canonical field lists every name it
 * has been seen under; the first one present in a row wins.
 *
 * @module @etfpulse/provider-eastmoney/aliases
 */

export const QUOTE_FIELD_ALIASES = {
  symbol: ['f12', 'code', 'symbol', '代码'],
  name: ['f14', 'name', '名称'],
  lastPrice: ['f2', 'price', 'lastPrice', '最新价'],
  previousClose: ['f18', 'prevClose', 'previousClose', '昨收'],
  changePercent: ['f3', 'changePercent', 'pct', '涨跌幅'],
  volume: ['f5', 'volume', '成交量'],
  marketCap: ['f20', 'marketCap', '总市值'],
} as const;

export const BAR_FIELD_ALIASES = {
  timestamp: ['time', 'date', 'timestamp', '时间', '日期'],
  open: ['open', '开盘'],
  close: ['close', '收盘'],
  high: ['high', '最高'],
  low: ['low', '最低'],
  volume: ['volume', '成交量'],
} as const;

export const INFO_FIELD_ALIASES = {
  symbol: ['f57', 'code', 'symbol', '代码'],
  name: ['f58', 'name', '名称'],
  marketCap: ['f116', 'marketCap', '总市值'],
  listingDate: ['f189', 'listingDate', '上市日期'],
} as const;

/**
 * Column order of the comma-separated k-line rows:
 * date, open, close, high, low, volume, then turnover and derived fields.
 */
export const KLINE_CSV_COLUMNS = ['timestamp', 'open', 'close', 'high', 'low', 'volume'] as const;

/**
 * Request field lists matching the alias tables above.
 */
export const LIST_FIELDS = 'f2,f3,f5,f12,f14,f18,f20';
export const INFO_FIELDS = 'f57,f58,f116,f189';
export const KLINE_FIELDS1 = 'f1,f2,f3,f4,f5,f6';
export const KLINE_FIELDS2 = 'f51,f52,f53,f54,f55,f56,f57';

/**
 * Market board filter selecting exchange-traded funds on both exchanges.
 */
export const FUND_BOARDS = 'b:MK0021,b:MK0022,b:MK0023,b:MK0024';
