/**
 * Symbol normalization
 * Converts vendor-decorated codes ("sh510300", "510300.SH", " 159915 ") to
 * canonical six-digit form and infers the listing exchange
 */

import { InvalidSymbolError } from '@etfpulse/contracts';
import type { CanonicalSymbol, Exchange, NormalizedSymbol } from './types.js';

const SYMBOL_PATTERN = /^\d{6}$/;

/**
 * Fund code prefixes listed in Shanghai
 */
const SHANGHAI_FUND_PREFIXES = ['510', '511', '512', '513', '515', '516', '517', '518', '588'];

/**
 * Fund code prefixes listed in Shenzhen (159 through 169)
 */
const SHENZHEN_FUND_PREFIXES = Array.from({ length: 11 }, (_, i) => String(159 + i));

/**
 * Check whether a string is a canonical symbol (exactly six digits).
 * No trimming or decoration stripping is applied.
 */
export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_PATTERN.test(symbol);
}

/**
 * Strip exchange decoration and whitespace from a raw code
 *
 * @returns Canonical symbol, or null when the remainder is not six digits
 *
 * @example
 * ```typescript
 * stripDecoration('sh510300')   // → '510300'
 * stripDecoration('159915.SZ')  // → '159915'
 * stripDecoration('51030')      // → null
 * ```
 */
export function stripDecoration(raw: string): CanonicalSymbol | null {
  const trimmed = raw.trim().toUpperCase();
  const stripped = trimmed.replace(/^(SH|SZ)/, '').replace(/\.(SH|SZ|SS)$/, '');
  return isValidSymbol(stripped) ? stripped : null;
}

/**
 * Infer the listing exchange from the code prefix.
 *
 * Known fund prefixes take precedence; otherwise codes starting with 0, 2
 * or 3 are Shenzhen and everything else is Shanghai.
 */
export function resolveExchange(symbol: CanonicalSymbol): Exchange {
  const prefix = symbol.slice(0, 3);
  if (SHANGHAI_FUND_PREFIXES.includes(prefix)) {
    return 'SH';
  }
  if (SHENZHEN_FUND_PREFIXES.includes(prefix)) {
    return 'SZ';
  }
  const first = symbol.charAt(0);
  if (first === '0' || first === '2' || first === '3') {
    return 'SZ';
  }
  return 'SH';
}

/**
 * Normalize a raw symbol to canonical format
 *
 * @throws {InvalidSymbolError} If the input cannot be reduced to six digits
 *
 * @example
 * ```typescript
 * normalizeSymbol('510300')    // → { canonical: '510300', exchange: 'SH', qualified: '510300.SH' }
 * normalizeSymbol('sz159915')  // → { canonical: '159915', exchange: 'SZ', qualified: '159915.SZ' }
 * ```
 */
export function normalizeSymbol(raw: string): NormalizedSymbol {
  const canonical = stripDecoration(raw);
  if (canonical === null) {
    throw new InvalidSymbolError(raw);
  }

  const exchange = resolveExchange(canonical);
  return {
    canonical,
    exchange,
    qualified: `${canonical}.${exchange}`,
  };
}

/**
 * Split a list into canonical symbols and rejects, deduplicating the valid ones
 * in first-seen order. Inputs are checked as-is, without stripping decoration.
 */
export function partitionSymbols(symbols: readonly string[]): { valid: CanonicalSymbol[]; invalid: string[] } {
  const valid: CanonicalSymbol[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();

  for (const symbol of symbols) {
    if (!isValidSymbol(symbol)) {
      invalid.push(symbol);
      continue;
    }
    if (!seen.has(symbol)) {
      seen.add(symbol);
      valid.push(symbol);
    }
  }

  return { valid, invalid };
}
