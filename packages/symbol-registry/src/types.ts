/**
 * Core types for exchange symbol handling
 */

/**
 * Canonical symbol representation: exactly six ASCII digits
 * Examples: "510300", "159915", "588000"
 */
export type CanonicalSymbol = string;

/**
 * Listing exchange
 * SH = Shanghai, SZ = Shenzhen
 */
export type Exchange = 'SH' | 'SZ';

/**
 * Result of symbol normalization
 */
export interface NormalizedSymbol {
  /** Canonical six-digit code */
  canonical: CanonicalSymbol;

  /** Inferred listing exchange */
  exchange: Exchange;

  /** Vendor-qualified form, e.g. "510300.SH" */
  qualified: string;
}
