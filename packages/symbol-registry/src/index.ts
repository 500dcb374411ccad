/**
 * @etfpulse/symbol-registry
 *
 * Exchange symbol validation, normalization and exchange inference
 *
 * @example
 * ```typescript
 * import { isValidSymbol, normalizeSymbol, resolveExchange } from '@etfpulse/symbol-registry';
 *
 * isValidSymbol('510300');                 // → true
 * normalizeSymbol('sz159915').qualified;   // → '159915.SZ'
 * resolveExchange('588000');               // → 'SH'
 * ```
 */

// Export types
export type { CanonicalSymbol, Exchange, NormalizedSymbol } from './types.js';

// Export normalization functions
export { isValidSymbol, stripDecoration, resolveExchange, normalizeSymbol, partitionSymbols } from './normalize.js';
