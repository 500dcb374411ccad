/**
 * @etfpulse/file-cache
 *
 * Namespaced on-disk cache for market data.
 *
 * - `current/<symbol>.json`: latest snapshot
 * - `info/<symbol>.json`: descriptive metadata
 * - `historical/<symbol>_<period>.json.gz`: gzip columnar bar table
 *
 * Entries expire by file mtime; the total size is kept under a budget by
 * evicting the oldest files first.
 *
 * Example usage:
 * ```typescript
 * import { FileCache } from '@etfpulse/file-cache'
 *
 * const cache = await FileCache.open({ cacheDir: './data/cache' })
 * await cache.put('current', { symbol: snapshot.symbol }, snapshot)
 * const stats = await cache.stats()
 * ```
 */

export * from './types.js'
export { FileCache } from './fileCache.js'
export { DEFAULT_TTL_MS, DEFAULT_MAX_TOTAL_BYTES, DEFAULT_TARGET_RATIO, isFresh, resolveTtls } from './freshness.js'
