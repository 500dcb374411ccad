/**
 * Cache freshness and TTL policies per namespace.
 *
 * Expiry is measured from the file's modification time, not from any
 * timestamp stored inside the entry, so touching or deleting a file from
 * outside the process is a supported way to refresh or invalidate it.
 */

import type { Namespace } from './types.js'

const HOUR_MS = 60 * 60 * 1000

/**
 * Default time-to-live per namespace.
 *
 * - current: snapshots are rewritten by the daily sweep
 * - historical: bars for a period change once per trading day
 * - info: descriptive metadata rarely changes
 */
export const DEFAULT_TTL_MS: Readonly<Record<Namespace, number>> = {
  current: 24 * HOUR_MS,
  historical: 24 * HOUR_MS,
  info: 7 * 24 * HOUR_MS,
}

/**
 * Default size budget across all namespaces.
 */
export const DEFAULT_MAX_TOTAL_BYTES = 100 * 1024 * 1024

/**
 * Fraction of the budget that eviction shrinks the cache to.
 */
export const DEFAULT_TARGET_RATIO = 0.8

/**
 * Check whether an entry written at `mtimeMs` is still valid.
 *
 * Valid iff `now - mtime < ttl`; an entry exactly `ttl` old is expired.
 *
 * Example:
 * ```typescript
 * isFresh(Date.now() - 1000, 24 * 3600 * 1000) // true
 * ```
 */
export function isFresh(mtimeMs: number, ttlMs: number, now: number = Date.now()): boolean {
  return now - mtimeMs < ttlMs
}

/**
 * Resolve effective TTLs from optional overrides.
 */
export function resolveTtls(overrides: Partial<Record<Namespace, number>> = {}): Record<Namespace, number> {
  return {
    current: overrides.current ?? DEFAULT_TTL_MS.current,
    historical: overrides.historical ?? DEFAULT_TTL_MS.historical,
    info: overrides.info ?? DEFAULT_TTL_MS.info,
  }
}
