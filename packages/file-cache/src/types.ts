/**
 * Core types for the on-disk market data cache.
 */

import type { HistoricalSeries, InstrumentInfo, InstrumentSnapshot } from '@etfpulse/contracts'
import type { Logger } from '@etfpulse/logger'

/**
 * Cache namespaces. Each maps to one subdirectory and one TTL.
 */
export type Namespace = 'current' | 'historical' | 'info'

export const NAMESPACES: readonly Namespace[] = ['current', 'historical', 'info']

/**
 * Value type stored under each namespace.
 */
export interface CacheValueMap {
  current: InstrumentSnapshot
  historical: HistoricalSeries
  info: InstrumentInfo
}

/**
 * Address of one entry.
 *
 * `period` is required for the historical namespace and ignored elsewhere.
 */
export interface CacheKey {
  symbol: string
  period?: string
}

/**
 * Options for FileCache.open().
 */
export interface FileCacheOptions {
  /** Root directory; namespace subdirectories are created beneath it */
  cacheDir: string

  /** Per-namespace TTL overrides in milliseconds */
  ttlMs?: Partial<Record<Namespace, number>>

  /** Size budget across all namespaces in bytes (default 100 MB) */
  maxTotalBytes?: number

  /** Fraction of the budget eviction shrinks to (default 0.8) */
  targetRatio?: number

  logger?: Logger

  /** Time source in Unix ms, compared against file mtimes */
  now?: () => number
}

/**
 * One file found while scanning the cache directory.
 */
export interface CacheFile {
  namespace: Namespace
  path: string
  size: number
  mtimeMs: number
}

/**
 * Deleted entry counts per namespace.
 */
export type ExpiredCounts = Record<Namespace, number>

export interface EnforceBudgetOptions {
  /** Override the configured budget for this call */
  maxTotalBytes?: number

  /** Evict down to the target even when the budget is not exceeded */
  force?: boolean
}

export interface EnforceBudgetResult {
  deleted: number
  freedBytes: number
  /** Total bytes remaining after eviction */
  totalBytes: number
}

export interface CleanupResult {
  expired: ExpiredCounts
  budget: EnforceBudgetResult
}

export interface NamespaceStats {
  files: number
  bytes: number
  ttlMs: number
}

export interface CacheStats {
  cacheDir: string
  namespaces: Record<Namespace, NamespaceStats>
  totalFiles: number
  totalBytes: number
  maxTotalBytes: number
  targetRatio: number
}
