/**
 * Namespaced on-disk cache for snapshots, series and instrument metadata.
 *
 * One file per (namespace, symbol[, period]). Writes go to a hidden temp file
 * in the same directory and are renamed into place, so concurrent readers
 * (including other processes sharing the directory) never observe a partial
 * entry. Reads check the file's mtime against the namespace TTL before the
 * payload is opened.
 */

import { randomUUID } from 'node:crypto'
import { constants } from 'node:fs'
import { access, mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { ConfigurationError, describeError } from '@etfpulse/contracts'
import { createNullLogger } from '@etfpulse/logger'
import type { Logger } from '@etfpulse/logger'
import { CODECS } from './codec.js'
import { DEFAULT_MAX_TOTAL_BYTES, DEFAULT_TARGET_RATIO, isFresh, resolveTtls } from './freshness.js'
import { NAMESPACES } from './types.js'
import type {
  CacheFile,
  CacheKey,
  CacheStats,
  CacheValueMap,
  CleanupResult,
  EnforceBudgetOptions,
  EnforceBudgetResult,
  ExpiredCounts,
  FileCacheOptions,
  Namespace,
  NamespaceStats,
} from './types.js'

/**
 * Characters allowed in key segments; keeps every entry inside its namespace directory.
 */
const KEY_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9.-]*$/

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT'
}

/**
 * File-backed cache with per-namespace TTL and a total size budget.
 *
 * Example:
 * ```typescript
 * const cache = await FileCache.open({ cacheDir: './data/cache', logger })
 *
 * await cache.put('historical', { symbol: '510300', period: '60d' }, series)
 * const hit = await cache.get('historical', { symbol: '510300', period: '60d' })
 *
 * await cache.cleanup(false)
 * ```
 */
export class FileCache {
  readonly cacheDir: string
  private readonly ttlMs: Record<Namespace, number>
  private readonly maxTotalBytes: number
  private readonly targetRatio: number
  private readonly logger: Logger
  private readonly now: () => number

  private constructor(options: FileCacheOptions) {
    this.cacheDir = path.resolve(options.cacheDir)
    this.ttlMs = resolveTtls(options.ttlMs)
    this.maxTotalBytes = options.maxTotalBytes ?? DEFAULT_MAX_TOTAL_BYTES
    this.targetRatio = options.targetRatio ?? DEFAULT_TARGET_RATIO
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'file-cache' })
    this.now = options.now ?? Date.now
  }

  /**
   * Validate options and create the namespace directories.
   *
   * @throws {ConfigurationError} If an option is out of range or the directory is unusable
   */
  static async open(options: FileCacheOptions): Promise<FileCache> {
    const cache = new FileCache(options)
    cache.validate()

    try {
      for (const namespace of NAMESPACES) {
        const dir = cache.namespaceDir(namespace)
        await mkdir(dir, { recursive: true })
        await access(dir, constants.R_OK | constants.W_OK)
      }
    } catch (error) {
      throw new ConfigurationError(`Cache directory is not usable: ${cache.cacheDir}`, {
        cacheDir: cache.cacheDir,
        reason: describeError(error),
      })
    }

    cache.logger.info('File cache ready', {
      cacheDir: cache.cacheDir,
      maxTotalBytes: cache.maxTotalBytes,
      ttlMs: cache.ttlMs,
    })
    return cache
  }

  private validate(): void {
    for (const namespace of NAMESPACES) {
      const ttl = this.ttlMs[namespace]
      if (!Number.isFinite(ttl) || ttl <= 0) {
        throw new ConfigurationError(`TTL for namespace "${namespace}" must be a positive number`, {
          namespace,
          ttlMs: ttl,
        })
      }
    }
    if (!Number.isFinite(this.maxTotalBytes) || this.maxTotalBytes <= 0) {
      throw new ConfigurationError('maxTotalBytes must be a positive number', { maxTotalBytes: this.maxTotalBytes })
    }
    if (!(this.targetRatio > 0 && this.targetRatio <= 1)) {
      throw new ConfigurationError('targetRatio must be in (0, 1]', { targetRatio: this.targetRatio })
    }
  }

  /**
   * Absolute path of the file backing an entry, or null when the key cannot
   * address a file (missing period for historical, unsafe characters).
   */
  entryPath(namespace: Namespace, key: CacheKey): string | null {
    if (!KEY_SEGMENT.test(key.symbol)) {
      return null
    }

    const { extension } = CODECS[namespace]
    if (namespace === 'historical') {
      if (key.period === undefined || !KEY_SEGMENT.test(key.period)) {
        return null
      }
      return path.join(this.namespaceDir(namespace), `${key.symbol}_${key.period}${extension}`)
    }
    return path.join(this.namespaceDir(namespace), `${key.symbol}${extension}`)
  }

  /**
   * Persist a value. Returns false (and logs) instead of throwing on failure.
   */
  async put<N extends Namespace>(namespace: N, key: CacheKey, value: CacheValueMap[N]): Promise<boolean> {
    const filePath = this.entryPath(namespace, key)
    if (filePath === null) {
      this.logger.warn('Refusing to cache entry with invalid key', { namespace, symbol: key.symbol, period: key.period })
      return false
    }

    const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`)
    const codec: { encode(value: CacheValueMap[N], cachedAt: string): Promise<Buffer> } = CODECS[namespace]

    try {
      const payload = await codec.encode(value, new Date(this.now()).toISOString())
      await writeFile(tmpPath, payload)
      await rename(tmpPath, filePath)
      this.logger.debug('Cache entry written', { namespace, symbol: key.symbol, period: key.period, bytes: payload.length })
      return true
    } catch (error) {
      this.logger.warn('Failed to write cache entry', {
        namespace,
        symbol: key.symbol,
        period: key.period,
        error: describeError(error),
      })
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug('Failed to remove temp file', { tmpPath, error: describeError(cleanupError) })
      })
      return false
    }
  }

  /**
   * Read a value if present, fresh and decodable; otherwise null.
   */
  async get<N extends Namespace>(namespace: N, key: CacheKey): Promise<CacheValueMap[N] | null> {
    const filePath = this.entryPath(namespace, key)
    if (filePath === null) {
      return null
    }

    try {
      const info = await stat(filePath)
      if (!isFresh(info.mtimeMs, this.ttlMs[namespace], this.now())) {
        this.logger.debug('Cache entry expired', { namespace, symbol: key.symbol, period: key.period, cache: 'miss' })
        return null
      }

      const codec: { decode(raw: Buffer): Promise<CacheValueMap[N] | null> } = CODECS[namespace]
      const value = await codec.decode(await readFile(filePath))
      if (value === null) {
        this.logger.warn('Corrupt cache entry ignored', { namespace, symbol: key.symbol, period: key.period })
        return null
      }

      this.logger.debug('Cache hit', { namespace, symbol: key.symbol, period: key.period, cache: 'hit' })
      return value
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn('Failed to read cache entry', {
          namespace,
          symbol: key.symbol,
          period: key.period,
          error: describeError(error),
        })
      }
      return null
    }
  }

  /**
   * Delete one entry. Returns true if a file was removed.
   */
  async invalidate(namespace: Namespace, key: CacheKey): Promise<boolean> {
    const filePath = this.entryPath(namespace, key)
    if (filePath === null) {
      return false
    }
    return this.deleteFile(filePath)
  }

  /**
   * Delete every entry whose age has reached its namespace TTL.
   */
  async invalidateExpired(): Promise<ExpiredCounts> {
    const counts: ExpiredCounts = { current: 0, historical: 0, info: 0 }
    const now = this.now()

    for (const file of await this.listFiles()) {
      if (isFresh(file.mtimeMs, this.ttlMs[file.namespace], now)) {
        continue
      }
      if (await this.deleteFile(file.path)) {
        counts[file.namespace] += 1
      }
    }

    const total = counts.current + counts.historical + counts.info
    if (total > 0) {
      this.logger.info('Expired cache entries removed', { ...counts, count: total })
    }
    return counts
  }

  /**
   * Evict oldest-modified entries first until the total size is at most
   * `targetRatio` of the budget. Does nothing unless the budget is exceeded
   * or `force` is set.
   */
  async enforceSizeBudget(options: EnforceBudgetOptions = {}): Promise<EnforceBudgetResult> {
    const budget = options.maxTotalBytes ?? this.maxTotalBytes
    const files = await this.listFiles()
    let totalBytes = files.reduce((sum, file) => sum + file.size, 0)

    if (totalBytes <= budget && options.force !== true) {
      return { deleted: 0, freedBytes: 0, totalBytes }
    }

    const target = budget * this.targetRatio
    const oldestFirst = [...files].sort((a, b) => a.mtimeMs - b.mtimeMs || a.path.localeCompare(b.path))
    let deleted = 0
    let freedBytes = 0

    this.logger.info('Cache over budget, evicting', { totalBytes, budget, target, force: options.force === true })

    for (const file of oldestFirst) {
      if (totalBytes <= target) {
        break
      }
      const outcome = await this.removeFile(file.path)
      if (outcome === 'failed') {
        // eviction is strictly oldest first
        this.logger.warn('Cache eviction stopped at undeletable file', { path: file.path, totalBytes })
        break
      }
      totalBytes -= file.size
      if (outcome === 'deleted') {
        deleted += 1
        freedBytes += file.size
      }
    }

    this.logger.info('Cache eviction finished', { count: deleted, freedBytes, totalBytes })
    return { deleted, freedBytes, totalBytes }
  }

  /**
   * Remove expired entries, then enforce the size budget.
   */
  async cleanup(force = false): Promise<CleanupResult> {
    const expired = await this.invalidateExpired()
    const budget = await this.enforceSizeBudget({ force })
    return { expired, budget }
  }

  /**
   * Sizes and counts per namespace. Read-only.
   */
  async stats(): Promise<CacheStats> {
    const namespaces: Record<Namespace, NamespaceStats> = {
      current: { files: 0, bytes: 0, ttlMs: this.ttlMs.current },
      historical: { files: 0, bytes: 0, ttlMs: this.ttlMs.historical },
      info: { files: 0, bytes: 0, ttlMs: this.ttlMs.info },
    }

    for (const file of await this.listFiles()) {
      namespaces[file.namespace].files += 1
      namespaces[file.namespace].bytes += file.size
    }

    return {
      cacheDir: this.cacheDir,
      namespaces,
      totalFiles: namespaces.current.files + namespaces.historical.files + namespaces.info.files,
      totalBytes: namespaces.current.bytes + namespaces.historical.bytes + namespaces.info.bytes,
      maxTotalBytes: this.maxTotalBytes,
      targetRatio: this.targetRatio,
    }
  }

  /**
   * Scan namespace directories. Hidden files (in-progress writes) are skipped,
   * as are files removed between listing and stat.
   */
  async listFiles(): Promise<CacheFile[]> {
    const files: CacheFile[] = []

    for (const namespace of NAMESPACES) {
      const dir = this.namespaceDir(namespace)
      let names: string[]
      try {
        names = await readdir(dir)
      } catch (error) {
        if (isNotFound(error)) {
          continue
        }
        throw error
      }

      for (const name of names) {
        if (name.startsWith('.')) {
          continue
        }
        const filePath = path.join(dir, name)
        try {
          const info = await stat(filePath)
          if (info.isFile()) {
            files.push({ namespace, path: filePath, size: info.size, mtimeMs: info.mtimeMs })
          }
        } catch (error) {
          if (!isNotFound(error)) {
            throw error
          }
        }
      }
    }

    return files
  }

  private namespaceDir(namespace: Namespace): string {
    return path.join(this.cacheDir, namespace)
  }

  private async deleteFile(filePath: string): Promise<boolean> {
    return (await this.removeFile(filePath)) === 'deleted'
  }

  private async removeFile(filePath: string): Promise<'deleted' | 'missing' | 'failed'> {
    try {
      await unlink(filePath)
      return 'deleted'
    } catch (error) {
      if (isNotFound(error)) {
        return 'missing'
      }
      this.logger.warn('Failed to delete cache file', { path: filePath, error: describeError(error) })
      return 'failed'
    }
  }
}
