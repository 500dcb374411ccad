/**
 * Serialization of cache entries.
 *
 * Snapshots and info are flat JSON records plus `cachedAt`. Series are a
 * gzip-compressed columnar table (one array per OHLCV field) with a small
 * metadata header. Decoding validates the shape; anything that does not
 * match decodes to null and is treated as a miss by the caller.
 */

import { promisify } from 'node:util'
import { gunzip, gzip } from 'node:zlib'
import { z } from 'zod'
import { createSeries } from '@etfpulse/contracts'
import type { HistoricalSeries, PriceBar } from '@etfpulse/contracts'
import type { CacheValueMap, Namespace } from './types.js'

const gzipAsync = promisify(gzip)
const gunzipAsync = promisify(gunzip)

export interface Codec<T> {
  /** File extension including the leading dot */
  readonly extension: string
  encode(value: T, cachedAt: string): Promise<Buffer>
  decode(raw: Buffer): Promise<T | null>
}

const snapshotSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  lastPrice: z.number(),
  previousClose: z.number(),
  changePercent: z.number(),
  volume: z.number(),
  marketCap: z.number().nullable(),
  currency: z.string(),
  asOf: z.string(),
})

const infoSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  fullName: z.string().optional(),
  fundType: z.string().optional(),
  company: z.string().optional(),
  listingDate: z.string().optional(),
  marketCap: z.number().nullable().optional(),
  currency: z.string(),
  asOf: z.string(),
})

const seriesTableSchema = z
  .object({
    symbol: z.string(),
    period: z.string(),
    start: z.string(),
    end: z.string(),
    cachedAt: z.string(),
    columns: z.object({
      timestamp: z.array(z.string()),
      open: z.array(z.number()),
      high: z.array(z.number()),
      low: z.array(z.number()),
      close: z.array(z.number()),
      volume: z.array(z.number()),
    }),
  })
  .refine(
    ({ columns }) => {
      const length = columns.timestamp.length
      return (
        length > 0 &&
        columns.open.length === length &&
        columns.high.length === length &&
        columns.low.length === length &&
        columns.close.length === length &&
        columns.volume.length === length
      )
    },
    { message: 'columns must be non-empty and of equal length' }
  )

function parseJson(raw: Buffer): unknown {
  try {
    const parsed: unknown = JSON.parse(raw.toString('utf8'))
    return parsed
  } catch {
    return undefined
  }
}

function jsonCodec<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Codec<T> {
  return {
    extension: '.json',

    async encode(value, cachedAt) {
      return Buffer.from(JSON.stringify({ ...value, cachedAt }), 'utf8')
    },

    async decode(raw) {
      const result = schema.safeParse(parseJson(raw))
      return result.success ? result.data : null
    },
  }
}

const seriesCodec: Codec<HistoricalSeries> = {
  extension: '.json.gz',

  async encode(series, cachedAt) {
    const table = {
      symbol: series.symbol,
      period: series.period,
      start: series.start,
      end: series.end,
      cachedAt,
      columns: {
        timestamp: series.bars.map((bar) => bar.timestamp),
        open: series.bars.map((bar) => bar.open),
        high: series.bars.map((bar) => bar.high),
        low: series.bars.map((bar) => bar.low),
        close: series.bars.map((bar) => bar.close),
        volume: series.bars.map((bar) => bar.volume),
      },
    }
    return gzipAsync(Buffer.from(JSON.stringify(table), 'utf8'))
  },

  async decode(raw) {
    let inflated: Buffer
    try {
      inflated = await gunzipAsync(raw)
    } catch {
      return null
    }

    const result = seriesTableSchema.safeParse(parseJson(inflated))
    if (!result.success) {
      return null
    }

    const { symbol, period, columns } = result.data
    const bars: PriceBar[] = []
    columns.timestamp.forEach((timestamp, i) => {
      bars.push({
        timestamp,
        open: columns.open[i] ?? Number.NaN,
        high: columns.high[i] ?? Number.NaN,
        low: columns.low[i] ?? Number.NaN,
        close: columns.close[i] ?? Number.NaN,
        volume: columns.volume[i] ?? 0,
      })
    })

    // Re-establish ordering invariants; an entry with no parseable bars is a miss
    try {
      return createSeries(symbol, period, bars)
    } catch {
      return null
    }
  },
}

/**
 * Codec per namespace.
 */
export const CODECS: { [N in Namespace]: Codec<CacheValueMap[N]> } = {
  current: jsonCodec(snapshotSchema),
  historical: seriesCodec,
  info: jsonCodec(infoSchema),
}
