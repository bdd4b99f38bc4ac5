import fs from "node:fs/promises"
import path from "node:path"
import { randomUUID } from "node:crypto"
import {
  CacheCorruptError,
  CacheWriteError,
  EventStudyError,
  PriceFetchError,
  errorMessage,
} from "../study/errors"
import { normalizeTicker } from "../study/ticker"
import { assertRange, rangeCovers } from "../util/date"
import { Log } from "../util/log"
import { decodePriceSeries, encodePriceSeries } from "./codec"
import { createPriceSeries, sortAndDedupe } from "./series"
import type { PriceSource } from "./source"
import type { DateRange, PriceSeries } from "../study/types"

/** The file operations the cache performs; swapped in tests to simulate crashes. */
export interface CacheFileSystem {
  readFile(file: string, encoding: "utf8"): Promise<string>
  writeFile(file: string, data: string, encoding: "utf8"): Promise<void>
  rename(from: string, to: string): Promise<void>
  mkdir(dir: string, options: { recursive: true }): Promise<unknown>
  rm(file: string, options: { force: true }): Promise<void>
}

export const nodeFileSystem: CacheFileSystem = {
  readFile: (file, encoding) => fs.readFile(file, encoding),
  writeFile: (file, data, encoding) => fs.writeFile(file, data, encoding),
  rename: (from, to) => fs.rename(from, to),
  mkdir: (dir, options) => fs.mkdir(dir, options),
  rm: (file, options) => fs.rm(file, options),
}

export type CacheInspection =
  | { state: "absent"; path: string }
  | { state: "covering"; path: string; series: PriceSeries }
  | { state: "partial"; path: string; series: PriceSeries }
  | { state: "corrupt"; path: string; error: CacheCorruptError }

export type CacheState = CacheInspection["state"]

export type PriceLookup = {
  series: PriceSeries
  origin: "cache" | "network" | "stale-cache"
  path: string
}

export type PriceCacheGetOptions = {
  /** Skip the cache and replace the entry with a fresh fetch. */
  refresh?: boolean
  /** On fetch failure, return a cached entry that does not cover the range instead of throwing. */
  allowStale?: boolean
  signal?: AbortSignal
}

export type PriceCacheStats = {
  hits: number
  misses: number
  fetches: number
  writes: number
  stale_served: number
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

// An entry never claims sessions after the day it was fetched, so a later
// run sees the range as partial and refetches.
function recordedRange(range: DateRange, fetchedAt: string): DateRange {
  const today = fetchedAt.slice(0, 10)
  if (range.end <= today) return range
  return { start: range.start, end: range.start > today ? range.start : today }
}

/** `_` doubles as the escape marker, so it is escaped too. */
export function cacheFileName(ticker: string) {
  const escaped = [...ticker].map((char) => (/[A-Za-z0-9.-]/.test(char) ? char : `_${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`))
  return `${escaped.join("")}.csv`
}

export class PriceCache {
  private readonly pending = new Map<string, Promise<void>>()
  private readonly counters: PriceCacheStats = {
    hits: 0,
    misses: 0,
    fetches: 0,
    writes: 0,
    stale_served: 0,
  }
  private readonly fileSystem: CacheFileSystem
  private readonly logger: Log.Logger
  private readonly now: () => Date

  constructor(
    private readonly input: {
      directory: string
      source: PriceSource
      logger?: Log.Logger
      fileSystem?: CacheFileSystem
      now?: () => Date
    },
  ) {
    this.fileSystem = input.fileSystem ?? nodeFileSystem
    this.logger = input.logger ?? Log.silent
    this.now = input.now ?? (() => new Date())
  }

  get directory() {
    return this.input.directory
  }

  pathFor(ticker: string) {
    return path.join(this.input.directory, cacheFileName(this.symbol(ticker)))
  }

  stats(): PriceCacheStats {
    return { ...this.counters }
  }

  async inspect(ticker: string, range: DateRange): Promise<CacheInspection> {
    const symbol = this.symbol(ticker)
    const file = this.pathFor(symbol)
    let text: string
    try {
      text = await this.fileSystem.readFile(file, "utf8")
    } catch (error) {
      if (isMissingFile(error)) return { state: "absent", path: file }
      return {
        state: "corrupt",
        path: file,
        error: new CacheCorruptError(`Cannot read cache entry for ${symbol}: ${errorMessage(error)}`, file),
      }
    }

    try {
      const series = decodePriceSeries(text, file, symbol)
      if (rangeCovers(series.range, range)) return { state: "covering", path: file, series }
      return { state: "partial", path: file, series }
    } catch (error) {
      if (error instanceof CacheCorruptError) return { state: "corrupt", path: file, error }
      throw error
    }
  }

  async get(ticker: string, range: DateRange, options: PriceCacheGetOptions = {}): Promise<PriceSeries> {
    const lookup = await this.lookup(ticker, range, options)
    return lookup.series
  }

  /** Like `get`, and also reports where the series came from. */
  async lookup(ticker: string, range: DateRange, options: PriceCacheGetOptions = {}): Promise<PriceLookup> {
    const symbol = this.symbol(ticker)
    assertRange(range)
    return this.serialize(this.pathFor(symbol), () => this.resolve(symbol, range, options))
  }

  private symbol(ticker: string) {
    const symbol = normalizeTicker(ticker)
    if (!symbol) throw new PriceFetchError(`Invalid ticker symbol: ${ticker}`, ticker)
    return symbol
  }

  // Calls for one cache file run one after another; a caller that queued
  // behind a fetch finds the fresh entry and is served from disk.
  private async serialize<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(key) ?? Promise.resolve()
    const run = previous.then(fn)
    const tail = run.then(
      () => undefined,
      () => undefined,
    )
    this.pending.set(key, tail)
    try {
      return await run
    } finally {
      if (this.pending.get(key) === tail) this.pending.delete(key)
    }
  }

  private async resolve(ticker: string, range: DateRange, options: PriceCacheGetOptions): Promise<PriceLookup> {
    const inspection = options.refresh ? null : await this.inspect(ticker, range)

    if (inspection?.state === "covering") {
      this.counters.hits++
      this.logger.debug("cache hit", { ticker, path: inspection.path })
      return { series: inspection.series, origin: "cache", path: inspection.path }
    }

    this.counters.misses++
    if (inspection?.state === "partial") {
      this.logger.info("cache entry does not cover requested range, refetching", {
        ticker,
        cached: inspection.series.range,
        requested: range,
      })
    }
    if (inspection?.state === "corrupt") {
      this.logger.warn("cache entry is unreadable, refetching", { ticker, reason: inspection.error.message })
    }

    let series: PriceSeries
    try {
      series = await this.fetch(ticker, range, options.signal)
    } catch (error) {
      const failure =
        error instanceof PriceFetchError
          ? error
          : new PriceFetchError(`Price fetch failed for ${ticker}: ${errorMessage(error)}`, ticker, false, {
              cause: error instanceof Error ? error.name : undefined,
            })
      return this.fallback(ticker, range, failure, options)
    }

    const file = this.pathFor(ticker)
    await this.writeAtomic(file, encodePriceSeries(series))
    this.counters.writes++
    this.logger.debug("cache entry written", { ticker, path: file, rows: series.rows.length })
    return { series, origin: "network", path: file }
  }

  private async fetch(ticker: string, range: DateRange, signal?: AbortSignal) {
    this.counters.fetches++
    this.logger.info("fetching prices", { ticker, source: this.input.source.id, range })
    const rows = await this.input.source.fetchPrices(ticker, range, signal)
    if (rows.length === 0) {
      throw new PriceFetchError(`Price source ${this.input.source.id} returned no rows for ${ticker}`, ticker, false, {
        range,
      })
    }
    const fetchedAt = this.now().toISOString()
    try {
      return createPriceSeries({
        ticker,
        rows: sortAndDedupe(rows),
        fetched_at: fetchedAt,
        range: recordedRange(range, fetchedAt),
        source: this.input.source.id,
      })
    } catch (error) {
      throw new PriceFetchError(`Price source returned an invalid series for ${ticker}: ${errorMessage(error)}`, ticker)
    }
  }

  private async fallback(
    ticker: string,
    range: DateRange,
    failure: PriceFetchError,
    options: PriceCacheGetOptions,
  ): Promise<PriceLookup> {
    if (!options.allowStale) throw failure

    // a refresh skipped inspection; look again before giving up
    const inspection = await this.inspect(ticker, range)
    if (inspection.state !== "covering" && inspection.state !== "partial") throw failure

    this.counters.stale_served++
    this.logger.warn("serving stale cache entry after fetch failure", {
      ticker,
      cached: inspection.series.range,
      requested: range,
      reason: failure.message,
    })
    return { series: inspection.series, origin: "stale-cache", path: inspection.path }
  }

  private async writeAtomic(file: string, content: string) {
    const temp = `${file}.${process.pid}.${randomUUID()}.tmp`
    try {
      await this.fileSystem.mkdir(path.dirname(file), { recursive: true })
      await this.fileSystem.writeFile(temp, content, "utf8")
      await this.fileSystem.rename(temp, file)
    } catch (error) {
      await this.fileSystem.rm(temp, { force: true }).catch((cleanup: unknown) => {
        this.logger.warn("could not remove temporary cache file", { path: temp, reason: errorMessage(cleanup) })
      })
      if (error instanceof EventStudyError) throw error
      throw new CacheWriteError(`Failed writing cache entry ${file}: ${errorMessage(error)}`, file)
    }
  }
}
