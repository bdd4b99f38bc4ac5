import { HuggingFaceDatasetSource, type DatasetSource } from "../dataset/source"
import { RevisionedDatasetLoader, type LoadReport } from "../dataset/loader"
import { PriceCache, cacheFileName, type CacheFileSystem, type PriceLookup } from "../prices/cache"
import { YahooPriceSource } from "../prices/yahoo"
import { ReturnsEngine } from "../study/engine"
import { CacheWriteError, PriceFetchError, errorMessage } from "../study/errors"
import { DataQualityLog } from "../study/quality"
import { groupBy, groupByTicker, priceRangeFor } from "../study/ranges"
import { mapInBatches } from "../util/batch"
import { Log } from "../util/log"
import { writeArtifacts } from "./artifacts"
import { toCsv, toJson } from "./export"
import { toDashboard } from "./render"
import { countStatuses, type RunSummary } from "./summary"
import type { Config } from "../config/config"
import type { PriceSource } from "../prices/source"
import type { DateRange, EnrichedRow, PriceSeries, SentimentEvent } from "../study/types"
import type { FetchLike } from "../util/fetch"

export const ARTIFACT = {
  csv: "enriched-events.csv",
  json: "enriched-events.json",
  dashboard: "dashboard.md",
  manifest: "run-manifest.json",
  tickers: "tickers",
} as const

export type RunDeps = {
  datasetSource?: DatasetSource
  priceSource?: PriceSource
  logger?: Log.Logger
  now?: () => Date
  /** Used by the default network sources. */
  fetch?: FetchLike
  cacheFileSystem?: CacheFileSystem
  signal?: AbortSignal
}

export type RunResult = {
  rows: readonly EnrichedRow[]
  summary: RunSummary
  report: LoadReport
  artifacts: Record<string, string>
}

function defaultDatasetSource(config: Config.Run, deps: RunDeps): DatasetSource {
  return new HuggingFaceDatasetSource({
    dataset: config.hf_dataset_name,
    file: config.hf_dataset_file,
    token: config.hf_token ?? undefined,
    fetch: deps.fetch,
  })
}

function defaultPriceSource(config: Config.Run, deps: RunDeps, logger: Log.Logger): PriceSource {
  return new YahooPriceSource({
    attempts: config.price_fetch_attempts,
    timeoutMs: config.price_fetch_timeout_ms,
    fetch: deps.fetch,
    logger,
  })
}

function rangeFor(config: Config.Run, events: readonly SentimentEvent[]): DateRange | null {
  return priceRangeFor(events, {
    maxWindow: Math.max(...config.windows),
    anchorSearchDays: config.anchor_search_days,
    paddingDays: config.range_padding_days,
  })
}

/**
 * One full run: load the pinned dataset, resolve the benchmark (fatal on
 * failure) and every event ticker through the price cache, compute the
 * enriched table, then write the artifacts.
 */
export async function runEventStudy(config: Config.Run, deps: RunDeps = {}): Promise<RunResult> {
  const logger = deps.logger ?? Log.create({ service: "event-study", level: config.log_level })
  const now = deps.now ?? (() => new Date())
  const quality = new DataQualityLog(logger.child("quality"))

  const loader = new RevisionedDatasetLoader({
    source: deps.datasetSource ?? defaultDatasetSource(config, deps),
    sectorFilter: config.sector_filter,
    logger: logger.child("dataset"),
    quality,
  })
  const { events, report } = await loader.load(config.hf_dataset_revision, deps.signal)

  const cache = new PriceCache({
    directory: config.price_cache_dir,
    source: deps.priceSource ?? defaultPriceSource(config, deps, logger.child("yahoo")),
    logger: logger.child("cache"),
    fileSystem: deps.cacheFileSystem,
    now,
  })
  const options = {
    refresh: config.refresh_cache,
    allowStale: config.allow_stale_cache,
    signal: deps.signal,
  }
  if (config.refresh_cache) logger.info("refreshing every price series touched by this run")

  const noteStale = (lookup: PriceLookup, ticker: string) => {
    if (lookup.origin !== "stale-cache") return
    quality.record("stale_served", `served stale prices for ${ticker}`, {
      ticker,
      cached: lookup.series.range,
    })
  }

  let rows: EnrichedRow[] = []
  const benchmarkRange = rangeFor(config, events)
  if (benchmarkRange) {
    let benchmark: PriceSeries
    try {
      const lookup = await cache.lookup(config.benchmark_ticker, benchmarkRange, options)
      noteStale(lookup, config.benchmark_ticker)
      benchmark = lookup.series
    } catch (error) {
      if (error instanceof PriceFetchError) throw error.asBenchmark()
      throw error
    }

    const groups = [...groupByTicker(events).entries()]
    const resolved = await mapInBatches(groups, config.price_fetch_concurrency, async ([ticker, items]) => {
      const range = rangeFor(config, items)
      if (!range) return null
      try {
        const lookup = await cache.lookup(ticker, range, options)
        noteStale(lookup, ticker)
        return [ticker, lookup.series] as const
      } catch (error) {
        if (!(error instanceof PriceFetchError || error instanceof CacheWriteError)) throw error
        quality.record("price_fetch_failed", `prices unavailable for ${ticker}`, {
          ticker,
          events: items.length,
          reason: errorMessage(error),
        })
        return null
      }
    })

    const series = new Map<string, PriceSeries>()
    resolved.forEach((entry) => {
      if (entry) series.set(entry[0], entry[1])
    })

    const engine = new ReturnsEngine({
      windows: config.windows,
      basis: config.window_basis,
      anchorSearchDays: config.anchor_search_days,
      consensusField: config.consensus_field,
      logger: logger.child("returns"),
      quality,
    })
    rows = engine.compute(events, { series, benchmark })
  } else {
    logger.warn("dataset produced no events; skipping price resolution")
  }

  const generatedAt = now()
  const summary: RunSummary = {
    generated_at: generatedAt.toISOString(),
    dataset: {
      name: report.dataset,
      file: report.file,
      revision: report.revision,
    },
    benchmark: config.benchmark_ticker,
    windows: config.windows,
    events: events.length,
    rows: countStatuses(rows),
    load: report,
    quality: quality.snapshot(),
    cache: cache.stats(),
  }

  const files: Record<string, string> = {
    [ARTIFACT.csv]: toCsv(rows, config.windows),
    [ARTIFACT.json]: toJson(rows, config.windows),
    [ARTIFACT.dashboard]: toDashboard({ rows, summary }),
  }
  groupBy(rows, (row) => row.event.ticker).forEach((items, ticker) => {
    files[`${ARTIFACT.tickers}/${cacheFileName(ticker)}`] = toCsv(items, config.windows)
  })
  files[ARTIFACT.manifest] = `${JSON.stringify(
    {
      ...summary,
      window_basis: config.window_basis,
      anchor_search_days: config.anchor_search_days,
      sector_filter: config.sector_filter,
      refresh_cache: config.refresh_cache,
      allow_stale_cache: config.allow_stale_cache,
      price_cache_dir: config.price_cache_dir,
      config_path: config.config_path,
      files: Object.keys(files).toSorted(),
    },
    null,
    2,
  )}\n`

  const artifacts = await writeArtifacts({
    outputRoot: config.output_dir,
    files,
    archive: Object.values(ARTIFACT),
    now: generatedAt,
  })
  logger.info("artifacts written", { output_dir: config.output_dir, files: Object.keys(artifacts).length })

  return { rows, summary, report, artifacts }
}
