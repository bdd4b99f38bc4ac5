export { Config } from "./config/config"
export { Global } from "./global"
export { validateRevision } from "./dataset/revision"
export { parseDatasetText, formatFromFile, type DatasetFormat, type DatasetRow } from "./dataset/parse"
export { HuggingFaceDatasetSource, type DatasetSource } from "./dataset/source"
export { RevisionedDatasetLoader, DATE_FIELDS, DROP_REASON, type DropReason, type LoadReport, type LoadResult } from "./dataset/loader"
export {
  PriceCache,
  cacheFileName,
  nodeFileSystem,
  type CacheFileSystem,
  type CacheInspection,
  type CacheState,
  type PriceCacheGetOptions,
  type PriceCacheStats,
  type PriceLookup,
} from "./prices/cache"
export { CACHE_FORMAT, decodePriceSeries, encodePriceSeries } from "./prices/codec"
export { createPriceSeries, sortAndDedupe } from "./prices/series"
export type { PriceSource } from "./prices/source"
export { YahooPriceSource, parseChartBars } from "./prices/yahoo"
export { ReturnsEngine, toPriceIndex, type ComputeInput, type ReturnsEngineOptions } from "./study/engine"
export { assignBeatMiss, signFlag } from "./study/beat-miss"
export * from "./study/errors"
export { DataQualityLog, QUALITY_CATEGORY, emptyQualityCounts, type QualityCategory, type QualityCounts } from "./study/quality"
export { groupBy, groupByTicker, priceRangeFor } from "./study/ranges"
export { locateWindowExit, normalizeWindowList, simpleReturn, type PriceIndex, type WindowExit } from "./study/returns"
export { normalizeTicker } from "./study/ticker"
export { alignToNextSession, createTradingCalendar, getSessionByOffset } from "./study/trading-calendar"
export * from "./study/types"
export { ARTIFACT, runEventStudy, type RunDeps, type RunResult } from "./run/pipeline"
export { EXIT_CODE, exitCodeFor, type ExitCode } from "./run/exit-code"
export { exportColumns, flattenRow, toCsv, toJson } from "./run/export"
export { toDashboard, tickerStats } from "./run/render"
export { formatSummary, type RunSummary } from "./run/summary"
export { Log } from "./util/log"
export type { FetchLike } from "./util/fetch"
