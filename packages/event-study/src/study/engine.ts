import { assignBeatMiss } from "./beat-miss"
import { EventStudyError } from "./errors"
import { locateWindowExit, normalizeWindowList, simpleReturn, type PriceIndex } from "./returns"
import { alignToNextSession, createTradingCalendar } from "./trading-calendar"
import { Log } from "../util/log"
import type { DataQualityLog, QualityCategory } from "./quality"
import type { EnrichedRow, IsoDate, PriceSeries, RowStatus, SentimentEvent, WindowBasis, WindowReturn } from "./types"

export type ReturnsEngineOptions = {
  windows: readonly number[]
  basis?: WindowBasis
  anchorSearchDays?: number
  consensusField?: string | null
  logger?: Log.Logger
  quality?: DataQualityLog
}

export type ComputeInput = {
  /** Resolved series per ticker. A ticker with no entry has its rows marked `price_unavailable`. */
  series: ReadonlyMap<string, PriceSeries>
  benchmark: PriceSeries
}

const EXAMPLE_LIMIT = 5

export function toPriceIndex(series: PriceSeries): PriceIndex {
  try {
    return {
      ticker: series.ticker,
      calendar: createTradingCalendar(series.rows.map((row) => row.date)),
      closes: series.rows.map((row) => row.adjusted_close),
    }
  } catch (error) {
    throw EventStudyError.wrap(error, "PRICE_SERIES_INVALID")
  }
}

// Groups misses per category so a large table logs one line per kind.
class MissTally {
  private readonly counts = new Map<QualityCategory, { count: number; examples: string[] }>()

  add(category: QualityCategory, example: string) {
    const entry = this.counts.get(category) ?? { count: 0, examples: [] }
    entry.count++
    if (entry.examples.length < EXAMPLE_LIMIT) entry.examples.push(example)
    this.counts.set(category, entry)
  }

  flush(quality: DataQualityLog | undefined) {
    this.counts.forEach((entry, category) => {
      quality?.record(category, `${entry.count} ${category.replaceAll("_", " ")}`, { examples: entry.examples }, entry.count)
    })
  }
}

/**
 * Raw, benchmark and abnormal simple returns for each event and window.
 * Anything that cannot be computed comes out as null; nothing here throws
 * for a missing price.
 */
export class ReturnsEngine {
  readonly windows: readonly number[]
  readonly basis: WindowBasis
  readonly anchorSearchDays: number
  private readonly logger: Log.Logger

  constructor(private readonly options: ReturnsEngineOptions) {
    this.windows = normalizeWindowList(options.windows)
    this.basis = options.basis ?? "calendar_days"
    this.anchorSearchDays = options.anchorSearchDays ?? 5
    this.logger = options.logger ?? Log.silent
  }

  compute(events: readonly SentimentEvent[], input: ComputeInput): EnrichedRow[] {
    const benchmark = toPriceIndex(input.benchmark)
    const indexes = new Map<string, PriceIndex>()
    input.series.forEach((series, ticker) => indexes.set(ticker, toPriceIndex(series)))

    const tally = new MissTally()
    const rows = events.map((event) => this.row(event, indexes.get(event.ticker) ?? null, benchmark, tally))
    tally.flush(this.options.quality)

    const flagged = assignBeatMiss(rows, { consensusField: this.options.consensusField })
    this.logger.info("returns computed", {
      events: flagged.length,
      ok: flagged.filter((row) => row.status === "ok").length,
      windows: this.windows,
      basis: this.basis,
    })
    return flagged
  }

  private empty(event: SentimentEvent, status: RowStatus, anchor_date: IsoDate | null = null): EnrichedRow {
    return {
      event,
      anchor_date,
      status,
      returns: this.windows.map((window) => ({
        window,
        exit_date: null,
        raw_ret: null,
        benchmark_ret: null,
        abn_ret: null,
      })),
      beat_miss_flag: null,
    }
  }

  private row(event: SentimentEvent, index: PriceIndex | null, benchmark: PriceIndex, tally: MissTally): EnrichedRow {
    const label = `${event.ticker}@${event.event_date}`
    if (!index) return this.empty(event, "price_unavailable")

    const anchor = alignToNextSession(index.calendar, event.event_date, this.anchorSearchDays)
    if (!anchor) {
      tally.add("unresolved_anchor", label)
      return this.empty(event, "unresolved_anchor")
    }

    const benchmarkAnchor = alignToNextSession(benchmark.calendar, anchor.alignedDate, this.anchorSearchDays)
    const returns = this.windows.map((window): WindowReturn => {
      const exit = locateWindowExit({
        index,
        anchorIndex: anchor.alignedIndex,
        window,
        basis: this.basis,
        maxForwardDays: this.anchorSearchDays,
      })
      const raw_ret = exit ? simpleReturn(index.closes[anchor.alignedIndex], index.closes[exit.index]) : null
      if (raw_ret === null) tally.add("missing_window", `${label} ${window}d`)

      const benchmarkExit = benchmarkAnchor
        ? locateWindowExit({
            index: benchmark,
            anchorIndex: benchmarkAnchor.alignedIndex,
            window,
            basis: this.basis,
            maxForwardDays: this.anchorSearchDays,
          })
        : null
      const benchmark_ret =
        benchmarkAnchor && benchmarkExit
          ? simpleReturn(benchmark.closes[benchmarkAnchor.alignedIndex], benchmark.closes[benchmarkExit.index])
          : null
      if (benchmark_ret === null) tally.add("missing_benchmark_window", `${label} ${window}d`)

      return {
        window,
        exit_date: exit?.date ?? null,
        raw_ret,
        benchmark_ret,
        abn_ret: raw_ret !== null && benchmark_ret !== null ? raw_ret - benchmark_ret : null,
      }
    })

    return {
      event,
      anchor_date: anchor.alignedDate,
      status: "ok",
      returns,
      beat_miss_flag: null,
    }
  }
}
