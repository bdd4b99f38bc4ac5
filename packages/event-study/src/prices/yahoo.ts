import z from "zod"
import { PriceFetchError, errorMessage } from "../study/errors"
import { deadline } from "../util/abort"
import { addDays, fromEpochDay, toEpochDay } from "../util/date"
import { Log } from "../util/log"
import { withRetry } from "../util/retry"
import type { FetchLike } from "../util/fetch"
import type { PriceSource } from "./source"
import type { DailyClose, DateRange } from "../study/types"

const YAHOO_BASE = "https://query1.finance.yahoo.com"
const SECONDS_PER_DAY = 86_400

const maybePrice = z.number().nullish()

const ChartPayload = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z.array(z.object({ close: z.array(maybePrice).optional() })).optional(),
              adjclose: z.array(z.object({ adjclose: z.array(maybePrice).optional() })).optional(),
            })
            .optional(),
        }),
      )
      .nullish(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().optional(),
      })
      .nullish(),
  }),
})

/**
 * Daily adjusted closes from a chart payload. Sessions without a usable price
 * (halts, the still-open current day) are skipped.
 */
export function parseChartBars(input: { symbol: string; payload: unknown }): DailyClose[] {
  const parsed = ChartPayload.safeParse(input.payload)
  if (!parsed.success) {
    throw new PriceFetchError(`Unexpected chart payload for ${input.symbol}`, input.symbol, false, {
      issues: parsed.error.issues.map((issue) => issue.path.join(".")),
    })
  }
  const chart = parsed.data.chart
  if (chart.error) {
    throw new PriceFetchError(
      `Chart request for ${input.symbol} failed: ${chart.error.description ?? chart.error.code ?? "unknown error"}`,
      input.symbol,
    )
  }

  const result = chart.result?.[0]
  const timestamps = result?.timestamp ?? []
  const adjusted = result?.indicators?.adjclose?.[0]?.adjclose
  const closes = result?.indicators?.quote?.[0]?.close

  const rows: DailyClose[] = []
  timestamps.forEach((timestamp, index) => {
    const price = adjusted?.[index] ?? closes?.[index]
    if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) return
    rows.push({
      date: fromEpochDay(Math.floor(timestamp / SECONDS_PER_DAY)),
      adjusted_close: price,
    })
  })
  return rows
}

export class YahooPriceSource implements PriceSource {
  readonly id = "yahoo"
  private readonly fetcher: FetchLike
  private readonly logger: Log.Logger

  constructor(
    private readonly input: {
      attempts: number
      timeoutMs: number
      retryDelayMs?: number
      fetch?: FetchLike
      logger?: Log.Logger
      baseUrl?: string
    },
  ) {
    this.fetcher = input.fetch ?? ((url, init) => fetch(url, init))
    this.logger = input.logger ?? Log.silent
  }

  chartUrl(ticker: string, range: DateRange) {
    const period1 = toEpochDay(range.start, "range.start") * SECONDS_PER_DAY
    // period2 is exclusive
    const period2 = toEpochDay(addDays(range.end, 1), "range.end") * SECONDS_PER_DAY
    const base = this.input.baseUrl ?? YAHOO_BASE
    return `${base}/v8/finance/chart/${encodeURIComponent(ticker)}?period1=${period1}&period2=${period2}&interval=1d&events=history&includeAdjustedClose=true`
  }

  async fetchPrices(ticker: string, range: DateRange, signal?: AbortSignal): Promise<DailyClose[]> {
    const url = this.chartUrl(ticker, range)
    return withRetry(() => this.request(ticker, url, signal), {
      attempts: this.input.attempts,
      delayMs: this.input.retryDelayMs ?? 1_000,
      signal,
      onRetry: (error, attempt) =>
        this.logger.warn("price request failed, retrying", { ticker, attempt, reason: errorMessage(error) }),
    })
  }

  private async request(ticker: string, url: string, signal?: AbortSignal) {
    const timeout = deadline(this.input.timeoutMs, signal)
    try {
      const response = await this.fetcher(url, {
        signal: timeout.signal,
        headers: {
          Accept: "application/json",
          "User-Agent": "event-study/1.0",
        },
      })
      if (!response.ok) {
        const body = await response.text().catch(() => "")
        throw new PriceFetchError(
          `Failed to load price history for ${ticker} (${response.status}): ${body.slice(0, 200) || "request failed"}`,
          ticker,
          false,
          { status: response.status },
        )
      }
      const payload: unknown = await response.json()
      return parseChartBars({ symbol: ticker, payload })
    } catch (error) {
      if (error instanceof PriceFetchError) throw error
      throw new PriceFetchError(`Failed to load price history for ${ticker}: ${errorMessage(error)}`, ticker)
    } finally {
      timeout.clear()
    }
  }
}
