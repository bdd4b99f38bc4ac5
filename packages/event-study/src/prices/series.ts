import { PriceSeriesError } from "../study/errors"
import { normalizeTicker } from "../study/ticker"
import { assertRange, isIsoDate } from "../util/date"
import type { DailyClose, DateRange, PriceSeries } from "../study/types"

export function createPriceSeries(input: {
  ticker: string
  rows: readonly DailyClose[]
  fetched_at: string
  range: DateRange
  source: string
}): PriceSeries {
  const ticker = normalizeTicker(input.ticker)
  if (!ticker) throw new PriceSeriesError(`Invalid ticker for price series: ${input.ticker}`)
  if (input.rows.length === 0) {
    throw new PriceSeriesError(`Price series for ${ticker} cannot be empty`, { ticker })
  }
  assertRange(input.range)
  if (Number.isNaN(Date.parse(input.fetched_at))) {
    throw new PriceSeriesError(`Invalid fetched_at for ${ticker}: ${input.fetched_at}`, { ticker })
  }

  const rows: DailyClose[] = []
  let previous: string | null = null
  input.rows.forEach((row, rowIndex) => {
    if (!isIsoDate(row.date)) {
      throw new PriceSeriesError(`Invalid price date for ${ticker} at row ${rowIndex}: ${row.date}`, {
        ticker,
        rowIndex,
      })
    }
    if (previous !== null && row.date <= previous) {
      throw new PriceSeriesError(`Price dates for ${ticker} must be strictly increasing: ${previous} then ${row.date}`, {
        ticker,
        rowIndex,
      })
    }
    if (!Number.isFinite(row.adjusted_close) || row.adjusted_close <= 0) {
      throw new PriceSeriesError(`Invalid adjusted close for ${ticker} on ${row.date}: ${String(row.adjusted_close)}`, {
        ticker,
        date: row.date,
      })
    }
    rows.push(Object.freeze({ date: row.date, adjusted_close: row.adjusted_close }))
    previous = row.date
  })

  return Object.freeze({
    ticker,
    rows: Object.freeze(rows),
    fetched_at: input.fetched_at,
    range: Object.freeze({ start: input.range.start, end: input.range.end }),
    source: input.source,
  })
}

/** Sorts by date and keeps the last row for a repeated date, the way quote feeds restate a session. */
export function sortAndDedupe(rows: readonly DailyClose[]): DailyClose[] {
  const byDate = new Map<string, DailyClose>()
  rows.forEach((row) => byDate.set(row.date, row))
  return [...byDate.values()].toSorted((a, b) => a.date.localeCompare(b.date))
}
