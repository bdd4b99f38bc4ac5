import Papa from "papaparse"
import { CacheCorruptError, errorMessage } from "../study/errors"
import { createPriceSeries } from "./series"
import type { DailyClose, PriceSeries } from "../study/types"

export const CACHE_FORMAT = "event-study-prices/v1"

const COLUMNS = ["date", "adjusted_close"] as const
const META_KEYS = ["format", "ticker", "source", "fetched_at", "range_start", "range_end"] as const
type MetaKey = (typeof META_KEYS)[number]

/**
 * CSV body under `# key=value` header lines. Prices use the shortest decimal
 * string that parses back to the same double.
 */
export function encodePriceSeries(series: PriceSeries): string {
  const meta: Record<MetaKey, string> = {
    format: CACHE_FORMAT,
    ticker: series.ticker,
    source: series.source,
    fetched_at: series.fetched_at,
    range_start: series.range.start,
    range_end: series.range.end,
  }
  const header = META_KEYS.map((key) => `# ${key}=${meta[key]}`)
  const body = Papa.unparse(
    {
      fields: [...COLUMNS],
      data: series.rows.map((row) => [row.date, String(row.adjusted_close)]),
    },
    { newline: "\n" },
  )
  return `${header.join("\n")}\n${body}\n`
}

function readMeta(lines: string[], path: string) {
  const meta = new Map<string, string>()
  for (const line of lines) {
    const body = line.slice(1).trim()
    const split = body.indexOf("=")
    if (split <= 0) throw new CacheCorruptError(`Malformed cache header line: ${line}`, path)
    meta.set(body.slice(0, split).trim(), body.slice(split + 1).trim())
  }

  const value = (key: MetaKey) => {
    const found = meta.get(key)
    if (!found) throw new CacheCorruptError(`Cache header is missing ${key}`, path, { key })
    return found
  }

  const format = value("format")
  if (format !== CACHE_FORMAT) {
    throw new CacheCorruptError(`Unsupported cache format ${format}`, path, { format })
  }

  return {
    ticker: value("ticker"),
    source: value("source"),
    fetched_at: value("fetched_at"),
    range: {
      start: value("range_start"),
      end: value("range_end"),
    },
  }
}

function readRows(body: string, path: string): DailyClose[] {
  const parsed = Papa.parse<Record<string, string>>(body, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  })
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0]
    throw new CacheCorruptError(`Unreadable cache table: ${first?.message ?? "parse error"}`, path, {
      row: first?.row,
    })
  }
  const fields = parsed.meta.fields ?? []
  if (fields.length !== COLUMNS.length || COLUMNS.some((column, index) => fields[index] !== column)) {
    throw new CacheCorruptError(`Unexpected cache columns: ${fields.join(",")}`, path)
  }

  return parsed.data.map((record, rowIndex) => {
    const date = record.date ?? ""
    const raw = record.adjusted_close ?? ""
    const adjusted_close = raw.trim() === "" ? Number.NaN : Number(raw)
    if (!Number.isFinite(adjusted_close)) {
      throw new CacheCorruptError(`Unreadable price at row ${rowIndex}: ${raw}`, path, { rowIndex })
    }
    return { date, adjusted_close }
  })
}

/** Throws CacheCorruptError for anything that is not a complete, valid entry. */
export function decodePriceSeries(text: string, path: string, expectedTicker?: string): PriceSeries {
  const lines = text.split(/\r?\n/)
  const headerLength = lines.findIndex((line) => !line.startsWith("#"))
  const headerLines = headerLength < 0 ? lines : lines.slice(0, headerLength)
  const body = headerLength < 0 ? "" : lines.slice(headerLength).join("\n")

  const meta = readMeta(headerLines, path)
  if (expectedTicker && meta.ticker !== expectedTicker) {
    throw new CacheCorruptError(`Cache entry belongs to ${meta.ticker}, expected ${expectedTicker}`, path, {
      ticker: meta.ticker,
    })
  }
  if (!text.endsWith("\n")) {
    throw new CacheCorruptError("Cache entry is truncated", path)
  }

  const rows = readRows(body, path)
  try {
    return createPriceSeries({ ...meta, rows })
  } catch (error) {
    throw new CacheCorruptError(`Invalid cached series: ${errorMessage(error)}`, path)
  }
}
