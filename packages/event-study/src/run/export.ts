import Papa from "papaparse"
import type { EnrichedRow } from "../study/types"

export type ExportValue = string | number | boolean | null
export type ExportRecord = Record<string, ExportValue>

const EVENT_COLUMNS = ["ticker", "event_date", "qa_sent_score"] as const
const STATUS_COLUMNS = ["anchor_date", "status", "beat_miss_flag"] as const

export function windowColumns(window: number) {
  return [`raw_ret_${window}d`, `benchmark_ret_${window}d`, `abn_ret_${window}d`] as const
}

/** Passthrough keys in order of first appearance across the table. */
export function passthroughColumns(rows: readonly EnrichedRow[]) {
  const seen = new Set<string>()
  rows.forEach((row) => Object.keys(row.event.passthrough).forEach((key) => seen.add(key)))
  EVENT_COLUMNS.forEach((key) => seen.delete(key))
  STATUS_COLUMNS.forEach((key) => seen.delete(key))
  return [...seen]
}

export function exportColumns(rows: readonly EnrichedRow[], windows: readonly number[]) {
  return [...EVENT_COLUMNS, ...passthroughColumns(rows), ...STATUS_COLUMNS, ...windows.flatMap((w) => windowColumns(w))]
}

function exportValue(value: unknown): ExportValue {
  if (value === null || value === undefined) return null
  if (typeof value === "string" || typeof value === "boolean") return value
  if (typeof value === "number") return Number.isFinite(value) ? value : null
  if (value instanceof Date) return value.toISOString()
  return JSON.stringify(value)
}

export function flattenRow(row: EnrichedRow, columns: readonly string[]): ExportRecord {
  const values: Record<string, unknown> = {
    ...row.event.passthrough,
    ticker: row.event.ticker,
    event_date: row.event.event_date,
    qa_sent_score: row.event.qa_sent_score,
    anchor_date: row.anchor_date,
    status: row.status,
    beat_miss_flag: row.beat_miss_flag,
  }
  row.returns.forEach((item) => {
    const [raw, benchmark, abnormal] = windowColumns(item.window)
    values[raw] = item.raw_ret
    values[benchmark] = item.benchmark_ret
    values[abnormal] = item.abn_ret
  })

  const record: ExportRecord = {}
  columns.forEach((column) => {
    record[column] = exportValue(values[column])
  })
  return record
}

export function toCsv(rows: readonly EnrichedRow[], windows: readonly number[]) {
  const columns = exportColumns(rows, windows)
  const data = rows.map((row) => {
    const record = flattenRow(row, columns)
    return columns.map((column) => {
      const value = record[column]
      return value === null || value === undefined ? "" : String(value)
    })
  })
  return `${Papa.unparse({ fields: columns, data }, { newline: "\n" })}\n`
}

export function toJson(rows: readonly EnrichedRow[], windows: readonly number[]) {
  const columns = exportColumns(rows, windows)
  return `${JSON.stringify(
    rows.map((row) => flattenRow(row, columns)),
    null,
    2,
  )}\n`
}
