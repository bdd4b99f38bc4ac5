import Papa from "papaparse"
import { DataSourceError, errorMessage } from "../study/errors"

export type DatasetRow = Record<string, unknown>
export const DATASET_FORMAT = ["jsonl", "json", "csv"] as const
export type DatasetFormat = (typeof DATASET_FORMAT)[number]

export function formatFromFile(file: string): DatasetFormat {
  const lower = file.toLowerCase()
  if (lower.endsWith(".jsonl") || lower.endsWith(".ndjson")) return "jsonl"
  if (lower.endsWith(".json")) return "json"
  if (lower.endsWith(".csv")) return "csv"
  throw new DataSourceError(`Unsupported dataset file type: ${file}`, "DATASET_SCHEMA_MISMATCH", { file })
}

function isRow(value: unknown): value is DatasetRow {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function schemaError(message: string, details?: Record<string, unknown>) {
  return new DataSourceError(message, "DATASET_SCHEMA_MISMATCH", details)
}

function parseJsonl(text: string): DatasetRow[] {
  const rows: DatasetRow[] = []
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return
    let value: unknown
    try {
      value = JSON.parse(line)
    } catch (error) {
      throw schemaError(`Dataset line ${index + 1} is not valid JSON: ${errorMessage(error)}`, { line: index + 1 })
    }
    if (!isRow(value)) throw schemaError(`Dataset line ${index + 1} is not an object`, { line: index + 1 })
    rows.push(value)
  })
  return rows
}

function parseJson(text: string): DatasetRow[] {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw schemaError(`Dataset is not valid JSON: ${errorMessage(error)}`)
  }
  // `{"data": [...]}` and `{"rows": [...]}` are the common export wrappers
  const list = isRow(value) ? (value.data ?? value.rows) : value
  if (!Array.isArray(list)) throw schemaError("Dataset JSON is not a list of rows")
  return list.map((item, index) => {
    if (!isRow(item)) throw schemaError(`Dataset row ${index} is not an object`, { row: index })
    return item
  })
}

function parseCsv(text: string): DatasetRow[] {
  const parsed = Papa.parse<DatasetRow>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: true,
  })
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0]
    throw schemaError(`Dataset CSV is malformed: ${first?.message ?? "parse error"}`, { row: first?.row })
  }
  return parsed.data
}

export function parseDatasetText(text: string, format: DatasetFormat): DatasetRow[] {
  if (format === "jsonl") return parseJsonl(text)
  if (format === "json") return parseJson(text)
  return parseCsv(text)
}
