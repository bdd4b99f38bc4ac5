import { DataSourceError } from "../study/errors"
import { normalizeTicker } from "../study/ticker"
import { normalizeCalendarDate } from "../util/date"
import { Log } from "../util/log"
import { validateRevision } from "./revision"
import type { DataQualityLog } from "../study/quality"
import type { SentimentEvent } from "../study/types"
import type { DatasetRow } from "./parse"
import type { DatasetSource } from "./source"

export const DATE_FIELDS = ["event_date", "earnings_date"] as const
const TICKER_FIELD = "ticker"
const SCORE_FIELD = "qa_sent_score"

export const DROP_REASON = ["missing_ticker", "invalid_ticker", "invalid_event_date", "invalid_score"] as const
export type DropReason = (typeof DROP_REASON)[number]

export type LoadReport = {
  dataset: string
  file: string
  revision: string
  rows_read: number
  events: number
  filtered: number
  dropped: Record<DropReason, number>
}

export type LoadResult = {
  events: readonly SentimentEvent[]
  report: LoadReport
}

function hasValue(row: DatasetRow, key: string) {
  const value = row[key]
  return value !== undefined && value !== null && value !== ""
}

function readScore(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null
  if (typeof value !== "string" || value.trim() === "") return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

function assertSchema(rows: readonly DatasetRow[], source: DatasetSource, revision: string) {
  if (rows.length === 0) {
    throw new DataSourceError(`Dataset ${source.name}@${revision} has no rows`, "DATASET_SCHEMA_MISMATCH", {
      dataset: source.name,
      revision,
    })
  }
  const missing: string[] = []
  if (!rows.some((row) => TICKER_FIELD in row)) missing.push(TICKER_FIELD)
  if (!rows.some((row) => DATE_FIELDS.some((field) => field in row))) missing.push(DATE_FIELDS.join("|"))
  if (!rows.some((row) => SCORE_FIELD in row)) missing.push(SCORE_FIELD)
  if (missing.length > 0) {
    throw new DataSourceError(
      `Dataset ${source.name}@${revision} is missing required columns: ${missing.join(", ")}`,
      "DATASET_SCHEMA_MISMATCH",
      { dataset: source.name, revision, missing },
    )
  }
}

/**
 * Loads the event table from one exact dataset revision. The revision is
 * validated and logged before anything is fetched; there is no fallback to
 * another revision.
 */
export class RevisionedDatasetLoader {
  private readonly logger: Log.Logger

  constructor(
    private readonly input: {
      source: DatasetSource
      sectorFilter?: string | null
      logger?: Log.Logger
      quality?: DataQualityLog
    },
  ) {
    this.logger = input.logger ?? Log.silent
  }

  async load(revisionInput: string, signal?: AbortSignal): Promise<LoadResult> {
    const revision = validateRevision(revisionInput)
    const source = this.input.source
    this.logger.info(`dataset ${source.name} revision ${revision}`, { file: source.file })

    const rows = await source.fetchDataset(revision, signal)
    assertSchema(rows, source, revision)

    const dropped: Record<DropReason, number> = {
      missing_ticker: 0,
      invalid_ticker: 0,
      invalid_event_date: 0,
      invalid_score: 0,
    }
    let filtered = 0
    const events: SentimentEvent[] = []
    const sector = this.input.sectorFilter ?? null

    rows.forEach((row, row_index) => {
      if (sector !== null && row.sector !== sector) {
        filtered++
        return
      }
      const fields = this.read(row)
      if (typeof fields === "string") {
        dropped[fields]++
        return
      }
      events.push(this.toEvent(fields, row, row_index))
    })

    const report: LoadReport = {
      dataset: source.name,
      file: source.file,
      revision,
      rows_read: rows.length,
      events: events.length,
      filtered,
      dropped,
    }

    const droppedTotal = DROP_REASON.reduce((sum, key) => sum + dropped[key], 0)
    this.input.quality?.record("dropped_rows", `dropped ${droppedTotal} malformed dataset rows`, { dropped }, droppedTotal)
    this.input.quality?.record("filtered_rows", `filtered ${filtered} rows outside sector ${sector}`, { sector }, filtered)
    this.logger.info("dataset loaded", {
      revision,
      rows_read: report.rows_read,
      events: report.events,
      filtered,
      dropped: droppedTotal,
    })

    return { events: Object.freeze(events), report }
  }

  private read(row: DatasetRow): Omit<SentimentEvent, "row_index" | "passthrough"> | DropReason {
    if (!hasValue(row, TICKER_FIELD)) return "missing_ticker"
    const ticker = normalizeTicker(row[TICKER_FIELD])
    if (!ticker) return "invalid_ticker"
    const field = DATE_FIELDS.find((key) => hasValue(row, key))
    const event_date = field ? normalizeCalendarDate(row[field]) : null
    if (!event_date) return "invalid_event_date"
    const qa_sent_score = readScore(row[SCORE_FIELD])
    if (qa_sent_score === null) return "invalid_score"
    return { ticker, event_date, qa_sent_score }
  }

  private toEvent(fields: Omit<SentimentEvent, "row_index" | "passthrough">, row: DatasetRow, row_index: number) {
    const passthrough: Record<string, unknown> = {}
    Object.entries(row).forEach(([key, value]) => {
      if (key === TICKER_FIELD || key === SCORE_FIELD || key === "event_date") return
      passthrough[key] = value
    })
    const event: SentimentEvent = { ...fields, row_index, passthrough: Object.freeze(passthrough) }
    return Object.freeze(event)
  }
}
