export type IsoDate = string

export interface DateRange {
  start: IsoDate
  end: IsoDate
}

export interface SentimentEvent {
  ticker: string
  event_date: IsoDate
  qa_sent_score: number
  /** Position of the row in the source file, before any drop. */
  row_index: number
  /** Every other column of the source row, carried through untouched. */
  passthrough: Readonly<Record<string, unknown>>
}

export interface DailyClose {
  date: IsoDate
  adjusted_close: number
}

export interface PriceSeries {
  ticker: string
  rows: readonly DailyClose[]
  fetched_at: string
  /** Query range that produced the series; coverage is judged against it. */
  range: DateRange
  source: string
}

export interface TradingCalendar {
  sessions: readonly IsoDate[]
  sessionEpochDays: readonly number[]
}

export interface TradingSessionAlignment {
  inputDate: IsoDate
  alignedDate: IsoDate
  alignedIndex: number
  shifted: boolean
}

export const WINDOW_BASIS = ["calendar_days", "sessions"] as const
export type WindowBasis = (typeof WINDOW_BASIS)[number]

export const ROW_STATUS = ["ok", "unresolved_anchor", "price_unavailable"] as const
export type RowStatus = (typeof ROW_STATUS)[number]

export type BeatMissFlag = 1 | 0 | -1

export interface WindowReturn {
  window: number
  exit_date: IsoDate | null
  raw_ret: number | null
  benchmark_ret: number | null
  abn_ret: number | null
}

export interface EnrichedRow {
  event: SentimentEvent
  anchor_date: IsoDate | null
  status: RowStatus
  /** One entry per configured window, ascending, present on every row. */
  returns: readonly WindowReturn[]
  beat_miss_flag: BeatMissFlag | null
}
