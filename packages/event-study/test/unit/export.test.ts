import { describe, expect, test } from "vitest"
import { exportColumns, toCsv, toJson } from "../../src/run/export"
import { toDashboard } from "../../src/run/render"
import { emptyQualityCounts } from "../../src/study/quality"
import type { RunSummary } from "../../src/run/summary"
import type { EnrichedRow } from "../../src/study/types"

const rows: EnrichedRow[] = [
  {
    event: {
      ticker: "ACME",
      event_date: "2024-01-02",
      qa_sent_score: 0.8,
      row_index: 0,
      passthrough: { company: "Acme, Inc.", year: 2024 },
    },
    anchor_date: "2024-01-02",
    status: "ok",
    returns: [
      { window: 1, exit_date: "2024-01-03", raw_ret: 0.01, benchmark_ret: 0, abn_ret: 0.01 },
      { window: 5, exit_date: null, raw_ret: null, benchmark_ret: 0, abn_ret: null },
    ],
    beat_miss_flag: 1,
  },
  {
    event: {
      ticker: "BETA",
      event_date: "2024-01-03",
      qa_sent_score: -0.2,
      row_index: 1,
      passthrough: { quarter: "Q4", company: "Beta" },
    },
    anchor_date: null,
    status: "price_unavailable",
    returns: [
      { window: 1, exit_date: null, raw_ret: null, benchmark_ret: null, abn_ret: null },
      { window: 5, exit_date: null, raw_ret: null, benchmark_ret: null, abn_ret: null },
    ],
    beat_miss_flag: null,
  },
]

describe("export", () => {
  test("orders columns event, passthrough, status, then windows", () => {
    expect(exportColumns(rows, [1, 5])).toEqual([
      "ticker",
      "event_date",
      "qa_sent_score",
      "company",
      "year",
      "quarter",
      "anchor_date",
      "status",
      "beat_miss_flag",
      "raw_ret_1d",
      "benchmark_ret_1d",
      "abn_ret_1d",
      "raw_ret_5d",
      "benchmark_ret_5d",
      "abn_ret_5d",
    ])
  })

  test("writes nulls as empty CSV cells", () => {
    expect(toCsv(rows, [1, 5]).split("\n")).toEqual([
      "ticker,event_date,qa_sent_score,company,year,quarter,anchor_date,status,beat_miss_flag,raw_ret_1d,benchmark_ret_1d,abn_ret_1d,raw_ret_5d,benchmark_ret_5d,abn_ret_5d",
      'ACME,2024-01-02,0.8,"Acme, Inc.",2024,,2024-01-02,ok,1,0.01,0,0.01,,0,',
      "BETA,2024-01-03,-0.2,Beta,,Q4,,price_unavailable,,,,,,,",
      "",
    ])
  })

  test("keeps nulls as JSON null", () => {
    const parsed: unknown = JSON.parse(toJson(rows, [1, 5]))
    expect(parsed).toEqual([
      {
        ticker: "ACME",
        event_date: "2024-01-02",
        qa_sent_score: 0.8,
        company: "Acme, Inc.",
        year: 2024,
        quarter: null,
        anchor_date: "2024-01-02",
        status: "ok",
        beat_miss_flag: 1,
        raw_ret_1d: 0.01,
        benchmark_ret_1d: 0,
        abn_ret_1d: 0.01,
        raw_ret_5d: null,
        benchmark_ret_5d: 0,
        abn_ret_5d: null,
      },
      {
        ticker: "BETA",
        event_date: "2024-01-03",
        qa_sent_score: -0.2,
        company: "Beta",
        year: null,
        quarter: "Q4",
        anchor_date: null,
        status: "price_unavailable",
        beat_miss_flag: null,
        raw_ret_1d: null,
        benchmark_ret_1d: null,
        abn_ret_1d: null,
        raw_ret_5d: null,
        benchmark_ret_5d: null,
        abn_ret_5d: null,
      },
    ])
  })

  test("summarizes tickers on the dashboard", () => {
    const summary: RunSummary = {
      generated_at: "2024-02-01T00:00:00.000Z",
      dataset: { name: "example/earnings-calls", file: "data/train.jsonl", revision: "abc123" },
      benchmark: "XBI",
      windows: [1, 5],
      events: 2,
      rows: { ok: 1, unresolved_anchor: 0, price_unavailable: 1 },
      load: {
        dataset: "example/earnings-calls",
        file: "data/train.jsonl",
        revision: "abc123",
        rows_read: 2,
        events: 2,
        filtered: 0,
        dropped: { missing_ticker: 0, invalid_ticker: 0, invalid_event_date: 0, invalid_score: 0 },
      },
      quality: { ...emptyQualityCounts(), price_fetch_failed: 1 },
      cache: { hits: 1, misses: 2, fetches: 2, writes: 1, stale_served: 0 },
    }
    const lines = toDashboard({ rows, summary }).split("\n")

    expect(lines).toContain("| Ticker | Events | Computed | Mean Q&A Score | Mean Abnormal 1d | Mean Abnormal 5d |")
    expect(lines).toContain("| ACME | 1 | 1 | 0.800 | 1.00% | n/a |")
    expect(lines).toContain("| BETA | 1 | 0 | -0.200 | n/a | n/a |")
    expect(lines).toContain("- price_fetch_failed: 1")
  })
})
