import { describe, expect, test } from "vitest"
import { RevisionedDatasetLoader } from "../../src/dataset/loader"
import { validateRevision } from "../../src/dataset/revision"
import { ConfigError, DataSourceError } from "../../src/study/errors"
import { DataQualityLog } from "../../src/study/quality"
import { FakeDatasetSource, recordingLogger } from "../fixture/fakes"

const REVISION = "abc123"

describe("validateRevision", () => {
  test("accepts commit hashes", () => {
    expect(validateRevision("abc123")).toBe("abc123")
    expect(validateRevision(" 0F3C9A7B ")).toBe("0f3c9a7b")
    expect(validateRevision("a".repeat(40))).toBe("a".repeat(40))
  })

  test.each(["", "   ", "latest", "main", "HEAD", "v1.0", "abc12", "a".repeat(65), "abc123-dirty"])(
    "rejects %j",
    (revision) => {
      expect(() => validateRevision(revision)).toThrow(ConfigError)
    },
  )
})

describe("RevisionedDatasetLoader", () => {
  test("logs the revision before fetching and keeps passthrough fields", async () => {
    const source = new FakeDatasetSource([
      { ticker: "acme", earnings_date: "2024-01-02", qa_sent_score: 0.8, company: "Acme Corp", sector: "Health Care" },
    ])
    const log = recordingLogger()
    const result = await new RevisionedDatasetLoader({ source, logger: log.logger }).load(REVISION)

    expect(log.messages()[0]).toBe("dataset example/earnings-calls revision abc123")
    expect(source.revisions).toEqual(["abc123"])
    expect(result.events).toEqual([
      {
        ticker: "ACME",
        event_date: "2024-01-02",
        qa_sent_score: 0.8,
        row_index: 0,
        passthrough: { earnings_date: "2024-01-02", company: "Acme Corp", sector: "Health Care" },
      },
    ])
    expect(Object.isFrozen(result.events[0])).toBe(true)
    expect(result.report.revision).toBe("abc123")
  })

  test("fails on a mutable revision without fetching", async () => {
    const source = new FakeDatasetSource([])
    await expect(new RevisionedDatasetLoader({ source }).load("main")).rejects.toBeInstanceOf(ConfigError)
    expect(source.revisions).toEqual([])
  })

  test("drops malformed rows and counts them per reason", async () => {
    const source = new FakeDatasetSource([
      { ticker: "ACME", event_date: "2024-01-02", qa_sent_score: 0.1 },
      { ticker: "", event_date: "2024-01-02", qa_sent_score: 0.1 },
      { ticker: "BAD TICKER", event_date: "2024-01-02", qa_sent_score: 0.1 },
      { ticker: "BETA", event_date: "not a date", qa_sent_score: 0.1 },
      { ticker: "BETA", event_date: "2024-01-03", qa_sent_score: null },
      { ticker: "BETA", event_date: "2024-01-03", qa_sent_score: "0.25" },
    ])
    const quality = new DataQualityLog(recordingLogger().logger)
    const result = await new RevisionedDatasetLoader({ source, quality }).load(REVISION)

    expect(result.events.map((event) => [event.ticker, event.qa_sent_score, event.row_index])).toEqual([
      ["ACME", 0.1, 0],
      ["BETA", 0.25, 5],
    ])
    expect(result.report.dropped).toEqual({
      missing_ticker: 1,
      invalid_ticker: 1,
      invalid_event_date: 1,
      invalid_score: 1,
    })
    expect(quality.count("dropped_rows")).toBe(4)
  })

  test("applies the sector filter before validation", async () => {
    const source = new FakeDatasetSource([
      { ticker: "ACME", event_date: "2024-01-02", qa_sent_score: 0.1, sector: "Health Care" },
      { ticker: "BANK", event_date: "2024-01-02", qa_sent_score: 0.1, sector: "Financials" },
      { ticker: "", event_date: "2024-01-02", qa_sent_score: 0.1, sector: "Energy" },
    ])
    const quality = new DataQualityLog(recordingLogger().logger)
    const result = await new RevisionedDatasetLoader({ source, sectorFilter: "Health Care", quality }).load(REVISION)

    expect(result.events.map((event) => event.ticker)).toEqual(["ACME"])
    expect(result.report.filtered).toBe(2)
    expect(quality.count("filtered_rows")).toBe(2)
    expect(quality.count("dropped_rows")).toBe(0)
  })

  test("reports schema drift when a required column is absent everywhere", async () => {
    const source = new FakeDatasetSource([{ symbol: "ACME", event_date: "2024-01-02", qa_sent_score: 0.1 }])
    const failure = await new RevisionedDatasetLoader({ source }).load(REVISION).catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DataSourceError)
    expect(failure).toMatchObject({ code: "DATASET_SCHEMA_MISMATCH", details: { missing: ["ticker"] } })
  })

  test("passes source failures through unchanged", async () => {
    const source = new FakeDatasetSource([])
    source.failure = new DataSourceError("no such revision", "DATASET_REVISION_NOT_FOUND")
    await expect(new RevisionedDatasetLoader({ source }).load(REVISION)).rejects.toBe(source.failure)
  })
})
