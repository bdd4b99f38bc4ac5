import { describe, expect, test } from "vitest"
import { decodePriceSeries, encodePriceSeries } from "../../src/prices/codec"
import { createPriceSeries } from "../../src/prices/series"
import { CacheCorruptError } from "../../src/study/errors"

const series = createPriceSeries({
  ticker: "ACME",
  rows: [
    { date: "2024-01-02", adjusted_close: 100.5 },
    { date: "2024-01-03", adjusted_close: 0.1 + 0.2 },
  ],
  fetched_at: "2024-02-01T00:00:00.000Z",
  range: { start: "2024-01-02", end: "2024-01-05" },
  source: "fake",
})

const ENCODED = [
  "# format=event-study-prices/v1",
  "# ticker=ACME",
  "# source=fake",
  "# fetched_at=2024-02-01T00:00:00.000Z",
  "# range_start=2024-01-02",
  "# range_end=2024-01-05",
  "date,adjusted_close",
  "2024-01-02,100.5",
  "2024-01-03,0.30000000000000004",
  "",
].join("\n")

describe("price cache codec", () => {
  test("writes metadata lines above a date,adjusted_close table", () => {
    expect(encodePriceSeries(series)).toBe(ENCODED)
  })

  test("reads back the exact series", () => {
    const decoded = decodePriceSeries(ENCODED, "ACME.csv", "ACME")
    expect(decoded).toEqual(series)
    expect(decoded.rows[1]?.adjusted_close).toBe(0.1 + 0.2)
  })

  test("rejects a file cut short", () => {
    expect(() => decodePriceSeries(ENCODED.slice(0, -1), "ACME.csv")).toThrow(CacheCorruptError)
    expect(() => decodePriceSeries(ENCODED.slice(0, -8), "ACME.csv")).toThrow(CacheCorruptError)
  })

  test("rejects an entry written for another ticker", () => {
    expect(() => decodePriceSeries(ENCODED, "OTHER.csv", "OTHER")).toThrow(/belongs to ACME/)
  })

  test("rejects unknown formats, missing headers and bad prices", () => {
    expect(() => decodePriceSeries(ENCODED.replace("v1", "v0"), "ACME.csv")).toThrow(/Unsupported cache format/)
    expect(() => decodePriceSeries(ENCODED.replace("# source=fake\n", ""), "ACME.csv")).toThrow(/missing source/)
    expect(() => decodePriceSeries(ENCODED.replace("100.5", "abc"), "ACME.csv")).toThrow(/Unreadable price/)
    expect(() => decodePriceSeries(ENCODED.replace("2024-01-03,", "2024-01-01,"), "ACME.csv")).toThrow(CacheCorruptError)
  })
})
