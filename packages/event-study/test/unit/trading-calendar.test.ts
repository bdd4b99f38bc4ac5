import { describe, expect, test } from "vitest"
import { PriceSeriesError } from "../../src/study/errors"
import { locateWindowExit, normalizeWindowList, simpleReturn } from "../../src/study/returns"
import { alignToNextSession, createTradingCalendar, getSessionByOffset } from "../../src/study/trading-calendar"
import { ACME_DATES, ACME_PRICES } from "../fixture/fakes"

const calendar = createTradingCalendar(ACME_DATES)
const index = { ticker: "ACME", calendar, closes: ACME_PRICES }

describe("trading calendar", () => {
  test("rejects unordered or repeated sessions", () => {
    expect(() => createTradingCalendar(["2024-01-03", "2024-01-02"])).toThrow(PriceSeriesError)
    expect(() => createTradingCalendar(["2024-01-02", "2024-01-02"])).toThrow(PriceSeriesError)
  })

  test("aligns a weekend date to the next session", () => {
    expect(alignToNextSession(calendar, "2024-01-06", 5)).toEqual({
      inputDate: "2024-01-06",
      alignedDate: "2024-01-08",
      alignedIndex: 4,
      shifted: true,
    })
    expect(alignToNextSession(calendar, "2024-01-02", 5)?.shifted).toBe(false)
  })

  test("gives up past the forward search bound", () => {
    expect(alignToNextSession(calendar, "2023-12-20", 5)).toBeNull()
    expect(alignToNextSession(calendar, "2024-01-06", 1)).toBeNull()
    expect(alignToNextSession(calendar, "2024-01-13", 5)).toBeNull()
  })

  test("steps by session offset and returns null past the end", () => {
    expect(getSessionByOffset(calendar, 0, 5)).toEqual({ index: 5, date: "2024-01-09" })
    expect(getSessionByOffset(calendar, 6, 5)).toBeNull()
    expect(() => getSessionByOffset(calendar, 0, -1)).toThrow(PriceSeriesError)
  })
})

describe("window exits", () => {
  test("takes the first session on or after anchor + w calendar days", () => {
    expect(locateWindowExit({ index, anchorIndex: 0, window: 5, basis: "calendar_days", maxForwardDays: 5 })).toEqual({
      index: 4,
      date: "2024-01-08",
    })
  })

  test("counts observations on the sessions basis", () => {
    expect(locateWindowExit({ index, anchorIndex: 0, window: 5, basis: "sessions", maxForwardDays: 5 })).toEqual({
      index: 5,
      date: "2024-01-09",
    })
  })

  test("sorts and de-duplicates windows", () => {
    expect(normalizeWindowList([5, 1, 5])).toEqual([1, 5])
    expect(() => normalizeWindowList([])).toThrow()
    expect(() => normalizeWindowList([0])).toThrow()
    expect(() => normalizeWindowList([1.5])).toThrow()
  })

  test("returns null instead of dividing by bad prices", () => {
    expect(simpleReturn(100, 104)).toBeCloseTo(0.04, 12)
    expect(simpleReturn(0, 104)).toBeNull()
    expect(simpleReturn(100, -1)).toBeNull()
    expect(simpleReturn(100, Number.NaN)).toBeNull()
    expect(simpleReturn(undefined, 104)).toBeNull()
  })
})
