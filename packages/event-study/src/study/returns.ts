import { InvalidWindowError } from "./errors"
import { addDays } from "../util/date"
import { alignToNextSession, getSessionByOffset } from "./trading-calendar"
import type { IsoDate, TradingCalendar, WindowBasis } from "./types"

export function normalizeWindowList(windows: readonly number[]) {
  if (windows.length === 0) {
    throw new InvalidWindowError("At least one return window is required")
  }
  const seen = new Set<number>()
  windows.forEach((window) => {
    if (!Number.isInteger(window) || window <= 0) {
      throw new InvalidWindowError(`Window must be a positive integer: ${String(window)}`, { window })
    }
    seen.add(window)
  })
  return [...seen].toSorted((a, b) => a - b)
}

/** Simple return, or null when either close is missing, zero, negative or not finite. */
export function simpleReturn(entry: number | undefined, exit: number | undefined): number | null {
  if (entry === undefined || exit === undefined) return null
  if (!Number.isFinite(entry) || entry <= 0) return null
  if (!Number.isFinite(exit) || exit <= 0) return null
  return exit / entry - 1
}

export type PriceIndex = {
  ticker: string
  calendar: TradingCalendar
  closes: readonly number[]
}

export type WindowExit = {
  index: number
  date: IsoDate
}

/**
 * Session that closes a window opened at `anchorIndex`. `sessions` counts
 * observations in the series; `calendar_days` takes the first observation on
 * or after anchor + window days, no further than `maxForwardDays` past it.
 */
export function locateWindowExit(input: {
  index: PriceIndex
  anchorIndex: number
  window: number
  basis: WindowBasis
  maxForwardDays: number
}): WindowExit | null {
  if (input.basis === "sessions") {
    return getSessionByOffset(input.index.calendar, input.anchorIndex, input.window)
  }

  const anchorDate = input.index.calendar.sessions[input.anchorIndex]
  if (anchorDate === undefined) return null
  const aligned = alignToNextSession(input.index.calendar, addDays(anchorDate, input.window), input.maxForwardDays)
  if (!aligned) return null
  return {
    index: aligned.alignedIndex,
    date: aligned.alignedDate,
  }
}
