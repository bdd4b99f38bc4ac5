import { PriceSeriesError } from "./errors"
import { toEpochDay } from "../util/date"
import type { IsoDate, TradingCalendar, TradingSessionAlignment } from "./types"

export function createTradingCalendar(sessions: readonly IsoDate[]): TradingCalendar {
  const normalizedSessions: IsoDate[] = []
  const epochDays: number[] = []

  let previous: number | null = null
  sessions.forEach((session, index) => {
    const epochDay = toEpochDay(session, "sessionDate", { index })
    if (previous !== null && epochDay <= previous) {
      throw new PriceSeriesError("Trading sessions must be strictly increasing and unique", {
        previous: sessions[index - 1],
        current: session,
        index,
      })
    }
    normalizedSessions.push(session)
    epochDays.push(epochDay)
    previous = epochDay
  })

  return {
    sessions: Object.freeze(normalizedSessions),
    sessionEpochDays: Object.freeze(epochDays),
  }
}

function firstIndexOnOrAfter(calendar: TradingCalendar, targetDay: number) {
  let low = 0
  let high = calendar.sessionEpochDays.length - 1
  let resolvedIndex = -1

  while (low <= high) {
    const mid = Math.floor((low + high) / 2)
    const day = calendar.sessionEpochDays[mid] ?? Number.POSITIVE_INFINITY
    if (day >= targetDay) {
      resolvedIndex = mid
      high = mid - 1
    } else {
      low = mid + 1
    }
  }

  return resolvedIndex
}

/**
 * First session on or after `inputDate`, at most `maxForwardDays` calendar
 * days later. Null when the calendar has no such session.
 */
export function alignToNextSession(
  calendar: TradingCalendar,
  inputDate: IsoDate,
  maxForwardDays: number,
): TradingSessionAlignment | null {
  const targetDay = toEpochDay(inputDate, "inputDate")
  const index = firstIndexOnOrAfter(calendar, targetDay)
  if (index < 0) return null

  const alignedDay = calendar.sessionEpochDays[index]
  const alignedDate = calendar.sessions[index]
  if (alignedDay === undefined || alignedDate === undefined) return null
  if (alignedDay - targetDay > maxForwardDays) return null

  return {
    inputDate,
    alignedDate,
    alignedIndex: index,
    shifted: alignedDate !== inputDate,
  }
}

export function getSessionByOffset(calendar: TradingCalendar, startIndex: number, offset: number) {
  if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= calendar.sessions.length) {
    throw new PriceSeriesError(`Invalid session start index: ${startIndex}`, {
      startIndex,
      sessionCount: calendar.sessions.length,
    })
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new PriceSeriesError(`Invalid session offset: ${offset}`, { offset })
  }

  const index = startIndex + offset
  const date = calendar.sessions[index]
  if (date === undefined) return null
  return {
    index,
    date,
  }
}
