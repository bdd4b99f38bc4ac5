import { InvalidDateError } from "../study/errors"
import type { DateRange, IsoDate } from "../study/types"

const MS_PER_DAY = 86_400_000
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/
const ISO_PREFIX_RE = /^(\d{4}-\d{2}-\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false
  const epochMs = Date.parse(`${value}T00:00:00.000Z`)
  if (!Number.isFinite(epochMs)) return false
  return new Date(epochMs).toISOString().slice(0, 10) === value
}

export function toEpochDay(date: IsoDate, field: string, details?: Record<string, unknown>) {
  if (!isIsoDate(date)) throw new InvalidDateError(field, date, details)
  return Math.floor(Date.parse(`${date}T00:00:00.000Z`) / MS_PER_DAY)
}

export function fromEpochDay(day: number): IsoDate {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10)
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromEpochDay(toEpochDay(date, "date") + days)
}

export function daysBetween(from: IsoDate, to: IsoDate) {
  return toEpochDay(to, "to") - toEpochDay(from, "from")
}

/**
 * Reduces the date shapes found in dataset exports (plain dates, ISO
 * timestamps, epoch milliseconds, Date objects) to a calendar date.
 * Returns null when the value cannot be read as a real calendar date.
 */
export function normalizeCalendarDate(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10)
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null
    const date = new Date(value)
    return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10)
  }
  if (typeof value !== "string") return null
  const match = value.trim().match(ISO_PREFIX_RE)
  const day = match?.[1]
  if (!day || !isIsoDate(day)) return null
  return day
}

export function rangeCovers(outer: DateRange, inner: DateRange) {
  return outer.start <= inner.start && outer.end >= inner.end
}

export function assertRange(range: DateRange, field = "range"): DateRange {
  toEpochDay(range.start, `${field}.start`)
  toEpochDay(range.end, `${field}.end`)
  if (range.start > range.end) {
    throw new InvalidDateError(field, `${range.start}..${range.end}`, { reason: "start is after end" })
  }
  return range
}
