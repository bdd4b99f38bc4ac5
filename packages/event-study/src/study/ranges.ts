import { addDays } from "../util/date"
import type { DateRange, SentimentEvent } from "./types"

/**
 * Calendar range that holds every anchor and window exit for the given
 * events: the anchor may sit `anchorSearchDays` past the event, the exit up
 * to `ceil(window * 7/5)` days plus another search span past the anchor.
 */
export function priceRangeFor(
  events: readonly Pick<SentimentEvent, "event_date">[],
  input: { maxWindow: number; anchorSearchDays: number; paddingDays: number },
): DateRange | null {
  if (events.length === 0) return null
  let first = events[0]?.event_date ?? ""
  let last = first
  events.forEach((event) => {
    if (event.event_date < first) first = event.event_date
    if (event.event_date > last) last = event.event_date
  })
  const forward = Math.ceil((input.maxWindow * 7) / 5) + 2 * input.anchorSearchDays + input.paddingDays
  return {
    start: addDays(first, -input.paddingDays),
    end: addDays(last, forward),
  }
}

/** Buckets items by key, keeping first-seen key order and input order within each bucket. */
export function groupBy<T>(items: readonly T[], key: (item: T) => string) {
  const groups = new Map<string, T[]>()
  items.forEach((item) => {
    const name = key(item)
    const list = groups.get(name)
    if (list) list.push(item)
    else groups.set(name, [item])
  })
  return groups
}

export function groupByTicker(events: readonly SentimentEvent[]) {
  return groupBy(events, (event) => event.ticker)
}
