import type { DailyClose, DateRange } from "../study/types"

/** Network capability behind the price cache. Implementations throw on failure. */
export interface PriceSource {
  readonly id: string
  fetchPrices(ticker: string, range: DateRange, signal?: AbortSignal): Promise<DailyClose[]>
}
