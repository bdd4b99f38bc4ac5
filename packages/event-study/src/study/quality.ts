import { DataQualityWarning } from "./errors"
import type { Log } from "../util/log"

export const QUALITY_CATEGORY = [
  "dropped_rows",
  "filtered_rows",
  "unresolved_anchor",
  "missing_window",
  "missing_benchmark_window",
  "price_fetch_failed",
  "stale_served",
] as const

export type QualityCategory = (typeof QUALITY_CATEGORY)[number]

export type QualityCounts = Record<QualityCategory, number>

export function emptyQualityCounts(): QualityCounts {
  return {
    dropped_rows: 0,
    filtered_rows: 0,
    unresolved_anchor: 0,
    missing_window: 0,
    missing_benchmark_window: 0,
    price_fetch_failed: 0,
    stale_served: 0,
  }
}

/**
 * Collects the non-fatal problems of one run. Every record is logged as it
 * happens and counted for the end-of-run summary.
 */
export class DataQualityLog {
  private readonly counts = emptyQualityCounts()
  private readonly entries: DataQualityWarning[] = []

  constructor(private readonly logger: Log.Logger) {}

  record(category: QualityCategory, message: string, details?: Record<string, unknown>, amount = 1) {
    if (amount <= 0) return
    this.counts[category] += amount
    const warning = new DataQualityWarning(message, category, details)
    this.entries.push(warning)
    this.logger.warn(message, { category, ...details })
  }

  count(category: QualityCategory) {
    return this.counts[category]
  }

  snapshot(): QualityCounts {
    return { ...this.counts }
  }

  warnings(): readonly DataQualityWarning[] {
    return [...this.entries]
  }
}
