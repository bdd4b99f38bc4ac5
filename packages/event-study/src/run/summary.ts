import { QUALITY_CATEGORY, type QualityCounts } from "../study/quality"
import { ROW_STATUS, type EnrichedRow, type RowStatus } from "../study/types"
import type { LoadReport } from "../dataset/loader"
import type { PriceCacheStats } from "../prices/cache"

export type RunSummary = {
  generated_at: string
  dataset: {
    name: string
    file: string
    revision: string
  }
  benchmark: string
  windows: readonly number[]
  events: number
  rows: Record<RowStatus, number>
  load: LoadReport
  quality: QualityCounts
  cache: PriceCacheStats
}

export function countStatuses(rows: readonly EnrichedRow[]) {
  const counts: Record<RowStatus, number> = {
    ok: 0,
    unresolved_anchor: 0,
    price_unavailable: 0,
  }
  rows.forEach((row) => counts[row.status]++)
  return counts
}

export function formatSummary(summary: RunSummary) {
  const lines = [
    `Event study run ${summary.generated_at}`,
    `- Dataset: ${summary.dataset.name} (${summary.dataset.file}) @ ${summary.dataset.revision}`,
    `- Benchmark: ${summary.benchmark}`,
    `- Windows: ${summary.windows.map((w) => `${w}d`).join(", ")}`,
    `- Events: ${summary.events} of ${summary.load.rows_read} dataset rows`,
    `- Rows: ${ROW_STATUS.map((status) => `${status} ${summary.rows[status]}`).join(", ")}`,
    "Data quality:",
    ...QUALITY_CATEGORY.map((category) => `- ${category}: ${summary.quality[category]}`),
    "Price cache:",
    `- hits ${summary.cache.hits}, misses ${summary.cache.misses}, fetches ${summary.cache.fetches}, writes ${summary.cache.writes}, stale served ${summary.cache.stale_served}`,
  ]
  return lines.join("\n")
}
