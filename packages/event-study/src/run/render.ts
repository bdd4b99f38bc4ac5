import { QUALITY_CATEGORY } from "../study/quality"
import { groupBy } from "../study/ranges"
import type { EnrichedRow } from "../study/types"
import type { RunSummary } from "./summary"

export type TickerStats = {
  ticker: string
  events: number
  computed: number
  mean_score: number
  /** Mean abnormal return per window, null when no row had one. */
  mean_abnormal: ReadonlyMap<number, number | null>
}

function mean(values: readonly number[]) {
  if (values.length === 0) return null
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

export function tickerStats(rows: readonly EnrichedRow[], windows: readonly number[]): TickerStats[] {
  return [...groupBy(rows, (row) => row.event.ticker).entries()]
    .map(([ticker, items]) => {
      const mean_abnormal = new Map<number, number | null>()
      windows.forEach((window) => {
        const values = items.flatMap((row) => {
          const value = row.returns.find((item) => item.window === window)?.abn_ret
          return value === null || value === undefined ? [] : [value]
        })
        mean_abnormal.set(window, mean(values))
      })
      return {
        ticker,
        events: items.length,
        computed: items.filter((row) => row.status === "ok").length,
        mean_score: mean(items.map((row) => row.event.qa_sent_score)) ?? 0,
        mean_abnormal,
      }
    })
    .toSorted((a, b) => a.ticker.localeCompare(b.ticker))
}

function percent(value: number | null | undefined) {
  if (value === null || value === undefined) return "n/a"
  return `${(value * 100).toFixed(2)}%`
}

export function toDashboard(input: { rows: readonly EnrichedRow[]; summary: RunSummary }) {
  const { summary } = input
  const stats = tickerStats(input.rows, summary.windows)
  const lines = [
    `# Sentiment Event Study: ${summary.dataset.name}`,
    "",
    `- Generated at: ${summary.generated_at}`,
    `- Dataset revision: ${summary.dataset.revision}`,
    `- Benchmark: ${summary.benchmark}`,
    `- Windows: ${summary.windows.map((w) => `${w}d`).join(", ")}`,
    `- Events: ${summary.events}`,
    "",
    "## Tickers",
    "",
    `| Ticker | Events | Computed | Mean Q&A Score | ${summary.windows.map((w) => `Mean Abnormal ${w}d`).join(" | ")} |`,
    `|---|---:|---:|---:|${summary.windows.map(() => "---:").join("|")}|`,
  ]

  for (const item of stats) {
    const returns = summary.windows.map((w) => percent(item.mean_abnormal.get(w))).join(" | ")
    lines.push(`| ${item.ticker} | ${item.events} | ${item.computed} | ${item.mean_score.toFixed(3)} | ${returns} |`)
  }
  if (stats.length === 0) lines.push("", "No events in this run.")

  lines.push("", "## Data Quality")
  QUALITY_CATEGORY.forEach((category) => lines.push(`- ${category}: ${summary.quality[category]}`))

  lines.push(
    "",
    "## Price Cache",
    `- Hits: ${summary.cache.hits}`,
    `- Misses: ${summary.cache.misses}`,
    `- Fetches: ${summary.cache.fetches}`,
    `- Stale served: ${summary.cache.stale_served}`,
  )

  lines.push("", "Abnormal return = ticker simple return minus benchmark simple return over the same window.")
  return `${lines.join("\n")}\n`
}
