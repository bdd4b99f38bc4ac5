import type { BeatMissFlag, EnrichedRow } from "./types"

export function signFlag(value: unknown): BeatMissFlag | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null
  if (value > 0) return 1
  if (value < 0) return -1
  return 0
}

function consensusValue(row: EnrichedRow, field: string): unknown {
  const value = row.event.passthrough[field]
  if (typeof value === "string" && value.trim() !== "") return Number(value)
  return value
}

/**
 * Beat/miss proxy per row. A configured consensus-surprise column wins when
 * any row carries a value for it; otherwise the sign of the shortest window's
 * raw return stands in for the surprise.
 */
export function assignBeatMiss(rows: readonly EnrichedRow[], options: { consensusField?: string | null } = {}): EnrichedRow[] {
  const field = options.consensusField ?? null
  const useConsensus = field !== null && rows.some((row) => signFlag(consensusValue(row, field)) !== null)

  return rows.map((row) => {
    const source = useConsensus && field !== null ? consensusValue(row, field) : row.returns[0]?.raw_ret
    return Object.freeze({ ...row, beat_miss_flag: signFlag(source) })
  })
}
