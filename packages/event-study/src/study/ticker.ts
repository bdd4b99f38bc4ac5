// Yahoo-style symbols: BRK-B, BF.B, ^GSPC, EURUSD=X
const TICKER_RE = /^[A-Z0-9^][A-Z0-9.\-^=]{0,14}$/

/** Upper-cased symbol, or null when the value cannot name a listed instrument. */
export function normalizeTicker(value: unknown): string | null {
  if (typeof value !== "string") return null
  const symbol = value.trim().toUpperCase()
  if (!TICKER_RE.test(symbol)) return null
  return symbol
}
