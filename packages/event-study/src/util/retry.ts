export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Whole-call retry with a fixed pause between attempts. */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  input: {
    attempts: number
    delayMs: number
    signal?: AbortSignal
    onRetry?: (error: unknown, attempt: number) => void
  },
): Promise<T> {
  const attempts = Math.max(1, Math.floor(input.attempts))
  let lastError: unknown

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error
      if (attempt === attempts || input.signal?.aborted) break
      input.onRetry?.(error, attempt)
      if (input.delayMs > 0) await sleep(input.delayMs)
    }
  }

  throw lastError
}
