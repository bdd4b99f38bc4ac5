/** Runs `fn` over `items` in consecutive batches of at most `size`, keeping input order. */
export async function mapInBatches<T, R>(items: readonly T[], size: number, fn: (item: T, index: number) => Promise<R>) {
  const batchSize = Math.max(1, Math.floor(size))
  const results: R[] = []

  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize)
    const settled = await Promise.all(batch.map((item, offset) => fn(item, i + offset)))
    results.push(...settled)
  }

  return results
}
