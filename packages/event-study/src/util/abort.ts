/**
 * Signal that fires after `ms`, or as soon as any of the given signals fires.
 * Call `clear` once the guarded call settles so the timer does not hold the process open.
 */
export function deadline(ms: number, ...signals: Array<AbortSignal | undefined>) {
  const controller = new AbortController()
  const id = setTimeout(() => controller.abort(new Error(`Timed out after ${ms}ms`)), ms)
  const linked = signals.filter((item): item is AbortSignal => item !== undefined)
  return {
    signal: linked.length === 0 ? controller.signal : AbortSignal.any([controller.signal, ...linked]),
    clear: () => clearTimeout(id),
  }
}
