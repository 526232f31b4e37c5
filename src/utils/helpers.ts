/**
 * General utility helpers for etude-daily
 */

/**
 * Sleep for a given number of milliseconds.
 *
 * When `signal` aborts, the pending timer is cleared and the promise rejects
 * with the signal's reason, so no timer outlives an abandoned caller.
 *
 * @param ms - Milliseconds to sleep
 * @param signal - Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason
  if (reason instanceof Error) return reason
  const err = new Error('The operation was aborted')
  err.name = 'AbortError'
  return err
}

/**
 * Whether an error value came from an aborted signal or fetch.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

/**
 * Extract a readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Format a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  const minutes = Math.floor(ms / 60000)
  const seconds = Math.floor((ms % 60000) / 1000)
  return `${String(minutes)}m ${String(seconds)}s`
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Map over `items` with at most `concurrency` calls in flight.
 * Results keep the input order, whatever order the calls settle in.
 *
 * @param items - Inputs
 * @param concurrency - Maximum parallel calls (Infinity or <= 0 for unbounded)
 * @param fn - Async mapper
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isFinite(concurrency) || concurrency <= 0 || concurrency >= items.length) {
    return Promise.all(items.map((item, index) => fn(item, index)))
  }

  const results: R[] = new Array<R>(items.length)
  const queue = items.map((item, index) => ({ item, index }))

  const worker = async (): Promise<void> => {
    for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
      results[entry.index] = await fn(entry.item, entry.index)
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => worker()))
  return results
}
