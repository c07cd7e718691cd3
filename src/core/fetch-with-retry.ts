/**
 * Retry wrapper with a fixed delay between attempts, plus the error type
 * every page fetch failure is reported as.
 */

export class FetchError extends Error {
  readonly url: string
  readonly status: number | null
  attempts: number

  constructor(url: string, message: string, status: number | null = null) {
    super(message)
    this.name = 'FetchError'
    this.url = url
    this.status = status
    this.attempts = 1
  }
}

export interface RetryOptions {
  /** Total attempts, including the first */
  maxRetries: number
  retryDelayMs: number
  /** Prefix for log lines, e.g. the URL being fetched */
  label: string
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise(resolve => setTimeout(resolve, ms))
}

export async function withRetry<T>(
  attempt: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxRetries, retryDelayMs, label } = options
  const attempts = Math.max(1, maxRetries)

  let lastError: Error | null = null

  for (let i = 1; i <= attempts; i++) {
    try {
      return await attempt()
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err))

      if (i < attempts) {
        console.warn(
          `[fetch] ${label} failed (attempt ${i}/${attempts}): ${lastError.message}, retrying in ${retryDelayMs}ms...`
        )
        await sleep(retryDelayMs)
      } else {
        console.error(`[fetch] ${label} failed after ${attempts} attempts: ${lastError.message}`)
      }
    }
  }

  const finalError =
    lastError instanceof FetchError
      ? lastError
      : new FetchError(label, lastError?.message ?? `withRetry failed for ${label}`)
  finalError.attempts = attempts
  throw finalError
}
