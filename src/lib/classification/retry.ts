/**
 * Bounded retry with capped exponential backoff for oracle calls.
 */

import { getErrorMessage } from "../errors.js"
import { createModuleLogger } from "../logger.js"

const log = createModuleLogger("retry")

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts?: number
  /** Delay before the second attempt; doubles each time (default 2000ms) */
  baseDelayMs?: number
  /** Upper bound for a single delay (default 10000ms) */
  maxDelayMs?: number
  /** Name used in log lines */
  operation?: string
  signal?: AbortSignal
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

/**
 * Delay before the attempt following `attempt` (1-based): min(base * 2^(attempt-1), max).
 * With the defaults: 2s, 4s, 8s, 10s, 10s...
 */
export function computeBackoffMs(attempt: number, baseDelayMs = 2000, maxDelayMs = 10000): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1))
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

/**
 * Run `fn` until it resolves or `maxAttempts` attempts have failed, then
 * rethrow the last error. Nothing is retried once `signal` is aborted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3
  const baseDelayMs = options.baseDelayMs ?? 2000
  const maxDelayMs = options.maxDelayMs ?? 10000
  const operation = options.operation ?? "operation"
  const sleep = options.sleep ?? abortableSleep

  let lastError: unknown = null

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error

      if (options.signal?.aborted) {
        throw error
      }
      if (attempt === maxAttempts) {
        log.error({ operation, attempt, error }, "Final attempt failed")
        break
      }

      const delayMs = computeBackoffMs(attempt, baseDelayMs, maxDelayMs)
      log.warn(
        { operation, attempt, maxAttempts, delayMs, error: getErrorMessage(error) },
        "Retrying after failure"
      )
      await sleep(delayMs, options.signal)
    }
  }

  throw lastError
}
