/**
 * Backoff retry executor
 *
 * Runs a zero-argument remote call, retrying retryable failures with capped
 * exponential backoff. Each invocation keeps its own attempt counter, so
 * concurrent callers (batch workers, parallel dispatches) never share state.
 */

import { setTimeout as delay } from 'node:timers/promises'

import { logger } from '../logger.js'
import { classify, ClassifiedError, type ErrorCategory } from './errors.js'
import { fail, type Result, succeed, unwrap } from './result.js'

export interface RetryPolicy {
  baseDelayMs: number
  maxAttempts: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  baseDelayMs: 1000,
  maxAttempts: 4,
  maxDelayMs: 30_000,
}

/**
 * Reported before each backoff sleep
 */
export interface RetryEvent {
  attempt: number
  delayMs: number
  error: ClassifiedError
  label: string
  maxAttempts: number
  remaining: number
}

export interface RetryOptions extends Partial<RetryPolicy> {
  label?: string
  onRetry?: (event: RetryEvent) => void
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms)
}

/**
 * Delay taken after a failed attempt: base * 2^(attempt-1), capped at maxDelayMs
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs)
}

/**
 * Run `fn`, retrying retryable failures.
 *
 * Resolves to a failure carrying the classified error when the error is not
 * retryable (after one attempt) or when attempts run out, in which case the
 * last error is returned marked as exhausted.
 */
export async function runWithRetry<T>(
  fn: () => Promise<T> | T,
  options: RetryOptions = {}
): Promise<Result<T, ClassifiedError>> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts))
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs)
  const maxDelayMs = Math.max(0, options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs)
  const label = options.label ?? 'remote call'
  const sleep = options.sleep ?? defaultSleep
  const categories: ErrorCategory[] = []

  for (let attempt = 1; ; attempt++) {
    try {
      // eslint-disable-next-line no-await-in-loop
      return succeed(await fn())
    } catch (error) {
      const classified = classify(error)
      categories.push(classified.category)

      if (!classified.retryable) {
        logger.debug(`${label}: ${classified.describe()} (not retried)`)
        return fail(classified)
      }

      if (attempt >= maxAttempts) {
        const exhausted = classified.asExhausted(attempt, categories)
        logger.debug(`${label}: ${exhausted.describe()}`)
        return fail(exhausted)
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs)
      logger.retry(label, attempt, maxAttempts, delayMs, classified.category)
      options.onRetry?.({
        attempt,
        delayMs,
        error: classified,
        label,
        maxAttempts,
        remaining: maxAttempts - attempt,
      })

      // eslint-disable-next-line no-await-in-loop
      await sleep(delayMs)
    }
  }
}

/**
 * Same as runWithRetry, but throws the classified error
 */
export async function retryOrThrow<T>(fn: () => Promise<T> | T, options: RetryOptions = {}): Promise<T> {
  return unwrap(await runWithRetry(fn, options))
}
