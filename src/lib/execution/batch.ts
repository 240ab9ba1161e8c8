/**
 * Bounded concurrent batch execution
 *
 * Runs one async function per item over a fixed number of workers. Item
 * failures are data: they are classified and recorded, and the remaining
 * items keep running.
 */

import { logger } from '../logger.js'
import { classify, type ClassifiedError } from './errors.js'

export const DEFAULT_MAX_WORKERS = 10

export type BatchItemResult<T> =
  | { error: ClassifiedError; itemKey: string; status: 'failed' }
  | { itemKey: string; payload: T; status: 'success' }

export interface BatchReport<T> {
  failedCount: number
  results: BatchItemResult<T>[]
  successfulCount: number
  total: number
}

export interface BatchOptions<I> {
  keyOf?: (item: I, index: number) => string
  maxWorkers?: number
}

/**
 * Execute `perItem` for every item with at most `maxWorkers` in flight.
 *
 * Results are keyed by item key and placed at the item's submission index.
 * An item whose key cannot be computed is keyed by its index and failed.
 * Retrying is up to `perItem`; the executor calls it exactly once per item.
 */
export async function runBatch<I, T>(
  items: readonly I[],
  perItem: (item: I, itemKey: string) => Promise<T>,
  options: BatchOptions<I> = {}
): Promise<BatchReport<T>> {
  const keyOf = options.keyOf ?? ((item: I) => String(item))
  const maxWorkers = Math.max(1, Math.floor(options.maxWorkers ?? DEFAULT_MAX_WORKERS))
  const poolSize = Math.min(maxWorkers, items.length)
  const results = new Array<BatchItemResult<T>>(items.length)
  let next = 0
  let completed = 0
  let failed = 0

  async function runItem(index: number): Promise<BatchItemResult<T>> {
    const item = items[index]
    let itemKey = String(index)
    try {
      itemKey = keyOf(item, index)
      return { itemKey, payload: await perItem(item, itemKey), status: 'success' }
    } catch (error) {
      failed++
      return { error: classify(error), itemKey, status: 'failed' }
    }
  }

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++
      // eslint-disable-next-line no-await-in-loop
      results[index] = await runItem(index)
      completed++
      logger.batchProgress(completed, items.length, failed)
    }
  }

  await Promise.all(Array.from({ length: poolSize }, () => worker()))

  const successfulCount = results.filter(result => result.status === 'success').length
  const failedCount = results.filter(result => result.status === 'failed').length

  return {
    failedCount,
    results,
    successfulCount,
    total: items.length,
  }
}
