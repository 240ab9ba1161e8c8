/**
 * Chunked result assembly
 *
 * Large query results come back as a first chunk plus a declared chunk count.
 * The remaining chunks are fetched one by one, in index order, and joined into
 * a single row list. Any chunk that fails after its retries voids the whole
 * result: a partial row set is never returned.
 */

import type { ClassifiedError } from './errors.js'

import { logger } from '../logger.js'
import { fail, type Result, succeed } from './result.js'
import { type RetryOptions, runWithRetry } from './retry.js'

/**
 * One page of a chunked response
 */
export interface ResultChunk<Row> {
  chunkIndex?: number
  rows: null | Row[] | undefined
  totalChunkCount?: number
  truncated?: boolean
}

export interface AssembledResult<Row> {
  chunksFetched: number
  rowCount: number
  rows: Row[]
  totalChunkCount: number
  truncated: boolean
}

export interface AssembleOptions {
  retry?: RetryOptions
  rowLimit?: number
}

function applyRowLimit<Row>(rows: Row[], truncated: boolean, rowLimit?: number): { rows: Row[]; truncated: boolean } {
  if (rowLimit !== undefined && rowLimit >= 0 && rows.length > rowLimit) {
    return { rows: rows.slice(0, rowLimit), truncated: true }
  }

  return { rows, truncated }
}

/**
 * Assemble all chunks of a result starting from its first chunk.
 *
 * `fetchChunk(index)` is called for indices 1..C-1 exactly once each, in
 * ascending order, where C is the chunk count declared by `initial`.
 * Chunk counts reported by later chunks are ignored.
 */
export async function assembleChunks<Row>(
  initial: ResultChunk<Row>,
  fetchChunk: (index: number) => Promise<ResultChunk<Row>>,
  options: AssembleOptions = {}
): Promise<Result<AssembledResult<Row>, ClassifiedError>> {
  const totalChunkCount = Math.max(1, Math.floor(initial.totalChunkCount ?? 1))
  const initialRows = initial.rows ?? []

  if (totalChunkCount <= 1) {
    const limited = applyRowLimit(initialRows, initial.truncated ?? false, options.rowLimit)
    return succeed({
      chunksFetched: 1,
      rowCount: limited.rows.length,
      rows: limited.rows,
      totalChunkCount,
      truncated: limited.truncated,
    })
  }

  const accumulated: Row[] = [...initialRows]
  let truncated = initial.truncated ?? false

  for (let index = 1; index < totalChunkCount; index++) {
    // eslint-disable-next-line no-await-in-loop
    const chunk = await runWithRetry(() => fetchChunk(index), {
      ...options.retry,
      label: `${options.retry?.label ?? 'chunk'} ${index}/${totalChunkCount - 1}`,
    })

    if (!chunk.ok) {
      logger.debug(`Chunk ${index} failed, discarding ${accumulated.length} assembled rows`)
      return fail(chunk.error)
    }

    const { value } = chunk
    if (value.totalChunkCount !== undefined && value.totalChunkCount !== totalChunkCount) {
      logger.debug(`Chunk ${index} reports ${value.totalChunkCount} chunks, keeping ${totalChunkCount}`)
    }

    const rows = value.rows ?? []
    accumulated.push(...rows)
    truncated ||= value.truncated ?? false
    logger.chunk(index, totalChunkCount, rows.length)
  }

  const limited = applyRowLimit(accumulated, truncated, options.rowLimit)
  logger.verbose(`Assembled ${totalChunkCount} chunks, ${accumulated.length} rows`)

  return succeed({
    chunksFetched: totalChunkCount,
    rowCount: limited.rows.length,
    rows: limited.rows,
    totalChunkCount,
    truncated: limited.truncated,
  })
}
