/**
 * SQL statement operations
 *
 * Results larger than one inline chunk are assembled from the remaining
 * chunks before being returned, then cut to the requested row limit.
 */

import { z } from 'zod'

import type { ResultChunk } from '../../execution/chunks.js'
import type { Row, StatementChunk, StatementResponse, StatementState } from '../../types.js'
import type { HandlerContext } from '../definition.js'

import { statementVerdict } from '../../api/statements.js'
import { defineOperation } from '../definition.js'

// Rows kept per statement in a batch unless the caller asks otherwise
export const BATCH_ROW_LIMIT = 100

export interface StatementResult {
  chunks_fetched: number
  columns: string[]
  row_count: number
  rows: Row[]
  state: StatementState | undefined
  statement_id: string
  total_chunk_count: number
  truncated: boolean
}

type WorkspaceContext = HandlerContext<'workspace'>

const rowLimit = z.number().int().min(0).optional().describe('Maximum number of rows to return')
const warehouseId = z.string().min(1).describe('SQL warehouse ID')

function toChunk(chunk: StatementChunk, totalChunkCount?: number): ResultChunk<Row> {
  return {
    chunkIndex: chunk.chunk_index,
    rows: chunk.data_array,
    totalChunkCount,
    truncated: chunk.truncated,
  }
}

/**
 * Rows of a finished statement, every chunk included
 */
async function collectResult(ctx: WorkspaceContext, response: StatementResponse, limit?: number): Promise<StatementResult> {
  const { manifest } = response
  const columns = (manifest?.schema?.columns ?? []).map(column => column.name)
  const initial = toChunk(response.result ?? {}, manifest?.total_chunk_count)
  initial.truncated = (initial.truncated ?? false) || (manifest?.truncated ?? false)

  const assembled = await ctx.chunks(
    initial,
    async index => toChunk(await ctx.client.statements.getChunk(response.statement_id, index)),
    limit
  )

  return {
    chunks_fetched: assembled.chunksFetched, // eslint-disable-line camelcase
    columns,
    row_count: assembled.rowCount, // eslint-disable-line camelcase
    rows: assembled.rows,
    state: response.status?.state,
    statement_id: response.statement_id, // eslint-disable-line camelcase
    total_chunk_count: assembled.totalChunkCount, // eslint-disable-line camelcase
    truncated: assembled.truncated,
  }
}

interface StatementInput {
  catalog?: string
  schema?: string
  statement: string
  warehouse_id: string
}

/**
 * Submit, wait for completion and assemble the full result
 */
async function runStatement(ctx: WorkspaceContext, input: StatementInput, limit?: number): Promise<StatementResult> {
  const submitted = await ctx.call('submit', () => ctx.client.statements.execute({
    catalog: input.catalog,
    schema: input.schema,
    statement: input.statement,
    wait_timeout: '30s', // eslint-disable-line camelcase
    warehouse_id: input.warehouse_id, // eslint-disable-line camelcase
  }))

  let response = submitted
  const verdict = statementVerdict(submitted)
  if (verdict === 'pending') {
    response = await ctx.call('wait', () => ctx.client.statements.waitForResult(submitted.statement_id, ctx.wait))
  } else if (verdict !== 'done') {
    throw new Error(`Statement ${submitted.statement_id} failed: ${verdict.failed}`)
  }

  return collectResult(ctx, response, limit)
}

export const sqlOperations = [
  defineOperation({
    description: 'Execute a SQL statement on a warehouse and return all result rows',
    id: 'execute_statement',
    input: {
      catalog: z.string().optional().describe('Default catalog for the statement'),
      row_limit: rowLimit, // eslint-disable-line camelcase
      schema: z.string().optional().describe('Default schema for the statement'),
      statement: z.string().min(1).describe('SQL statement'),
      warehouse_id: warehouseId, // eslint-disable-line camelcase
    },
    kind: 'paged',
    run: (args, ctx) => runStatement(ctx, args, args.row_limit),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get the state of a statement, with all result rows once it has succeeded',
    id: 'get_statement',
    input: {
      row_limit: rowLimit, // eslint-disable-line camelcase
      statement_id: z.string().min(1), // eslint-disable-line camelcase
    },
    kind: 'paged',
    async run(args, ctx) {
      const response = await ctx.call('get', () => ctx.client.statements.get(args.statement_id))
      const verdict = statementVerdict(response)
      if (verdict === 'done') {
        return collectResult(ctx, response, args.row_limit)
      }

      return {
        error: verdict === 'pending' ? undefined : verdict.failed,
        state: response.status?.state,
        statement_id: response.statement_id, // eslint-disable-line camelcase
      }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Cancel a running statement',
    id: 'cancel_statement_execution',
    input: {
      statement_id: z.string().min(1), // eslint-disable-line camelcase
    },
    async run(args, ctx) {
      await ctx.client.statements.cancel(args.statement_id)
      return { cancelled: true, statement_id: args.statement_id } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Execute several SQL statements; sequential unless parallel is set, since statements may depend on each other',
    id: 'execute_statements_batch',
    input: {
      catalog: z.string().optional(),
      parallel: z.boolean().default(false).describe('Run statements concurrently'),
      row_limit: z.number().int().min(0).default(BATCH_ROW_LIMIT), // eslint-disable-line camelcase
      schema: z.string().optional(),
      statements: z.array(z.string().min(1)).min(1),
      warehouse_id: warehouseId, // eslint-disable-line camelcase
    },
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(
        args.statements,
        statement => runStatement(ctx, { ...args, statement }, args.row_limit),
        {
          keyOf: (_statement, index) => `statement_${index + 1}`,
          maxWorkers: args.parallel ? undefined : 1,
          retryItems: false,
        }
      )
    },
    scope: 'workspace',
  }),
]
