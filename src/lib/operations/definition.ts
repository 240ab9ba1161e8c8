/**
 * Operation definitions
 *
 * An operation pairs a zod input shape with a typed handler and the client
 * scope it runs against. `defineOperation` keeps the handler fully typed and
 * returns a type-erased definition the router can store in one table.
 */

import { z } from 'zod'

import type { WaitOptions } from '../api/wait.js'
import type { ClientResolver, ClientScope, ScopeClients } from '../clients/index.js'
import type { BatchReport } from '../execution/batch.js'
import type { AssembledResult, ResultChunk } from '../execution/chunks.js'

import { runBatch } from '../execution/batch.js'
import { assembleChunks } from '../execution/chunks.js'
import { InvalidArgumentsError } from '../execution/errors.js'
import { unwrap } from '../execution/result.js'
import { retryOrThrow, type RetryOptions } from '../execution/retry.js'

/**
 * How an operation talks to the backend:
 * - single: one remote call (plus its wait, if any); the router retries the whole handler
 * - paged: several dependent calls (pages, chunks); each goes through `ctx.call` or `ctx.chunks`
 * - batch: independent per-item calls through `ctx.batch`, each retried on its own
 */
export type OperationKind = 'batch' | 'paged' | 'single'

/**
 * Everything dispatch provides to an invocation
 */
export interface OperationRuntime {
  clients: ClientResolver
  maxWorkers: number
  retry: RetryOptions
  wait: Partial<WaitOptions>
}

export interface BatchCallOptions<I> {
  keyOf?: (item: I, index: number) => string
  maxWorkers?: number
  // false when perItem already retries its own calls through ctx.call/ctx.chunks
  retryItems?: boolean
}

/**
 * What a handler sees: its client plus the execution primitives
 */
export interface HandlerContext<S extends ClientScope> {
  batch<I, T>(items: readonly I[], perItem: (item: I) => Promise<T>, options?: BatchCallOptions<I>): Promise<BatchReport<T>>
  call<T>(label: string, fn: () => Promise<T>): Promise<T>
  chunks<Row>(
    initial: ResultChunk<Row>,
    fetchChunk: (index: number) => Promise<ResultChunk<Row>>,
    rowLimit?: number
  ): Promise<AssembledResult<Row>>
  client: ScopeClients[S]
  operationId: string
  wait: Partial<WaitOptions>
}

export type OperationArgs<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>

export interface OperationSpec<S extends ClientScope, Shape extends z.ZodRawShape, R> {
  description: string
  id: string
  input: Shape
  kind?: OperationKind
  run(args: OperationArgs<Shape>, ctx: HandlerContext<S>): Promise<R>
  scope: S
}

/**
 * Type-erased operation as stored in the routing table
 */
export interface OperationDefinition {
  readonly description: string
  readonly id: string
  readonly input: z.ZodRawShape
  invoke(args: unknown, runtime: OperationRuntime): Promise<unknown>
  readonly kind: OperationKind
  readonly scope: ClientScope
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function handlerContext<S extends ClientScope>(
  id: string,
  kind: OperationKind,
  client: ScopeClients[S],
  runtime: OperationRuntime
): HandlerContext<S> {
  return {
    async batch(items, perItem, options = {}) {
      const retryItems = options.retryItems ?? true
      return runBatch(
        items,
        (item, itemKey) => (retryItems
          ? retryOrThrow(() => perItem(item), { ...runtime.retry, label: `${id} [${itemKey}]` })
          : perItem(item)),
        { keyOf: options.keyOf, maxWorkers: options.maxWorkers ?? runtime.maxWorkers }
      )
    },

    async call(label, fn) {
      // single operations are already retried as a whole by invoke
      if (kind === 'single') return fn()
      return retryOrThrow(fn, { ...runtime.retry, label: `${id} ${label}` })
    },

    async chunks(initial, fetchChunk, rowLimit) {
      return unwrap(await assembleChunks(initial, fetchChunk, {
        retry: { ...runtime.retry, label: `${id} chunk` },
        rowLimit,
      }))
    },

    client,
    operationId: id,
    wait: runtime.wait,
  }
}

/**
 * Declare an operation
 */
export function defineOperation<S extends ClientScope, Shape extends z.ZodRawShape, R>(
  spec: OperationSpec<S, Shape, R>
): OperationDefinition {
  const schema = z.object(spec.input)
  const kind = spec.kind ?? 'single'

  return {
    description: spec.description,
    id: spec.id,
    input: spec.input,
    async invoke(args, runtime) {
      const parsed = schema.safeParse(args ?? {})
      if (!parsed.success) {
        throw new InvalidArgumentsError(spec.id, describeIssues(parsed.error))
      }

      const client = await runtime.clients.getOrInit(spec.scope)
      const ctx = handlerContext<S>(spec.id, kind, client, runtime)

      if (kind === 'single') {
        return retryOrThrow(() => spec.run(parsed.data, ctx), { ...runtime.retry, label: spec.id })
      }

      return spec.run(parsed.data, ctx)
    },
    kind,
    scope: spec.scope,
  }
}
