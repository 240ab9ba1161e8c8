/**
 * JSON-RPC 2.0 Server for lakehouse-ops
 *
 * Dispatches catalog operations over stdio.
 * Protocol: newline-delimited JSON-RPC 2.0
 *
 * This is a thin adapter over the shared operations layer.
 */

import * as readline from 'node:readline'
import { z } from 'zod'

import type { DispatchError } from '../lib/operations/index.js'

import { CLIENT_SCOPES } from '../lib/clients/index.js'
import { InvalidArgumentsError, UnknownOperationError } from '../lib/execution/errors.js'
import {
  getContextConfig,
  type OperationContext,
  updateContext,
} from '../lib/operations/index.js'

const VERSION = '1.0'

// ── Types ──────────────────────────────────────────────────────────

export interface JsonRpcRequest {
  id: null | number | string
  jsonrpc: '2.0'
  method: string
  params?: Record<string, unknown>
}

export interface JsonRpcResponse {
  error?: { code: number; data?: unknown; message: string }
  id: null | number | string
  jsonrpc: '2.0'
  result?: unknown
}

/**
 * Per-connection state handed to every method
 */
export interface RpcSession {
  ctx: OperationContext
  onShutdown: () => void
}

// ── JSON-RPC Error Codes ───────────────────────────────────────────

export const RPC_ERRORS = {
  INTERNAL_ERROR: -32_603,
  INVALID_PARAMS: -32_602,
  INVALID_REQUEST: -32_600,
  METHOD_NOT_FOUND: -32_601,
  OPERATION_FAILED: -32_000,
  PARSE_ERROR: -32_700,
}

export class RpcError extends Error {
  code: number
  data?: unknown

  constructor(code: number, message: string, data?: unknown) {
    super(message)
    this.code = code
    this.data = data
    this.name = 'RpcError'
  }
}

// ── Helper: Convert Errors to RPC Errors ───────────────────────────

function dispatchErrorToRpc(error: DispatchError): RpcError {
  if (error instanceof UnknownOperationError) {
    return new RpcError(RPC_ERRORS.METHOD_NOT_FOUND, error.message, error.toJSON())
  }

  if (error instanceof InvalidArgumentsError) {
    return new RpcError(RPC_ERRORS.INVALID_PARAMS, error.message, { ...error.toJSON(), issues: error.issues })
  }

  return new RpcError(RPC_ERRORS.OPERATION_FAILED, error.message, error.toJSON())
}

function toRpcError(error: unknown): RpcError {
  if (error instanceof RpcError) {
    return error
  }

  return new RpcError(
    RPC_ERRORS.INTERNAL_ERROR,
    error instanceof Error ? error.message : 'Internal error'
  )
}

function parseParams<S extends z.ZodTypeAny>(schema: S, params: Record<string, unknown>): z.output<S> {
  const parsed = schema.safeParse(params)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new RpcError(RPC_ERRORS.INVALID_PARAMS, `${where}${issue?.message ?? 'Invalid params'}`)
  }

  return parsed.data
}

// ── Method Handlers ────────────────────────────────────────────────

type MethodHandler = (params: Record<string, unknown>, session: RpcSession) => Promise<unknown>

const DispatchParams = z.object({
  arguments: z.record(z.unknown()).default({}),
  operation: z.string().min(1),
})

const OperationsParams = z.object({
  scope: z.enum(CLIENT_SCOPES).optional(),
})

const ConfigSetParams = z.object({
  profile: z.string().optional(),
})

const methods: Record<string, MethodHandler> = {
  // ── Config Methods ───────────────────────────────────────────────

  async 'config'(_params, { ctx }) {
    return getContextConfig(ctx)
  },

  async 'config.set'(params, { ctx }) {
    const { profile } = parseParams(ConfigSetParams, params)

    if (profile && !ctx.credentials.has(profile)) {
      throw new RpcError(RPC_ERRORS.INVALID_PARAMS, `Profile "${profile}" not found`, {
        profiles: ctx.credentials.listNames(),
      })
    }

    updateContext(ctx, { profileName: profile })
    return { ...getContextConfig(ctx), ok: true }
  },

  // ── Operation Methods ────────────────────────────────────────────

  async 'dispatch'(params, { ctx }) {
    const { arguments: args, operation } = parseParams(DispatchParams, params)

    const result = await ctx.router.dispatch(operation, args)
    if (!result.ok) {
      throw dispatchErrorToRpc(result.error)
    }

    return result.value
  },

  async 'operations'(params, { ctx }) {
    const { scope } = parseParams(OperationsParams, params)
    return { operations: ctx.router.list(scope) }
  },

  // ── Lifecycle Methods ────────────────────────────────────────────

  async 'shutdown'(_params, { onShutdown }) {
    setImmediate(onShutdown)
    return { ok: true }
  },
}

// ── Request Processing ─────────────────────────────────────────────

const RequestEnvelope = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  jsonrpc: z.literal('2.0', { errorMap: () => ({ message: 'jsonrpc must be "2.0"' }) }),
  method: z.string({ errorMap: () => ({ message: 'method must be a string' }) }),
  params: z.record(z.unknown()).optional(),
})

export function parseRequest(line: string): JsonRpcRequest {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    throw new RpcError(RPC_ERRORS.PARSE_ERROR, 'Parse error')
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RpcError(RPC_ERRORS.INVALID_REQUEST, 'Invalid Request')
  }

  const envelope = RequestEnvelope.safeParse(parsed)
  if (!envelope.success) {
    throw new RpcError(RPC_ERRORS.INVALID_REQUEST, `Invalid Request: ${envelope.error.issues[0]?.message ?? 'malformed'}`)
  }

  return {
    id: envelope.data.id ?? null,
    jsonrpc: '2.0',
    method: envelope.data.method,
    params: envelope.data.params,
  }
}

export async function handleRequest(request: JsonRpcRequest, session: RpcSession): Promise<JsonRpcResponse> {
  const handler = Object.hasOwn(methods, request.method) ? methods[request.method] : undefined
  const { id } = request

  if (!handler) {
    return {
      error: { code: RPC_ERRORS.METHOD_NOT_FOUND, message: `Method not found: ${request.method}` },
      id,
      jsonrpc: '2.0',
    }
  }

  try {
    const result = await handler(request.params ?? {}, session)
    return {
      id,
      jsonrpc: '2.0',
      result,
    }
  } catch (error) {
    const rpcError = toRpcError(error)
    return {
      error: {
        code: rpcError.code,
        message: rpcError.message,
        ...(rpcError.data !== undefined && { data: rpcError.data }),
      },
      id,
      jsonrpc: '2.0',
    }
  }
}

/**
 * Parse and handle one input line; protocol-level failures become error responses
 */
export async function processLine(line: string, session: RpcSession): Promise<JsonRpcResponse> {
  try {
    return await handleRequest(parseRequest(line), session)
  } catch (error) {
    const rpcError = toRpcError(error)
    return {
      error: { code: rpcError.code, message: rpcError.message },
      id: null,
      jsonrpc: '2.0',
    }
  }
}

/**
 * Requests still being answered; stdin closing waits for these
 */
export class PendingRequests {
  private readonly pending = new Set<Promise<void>>()

  get size(): number {
    return this.pending.size
  }

  /**
   * Resolves once every tracked request, including ones tracked while
   * waiting, has settled
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      // eslint-disable-next-line no-await-in-loop
      await Promise.all(this.pending)
    }
  }

  track(work: Promise<void>): void {
    const entry: Promise<void> = work
      .catch((error: unknown) => console.error('RPC write failed:', error))
      .finally(() => {
        this.pending.delete(entry)
      })
    this.pending.add(entry)
  }
}

// ── Server Entry Point ─────────────────────────────────────────────

export async function runRpcServer(ctx: OperationContext): Promise<void> {
  const session: RpcSession = {
    ctx,
    onShutdown() {
      // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit
      process.exit(0)
    },
  }

  // Send ready signal
  console.log(JSON.stringify({ ready: true, version: VERSION }))

  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  })

  const requests = new PendingRequests()

  rl.on('line', (line) => {
    if (!line.trim()) return

    requests.track(processLine(line, session).then(response => {
      console.log(JSON.stringify(response))
    }))
  })

  rl.on('close', () => {
    requests.drain().then(
      // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit
      () => process.exit(0),
      (error: unknown) => {
        console.error('RPC shutdown failed:', error)
        // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit
        process.exit(1)
      }
    )
  })

  console.error('lakehouse-ops RPC server running on stdio')
}
