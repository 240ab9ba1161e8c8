/**
 * Operation Router
 *
 * Static table from operation id to definition, built once. Dispatch looks
 * the operation up, resolves its scope's client through the registry and
 * runs the handler. Whatever goes wrong comes back as a Result failure.
 */

import type { ClientResolver, ClientScope } from '../clients/index.js'
import type { ExecutionSettings } from '../config.js'
import type { Result } from '../execution/result.js'
import type { OperationDefinition, OperationKind, OperationRuntime } from './definition.js'

import { classify, type ClassifiedError, UnknownOperationError } from '../execution/errors.js'
import { fail, succeed } from '../execution/result.js'
import { logger } from '../logger.js'

export type DispatchError = ClassifiedError | UnknownOperationError

export interface RouterOptions {
  settings: Pick<ExecutionSettings, 'baseDelayMs' | 'maxAttempts' | 'maxDelayMs' | 'maxWorkers' | 'pollIntervalMs' | 'waitTimeoutMs'>
  // Replaces every backoff and polling sleep (tests)
  sleep?: (ms: number) => Promise<void>
}

/**
 * Catalog entry as listed to callers
 */
export interface OperationSummary {
  description: string
  id: string
  kind: OperationKind
  scope: ClientScope
}

export class OperationRouter {
  private readonly runtime: OperationRuntime
  private readonly table: ReadonlyMap<string, OperationDefinition>

  constructor(definitions: readonly OperationDefinition[], clients: ClientResolver, options: RouterOptions) {
    const table = new Map<string, OperationDefinition>()
    for (const definition of definitions) {
      if (table.has(definition.id)) {
        throw new Error(`Duplicate operation id: ${definition.id}`)
      }

      table.set(definition.id, definition)
    }

    this.table = table

    const { settings, sleep } = options
    this.runtime = {
      clients,
      maxWorkers: settings.maxWorkers,
      retry: {
        baseDelayMs: settings.baseDelayMs,
        maxAttempts: settings.maxAttempts,
        maxDelayMs: settings.maxDelayMs,
        sleep,
      },
      wait: {
        pollIntervalMs: settings.pollIntervalMs,
        sleep,
        timeoutMs: settings.waitTimeoutMs,
      },
    }
  }

  /**
   * Run an operation by id
   */
  async dispatch(operationId: string, args: unknown = {}): Promise<Result<unknown, DispatchError>> {
    const definition = this.table.get(operationId)
    if (!definition) {
      logger.debug(`Unknown operation requested: ${operationId}`)
      return fail(new UnknownOperationError(operationId))
    }

    const timerId = `dispatch-${operationId}-${performance.now()}`
    logger.timeStart(timerId, `dispatch ${operationId}`)
    logger.verbose(`Dispatching ${operationId} (${definition.scope}, ${definition.kind})`)

    try {
      return succeed(await definition.invoke(args, this.runtime))
    } catch (error) {
      const classified = classify(error)
      logger.debug(`${operationId} failed: ${classified.describe()}`)
      return fail(classified)
    } finally {
      logger.timeEnd(timerId)
    }
  }

  get(operationId: string): OperationDefinition | undefined {
    return this.table.get(operationId)
  }

  has(operationId: string): boolean {
    return this.table.has(operationId)
  }

  /**
   * Catalog in id order, optionally for one scope
   */
  list(scope?: ClientScope): OperationSummary[] {
    return [...this.table.values()]
      .filter(definition => scope === undefined || definition.scope === scope)
      .map(({ description, id, kind, scope: definitionScope }) => ({ description, id, kind, scope: definitionScope }))
      .sort((a, b) => a.id.localeCompare(b.id))
  }
}
