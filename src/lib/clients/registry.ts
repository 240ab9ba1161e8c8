/**
 * Per-scope client registry
 *
 * Each scope owns at most one client handle for the life of the process.
 * Construction may need a network handshake, so it runs through the retry
 * executor, and concurrent first callers share the same in-flight attempt.
 *
 *   uninitialized ──getOrInit──▶ initializing ──▶ ready (terminal)
 *                                     │
 *                                     └──▶ failed ──getOrInit──▶ initializing
 */

import { logger } from '../logger.js'
import { retryOrThrow, type RetryOptions } from '../execution/retry.js'

export type HandleState = 'failed' | 'initializing' | 'ready' | 'uninitialized'

export type ClientFactories<M> = { [S in keyof M]: () => Promise<M[S]> }

type InFlight<M> = { [S in keyof M]?: Promise<M[S]> }

export class ClientRegistry<M extends object> {
  private readonly factories: ClientFactories<M>
  private generation = 0
  private readonly inFlight: InFlight<M> = {}
  private readonly ready: Partial<M> = {}
  private readonly retry: RetryOptions
  private readonly states = new Map<keyof M, HandleState>()

  constructor(factories: ClientFactories<M>, retry: RetryOptions = {}) {
    this.factories = factories
    this.retry = retry
  }

  /**
   * Client for `scope`, constructing it on first use.
   * Rejects with the classified construction error; the failure is not
   * cached, so the next call tries again.
   */
  async getOrInit<S extends keyof M>(scope: S): Promise<M[S]> {
    const existing = this.ready[scope]
    if (existing !== undefined) {
      return existing
    }

    const pending: Promise<M[S]> | undefined = this.inFlight[scope]
    if (pending) {
      logger.trace(`Awaiting in-flight ${String(scope)} client construction`)
      return pending
    }

    this.states.set(scope, 'initializing')
    logger.clientInit(String(scope), 'initializing')

    // a construction started before reset() still answers its own callers
    // but must not publish its client
    const generation = this.generation
    const factory = this.factories[scope]
    const construction: Promise<M[S]> = retryOrThrow(() => factory(), { ...this.retry, label: `${String(scope)} client` })
      .then(client => {
        if (generation === this.generation) {
          this.ready[scope] = client
          this.states.set(scope, 'ready')
          logger.clientInit(String(scope), 'ready')
        }

        return client
      })
      .finally(() => {
        if (this.inFlight[scope] === construction) delete this.inFlight[scope]
      })

    this.inFlight[scope] = construction

    try {
      return await construction
    } catch (error) {
      if (generation !== this.generation) throw error
      this.states.set(scope, 'failed')
      logger.clientInit(String(scope), 'failed', error instanceof Error ? error.message : String(error))
      throw error
    }
  }

  /**
   * Drop every handle, e.g. after switching profile
   */
  reset(): void {
    this.generation++
    for (const scope of Object.keys(this.ready)) {
      if (this.isScope(scope)) delete this.ready[scope]
    }

    for (const scope of Object.keys(this.inFlight)) {
      if (this.isScope(scope)) delete this.inFlight[scope]
    }

    this.states.clear()
  }

  state(scope: keyof M): HandleState {
    return this.states.get(scope) ?? 'uninitialized'
  }

  private isScope(key: PropertyKey): key is keyof M {
    return key in this.factories
  }
}
