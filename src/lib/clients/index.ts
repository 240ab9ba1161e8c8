/**
 * Client scopes and their factories
 */

import type { RetryOptions } from '../execution/retry.js'
import type { CredentialProfile } from '../types.js'

import { AccountClient, accountConnection, WorkspaceClient, workspaceConnection } from '../api/index.js'
import { logger } from '../logger.js'
import { type ClientFactories, ClientRegistry } from './registry.js'

export { type ClientFactories, ClientRegistry, type HandleState } from './registry.js'

/**
 * Client handle type per backend scope
 */
export interface ScopeClients {
  account: AccountClient
  workspace: WorkspaceClient
}

export type ClientScope = keyof ScopeClients

export const CLIENT_SCOPES = ['account', 'workspace'] as const satisfies readonly ClientScope[]

/**
 * Anything that hands out clients per scope (the registry, or a test double)
 */
export interface ClientResolver {
  getOrInit<S extends ClientScope>(scope: S): Promise<ScopeClients[S]>
}

export interface ClientFactoryOptions {
  fetch?: typeof fetch
  // Explains why no profile resolved; thrown on first use of any scope
  missingProfileMessage?: () => string
  resolveProfile: () => CredentialProfile | undefined
}

/**
 * Factories building each scope's client from the active profile.
 * The profile is resolved on every construction, so a profile switch
 * followed by a registry reset takes effect on the next dispatch.
 */
export function createClientFactories(options: ClientFactoryOptions): ClientFactories<ScopeClients> {
  const requireProfile = (): CredentialProfile => {
    const profile = options.resolveProfile()
    if (!profile) {
      throw new Error(options.missingProfileMessage?.() ?? 'No credentials configured')
    }

    return profile
  }

  return {
    async account() {
      const profile = requireProfile()
      if (!profile.accountId) {
        throw new Error(`Profile "${profile.name}" has no account_id; account-scoped operations need credentials with an account id`)
      }

      const client = new AccountClient(accountConnection(profile, options.fetch), profile.accountId)
      await client.handshake()
      logger.clientInit('account', 'handshake ok', profile.accountId)
      return client
    },

    async workspace() {
      const profile = requireProfile()
      const client = new WorkspaceClient(workspaceConnection(profile, options.fetch))
      const me = await client.handshake()
      logger.clientInit('workspace', 'handshake ok', me.userName ?? me.id)
      return client
    },
  }
}

/**
 * Registry over the standard scope factories
 */
export function createClientRegistry(options: ClientFactoryOptions, retry: RetryOptions = {}): ClientRegistry<ScopeClients> {
  return new ClientRegistry<ScopeClients>(createClientFactories(options), retry)
}
