/**
 * Shared Operation Context
 *
 * Provides a unified context for all interfaces (CLI, RPC, MCP)
 * to share credentials, settings, client handles and the router.
 */

import type { ExecutionSettings } from '../config.js'
import type { OperationDefinition } from './definition.js'

import { type ClientRegistry, createClientRegistry, type ScopeClients } from '../clients/index.js'
import { loadSettings } from '../config.js'
import { CredentialsManager, getMissingProfileMessage } from '../credentials.js'
import { OPERATIONS } from './catalog/index.js'
import { OperationRouter } from './router.js'

/**
 * Shared context for operations across all interfaces
 */
export interface OperationContext {
  credentials: CredentialsManager
  profileName?: string
  registry: ClientRegistry<ScopeClients>
  router: OperationRouter
  settings: ExecutionSettings
}

/**
 * Options for creating a new operation context
 */
export interface CreateContextOptions {
  credentials?: CredentialsManager
  definitions?: readonly OperationDefinition[]
  fetch?: typeof fetch
  profileName?: string
  settings?: ExecutionSettings
  sleep?: (ms: number) => Promise<void>
}

/**
 * Create a new operation context
 *
 * Clients are not built here: each scope's client is constructed on the
 * first dispatch that needs it, from whichever profile is active then.
 */
export function createContext(options: CreateContextOptions = {}): OperationContext {
  const credentials = options.credentials ?? CredentialsManager.load()
  const settings = options.settings ?? loadSettings()
  const retry = {
    baseDelayMs: settings.baseDelayMs,
    maxAttempts: settings.maxAttempts,
    maxDelayMs: settings.maxDelayMs,
    sleep: options.sleep,
  }

  // Factories read the profile through ctx so that updateContext applies
  const ctx: Omit<OperationContext, 'registry' | 'router'> = {
    credentials,
    profileName: options.profileName,
    settings,
  }

  const registry = createClientRegistry({
    fetch: options.fetch,
    missingProfileMessage: () => getMissingProfileMessage(credentials, ctx.profileName),
    resolveProfile: () => credentials.resolve(ctx.profileName),
  }, retry)

  const router = new OperationRouter(options.definitions ?? OPERATIONS, registry, { settings, sleep: options.sleep })

  return Object.assign(ctx, { registry, router })
}

/**
 * Update context configuration
 *
 * Switching profile drops the client handles so the next dispatch
 * builds them against the new profile.
 */
export function updateContext(ctx: OperationContext, updates: { profileName?: string }): void {
  if (updates.profileName !== undefined) {
    ctx.profileName = updates.profileName || undefined
    ctx.registry.reset()
  }
}

/**
 * Get current context configuration summary
 */
export function getContextConfig(ctx: OperationContext): {
  accountId?: string
  host?: string
  profile?: string
  scopes: Record<keyof ScopeClients, string>
  settings: ExecutionSettings
} {
  const profile = ctx.credentials.resolve(ctx.profileName)
  return {
    accountId: profile?.accountId,
    host: profile?.host,
    profile: profile?.name ?? ctx.profileName,
    scopes: {
      account: ctx.registry.state('account'),
      workspace: ctx.registry.state('workspace'),
    },
    settings: ctx.settings,
  }
}
