/**
 * Platform API clients
 * Facades composing the domain API modules for each client scope
 */

import type { Connection, CredentialProfile, ScimUser } from '../types.js'

import { DEFAULT_ACCOUNT_HOST } from '../types.js'
import { AccountApi } from './account.js'
import { BaseApi } from './base.js'
import { CatalogApi } from './catalog.js'
import { ClustersApi } from './clusters.js'
import { JobsApi } from './jobs.js'
import { SecretsApi } from './secrets.js'
import { StatementsApi } from './statements.js'
import { WarehousesApi } from './warehouses.js'
import { WorkspaceObjectsApi } from './workspace-objects.js'

export { type ApiResponse, apiRequest, RemoteCallError, unwrapResponse } from './request.js'
export { DEFAULT_WAIT, pollUntil, type PollVerdict, type WaitOptions } from './wait.js'

class IdentityApi extends BaseApi {
  async me(): Promise<ScimUser> {
    return this.httpGet('/api/2.0/preview/scim/v2/Me')
  }
}

/**
 * Workspace-scoped client: compute, jobs, SQL, secrets, workspace objects, Unity Catalog
 */
export class WorkspaceClient {
  readonly catalog: CatalogApi
  readonly clusters: ClustersApi
  readonly jobs: JobsApi
  readonly secrets: SecretsApi
  readonly statements: StatementsApi
  readonly warehouses: WarehousesApi
  readonly workspace: WorkspaceObjectsApi
  private readonly identity: IdentityApi

  constructor(readonly connection: Connection) {
    this.catalog = new CatalogApi(connection)
    this.clusters = new ClustersApi(connection)
    this.identity = new IdentityApi(connection)
    this.jobs = new JobsApi(connection)
    this.secrets = new SecretsApi(connection)
    this.statements = new StatementsApi(connection)
    this.warehouses = new WarehousesApi(connection)
    this.workspace = new WorkspaceObjectsApi(connection)
  }

  /**
   * Verify host and token by looking up the calling user
   */
  async handshake(): Promise<ScimUser> {
    return this.identity.me()
  }
}

/**
 * Account-scoped client: workspaces, users, groups, service principals, metastores
 */
export class AccountClient {
  readonly account: AccountApi

  constructor(readonly connection: Connection, accountId: string) {
    this.account = new AccountApi(connection, accountId)
  }

  /**
   * Verify host, account id and token with a one-user lookup
   */
  async handshake(): Promise<void> {
    await this.account.listUsers({ count: 1 })
  }
}

/**
 * Connection for the workspace host of a profile
 */
export function workspaceConnection(profile: CredentialProfile, fetchImpl?: typeof fetch): Connection {
  return { fetch: fetchImpl, host: profile.host, token: profile.token }
}

/**
 * Connection for the account console of a profile
 */
export function accountConnection(profile: CredentialProfile, fetchImpl?: typeof fetch): Connection {
  return { fetch: fetchImpl, host: profile.accountHost ?? DEFAULT_ACCOUNT_HOST, token: profile.token }
}
