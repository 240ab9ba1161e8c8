/**
 * Account API module (workspaces, identities, metastores)
 *
 * Endpoints are relative to /api/2.0/accounts/{account_id}.
 */

import type {
  AccountWorkspace,
  Connection,
  MetastoreInfo,
  ScimGroup,
  ScimList,
  ScimServicePrincipal,
  ScimUser,
} from '../types.js'

import { BaseApi } from './base.js'

export interface ScimQuery {
  count?: number
  filter?: string
  startIndex?: number
}

export class AccountApi extends BaseApi {
  constructor(connection: Connection, readonly accountId: string) {
    super(connection, `/api/2.0/accounts/${encodeURIComponent(accountId)}`)
  }

  async getGroup(groupId: string): Promise<ScimGroup> {
    return this.httpGet(`/scim/v2/Groups/${encodeURIComponent(groupId)}`)
  }

  async getMetastore(metastoreId: string): Promise<MetastoreInfo> {
    const response = await this.httpGet<{ metastore_info?: MetastoreInfo }>(`/metastores/${encodeURIComponent(metastoreId)}`)
    if (!response.metastore_info) {
      throw new Error(`Metastore ${metastoreId} not found`)
    }

    return response.metastore_info
  }

  async getUser(userId: string): Promise<ScimUser> {
    return this.httpGet(`/scim/v2/Users/${encodeURIComponent(userId)}`)
  }

  async getWorkspace(workspaceId: number): Promise<AccountWorkspace> {
    return this.httpGet(`/workspaces/${workspaceId}`)
  }

  async listGroups(query: ScimQuery = {}): Promise<ScimGroup[]> {
    const response = await this.httpGet<ScimList<ScimGroup>>('/scim/v2/Groups', { ...query })
    return response.Resources ?? []
  }

  async listMetastores(): Promise<MetastoreInfo[]> {
    const response = await this.httpGet<{ metastores?: MetastoreInfo[] }>('/metastores')
    return response.metastores ?? []
  }

  async listServicePrincipals(query: ScimQuery = {}): Promise<ScimServicePrincipal[]> {
    const response = await this.httpGet<ScimList<ScimServicePrincipal>>('/scim/v2/ServicePrincipals', { ...query })
    return response.Resources ?? []
  }

  async listUsers(query: ScimQuery = {}): Promise<ScimUser[]> {
    const response = await this.httpGet<ScimList<ScimUser>>('/scim/v2/Users', { ...query })
    return response.Resources ?? []
  }

  async listWorkspaces(): Promise<AccountWorkspace[]> {
    // This endpoint returns a bare array
    return this.httpGet('/workspaces')
  }
}
