/**
 * Secrets API module (scopes and secrets)
 */

import type { SecretMetadata, SecretScope } from '../types.js'

import { BaseApi } from './base.js'

export class SecretsApi extends BaseApi {
  async createScope(scope: string): Promise<void> {
    await this.httpPost('/api/2.0/secrets/scopes/create', { scope })
  }

  async deleteScope(scope: string): Promise<void> {
    await this.httpPost('/api/2.0/secrets/scopes/delete', { scope })
  }

  async deleteSecret(scope: string, key: string): Promise<void> {
    await this.httpPost('/api/2.0/secrets/delete', { key, scope })
  }

  async listScopes(): Promise<SecretScope[]> {
    const response = await this.httpGet<{ scopes?: SecretScope[] }>('/api/2.0/secrets/scopes/list')
    return response.scopes ?? []
  }

  async listSecrets(scope: string): Promise<SecretMetadata[]> {
    const response = await this.httpGet<{ secrets?: SecretMetadata[] }>('/api/2.0/secrets/list', { scope })
    return response.secrets ?? []
  }

  async putSecret(scope: string, key: string, value: string): Promise<void> {
    await this.httpPost('/api/2.0/secrets/put', { key, scope, string_value: value }) // eslint-disable-line camelcase
  }
}
