/**
 * Base API class with common request plumbing
 */

import type { Connection } from '../types.js'

import { apiRequest, unwrapResponse } from './request.js'

type Query = Record<string, boolean | number | string | undefined>

/**
 * Base class providing authenticated, throwing request helpers.
 * `prefix` is prepended to every endpoint (account APIs live under the account id).
 */
export class BaseApi {
  constructor(
    protected connection: Connection,
    protected prefix = ''
  ) {}

  protected async httpGet<T>(endpoint: string, query: Query = {}): Promise<T> {
    return unwrapResponse(await apiRequest<T>(this.connection, 'GET', this.path(endpoint, query)))
  }

  protected async httpPost<T>(endpoint: string, body: object = {}): Promise<T> {
    return unwrapResponse(await apiRequest<T>(this.connection, 'POST', this.path(endpoint), body))
  }

  protected async httpDelete<T>(endpoint: string, query: Query = {}): Promise<T> {
    return unwrapResponse(await apiRequest<T>(this.connection, 'DELETE', this.path(endpoint, query)))
  }

  private path(endpoint: string, query: Query = {}): string {
    const params = new URLSearchParams()
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value))
    }

    const search = params.toString()
    return `${this.prefix}${endpoint}${search ? `?${search}` : ''}`
  }
}
