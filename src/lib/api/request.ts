/**
 * Core API request utilities and types
 */

import type { Connection } from '../types.js'

import { logger } from '../logger.js'

/**
 * API response wrapper
 */
export interface ApiResponse<T> {
  data?: T
  error?: string
  errorCode?: string
  ok: boolean
  status: number
}

/**
 * Failed remote call. The message carries status, platform error code and
 * platform message, which is what error classification inspects.
 */
export class RemoteCallError extends Error {
  readonly errorCode?: string
  readonly status: number

  constructor(status: number, message: string, errorCode?: string) {
    const prefix = status > 0 ? `HTTP ${status}${errorCode ? ` ${errorCode}` : ''}: ` : ''
    super(`${prefix}${message}`)
    this.name = 'RemoteCallError'
    this.status = status
    this.errorCode = errorCode
  }
}

interface PlatformErrorBody {
  error?: string
  error_code?: string
  message?: string
}

function describeFetchFailure(error: unknown): string {
  if (!(error instanceof Error)) return 'Unknown error'

  // undici puts the socket-level code on the cause
  const { cause } = error
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return `${error.message} (${cause.code})`
  }

  return error.message
}

/**
 * Make authenticated API request
 */
export async function apiRequest<T>(
  connection: Connection,
  method: string,
  endpoint: string,
  body?: object
): Promise<ApiResponse<T>> {
  const url = `${connection.host.replace(/\/+$/, '')}${endpoint}`
  const doFetch = connection.fetch ?? fetch

  logger.apiCall(method, endpoint)

  if (body) {
    logger.requestBody(body)
  }

  const requestId = `api-${method}-${endpoint}-${performance.now()}`
  logger.timeStart(requestId, `${method} ${endpoint}`)

  const headers: Record<string, string> = {
    accept: 'application/json',
    Authorization: `Bearer ${connection.token}`,
  }

  let requestBody: string | undefined
  if (body) {
    headers['Content-Type'] = 'application/json'
    requestBody = JSON.stringify(body)
  }

  try {
    const startTime = performance.now()
    const response = await doFetch(url, {
      body: requestBody,
      headers,
      method,
    })
    const durationMs = Math.round(performance.now() - startTime)

    logger.timeEnd(requestId)
    logger.apiResponse(response.status, response.statusText, durationMs)

    const text = await response.text()

    if (!response.ok) {
      let errorMessage = response.statusText || `HTTP ${response.status}`
      let errorCode: string | undefined
      try {
        const errorData = JSON.parse(text) as PlatformErrorBody
        errorMessage = errorData.message || errorData.error || errorMessage
        errorCode = errorData.error_code
      } catch {
        if (text.trim()) errorMessage = text.trim().slice(0, 500)
      }

      logger.debug('Error:', errorMessage)

      return {
        error: errorMessage,
        errorCode,
        ok: false,
        status: response.status,
      }
    }

    const data = JSON.parse(text || '{}') as T

    logger.responseData(data)

    return {
      data,
      ok: true,
      status: response.status,
    }
  } catch (error) {
    logger.timeEnd(requestId)
    const message = describeFetchFailure(error)
    logger.debug('Request failed:', message)

    return {
      error: message,
      ok: false,
      status: 0,
    }
  }
}

/**
 * Data of a successful response, or throw RemoteCallError
 */
export function unwrapResponse<T>(response: ApiResponse<T>): T {
  if (!response.ok || response.data === undefined) {
    throw new RemoteCallError(response.status, response.error ?? 'Empty response', response.errorCode)
  }

  return response.data
}
