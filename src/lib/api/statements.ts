/**
 * SQL statement execution API module
 */

import type { ExecuteStatementRequest, StatementChunk, StatementResponse } from '../types.js'

import { BaseApi } from './base.js'
import { pollUntil, type PollVerdict, type WaitOptions } from './wait.js'

export class StatementsApi extends BaseApi {
  async cancel(statementId: string): Promise<void> {
    await this.httpPost(`/api/2.0/sql/statements/${encodeURIComponent(statementId)}/cancel`)
  }

  /**
   * Submit a statement. With a non-zero wait_timeout the first result chunk
   * is returned inline once the statement finishes within that time.
   */
  async execute(request: ExecuteStatementRequest): Promise<StatementResponse> {
    return this.httpPost('/api/2.0/sql/statements', {
      // INLINE disposition keeps rows in the response instead of presigned links
      disposition: 'INLINE',
      format: 'JSON_ARRAY',
      ...request,
    })
  }

  async get(statementId: string): Promise<StatementResponse> {
    return this.httpGet(`/api/2.0/sql/statements/${encodeURIComponent(statementId)}`)
  }

  async getChunk(statementId: string, chunkIndex: number): Promise<StatementChunk> {
    return this.httpGet(`/api/2.0/sql/statements/${encodeURIComponent(statementId)}/result/chunks/${chunkIndex}`)
  }

  /**
   * Block until the statement leaves PENDING/RUNNING. Only SUCCEEDED counts
   * as done; FAILED, CANCELED and CLOSED fail with the platform's message.
   */
  async waitForResult(statementId: string, options: Partial<WaitOptions> = {}): Promise<StatementResponse> {
    return pollUntil(
      `statement ${statementId}`,
      () => this.get(statementId),
      statementVerdict,
      options
    )
  }
}

/**
 * Poll verdict for a statement response
 */
export function statementVerdict(response: StatementResponse): PollVerdict {
  const state = response.status?.state
  if (state === 'SUCCEEDED') return 'done'
  if (state === 'PENDING' || state === 'RUNNING' || state === undefined) return 'pending'

  const error = response.status?.error
  const detail = error?.message ?? `statement is ${state}`
  return { failed: error?.error_code ? `${error.error_code}: ${detail}` : detail }
}
