/**
 * Jobs API module (jobs and runs)
 */

import type { JobInfo, JobList, JobSettings, RunInfo } from '../types.js'

import { BaseApi } from './base.js'
import { pollUntil, type PollVerdict, type WaitOptions } from './wait.js'

const TERMINAL_RUN_STATES = new Set(['INTERNAL_ERROR', 'SKIPPED', 'TERMINATED'])

export class JobsApi extends BaseApi {
  async cancelRun(runId: number): Promise<void> {
    await this.httpPost('/api/2.1/jobs/runs/cancel', { run_id: runId })
  }

  async create(settings: JobSettings): Promise<{ job_id: number }> {
    return this.httpPost('/api/2.1/jobs/create', settings)
  }

  async delete(jobId: number): Promise<void> {
    await this.httpPost('/api/2.1/jobs/delete', { job_id: jobId })
  }

  async get(jobId: number): Promise<JobInfo> {
    return this.httpGet('/api/2.1/jobs/get', { job_id: jobId })
  }

  async getRun(runId: number): Promise<RunInfo> {
    return this.httpGet('/api/2.1/jobs/runs/get', { run_id: runId })
  }

  /**
   * One page of jobs; pass `next_page_token` back as `pageToken` for the next
   */
  async list(options: { limit?: number; name?: string; pageToken?: string } = {}): Promise<JobList> {
    return this.httpGet('/api/2.1/jobs/list', {
      limit: options.limit,
      name: options.name,
      page_token: options.pageToken, // eslint-disable-line camelcase
    })
  }

  async runNow(jobId: number, notebookParams?: Record<string, string>): Promise<{ run_id: number }> {
    return this.httpPost('/api/2.1/jobs/run-now', { job_id: jobId, notebook_params: notebookParams }) // eslint-disable-line camelcase
  }

  /**
   * Block until the run reaches a terminal life cycle state
   */
  async waitForRun(runId: number, options: Partial<WaitOptions> = {}): Promise<RunInfo> {
    return pollUntil(
      `run ${runId} to finish`,
      () => this.getRun(runId),
      (run): PollVerdict => {
        const state = run.state?.life_cycle_state
        if (state === 'INTERNAL_ERROR') {
          return { failed: run.state?.state_message ?? 'internal error' }
        }

        return state && TERMINAL_RUN_STATES.has(state) ? 'done' : 'pending'
      },
      options
    )
  }
}
