import { expect } from 'chai'

import { testContext } from '../../../helpers/context.js'

const LIST = '/api/2.1/jobs/list'

function jobs(from: number, count: number): Array<{ job_id: number }> { // eslint-disable-line camelcase
  return Array.from({ length: count }, (_, i) => ({ job_id: from + i })) // eslint-disable-line camelcase
}

describe('lib/operations/catalog/jobs', () => {
  describe('list_jobs', () => {
    it('follows page tokens until the limit is reached', async () => {
      const { backend, ctx } = testContext()
      backend.on('GET', LIST, call => (call.query.page_token === 'p2'
        ? { body: { has_more: true, jobs: jobs(101, 50), next_page_token: 'p3' } } // eslint-disable-line camelcase
        : { body: { has_more: true, jobs: jobs(1, 100), next_page_token: 'p2' } })) // eslint-disable-line camelcase

      const result = await ctx.router.dispatch('list_jobs', { limit: 150 })

      if (!result.ok) throw result.error
      expect(result.value).to.deep.include({ truncated: true })
      expect(backend.callsTo('GET', LIST).map(call => call.query)).to.deep.equal([
        { limit: '100' },
        { limit: '50', page_token: 'p2' }, // eslint-disable-line camelcase
      ])

      const { value } = result
      if (typeof value !== 'object' || value === null || !('jobs' in value) || !Array.isArray(value.jobs)) {
        throw new Error('expected a job list')
      }

      expect(value.jobs).to.have.length(150)
      expect(value.jobs[149]).to.deep.equal({ job_id: 150 }) // eslint-disable-line camelcase
    })

    it('stops when the platform reports no more pages', async () => {
      const { backend, ctx } = testContext()
      backend.on('GET', LIST, { body: { has_more: false, jobs: jobs(1, 2), next_page_token: 'ignored' } }) // eslint-disable-line camelcase

      const result = await ctx.router.dispatch('list_jobs', { name: 'nightly' })

      expect(result).to.deep.equal({ ok: true, value: { jobs: jobs(1, 2), truncated: false } })
      expect(backend.callsTo('GET', LIST).map(call => call.query)).to.deep.equal([{ limit: '100', name: 'nightly' }])
    })

    it('retries one failed page without repeating earlier pages', async () => {
      const { backend, ctx, delays } = testContext()
      let secondPageCalls = 0
      backend.on('GET', LIST, (call) => {
        if (call.query.page_token !== 'p2') {
          return { body: { has_more: true, jobs: jobs(1, 1), next_page_token: 'p2' } } // eslint-disable-line camelcase
        }

        secondPageCalls++
        return secondPageCalls === 1
          ? { body: { error_code: 'REQUEST_LIMIT_EXCEEDED', message: 'slow down' }, status: 429 } // eslint-disable-line camelcase
          : { body: { has_more: false, jobs: jobs(2, 1) } } // eslint-disable-line camelcase
      })

      const result = await ctx.router.dispatch('list_jobs', {})

      expect(result).to.deep.equal({ ok: true, value: { jobs: jobs(1, 2), truncated: false } })
      expect(backend.callsTo('GET', LIST)).to.have.length(3)
      expect(delays).to.deep.equal([1000])
    })
  })

  describe('run_job', () => {
    it('returns the run id without waiting by default', async () => {
      const { backend, ctx } = testContext()
      backend.on('POST', '/api/2.1/jobs/run-now', { body: { run_id: 7 } }) // eslint-disable-line camelcase

      const result = await ctx.router.dispatch('run_job', { job_id: 3, notebook_params: { day: '2026-01-01' } }) // eslint-disable-line camelcase

      expect(result).to.deep.equal({ ok: true, value: { run_id: 7 } }) // eslint-disable-line camelcase
      expect(backend.callsTo('POST', '/api/2.1/jobs/run-now')[0].body).to.deep.equal({
        job_id: 3, // eslint-disable-line camelcase
        notebook_params: { day: '2026-01-01' }, // eslint-disable-line camelcase
      })
    })

    it('polls the run until it terminates when asked to wait', async () => {
      const { backend, ctx, delays } = testContext()
      const finished = { run_id: 7, state: { life_cycle_state: 'TERMINATED', result_state: 'SUCCESS' } } // eslint-disable-line camelcase
      backend
        .on('POST', '/api/2.1/jobs/run-now', { body: { run_id: 7 } }) // eslint-disable-line camelcase
        .on(
          'GET',
          '/api/2.1/jobs/runs/get',
          { body: { run_id: 7, state: { life_cycle_state: 'RUNNING' } } }, // eslint-disable-line camelcase
          { body: finished }
        )

      const result = await ctx.router.dispatch('run_job', { job_id: 3, wait: true }) // eslint-disable-line camelcase

      expect(result).to.deep.equal({ ok: true, value: finished })
      expect(backend.callsTo('POST', '/api/2.1/jobs/run-now')).to.have.length(1)
      expect(backend.callsTo('GET', '/api/2.1/jobs/runs/get')[0].query).to.deep.equal({ run_id: '7' }) // eslint-disable-line camelcase
      expect(delays).to.deep.equal([5000])
    })

    it('fails when the run ends in an internal error', async () => {
      const { backend, ctx } = testContext()
      backend
        .on('POST', '/api/2.1/jobs/run-now', { body: { run_id: 8 } }) // eslint-disable-line camelcase
        .on('GET', '/api/2.1/jobs/runs/get', {
          body: { run_id: 8, state: { life_cycle_state: 'INTERNAL_ERROR', state_message: 'Cluster launch failure' } }, // eslint-disable-line camelcase
        })

      const result = await ctx.router.dispatch('run_job', { job_id: 3, wait: true }) // eslint-disable-line camelcase

      if (result.ok) throw new Error('expected failure')
      expect(result.error.message).to.equal('run 8 to finish failed: Cluster launch failure')
    })
  })

  describe('delete_jobs_batch', () => {
    it('deletes every job and reports missing ones as failures', async () => {
      const { backend, ctx } = testContext()
      backend.on('POST', '/api/2.1/jobs/delete', call => (
        typeof call.body === 'object' && call.body !== null && 'job_id' in call.body && call.body.job_id === 2
          ? { body: { error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'Job 2 does not exist.' }, status: 400 } // eslint-disable-line camelcase
          : { body: {} }
      ))

      const result = await ctx.router.dispatch('delete_jobs_batch', { job_ids: [1, 2, 3] }) // eslint-disable-line camelcase

      if (!result.ok) throw result.error
      expect(result.value).to.deep.include({ failedCount: 1, successfulCount: 2, total: 3 })
      expect(backend.callsTo('POST', '/api/2.1/jobs/delete')).to.have.length(3)
    })
  })
})
