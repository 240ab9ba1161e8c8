/**
 * Job and run operations
 */

import { z } from 'zod'

import type { JobInfo } from '../../types.js'

import { defineOperation } from '../definition.js'

const jobId = z.number().int().positive().describe('Job ID')
const runId = z.number().int().positive().describe('Run ID')

// Upper bound the jobs API accepts for one page
const JOBS_PAGE_SIZE = 100

export const jobOperations = [
  defineOperation({
    description: 'List jobs, following page tokens until the limit is reached',
    id: 'list_jobs',
    input: {
      limit: z.number().int().min(1).default(100).describe('Maximum number of jobs to return'),
      name: z.string().optional().describe('Exact job name filter'),
    },
    kind: 'paged',
    async run(args, ctx) {
      const jobs: JobInfo[] = []
      let pageToken: string | undefined

      do {
        const token = pageToken
        const pageSize = Math.min(JOBS_PAGE_SIZE, args.limit - jobs.length)
        // eslint-disable-next-line no-await-in-loop
        const page = await ctx.call(`page ${token ?? 'first'}`, () =>
          ctx.client.jobs.list({ limit: pageSize, name: args.name, pageToken: token })
        )
        jobs.push(...(page.jobs ?? []))
        pageToken = page.has_more === false ? undefined : page.next_page_token
      } while (pageToken && jobs.length < args.limit)

      return { jobs: jobs.slice(0, args.limit), truncated: pageToken !== undefined }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get a job definition',
    id: 'get_job',
    input: { job_id: jobId }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.jobs.get(args.job_id),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Create a job from its settings (name, tasks, clusters)',
    id: 'create_job',
    input: {
      job_clusters: z.array(z.record(z.unknown())).optional(), // eslint-disable-line camelcase
      name: z.string().min(1),
      tasks: z.array(z.record(z.unknown())).min(1),
    },
    run: (args, ctx) => ctx.client.jobs.create(args),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Trigger a job run, optionally waiting for it to finish',
    id: 'run_job',
    input: {
      job_id: jobId, // eslint-disable-line camelcase
      notebook_params: z.record(z.string()).optional(), // eslint-disable-line camelcase
      wait: z.boolean().default(false).describe('Wait until the run reaches a terminal state'),
    },
    kind: 'paged',
    async run(args, ctx) {
      const { run_id: triggered } = await ctx.call('trigger', () => ctx.client.jobs.runNow(args.job_id, args.notebook_params))
      if (!args.wait) {
        return { run_id: triggered } // eslint-disable-line camelcase
      }

      return ctx.call('wait', () => ctx.client.jobs.waitForRun(triggered, ctx.wait))
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get the state of a job run',
    id: 'get_run',
    input: { run_id: runId }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.jobs.getRun(args.run_id),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Cancel a job run',
    id: 'cancel_run',
    input: { run_id: runId }, // eslint-disable-line camelcase
    async run(args, ctx) {
      await ctx.client.jobs.cancelRun(args.run_id)
      return { cancelled: true, run_id: args.run_id } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete a job',
    id: 'delete_job',
    input: { job_id: jobId }, // eslint-disable-line camelcase
    async run(args, ctx) {
      await ctx.client.jobs.delete(args.job_id)
      return { deleted: true, job_id: args.job_id } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get several job definitions concurrently',
    id: 'get_jobs_batch',
    input: { job_ids: z.array(jobId).min(1) }, // eslint-disable-line camelcase
    kind: 'batch',
    run: (args, ctx) => ctx.batch(args.job_ids, id => ctx.client.jobs.get(id)),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete several jobs concurrently',
    id: 'delete_jobs_batch',
    input: { job_ids: z.array(jobId).min(1) }, // eslint-disable-line camelcase
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(args.job_ids, async id => {
        await ctx.client.jobs.delete(id)
        return { deleted: true }
      })
    },
    scope: 'workspace',
  }),
]
