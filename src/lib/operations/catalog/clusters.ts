/**
 * Cluster operations
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const clusterIds = z.array(z.string().min(1)).min(1).describe('Cluster IDs')

export const clusterOperations = [
  defineOperation({
    description: 'List clusters in the workspace',
    id: 'list_clusters',
    input: {
      page_size: z.number().int().min(1).max(1000).default(100).describe('Maximum number of clusters to return'), // eslint-disable-line camelcase
    },
    async run(args, ctx) {
      const clusters = await ctx.client.clusters.list()
      return clusters.slice(0, args.page_size)
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get details of a cluster',
    id: 'get_cluster',
    input: {
      cluster_id: z.string().min(1).describe('Cluster ID'), // eslint-disable-line camelcase
    },
    run: (args, ctx) => ctx.client.clusters.get(args.cluster_id),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Create a cluster and wait until it is running',
    id: 'create_cluster',
    input: {
      autoscale: z.object({
        max_workers: z.number().int().min(0), // eslint-disable-line camelcase
        min_workers: z.number().int().min(0), // eslint-disable-line camelcase
      }).optional().describe('Autoscaling bounds; replaces num_workers'),
      cluster_name: z.string().min(1), // eslint-disable-line camelcase
      node_type_id: z.string().min(1), // eslint-disable-line camelcase
      num_workers: z.number().int().min(0).optional(), // eslint-disable-line camelcase
      spark_version: z.string().min(1), // eslint-disable-line camelcase
    },
    // a failed wait must not repeat the create
    kind: 'paged',
    async run(args, ctx) {
      const { cluster_id: clusterId } = await ctx.call('create', () => ctx.client.clusters.create(args))
      return ctx.call('wait', () => ctx.client.clusters.waitForState(clusterId, 'RUNNING', ctx.wait))
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Start a terminated cluster and wait until it is running',
    id: 'start_cluster',
    input: {
      cluster_id: z.string().min(1), // eslint-disable-line camelcase
    },
    kind: 'paged',
    async run(args, ctx) {
      await ctx.call('start', () => ctx.client.clusters.start(args.cluster_id))
      return ctx.call('wait', () => ctx.client.clusters.waitForState(args.cluster_id, 'RUNNING', ctx.wait))
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Terminate a cluster (configuration is kept) and wait until it is terminated',
    id: 'terminate_cluster',
    input: {
      cluster_id: z.string().min(1), // eslint-disable-line camelcase
    },
    kind: 'paged',
    async run(args, ctx) {
      await ctx.call('terminate', () => ctx.client.clusters.terminate(args.cluster_id))
      return ctx.call('wait', () => ctx.client.clusters.waitForState(args.cluster_id, 'TERMINATED', ctx.wait))
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Permanently delete a cluster',
    id: 'delete_cluster',
    input: {
      cluster_id: z.string().min(1), // eslint-disable-line camelcase
    },
    async run(args, ctx) {
      await ctx.client.clusters.permanentDelete(args.cluster_id)
      return { cluster_id: args.cluster_id, deleted: true } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get details of several clusters concurrently',
    id: 'get_clusters_batch',
    input: {
      cluster_ids: clusterIds, // eslint-disable-line camelcase
    },
    kind: 'batch',
    run: (args, ctx) => ctx.batch(args.cluster_ids, clusterId => ctx.client.clusters.get(clusterId)),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Permanently delete several clusters concurrently',
    id: 'delete_clusters_batch',
    input: {
      cluster_ids: clusterIds, // eslint-disable-line camelcase
    },
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(args.cluster_ids, async clusterId => {
        await ctx.client.clusters.permanentDelete(clusterId)
        return { deleted: true }
      })
    },
    scope: 'workspace',
  }),
]
