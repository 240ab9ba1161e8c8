/**
 * SQL warehouse operations
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const warehouseId = z.string().min(1).describe('SQL warehouse ID')

export const warehouseOperations = [
  defineOperation({
    description: 'List SQL warehouses',
    id: 'list_warehouses',
    input: {},
    run: (_args, ctx) => ctx.client.warehouses.list(),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get details of a SQL warehouse',
    id: 'get_warehouse',
    input: { warehouse_id: warehouseId }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.warehouses.get(args.warehouse_id),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Start a SQL warehouse',
    id: 'start_warehouse',
    input: { warehouse_id: warehouseId }, // eslint-disable-line camelcase
    async run(args, ctx) {
      await ctx.client.warehouses.start(args.warehouse_id)
      return { started: true, warehouse_id: args.warehouse_id } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Stop a SQL warehouse',
    id: 'stop_warehouse',
    input: { warehouse_id: warehouseId }, // eslint-disable-line camelcase
    async run(args, ctx) {
      await ctx.client.warehouses.stop(args.warehouse_id)
      return { stopped: true, warehouse_id: args.warehouse_id } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get details of several SQL warehouses concurrently',
    id: 'get_warehouses_batch',
    input: { warehouse_ids: z.array(warehouseId).min(1) }, // eslint-disable-line camelcase
    kind: 'batch',
    run: (args, ctx) => ctx.batch(args.warehouse_ids, id => ctx.client.warehouses.get(id)),
    scope: 'workspace',
  }),
]
