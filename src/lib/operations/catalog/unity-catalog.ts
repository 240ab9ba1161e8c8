/**
 * Unity Catalog operations (catalogs, schemas, tables)
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const fullTableName = z.string().regex(/^[^.]+\.[^.]+\.[^.]+$/, 'expected catalog.schema.table').describe('Three-level table name')

export const unityCatalogOperations = [
  defineOperation({
    description: 'List catalogs',
    id: 'list_catalogs',
    input: {},
    run: (_args, ctx) => ctx.client.catalog.listCatalogs(),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get a catalog',
    id: 'get_catalog',
    input: { name: z.string().min(1) },
    run: (args, ctx) => ctx.client.catalog.getCatalog(args.name),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'List schemas in a catalog',
    id: 'list_schemas',
    input: { catalog_name: z.string().min(1) }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.catalog.listSchemas(args.catalog_name),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get a schema by its catalog.schema name',
    id: 'get_schema',
    input: { full_name: z.string().regex(/^[^.]+\.[^.]+$/, 'expected catalog.schema') }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.catalog.getSchema(args.full_name),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'List tables in a schema',
    id: 'list_tables',
    input: {
      catalog_name: z.string().min(1), // eslint-disable-line camelcase
      max_results: z.number().int().min(1).optional(), // eslint-disable-line camelcase
      schema_name: z.string().min(1), // eslint-disable-line camelcase
    },
    run: (args, ctx) => ctx.client.catalog.listTables(args.catalog_name, args.schema_name, args.max_results),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get a table by its catalog.schema.table name',
    id: 'get_table',
    input: { full_name: fullTableName }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.catalog.getTable(args.full_name),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete a table',
    id: 'delete_table',
    input: { full_name: fullTableName }, // eslint-disable-line camelcase
    async run(args, ctx) {
      await ctx.client.catalog.deleteTable(args.full_name)
      return { deleted: true, full_name: args.full_name } // eslint-disable-line camelcase
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete several tables concurrently',
    id: 'delete_tables_batch',
    input: { full_names: z.array(fullTableName).min(1) }, // eslint-disable-line camelcase
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(args.full_names, async fullName => {
        await ctx.client.catalog.deleteTable(fullName)
        return { deleted: true }
      })
    },
    scope: 'workspace',
  }),
]
