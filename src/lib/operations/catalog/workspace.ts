/**
 * Workspace object operations (notebooks, files, directories)
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const path = z.string().startsWith('/').describe('Absolute workspace path')

export const workspaceOperations = [
  defineOperation({
    description: 'List objects under a workspace directory',
    id: 'list_workspace_objects',
    input: { path },
    run: (args, ctx) => ctx.client.workspace.list(args.path),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Get the type and metadata of a workspace object',
    id: 'get_workspace_object_status',
    input: { path },
    run: (args, ctx) => ctx.client.workspace.getStatus(args.path),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Export a notebook or file; content is base64 encoded',
    id: 'export_workspace_object',
    input: {
      format: z.enum(['DBC', 'HTML', 'JUPYTER', 'SOURCE']).default('SOURCE'),
      path,
    },
    run: (args, ctx) => ctx.client.workspace.export(args.path, args.format),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete a workspace object; directories need recursive',
    id: 'delete_workspace_object',
    input: {
      path,
      recursive: z.boolean().default(false),
    },
    async run(args, ctx) {
      await ctx.client.workspace.delete(args.path, args.recursive)
      return { deleted: true, path: args.path }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Create a workspace directory and any missing parents',
    id: 'mkdirs',
    input: { path },
    async run(args, ctx) {
      await ctx.client.workspace.mkdirs(args.path)
      return { created: true, path: args.path }
    },
    scope: 'workspace',
  }),
]
