/**
 * Account-scoped operations
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const scimQuery = {
  count: z.number().int().min(1).max(1000).optional().describe('Page size'),
  filter: z.string().optional().describe('SCIM filter, e.g. userName eq "someone@example.com"'),
  start_index: z.number().int().min(1).optional().describe('1-based index of the first result'), // eslint-disable-line camelcase
}

export const accountOperations = [
  defineOperation({
    description: 'List workspaces in the account',
    id: 'list_account_workspaces',
    input: {},
    run: (_args, ctx) => ctx.client.account.listWorkspaces(),
    scope: 'account',
  }),

  defineOperation({
    description: 'Get a workspace of the account',
    id: 'get_account_workspace',
    input: { workspace_id: z.number().int().positive() }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.account.getWorkspace(args.workspace_id),
    scope: 'account',
  }),

  defineOperation({
    description: 'List account users',
    id: 'list_account_users',
    input: scimQuery,
    run: (args, ctx) => ctx.client.account.listUsers({ count: args.count, filter: args.filter, startIndex: args.start_index }),
    scope: 'account',
  }),

  defineOperation({
    description: 'Get an account user',
    id: 'get_account_user',
    input: { user_id: z.string().min(1) }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.account.getUser(args.user_id),
    scope: 'account',
  }),

  defineOperation({
    description: 'List account groups',
    id: 'list_account_groups',
    input: scimQuery,
    run: (args, ctx) => ctx.client.account.listGroups({ count: args.count, filter: args.filter, startIndex: args.start_index }),
    scope: 'account',
  }),

  defineOperation({
    description: 'Get an account group',
    id: 'get_account_group',
    input: { group_id: z.string().min(1) }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.account.getGroup(args.group_id),
    scope: 'account',
  }),

  defineOperation({
    description: 'List account service principals',
    id: 'list_account_service_principals',
    input: scimQuery,
    run: (args, ctx) => ctx.client.account.listServicePrincipals({ count: args.count, filter: args.filter, startIndex: args.start_index }),
    scope: 'account',
  }),

  defineOperation({
    description: 'List metastores in the account',
    id: 'list_account_metastores',
    input: {},
    run: (_args, ctx) => ctx.client.account.listMetastores(),
    scope: 'account',
  }),

  defineOperation({
    description: 'Get a metastore',
    id: 'get_account_metastore',
    input: { metastore_id: z.string().min(1) }, // eslint-disable-line camelcase
    run: (args, ctx) => ctx.client.account.getMetastore(args.metastore_id),
    scope: 'account',
  }),
]
