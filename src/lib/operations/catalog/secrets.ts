/**
 * Secret scope and secret operations
 */

import { z } from 'zod'

import { defineOperation } from '../definition.js'

const scope = z.string().min(1).describe('Secret scope name')
const key = z.string().min(1).describe('Secret key')

export const secretOperations = [
  defineOperation({
    description: 'List secret scopes',
    id: 'list_secret_scopes',
    input: {},
    run: (_args, ctx) => ctx.client.secrets.listScopes(),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Create a secret scope',
    id: 'create_secret_scope',
    input: { scope },
    async run(args, ctx) {
      await ctx.client.secrets.createScope(args.scope)
      return { created: true, scope: args.scope }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete a secret scope and every secret in it',
    id: 'delete_secret_scope',
    input: { scope },
    async run(args, ctx) {
      await ctx.client.secrets.deleteScope(args.scope)
      return { deleted: true, scope: args.scope }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'List secret keys in a scope (values are never returned)',
    id: 'list_secrets',
    input: { scope },
    run: (args, ctx) => ctx.client.secrets.listSecrets(args.scope),
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Store a secret value under a key',
    id: 'put_secret',
    input: {
      key,
      scope,
      value: z.string().describe('Secret value'),
    },
    async run(args, ctx) {
      await ctx.client.secrets.putSecret(args.scope, args.key, args.value)
      return { key: args.key, scope: args.scope, stored: true }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete a secret',
    id: 'delete_secret',
    input: { key, scope },
    async run(args, ctx) {
      await ctx.client.secrets.deleteSecret(args.scope, args.key)
      return { deleted: true, key: args.key, scope: args.scope }
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Store several secrets in one scope concurrently',
    id: 'put_secrets_batch',
    input: {
      scope,
      secrets: z.array(z.object({ key, value: z.string() })).min(1),
    },
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(
        args.secrets,
        async secret => {
          await ctx.client.secrets.putSecret(args.scope, secret.key, secret.value)
          return { stored: true }
        },
        { keyOf: secret => secret.key }
      )
    },
    scope: 'workspace',
  }),

  defineOperation({
    description: 'Delete several secrets from one scope concurrently',
    id: 'delete_secrets_batch',
    input: {
      keys: z.array(key).min(1),
      scope,
    },
    kind: 'batch',
    async run(args, ctx) {
      return ctx.batch(args.keys, async secretKey => {
        await ctx.client.secrets.deleteSecret(args.scope, secretKey)
        return { deleted: true }
      })
    },
    scope: 'workspace',
  }),
]
