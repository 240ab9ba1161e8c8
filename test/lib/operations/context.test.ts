import { expect } from 'chai'

import { DEFAULT_SETTINGS } from '../../../src/lib/config.js'
import { ClassifiedError } from '../../../src/lib/execution/errors.js'
import { createContext, getContextConfig, updateContext } from '../../../src/lib/operations/index.js'
import { ME_PATH, testContext, testCredentials } from '../../helpers/context.js'
import { FakeBackend } from '../../helpers/fake-backend.js'

describe('lib/operations/context', () => {
  const originalProfile = process.env.LAKEOPS_PROFILE

  beforeEach(() => {
    delete process.env.LAKEOPS_PROFILE
  })

  afterEach(() => {
    if (originalProfile === undefined) {
      delete process.env.LAKEOPS_PROFILE
    } else {
      process.env.LAKEOPS_PROFILE = originalProfile
    }
  })

  it('builds the workspace client on first dispatch only', async () => {
    const { backend, ctx } = testContext()
    backend.on('GET', '/api/2.0/sql/warehouses', { body: { warehouses: [{ id: 'wh-1' }] } })

    expect(ctx.registry.state('workspace')).to.equal('uninitialized')
    await ctx.router.dispatch('list_warehouses', {})
    await ctx.router.dispatch('list_warehouses', {})

    expect(backend.callsTo('GET', ME_PATH)).to.have.length(1)
    expect(backend.callsTo('GET', '/api/2.0/sql/warehouses')).to.have.length(2)
    expect(ctx.registry.state('workspace')).to.equal('ready')
  })

  it('shares one handshake between concurrent dispatches', async () => {
    const { backend, ctx } = testContext()
    backend.on('GET', '/api/2.0/sql/warehouses', { body: { warehouses: [] } })

    await Promise.all(Array.from({ length: 4 }, () => ctx.router.dispatch('list_warehouses', {})))

    expect(backend.callsTo('GET', ME_PATH)).to.have.length(1)
  })

  it('reports missing credentials as an authentication failure', async () => {
    const backend = new FakeBackend()
    const ctx = createContext({
      credentials: testCredentials(),
      fetch: backend.fetch,
      settings: DEFAULT_SETTINGS,
    })

    const result = await ctx.router.dispatch('list_clusters', {})

    if (result.ok) throw new Error('expected failure')
    if (!(result.error instanceof ClassifiedError)) throw result.error
    expect(result.error.category).to.equal('Auth')
    expect(result.error.message.split('\n')[0]).to.equal(
      'No credentials configured: no --profile given, LAKEOPS_PROFILE unset and no default profile'
    )
    expect(backend.calls).to.deep.equal([])
  })

  it('does not cache a failed handshake', async () => {
    const { backend, ctx } = testContext()
    backend
      .on('GET', ME_PATH, { body: { message: 'Invalid access token' }, status: 401 }, { body: { id: '1001' } })
      .on('GET', '/api/2.0/sql/warehouses', { body: { warehouses: [] } })

    const first = await ctx.router.dispatch('list_warehouses', {})
    if (first.ok) throw new Error('expected failure')
    if (!(first.error instanceof ClassifiedError)) throw first.error
    expect(first.error.category).to.equal('Auth')
    expect(first.error.message).to.equal('HTTP 401: Invalid access token')
    expect(ctx.registry.state('workspace')).to.equal('failed')

    const second = await ctx.router.dispatch('list_warehouses', {})
    expect(second).to.deep.equal({ ok: true, value: [] })
  })

  it('switches profile and rebuilds clients against the new host', async () => {
    const { backend, ctx } = testContext()
    ctx.credentials.add({ host: 'https://other.test', name: 'other', token: 'other-token' })
    backend.on('GET', '/api/2.0/sql/warehouses', { body: { warehouses: [] } })

    await ctx.router.dispatch('list_warehouses', {})
    updateContext(ctx, { profileName: 'other' })
    expect(ctx.registry.state('workspace')).to.equal('uninitialized')
    await ctx.router.dispatch('list_warehouses', {})

    expect(backend.callsTo('GET', ME_PATH).map(call => call.host)).to.deep.equal(['workspace.test', 'other.test'])
    expect(getContextConfig(ctx)).to.deep.include({ host: 'https://other.test', profile: 'other' })
  })

  it('summarizes the active configuration', () => {
    const { ctx } = testContext({ profile: { accountId: 'acc-1' }, settings: { maxWorkers: 4 } })

    const config = getContextConfig(ctx)

    expect(config).to.deep.include({
      accountId: 'acc-1',
      host: 'https://workspace.test',
      profile: 'test',
      scopes: { account: 'uninitialized', workspace: 'uninitialized' },
    })
    expect(config.settings.maxWorkers).to.equal(4)
  })
})
