import { expect } from 'chai'

import { HINTS } from '../../src/lib/execution/errors.js'
import { parseRequest, PendingRequests, processLine, RPC_ERRORS, RpcError, type RpcSession } from '../../src/rpc/server.js'
import { testContext } from '../helpers/context.js'
import { type FakeBackend } from '../helpers/fake-backend.js'

describe('rpc/server', () => {
  describe('parseRequest', () => {
    function parseError(line: string): RpcError {
      try {
        parseRequest(line)
      } catch (error) {
        if (error instanceof RpcError) return error
        throw error
      }

      throw new Error(`expected ${line} to be rejected`)
    }

    it('accepts a request without id as a notification-style call', () => {
      expect(parseRequest('{"jsonrpc":"2.0","method":"config"}')).to.deep.equal({
        id: null,
        jsonrpc: '2.0',
        method: 'config',
        params: undefined,
      })
    })

    it('rejects malformed JSON', () => {
      const error = parseError('{nope')
      expect(error.code).to.equal(RPC_ERRORS.PARSE_ERROR)
      expect(error.message).to.equal('Parse error')
    })

    it('rejects non-object requests', () => {
      expect(parseError('[1, 2]').code).to.equal(RPC_ERRORS.INVALID_REQUEST)
    })

    it('rejects the wrong protocol version', () => {
      const error = parseError('{"jsonrpc":"1.0","id":1,"method":"config"}')
      expect(error.code).to.equal(RPC_ERRORS.INVALID_REQUEST)
      expect(error.message).to.equal('Invalid Request: jsonrpc must be "2.0"')
    })
  })

  describe('processLine', () => {
    let backend: FakeBackend
    let session: RpcSession
    let shutdowns: number

    beforeEach(() => {
      const test = testContext()
      backend = test.backend
      shutdowns = 0
      session = {
        ctx: test.ctx,
        onShutdown() {
          shutdowns++
        },
      }
    })

    function line(method: string, params?: Record<string, unknown>): string {
      return JSON.stringify({ id: 7, jsonrpc: '2.0', method, params })
    }

    it('answers protocol errors with a null id', async () => {
      expect(await processLine('{nope', session)).to.deep.equal({
        error: { code: RPC_ERRORS.PARSE_ERROR, message: 'Parse error' },
        id: null,
        jsonrpc: '2.0',
      })
    })

    it('reports unknown methods', async () => {
      expect(await processLine(line('explode'), session)).to.deep.equal({
        error: { code: RPC_ERRORS.METHOD_NOT_FOUND, message: 'Method not found: explode' },
        id: 7,
        jsonrpc: '2.0',
      })
    })

    it('dispatches an operation and returns its value', async () => {
      backend.on('GET', '/api/2.0/sql/warehouses', { body: { warehouses: [{ id: 'wh-1', state: 'RUNNING' }] } })

      const response = await processLine(line('dispatch', { arguments: {}, operation: 'list_warehouses' }), session)

      expect(response).to.deep.equal({ id: 7, jsonrpc: '2.0', result: [{ id: 'wh-1', state: 'RUNNING' }] })
    })

    it('maps an unknown operation to method-not-found', async () => {
      const response = await processLine(line('dispatch', { operation: 'launch_rocket' }), session)

      expect(response.error).to.deep.equal({
        code: RPC_ERRORS.METHOD_NOT_FOUND,
        data: { code: 'UNKNOWN_OPERATION', message: 'Unknown operation: launch_rocket', operationId: 'launch_rocket', retryable: false },
        message: 'Unknown operation: launch_rocket',
      })
      expect(backend.calls).to.deep.equal([])
    })

    it('maps invalid operation arguments to invalid-params', async () => {
      const response = await processLine(line('dispatch', { arguments: { cluster_id: 5 }, operation: 'get_cluster' }), session) // eslint-disable-line camelcase

      expect(response.error?.code).to.equal(RPC_ERRORS.INVALID_PARAMS)
      expect(response.error?.message).to.equal('Invalid arguments for get_cluster: cluster_id: Expected string, received number')
      expect(response.error?.data).to.deep.include({ category: 'BadRequest', issues: ['cluster_id: Expected string, received number'] })
    })

    it('rejects dispatch without an operation', async () => {
      const response = await processLine(line('dispatch', {}), session)

      expect(response.error).to.deep.equal({ code: RPC_ERRORS.INVALID_PARAMS, message: 'operation: Required' })
    })

    it('returns remote failures with their classification', async () => {
      backend.on('GET', '/api/2.0/sql/warehouses/wh-9', {
        body: { error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'Warehouse wh-9 does not exist' }, // eslint-disable-line camelcase
        status: 404,
      })

      const response = await processLine(line('dispatch', { arguments: { warehouse_id: 'wh-9' }, operation: 'get_warehouse' }), session) // eslint-disable-line camelcase

      expect(response.error).to.deep.equal({
        code: RPC_ERRORS.OPERATION_FAILED,
        data: {
          category: 'NotFound',
          exhausted: false,
          hint: HINTS.NotFound,
          message: 'HTTP 404 RESOURCE_DOES_NOT_EXIST: Warehouse wh-9 does not exist',
          retryable: false,
        },
        message: 'HTTP 404 RESOURCE_DOES_NOT_EXIST: Warehouse wh-9 does not exist',
      })
    })

    it('lists operations for one scope', async () => {
      const response = await processLine(line('operations', { scope: 'account' }), session)

      const { result } = response
      if (typeof result !== 'object' || result === null || !('operations' in result) || !Array.isArray(result.operations)) {
        throw new Error('expected an operation list')
      }

      expect(result.operations.length).to.be.greaterThan(0)
      expect(result.operations.every(operation => operation.scope === 'account')).to.equal(true)
    })

    it('refuses to switch to an unknown profile', async () => {
      const response = await processLine(line('config.set', { profile: 'ghost' }), session)

      expect(response.error).to.deep.equal({
        code: RPC_ERRORS.INVALID_PARAMS,
        data: { profiles: ['test'] },
        message: 'Profile "ghost" not found',
      })
    })

    it('acknowledges shutdown before stopping', async () => {
      const response = await processLine(line('shutdown'), session)

      expect(response.result).to.deep.equal({ ok: true })
      expect(shutdowns).to.equal(0)
      await new Promise(resolve => {
        setImmediate(resolve)
      })
      expect(shutdowns).to.equal(1)
    })
  })

  describe('PendingRequests', () => {
    it('drains only after every request has been answered', async () => {
      const requests = new PendingRequests()
      const answered: string[] = []
      let releaseFirst: () => void = () => {}
      let releaseLate: () => void = () => {}
      const first = new Promise<void>(resolve => {
        releaseFirst = resolve
      })
      const late = new Promise<void>(resolve => {
        releaseLate = resolve
      })

      requests.track(first.then(() => {
        answered.push('first')
        requests.track(late.then(() => {
          answered.push('late')
        }))
      }))

      let drained = false
      const draining = requests.drain().then(() => {
        drained = true
      })

      releaseFirst()
      await first
      await new Promise(resolve => {
        setImmediate(resolve)
      })
      expect(answered).to.deep.equal(['first'])
      expect(drained).to.equal(false)

      releaseLate()
      await draining
      expect(answered).to.deep.equal(['first', 'late'])
      expect(requests.size).to.equal(0)
    })

    it('drains immediately with nothing in flight', async () => {
      const requests = new PendingRequests()
      await requests.drain()
      expect(requests.size).to.equal(0)
    })
  })
})
