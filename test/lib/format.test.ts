import { expect } from 'chai'

import { ClassifiedError, HINTS, UnknownOperationError } from '../../src/lib/execution/errors.js'
import { formatDispatchError, formatYamlLike } from '../../src/lib/format.js'

describe('lib/format', () => {
  describe('formatYamlLike', () => {
    it('renders nested values without styling', () => {
      const output = formatYamlLike({
        columns: ['id'],
        items: [{ a: 1 }],
        manifest: { count: 2 },
        rows: [['1', 'a']],
        statement_id: 'st-1', // eslint-disable-line camelcase
        truncated: false,
      }, { styled: false })

      expect(output.split('\n')).to.deep.equal([
        'columns: ["id"]',
        'items:',
        '  -',
        '    a: 1',
        'manifest:',
        '  count: 2',
        'rows: [["1","a"]]',
        'statement_id: "st-1"',
        'truncated: false',
      ])
    })

    it('renders empty lists and scalars', () => {
      expect(formatYamlLike([], { styled: false })).to.equal('[]')
      expect(formatYamlLike(null, { styled: false })).to.equal('null')
      expect(formatYamlLike({ tags: [] }, { styled: false })).to.equal('tags: []')
    })
  })

  describe('formatDispatchError', () => {
    it('shows category, retry outcome and hint', () => {
      const error = new ClassifiedError('Network', 'fetch failed').asExhausted(3, ['RateLimit', 'Network', 'Network'])

      expect(formatDispatchError(error, { styled: false }).split('\n')).to.deep.equal([
        'error: fetch failed',
        'category: Network',
        'retryable: true',
        'attempts: 3 (RateLimit, Network, Network)',
        `hint: ${HINTS.Network}`,
      ])
    })

    it('shows only the message for an unknown operation', () => {
      expect(formatDispatchError(new UnknownOperationError('nope'), { styled: false })).to.equal('error: Unknown operation: nope')
    })
  })
})
