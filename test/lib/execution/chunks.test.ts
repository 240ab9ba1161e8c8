import { expect } from 'chai'

import { assembleChunks, type ResultChunk } from '../../../src/lib/execution/chunks.js'
import { recordingSleep } from '../../helpers/fake-backend.js'

function rows(from: number, count: number): number[][] {
  return Array.from({ length: count }, (_, i) => [from + i])
}

describe('lib/execution/chunks', () => {
  it('returns the initial rows without fetching when there is one chunk', async () => {
    const fetched: number[] = []
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 3), totalChunkCount: 1 },
      async index => {
        fetched.push(index)
        return { rows: [] }
      }
    )

    expect(fetched).to.deep.equal([])
    expect(result).to.deep.equal({
      ok: true,
      value: { chunksFetched: 1, rowCount: 3, rows: [[0], [1], [2]], totalChunkCount: 1, truncated: false },
    })
  })

  it('treats a missing chunk count as a single chunk', async () => {
    const result = await assembleChunks<number[]>({ rows: null }, async () => ({ rows: rows(9, 1) }))

    if (!result.ok) throw result.error
    expect(result.value.rows).to.deep.equal([])
    expect(result.value.chunksFetched).to.equal(1)
  })

  it('fetches the remaining chunks in index order and concatenates them', async () => {
    const fetched: number[] = []
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 2), totalChunkCount: 3 },
      async index => {
        fetched.push(index)
        return { chunkIndex: index, rows: rows(index * 10, 2) }
      }
    )

    expect(fetched).to.deep.equal([1, 2])
    if (!result.ok) throw result.error
    expect(result.value.rows).to.deep.equal([[0], [1], [10], [11], [20], [21]])
    expect(result.value.chunksFetched).to.equal(3)
    expect(result.value.rowCount).to.equal(6)
    expect(result.value.truncated).to.equal(false)
  })

  it('applies the row limit after assembly', async () => {
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 40), totalChunkCount: 3 },
      async index => ({ rows: rows(index * 100, 40) }),
      { rowLimit: 50 }
    )

    if (!result.ok) throw result.error
    expect(result.value.rowCount).to.equal(50)
    expect(result.value.rows).to.have.length(50)
    expect(result.value.rows[49]).to.deep.equal([109])
    expect(result.value.truncated).to.equal(true)
    expect(result.value.chunksFetched).to.equal(3)
  })

  it('applies the row limit to a single chunk', async () => {
    const result = await assembleChunks<number[]>({ rows: rows(0, 5) }, async () => ({ rows: [] }), { rowLimit: 2 })

    if (!result.ok) throw result.error
    expect(result.value.rows).to.deep.equal([[0], [1]])
    expect(result.value.truncated).to.equal(true)
  })

  it('does not mark truncation when the limit is not reached', async () => {
    const result = await assembleChunks<number[]>({ rows: rows(0, 5) }, async () => ({ rows: [] }), { rowLimit: 5 })

    if (!result.ok) throw result.error
    expect(result.value.truncated).to.equal(false)
  })

  it('keeps the truncation flag reported by any chunk', async () => {
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 1), totalChunkCount: 2 },
      async () => ({ rows: rows(1, 1), truncated: true })
    )

    if (!result.ok) throw result.error
    expect(result.value.truncated).to.equal(true)
  })

  it('ignores chunk counts reported by later chunks', async () => {
    const fetched: number[] = []
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 1), totalChunkCount: 2 },
      async index => {
        fetched.push(index)
        return { rows: rows(index, 1), totalChunkCount: 5 }
      }
    )

    expect(fetched).to.deep.equal([1])
    if (!result.ok) throw result.error
    expect(result.value.totalChunkCount).to.equal(2)
  })

  it('retries a failing chunk', async () => {
    const { delays, sleep } = recordingSleep()
    let attempts = 0
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 1), totalChunkCount: 2 },
      async (): Promise<ResultChunk<number[]>> => {
        attempts++
        if (attempts === 1) throw new Error('HTTP 503: Service Unavailable')
        return { rows: rows(1, 1) }
      },
      { retry: { sleep } }
    )

    expect(attempts).to.equal(2)
    expect(delays).to.deep.equal([1000])
    if (!result.ok) throw result.error
    expect(result.value.rows).to.deep.equal([[0], [1]])
  })

  it('discards the whole result when a chunk keeps failing', async () => {
    const { sleep } = recordingSleep()
    const fetched: number[] = []
    const result = await assembleChunks<number[]>(
      { rows: rows(0, 1), totalChunkCount: 4 },
      async index => {
        fetched.push(index)
        if (index === 2) throw new Error('fetch failed')
        return { rows: rows(index, 1) }
      },
      { retry: { maxAttempts: 2, sleep } }
    )

    expect(fetched).to.deep.equal([1, 2, 2])
    expect(result.ok).to.equal(false)
    if (result.ok) return
    expect(result.error.category).to.equal('Network')
    expect(result.error.exhausted).to.equal(true)
  })
})
