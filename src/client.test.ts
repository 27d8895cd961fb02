import { describe, it, expect } from 'vitest'

import {
  PersisterClient,
  PersisterRequestError,
  ServerStreamError,
  type FetchLike
} from './client'
import { silentLogger } from './logger'
import { MemoryStore } from './persister/memory-store'
import { encodeStoredRecord } from './persister/record-codec'
import { createApp } from './server/app'

function clientFor(store: MemoryStore): PersisterClient {
  const app = createApp({ store, logger: silentLogger })
  const fetch: FetchLike = async (input, init) => app.request(input, init)
  return new PersisterClient({ baseUrl: 'http://persister.test/', fetch })
}

describe('PersisterClient', () => {
  it('should write batches and list them back', async () => {
    const client = clientFor(new MemoryStore())

    const message = await client.put([
      { a: new Uint8Array([1, 2]) },
      { b: null, c: new Uint8Array([255]) }
    ])

    expect(message).toBe('persisted 3 key-value pairs')
    expect(await client.list()).toEqual([
      { key: 'a', payload: new Uint8Array([1, 2]) },
      { key: 'b', payload: new Uint8Array(0) },
      { key: 'c', payload: new Uint8Array([255]) }
    ])
  })

  it('should raise the service message on a failed write', async () => {
    const client = clientFor(new MemoryStore({ storeCall: 0 }))

    const error = await client
      .put([{ a: new Uint8Array([1]) }])
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(PersisterRequestError)
    expect(error).toMatchObject({
      status: 400,
      serverMessage:
        'Error: unable to store key-value pairs, all pairs in this transaction rolled back: unable to write record 1 of 1: injected store failure at call 0'
    })
  })

  it('should turn the error line of an export into an error', async () => {
    const store = new MemoryStore({ loadKeys: ['broken'] })
    store.entries.set(
      'fine',
      encodeStoredRecord({ logicalKey: 'k', payload: new Uint8Array([7]) })
    )
    store.entries.set('broken', new Uint8Array(0))
    const client = clientFor(store)

    const error = await client.list().catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ServerStreamError)
    expect(error).toMatchObject({
      serverMessage: 'injected load failure for broken',
      received: [{ key: 'k', payload: new Uint8Array([7]) }]
    })
  })
})
