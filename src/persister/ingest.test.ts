import { describe, it, expect } from 'vitest'

import { BatchWriteError, MalformedInputError } from './errors'
import { commitBatch, decodeBatch, ingest } from './ingest'
import { MemoryStore } from './memory-store'
import { decodeStoredRecord } from './record-codec'
import type { IdGenerator } from './types'

class SequentialIds implements IdGenerator {
  private next = 0

  nextId(): string {
    return `id-${this.next++}`
  }
}

class ScriptedIds implements IdGenerator {
  constructor(private readonly ids: string[]) {}

  nextId(): string {
    return this.ids.shift() ?? 'script-exhausted'
  }
}

const fourPairs = '{"a":"QQ==","b":"Qg=="}{"c":"Qw=="}\n{"d":"RA=="}'

function storedKeys(store: MemoryStore): string[] {
  return [...store.entries.entries()].map(
    ([id, value]) => decodeStoredRecord(id, value).logicalKey
  )
}

describe('decodeBatch', () => {
  it('should flatten all objects in order', async () => {
    const batch = await decodeBatch(fourPairs)

    expect(batch.map((record) => record.logicalKey)).toEqual([
      'a',
      'b',
      'c',
      'd'
    ])
    expect(batch[0].payload).toEqual(new Uint8Array([65]))
  })

  it('should accept null objects and null values as empty', async () => {
    const batch = await decodeBatch('null {"k":null}')

    expect(batch).toEqual([{ logicalKey: 'k', payload: new Uint8Array(0) }])
  })

  it('should reject values that are not objects', async () => {
    await expect(decodeBatch('{"a":"QQ=="} ["QQ=="]')).rejects.toThrow(
      'object 2: expected a JSON object of key-value pairs'
    )
  })

  it('should reject payloads that are not base64', async () => {
    await expect(decodeBatch('{"a":"not base64!"}')).rejects.toThrow(
      'object 1, key "a": illegal base64 data'
    )
  })

  it('should reject payloads that are not strings', async () => {
    await expect(decodeBatch('{"a":7}')).rejects.toThrow(
      'object 1, key "a": expected a base64 encoded string'
    )
  })
})

describe('commitBatch', () => {
  it('should not open a transaction for an empty batch', async () => {
    const store = new MemoryStore()

    expect(await commitBatch(store, [])).toEqual([])
    expect(store.transactions).toBe(0)
  })

  it('should write every record under its own surrogate id', async () => {
    const store = new MemoryStore()
    const batch = await decodeBatch(fourPairs)

    const persisted = await commitBatch(store, batch, {
      idGenerator: new SequentialIds()
    })

    expect(persisted.map((record) => record.surrogateId)).toEqual([
      'id-0',
      'id-1',
      'id-2',
      'id-3'
    ])
    expect(store.transactions).toBe(1)
    expect(storedKeys(store)).toEqual(['a', 'b', 'c', 'd'])
  })

  it.each([0, 1, 2, 3])(
    'should leave nothing behind when record %i fails',
    async (failing) => {
      const store = new MemoryStore({ storeCall: failing })
      const batch = await decodeBatch(fourPairs)

      const error = await commitBatch(store, batch, {
        idGenerator: new SequentialIds()
      }).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(BatchWriteError)
      expect(error).toMatchObject({
        recordIndex: failing,
        batchSize: 4,
        rollbackFailures: [],
        message: `unable to write record ${failing + 1} of 4: injected store failure at call ${failing}`
      })
      expect(store.entries.size).toBe(0)
    }
  )

  it('should report records that could not be rolled back', async () => {
    const store = new MemoryStore({ storeCall: 2, deleteKeys: ['id-0'] })
    const batch = await decodeBatch(fourPairs)

    const error = await commitBatch(store, batch, {
      idGenerator: new SequentialIds()
    }).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(BatchWriteError)
    expect(error).toMatchObject({
      message:
        'unable to write record 3 of 4: injected store failure at call 2; rollback failed for 1 of the records written before it',
      rollbackFailures: [{ surrogateId: 'id-0' }]
    })
    expect([...store.entries.keys()]).toEqual(['id-0'])
  })

  it('should draw a new id instead of overwriting an existing one', async () => {
    const store = new MemoryStore()
    const existing = new TextEncoder().encode('untouched')
    store.entries.set('taken', existing)

    const persisted = await ingest(store, '{"k":"QQ=="}', {
      idGenerator: new ScriptedIds(['taken', 'taken', 'free'])
    })

    expect(persisted.map((record) => record.surrogateId)).toEqual(['free'])
    expect(store.entries.get('taken')).toBe(existing)
    expect(store.entries.size).toBe(2)
  })

  it('should give up after the configured number of id draws', async () => {
    const store = new MemoryStore()
    store.entries.set('taken', new Uint8Array(0))

    await expect(
      ingest(store, '{"k":"QQ=="}', {
        idGenerator: new ScriptedIds(['taken', 'taken', 'taken', 'free']),
        maxIdAttempts: 3
      })
    ).rejects.toThrow(
      'unable to write record 1 of 1: no unused surrogate id found after 3 attempts'
    )
    expect(store.entries.size).toBe(1)
  })
})

describe('ingest', () => {
  it('should append the same logical key twice', async () => {
    const store = new MemoryStore()

    await ingest(store, '{"k":"QQ=="}')
    await ingest(store, '{"k":"Qg=="}')

    expect(storedKeys(store)).toEqual(['k', 'k'])
  })

  it('should not touch the store on malformed input', async () => {
    const store = new MemoryStore()

    await expect(ingest(store, '{"a":"QQ=="}{"b":')).rejects.toBeInstanceOf(
      MalformedInputError
    )
    expect(store.transactions).toBe(0)
  })
})
