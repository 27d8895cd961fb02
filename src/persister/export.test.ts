import { describe, it, expect } from 'vitest'

import { StoredRecordError } from './errors'
import { exportRecords } from './export'
import { ingest } from './ingest'
import { MemoryStore } from './memory-store'
import {
  errorSentinelLine,
  exportLine,
  parseExportLine
} from './sentinel'
import type { LineSink } from './types'

class CollectingSink implements LineSink {
  readonly lines: string[] = []

  async write(line: string): Promise<void> {
    this.lines.push(line)
  }
}

describe('exportRecords', () => {
  it('should return stored payloads byte for byte', async () => {
    const store = new MemoryStore()
    await ingest(store, '{"bin":"AAEC/w=="}')
    const sink = new CollectingSink()

    const count = await exportRecords(store, sink)

    expect(count).toBe(1)
    expect(sink.lines).toEqual(['{"bin":"AAEC/w=="}\n'])
    expect(parseExportLine(sink.lines[0])).toEqual({
      kind: 'record',
      key: 'bin',
      payload: new Uint8Array([0, 1, 2, 255])
    })
  })

  it('should emit records in insertion order', async () => {
    const store = new MemoryStore()
    await ingest(store, '{"b":"Qg=="}{"a":"QQ=="}')
    await ingest(store, '{"c":"Qw=="}')
    const sink = new CollectingSink()

    await exportRecords(store, sink)

    expect(sink.lines).toEqual([
      '{"b":"Qg=="}\n',
      '{"a":"QQ=="}\n',
      '{"c":"Qw=="}\n'
    ])
  })

  it('should rename stored records that use the sentinel key', async () => {
    const store = new MemoryStore()
    await ingest(store, '{"SERVER_ERROR":"QQ=="}')
    const sink = new CollectingSink()

    await exportRecords(store, sink)

    expect(sink.lines).toEqual(['{"server_error":"QQ=="}\n'])
  })

  it('should keep lines written before a failure', async () => {
    const store = new MemoryStore({ loadKeys: ['second'] })
    const stored = '{"key":"a","ciphertext":"QQ=="}'
    store.entries.set('first', new TextEncoder().encode(stored))
    store.entries.set('second', new Uint8Array(0))
    const sink = new CollectingSink()

    await expect(exportRecords(store, sink)).rejects.toThrow(
      'injected load failure for second'
    )
    expect(sink.lines).toEqual(['{"a":"QQ=="}\n'])
  })

  it('should reject values that are not stored records', async () => {
    const store = new MemoryStore()
    store.entries.set('odd', new TextEncoder().encode('{"key":1}'))

    const error = await exportRecords(store, new CollectingSink()).catch(
      (caught: unknown) => caught
    )

    expect(error).toBeInstanceOf(StoredRecordError)
    expect(error).toMatchObject({
      message: 'stored value under "odd": expected a stored record'
    })
  })
})

describe('sentinel lines', () => {
  it('should base64 encode the error message', () => {
    expect(errorSentinelLine(new Error('disk on fire'))).toBe(
      '{"SERVER_ERROR":"ZGlzayBvbiBmaXJl"}\n'
    )
  })

  it('should parse an error line back into its message', () => {
    expect(parseExportLine('{"SERVER_ERROR":"ZGlzayBvbiBmaXJl"}')).toEqual({
      kind: 'error',
      message: 'disk on fire'
    })
  })

  it('should never produce an error line for a record', () => {
    const line = exportLine('SERVER_ERROR', new Uint8Array([65]))

    expect(parseExportLine(line)).toEqual({
      kind: 'record',
      key: 'server_error',
      payload: new Uint8Array([65])
    })
  })

  it('should reject lines with more than one member', () => {
    expect(() => parseExportLine('{"a":"QQ==","b":"QQ=="}')).toThrow(
      'expected exactly one key-value pair'
    )
  })
})
