import { describe, it, expect } from 'vitest'

import { MalformedInputError } from './errors'
import { JsonValueScanner, decodeJsonValues } from './json-stream'
import type { BodySource } from './types'

async function collect(body: BodySource): Promise<unknown[]> {
  const values: unknown[] = []
  for await (const value of decodeJsonValues(body)) {
    values.push(value)
  }
  return values
}

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder()
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk))
      }
      controller.close()
    }
  })
}

describe('JsonValueScanner', () => {
  it('should split adjacent objects', () => {
    const scanner = new JsonValueScanner()

    expect(scanner.push('{"a":"1"}{"b":"2"}')).toEqual([
      '{"a":"1"}',
      '{"b":"2"}'
    ])
    expect(scanner.end()).toEqual([])
  })

  it('should ignore braces inside strings', () => {
    const scanner = new JsonValueScanner()

    expect(scanner.push('{"a":"}{\\"}"}')).toEqual(['{"a":"}{\\"}"}'])
  })

  it('should carry a value across pushes', () => {
    const scanner = new JsonValueScanner()

    expect(scanner.push('  {"a":')).toEqual([])
    expect(scanner.push('"1"}\n{')).toEqual(['{"a":"1"}'])
    expect(scanner.push('}')).toEqual(['{}'])
  })

  it('should return a trailing literal at the end', () => {
    const scanner = new JsonValueScanner()

    expect(scanner.push('{} null')).toEqual(['{}'])
    expect(scanner.end()).toEqual(['null'])
  })

  it('should reject an unfinished value at the end', () => {
    const scanner = new JsonValueScanner()
    scanner.push('{"a":"1"')

    expect(() => scanner.end()).toThrow('unexpected end of JSON input')
  })

  it('should reject a stray closing brace', () => {
    const scanner = new JsonValueScanner()

    expect(() => scanner.push('}')).toThrow(
      "invalid character '}' looking for beginning of value"
    )
  })
})

describe('decodeJsonValues', () => {
  it('should decode a string body', async () => {
    expect(await collect('{"a":"QQ=="} {"b":null}')).toEqual([
      { a: 'QQ==' },
      { b: null }
    ])
  })

  it('should decode a byte stream split mid-value', async () => {
    const body = streamOf('{"te', 'st":"SGVs', 'bG8="}{"x":"eA=="}')

    expect(await collect(body)).toEqual([{ test: 'SGVsbG8=' }, { x: 'eA==' }])
  })

  it('should decode multi-byte characters split across chunks', async () => {
    const encoded = new TextEncoder().encode('{"ключ":"QQ=="}')
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield encoded.slice(0, 5)
      yield encoded.slice(5)
    }

    expect(await collect(chunks())).toEqual([{ ключ: 'QQ==' }])
  })

  it('should yield nothing for an empty or absent body', async () => {
    expect(await collect(null)).toEqual([])
    expect(await collect('   \n')).toEqual([])
  })

  it('should report syntax errors as malformed input', async () => {
    await expect(collect('{"a":}')).rejects.toBeInstanceOf(MalformedInputError)
  })

  it('should report a failing body stream as malformed input', async () => {
    async function* chunks(): AsyncGenerator<string> {
      yield '{"a":'
      throw new Error('connection reset')
    }

    await expect(collect(chunks())).rejects.toThrow(
      'unable to read request body: connection reset'
    )
  })
})
