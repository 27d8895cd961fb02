/**
 * Decoding of request bodies made of concatenated JSON values
 * (`{"a":"..."}{"b":"..."}`, optionally separated by whitespace).
 *
 * The scanner only finds value boundaries; each value is then handed to
 * JSON.parse, so syntax checking stays with the platform parser.
 */

import { MalformedInputError } from './errors'
import type { BodySource } from './types'

type ValueKind = 'container' | 'string' | 'literal'

const whitespace = new Set([' ', '\t', '\n', '\r'])
const delimiters = new Set(['{', '}', '[', ']', '"', ',', ':'])

/**
 * Incremental splitter for a stream of top-level JSON values.
 */
export class JsonValueScanner {
  private buffer = ''
  private pos = 0
  private kind: ValueKind | null = null
  private depth = 0
  private inString = false
  private escaped = false

  /**
   * Feed more text; returns the raw text of every value completed by it.
   */
  push(text: string): string[] {
    this.buffer += text
    const values: string[] = []

    while (this.pos < this.buffer.length) {
      const ch = this.buffer[this.pos]

      if (this.kind === null) {
        if (whitespace.has(ch)) {
          this.pos++
          continue
        }
        this.begin(ch)
        continue
      }

      if (this.inString) {
        this.pos++
        if (this.escaped) {
          this.escaped = false
        } else if (ch === '\\') {
          this.escaped = true
        } else if (ch === '"') {
          this.inString = false
          if (this.kind === 'string') {
            values.push(this.take(this.pos))
          }
        }
        continue
      }

      if (this.kind === 'literal') {
        if (whitespace.has(ch) || delimiters.has(ch)) {
          values.push(this.take(this.pos))
        } else {
          this.pos++
        }
        continue
      }

      this.pos++
      if (ch === '"') {
        this.inString = true
      } else if (ch === '{' || ch === '[') {
        this.depth++
      } else if (ch === '}' || ch === ']') {
        this.depth--
        if (this.depth === 0) {
          values.push(this.take(this.pos))
        }
      }
    }

    if (this.kind === null) {
      this.buffer = ''
      this.pos = 0
    }

    return values
  }

  /**
   * Signal the end of input; returns a trailing bare literal if any.
   */
  end(): string[] {
    if (this.kind === 'literal') {
      return [this.take(this.buffer.length)]
    }
    if (this.kind !== null) {
      throw new MalformedInputError('unexpected end of JSON input')
    }
    return []
  }

  private begin(ch: string): void {
    if (ch === '}' || ch === ']' || ch === ',' || ch === ':') {
      throw new MalformedInputError(
        `invalid character '${ch}' looking for beginning of value`
      )
    }

    // Drop the whitespace consumed so far; values start at offset 0
    this.buffer = this.buffer.slice(this.pos)
    this.pos = 1

    if (ch === '{' || ch === '[') {
      this.kind = 'container'
      this.depth = 1
    } else if (ch === '"') {
      this.kind = 'string'
      this.inString = true
    } else {
      this.kind = 'literal'
    }
  }

  private take(end: number): string {
    const value = this.buffer.slice(0, end)
    this.buffer = this.buffer.slice(end)
    this.pos = 0
    this.kind = null
    this.depth = 0
    return value
  }
}

/**
 * Yield every top-level JSON value of a body, parsed. Any failure,
 * including the body stream erroring, surfaces as MalformedInputError.
 */
export async function* decodeJsonValues(
  body: BodySource
): AsyncGenerator<unknown> {
  const scanner = new JsonValueScanner()
  const decoder = new TextDecoder()

  try {
    for await (const chunk of chunksOf(body)) {
      const text =
        typeof chunk === 'string'
          ? chunk
          : decoder.decode(chunk, { stream: true })
      for (const raw of scanner.push(text)) {
        yield parseValue(raw)
      }
    }
  } catch (error) {
    if (error instanceof MalformedInputError) {
      throw error
    }
    throw new MalformedInputError(
      `unable to read request body: ${describe(error)}`,
      { cause: error }
    )
  }

  for (const raw of [...scanner.push(decoder.decode()), ...scanner.end()]) {
    yield parseValue(raw)
  }
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new MalformedInputError(describe(error), { cause: error })
  }
}

async function* chunksOf(
  body: BodySource
): AsyncGenerator<Uint8Array | string> {
  if (body === null) {
    return
  }
  if (typeof body === 'string') {
    yield body
    return
  }
  if (body instanceof ReadableStream) {
    const reader = body.getReader()
    try {
      for (;;) {
        const { done, value } = await reader.read()
        if (done) {
          return
        }
        yield value
      }
    } finally {
      reader.releaseLock()
    }
  }
  yield* body
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
