/**
 * HTTP client for a running persister.
 */

import { z } from 'zod'
import { encodePayload } from './persister/record-codec'
import { parseExportLine } from './persister/sentinel'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface PersisterClientOptions {
  /** Base URL of the service, e.g. `http://127.0.0.1:11185` */
  baseUrl: string
  fetch?: FetchLike
}

/** One object of a write request; null stands for an empty payload */
export type KeyValueBatch = Record<string, Uint8Array | null>

export interface ListedPair {
  key: string
  payload: Uint8Array
}

const messageSchema = z.object({ message: z.string() })

/**
 * Error raised when the service answers a write with anything but 200.
 */
export class PersisterRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly serverMessage: string
  ) {
    super(`request failed with status ${status}: ${serverMessage}`)
    this.name = 'PersisterRequestError'
  }
}

/**
 * Error raised when an export stream ends with the server's error line.
 * `received` holds the pairs read before it.
 */
export class ServerStreamError extends Error {
  constructor(
    public readonly serverMessage: string,
    public readonly received: ListedPair[]
  ) {
    super(`server reported an error while streaming: ${serverMessage}`)
    this.name = 'ServerStreamError'
  }
}

export class PersisterClient {
  private readonly baseUrl: string
  private readonly fetch: FetchLike

  constructor(options: PersisterClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init))
  }

  /**
   * Persist the pairs of all batches atomically. Returns the service's
   * confirmation message.
   */
  async put(batches: KeyValueBatch[]): Promise<string> {
    const body = batches.map((batch) => JSON.stringify(encodeBatch(batch)))
    const response = await this.fetch(`${this.baseUrl}/`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json; charset=utf-8' },
      body: body.join('\n')
    })

    const text = await response.text()
    const message = readMessage(text)
    if (response.status !== 200) {
      throw new PersisterRequestError(response.status, message)
    }
    return message
  }

  /**
   * Read every stored pair, in storage order.
   */
  async list(): Promise<ListedPair[]> {
    const response = await this.fetch(`${this.baseUrl}/`)
    const text = await response.text()
    if (response.status !== 200) {
      throw new PersisterRequestError(response.status, readMessage(text))
    }

    const pairs: ListedPair[] = []
    for (const line of text.split('\n')) {
      if (line.trim() === '') {
        continue
      }
      const parsed = parseExportLine(line)
      if (parsed.kind === 'error') {
        throw new ServerStreamError(parsed.message, pairs)
      }
      pairs.push({ key: parsed.key, payload: parsed.payload })
    }
    return pairs
  }
}

function encodeBatch(batch: KeyValueBatch): Record<string, string | null> {
  return Object.fromEntries(
    Object.entries(batch).map(([key, payload]) => [
      key,
      payload === null ? null : encodePayload(payload)
    ])
  )
}

function readMessage(text: string): string {
  try {
    const parsed = messageSchema.safeParse(JSON.parse(text))
    return parsed.success ? parsed.data.message : text
  } catch {
    return text
  }
}
