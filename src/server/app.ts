/**
 * HTTP router for the persister.
 *
 * Every path is the same resource. PUT ingests a batch of key-value
 * objects, GET streams every stored pair back as newline-delimited JSON,
 * POST and DELETE are reserved, and anything else is a bad request.
 */

import type { HttpBindings } from '@hono/node-server'
import { Hono, type Context } from 'hono'
import { stream } from 'hono/streaming'
import type { Logger } from '../logger'
import {
  errorSentinelLine,
  exportRecords,
  ingest,
  type IngestOptions,
  type LineSink,
  type TransactionalStore
} from '../persister'

export const jsonContentType = 'application/json; charset=utf-8'

export interface AppOptions {
  store: TransactionalStore
  logger: Logger
  ingest?: IngestOptions
}

export type AppEnv = {
  Bindings: Partial<HttpBindings>
  Variables: { log: Logger }
}

type MessageStatus = 200 | 400 | 501

/**
 * Ends an export whose client has gone away.
 */
export class ClientDisconnectedError extends Error {
  constructor() {
    super('client disconnected')
    this.name = 'ClientDisconnectedError'
  }
}

/**
 * The part of Hono's StreamingApi an export writes through.
 */
export interface ResponseStream {
  readonly aborted: boolean
  write(line: string): Promise<unknown>
}

/**
 * Sink writing export lines to a response stream. Writes to an aborted
 * stream are dropped by Hono, so the sink throws instead and the export
 * transaction ends with it.
 */
export function streamSink(out: ResponseStream): LineSink {
  return {
    write: async (line) => {
      if (out.aborted) {
        throw new ClientDisconnectedError()
      }
      await out.write(line)
    }
  }
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const { store, logger } = options
  const app = new Hono<AppEnv>()

  app.use('*', async (c, next) => {
    const log = logger.child({
      method: c.req.method,
      path: c.req.path,
      remote: remoteAddress(c)
    })
    c.set('log', log)
    c.header('Content-Type', jsonContentType)
    c.header('Accept', jsonContentType)
    log.info('request received')
    await next()
  })

  app.all('*', async (c) => {
    const log = c.get('log')

    switch (c.req.method) {
      case 'PUT':
        return handlePut(c, store, options.ingest)
      case 'GET':
        return handleGet(c, store)
      case 'POST':
      case 'DELETE':
        log.warn('method not implemented yet')
        return message(c, 501, 'Method not implemented yet.')
      default:
        log.warn('bad request')
        return message(c, 400, '400 Bad Request')
    }
  })

  return app
}

async function handlePut(
  c: Context<AppEnv>,
  store: TransactionalStore,
  options: IngestOptions | undefined
): Promise<Response> {
  const log = c.get('log')

  try {
    const persisted = await ingest(store, c.req.raw.body, options)
    const text = persistedMessage(persisted.length)
    log.info(text)
    return message(c, 200, text)
  } catch (error) {
    log.error({ err: error }, 'ingestion failed')
    return message(
      c,
      400,
      `Error: unable to store key-value pairs, all pairs in this transaction rolled back: ${describe(error)}`
    )
  }
}

function handleGet(c: Context<AppEnv>, store: TransactionalStore): Response {
  const log = c.get('log')

  return stream(c, async (out) => {
    try {
      const count = await exportRecords(store, streamSink(out))
      log.info(`exported ${count} key-value ${count === 1 ? 'pair' : 'pairs'}`)
    } catch (error) {
      if (out.aborted) {
        log.warn('client disconnected during export')
        return
      }
      log.error({ err: error }, 'export failed')
      await out.write(errorSentinelLine(error))
    }
  })
}

export function persistedMessage(count: number): string {
  if (count === 0) {
    return 'no key-value pairs persisted'
  }
  return count === 1
    ? 'persisted 1 key-value pair'
    : `persisted ${count} key-value pairs`
}

function message(
  c: Context<AppEnv>,
  status: MessageStatus,
  text: string
): Response {
  return c.body(JSON.stringify({ message: text }, null, 2), status)
}

function remoteAddress(c: Context<AppEnv>): string {
  const socket = c.env?.incoming?.socket
  if (!socket?.remoteAddress) {
    return 'unknown'
  }
  return `${socket.remoteAddress}:${socket.remotePort ?? 0}`
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
