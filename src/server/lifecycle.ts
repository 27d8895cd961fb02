/**
 * Service lifecycle: open the store, serve HTTP, and shut both down again
 * once for whichever stop reason comes first.
 */

import { createServer, type Server } from 'node:http'
import type { AddressInfo } from 'node:net'
import { getRequestListener } from '@hono/node-server'
import invariant from 'tiny-invariant'
import type { ServeConfig } from '../config'
import type { Logger } from '../logger'
import type { IngestOptions } from '../persister'
import { StorageEngine } from '../storage-engine'
import { joinHostPort, resolveListenTarget } from './address'
import { createApp } from './app'

export const defaultStopSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

/**
 * Rejection reason of {@link RunningServer.closed} when a process signal
 * stopped the service.
 */
export class ShutdownSignalError extends Error {
  constructor(public readonly signal: NodeJS.Signals) {
    super(`caught signal "${signal}"`)
    this.name = 'ShutdownSignalError'
  }
}

export type ServerSettings = Pick<
  ServeConfig,
  | 'protocol'
  | 'address'
  | 'dbPath'
  | 'requestTimeoutMs'
  | 'headersTimeoutMs'
  | 'keepAliveTimeoutMs'
  | 'lockTimeoutMs'
>

export interface StartOptions {
  config: ServerSettings
  encryptionKey: string
  logger: Logger
  /** Process signals that stop the service (default SIGINT and SIGTERM) */
  signals?: NodeJS.Signals[]
  /** Stops the service when aborted */
  signal?: AbortSignal
  ingest?: IngestOptions
}

export interface RunningServer {
  /** Bound address as `host:port` */
  address: string
  port: number
  /**
   * Stop serving and close the store; resolves once both are done and
   * rejects with the first error either of them raised.
   */
  stop(): Promise<void>
  /**
   * Settles once the service has stopped: resolves after stop() or an
   * abort, even when closing failed, and rejects with ShutdownSignalError
   * or the listener error.
   */
  closed: Promise<void>
}

type StopReason =
  | { kind: 'requested' }
  | { kind: 'signal'; signal: NodeJS.Signals }
  | { kind: 'failed'; error: Error }

type SettleClosed = (reason: StopReason) => void

export async function startServer(
  options: StartOptions
): Promise<RunningServer> {
  const { config, logger } = options

  const store = await StorageEngine.create({
    dataPath: config.dbPath,
    encryptionKey: options.encryptionKey,
    lockTimeout: config.lockTimeoutMs
  })

  let server: Server
  let bound: AddressInfo
  try {
    const count = await store.run((tx) => tx.count())
    logger.info(
      `Persistence file "${store.getDataPath()}" contains ${count} ${count === 1 ? 'key' : 'keys'}`
    )

    const target = resolveListenTarget(config.protocol, config.address)
    const app = createApp({ store, logger, ingest: options.ingest })
    server = createServer(
      {
        requestTimeout: config.requestTimeoutMs,
        headersTimeout: config.headersTimeoutMs
      },
      getRequestListener(app.fetch)
    )
    server.keepAliveTimeout = config.keepAliveTimeoutMs

    bound = await listen(server, target)
  } catch (error) {
    await store.close()
    throw error
  }

  const address = joinHostPort(bound.address, bound.port)
  logger.info(`Serving ${config.protocol} http requests on ${address}`)

  const signals = options.signals ?? defaultStopSignals
  const signalHandlers: Array<readonly [NodeJS.Signals, () => void]> =
    signals.map((name) => [name, () => onSignal(name)])
  let stopping: Promise<void> | undefined
  let settleClosed: SettleClosed = () => {
    invariant(false, 'closed settled before it was created')
  }

  const closed = new Promise<void>((resolve, reject) => {
    settleClosed = (reason) => {
      if (reason.kind === 'signal') {
        reject(new ShutdownSignalError(reason.signal))
      } else if (reason.kind === 'failed') {
        reject(reason.error)
      } else {
        resolve()
      }
    }
  })

  const shutdown = (reason: StopReason): Promise<void> => {
    stopping ??= (async () => {
      for (const [name, handler] of signalHandlers) {
        process.off(name, handler)
      }
      options.signal?.removeEventListener('abort', onAbort)
      server.off('error', onServerError)

      let closeError: unknown
      try {
        await closeServer(server)
      } catch (error) {
        logger.error({ err: error }, 'HTTP server shutdown failed')
        closeError = error
      }
      try {
        await store.close()
      } catch (error) {
        logger.error({ err: error }, 'closing the store failed')
        closeError ??= error
      }

      logger.info('Persister stopped')
      settleClosed(reason)
      if (closeError !== undefined) {
        throw closeError
      }
    })()
    return stopping
  }

  // Stop reasons that have no caller to report to settle `closed` only.
  const stopInBackground = (reason: StopReason): void => {
    shutdown(reason).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown failed')
    })
  }

  function onSignal(name: NodeJS.Signals): void {
    logger.info(`Caught signal "${name}", shutting down`)
    stopInBackground({ kind: 'signal', signal: name })
  }

  function onAbort(): void {
    logger.info('Stop requested, shutting down')
    stopInBackground({ kind: 'requested' })
  }

  function onServerError(error: Error): void {
    logger.error({ err: error }, 'HTTP server failed')
    stopInBackground({ kind: 'failed', error })
  }

  server.on('error', onServerError)
  for (const [name, handler] of signalHandlers) {
    process.on(name, handler)
  }
  if (options.signal?.aborted) {
    onAbort()
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true })
  }

  return {
    address,
    port: bound.port,
    stop: () => shutdown({ kind: 'requested' }),
    closed
  }
}

function listen(
  server: Server,
  target: ReturnType<typeof resolveListenTarget>
): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error)
    }
    server.once('error', onError)
    server.listen(
      { port: target.port, host: target.host, ipv6Only: target.ipv6Only },
      () => {
        server.off('error', onError)
        const address = server.address()
        invariant(
          address !== null && typeof address === 'object',
          'server is not bound to a TCP address'
        )
        resolve(address)
      }
    )
  })
}

function closeServer(server: Server): Promise<void> {
  if (!server.listening) {
    return Promise.resolve()
  }
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error)
      } else {
        resolve()
      }
    })
    server.closeIdleConnections()
  })
}
