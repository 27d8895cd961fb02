import { defaults, loadConfig, resolveEncryptionKey } from '../config'
import { createLogger } from '../logger'
import { startServer } from '../server/lifecycle'
import { keyFlags, sharedFlags } from './flags'

export const serveFlags = {
  ...sharedFlags,
  ...keyFlags,
  protocol: {
    type: String,
    description: 'Network protocol to listen on (tcp, tcp4 or tcp6)',
    default: defaults.protocol
  },
  addr: {
    type: String,
    description: 'Address to bind the HTTP server to',
    default: defaults.address
  }
}

export interface ServeFlags {
  db: string
  encryptionKeyEnv: string
  protocol: string
  addr: string
}

/**
 * Run the service until a signal or listener error stops it.
 */
export async function serve(flags: ServeFlags): Promise<void> {
  const config = loadConfig({
    protocol: flags.protocol,
    address: flags.addr,
    dbPath: flags.db,
    encryptionKeyEnv: flags.encryptionKeyEnv
  })
  const logger = createLogger({ level: config.logLevel })

  const { key, isDefault } = resolveEncryptionKey(config)
  if (isDefault) {
    logger.warn(
      `${config.encryptionKeyEnv} is empty, using the built-in default encryption key`
    )
  }

  const server = await startServer({ config, encryptionKey: key, logger })
  await server.closed
}
