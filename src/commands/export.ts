import { command } from 'cleye'
import { resolveEncryptionKey } from '../config'
import { exportRecords, type LineSink } from '../persister'
import { StorageEngine } from '../storage-engine'
import { keyFlags, sharedFlags } from './flags'
import { runCommand } from './run-command'

export interface ExportOptions {
  dbPath: string
  encryptionKey: string
}

/**
 * Write the export stream of a store to `sink`. The store is opened
 * read-only; the export still waits for a running batch to finish.
 * Returns the number of pairs written.
 */
export async function exportStore(
  options: ExportOptions,
  sink: LineSink
): Promise<number> {
  const store = await StorageEngine.create({
    dataPath: options.dbPath,
    encryptionKey: options.encryptionKey,
    readOnly: true
  })

  try {
    return await exportRecords(store, sink)
  } finally {
    await store.close()
  }
}

const stdoutSink: LineSink = {
  write: (line) =>
    new Promise<void>((resolve, reject) => {
      process.stdout.write(line, (error) => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
}

export const exportCmd = command(
  {
    name: 'export',
    flags: {
      ...sharedFlags,
      ...keyFlags
    },
    help: {
      description:
        'Print every stored key-value pair as newline-delimited JSON',
      examples: [
        'persister export',
        'persister export --db ./backup.db > pairs.ndjson'
      ]
    }
  },
  (argv) => {
    runCommand(async () => {
      const { key } = resolveEncryptionKey({
        encryptionKeyEnv: argv.flags.encryptionKeyEnv
      })
      await exportStore(
        { dbPath: argv.flags.db, encryptionKey: key },
        stdoutSink
      )
    })
  }
)
