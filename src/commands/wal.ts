import { command } from 'cleye'
import { StorageEngine } from '../storage-engine'
import { opType } from '../storage-engine/constants'
import type { WalEntry } from '../storage-engine/types'
import { Wal } from '../storage-engine/wal'
import { sharedFlags } from './flags'
import { runCommand } from './run-command'

const opTypeNames: Record<number, string> = {
  [opType.insert]: 'INSERT',
  [opType.delete]: 'DELETE'
}

function formatKeyHash(hash: Uint8Array): string {
  return Array.from(hash.slice(0, 8))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('')
}

export function formatWalEntry(entry: WalEntry): string[] {
  const opName = opTypeNames[entry.opType] ?? `UNKNOWN(${entry.opType})`
  return [
    `[${entry.sequenceNumber}] ${opName}`,
    `  offset: ${entry.offset}, length: ${entry.length}`,
    `  keyHash: ${formatKeyHash(entry.keyHash)}`,
    ''
  ]
}

/**
 * Human-readable listing of the valid WAL entries of a store.
 */
export async function describeWal(dbPath: string): Promise<string[]> {
  const wal = new Wal(StorageEngine.resolvePaths(dbPath).walPath)

  try {
    const lines: string[] = []
    let count = 0
    for await (const entry of wal.recover()) {
      lines.push(...formatWalEntry(entry))
      count++
    }

    lines.push(count === 0 ? 'WAL is empty' : `Total: ${count} entries`)
    return lines
  } finally {
    await wal.close()
  }
}

export const walCmd = command(
  {
    name: 'wal',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Display WAL entries in human-readable format',
      examples: ['persister wal', 'persister wal --db ./backup.db']
    }
  },
  (argv) => {
    runCommand(async () => {
      for (const line of await describeWal(argv.flags.db)) {
        console.log(line)
      }
    })
  }
)
