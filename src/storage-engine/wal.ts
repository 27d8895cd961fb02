/**
 * Write-Ahead Log (WAL) implementation.
 *
 * Every write appends its data record first and its WAL entry second;
 * an operation exists once its WAL entry is on disk. On startup the WAL
 * is replayed to rebuild the in-memory index.
 */

import { open, stat, mkdir, truncate } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { walEntrySize } from './constants'
import { serializeWalEntry, deserializeWalEntry } from './wal-format'
import type { WalEntry } from './types'

export class Wal {
  private readonly filePath: string
  private fileHandle: FileHandle | null = null

  constructor(filePath: string) {
    this.filePath = filePath
  }

  /**
   * Append a WAL entry and sync to disk.
   * This is the commit point - once this returns, the operation is durable.
   */
  async append(entry: WalEntry): Promise<void> {
    const buffer = serializeWalEntry(entry)

    if (!this.fileHandle) {
      await mkdir(dirname(this.filePath), { recursive: true })
      this.fileHandle = await open(this.filePath, 'a')
    }

    await this.fileHandle.write(buffer)
    await this.fileHandle.sync()
  }

  /**
   * Recover WAL entries from disk, skipping the first `fromEntry`.
   * Yields valid entries in order, stopping at the first corrupted entry.
   */
  async *recover(fromEntry = 0): AsyncGenerator<WalEntry> {
    const start = fromEntry * walEntrySize
    const fileStats = await stat(this.filePath).catch(() => null)
    if (!fileStats || fileStats.size <= start) {
      return
    }

    // Fixed-size entries, small enough to read whole
    const fileHandle = await open(this.filePath, 'r')
    try {
      const length = fileStats.size - start
      const buffer = new Uint8Array(length)
      const { bytesRead } = await fileHandle.read(buffer, 0, length, start)

      for (
        let offset = 0;
        offset + walEntrySize <= bytesRead;
        offset += walEntrySize
      ) {
        const result = deserializeWalEntry(buffer, offset)
        if (!result) {
          // Torn or corrupted tail: everything after it is discarded
          break
        }
        yield result.entry
      }
    } finally {
      await fileHandle.close()
    }
  }

  /**
   * Cut the log back to its first `entryCount` entries, dropping a torn
   * tail so that later appends are not hidden behind it.
   */
  async truncate(entryCount: number): Promise<void> {
    const size = entryCount * walEntrySize
    const fileStats = await stat(this.filePath).catch(() => null)
    if (fileStats && fileStats.size > size) {
      await truncate(this.filePath, size)
    }
  }

  async close(): Promise<void> {
    if (this.fileHandle) {
      await this.fileHandle.close()
      this.fileHandle = null
    }
  }
}
