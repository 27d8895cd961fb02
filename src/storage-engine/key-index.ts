/**
 * In-memory key index for O(1) lookups.
 *
 * Maps keys to their location in the data file. This index is
 * rebuilt from the WAL on startup, caught up with entries other writers
 * appended at the start of each transaction and updated after each write.
 * Iteration follows insertion order, which for surrogate ids is
 * roughly chronological.
 */

import { open } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { opType, dataRecordOffsets } from './constants'
import { readKeyFromBuffer, readKeyLength } from './data-format'
import { hashKey, keyHashesEqual } from './wal-format'
import type { Wal } from './wal'
import type { RecordLocation, WalEntry, OpType } from './types'

export interface ReplayResult {
  /** Highest sequence number seen, or -1n when no entry was read */
  maxSequence: bigint
  /** Number of WAL entries read before the end of the log or a corrupt entry */
  entriesRead: number
}

export interface BuildFromWalResult extends ReplayResult {
  index: KeyIndex
}

export class KeyIndex {
  private readonly entries: Map<string, RecordLocation>

  private constructor() {
    this.entries = new Map()
  }

  static create(): KeyIndex {
    return new KeyIndex()
  }

  /**
   * Build the index from a WAL by replaying all entries.
   */
  static async buildFromWal(
    wal: Wal,
    dataPath: string
  ): Promise<BuildFromWalResult> {
    const index = new KeyIndex()
    const result = await index.replay(wal, dataPath, 0)
    return { index, ...result }
  }

  /**
   * Apply the WAL entries from position `fromEntry` onwards.
   * The WAL only stores key hashes, so keys are read back from the data
   * file; entries whose hash does not match the record they point at are
   * ignored.
   */
  async replay(
    wal: Wal,
    dataPath: string,
    fromEntry: number
  ): Promise<ReplayResult> {
    let maxSequence = -1n
    let entriesRead = 0

    let dataHandle: FileHandle
    try {
      dataHandle = await open(dataPath, 'r')
    } catch {
      // No data file = fresh database
      return { maxSequence, entriesRead }
    }

    try {
      for await (const entry of wal.recover(fromEntry)) {
        entriesRead++
        if (entry.sequenceNumber > maxSequence) {
          maxSequence = entry.sequenceNumber
        }

        const key = await readKeyAt(dataHandle, entry.offset)
        if (key !== null && keyHashesEqual(hashKey(key), entry.keyHash)) {
          this.applyEntry(key, entry)
        }
      }
    } finally {
      await dataHandle.close()
    }

    return { maxSequence, entriesRead }
  }

  applyEntry(key: string, entry: WalEntry): void {
    this.apply(
      key,
      {
        offset: entry.offset,
        length: entry.length,
        sequenceNumber: entry.sequenceNumber
      },
      entry.opType
    )
  }

  /**
   * Apply a location update directly (used after writes).
   */
  apply(key: string, location: RecordLocation, op: OpType): void {
    if (op === opType.delete) {
      this.entries.delete(key)
    } else {
      this.entries.set(key, location)
    }
  }

  get(key: string): RecordLocation | undefined {
    return this.entries.get(key)
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  keys(): IterableIterator<string> {
    return this.entries.keys()
  }

  count(): number {
    return this.entries.size
  }
}

async function readKeyAt(
  dataHandle: FileHandle,
  offset: number
): Promise<string | null> {
  const header = new Uint8Array(dataRecordOffsets.key)
  const { bytesRead } = await dataHandle.read(header, 0, header.length, offset)
  const keyLen = readKeyLength(header.subarray(0, bytesRead))
  if (keyLen === null) {
    return null
  }

  const prefix = new Uint8Array(dataRecordOffsets.key + keyLen)
  const read = await dataHandle.read(prefix, 0, prefix.length, offset)
  return readKeyFromBuffer(prefix.subarray(0, read.bytesRead))
}
