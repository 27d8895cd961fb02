/**
 * Storage Engine - append-only, encrypted key-value store.
 *
 * Write path: seal value → data record → fsync → WAL → fsync → index.
 * The index is rebuilt from the WAL on startup.
 *
 * All access goes through run(), which serializes transactions with an
 * in-process mutex and an exclusive lock file held for the whole callback,
 * then replays WAL entries appended by other engines since the last
 * transaction. A transaction therefore never sees another one half applied.
 */

import { open, stat, mkdir } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import invariant from 'tiny-invariant'
import { opType, fileExtensions, headerSize, headerVersion } from './constants'
import {
  serializeDataRecord,
  deserializeDataRecord,
  serializeHeader,
  deserializeHeader
} from './data-format'
import { hashKey } from './wal-format'
import { Wal } from './wal'
import { KeyIndex } from './key-index'
import { FileLock, LockPermissionError, ReadOnlyError } from './file-lock'
import { Mutex } from './mutex'
import { ValueCipher, EncryptionKeyMismatchError } from './cipher'
import type {
  DataRecord,
  StorageEngineOptions,
  OpType,
  Transaction
} from './types'

export interface EnginePaths {
  dataPath: string
  walPath: string
  lockPath: string
}

export class StorageEngine {
  private readonly paths: EnginePaths
  private readonly lockTimeout: number
  private readonly readOnly: boolean
  private readonly cipher: ValueCipher

  private readonly wal: Wal
  private readonly index: KeyIndex
  private readonly writeMutex: Mutex

  private dataHandle: FileHandle | null = null
  private dataHandlePromise: Promise<FileHandle> | null = null
  private sequenceCounter: bigint
  /** WAL entries already applied to the index */
  private walEntries: number
  private closed = false

  private constructor(
    paths: EnginePaths,
    lockTimeout: number,
    readOnly: boolean,
    cipher: ValueCipher,
    wal: Wal,
    index: KeyIndex,
    sequenceCounter: bigint,
    walEntries: number
  ) {
    this.paths = paths
    this.lockTimeout = lockTimeout
    this.readOnly = readOnly
    this.cipher = cipher
    this.wal = wal
    this.index = index
    this.writeMutex = new Mutex()
    this.sequenceCounter = sequenceCounter
    this.walEntries = walEntries
  }

  /**
   * Create or open a storage engine, replaying the WAL if one exists.
   *
   * Opening does not take the lock file; run() takes it per transaction
   * and drops a torn WAL tail while holding it.
   */
  static async create(options: StorageEngineOptions): Promise<StorageEngine> {
    const paths = StorageEngine.resolvePaths(options.dataPath)
    const lockTimeout = options.lockTimeout ?? 10000
    const readOnly = options.readOnly ?? false
    const cipher = new ValueCipher(options.encryptionKey)

    if (!readOnly) {
      await mkdir(dirname(paths.dataPath), { recursive: true })
    } else {
      const dataExists = await stat(paths.dataPath).catch(() => null)
      const walExists = await stat(paths.walPath).catch(() => null)
      if (!dataExists && !walExists) {
        throw new Error(
          `Cannot open database in read-only mode: no database exists at ${paths.dataPath}`
        )
      }
    }

    await StorageEngine.verifyHeader(paths.dataPath, cipher)

    const wal = new Wal(paths.walPath)
    const { index, maxSequence, entriesRead } = await KeyIndex.buildFromWal(
      wal,
      paths.dataPath
    )

    return new StorageEngine(
      paths,
      lockTimeout,
      readOnly,
      cipher,
      wal,
      index,
      maxSequence + 1n,
      entriesRead
    )
  }

  /**
   * Map a user supplied path to the engine's data, WAL and lock files.
   */
  static resolvePaths(dataPath: string): EnginePaths {
    const basePath = dataPath.replace(/\.[^./\\]+$/, '')
    return {
      dataPath: basePath + fileExtensions.data,
      walPath: basePath + fileExtensions.wal,
      lockPath: basePath + fileExtensions.lock
    }
  }

  /**
   * Reject data files of another format or written under another key.
   * A missing or empty file is a fresh database.
   */
  private static async verifyHeader(
    dataPath: string,
    cipher: ValueCipher
  ): Promise<void> {
    let fileHandle: FileHandle
    try {
      fileHandle = await open(dataPath, 'r')
    } catch {
      return
    }

    try {
      const buffer = new Uint8Array(headerSize)
      const { bytesRead } = await fileHandle.read(buffer, 0, headerSize, 0)
      if (bytesRead === 0) {
        return
      }

      const header = deserializeHeader(buffer.subarray(0, bytesRead))
      if (!header || header.version !== headerVersion) {
        throw new Error(`Unrecognized database format: ${dataPath}`)
      }
      if (!cipher.matches(header.keyCheck)) {
        throw new EncryptionKeyMismatchError(dataPath)
      }
    } finally {
      await fileHandle.close()
    }
  }

  /**
   * Run `fn` as one transaction with exclusive access to the store.
   * Read-only engines take the lock too, so an enumeration never overlaps
   * a writer's batch; only where the lock file cannot be created do they
   * read without it.
   *
   * The lock is released whether `fn` resolves or throws. Writes are not
   * undone automatically; a caller that needs all-or-nothing behaviour
   * deletes what it wrote before rethrowing.
   */
  async run<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    return this.writeMutex.runExclusive(async () => {
      if (this.closed) {
        throw new Error('Storage engine is closed')
      }

      const fileLock = await this.acquireFileLock()

      let active = true
      const ensureActive = (): void => {
        invariant(active, 'Transaction used after it completed')
      }

      const tx: Transaction = {
        has: async (key) => {
          ensureActive()
          return this.index.has(key)
        },
        load: async (key) => {
          ensureActive()
          return this.loadValue(key)
        },
        store: async (key, value) => {
          ensureActive()
          await this.appendRecord(key, this.cipher.seal(value), opType.insert)
        },
        delete: async (key) => {
          ensureActive()
          if (!this.index.has(key)) {
            return false
          }
          await this.appendRecord(key, new Uint8Array(0), opType.delete)
          return true
        },
        keys: async () => {
          ensureActive()
          return Array.from(this.index.keys())
        },
        count: async () => {
          ensureActive()
          return this.index.count()
        }
      }

      try {
        await this.catchUp()
        return await fn(tx)
      } finally {
        active = false
        await fileLock?.release()
      }
    })
  }

  getDataPath(): string {
    return this.paths.dataPath
  }

  /**
   * Close the storage engine once any running transaction has finished.
   */
  async close(): Promise<void> {
    await this.writeMutex.runExclusive(async () => {
      this.closed = true
      if (this.dataHandlePromise) {
        const handle = await this.dataHandlePromise
        await handle.close()
        this.dataHandle = null
        this.dataHandlePromise = null
      }
      await this.wal.close()
    })
  }

  private async acquireFileLock(): Promise<FileLock | null> {
    const fileLock = new FileLock(this.paths.lockPath, this.lockTimeout)
    try {
      await fileLock.acquire()
      return fileLock
    } catch (error) {
      if (this.readOnly && error instanceof LockPermissionError) {
        return null
      }
      throw error
    }
  }

  /**
   * Apply WAL entries other engines appended since this engine last looked.
   * Callers hold the lock file.
   */
  private async catchUp(): Promise<void> {
    const { maxSequence, entriesRead } = await this.index.replay(
      this.wal,
      this.paths.dataPath,
      this.walEntries
    )
    this.walEntries += entriesRead
    if (maxSequence >= this.sequenceCounter) {
      this.sequenceCounter = maxSequence + 1n
    }

    if (!this.readOnly) {
      await this.wal.truncate(this.walEntries)
    }
  }

  private async loadValue(key: string): Promise<Uint8Array | null> {
    const location = this.index.get(key)
    if (!location) {
      return null
    }

    const record = await this.readRecordAt(location.offset, location.length)
    if (!record) {
      throw new Error(`Record for key "${key}" is corrupted`)
    }
    return this.cipher.open(record.value)
  }

  /**
   * Append a record. Implements: data → fsync → WAL → fsync → index.
   * Callers hold the write mutex and the lock file.
   */
  private async appendRecord(
    key: string,
    value: Uint8Array,
    op: OpType
  ): Promise<void> {
    if (this.readOnly) {
      throw new ReadOnlyError()
    }

    const sequenceNumber = this.sequenceCounter++
    const recordData = serializeDataRecord({
      opType: op,
      sequenceNumber,
      timestamp: BigInt(Date.now()),
      key,
      value
    })

    const offset = await this.appendToDataFile(recordData)

    // Commit point
    await this.wal.append({
      opType: op,
      sequenceNumber,
      offset,
      length: recordData.length,
      keyHash: hashKey(key)
    })
    this.walEntries++

    this.index.apply(
      key,
      { offset, length: recordData.length, sequenceNumber },
      op
    )
  }

  private async appendToDataFile(data: Uint8Array): Promise<number> {
    const dataHandle = await this.getDataHandle()

    const { size } = await dataHandle.stat()
    let offset = size

    if (offset === 0) {
      const header = serializeHeader(this.cipher.keyCheck())
      await dataHandle.write(header, 0, header.length, 0)
      offset = headerSize
    }

    await dataHandle.write(data, 0, data.length, offset)
    await dataHandle.sync()

    return offset
  }

  private async readRecordAt(
    offset: number,
    length: number
  ): Promise<DataRecord | null> {
    const dataHandle = await this.getDataHandle()

    const buffer = new Uint8Array(length)
    const { bytesRead } = await dataHandle.read(buffer, 0, length, offset)

    const result = deserializeDataRecord(buffer.subarray(0, bytesRead))
    return result?.record ?? null
  }

  /**
   * Get or open the data file handle.
   * Concurrent callers share one open operation.
   */
  private async getDataHandle(): Promise<FileHandle> {
    if (this.dataHandle) {
      return this.dataHandle
    }

    this.dataHandlePromise ??= (async () => {
      const handle = this.readOnly
        ? await open(this.paths.dataPath, 'r')
        : await open(this.paths.dataPath, 'r+').catch(() =>
            open(this.paths.dataPath, 'w+')
          )
      this.dataHandle = handle
      return handle
    })()

    return this.dataHandlePromise
  }
}
