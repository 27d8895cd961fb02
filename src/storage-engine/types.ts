/**
 * Types for the WAL-based storage engine.
 */

import type { opType } from './constants'

/**
 * Operation type for storage operations.
 */
export type OpType = (typeof opType)[keyof typeof opType]

/**
 * Location of a record in the data file.
 * Used by the in-memory index for O(1) lookups.
 */
export interface RecordLocation {
  /** Byte offset in the data file */
  offset: number
  /** Length of the record in bytes */
  length: number
  /** Sequence number for ordering */
  sequenceNumber: bigint
}

/**
 * WAL entry structure.
 * Fixed 48 bytes on disk, points to data file location.
 */
export interface WalEntry {
  opType: OpType
  /** Monotonic sequence number */
  sequenceNumber: bigint
  /** Offset in data file where record starts */
  offset: number
  /** Length of record in data file */
  length: number
  /** First 8 bytes of key hash for validation */
  keyHash: Uint8Array
}

/**
 * Data record structure.
 * Variable size on disk. `value` is the sealed (encrypted) payload and is
 * empty for delete markers.
 */
export interface DataRecord {
  opType: OpType
  sequenceNumber: bigint
  /** Unix timestamp in milliseconds when record was written */
  timestamp: bigint
  key: string
  value: Uint8Array
}

/**
 * Options for creating a storage engine.
 */
export interface StorageEngineOptions {
  /** Path to the data file; the extension is replaced by the engine's own */
  dataPath: string
  /** Secret the value encryption key is derived from */
  encryptionKey: string
  /** Lock acquisition timeout in milliseconds (default: 10000). Use 0 to fail immediately. */
  lockTimeout?: number
  /** Open database in read-only mode (default: false). Allows concurrent reads without exclusive lock. */
  readOnly?: boolean
}

/**
 * Handle passed to the callback of {@link StorageEngine.run}. Every
 * operation on it happens while the engine's write lock is held, and the
 * handle refuses to work once the callback has settled.
 */
export interface Transaction {
  has(key: string): Promise<boolean>
  /** Decrypted value, or null when the key is absent */
  load(key: string): Promise<Uint8Array | null>
  store(key: string, value: Uint8Array): Promise<void>
  /** Writes a delete marker. Returns false when the key did not exist. */
  delete(key: string): Promise<boolean>
  /** Snapshot of the keys in insertion order */
  keys(): Promise<string[]>
  count(): Promise<number>
}

export interface DeserializeDataResult {
  record: DataRecord
  bytesRead: number
}

export interface DeserializeWalResult {
  entry: WalEntry
  bytesRead: number
}

/**
 * Header information for the data file.
 */
export interface DataFileHeader {
  version: number
  /** Truncated HMAC identifying the encryption key the file was written with */
  keyCheck: Uint8Array
}
