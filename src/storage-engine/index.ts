/**
 * Storage Engine module - WAL-based durable, encrypted key-value storage.
 */

export { StorageEngine } from './storage-engine'
export { Wal } from './wal'
export { KeyIndex } from './key-index'
export {
  FileLock,
  DatabaseLockedError,
  ReadOnlyError,
  LockPermissionError
} from './file-lock'
export { Mutex } from './mutex'
export {
  ValueCipher,
  DecryptionError,
  EncryptionKeyMismatchError
} from './cipher'

export type {
  OpType,
  RecordLocation,
  WalEntry,
  DataRecord,
  StorageEngineOptions,
  Transaction,
  DeserializeDataResult,
  DeserializeWalResult,
  DataFileHeader
} from './types'

export { headerSize, walEntrySize, opType, fileExtensions } from './constants'

export {
  serializeDataRecord,
  deserializeDataRecord,
  serializeHeader,
  deserializeHeader,
  readKeyFromBuffer,
  calculateRecordSize,
  crc32
} from './data-format'

export { serializeWalEntry, deserializeWalEntry, hashKey } from './wal-format'
