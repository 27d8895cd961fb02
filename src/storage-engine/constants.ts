/**
 * Constants for the WAL-based storage engine.
 *
 * These define the binary format for data records and WAL entries.
 */

// Magic numbers for format validation
export const recordMagic = 0xcafebabe
export const recordTrailer = 0xdeadbeef

// File header magic (ASCII "CPKV")
export const headerMagic = 0x43504b56

// Format versions
export const headerVersion = 1
export const recordVersion = 1
export const walVersion = 1

// Fixed sizes
export const headerSize = 16
export const walEntrySize = 48
export const keyCheckSize = 8

// Data record field offsets
export const dataRecordOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  opType: 6, // 1 byte
  flags: 7, // 1 byte
  seqNum: 8, // 8 bytes (BigInt64)
  timestamp: 16, // 8 bytes (BigInt64) - Unix milliseconds
  keyLen: 24, // 2 bytes
  key: 26 // variable, followed by valueLen (4), value (N), checksum (4), trailer (4)
} as const

// WAL entry layout (48 bytes total)
export const walEntryLayout = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  opType: 6, // 1 byte
  flags: 7, // 1 byte
  seqNum: 8, // 8 bytes
  offset: 16, // 8 bytes
  length: 24, // 4 bytes
  keyHash: 28, // 8 bytes (truncated hash for validation)
  reserved: 36, // 4 bytes
  checksum: 40, // 4 bytes
  trailer: 44 // 4 bytes
} as const

// Header field offsets
export const headerOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  reserved: 6, // 2 bytes
  keyCheck: 8 // 8 bytes
} as const

// AES-256-GCM sealing
export const ivSize = 12
export const authTagSize = 16

// Operation types
export const opType = {
  insert: 0,
  delete: 2
} as const

// Default file extensions
export const fileExtensions = {
  data: '.db',
  wal: '.db-wal',
  lock: '.db.lock'
} as const
