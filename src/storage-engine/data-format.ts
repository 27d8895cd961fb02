/**
 * Data record serialization and deserialization.
 *
 * Binary format:
 * [magic:4][version:2][opType:1][flags:1][seqNum:8][timestamp:8][keyLen:2][key:N][valueLen:4][value:M][checksum:4][trailer:4]
 */

import {
  recordMagic,
  recordTrailer,
  recordVersion,
  headerMagic,
  headerVersion,
  headerSize,
  headerOffsets,
  keyCheckSize,
  dataRecordOffsets,
  opType
} from './constants'
import type {
  DataRecord,
  DeserializeDataResult,
  DataFileHeader,
  OpType
} from './types'

const maxKeyLength = 0xffff

/**
 * Calculate the size of a serialized data record.
 */
export function calculateRecordSize(
  keyLength: number,
  valueLength: number
): number {
  // fixed header(26) + key(N) + valueLen(4) + value(M) + checksum(4) + trailer(4)
  return dataRecordOffsets.key + keyLength + 4 + valueLength + 4 + 4
}

/**
 * Serialize a data record to bytes.
 */
export function serializeDataRecord(record: DataRecord): Uint8Array {
  const keyBytes = new TextEncoder().encode(record.key)
  if (keyBytes.length > maxKeyLength) {
    throw new Error(
      `Key too long: ${keyBytes.length} bytes (max ${maxKeyLength})`
    )
  }

  const size = calculateRecordSize(keyBytes.length, record.value.length)
  const buffer = new Uint8Array(size)
  const view = new DataView(buffer.buffer)

  view.setUint32(dataRecordOffsets.magic, recordMagic, true)
  view.setUint16(dataRecordOffsets.version, recordVersion, true)
  view.setUint8(dataRecordOffsets.opType, record.opType)
  // Flags - reserved
  view.setUint8(dataRecordOffsets.flags, 0)
  view.setBigInt64(dataRecordOffsets.seqNum, record.sequenceNumber, true)
  view.setBigInt64(dataRecordOffsets.timestamp, record.timestamp, true)
  view.setUint16(dataRecordOffsets.keyLen, keyBytes.length, true)

  let offset: number = dataRecordOffsets.key
  buffer.set(keyBytes, offset)
  offset += keyBytes.length

  view.setUint32(offset, record.value.length, true)
  offset += 4

  buffer.set(record.value, offset)
  offset += record.value.length

  // CRC32 of everything before the checksum field
  const checksum = crc32(buffer.subarray(0, offset))
  view.setUint32(offset, checksum, true)
  offset += 4

  view.setUint32(offset, recordTrailer, true)

  return buffer
}

/**
 * Deserialize a data record from bytes.
 * Returns null if the record is invalid or corrupted.
 */
export function deserializeDataRecord(
  data: Uint8Array,
  startOffset = 0
): DeserializeDataResult | null {
  // Smallest possible record: empty key, empty value
  if (data.length - startOffset < calculateRecordSize(0, 0)) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset + startOffset)

  if (view.getUint32(dataRecordOffsets.magic, true) !== recordMagic) {
    return null
  }
  if (view.getUint16(dataRecordOffsets.version, true) !== recordVersion) {
    return null
  }

  const op = view.getUint8(dataRecordOffsets.opType)
  if (!isOpType(op)) {
    return null
  }

  const sequenceNumber = view.getBigInt64(dataRecordOffsets.seqNum, true)
  const timestamp = view.getBigInt64(dataRecordOffsets.timestamp, true)
  const keyLen = view.getUint16(dataRecordOffsets.keyLen, true)

  let offset: number = dataRecordOffsets.key

  // Key plus the value length field must fit
  if (data.length - startOffset < offset + keyLen + 4) {
    return null
  }

  const key = new TextDecoder().decode(
    data.subarray(startOffset + offset, startOffset + offset + keyLen)
  )
  offset += keyLen

  const valueLen = view.getUint32(offset, true)
  offset += 4

  // Value + checksum + trailer
  if (data.length - startOffset < offset + valueLen + 8) {
    return null
  }

  const value = data.slice(
    startOffset + offset,
    startOffset + offset + valueLen
  )
  offset += valueLen

  const storedChecksum = view.getUint32(offset, true)
  const computedChecksum = crc32(
    data.subarray(startOffset, startOffset + offset)
  )
  if (storedChecksum !== computedChecksum) {
    return null
  }
  offset += 4

  if (view.getUint32(offset, true) !== recordTrailer) {
    return null
  }
  offset += 4

  return {
    record: {
      opType: op,
      sequenceNumber,
      timestamp,
      key,
      value
    },
    bytesRead: offset
  }
}

/**
 * Length of the key stored in a record prefix, or null when the prefix
 * does not start with a record. Needs at least the fixed 26 byte header.
 */
export function readKeyLength(data: Uint8Array): number | null {
  if (data.length < dataRecordOffsets.key) {
    return null
  }
  const view = new DataView(data.buffer, data.byteOffset)
  if (view.getUint32(dataRecordOffsets.magic, true) !== recordMagic) {
    return null
  }
  return view.getUint16(dataRecordOffsets.keyLen, true)
}

/**
 * Read just the key from a data record.
 * Used during WAL recovery to avoid reading the entire value.
 */
export function readKeyFromBuffer(data: Uint8Array): string | null {
  const keyLen = readKeyLength(data)
  if (keyLen === null) {
    return null
  }

  if (data.length < dataRecordOffsets.key + keyLen) {
    return null
  }

  return new TextDecoder().decode(
    data.subarray(dataRecordOffsets.key, dataRecordOffsets.key + keyLen)
  )
}

/**
 * Serialize the file header.
 */
export function serializeHeader(keyCheck: Uint8Array): Uint8Array {
  const buffer = new Uint8Array(headerSize)
  const view = new DataView(buffer.buffer)

  view.setUint32(headerOffsets.magic, headerMagic, true)
  view.setUint16(headerOffsets.version, headerVersion, true)
  // Reserved bytes are already zero
  buffer.set(keyCheck.subarray(0, keyCheckSize), headerOffsets.keyCheck)

  return buffer
}

/**
 * Deserialize the file header.
 */
export function deserializeHeader(data: Uint8Array): DataFileHeader | null {
  if (data.length < headerSize) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset)

  if (view.getUint32(headerOffsets.magic, true) !== headerMagic) {
    return null
  }

  const version = view.getUint16(headerOffsets.version, true)
  const keyCheck = data.slice(
    headerOffsets.keyCheck,
    headerOffsets.keyCheck + keyCheckSize
  )

  return { version, keyCheck }
}

export function isOpType(value: number): value is OpType {
  return value === opType.insert || value === opType.delete
}

/**
 * CRC32 implementation using the standard polynomial.
 */
const crc32Table = makeCrc32Table()

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let j = 0; j < 8; j++) {
      if (c & 1) {
        c = 0xedb88320 ^ (c >>> 1)
      } else {
        c = c >>> 1
      }
    }
    table[i] = c
  }
  return table
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}
