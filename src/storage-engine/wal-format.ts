/**
 * WAL entry serialization and deserialization.
 *
 * Fixed 48-byte format:
 * [magic:4][version:2][opType:1][flags:1][seqNum:8][offset:8][length:4][keyHash:8][reserved:4][checksum:4][trailer:4]
 */

import {
  recordMagic,
  recordTrailer,
  walVersion,
  walEntrySize,
  walEntryLayout
} from './constants'
import { crc32, isOpType } from './data-format'
import type { WalEntry, DeserializeWalResult } from './types'

const fnvOffsetBasis = 0xcbf29ce484222325n
const fnvPrime = 0x100000001b3n

/**
 * 8-byte FNV-1a hash of a key, stored in the WAL so recovery can tell
 * whether an entry still points at the record it was written for.
 */
export function hashKey(key: string): Uint8Array {
  const keyBytes = new TextEncoder().encode(key)
  let hash = fnvOffsetBasis

  for (const byte of keyBytes) {
    hash ^= BigInt(byte)
    hash = BigInt.asUintN(64, hash * fnvPrime)
  }

  const result = new Uint8Array(8)
  new DataView(result.buffer).setBigUint64(0, hash, true)
  return result
}

export function keyHashesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false
  }
  return a.every((byte, i) => byte === b[i])
}

export function serializeWalEntry(entry: WalEntry): Uint8Array {
  const buffer = new Uint8Array(walEntrySize)
  const view = new DataView(buffer.buffer)

  view.setUint32(walEntryLayout.magic, recordMagic, true)
  view.setUint16(walEntryLayout.version, walVersion, true)
  view.setUint8(walEntryLayout.opType, entry.opType)
  view.setUint8(walEntryLayout.flags, 0)
  view.setBigInt64(walEntryLayout.seqNum, entry.sequenceNumber, true)
  view.setBigUint64(walEntryLayout.offset, BigInt(entry.offset), true)
  view.setUint32(walEntryLayout.length, entry.length, true)
  buffer.set(entry.keyHash.subarray(0, 8), walEntryLayout.keyHash)

  const checksum = crc32(buffer.subarray(0, walEntryLayout.checksum))
  view.setUint32(walEntryLayout.checksum, checksum, true)
  view.setUint32(walEntryLayout.trailer, recordTrailer, true)

  return buffer
}

/**
 * Deserialize a WAL entry from bytes.
 * Returns null if the entry is invalid or corrupted.
 */
export function deserializeWalEntry(
  data: Uint8Array,
  startOffset = 0
): DeserializeWalResult | null {
  if (data.length - startOffset < walEntrySize) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset + startOffset)

  if (view.getUint32(walEntryLayout.magic, true) !== recordMagic) {
    return null
  }
  if (view.getUint16(walEntryLayout.version, true) !== walVersion) {
    return null
  }

  const storedChecksum = view.getUint32(walEntryLayout.checksum, true)
  const computedChecksum = crc32(
    data.subarray(startOffset, startOffset + walEntryLayout.checksum)
  )
  if (storedChecksum !== computedChecksum) {
    return null
  }

  if (view.getUint32(walEntryLayout.trailer, true) !== recordTrailer) {
    return null
  }

  const op = view.getUint8(walEntryLayout.opType)
  if (!isOpType(op)) {
    return null
  }

  return {
    entry: {
      opType: op,
      sequenceNumber: view.getBigInt64(walEntryLayout.seqNum, true),
      offset: Number(view.getBigUint64(walEntryLayout.offset, true)),
      length: view.getUint32(walEntryLayout.length, true),
      keyHash: data.slice(
        startOffset + walEntryLayout.keyHash,
        startOffset + walEntryLayout.keyHash + 8
      )
    },
    bytesRead: walEntrySize
  }
}
