/**
 * Encoding of records as store values, and of payloads on the wire.
 *
 * A stored value is the UTF-8 JSON document
 * `{"key":"<logical key>","ciphertext":"<base64 payload>"}`.
 */

import { z } from 'zod'
import { MalformedInputError, StoredRecordError } from './errors'
import type { PendingRecord } from './types'

/** Standard, padded base64 */
export const base64Pattern =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

export const payloadSchema = z
  .string({ invalid_type_error: 'expected a base64 encoded string' })
  .regex(base64Pattern, 'illegal base64 data')
  .nullable()

const storedRecordSchema = z.object({
  key: z.string(),
  ciphertext: z.string().regex(base64Pattern)
})

export function encodePayload(payload: Uint8Array): string {
  return Buffer.from(payload).toString('base64')
}

export function decodePayload(encoded: string): Uint8Array {
  return new Uint8Array(Buffer.from(encoded, 'base64'))
}

/**
 * Turn one decoded request object into records, in key order.
 * `null` stands for an empty object, and a `null` value for an empty
 * payload.
 */
export function toPendingRecords(
  value: unknown,
  objectNumber: number
): PendingRecord[] {
  if (value === null) {
    return []
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new MalformedInputError(
      `object ${objectNumber}: expected a JSON object of key-value pairs`
    )
  }

  return Object.entries(value).map(([logicalKey, raw]) => {
    const parsed = payloadSchema.safeParse(raw)
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid value'
      throw new MalformedInputError(
        `object ${objectNumber}, key "${logicalKey}": ${reason}`
      )
    }
    return {
      logicalKey,
      payload:
        parsed.data === null ? new Uint8Array(0) : decodePayload(parsed.data)
    }
  })
}

export function encodeStoredRecord(record: PendingRecord): Uint8Array {
  const document = JSON.stringify({
    key: record.logicalKey,
    ciphertext: encodePayload(record.payload)
  })
  return new TextEncoder().encode(document)
}

export function decodeStoredRecord(
  surrogateId: string,
  value: Uint8Array
): PendingRecord {
  let document: unknown
  try {
    document = JSON.parse(new TextDecoder().decode(value))
  } catch (error) {
    throw new StoredRecordError(surrogateId, 'not a JSON document', {
      cause: error
    })
  }

  const parsed = storedRecordSchema.safeParse(document)
  if (!parsed.success) {
    throw new StoredRecordError(surrogateId, 'expected a stored record', {
      cause: parsed.error
    })
  }

  return {
    logicalKey: parsed.data.key,
    payload: decodePayload(parsed.data.ciphertext)
  }
}
