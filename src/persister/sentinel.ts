/**
 * Line format of the export stream, and how failures are signalled in it.
 *
 * Every line is a JSON object with exactly one member whose value is
 * base64. A failure after the stream has started is reported as a final
 * line under the reserved key `SERVER_ERROR`; stored records that carry
 * that key are renamed on the way out so a reader never confuses the two.
 */

import { z } from 'zod'
import { base64Pattern, decodePayload, encodePayload } from './record-codec'

export const errorSentinelKey = 'SERVER_ERROR'
export const remappedSentinelKey = 'server_error'

export type ExportLine =
  | { kind: 'record'; key: string; payload: Uint8Array }
  | { kind: 'error'; message: string }

const lineSchema = z
  .record(z.string().regex(base64Pattern))
  .refine((members) => Object.keys(members).length === 1, {
    message: 'expected exactly one key-value pair'
  })

export function exportLine(logicalKey: string, payload: Uint8Array): string {
  const key = logicalKey === errorSentinelKey ? remappedSentinelKey : logicalKey
  return `${JSON.stringify({ [key]: encodePayload(payload) })}\n`
}

export function errorSentinelLine(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return `${JSON.stringify({
    [errorSentinelKey]: encodePayload(new TextEncoder().encode(message))
  })}\n`
}

/**
 * Classify one line of an export stream. Throws when the line is not a
 * single-member object of base64 values.
 */
export function parseExportLine(line: string): ExportLine {
  const members = lineSchema.parse(JSON.parse(line))
  const [[key, encoded]] = Object.entries(members)
  const payload = decodePayload(encoded)

  if (key === errorSentinelKey) {
    return { kind: 'error', message: new TextDecoder().decode(payload) }
  }
  return { kind: 'record', key, payload }
}
