import { randomBytes } from 'node:crypto'
import type { IdGenerator } from './types'

const int63Mask = 0x7fffffffffffffffn
const randomDigits = 19

export interface SurrogateIdOptions {
  now?: () => Date
  /** Non-negative integer below 2^63 */
  random?: () => bigint
}

/**
 * Generates storage keys of the form `20231019T093700.123_0123456789012345678`:
 * a UTC timestamp, so keys sort roughly by creation time, and a
 * zero-padded random 63-bit integer. Uniqueness is not guaranteed here;
 * callers check the store and draw again on collision.
 */
export class SurrogateIdGenerator implements IdGenerator {
  private readonly now: () => Date
  private readonly random: () => bigint

  constructor(options: SurrogateIdOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.random = options.random ?? randomInt63
  }

  nextId(): string {
    const digits = this.random().toString().padStart(randomDigits, '0')
    return `${formatStamp(this.now())}_${digits}`
  }
}

/**
 * Format a date as `YYYYMMDDTHHMMSS` in UTC, followed by the fractional
 * second without trailing zeros (and no dot when there is none).
 */
export function formatStamp(date: Date): string {
  const pad = (value: number, width = 2): string =>
    value.toString().padStart(width, '0')

  const seconds =
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    'T' +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())

  const fraction = pad(date.getUTCMilliseconds(), 3).replace(/0+$/, '')
  return fraction === '' ? seconds : `${seconds}.${fraction}`
}

export function randomInt63(): bigint {
  return randomBytes(8).readBigUInt64BE() & int63Mask
}
