/**
 * Value sealing for the storage engine.
 *
 * Values are encrypted with AES-256-GCM. Sealed layout:
 * [iv:12][authTag:16][ciphertext:N]
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createHmac,
  randomBytes,
  timingSafeEqual
} from 'node:crypto'
import { authTagSize, ivSize, keyCheckSize } from './constants'

const algorithm = 'aes-256-gcm'
const keyCheckLabel = 'cipher-persister key check v1'

export class ValueCipher {
  private readonly key: Buffer
  private readonly check: Uint8Array

  constructor(secret: string) {
    if (secret.length === 0) {
      throw new Error('Encryption key must not be empty')
    }
    this.key = createHash('sha256').update(secret, 'utf8').digest()
    this.check = createHmac('sha256', this.key)
      .update(keyCheckLabel)
      .digest()
      .subarray(0, keyCheckSize)
  }

  /**
   * Short fingerprint of the key, written into the data file header.
   */
  keyCheck(): Uint8Array {
    return this.check
  }

  matches(keyCheck: Uint8Array): boolean {
    return (
      keyCheck.length === this.check.length &&
      timingSafeEqual(keyCheck, this.check)
    )
  }

  seal(plaintext: Uint8Array): Uint8Array {
    const iv = randomBytes(ivSize)
    const cipher = createCipheriv(algorithm, this.key, iv)
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext])
  }

  open(sealed: Uint8Array): Uint8Array {
    if (sealed.length < ivSize + authTagSize) {
      throw new DecryptionError('Sealed value is too short')
    }

    const iv = sealed.subarray(0, ivSize)
    const authTag = sealed.subarray(ivSize, ivSize + authTagSize)
    const ciphertext = sealed.subarray(ivSize + authTagSize)

    try {
      const decipher = createDecipheriv(algorithm, this.key, iv)
      decipher.setAuthTag(authTag)
      return Buffer.concat([decipher.update(ciphertext), decipher.final()])
    } catch (error) {
      throw new DecryptionError('Unable to decrypt stored value', {
        cause: error
      })
    }
  }
}

/**
 * Error thrown when a stored value fails authentication.
 */
export class DecryptionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DecryptionError'
  }
}

/**
 * Error thrown when a database is opened with a different key than the
 * one it was created with.
 */
export class EncryptionKeyMismatchError extends Error {
  constructor(public readonly dataPath: string) {
    super(`Encryption key does not match the key used for ${dataPath}`)
    this.name = 'EncryptionKeyMismatchError'
  }
}
