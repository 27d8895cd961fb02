import type { Transaction } from '../storage-engine'

/**
 * A store offering isolated, serialized transactions. StorageEngine is the
 * production implementation; tests substitute in-memory ones.
 */
export interface TransactionalStore {
  run<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>
}

/**
 * One logical key-value pair as submitted by a client.
 */
export interface PendingRecord {
  logicalKey: string
  /** Opaque bytes, usually ciphertext */
  payload: Uint8Array
}

export interface PersistedRecord extends PendingRecord {
  /** Storage key assigned at write time, unique within the store */
  surrogateId: string
}

export interface IdGenerator {
  nextId(): string
}

/**
 * Destination for the export stream, one call per line.
 */
export interface LineSink {
  write(line: string): Promise<unknown>
}

/**
 * Anything a request body can arrive as.
 */
export type BodySource =
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array | string>
  | string
  | null
