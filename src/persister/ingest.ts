/**
 * Atomic ingestion of key-value batches.
 *
 * A request body is decoded completely before the store is touched. The
 * whole batch is then written inside a single store transaction; if any
 * record fails, the records already written by that transaction are
 * deleted again so that the batch is persisted entirely or not at all.
 */

import type { Transaction } from '../storage-engine'
import {
  BatchWriteError,
  SurrogateIdExhaustedError,
  type RollbackFailure
} from './errors'
import { decodeJsonValues } from './json-stream'
import { encodeStoredRecord, toPendingRecords } from './record-codec'
import { SurrogateIdGenerator } from './surrogate-id'
import type {
  BodySource,
  IdGenerator,
  PendingRecord,
  PersistedRecord,
  TransactionalStore
} from './types'

export const defaultMaxIdAttempts = 1000

export interface IngestOptions {
  idGenerator?: IdGenerator
  /** Upper bound on id draws per record, collisions included */
  maxIdAttempts?: number
}

/**
 * Decode every JSON object of a body into one ordered batch. Throws
 * MalformedInputError on any decoding, validation or transport failure.
 */
export async function decodeBatch(body: BodySource): Promise<PendingRecord[]> {
  const batch: PendingRecord[] = []
  let objectNumber = 0
  for await (const value of decodeJsonValues(body)) {
    objectNumber++
    batch.push(...toPendingRecords(value, objectNumber))
  }
  return batch
}

/**
 * Write a decoded batch in one transaction and return it with the
 * assigned surrogate ids. An empty batch returns without opening a
 * transaction.
 */
export async function commitBatch(
  store: TransactionalStore,
  batch: PendingRecord[],
  options: IngestOptions = {}
): Promise<PersistedRecord[]> {
  if (batch.length === 0) {
    return []
  }

  const idGenerator = options.idGenerator ?? new SurrogateIdGenerator()
  const maxIdAttempts = options.maxIdAttempts ?? defaultMaxIdAttempts

  return store.run(async (tx) => {
    const persisted: PersistedRecord[] = []

    for (const [index, record] of batch.entries()) {
      try {
        const surrogateId = await unusedId(tx, idGenerator, maxIdAttempts)
        await tx.store(surrogateId, encodeStoredRecord(record))
        persisted.push({ ...record, surrogateId })
      } catch (error) {
        const rollbackFailures = await rollback(tx, persisted)
        throw new BatchWriteError(index, batch.length, error, rollbackFailures)
      }
    }

    return persisted
  })
}

/**
 * Decode a request body and persist it atomically.
 */
export async function ingest(
  store: TransactionalStore,
  body: BodySource,
  options: IngestOptions = {}
): Promise<PersistedRecord[]> {
  const batch = await decodeBatch(body)
  return commitBatch(store, batch, options)
}

async function unusedId(
  tx: Transaction,
  idGenerator: IdGenerator,
  maxAttempts: number
): Promise<string> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const id = idGenerator.nextId()
    if (!(await tx.has(id))) {
      return id
    }
  }
  throw new SurrogateIdExhaustedError(maxAttempts)
}

async function rollback(
  tx: Transaction,
  written: PersistedRecord[]
): Promise<RollbackFailure[]> {
  const failures: RollbackFailure[] = []
  for (const { surrogateId } of written) {
    try {
      await tx.delete(surrogateId)
    } catch (error) {
      failures.push({ surrogateId, error })
    }
  }
  return failures
}
