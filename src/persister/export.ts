import { decodeStoredRecord } from './record-codec'
import { exportLine } from './sentinel'
import type { LineSink, TransactionalStore } from './types'

/**
 * Write every stored record to `sink` as one export line, in insertion
 * order, and return how many were written. The whole enumeration runs in
 * a single transaction, so a concurrent batch is seen entirely or not at
 * all. Lines already written stay written when a later record fails.
 */
export async function exportRecords(
  store: TransactionalStore,
  sink: LineSink
): Promise<number> {
  return store.run(async (tx) => {
    let written = 0
    for (const surrogateId of await tx.keys()) {
      const value = await tx.load(surrogateId)
      if (value === null) {
        continue
      }
      const record = decodeStoredRecord(surrogateId, value)
      await sink.write(exportLine(record.logicalKey, record.payload))
      written++
    }
    return written
  })
}
