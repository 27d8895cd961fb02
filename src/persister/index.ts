export { SurrogateIdGenerator, formatStamp, randomInt63 } from './surrogate-id'
export type { SurrogateIdOptions } from './surrogate-id'
export { JsonValueScanner, decodeJsonValues } from './json-stream'
export {
  ingest,
  decodeBatch,
  commitBatch,
  defaultMaxIdAttempts
} from './ingest'
export type { IngestOptions } from './ingest'
export { exportRecords } from './export'
export {
  errorSentinelKey,
  remappedSentinelKey,
  exportLine,
  errorSentinelLine,
  parseExportLine
} from './sentinel'
export type { ExportLine } from './sentinel'
export {
  encodePayload,
  decodePayload,
  encodeStoredRecord,
  decodeStoredRecord
} from './record-codec'
export {
  MalformedInputError,
  SurrogateIdExhaustedError,
  BatchWriteError,
  StoredRecordError
} from './errors'
export type { RollbackFailure } from './errors'
export type {
  TransactionalStore,
  PendingRecord,
  PersistedRecord,
  IdGenerator,
  LineSink,
  BodySource
} from './types'
