export * from './persister'
export {
  createApp,
  streamSink,
  ClientDisconnectedError,
  jsonContentType,
  persistedMessage,
  type AppOptions,
  type AppEnv,
  type ResponseStream
} from './server/app'
export {
  startServer,
  ShutdownSignalError,
  defaultStopSignals,
  type StartOptions,
  type RunningServer,
  type ServerSettings
} from './server/lifecycle'
export {
  InvalidAddressError,
  resolveListenTarget,
  splitHostPort,
  joinHostPort,
  type ListenTarget
} from './server/address'
export {
  PersisterClient,
  PersisterRequestError,
  ServerStreamError,
  type PersisterClientOptions,
  type KeyValueBatch,
  type ListedPair,
  type FetchLike
} from './client'
export {
  defaults,
  loadConfig,
  resolveEncryptionKey,
  serveConfigSchema,
  type ServeConfig,
  type RawServeConfig,
  type Protocol
} from './config'
export { createLogger, silentLogger, type Logger } from './logger'
export {
  StorageEngine,
  ReadOnlyError,
  DatabaseLockedError,
  LockPermissionError,
  EncryptionKeyMismatchError,
  DecryptionError,
  type StorageEngineOptions,
  type Transaction
} from './storage-engine'
