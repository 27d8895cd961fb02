import { unlink, rm, readFile } from 'node:fs/promises'
import { StorageEngine } from '../storage-engine'
import { headerSize, walEntrySize } from '../constants'
import { deserializeDataRecord } from '../data-format'
import type { DataRecord } from '../types'

export { walEntrySize }

export const testEncryptionKey = 'test-secret'

export interface TestPaths {
  dataPath: string
  walPath: string
  lockPath: string
}

/**
 * Generate unique test file paths with a prefix.
 */
export function createTestPaths(prefix: string): TestPaths {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  const basePath = `/tmp/test-${prefix}-${id}`
  return {
    dataPath: `${basePath}.db`,
    walPath: `${basePath}.db-wal`,
    lockPath: `${basePath}.db.lock`
  }
}

/**
 * Open an engine on the given paths with the shared test key.
 */
export function openEngine(
  paths: TestPaths,
  options: { readOnly?: boolean; lockTimeout?: number; key?: string } = {}
): Promise<StorageEngine> {
  return StorageEngine.create({
    dataPath: paths.dataPath,
    encryptionKey: options.key ?? testEncryptionKey,
    readOnly: options.readOnly,
    lockTimeout: options.lockTimeout
  })
}

/**
 * Clean up test files.
 */
export async function cleanup(paths: TestPaths[]): Promise<void> {
  for (const { dataPath, walPath, lockPath } of paths) {
    await unlink(dataPath).catch(() => undefined)
    await unlink(walPath).catch(() => undefined)
    await rm(lockPath, { force: true })
  }
}

/**
 * Flip a single byte in a byte array at the specified index.
 */
export function flipByte(data: Uint8Array, index: number): void {
  if (index >= 0 && index < data.length) {
    data[index] = data[index] ^ 0xff
  }
}

/**
 * Collect all entries from an async generator into an array.
 */
export async function collectEntries<T>(
  generator: AsyncGenerator<T>
): Promise<T[]> {
  const entries: T[] = []
  for await (const entry of generator) {
    entries.push(entry)
  }
  return entries
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}

export function text(value: Uint8Array | null): string | null {
  return value === null ? null : new TextDecoder().decode(value)
}

export function put(
  engine: StorageEngine,
  key: string,
  value: Uint8Array
): Promise<void> {
  return engine.run((tx) => tx.store(key, value))
}

export function remove(engine: StorageEngine, key: string): Promise<boolean> {
  return engine.run((tx) => tx.delete(key))
}

export function get(
  engine: StorageEngine,
  key: string
): Promise<Uint8Array | null> {
  return engine.run((tx) => tx.load(key))
}

export function has(engine: StorageEngine, key: string): Promise<boolean> {
  return engine.run((tx) => tx.has(key))
}

export function keysOf(engine: StorageEngine): Promise<string[]> {
  return engine.run((tx) => tx.keys())
}

export function countOf(engine: StorageEngine): Promise<number> {
  return engine.run((tx) => tx.count())
}

/**
 * Read every record in the data file in file order; values stay sealed.
 */
export async function readDataRecords(
  paths: TestPaths
): Promise<DataRecord[]> {
  const data = new Uint8Array(await readFile(paths.dataPath))
  const records: DataRecord[] = []
  let offset = headerSize
  for (;;) {
    const result = deserializeDataRecord(data, offset)
    if (!result) {
      return records
    }
    records.push(result.record)
    offset += result.bytesRead
  }
}
