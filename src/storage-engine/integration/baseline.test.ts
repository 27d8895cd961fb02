/**
 * Baseline integration tests for StorageEngine.
 * Tests basic store/load/delete operations with real files.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { StorageEngine } from '../storage-engine'
import { headerSize } from '../constants'
import {
  createTestPaths,
  cleanup,
  openEngine,
  bytes,
  text,
  put,
  remove,
  get,
  has,
  keysOf,
  countOf,
  type TestPaths
} from './helpers'

describe('StorageEngine baseline', () => {
  const testPathsList: TestPaths[] = []

  afterEach(async () => {
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  it('should store and load a single value', async () => {
    const paths = createTestPaths('baseline-store')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    await put(engine, 'doc1', bytes('hello'))

    expect(text(await get(engine, 'doc1'))).toBe('hello')
    expect(await has(engine, 'doc1')).toBe(true)
    expect(await countOf(engine)).toBe(1)

    await engine.close()
  })

  it('should create data and WAL files on first write', async () => {
    const paths = createTestPaths('baseline-files')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    expect(existsSync(paths.dataPath)).toBe(false)

    await put(engine, 'doc1', bytes('hello'))

    expect(existsSync(paths.dataPath)).toBe(true)
    expect(existsSync(paths.walPath)).toBe(true)
    expect(existsSync(paths.lockPath)).toBe(false)

    await engine.close()
  })

  it('should return null for a missing key', async () => {
    const paths = createTestPaths('baseline-missing')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    expect(await get(engine, 'nope')).toBeNull()
    expect(await has(engine, 'nope')).toBe(false)

    await engine.close()
  })

  it('should delete a value', async () => {
    const paths = createTestPaths('baseline-delete')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    await put(engine, 'doc1', bytes('hello'))

    expect(await remove(engine, 'doc1')).toBe(true)
    expect(await has(engine, 'doc1')).toBe(false)
    expect(await countOf(engine)).toBe(0)
    expect(await remove(engine, 'doc1')).toBe(false)

    await engine.close()
  })

  it('should keep keys in insertion order', async () => {
    const paths = createTestPaths('baseline-order')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    for (const key of ['c', 'a', 'b']) {
      await put(engine, key, bytes(key))
    }

    expect(await keysOf(engine)).toEqual(['c', 'a', 'b'])

    await engine.close()
  })

  it('should store empty and binary values', async () => {
    const paths = createTestPaths('baseline-binary')
    testPathsList.push(paths)

    const binary = new Uint8Array(256)
    for (let i = 0; i < binary.length; i++) {
      binary[i] = i
    }

    const engine = await openEngine(paths)
    await put(engine, 'empty', new Uint8Array(0))
    await put(engine, 'binary', binary)

    expect(new Uint8Array((await get(engine, 'empty')) ?? [1])).toEqual(
      new Uint8Array(0)
    )
    expect(new Uint8Array((await get(engine, 'binary')) ?? [])).toEqual(binary)

    await engine.close()
  })

  it('should persist values across reopen', async () => {
    const paths = createTestPaths('baseline-reopen')
    testPathsList.push(paths)

    const engine1 = await openEngine(paths)
    await put(engine1, 'doc1', bytes('one'))
    await put(engine1, 'doc2', bytes('two'))
    await remove(engine1, 'doc1')
    await engine1.close()

    const engine2 = await openEngine(paths)
    expect(await countOf(engine2)).toBe(1)
    expect(await has(engine2, 'doc1')).toBe(false)
    expect(text(await get(engine2, 'doc2'))).toBe('two')

    await engine2.close()
  })

  it('should treat an existing empty data file as a fresh database', async () => {
    const paths = createTestPaths('baseline-empty-file')
    testPathsList.push(paths)
    await writeFile(paths.dataPath, new Uint8Array(0))

    const engine = await openEngine(paths)
    expect(await countOf(engine)).toBe(0)
    await put(engine, 'doc1', bytes('hello'))
    expect(text(await get(engine, 'doc1'))).toBe('hello')

    await engine.close()

    const data = await readFile(paths.dataPath)
    expect(data.length).toBeGreaterThan(headerSize)
  })

  it('should replace the extension of the configured path', () => {
    expect(StorageEngine.resolvePaths('/var/lib/persister.db')).toEqual({
      dataPath: '/var/lib/persister.db',
      walPath: '/var/lib/persister.db-wal',
      lockPath: '/var/lib/persister.db.lock'
    })
    expect(StorageEngine.resolvePaths('./data/store.bin').dataPath).toBe(
      './data/store.db'
    )
    expect(StorageEngine.resolvePaths('./data/store').walPath).toBe(
      './data/store.db-wal'
    )
  })

  it('should reject writes after close', async () => {
    const paths = createTestPaths('baseline-closed')
    testPathsList.push(paths)

    const engine = await openEngine(paths)
    await engine.close()

    await expect(put(engine, 'doc1', bytes('x'))).rejects.toThrow(
      'Storage engine is closed'
    )
  })
})
