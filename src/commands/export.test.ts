import { describe, it, expect, afterEach } from 'vitest'
import { existsSync } from 'node:fs'

import { BatchWriteError, ingest, type TransactionalStore } from '../persister'
import { EncryptionKeyMismatchError } from '../storage-engine'
import {
  cleanup,
  createTestPaths,
  openEngine,
  testEncryptionKey,
  type TestPaths
} from '../storage-engine/integration/helpers'
import { exportStore } from './export'
import { generateKey } from './newkey'
import { describeWal } from './wal'

describe('CLI commands', () => {
  const testPathsList: TestPaths[] = []

  afterEach(async () => {
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function seeded(body: string): Promise<TestPaths> {
    const paths = createTestPaths('commands')
    testPathsList.push(paths)
    const engine = await openEngine(paths)
    await ingest(engine, body)
    await engine.close()
    return paths
  }

  describe('exportStore', () => {
    it('should write every pair and release the lock', async () => {
      const paths = await seeded('{"a":"QQ=="}{"b":"Qg=="}')
      const lines: string[] = []

      const count = await exportStore(
        { dbPath: paths.dataPath, encryptionKey: testEncryptionKey },
        {
          write: async (line) => {
            lines.push(line)
          }
        }
      )

      expect(count).toBe(2)
      expect(lines).toEqual(['{"a":"QQ=="}\n', '{"b":"Qg=="}\n'])
      expect(existsSync(paths.lockPath)).toBe(false)
    })

    it('should not see a batch that is later rolled back', async () => {
      const paths = createTestPaths('commands-rollback')
      testPathsList.push(paths)
      const engine = await openEngine(paths)

      const lines: string[] = []
      const exports: Array<Promise<number>> = []
      let stores = 0

      // Starts an export halfway through the batch, then fails the batch
      const failing: TransactionalStore = {
        run: (fn) =>
          engine.run((tx) =>
            fn({
              ...tx,
              store: async (key, value) => {
                stores++
                if (stores === 2) {
                  exports.push(
                    exportStore(
                      {
                        dbPath: paths.dataPath,
                        encryptionKey: testEncryptionKey
                      },
                      {
                        write: async (line) => {
                          lines.push(line)
                        }
                      }
                    )
                  )
                  throw new Error('disk full')
                }
                await tx.store(key, value)
              }
            })
          )
      }

      await expect(
        ingest(failing, '{"a":"QQ=="}{"b":"Qg=="}')
      ).rejects.toBeInstanceOf(BatchWriteError)

      expect(await Promise.all(exports)).toEqual([0])
      expect(lines).toEqual([])
      await engine.close()
    })

    it('should refuse a store written under another key', async () => {
      const paths = await seeded('{"a":"QQ=="}')

      await expect(
        exportStore(
          { dbPath: paths.dataPath, encryptionKey: 'other-test-secret' },
          { write: async () => undefined }
        )
      ).rejects.toBeInstanceOf(EncryptionKeyMismatchError)
    })
  })

  describe('describeWal', () => {
    it('should list one entry per persisted pair', async () => {
      const paths = await seeded('{"a":"QQ==","b":"Qg=="}')

      const lines = await describeWal(paths.dataPath)

      expect(lines.filter((line) => line.endsWith('INSERT'))).toEqual([
        '[0] INSERT',
        '[1] INSERT'
      ])
      expect(lines.at(-1)).toBe('Total: 2 entries')
    })

    it('should report an empty log', async () => {
      const paths = createTestPaths('commands-empty')
      testPathsList.push(paths)

      expect(await describeWal(paths.dataPath)).toEqual(['WAL is empty'])
    })
  })

  describe('generateKey', () => {
    it('should encode 32 random bytes', () => {
      const key = generateKey()

      expect(Buffer.from(key, 'base64')).toHaveLength(32)
      expect(generateKey()).not.toBe(key)
    })
  })
})
