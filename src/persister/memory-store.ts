import invariant from 'tiny-invariant'
import { Mutex, type Transaction } from '../storage-engine'
import type { TransactionalStore } from './types'

export interface MemoryStoreFaults {
  /** Fail the nth store() call (0-based) made through this store */
  storeCall?: number
  /** Fail delete() for these keys */
  deleteKeys?: string[]
  /** Fail load() for these keys */
  loadKeys?: string[]
}

/**
 * TransactionalStore held in a Map, with optional injected faults. Used
 * where the file-backed engine is beside the point.
 */
export class MemoryStore implements TransactionalStore {
  readonly entries = new Map<string, Uint8Array>()
  readonly faults: MemoryStoreFaults
  transactions = 0
  private storeCalls = 0
  private readonly mutex = new Mutex()

  constructor(faults: MemoryStoreFaults = {}) {
    this.faults = faults
  }

  run<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      this.transactions++
      let active = true
      const check = (): void => {
        invariant(active, 'Transaction used after it completed')
      }

      const tx: Transaction = {
        has: async (key) => {
          check()
          return this.entries.has(key)
        },
        load: async (key) => {
          check()
          if (this.faults.loadKeys?.includes(key)) {
            throw new Error(`injected load failure for ${key}`)
          }
          return this.entries.get(key) ?? null
        },
        store: async (key, value) => {
          check()
          const call = this.storeCalls++
          if (call === this.faults.storeCall) {
            throw new Error(`injected store failure at call ${call}`)
          }
          this.entries.set(key, value)
        },
        delete: async (key) => {
          check()
          if (this.faults.deleteKeys?.includes(key)) {
            throw new Error(`injected delete failure for ${key}`)
          }
          return this.entries.delete(key)
        },
        keys: async () => {
          check()
          return [...this.entries.keys()]
        },
        count: async () => {
          check()
          return this.entries.size
        }
      }

      try {
        return await fn(tx)
      } finally {
        active = false
      }
    })
  }
}
