/**
 * Async mutex serializing store transactions within one process.
 *
 * Waiters are served FIFO, in the order they called acquire().
 */
export class Mutex {
  private locked = false
  private waiting: Array<() => void> = []

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve)
    })
  }

  /**
   * Release the mutex. If there are waiters, the next one acquires.
   */
  release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }

  /**
   * Run `fn` while holding the mutex, releasing it however `fn` settles.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
