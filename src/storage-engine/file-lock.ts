import { mkdir, open, readFile, rm } from 'node:fs/promises'
import { dirname } from 'node:path'

const defaultLockTimeout = 10_000
const retryInterval = 50

/**
 * Exclusive lock file that keeps two processes from writing the same
 * database at once.
 *
 * The lock file is created with O_CREAT | O_EXCL and holds the owner's PID.
 * A lock left behind by a process that no longer exists is removed.
 */
export class FileLock {
  private locked = false
  private readonly filePath: string
  private readonly timeoutMs: number

  constructor(filePath: string, timeoutMs: number = defaultLockTimeout) {
    this.filePath = filePath
    this.timeoutMs = timeoutMs
  }

  /**
   * Acquire the lock, retrying for up to timeoutMs before throwing
   * DatabaseLockedError.
   */
  async acquire(): Promise<void> {
    if (this.locked) {
      throw new Error('Lock already acquired')
    }

    await mkdir(dirname(this.filePath), { recursive: true })

    const startTime = Date.now()

    for (;;) {
      try {
        const fileHandle = await open(this.filePath, 'wx')
        try {
          await fileHandle.write(`${process.pid}\n`)
        } finally {
          await fileHandle.close()
        }

        this.locked = true
        return
      } catch (error) {
        if (!isErrnoException(error)) {
          throw error
        }

        if (error.code === 'EACCES' || error.code === 'EROFS') {
          throw new LockPermissionError(this.filePath, error)
        }

        if (error.code !== 'EEXIST') {
          throw error
        }

        if (await this.removeIfStale()) {
          continue
        }

        if (Date.now() - startTime >= this.timeoutMs) {
          throw new DatabaseLockedError(
            `Database is locked by another process (timeout after ${this.timeoutMs}ms): ${this.filePath}`
          )
        }

        await sleep(retryInterval)
      }
    }
  }

  /**
   * Release the lock by deleting the lock file.
   */
  async release(): Promise<void> {
    if (!this.locked) {
      return
    }

    try {
      await rm(this.filePath, { force: true })
    } finally {
      this.locked = false
    }
  }

  private async removeIfStale(): Promise<boolean> {
    const contents = await readFile(this.filePath, 'utf8').catch(() => null)
    if (contents === null) {
      // Released between our open and read
      return true
    }

    const pid = Number.parseInt(contents.trim(), 10)
    if (!Number.isInteger(pid) || pid <= 0 || isProcessAlive(pid)) {
      return false
    }

    await rm(this.filePath, { force: true })
    return true
  }
}

/**
 * Error thrown when the database is locked by another process for longer
 * than the lock timeout.
 */
export class DatabaseLockedError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DatabaseLockedError'
  }
}

/**
 * Error thrown when attempting to write to a database opened in read-only mode.
 */
export class ReadOnlyError extends Error {
  constructor(message: string = 'Cannot write to a read-only database') {
    super(message)
    this.name = 'ReadOnlyError'
  }
}

/**
 * Error thrown when the lock file cannot be created due to permission issues,
 * typically on a read-only filesystem. Open the store read-only to export
 * from such a location.
 */
export class LockPermissionError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly originalError?: Error
  ) {
    super(`Permission denied when creating lock file: ${lockPath}`, {
      cause: originalError
    })
    this.name = 'LockPermissionError'
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM'
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
