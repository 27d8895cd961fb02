import { createLogger } from '../logger'

/**
 * Settle a command's work into an exit code, logging the error that ended
 * it, if any.
 */
export function runCommand(task: () => Promise<void>): void {
  task().then(
    () => {
      process.exitCode = 0
    },
    (error: unknown) => {
      createLogger().error({ err: error }, describe(error))
      process.exitCode = 1
    }
  )
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
