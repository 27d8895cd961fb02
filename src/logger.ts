import pino, { type LevelWithSilent, type Logger } from 'pino'

export type { Logger }

export const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const satisfies readonly LevelWithSilent[]

export interface LoggerOptions {
  level?: LevelWithSilent
  /** Destination stream; stdout when omitted */
  destination?: pino.DestinationStream
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  return options.destination
    ? pino({ level }, options.destination)
    : pino({ level })
}

/** Logger that discards everything, for tests and library callers */
export const silentLogger: Logger = pino({ level: 'silent' })
