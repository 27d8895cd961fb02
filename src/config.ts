/**
 * Service configuration: defaults, validation and environment lookup.
 */

import { z } from 'zod'
import { logLevels } from './logger'

export const defaults = {
  protocol: 'tcp4',
  address: ':11185',
  dbPath: 'persister.db',
  encryptionKeyEnv: 'PERSISTER_ENCRYPTION_KEY',
  /** Used when the key environment variable is unset or blank */
  encryptionKey: 'persister-built-in-default-key',
  logLevel: 'info',
  timeoutMs: 5 * 60 * 1000,
  lockTimeoutMs: 10_000
} as const

export const protocols = ['tcp', 'tcp4', 'tcp6'] as const
export type Protocol = (typeof protocols)[number]

export const serveConfigSchema = z.object({
  protocol: z.enum(protocols).default(defaults.protocol),
  address: z.string().default(defaults.address),
  dbPath: z
    .string()
    .min(1, 'database path must not be empty')
    .default(defaults.dbPath),
  encryptionKeyEnv: z
    .string()
    .min(1, 'encryption key variable must not be empty')
    .default(defaults.encryptionKeyEnv),
  logLevel: z.enum(logLevels).default(defaults.logLevel),
  requestTimeoutMs: z.number().int().nonnegative().default(defaults.timeoutMs),
  headersTimeoutMs: z.number().int().nonnegative().default(defaults.timeoutMs),
  keepAliveTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(defaults.timeoutMs),
  lockTimeoutMs: z.number().int().nonnegative().default(defaults.lockTimeoutMs)
})

export type ServeConfig = z.output<typeof serveConfigSchema>

/** Unvalidated settings, as they come from flags or callers */
export type RawServeConfig = Partial<Record<keyof ServeConfig, unknown>>

export interface ResolvedKey {
  key: string
  /** True when the built-in default had to be used */
  isDefault: boolean
}

export type Env = Record<string, string | undefined>

/**
 * Validate raw settings, filling in defaults. `LOG_LEVEL` from `env`
 * applies when no level is given.
 */
export function loadConfig(
  input: RawServeConfig = {},
  env: Env = process.env
): ServeConfig {
  return serveConfigSchema.parse({
    ...input,
    logLevel: input.logLevel ?? emptyToUndefined(env.LOG_LEVEL)
  })
}

/**
 * Read the encryption key from the configured variable, trimmed.
 */
export function resolveEncryptionKey(
  config: Pick<ServeConfig, 'encryptionKeyEnv'>,
  env: Env = process.env
): ResolvedKey {
  const key = env[config.encryptionKeyEnv]?.trim() ?? ''
  return key === ''
    ? { key: defaults.encryptionKey, isDefault: true }
    : { key, isDefault: false }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed === '' ? undefined : trimmed
}
