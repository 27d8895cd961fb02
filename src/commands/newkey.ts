import { randomBytes } from 'node:crypto'
import { command } from 'cleye'

export const newKeyLength = 32

export function generateKey(): string {
  return randomBytes(newKeyLength).toString('base64')
}

export const newKeyCmd = command(
  {
    name: 'newkey',
    help: {
      description: 'Print a new random encryption key, base64 encoded',
      examples: ['export PERSISTER_ENCRYPTION_KEY="$(persister newkey)"']
    }
  },
  () => {
    console.log(generateKey())
  }
)
