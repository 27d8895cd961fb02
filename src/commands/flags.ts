import { defaults } from '../config'

export const sharedFlags = {
  db: {
    type: String,
    description: 'Persistence file of the key-value store',
    default: defaults.dbPath
  }
}

export const keyFlags = {
  encryptionKeyEnv: {
    type: String,
    description:
      'Environment variable holding the key used to encrypt stored values',
    default: defaults.encryptionKeyEnv
  }
}
