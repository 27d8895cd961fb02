#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { z } from 'zod'
import { exportCmd } from './commands/export'
import { newKeyCmd } from './commands/newkey'
import { runCommand } from './commands/run-command'
import { serve, serveFlags } from './commands/serve'
import { walCmd } from './commands/wal'

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8')))

const argv = cli({
  name: 'persister',
  version: packageJson.version,
  flags: serveFlags,
  commands: [exportCmd, walCmd, newKeyCmd],
  help: {
    description:
      'Serve an append-only store of base64 encoded key-value pairs over HTTP',
    examples: [
      'persister',
      'persister --protocol tcp6 --addr [::1]:11185 --db ./pairs.db',
      'PERSISTER_ENCRYPTION_KEY="$(persister newkey)" persister'
    ]
  }
})

if (argv.command === undefined) {
  runCommand(() => serve(argv.flags))
}
