/**
 * Add Secret Command
 *
 * `xa add <secret> <note...>`: store a secret; the model proposes a tag
 * from the note. The secret value never reaches the model and is never
 * echoed back.
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { openSecretStore } from '../context.js'
import { Spinner } from '../ui/spinner.js'
import { exitWithError } from '../errors.js'

export const addCommand = new Command('add')
  .description('Store a secret under a tag generated from its note')
  .argument('<secret>', 'Secret value')
  .argument('<note...>', 'Description used for tagging and search')
  .action(async (secret: string, note: string[]) => {
    try {
      const store = await openSecretStore()
      const entry = await new Spinner().wrap('Generating tag...', () => store.add(secret, note.join(' ')))

      console.log(chalk.green(`Added secret with tag: ${entry.tag}`))
    } catch (error) {
      exitWithError(error)
    }
  })
