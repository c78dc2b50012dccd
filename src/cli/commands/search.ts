/**
 * Search Secret Command
 *
 * `xa search <query...>`: ask the model which stored entry matches the
 * query and print its secret. `--list` shows the entries with their
 * secrets masked.
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { openSecretStore } from '../context.js'
import { Spinner } from '../ui/spinner.js'
import { exitWithError, UsageError } from '../errors.js'

export const NOT_FOUND_MESSAGE = 'No matching secret found.'

interface SearchOptions {
  list?: boolean
}

export const searchCommand = new Command('search')
  .description('Find a stored secret by describing it')
  .argument('[query...]', 'What the secret is for')
  .option('--list', 'List stored entries (secrets masked)')
  .action(async (query: string[], options: SearchOptions) => {
    try {
      const store = await openSecretStore(undefined, !options.list)

      if (options.list) {
        const entries = await store.list()
        if (entries.length === 0) {
          console.log(chalk.yellow('No secrets stored.'))
          console.log(chalk.gray('Use "xa add <secret> <note...>" to add one.'))
          return
        }
        for (const entry of entries) {
          console.log(`  ${chalk.cyan(entry.tag)} ${chalk.gray(`(${entry.created_at})`)}`)
          console.log(`    ${entry.note}`)
        }
        console.log('')
        console.log(chalk.gray(`Total: ${entries.length} secret${entries.length === 1 ? '' : 's'}`))
        return
      }

      if (query.length === 0) {
        throw new UsageError('No query provided. Usage: xa search <query...>')
      }

      const result = await new Spinner().wrap('Searching...', () => store.search(query.join(' ')))
      if (result.found) {
        console.log(result.entry.secret)
      } else {
        console.log(NOT_FOUND_MESSAGE)
      }
    } catch (error) {
      exitWithError(error)
    }
  })
