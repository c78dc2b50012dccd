import chalk from 'chalk'
import { errorMessage } from '../config/index.js'

/**
 * Error thrown when the arguments given cannot be acted on.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Error thrown when no known command matches what was typed.
 */
export class CommandNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`Command '${command}' not found. Use 'xa --ls' to see available commands.`)
    this.name = 'CommandNotFoundError'
  }
}

/**
 * Print an error on stderr and terminate with a non-zero status.
 */
export function exitWithError(error: unknown): never {
  console.error(chalk.red(`Error: ${errorMessage(error)}`))
  process.exit(1)
}
