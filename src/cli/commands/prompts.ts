/**
 * Prompt Commands
 *
 * `--ls`, `--add`, `--rm <name>` and `--reset`: manage the user-defined
 * commands kept in prompts.json.
 */

import inquirer from 'inquirer'
import chalk from 'chalk'
import { getConfigDir, PromptArg, PromptEntry } from '../../config/index.js'
import {
  addPrompt,
  getPromptsPath,
  listPrompts,
  loadPrompts,
  removePrompt,
  resetPrompts
} from '../../prompts/index.js'
import { UsageError } from '../errors.js'

const BUILT_IN_FLAGS: Array<[string, string]> = [
  ['--set openai', 'Configure API settings'],
  ['--ls', 'List all commands (this command)'],
  ['--add', 'Add a new command/prompt'],
  ['--rm <name>', 'Remove a command/prompt'],
  ['--reset', 'Restore the default commands'],
  ['add <secret> <note...>', 'Store a secret under a generated tag'],
  ['search <query...>', 'Find a stored secret by description']
]

/**
 * Format a command for listing, with its declared arguments.
 */
export function describeCommand(name: string, entry: PromptEntry): string[] {
  const lines = [`  ${chalk.cyan(name)}: ${entry.description ?? 'Custom prompt command'}`]
  for (const arg of entry.args ?? []) {
    const detail = arg.description ? ` ${chalk.gray(`- ${arg.description}`)}` : ''
    lines.push(`      ${arg.name}=${arg.default_value}${detail}`)
  }
  return lines
}

export async function listCommands(dir: string = getConfigDir()): Promise<void> {
  const config = await loadPrompts(dir)

  console.log(chalk.bold('Built-in commands:'))
  for (const [flag, description] of BUILT_IN_FLAGS) {
    console.log(`  ${chalk.cyan(flag)}: ${description}`)
  }

  console.log('')
  console.log(chalk.bold('User-defined commands:'))
  for (const [name, entry] of listPrompts(config)) {
    for (const line of describeCommand(name, entry)) {
      console.log(line)
    }
  }

  console.log('')
  console.log(chalk.gray(`Prompt file: ${getPromptsPath(dir)}`))
}

type CommandAnswers = {
  name: string
  template: string
  description: string
}

type ArgumentAnswers = {
  name: string
  defaultValue: string
  description: string
}

type ConfirmAnswers = {
  confirm: boolean
}

async function confirm(message: string, defaultValue: boolean): Promise<boolean> {
  const answers = await inquirer.prompt<ConfirmAnswers>([
    { type: 'confirm', name: 'confirm', message, default: defaultValue }
  ])
  return answers.confirm
}

/**
 * Build a prompt entry from the interactive answers.
 */
export function buildEntry(answers: CommandAnswers, args: PromptArg[]): PromptEntry {
  const entry: PromptEntry = { template: answers.template.trim() }
  const description = answers.description.trim()
  if (description !== '') entry.description = description
  if (args.length > 0) entry.args = args
  return entry
}

async function askArguments(): Promise<PromptArg[]> {
  const args: PromptArg[] = []

  while (await confirm(args.length === 0 ? 'Declare a named argument?' : 'Declare another argument?', false)) {
    const answers = await inquirer.prompt<ArgumentAnswers>([
      {
        type: 'input',
        name: 'name',
        message: 'Argument name (used as {name} in the template):',
        validate: (input: string) => /^\w+$/.test(input.trim()) || 'Use letters, digits and underscores only'
      },
      { type: 'input', name: 'defaultValue', message: 'Default value:' },
      { type: 'input', name: 'description', message: 'Description (optional):' }
    ])

    const arg: PromptArg = { name: answers.name.trim(), default_value: answers.defaultValue }
    if (answers.description.trim() !== '') arg.description = answers.description.trim()
    args.push(arg)
  }

  return args
}

export async function addCommandInteractive(dir: string = getConfigDir()): Promise<void> {
  console.log(chalk.cyan('Adding a new command...'))

  const existing = await loadPrompts(dir)

  const answers = await inquirer.prompt<CommandAnswers>([
    {
      type: 'input',
      name: 'name',
      message: 'Command name:',
      validate: (input: string) => {
        if (input.trim() === '') return 'Command name cannot be empty'
        if (/\s/.test(input.trim())) return 'Command name cannot contain spaces'
        return true
      }
    },
    {
      type: 'input',
      name: 'template',
      message: 'Prompt template (use {input} as placeholder):',
      validate: (input: string) => input.trim() !== '' || 'Prompt template cannot be empty'
    },
    { type: 'input', name: 'description', message: 'Description (optional):' }
  ])

  const name = answers.name.trim()
  if (name in existing.prompts) {
    console.warn(chalk.yellow(`Warning: Command '${name}' already exists. It will be overwritten.`))
  }
  if (!answers.template.includes('{input}')) {
    console.warn(chalk.yellow('Warning: the template has no {input} placeholder; the input text will not be sent.'))
  }

  const args = await askArguments()
  await addPrompt(name, buildEntry(answers, args), dir)

  console.log(chalk.green(`Command '${name}' added successfully!`))
  console.log(chalk.gray(`Prompt file location: ${getPromptsPath(dir)}`))
  console.log(chalk.gray('You can edit this file with your favorite text editor to modify or add more commands.'))
}

/**
 * @throws UsageError listing the available commands if `name` is unknown
 */
export async function removeCommandByName(name: string, dir: string = getConfigDir()): Promise<void> {
  if (!(await removePrompt(name, dir))) {
    const { prompts } = await loadPrompts(dir)
    const available = Object.keys(prompts).sort().join(', ')
    throw new UsageError(`Command '${name}' does not exist. Available commands: ${available}`)
  }

  console.log(chalk.green(`Command '${name}' removed successfully!`))
}

export async function resetCommands(skipConfirm: boolean, dir: string = getConfigDir()): Promise<void> {
  if (!skipConfirm && !(await confirm('Replace all commands with the defaults?', false))) {
    console.log(chalk.gray('Cancelled.'))
    return
  }

  const config = await resetPrompts(dir)
  console.log(chalk.green(`Restored ${Object.keys(config.prompts).length} default commands.`))
}
