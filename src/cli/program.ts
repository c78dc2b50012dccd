import { Command, Option } from 'commander'
import { addCommand } from './commands/add.js'
import { searchCommand } from './commands/search.js'
import { configure } from './commands/setup.js'
import { addCommandInteractive, listCommands, removeCommandByName, resetCommands } from './commands/prompts.js'
import { runPromptCommand } from './commands/run.js'
import { startInteractive } from './commands/ask.js'
import { exitWithError, UsageError } from './errors.js'

export const VERSION = '0.1.0'

export interface ProgramOptions {
  set?: string
  ls?: boolean
  add?: boolean
  rm?: string
  reset?: boolean
  yes?: boolean
  stream: boolean
  debug?: boolean
}

const MANAGEMENT_FLAGS = ['set', 'ls', 'add', 'rm', 'reset']

function exclusive(option: Option): Option {
  const name = option.attributeName()
  return option.conflicts(MANAGEMENT_FLAGS.filter(flag => flag !== name))
}

const EXAMPLES = `
Examples:
  xa --set openai                     Configure an OpenAI-compatible API
  xa --ls                             List all commands
  xa --add                            Add a new command
  xa --rm summarize                   Remove the 'summarize' command
  xa translate "Hello"                Translate text
  xa trans "Hello" ja                 Prefix match, with the target language
  xa polish "A draft text" --no-stream
  xa ask                              Start an interactive conversation
  xa add sk-example "gitcode api token"
  xa search gitcode token`

/**
 * Dispatch the root invocation: a management flag, the ask loop,
 * or a prompt command.
 */
export async function runRoot(
  program: Command,
  command: string | undefined,
  input: string | undefined,
  args: string[],
  options: ProgramOptions
): Promise<void> {
  if (options.set !== undefined) return configure(options.set).then(() => undefined)
  if (options.ls) return listCommands()
  if (options.add) return addCommandInteractive()
  if (options.rm !== undefined) return removeCommandByName(options.rm)
  if (options.reset) return resetCommands(options.yes === true)

  if (command === undefined) {
    program.outputHelp()
    return
  }

  if (command === 'ask' && input === undefined) {
    return startInteractive()
  }

  if (input === undefined) {
    throw new UsageError(`No input provided for command '${command}'`)
  }

  await runPromptCommand(command, input, args, { stream: options.stream, debug: options.debug })
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('xa')
    .description('Execute Anything via LLM - a CLI tool for arbitrary text processing using LLMs')
    .version(VERSION)
    .addOption(exclusive(new Option('-s, --set <type>', 'Configure API settings (e.g. xa --set openai)')))
    .addOption(exclusive(new Option('-l, --ls', 'List all commands')))
    .addOption(exclusive(new Option('-a, --add', 'Add a new command/prompt')))
    .addOption(exclusive(new Option('-r, --rm <name>', 'Remove a command/prompt')))
    .addOption(exclusive(new Option('--reset', 'Restore the default commands')))
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('--no-stream', 'Disable streaming mode')
    .option('-d, --debug', 'Print the filled prompt before sending it')
    .argument('[command]', 'Command name (e.g. translate, polish)')
    .argument('[input]', 'Input text to process')
    .argument('[args...]', 'Values for the command\'s arguments, in order')
    .addHelpText('after', EXAMPLES)
    .action(async (command: string | undefined, input: string | undefined, args: string[], options: ProgramOptions) => {
      try {
        await runRoot(program, command, input, args, options)
      } catch (error) {
        exitWithError(error)
      }
    })

  program.addCommand(addCommand)
  program.addCommand(searchCommand)

  return program
}
