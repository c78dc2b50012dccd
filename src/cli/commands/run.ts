/**
 * Run a prompt command
 *
 * `xa <command> <input> [args...]`: resolve the command, fill its
 * template, send it to the model, copy and print the answer.
 */

import chalk from 'chalk'
import { getConfigDir, loadConfig, requireApiKey, ConfigSchema } from '../../config/index.js'
import { findCommand, fillTemplate, loadPrompts, preprocessCommand } from '../../prompts/index.js'
import { LLMClient, OpenAICompatibleClient } from '../../llm/client.js'
import { renderResult, tryCopyToClipboard } from '../../output/index.js'
import { Spinner } from '../ui/spinner.js'
import { CommandNotFoundError } from '../errors.js'

export interface RunOptions {
  stream: boolean
  debug?: boolean
}

/**
 * Collaborators a run needs; tests replace the network and clipboard.
 */
export interface RunDeps {
  dir?: string
  createClient?: (config: ConfigSchema) => LLMClient
  copy?: (text: string) => Promise<boolean>
}

export interface PreparedPrompt {
  command: string
  prompt: string
}

export function createClient(config: ConfigSchema): LLMClient {
  return new OpenAICompatibleClient(config)
}

/**
 * Resolve a command and fill its template.
 *
 * @throws CommandNotFoundError if nothing matches
 */
export async function preparePrompt(
  command: string,
  input: string,
  args: string[],
  dir: string = getConfigDir()
): Promise<PreparedPrompt> {
  const { prompts } = await loadPrompts(dir)

  const name = findCommand(command, Object.keys(prompts))
  if (name === undefined) {
    throw new CommandNotFoundError(command)
  }
  if (name !== command) {
    console.error(chalk.dim(`Using command '${name}'`))
  }

  const entry = prompts[name]
  const prepared = preprocessCommand(name, input, args)

  return {
    command: name,
    prompt: fillTemplate(entry.template, prepared.input, prepared.args, entry.args)
  }
}

/**
 * Send a prompt and present the answer: streamed straight to the
 * terminal, or behind a spinner and printed at the end.
 */
export async function sendPrompt(
  client: LLMClient,
  prompt: string,
  stream: boolean
): Promise<{ result: string; elapsedMs: number }> {
  const started = Date.now()

  const result = stream
    ? await client.complete(prompt, true)
    : await new Spinner().wrap('Processing...', () => client.complete(prompt, false))

  if (stream) {
    process.stdout.write('\n')
  }

  return { result, elapsedMs: Date.now() - started }
}

/**
 * @returns the model's answer
 * @throws MissingApiKeyError if no API key is configured
 * @throws CommandNotFoundError if the command cannot be resolved
 * @throws LLMRequestError if the request fails
 */
export async function runPromptCommand(
  command: string,
  input: string,
  args: string[],
  options: RunOptions,
  deps: RunDeps = {}
): Promise<string> {
  const dir = deps.dir ?? getConfigDir()

  const config = await loadConfig(dir)
  requireApiKey(config)

  const { prompt } = await preparePrompt(command, input, args, dir)

  if (options.debug) {
    console.error(chalk.dim(`--- prompt ---\n${prompt}\n--------------`))
  }

  const client = (deps.createClient ?? createClient)(config)
  const { result, elapsedMs } = await sendPrompt(client, prompt, options.stream)

  const copied = await (deps.copy ?? tryCopyToClipboard)(result)
  renderResult(result, { streamed: options.stream, footer: true, copied, elapsedMs })

  return result
}
