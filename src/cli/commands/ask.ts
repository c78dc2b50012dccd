/**
 * Interactive ask loop
 *
 * `xa ask` with no input opens a conversation: each line is sent with
 * the turns so far, the reply streams to the terminal and is copied to
 * the clipboard. `clear` forgets the history, `history` shows it,
 * `exit` or `quit` leaves. Nothing is written to disk.
 */

import { createInterface } from 'readline'
import chalk from 'chalk'
import { getConfigDir, errorMessage } from '../../config/index.js'
import { loadPrompts } from '../../prompts/index.js'
import { LLMClient } from '../../llm/client.js'
import { tryCopyToClipboard } from '../../output/index.js'
import { ConversationManager } from '../conversation.js'
import { loadClient } from '../context.js'

const FALLBACK_SYSTEM_PROMPT = 'You are a helpful assistant called xa, execute anything by your side.'

export type LineOutcome = 'exit' | 'continue'

export interface AskDeps {
  copy?: (text: string) => Promise<boolean>
}

/**
 * The `ask` template without its `{input}` placeholder serves as the
 * system prompt of the conversation.
 */
export function systemPromptFrom(template: string | undefined): string {
  const prompt = (template ?? '').replaceAll('{input}', '').trim()
  return prompt === '' ? FALLBACK_SYSTEM_PROMPT : prompt
}

function printHistory(conversation: ConversationManager): void {
  const history = conversation.getHistory()
  if (history.length === 0) {
    console.log(chalk.gray('(no history yet)'))
    return
  }
  for (const message of history) {
    const who = message.role === 'user' ? chalk.cyan('you') : chalk.green('xa')
    console.log(`${who}: ${message.content}`)
  }
}

/**
 * Handle one line typed in the loop.
 * A failed request is reported and its turn dropped; the loop goes on.
 */
export async function handleAskLine(
  line: string,
  conversation: ConversationManager,
  client: LLMClient,
  deps: AskDeps = {}
): Promise<LineOutcome> {
  const input = line.trim()
  if (input === '') return 'continue'

  switch (input.toLowerCase()) {
    case 'exit':
    case 'quit':
      console.log('Goodbye!')
      return 'exit'
    case 'clear':
      conversation.clear()
      console.log(chalk.gray('History cleared.'))
      return 'continue'
    case 'history':
      printHistory(conversation)
      return 'continue'
  }

  conversation.addUser(input)

  let reply: string
  try {
    reply = await client.chat(conversation.getMessages(), true)
  } catch (error: unknown) {
    conversation.discardLastUser()
    console.error(chalk.red(`\nError: ${errorMessage(error)}`))
    return 'continue'
  }

  conversation.addAssistant(reply)
  process.stdout.write('\n')
  await (deps.copy ?? tryCopyToClipboard)(reply)
  console.log('')

  return 'continue'
}

export interface LoopIO {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  terminal?: boolean
  /** Runs on Ctrl+C after the interface is closed; exits the process by default */
  onInterrupt?: () => void
}

function exitOnInterrupt(): void {
  process.stdout.write('\n')
  process.exit(130)
}

/**
 * Read lines until `exit`, end of input or Ctrl+C. Ctrl+C is honoured
 * while a reply is still pending.
 */
export async function runAskLoop(
  conversation: ConversationManager,
  client: LLMClient,
  io: LoopIO = { input: process.stdin, output: process.stdout },
  deps: AskDeps = {}
): Promise<void> {
  const rl = createInterface({
    input: io.input,
    output: io.output,
    terminal: io.terminal ?? process.stdin.isTTY === true
  })

  let closed = false
  rl.on('close', () => {
    closed = true
  })
  rl.on('SIGINT', () => {
    const interrupt = io.onInterrupt ?? exitOnInterrupt
    rl.close()
    interrupt()
  })

  rl.setPrompt(chalk.cyan('> '))
  rl.prompt()

  try {
    for await (const line of rl) {
      if ((await handleAskLine(line, conversation, client, deps)) === 'exit') break
      if (closed) break
      rl.prompt()
    }
  } finally {
    rl.close()
  }
}

export async function startInteractive(dir: string = getConfigDir()): Promise<void> {
  const client = await loadClient(dir)
  const { prompts } = await loadPrompts(dir)
  const conversation = new ConversationManager(systemPromptFrom(prompts.ask?.template))

  console.log('Starting interactive mode. Type your message and press Enter.')
  console.log(chalk.gray("Type 'history' to view, 'clear' to reset, 'exit' or 'quit' to end, or press Ctrl+C.\n"))

  await runAskLoop(conversation, client)
}
