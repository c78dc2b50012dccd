/**
 * Interactive Ask Loop Tests
 */

import { PassThrough, Writable } from 'stream'
import chalk from 'chalk'
import { handleAskLine, runAskLoop, systemPromptFrom } from '../../../src/cli/commands/ask'
import { LLMClient } from '../../../src/llm/client'
import { ConversationManager } from '../../../src/cli/conversation'
import { getDefaultPrompts } from '../../../src/config/defaults'
import { StubLLM } from '../../helpers/llm'

describe('systemPromptFrom', () => {
  it('should strip the input placeholder from the ask template', () => {
    expect(systemPromptFrom(getDefaultPrompts().prompts.ask.template)).toBe(
      'You are a helpful assistant called xa, execute anything by your side.'
    )
  })

  it('should fall back when there is no usable template', () => {
    expect(systemPromptFrom(undefined)).toBe('You are a helpful assistant called xa, execute anything by your side.')
    expect(systemPromptFrom('{input}')).toBe('You are a helpful assistant called xa, execute anything by your side.')
  })

  it('should keep a custom template', () => {
    expect(systemPromptFrom('Answer like a pirate. {input}')).toBe('Answer like a pirate.')
  })
})

describe('handleAskLine', () => {
  let log: jest.SpyInstance
  let error: jest.SpyInstance
  let write: jest.SpyInstance
  let conversation: ConversationManager
  const copy = jest.fn(async (_text: string) => true)

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true)
    conversation = new ConversationManager('Be brief.')
    copy.mockClear()
  })

  afterEach(() => {
    log.mockRestore()
    error.mockRestore()
    write.mockRestore()
  })

  it.each(['exit', 'quit', '  QUIT  '])('should end the loop on %p', async line => {
    expect(await handleAskLine(line, conversation, new StubLLM(), { copy })).toBe('exit')
    expect(log).toHaveBeenCalledWith('Goodbye!')
  })

  it('should ignore blank lines', async () => {
    const llm = new StubLLM()

    expect(await handleAskLine('   ', conversation, llm, { copy })).toBe('continue')
    expect(llm.conversations).toEqual([])
  })

  it('should send the conversation so far and record the reply', async () => {
    const llm = new StubLLM('Paris.', 'About 2 million.')

    await handleAskLine('Capital of France?', conversation, llm, { copy })
    await handleAskLine('Population?', conversation, llm, { copy })

    expect(llm.conversations[1]).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Capital of France?' },
      { role: 'assistant', content: 'Paris.' },
      { role: 'user', content: 'Population?' }
    ])
    expect(conversation.getHistory()).toHaveLength(4)
    expect(copy).toHaveBeenLastCalledWith('About 2 million.')
  })

  it('should drop the turn of a failed request and keep going', async () => {
    const llm = new StubLLM(new Error('API request failed (429 Too Many Requests): slow down'))

    expect(await handleAskLine('Hello?', conversation, llm, { copy })).toBe('continue')
    expect(conversation.getHistory()).toEqual([])
    expect(error).toHaveBeenCalledWith('\nError: API request failed (429 Too Many Requests): slow down')
    expect(copy).not.toHaveBeenCalled()
  })

  it('should clear the history', async () => {
    conversation.addUser('old')

    expect(await handleAskLine('clear', conversation, new StubLLM(), { copy })).toBe('continue')
    expect(conversation.getHistory()).toEqual([])
    expect(log).toHaveBeenCalledWith('History cleared.')
  })

  it('should print the history', async () => {
    conversation.addUser('Hi')
    conversation.addAssistant('Hello!')

    await handleAskLine('history', conversation, new StubLLM(), { copy })

    expect(log.mock.calls).toEqual([['you: Hi'], ['xa: Hello!']])
  })
})

describe('runAskLoop', () => {
  let log: jest.SpyInstance
  let write: jest.SpyInstance
  const copy = async (_text: string) => true

  function sink(): Writable {
    return new Writable({ write: (_chunk, _encoding, done) => done() })
  }

  async function settle(): Promise<void> {
    for (let i = 0; i < 3; i++) {
      await new Promise(resolve => setImmediate(resolve))
    }
  }

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    log.mockRestore()
    write.mockRestore()
  })

  it('should stop at exit', async () => {
    const input = new PassThrough()
    const llm = new StubLLM('Hello there.')
    const conversation = new ConversationManager('s')

    const loop = runAskLoop(conversation, llm, { input, output: sink(), terminal: false }, { copy })
    input.write('hi\nexit\nnever sent\n')

    await loop
    expect(llm.prompts).toEqual(['hi'])
    expect(log).toHaveBeenCalledWith('Goodbye!')
  })

  it('should end with the input', async () => {
    const input = new PassThrough()
    const conversation = new ConversationManager('s')

    const loop = runAskLoop(conversation, new StubLLM('ok'), { input, output: sink(), terminal: false }, { copy })
    input.end('question\n')

    await loop
    expect(conversation.getHistory()).toEqual([
      { role: 'user', content: 'question' },
      { role: 'assistant', content: 'ok' }
    ])
  })

  it('should interrupt on Ctrl+C while a reply is pending', async () => {
    const input = new PassThrough()
    let release: (reply: string) => void = () => undefined
    const chat = jest.fn(() => new Promise<string>(resolve => { release = resolve }))
    const client: LLMClient = { complete: async () => '', chat }
    const onInterrupt = jest.fn()

    const loop = runAskLoop(new ConversationManager('s'), client, {
      input,
      output: sink(),
      terminal: true,
      onInterrupt
    }, { copy })

    input.write('hello\r')
    await settle()
    expect(chat).toHaveBeenCalledTimes(1)

    input.write('\x03')
    await settle()
    expect(onInterrupt).toHaveBeenCalledTimes(1)

    release('late reply')
    await loop
    expect(chat).toHaveBeenCalledTimes(1)
  })
})
