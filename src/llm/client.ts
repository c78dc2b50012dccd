/**
 * OpenAI-compatible Chat Client
 *
 * Talks to any endpoint implementing the Chat Completions API.
 * Uses fetch directly, no SDK dependency.
 *
 * When streaming, each content delta is written to the output as it
 * arrives and also accumulated, so callers always get the full text.
 */

import { TextDecoder } from 'util'
import { ConfigSchema } from '../config/schemas.js'
import { DEFAULT_MODEL } from '../config/defaults.js'
import { errorMessage } from '../config/errors.js'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

/**
 * What the rest of xa needs from a language model.
 */
export interface LLMClient {
  complete(prompt: string, stream: boolean): Promise<string>
  chat(messages: ChatMessage[], stream: boolean): Promise<string>
}

// Minimal shapes of fetch so tests can supply their own transport.
export interface HttpBodyReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>
}

export interface HttpResponse {
  ok: boolean
  status: number
  statusText: string
  body: { getReader(): HttpBodyReader } | null
  text(): Promise<string>
}

export type HttpFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body?: string }
) => Promise<HttpResponse>

export interface ClientOptions {
  fetch?: HttpFetch
  /** Receives streamed fragments (stdout by default) */
  output?: (chunk: string) => void
}

/**
 * Error thrown when the API answers with a non-success status or
 * cannot be reached.
 */
export class LLMRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'LLMRequestError'
    this.cause = cause
  }
}

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '')
}

export function buildChatUrl(baseUrl: string): string {
  return `${trimTrailingSlashes(baseUrl)}/chat/completions`
}

/**
 * Models endpoint for a base URL.
 * Bases that do not already end in /v1 get it appended.
 */
export function buildModelsUrl(baseUrl: string): string {
  if (baseUrl.endsWith('/v1')) return `${baseUrl}/models`
  if (baseUrl.endsWith('/v1/')) return `${baseUrl}models`
  return `${trimTrailingSlashes(baseUrl)}/v1/models`
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function firstChoice(data: unknown): Record<string, unknown> | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined
  const choice: unknown = data.choices[0]
  return isRecord(choice) ? choice : undefined
}

/**
 * Extract `choices[0].message.content` from a completion body.
 */
export function extractMessageContent(data: unknown): string {
  const message = firstChoice(data)?.message
  if (isRecord(message) && typeof message.content === 'string') {
    return message.content
  }
  return ''
}

/**
 * Extract `choices[0].delta.content` from a streamed chunk.
 */
export function extractDeltaContent(data: unknown): string {
  const delta = firstChoice(data)?.delta
  if (isRecord(delta) && typeof delta.content === 'string') {
    return delta.content
  }
  return ''
}

/**
 * Decode a server-sent-events body into content fragments.
 *
 * Lines can be split across chunks, so the trailing partial line is
 * carried into the next read. Lines that are not `data:` payloads or
 * do not parse are skipped; `data: [DONE]` ends the stream.
 */
export async function* readEventStream(reader: HttpBodyReader): AsyncGenerator<string> {
  const decoder = new TextDecoder()
  let buffer = ''

  for (;;) {
    const { done, value } = await reader.read()
    if (value) buffer += decoder.decode(value, { stream: true })
    if (done) buffer += decoder.decode()

    const lines = buffer.split('\n')
    buffer = done ? '' : lines.pop() ?? ''

    for (const rawLine of lines) {
      const line = rawLine.trim()
      if (!line.startsWith('data:')) continue

      const payload = line.slice('data:'.length).trim()
      if (payload === '[DONE]') return

      let parsed: unknown
      try {
        parsed = JSON.parse(payload)
      } catch {
        continue
      }

      const content = extractDeltaContent(parsed)
      if (content !== '') yield content
    }

    if (done) return
  }
}

async function send(
  fetchImpl: HttpFetch,
  url: string,
  init: Parameters<HttpFetch>[1]
): Promise<HttpResponse> {
  let response: HttpResponse
  try {
    response = await fetchImpl(url, init)
  } catch (error: unknown) {
    throw new LLMRequestError(`API request failed: ${errorMessage(error)}`, undefined, error)
  }

  if (!response.ok) {
    const errorBody = await response.text().catch(() => '')
    throw new LLMRequestError(
      `API request failed (${response.status} ${response.statusText}): ${errorBody}`,
      response.status
    )
  }

  return response
}

const BODY_EXCERPT_LENGTH = 200

/**
 * Parse a successful response body as JSON.
 *
 * @throws LLMRequestError quoting the start of the body when it is not JSON
 */
async function readJsonBody(response: HttpResponse): Promise<unknown> {
  const body = await response.text()
  try {
    return JSON.parse(body)
  } catch (error: unknown) {
    throw new LLMRequestError(
      `API returned an invalid response (${response.status} ${response.statusText}): ${body.slice(0, BODY_EXCERPT_LENGTH)}`,
      response.status,
      error
    )
  }
}

export class OpenAICompatibleClient implements LLMClient {
  private readonly fetchImpl: HttpFetch
  private readonly output: (chunk: string) => void

  constructor(private readonly config: ConfigSchema, options: ClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch
    this.output = options.output ?? (chunk => { process.stdout.write(chunk) })
  }

  get model(): string {
    return this.config.default_model || DEFAULT_MODEL
  }

  async complete(prompt: string, stream: boolean): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], stream)
  }

  async chat(messages: ChatMessage[], stream: boolean): Promise<string> {
    const response = await send(this.fetchImpl, buildChatUrl(this.config.base_url), {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.api_key}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({ model: this.model, messages, stream })
    })

    if (!stream) {
      return extractMessageContent(await readJsonBody(response))
    }

    if (!response.body) {
      throw new LLMRequestError('API returned an empty stream')
    }

    let full = ''
    for await (const fragment of readEventStream(response.body.getReader())) {
      this.output(fragment)
      full += fragment
    }
    return full
  }
}

/**
 * List the model ids an endpoint offers. Used to validate a key
 * during setup.
 */
export async function fetchModels(
  baseUrl: string,
  apiKey: string,
  fetchImpl: HttpFetch = fetch
): Promise<string[]> {
  const response = await send(fetchImpl, buildModelsUrl(baseUrl), {
    method: 'GET',
    headers: {
      'Authorization': `Bearer ${apiKey}`,
      'Content-Type': 'application/json'
    }
  })

  const data = await readJsonBody(response)
  if (!isRecord(data) || !Array.isArray(data.data)) {
    return []
  }

  return data.data
    .map((model: unknown) => (isRecord(model) && typeof model.id === 'string' ? model.id : undefined))
    .filter((id): id is string => id !== undefined)
}
