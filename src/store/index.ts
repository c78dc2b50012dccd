/**
 * Secret Store
 *
 * Secrets are kept in plain JSON (stores.json), each under a short tag
 * that a language model proposes from the note. Lookup is also
 * delegated to the model: it sees every entry with the secret masked
 * and answers with the id of the best match, which is only honoured if
 * that id really exists.
 *
 * Entries are append-only.
 */

import { join } from 'path'
import { errorMessage, getConfigDir, STORE_FILE } from '../config/index.js'
import { readDocument, writeDocument } from '../config/document.js'
import { validateStore, StoreEntry, StoreSchema } from '../config/schemas.js'
import { LLMClient } from '../llm/client.js'
import { isRecord, parseLooseJson } from '../utils/json.js'
import { ensureUniqueTag, fallbackTag, sanitizeTag } from './tags.js'
import { buildSearchPrompt, buildTagPrompt, maskEntry, MaskedEntry } from './prompts.js'
import { AuditEvent, AuditHandler } from './audit.js'

/**
 * Error thrown when add/search input is unusable.
 */
export class SecretStoreError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SecretStoreError'
  }
}

export type SearchResult =
  | { found: true; entry: StoreEntry }
  | { found: false }

export interface SecretStoreOptions {
  dir?: string
  /** Clock in milliseconds; ids and timestamps derive from it */
  now?: () => number
  onAudit?: AuditHandler
}

function emptyStore(): StoreSchema {
  return { entries: [] }
}

/**
 * Read `{ tag }` out of a tagging response.
 */
export function parseTagResponse(response: string): string | undefined {
  const parsed = parseLooseJson(response)
  return isRecord(parsed) && typeof parsed.tag === 'string' ? parsed.tag : undefined
}

/**
 * Read the chosen id out of a search response.
 * Numeric strings are accepted; `found` must be exactly true.
 */
export function parseSearchResponse(response: string): number | undefined {
  const parsed = parseLooseJson(response)
  if (!isRecord(parsed) || parsed.found !== true) {
    return undefined
  }

  const { id } = parsed
  if (typeof id === 'number' && Number.isSafeInteger(id)) {
    return id
  }
  if (typeof id === 'string' && /^\d+$/.test(id.trim())) {
    return Number(id.trim())
  }
  return undefined
}

export class SecretStore {
  private readonly dir: string
  private readonly now: () => number
  private readonly onAudit?: AuditHandler

  constructor(private readonly llm: LLMClient, options: SecretStoreOptions = {}) {
    this.dir = options.dir ?? getConfigDir()
    this.now = options.now ?? Date.now
    this.onAudit = options.onAudit
  }

  get path(): string {
    return join(this.dir, STORE_FILE)
  }

  /**
   * Load all entries. A corrupted file is backed up and the store
   * starts empty.
   */
  async load(): Promise<StoreEntry[]> {
    const doc = await readDocument(this.path, {
      label: STORE_FILE,
      validate: validateStore,
      defaults: emptyStore
    })
    return doc.value.entries
  }

  private async save(entries: StoreEntry[]): Promise<void> {
    await writeDocument(this.path, { entries })
  }

  /**
   * Store a secret under a model-generated tag.
   *
   * @throws SecretStoreError if the secret or note is empty
   * @throws LLMRequestError if the tagging request fails
   */
  async add(secret: string, note: string): Promise<StoreEntry> {
    const value = secret.trim()
    const description = note.trim()

    if (value === '') {
      throw new SecretStoreError('secret cannot be empty.')
    }
    if (description === '') {
      throw new SecretStoreError('note/description cannot be empty.')
    }

    const entries = await this.load()
    const existingTags = new Set(entries.map(entry => entry.tag.toLowerCase()))

    let response: string
    try {
      response = await this.llm.complete(buildTagPrompt(description, existingTags), false)
    } catch (error: unknown) {
      await this.audit({ operation: 'add', success: false, errorMessage: errorMessage(error) })
      throw error
    }

    const proposed = sanitizeTag(parseTagResponse(response) ?? '')
    const tag = ensureUniqueTag(proposed === '' ? fallbackTag(description) : proposed, existingTags, this.now)

    const now = this.now()
    const lastId = entries.reduce((max, entry) => Math.max(max, entry.id), 0)
    const id = Math.max(now, lastId + 1)

    const entry: StoreEntry = {
      id,
      tag,
      note: description,
      secret: value,
      created_at: new Date(now).toISOString()
    }

    await this.save([...entries, entry])
    await this.audit({ operation: 'add', success: true, entryId: id, tag })

    return entry
  }

  /**
   * Find a secret by natural-language query.
   *
   * An empty store answers not-found without contacting the model.
   * Unparseable answers and ids that are not in the store are
   * treated exactly like "no match".
   *
   * @throws SecretStoreError if the query is empty
   * @throws LLMRequestError if the search request fails
   */
  async search(query: string): Promise<SearchResult> {
    const text = query.trim()
    if (text === '') {
      throw new SecretStoreError('query cannot be empty.')
    }

    const entries = await this.load()
    if (entries.length === 0) {
      await this.audit({ operation: 'search', success: false })
      return { found: false }
    }

    let response: string
    try {
      response = await this.llm.complete(buildSearchPrompt(text, entries.map(maskEntry)), false)
    } catch (error: unknown) {
      await this.audit({ operation: 'search', success: false, errorMessage: errorMessage(error) })
      throw error
    }

    const id = parseSearchResponse(response)
    const entry = id === undefined ? undefined : entries.find(candidate => candidate.id === id)

    if (!entry) {
      await this.audit({ operation: 'search', success: false })
      return { found: false }
    }

    await this.audit({ operation: 'search', success: true, entryId: entry.id, tag: entry.tag })
    return { found: true, entry }
  }

  /**
   * All entries with their secrets masked.
   */
  async list(): Promise<MaskedEntry[]> {
    return (await this.load()).map(maskEntry)
  }

  private async audit(event: Omit<AuditEvent, 'timestamp'>): Promise<void> {
    if (!this.onAudit) return

    try {
      await this.onAudit({ timestamp: new Date(this.now()).toISOString(), ...event })
    } catch (error: unknown) {
      console.warn(`Warning: audit handler failed: ${errorMessage(error)}`)
    }
  }
}

export type { MaskedEntry } from './prompts.js'
export { AuditLogger } from './audit.js'
export type { AuditEvent, AuditHandler } from './audit.js'
export { sanitizeTag, fallbackTag, ensureUniqueTag } from './tags.js'
