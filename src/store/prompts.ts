/**
 * Requests sent to the model by the secret store.
 *
 * Neither request ever contains a secret value: tagging sees only the
 * note, and search sees masked entries.
 */

import { StoreEntry } from '../config/schemas.js'

/**
 * A store entry as shown to the model.
 */
export interface MaskedEntry {
  id: number
  tag: string
  note: string
  created_at: string
  secret_placeholder: string
}

export function maskEntry(entry: StoreEntry): MaskedEntry {
  return {
    id: entry.id,
    tag: entry.tag,
    note: entry.note,
    created_at: entry.created_at,
    secret_placeholder: `SECRET_${entry.id}`
  }
}

export function buildTagPrompt(note: string, existingTags: ReadonlySet<string>): string {
  const existing = [...existingTags].sort()

  return [
    'You generate short, memorable tags for secret notes.',
    '',
    'Rules:',
    '- Return JSON only.',
    '- JSON schema: {"tag": string, "reason": string}.',
    '- tag must be 2-4 words max, lowercase, use hyphens instead of spaces.',
    '- tag must not include any sensitive data (only use the note).',
    '- tag must not duplicate existing tags.',
    '',
    `Existing tags: ${JSON.stringify(existing)}`,
    '',
    `Note: ${note}`,
    '',
    'Return JSON only.'
  ].join('\n')
}

export function buildSearchPrompt(query: string, entries: MaskedEntry[]): string {
  return [
    'You are a secret locator. Given a user query and a list of entries, find the best matching entry.',
    '',
    'Rules:',
    '- Return JSON only.',
    '- JSON schema: {"found": boolean, "id": number|null, "reason": string}.',
    '- If nothing matches well, set found=false and id=null.',
    '- Do not invent ids.',
    '',
    'Entries (secret is placeholder only):',
    JSON.stringify(entries, null, 2),
    '',
    `Query: ${query}`,
    '',
    'Return JSON only.'
  ].join('\n')
}
