/**
 * Tag helpers for the secret store.
 *
 * A tag is lowercase ASCII letters and digits in hyphen-separated
 * groups: no leading, trailing or doubled hyphens.
 */

const MAX_SUFFIX = 99

/**
 * Normalize a proposed tag.
 *
 * Letters and digits are kept (lowercased), runs of whitespace and
 * hyphens collapse into one hyphen, everything else is dropped.
 * Idempotent.
 */
export function sanitizeTag(tag: string): string {
  let out = ''
  let lastDash = false

  for (const ch of tag) {
    if (/^[A-Za-z0-9]$/.test(ch)) {
      out += ch.toLowerCase()
      lastDash = false
    } else if ((ch === '-' || /^\s$/.test(ch)) && !lastDash) {
      out += '-'
      lastDash = true
    }
  }

  return out.replace(/^-+/, '').replace(/-+$/, '')
}

/**
 * Deterministic tag from the first four words of a note.
 * Words are whitespace-separated and sanitized individually; words
 * with nothing left after sanitizing do not count.
 *
 * @returns the words hyphen-joined, or "untagged"
 */
export function fallbackTag(note: string): string {
  const words = note
    .split(/\s+/)
    .map(sanitizeTag)
    .filter(word => word !== '')
    .slice(0, 4)

  if (words.length === 0) {
    return 'untagged'
  }
  return words.join('-')
}

/**
 * Make a tag unique against the existing ones (compared lowercased)
 * by appending -2 … -99, then the current time in milliseconds.
 */
export function ensureUniqueTag(tag: string, existing: ReadonlySet<string>, now: () => number = Date.now): string {
  if (!existing.has(tag.toLowerCase())) {
    return tag
  }

  for (let i = 2; i <= MAX_SUFFIX; i++) {
    const candidate = `${tag}-${i}`
    if (!existing.has(candidate.toLowerCase())) {
      return candidate
    }
  }

  return `${tag}-${now()}`
}
