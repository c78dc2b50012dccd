/**
 * Parse JSON that a language model was asked to return.
 *
 * Models sometimes wrap the object in prose or code fences, so when the
 * whole text is not valid JSON the span from the first `{` to the last
 * `}` is tried instead.
 *
 * @returns the parsed value, or undefined if neither attempt parses
 */
export function parseLooseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    // fall through to the brace span
  }

  const start = text.indexOf('{')
  const end = text.lastIndexOf('}')
  if (start === -1 || end <= start) {
    return undefined
  }

  try {
    return JSON.parse(text.slice(start, end + 1))
  } catch {
    return undefined
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
