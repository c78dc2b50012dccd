/**
 * Command Resolver
 *
 * Maps what the user typed onto a known command name:
 * exact match, then a unique prefix, then the best fuzzy match.
 */

import chalk from 'chalk'

export type Resolution =
  | { kind: 'exact' | 'prefix' | 'fuzzy'; name: string }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'none' }

const SCORE_MATCH = 16
const BONUS_FIRST_CHAR = 8
const BONUS_BOUNDARY = 8
const BONUS_CONSECUTIVE = 4
const PENALTY_GAP = 1

const SEPARATORS = new Set(['-', '_', ' ', '.', '/'])

function isBoundary(candidate: string, index: number): boolean {
  if (index === 0) return false
  const prev = candidate[index - 1]
  const curr = candidate[index]
  if (SEPARATORS.has(prev)) return true
  return prev === prev.toLowerCase() && prev !== prev.toUpperCase() && curr !== curr.toLowerCase()
}

/**
 * Subsequence-based similarity between a candidate and a typed pattern.
 *
 * Pattern characters are matched left to right, case-insensitively,
 * at their first available position. Each match scores points, with
 * bonuses for the first character, word boundaries and runs of
 * consecutive matches; characters skipped between matches cost a point
 * each.
 *
 * @returns null when the pattern is not a subsequence of the candidate
 */
export function fuzzyScore(candidate: string, pattern: string): number | null {
  if (pattern.length === 0) return 0

  let score = 0
  let lastMatch = -1

  for (const ch of pattern) {
    const wanted = ch.toLowerCase()

    let index = lastMatch + 1
    while (index < candidate.length && candidate[index].toLowerCase() !== wanted) {
      index++
    }
    if (index >= candidate.length) return null

    score += SCORE_MATCH
    if (index === 0) score += BONUS_FIRST_CHAR
    if (isBoundary(candidate, index)) score += BONUS_BOUNDARY
    if (lastMatch >= 0) {
      const gap = index - lastMatch - 1
      score += gap === 0 ? BONUS_CONSECUTIVE : -gap * PENALTY_GAP
    }

    lastMatch = index
  }

  return score
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Resolve a typed command name against the known names.
 *
 * Fuzzy ties go to the lexicographically smallest name, and a fuzzy
 * result is only accepted with a strictly positive score.
 */
export function resolveCommand(input: string, names: string[]): Resolution {
  if (names.includes(input)) {
    return { kind: 'exact', name: input }
  }

  const prefixMatches = names.filter(name => name.startsWith(input)).sort(compareNames)
  if (prefixMatches.length === 1) {
    return { kind: 'prefix', name: prefixMatches[0] }
  }
  if (prefixMatches.length > 1) {
    return { kind: 'ambiguous', candidates: prefixMatches }
  }

  let best: string | undefined
  let bestScore = 0

  for (const name of [...names].sort(compareNames)) {
    const score = fuzzyScore(name, input)
    if (score !== null && score > bestScore) {
      best = name
      bestScore = score
    }
  }

  return best === undefined ? { kind: 'none' } : { kind: 'fuzzy', name: best }
}

/**
 * Resolve a command, reporting ambiguity to the user.
 *
 * @param report - where the ambiguity diagnostic goes (stderr by default)
 * @returns the canonical command name, or undefined
 */
export function findCommand(
  input: string,
  names: string[],
  report: (message: string) => void = message => console.error(chalk.yellow(message))
): string | undefined {
  const resolution = resolveCommand(input, names)

  switch (resolution.kind) {
    case 'exact':
    case 'prefix':
    case 'fuzzy':
      return resolution.name
    case 'ambiguous':
      report(`Ambiguous command '${input}'. Did you mean one of: ${resolution.candidates.join(', ')}?`)
      return undefined
    case 'none':
      return undefined
  }
}
