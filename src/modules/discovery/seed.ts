/**
 * Seed and keyword derivation. Both depend only on the task description.
 */

import { createHash } from 'node:crypto'

/** Keywords must be longer than this many characters */
const MIN_KEYWORD_LENGTH = 3
const MAX_KEYWORDS = 3

export function normalizeDescription(description: string): string {
  return description.trim().toLowerCase()
}

/**
 * First 8 hex characters of SHA-256 of the trimmed, lower-cased description,
 * read as an unsigned 32-bit integer.
 */
export function computeSeed(description: string): number {
  const digest = createHash('sha256').update(normalizeDescription(description), 'utf8').digest('hex')
  return parseInt(digest.slice(0, 8), 16)
}

/**
 * Extract up to three search keywords: whitespace-separated words sanitized
 * to `[A-Za-z0-9_.-]`, keeping those longer than three characters.
 */
export function extractKeywords(description: string): string[] {
  const keywords: string[] = []
  for (const word of description.trim().split(/\s+/)) {
    const sanitized = word.replace(/[^A-Za-z0-9_.-]/g, '')
    if (sanitized.length > MIN_KEYWORD_LENGTH) {
      keywords.push(sanitized)
      if (keywords.length === MAX_KEYWORDS) break
    }
  }
  return keywords
}

/**
 * Stable tie-break key for `item` under `seed`.
 */
export function seededRank(seed: number, item: string): string {
  return createHash('sha256').update(`${String(seed)}:${item}`, 'utf8').digest('hex')
}
