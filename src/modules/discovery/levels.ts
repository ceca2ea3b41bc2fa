/**
 * The four discovery levels, most informed first.
 *
 * Each level either succeeds with raw item paths (normalized afterwards by
 * the caller) or fails with a reason, handing over to the next level.
 */

import { readFile, stat } from 'node:fs/promises'
import { extname, join } from 'node:path'
import type { DiscoveryHistory } from './history-store.js'
import { walkProject } from './project-walker.js'
import { seededRank } from './seed.js'
import type { LevelAttempt } from './types.js'

/** Files larger than this are matched by path only */
const MAX_CONTENT_BYTES = 1024 * 1024

export interface LevelInput {
  root: string
  keywords: string[]
  seed: number
  maxItems: number
  extensions: readonly string[]
  ignore: readonly string[]
  history: DiscoveryHistory
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

function sharesKeyword(a: readonly string[], b: readonly string[]): boolean {
  const lower = new Set(a.map((k) => k.toLowerCase()))
  return b.some((k) => lower.has(k.toLowerCase()))
}

// ---------------------------------------------------------------------------
// Level 1: informed
// ---------------------------------------------------------------------------

/**
 * Rank artifacts of past tasks that share a keyword with this one by how
 * often they appeared; ties are ordered by the task seed.
 */
export async function informedLevel(input: LevelInput): Promise<LevelAttempt> {
  const entries = await input.history.entries()
  if (entries.length === 0) return { outcome: 'failed', reason: 'no history' }

  const related = entries.filter((entry) => sharesKeyword(entry.keywords, input.keywords))
  if (related.length === 0) return { outcome: 'failed', reason: 'no related history' }

  const frequency = new Map<string, number>()
  for (const entry of related) {
    for (const item of new Set(entry.items)) {
      frequency.set(item, (frequency.get(item) ?? 0) + 1)
    }
  }

  const existing: string[] = []
  for (const item of frequency.keys()) {
    if (await isFile(join(input.root, item))) existing.push(item)
  }
  if (existing.length === 0) return { outcome: 'failed', reason: 'recorded artifacts no longer exist' }

  const ranked = existing
    .map((item) => ({ item, count: frequency.get(item) ?? 0, tie: seededRank(input.seed, item) }))
    .sort((a, b) => b.count - a.count || (a.tie < b.tie ? -1 : a.tie > b.tie ? 1 : 0))
    .slice(0, input.maxItems)
    .map((entry) => entry.item)

  return { outcome: 'succeeded', items: ranked }
}

// ---------------------------------------------------------------------------
// Level 2: structural
// ---------------------------------------------------------------------------

export async function structuralLevel(input: LevelInput): Promise<LevelAttempt> {
  if (input.keywords.length === 0) return { outcome: 'failed', reason: 'no keywords' }
  const needles = input.keywords.map((k) => k.toLowerCase())
  const files = await walkProject(input.root, input.ignore)
  const matched: string[] = []

  for (const file of files) {
    const path = file.toLowerCase()
    if (needles.some((needle) => path.includes(needle))) {
      matched.push(file)
      continue
    }
    const absolute = join(input.root, file)
    const info = await stat(absolute)
    if (info.size > MAX_CONTENT_BYTES) continue
    const content = (await readFile(absolute, 'utf8')).toLowerCase()
    if (needles.some((needle) => content.includes(needle))) matched.push(file)
  }

  if (matched.length === 0) return { outcome: 'failed', reason: 'no keyword matches' }
  return { outcome: 'succeeded', items: matched }
}

// ---------------------------------------------------------------------------
// Level 3: minimal
// ---------------------------------------------------------------------------

export async function minimalLevel(input: LevelInput): Promise<LevelAttempt> {
  const extensions = new Set(input.extensions.map((e) => e.toLowerCase()))
  const files = await walkProject(input.root, input.ignore)
  const sources = files.filter((file) => extensions.has(extname(file).toLowerCase()))
  if (sources.length === 0) return { outcome: 'failed', reason: 'no source files' }
  return { outcome: 'succeeded', items: sources }
}

// ---------------------------------------------------------------------------
// Level 4: empty
// ---------------------------------------------------------------------------

export function emptyLevel(): Promise<LevelAttempt> {
  return Promise.resolve({ outcome: 'succeeded', items: [] })
}
