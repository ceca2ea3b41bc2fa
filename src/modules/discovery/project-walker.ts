/**
 * Deterministic project tree walk.
 */

import { readdir } from 'node:fs/promises'
import { join } from 'node:path'

/** Directory names never descended into */
export const ALWAYS_IGNORED = ['.git', 'node_modules', 'dist'] as const

/**
 * List every regular file below `root` as a POSIX path relative to it.
 * Directory entries are visited in sorted order; symlinks are not followed.
 */
export async function walkProject(root: string, ignore: readonly string[] = []): Promise<string[]> {
  const ignored = new Set<string>([...ALWAYS_IGNORED, ...ignore])
  const files: string[] = []

  async function visit(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true })
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    for (const entry of entries) {
      const rel = prefix === '' ? entry.name : `${prefix}/${entry.name}`
      if (entry.isDirectory()) {
        if (!ignored.has(entry.name)) await visit(join(dir, entry.name), rel)
      } else if (entry.isFile()) {
        files.push(rel)
      }
    }
  }

  await visit(root, '')
  return files
}
