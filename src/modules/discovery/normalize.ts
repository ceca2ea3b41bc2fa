/**
 * The single normalization step every discovery level's output goes through.
 */

import { isAbsolute, relative, sep } from 'node:path'

/**
 * Convert to project-relative POSIX paths, drop duplicates and paths outside
 * the root, sort by UTF-16 code unit, and cap at `maxItems`.
 */
export function normalizeItems(items: readonly string[], root: string, maxItems: number): string[] {
  const unique = new Set<string>()
  for (const item of items) {
    let path = isAbsolute(item) ? relative(root, item) : item
    path = path.split(sep).join('/').replace(/\\/g, '/')
    while (path.startsWith('./')) path = path.slice(2)
    if (path === '' || path === '.' || path.startsWith('../')) continue
    unique.add(path)
  }
  return [...unique].sort().slice(0, Math.max(0, maxItems))
}
