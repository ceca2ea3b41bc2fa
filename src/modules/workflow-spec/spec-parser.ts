/**
 * Workflow spec file and string parser.
 *
 * Reads YAML or JSON workflow specs and returns raw parsed objects (before
 * Zod validation). Format is determined by file extension for file-based
 * loading, or explicitly specified for string-based loading.
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { load as parse } from 'js-yaml'
import { WorkflowSpecError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export type SpecFormat = 'yaml' | 'json'

export function detectFormat(filePath: string): SpecFormat {
  // .yaml, .yml and anything else are read as YAML (a superset of JSON)
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

// ---------------------------------------------------------------------------
// parseSpecString
// ---------------------------------------------------------------------------

/**
 * Parse a workflow spec from a string.
 *
 * @throws {WorkflowSpecError} on syntax errors
 */
export function parseSpecString(content: string, format: SpecFormat): unknown {
  try {
    if (format === 'json') {
      const parsed: unknown = JSON.parse(content)
      return parsed
    }
    return parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new WorkflowSpecError([`${format === 'json' ? 'JSON' : 'YAML'} parse error: ${message}`], {
      format,
    })
  }
}

// ---------------------------------------------------------------------------
// parseSpecFile
// ---------------------------------------------------------------------------

/**
 * Read a workflow spec file and parse its contents.
 *
 * @throws {WorkflowSpecError} on read or syntax errors, with the file path in context
 */
export async function parseSpecFile(filePath: string): Promise<unknown> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new WorkflowSpecError([`Failed to read file: ${message}`], { filePath })
  }

  try {
    return parseSpecString(content, detectFormat(filePath))
  } catch (err) {
    if (err instanceof WorkflowSpecError) {
      throw new WorkflowSpecError(err.errors, { filePath })
    }
    throw err
  }
}
