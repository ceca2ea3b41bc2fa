/**
 * Extraction of a handler's structured output from its stdout.
 *
 * Handlers may print anything; the last line that parses as a JSON object
 * is taken as the structured output and validated against PhaseOutputSchema.
 */

import type { PhaseOutput } from '../../core/types.js'
import { PhaseOutputSchema } from '../../persistence/schemas/workflow-state.js'
import { isPlainObject } from '../../utils/helpers.js'

export type OutputParseResult =
  | { ok: true; output: PhaseOutput }
  | { ok: false; reason: string }

export function findLastJsonObject(stdout: string): Record<string, unknown> | undefined {
  const lines = stdout.split(/\r?\n/)
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = (lines[i] ?? '').trim()
    if (!line.startsWith('{') || !line.endsWith('}')) continue
    try {
      const parsed: unknown = JSON.parse(line)
      if (isPlainObject(parsed)) return parsed
    } catch {
      // not JSON after all; keep looking
    }
  }
  return undefined
}

export function parseStructuredOutput(stdout: string): OutputParseResult {
  const candidate = findLastJsonObject(stdout)
  if (candidate === undefined) {
    return { ok: false, reason: 'no JSON object line in handler output' }
  }
  return validatePhaseOutput(candidate)
}

export function validatePhaseOutput(value: unknown): OutputParseResult {
  const result = PhaseOutputSchema.safeParse(value)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    return { ok: false, reason: `malformed handler output (${issues})` }
  }
  return { ok: true, output: result.data }
}
