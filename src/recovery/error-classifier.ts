/**
 * Error classification for the recovery engine.
 *
 * Rules are evaluated in order: error class first, then the Node.js errno
 * `code`, then message patterns. The first match wins; anything unmatched
 * is `unknown`.
 */

import { ZodError } from 'zod'
import type { ErrorCategory } from '../core/types.js'
import {
  ConfigError,
  InvalidTransitionError,
  PhaseExecutionError,
  PhaseTimeoutError,
  RateLimitError,
  StateCorruptionError,
  WorkflowCycleError,
  WorkflowSpecError,
} from '../core/errors.js'

/** Pluggable classifier; must not throw */
export type ErrorClassifier = (error: unknown) => ErrorCategory

export interface ClassificationRule {
  category: ErrorCategory
  /** Short label used in logs and tests */
  description: string
  matches(error: unknown): boolean
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FILESYSTEM_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EEXIST', 'ENOTDIR', 'EISDIR', 'ENOSPC', 'EMFILE', 'EROFS'])
const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
])

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
  const code: unknown = error.code
  return typeof code === 'string' ? code : undefined
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return typeof error === 'string' ? error : String(error)
}

function messageMatches(pattern: RegExp): (error: unknown) => boolean {
  return (error) => pattern.test(errorMessage(error))
}

// ---------------------------------------------------------------------------
// Default rule table
// ---------------------------------------------------------------------------

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  // Error classes
  { category: 'timeout', description: 'PhaseTimeoutError', matches: (e) => e instanceof PhaseTimeoutError },
  { category: 'external-service', description: 'RateLimitError', matches: (e) => e instanceof RateLimitError },
  {
    category: 'state-corruption',
    description: 'StateCorruptionError',
    matches: (e) => e instanceof StateCorruptionError,
  },
  {
    category: 'validation',
    description: 'configuration and schema errors',
    matches: (e) =>
      e instanceof ConfigError ||
      e instanceof WorkflowSpecError ||
      e instanceof WorkflowCycleError ||
      e instanceof InvalidTransitionError ||
      e instanceof ZodError,
  },
  // errno codes
  {
    category: 'filesystem',
    description: 'filesystem errno',
    matches: (e) => FILESYSTEM_CODES.has(errorCode(e) ?? ''),
  },
  { category: 'network', description: 'network errno', matches: (e) => NETWORK_CODES.has(errorCode(e) ?? '') },
  // Message patterns
  {
    category: 'external-service',
    description: 'rate limit message',
    matches: messageMatches(/rate.?limit|too many requests|\b429\b/i),
  },
  {
    category: 'external-service',
    description: 'upstream unavailable message',
    matches: messageMatches(/service unavailable|bad gateway|overloaded|\b50[234]\b/i),
  },
  { category: 'timeout', description: 'timeout message', matches: messageMatches(/timed out|timeout/i) },
  {
    category: 'network',
    description: 'network message',
    matches: messageMatches(/network|socket hang up|connection (refused|reset)|dns/i),
  },
  {
    category: 'filesystem',
    description: 'filesystem message',
    matches: messageMatches(/no such file|permission denied|not a directory|disk full/i),
  },
  {
    // Handler failures are retriable even when their output mentions validation
    category: 'validation',
    description: 'validation message',
    matches: (e) => !(e instanceof PhaseExecutionError) && /validation|invalid/i.test(errorMessage(e)),
  },
]

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build a classifier from an ordered rule table. A rule that throws is
 * treated as a non-match.
 */
export function createErrorClassifier(
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): ErrorClassifier {
  return (error) => {
    for (const rule of rules) {
      let matched = false
      try {
        matched = rule.matches(error)
      } catch {
        matched = false
      }
      if (matched) return rule.category
    }
    return 'unknown'
  }
}

export const classifyError: ErrorClassifier = createErrorClassifier()
