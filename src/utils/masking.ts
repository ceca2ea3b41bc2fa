/**
 * Credential masking utilities for persisted state and pino logger redaction.
 *
 * Credentials passed through to phase handlers are opaque to the engine; these
 * helpers keep them out of logs, state documents and error messages.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key or token values inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // GitHub tokens
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths for credential fields.
 *
 * @example
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'credentials',
  '*.credentials',
  'token',
  '*.token',
  'apiKey',
  '*.apiKey',
  'env.ANTHROPIC_API_KEY',
  'env.OPENAI_API_KEY',
  'env.GITHUB_TOKEN',
]

/**
 * Replace any known secret patterns in a string with `***`.
 * Best-effort: not every possible secret format is recognised.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
