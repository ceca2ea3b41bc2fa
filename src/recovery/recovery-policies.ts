/**
 * Per-category recovery policies.
 *
 * Each category maps to an attempt budget, a retry strategy and a
 * deterministic fallback returned once attempts are exhausted.
 */

import { ERROR_CATEGORIES, type ErrorCategory } from '../core/types.js'
import type { RecoveryConfig } from '../modules/config/config-schema.js'

export type RecoveryStrategy =
  | 'none'
  | 'retry-backoff'
  | 'create-missing-path'
  | 'respect-rate-limit'
  | 'restore-checkpoint'
  | 'fail-fast'

/** Returned in place of a result when recovery gives up */
export interface RecoveryFallback {
  /** Operator guidance reported on the failed phase */
  hint: string
}

export interface CategoryPolicy {
  maxAttempts: number
  retriable: boolean
  strategy: RecoveryStrategy
  fallback: RecoveryFallback
}

export type RecoveryPolicies = Readonly<Record<ErrorCategory, CategoryPolicy>>

export const DEFAULT_POLICIES: RecoveryPolicies = {
  network: {
    maxAttempts: 5,
    retriable: true,
    strategy: 'retry-backoff',
    fallback: { hint: 'Check network connectivity and retry the workflow.' },
  },
  filesystem: {
    maxAttempts: 3,
    retriable: true,
    strategy: 'create-missing-path',
    fallback: { hint: 'Check file paths and permissions in the working tree.' },
  },
  'external-service': {
    maxAttempts: 5,
    retriable: true,
    strategy: 'respect-rate-limit',
    fallback: { hint: 'Wait for the service rate limit to reset before resuming.' },
  },
  validation: {
    maxAttempts: 1,
    retriable: false,
    strategy: 'fail-fast',
    fallback: { hint: 'Fix the invalid input and run again.' },
  },
  'state-corruption': {
    maxAttempts: 2,
    retriable: true,
    strategy: 'restore-checkpoint',
    fallback: { hint: 'Check state file integrity or resume from an earlier checkpoint.' },
  },
  timeout: {
    maxAttempts: 3,
    retriable: true,
    strategy: 'retry-backoff',
    fallback: { hint: 'Raise the phase timeout or split the phase into smaller steps.' },
  },
  unknown: {
    maxAttempts: 5,
    retriable: true,
    strategy: 'retry-backoff',
    fallback: { hint: 'Check the phase logs for details.' },
  },
}

/**
 * Apply `recovery.categories` overrides from configuration to the defaults.
 */
export function resolvePolicies(
  overrides: RecoveryConfig['categories'] = {},
  base: RecoveryPolicies = DEFAULT_POLICIES,
): RecoveryPolicies {
  const resolved: Record<ErrorCategory, CategoryPolicy> = { ...base }
  for (const category of ERROR_CATEGORIES) {
    const override = overrides[category]
    if (override === undefined) continue
    resolved[category] = {
      ...base[category],
      maxAttempts: override.max_attempts ?? base[category].maxAttempts,
      retriable: override.retriable ?? base[category].retriable,
    }
  }
  return resolved
}

