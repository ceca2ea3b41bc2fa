/**
 * RecoveryEngine: runs an operation under the retry policy of the category
 * its failures fall into.
 *
 * `handle()` never throws: it resolves either with the operation's result
 * or with the category's fallback once attempts are exhausted. Per-category
 * success rates (EMA) and a bounded error history are kept as advisory
 * telemetry in the state store under `recovery:telemetry`.
 */

import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { BaseService } from '../core/di.js'
import { ERROR_CATEGORIES, type ErrorCategory } from '../core/types.js'
import { RateLimitError } from '../core/errors.js'
import type { StateStore } from '../persistence/state-store.js'
import { ErrorCategoryEnum } from '../persistence/schemas/workflow-state.js'
import { createLogger } from '../utils/logger.js'
import { sleep as defaultSleep, toError } from '../utils/helpers.js'
import { maskSecrets } from '../utils/masking.js'
import { classifyError, errorCode, type ErrorClassifier } from './error-classifier.js'
import {
  DEFAULT_POLICIES,
  type CategoryPolicy,
  type RecoveryFallback,
  type RecoveryPolicies,
  type RecoveryStrategy,
} from './recovery-policies.js'

const logger = createLogger('recovery')

export const TELEMETRY_KEY = 'recovery:telemetry'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ErrorRecord {
  category: ErrorCategory
  message: string
  retriable: boolean
  attemptCount: number
  timestamp: string
  operation?: string
}

export interface RetryNotice {
  operation: string
  /** Attempt that just failed (1-based) */
  attempt: number
  category: ErrorCategory
  strategy: RecoveryStrategy
  delayMs: number
  error: Error
}

export interface RecoveryContext {
  /** Label used in logs and error records, e.g. "wf-1:build" */
  operation: string
  /** Caller's attempt cap; the smaller of this and the category's maxAttempts applies */
  maxAttempts?: number
  /** Invoked by the restore-checkpoint strategy before retrying */
  restoreCheckpoint?: () => Promise<void>
  /** Invoked before every retry, after the delay has been decided */
  onRetry?: (notice: RetryNotice) => void | Promise<void>
  /** Aborting stops further attempts */
  signal?: AbortSignal
}

interface RecoveryOutcomeBase {
  attempts: number
  strategy: RecoveryStrategy
  errors: ErrorRecord[]
}

export type RecoveryResult<T> =
  | (RecoveryOutcomeBase & { succeeded: true; result: T; category?: ErrorCategory })
  | (RecoveryOutcomeBase & {
      succeeded: false
      fallback: RecoveryFallback
      category: ErrorCategory
      error: Error
    })

export interface RecoveryTelemetry {
  successRates: Record<ErrorCategory, number>
  history: ErrorRecord[]
}

export interface RecoveryEngine extends BaseService {
  handle<T>(operation: (attempt: number) => Promise<T>, context: RecoveryContext): Promise<RecoveryResult<T>>
  classify(error: unknown): ErrorCategory
  policyFor(category: ErrorCategory): CategoryPolicy
  /** Delay before the retry that follows failed attempt `attempt` */
  backoffDelay(attempt: number): number
  getTelemetry(): RecoveryTelemetry
}

export interface RecoveryEngineOptions {
  store?: StateStore
  classifier?: ErrorClassifier
  policies?: RecoveryPolicies
  backoffBase?: number
  /** Milliseconds per backoff second */
  backoffUnitMs?: number
  maxBackoffMs?: number
  historyLimit?: number
  emaAlpha?: number
  sleep?: (ms: number) => Promise<void>
}

// ---------------------------------------------------------------------------
// Telemetry document
// ---------------------------------------------------------------------------

const ErrorRecordSchema = z.object({
  category: ErrorCategoryEnum,
  message: z.string(),
  retriable: z.boolean(),
  attemptCount: z.number().int(),
  timestamp: z.string(),
  operation: z.string().optional(),
})

const TelemetrySchema = z.object({
  successRates: z.record(z.string(), z.number()).default({}),
  history: z.array(ErrorRecordSchema).default([]),
})

function initialRates(): Record<ErrorCategory, number> {
  return {
    network: 1,
    filesystem: 1,
    'external-service': 1,
    validation: 1,
    'state-corruption': 1,
    timeout: 1,
    unknown: 1,
  }
}

function retryAfterSeconds(error: unknown): number | undefined {
  if (error instanceof RateLimitError) return error.retryAfterSeconds
  if (typeof error === 'object' && error !== null && 'retryAfter' in error) {
    const value: unknown = error.retryAfter
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value
  }
  return undefined
}

function missingPath(error: unknown): string | undefined {
  if (errorCode(error) !== 'ENOENT') return undefined
  if (typeof error !== 'object' || error === null || !('path' in error)) return undefined
  const path: unknown = error.path
  return typeof path === 'string' ? path : undefined
}

// ---------------------------------------------------------------------------
// RecoveryEngineImpl
// ---------------------------------------------------------------------------

export class RecoveryEngineImpl implements RecoveryEngine {
  private readonly _store: StateStore | undefined
  private readonly _classifier: ErrorClassifier
  private readonly _policies: RecoveryPolicies
  private readonly _backoffBase: number
  private readonly _backoffUnitMs: number
  private readonly _maxBackoffMs: number
  private readonly _historyLimit: number
  private readonly _emaAlpha: number
  private readonly _sleep: (ms: number) => Promise<void>
  private _telemetry: RecoveryTelemetry = { successRates: initialRates(), history: [] }

  constructor(options: RecoveryEngineOptions = {}) {
    this._store = options.store
    this._classifier = options.classifier ?? classifyError
    this._policies = options.policies ?? DEFAULT_POLICIES
    this._backoffBase = options.backoffBase ?? 2
    this._backoffUnitMs = options.backoffUnitMs ?? 1000
    this._maxBackoffMs = options.maxBackoffMs ?? 60_000
    this._historyLimit = options.historyLimit ?? 100
    this._emaAlpha = options.emaAlpha ?? 0.2
    this._sleep = options.sleep ?? defaultSleep
  }

  async initialize(): Promise<void> {
    if (this._store === undefined) return
    try {
      const raw = await this._store.load(TELEMETRY_KEY)
      if (raw === undefined) return
      const parsed = TelemetrySchema.parse(raw)
      const rates = initialRates()
      for (const category of ERROR_CATEGORIES) {
        rates[category] = parsed.successRates[category] ?? 1
      }
      this._telemetry = { successRates: rates, history: parsed.history.slice(-this._historyLimit) }
    } catch (err) {
      logger.warn({ err }, 'Recovery telemetry unreadable; starting fresh')
    }
  }

  async shutdown(): Promise<void> {
    await this._persistTelemetry()
  }

  classify(error: unknown): ErrorCategory {
    try {
      return this._classifier(error)
    } catch (err) {
      logger.warn({ err }, 'Error classifier threw; treating error as unknown')
      return 'unknown'
    }
  }

  policyFor(category: ErrorCategory): CategoryPolicy {
    return this._policies[category]
  }

  backoffDelay(attempt: number): number {
    return Math.min(Math.pow(this._backoffBase, attempt) * this._backoffUnitMs, this._maxBackoffMs)
  }

  getTelemetry(): RecoveryTelemetry {
    return {
      successRates: { ...this._telemetry.successRates },
      history: [...this._telemetry.history],
    }
  }

  async handle<T>(
    operation: (attempt: number) => Promise<T>,
    context: RecoveryContext,
  ): Promise<RecoveryResult<T>> {
    const errors: ErrorRecord[] = []
    let strategy: RecoveryStrategy = 'none'
    let lastCategory: ErrorCategory | undefined
    let attempt = 0

    for (;;) {
      attempt++
      try {
        const result = await operation(attempt)
        if (lastCategory !== undefined) {
          this._recordOutcome(lastCategory, true)
          await this._persistTelemetry()
        }
        return { succeeded: true, result, attempts: attempt, strategy, category: lastCategory, errors }
      } catch (thrown) {
        const error = toError(thrown)
        const category = this.classify(thrown)
        const policy = this.policyFor(category)
        const limit = Math.max(1, Math.min(policy.maxAttempts, context.maxAttempts ?? policy.maxAttempts))
        lastCategory = category
        strategy = policy.strategy

        const record: ErrorRecord = {
          category,
          message: maskSecrets(error.message),
          retriable: policy.retriable,
          attemptCount: attempt,
          timestamp: new Date().toISOString(),
          operation: context.operation,
        }
        errors.push(record)
        this._appendHistory(record)

        const exhausted = !policy.retriable || attempt >= limit || context.signal?.aborted === true
        const prepared = exhausted ? null : await this._prepareRetry(thrown, attempt, policy, context)

        if (prepared === null) {
          logger.warn(
            { operation: context.operation, category, attempts: attempt, strategy },
            'Recovery exhausted; returning fallback',
          )
          this._recordOutcome(category, false)
          await this._persistTelemetry()
          return {
            succeeded: false,
            fallback: policy.fallback,
            category,
            error,
            attempts: attempt,
            strategy,
            errors,
          }
        }

        logger.info(
          { operation: context.operation, category, attempt, delayMs: prepared, strategy },
          'Retrying after failure',
        )
        try {
          await context.onRetry?.({
            operation: context.operation,
            attempt,
            category,
            strategy,
            delayMs: prepared,
            error,
          })
        } catch (err) {
          logger.warn({ err, operation: context.operation }, 'onRetry callback failed')
        }
        if (prepared > 0) await this._sleep(prepared)
      }
    }
  }

  // -------------------------------------------------------------------------
  // Strategies
  // -------------------------------------------------------------------------

  /**
   * Carry out the strategy's preparation step.
   * @returns the delay before the next attempt, or null when the strategy cannot proceed
   */
  private async _prepareRetry(
    error: unknown,
    attempt: number,
    policy: CategoryPolicy,
    context: RecoveryContext,
  ): Promise<number | null> {
    switch (policy.strategy) {
      case 'none':
      case 'retry-backoff':
        return this.backoffDelay(attempt)

      case 'respect-rate-limit': {
        const retryAfter = retryAfterSeconds(error)
        return retryAfter !== undefined ? retryAfter * this._backoffUnitMs : this.backoffDelay(attempt)
      }

      case 'create-missing-path': {
        const path = missingPath(error)
        if (path === undefined) return this.backoffDelay(attempt)
        try {
          await mkdir(dirname(path), { recursive: true })
          logger.info({ dir: dirname(path) }, 'Created missing directory')
          return 0
        } catch (err) {
          logger.warn({ err, path }, 'Could not create missing directory')
          return null
        }
      }

      case 'restore-checkpoint': {
        if (context.restoreCheckpoint === undefined) return null
        try {
          await context.restoreCheckpoint()
          return 0
        } catch (err) {
          logger.warn({ err, operation: context.operation }, 'Checkpoint restore failed')
          return null
        }
      }

      case 'fail-fast':
        return null
    }
  }

  // -------------------------------------------------------------------------
  // Telemetry
  // -------------------------------------------------------------------------

  private _recordOutcome(category: ErrorCategory, success: boolean): void {
    const previous = this._telemetry.successRates[category]
    this._telemetry.successRates[category] =
      this._emaAlpha * (success ? 1 : 0) + (1 - this._emaAlpha) * previous
  }

  private _appendHistory(record: ErrorRecord): void {
    this._telemetry.history.push(record)
    const excess = this._telemetry.history.length - this._historyLimit
    if (excess > 0) this._telemetry.history.splice(0, excess)
  }

  private async _persistTelemetry(): Promise<void> {
    if (this._store === undefined) return
    try {
      await this._store.save(TELEMETRY_KEY, this._telemetry)
    } catch (err) {
      logger.warn({ err }, 'Failed to persist recovery telemetry')
    }
  }
}

export function createRecoveryEngine(options: RecoveryEngineOptions = {}): RecoveryEngine {
  return new RecoveryEngineImpl(options)
}
