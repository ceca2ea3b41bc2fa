/**
 * Unit tests for RecoveryEngineImpl
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile, stat } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { RecoveryEngineImpl, TELEMETRY_KEY, type RetryNotice } from '../recovery-engine.js'
import { resolvePolicies } from '../recovery-policies.js'
import { SqliteStateStore, IN_MEMORY_DATABASE } from '../../persistence/sqlite-state-store.js'
import {
  PhaseTimeoutError,
  RateLimitError,
  StateCorruptionError,
  WorkflowSpecError,
} from '../../core/errors.js'

function failingTimes<T>(failures: number, error: () => unknown, value: T): (attempt: number) => Promise<T> {
  return async (attempt) => {
    if (attempt <= failures) throw error()
    return value
  }
}

function engine(options: ConstructorParameters<typeof RecoveryEngineImpl>[0] = {}): RecoveryEngineImpl {
  return new RecoveryEngineImpl({ backoffUnitMs: 0, ...options })
}

// ---------------------------------------------------------------------------
// Retry bounds
// ---------------------------------------------------------------------------

describe('RecoveryEngine - attempts', () => {
  it('returns the result without retrying when the operation succeeds', async () => {
    const result = await engine().handle(async () => 'ok', { operation: 'op' })
    expect(result).toEqual({ succeeded: true, result: 'ok', attempts: 1, strategy: 'none', category: undefined, errors: [] })
  })

  it('retries until the operation succeeds', async () => {
    const result = await engine().handle(failingTimes(2, () => new Error('flaky'), 42), {
      operation: 'op',
      maxAttempts: 3,
    })
    expect(result.succeeded).toBe(true)
    expect(result.attempts).toBe(3)
    expect(result.category).toBe('unknown')
    expect(result.strategy).toBe('retry-backoff')
    expect(result.errors.map((e) => e.attemptCount)).toEqual([1, 2])
  })

  it('never makes more attempts than the caller allows', async () => {
    const operation = vi.fn(async () => {
      throw new Error('always')
    })
    const result = await engine().handle(operation, { operation: 'op', maxAttempts: 3 })
    expect(operation).toHaveBeenCalledTimes(3)
    expect(result.succeeded).toBe(false)
    expect(result.attempts).toBe(3)
  })

  it('never makes more attempts than the category allows', async () => {
    const operation = vi.fn(async () => {
      throw new PhaseTimeoutError('build', 10)
    })
    const result = await engine().handle(operation, { operation: 'op', maxAttempts: 10 })
    expect(operation).toHaveBeenCalledTimes(3)
    expect(result.category).toBe('timeout')
  })

  it('fails fast on validation errors and returns the fallback', async () => {
    const operation = vi.fn(async () => {
      throw new WorkflowSpecError(['bad'])
    })
    const result = await engine().handle(operation, { operation: 'op', maxAttempts: 5 })
    expect(operation).toHaveBeenCalledTimes(1)
    if (result.succeeded) throw new Error('expected failure')
    expect(result.strategy).toBe('fail-fast')
    expect(result.category).toBe('validation')
    expect(result.fallback).toEqual({ hint: 'Fix the invalid input and run again.' })
    expect(result.error.message).toContain('Workflow spec validation failed')
  })

  it('honours category overrides from configuration', async () => {
    const operation = vi.fn(async () => {
      throw new Error('always')
    })
    const policies = resolvePolicies({ unknown: { max_attempts: 2 } })
    await engine({ policies }).handle(operation, { operation: 'op', maxAttempts: 9 })
    expect(operation).toHaveBeenCalledTimes(2)
  })

  it('stops retrying once the signal is aborted', async () => {
    const controller = new AbortController()
    const operation = vi.fn(async () => {
      controller.abort()
      throw new Error('flaky')
    })
    const result = await engine().handle(operation, { operation: 'op', maxAttempts: 5, signal: controller.signal })
    expect(operation).toHaveBeenCalledTimes(1)
    expect(result.succeeded).toBe(false)
  })

  it('masks secrets in error records', async () => {
    const result = await engine().handle(
      async () => {
        throw new Error('auth failed for sk-ant-REDACTED')
      },
      { operation: 'op', maxAttempts: 1 },
    )
    expect(result.errors[0]?.message).toBe('auth failed for ***')
  })
})

// ---------------------------------------------------------------------------
// Backoff and strategies
// ---------------------------------------------------------------------------

describe('RecoveryEngine - strategies', () => {
  it('computes exponential backoff capped by maxBackoffMs', () => {
    const e = engine({ backoffBase: 2, backoffUnitMs: 1000, maxBackoffMs: 5000 })
    expect([1, 2, 3].map((n) => e.backoffDelay(n))).toEqual([2000, 4000, 5000])
  })

  it('sleeps for the backoff delay between attempts and reports it', async () => {
    const sleep = vi.fn(async () => undefined)
    const notices: RetryNotice[] = []
    const e = engine({ backoffBase: 2, backoffUnitMs: 10, sleep })
    await e.handle(failingTimes(2, () => new Error('flaky'), 'ok'), {
      operation: 'op',
      maxAttempts: 3,
      onRetry: (notice) => {
        notices.push(notice)
      },
    })
    expect(sleep.mock.calls).toEqual([[20], [40]])
    expect(notices.map((n) => [n.attempt, n.delayMs, n.category])).toEqual([
      [1, 20, 'unknown'],
      [2, 40, 'unknown'],
    ])
  })

  it('waits retryAfter seconds for rate-limited services', async () => {
    const sleep = vi.fn(async () => undefined)
    const e = engine({ backoffUnitMs: 1000, sleep })
    const result = await e.handle(failingTimes(1, () => new RateLimitError('limited', 7), 'ok'), {
      operation: 'op',
    })
    expect(result.strategy).toBe('respect-rate-limit')
    expect(sleep).toHaveBeenCalledWith(7000)
  })

  it('invokes the restoreCheckpoint hook for state corruption', async () => {
    const restoreCheckpoint = vi.fn(async () => undefined)
    const result = await engine().handle(failingTimes(1, () => new StateCorruptionError('bad'), 'ok'), {
      operation: 'op',
      restoreCheckpoint,
    })
    expect(restoreCheckpoint).toHaveBeenCalledTimes(1)
    expect(result.succeeded).toBe(true)
    expect(result.strategy).toBe('restore-checkpoint')
  })

  it('gives up on state corruption when no restore hook exists', async () => {
    const operation = vi.fn(async () => {
      throw new StateCorruptionError('bad')
    })
    const result = await engine().handle(operation, { operation: 'op' })
    expect(operation).toHaveBeenCalledTimes(1)
    expect(result.succeeded).toBe(false)
  })

  describe('create-missing-path', () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'phaseflow-recovery-'))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('creates the missing parent directory and retries', async () => {
      const target = join(dir, 'nested', 'deeper', 'out.txt')
      const result = await engine().handle(
        async () => {
          await writeFile(target, 'done', 'utf-8')
          return target
        },
        { operation: 'write' },
      )
      expect(result.succeeded).toBe(true)
      expect(result.attempts).toBe(2)
      expect(result.strategy).toBe('create-missing-path')
      expect((await stat(join(dir, 'nested', 'deeper'))).isDirectory()).toBe(true)
    })
  })
})

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------

describe('RecoveryEngine - telemetry', () => {
  it('tracks an EMA success rate per category', async () => {
    const e = engine({ emaAlpha: 0.5 })
    await e.handle(async () => {
      throw new Error('x')
    }, { operation: 'op', maxAttempts: 1 })
    expect(e.getTelemetry().successRates.unknown).toBe(0.5)
    await e.handle(failingTimes(1, () => new Error('x'), 1), { operation: 'op', maxAttempts: 2 })
    expect(e.getTelemetry().successRates.unknown).toBe(0.75)
    expect(e.getTelemetry().successRates.network).toBe(1)
  })

  it('keeps a bounded history, evicting the oldest records', async () => {
    const e = engine({ historyLimit: 2 })
    for (const label of ['first', 'second', 'third']) {
      await e.handle(async () => {
        throw new Error(label)
      }, { operation: label, maxAttempts: 1 })
    }
    expect(e.getTelemetry().history.map((r) => r.message)).toEqual(['second', 'third'])
  })

  it('persists telemetry through the state store and reloads it', async () => {
    const store = new SqliteStateStore(IN_MEMORY_DATABASE)
    await store.initialize()

    const first = engine({ store, emaAlpha: 0.5 })
    await first.initialize()
    await first.handle(async () => {
      throw new Error('down')
    }, { operation: 'op', maxAttempts: 1 })

    expect(await store.load(TELEMETRY_KEY)).toMatchObject({ successRates: { unknown: 0.5 } })

    const second = engine({ store })
    await second.initialize()
    expect(second.getTelemetry().successRates.unknown).toBe(0.5)
    expect(second.getTelemetry().history).toHaveLength(1)
    await store.shutdown()
  })

  it('starts fresh when stored telemetry is malformed', async () => {
    const store = new SqliteStateStore(IN_MEMORY_DATABASE)
    await store.initialize()
    await store.save(TELEMETRY_KEY, { history: 'nope' })
    const e = engine({ store })
    await e.initialize()
    expect(e.getTelemetry().history).toEqual([])
    await store.shutdown()
  })
})
