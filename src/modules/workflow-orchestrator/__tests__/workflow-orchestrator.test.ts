/**
 * Unit tests for WorkflowOrchestratorImpl
 *
 * Phases use in-process function handlers; state lives in an in-memory
 * SQLite store unless a test needs the file backend.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createWorkflowOrchestrator } from '../workflow-orchestrator-impl.js'
import type { WorkflowOrchestrator } from '../workflow-orchestrator.js'
import { createTask } from '../task.js'
import { createHandlerRegistry, type FunctionHandler } from '../../phase-executor/handler-registry.js'
import { PhaseExecutorImpl } from '../../phase-executor/phase-executor-impl.js'
import { createWorkflowSpec, type PhaseInput } from '../../workflow-spec/spec-validator.js'
import type { CommitResult, WorkspaceCommitter } from '../../git/workspace-committer.js'
import { createRecoveryEngine } from '../../../recovery/recovery-engine.js'
import { createSqliteStateStore, IN_MEMORY_DATABASE } from '../../../persistence/sqlite-state-store.js'
import { createFileStateStore } from '../../../persistence/file-state-store.js'
import type { StateStore } from '../../../persistence/state-store.js'
import { TypedEventBusImpl } from '../../../core/event-bus.js'
import type { WorkflowEvents } from '../../../core/event-bus.types.js'
import {
  ConfigError,
  WorkflowCycleError,
  WorkflowNotFoundError,
} from '../../../core/errors.js'
import type { FailurePolicy, PhaseOutput, WorkflowState } from '../../../core/types.js'
import { WorkflowStateSchema } from '../../../persistence/schemas/workflow-state.js'
import { sleep } from '../../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

const EVENT_NAMES = [
  'workflow:started',
  'workflow:finished',
  'phase:started',
  'phase:retrying',
  'phase:completed',
  'phase:failed',
  'phase:skipped',
  'batch:started',
  'batch:committed',
  'checkpoint:created',
  'checkpoint:restored',
] as const satisfies readonly (keyof WorkflowEvents)[]

interface RecordedEvent {
  name: keyof WorkflowEvents
  payload: WorkflowEvents[keyof WorkflowEvents]
}

interface Harness {
  orchestrator: WorkflowOrchestrator
  store: StateStore
  events: RecordedEvent[]
  commits: string[]
  calls: string[]
}

let workDir: string
let stores: StateStore[]

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'phaseflow-orchestrator-'))
  stores = []
})

afterEach(async () => {
  for (const store of stores) await store.shutdown()
  await rm(workDir, { recursive: true, force: true })
})

async function createHarness(
  handlers: Record<string, FunctionHandler>,
  options: { store?: StateStore } = {},
): Promise<Harness> {
  const store = options.store ?? createSqliteStateStore(IN_MEMORY_DATABASE)
  await store.initialize()
  stores.push(store)

  const events: RecordedEvent[] = []
  const commits: string[] = []
  const calls: string[] = []
  const eventBus = new TypedEventBusImpl()
  for (const name of EVENT_NAMES) {
    eventBus.on(name, (payload) => events.push({ name, payload }))
  }

  const tracked: Record<string, FunctionHandler> = {}
  for (const [name, handler] of Object.entries(handlers)) {
    tracked[name] = (input) => {
      calls.push(name)
      return handler(input)
    }
  }
  const registry = createHandlerRegistry(tracked)
  const committer: WorkspaceCommitter = {
    commit: (message: string): Promise<CommitResult> => {
      commits.push(message)
      return Promise.resolve({ committed: true, ref: `ref-${String(commits.length)}` })
    },
  }

  const orchestrator = createWorkflowOrchestrator({
    store,
    executor: new PhaseExecutorImpl({ stateDir: join(workDir, 'state'), projectRoot: workDir, registry }),
    recovery: createRecoveryEngine({ store, backoffUnitMs: 0 }),
    eventBus,
    committer,
    functionHandlers: registry,
  })
  return { orchestrator, store, events, commits, calls }
}

function ok(summary?: string): FunctionHandler {
  return () => Promise.resolve<PhaseOutput>(summary !== undefined ? { status: 'ok', summary } : { status: 'ok' })
}

function failing(message = 'tests failed'): FunctionHandler {
  return () => Promise.resolve<PhaseOutput>({ status: 'error', summary: message })
}

/** Fails `failures` times, then succeeds */
function flaky(failures: number): FunctionHandler {
  let calls = 0
  return () => {
    calls++
    return Promise.resolve<PhaseOutput>(calls <= failures ? { status: 'error', summary: 'flaky' } : { status: 'ok' })
  }
}

function phase(name: string, dependsOn: string[] = [], extra: Partial<PhaseInput> = {}): PhaseInput {
  return { name, handler: { type: 'function', name }, dependsOn, ...extra }
}

function spec(phases: PhaseInput[], maxParallel = 1, failurePolicy: FailurePolicy = 'stop') {
  return createWorkflowSpec({ name: 'sdlc', phases, maxParallel, failurePolicy })
}

const SDLC = [phase('scout'), phase('plan', ['scout']), phase('build', ['plan'])]

function eventNames(harness: Harness, name: keyof WorkflowEvents): RecordedEvent[] {
  return harness.events.filter((e) => e.name === name)
}

/** Copy of every workflow document as it was written to the store */
function recordWorkflowSaves(store: StateStore): WorkflowState[] {
  const saved: WorkflowState[] = []
  const save = store.save.bind(store)
  vi.spyOn(store, 'save').mockImplementation((key: string, value: unknown) => {
    if (key.startsWith('workflow:')) saved.push(WorkflowStateSchema.parse(structuredClone(value)))
    return save(key, value)
  })
  return saved
}

/** Completed phases with a dependency that has not completed */
function dependencyViolations(state: WorkflowState): string[] {
  return state.spec.phases
    .filter((p) => state.phases[p.name]?.status === 'completed')
    .flatMap((p) =>
      p.dependsOn
        .filter((dep) => state.phases[dep]?.status !== 'completed')
        .map((dep) => `${p.name} completed while ${dep} is ${state.phases[dep]?.status ?? 'missing'}`),
    )
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe('WorkflowOrchestrator - ordering', () => {
  it('runs phases only after their dependencies complete', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: ok(), docs: ok() })

    const result = await h.orchestrator.run(
      spec([phase('docs', ['plan']), phase('build', ['plan']), phase('plan', ['scout']), phase('scout')]),
      createTask({ workflowId: 'wf-order', description: 'find auth code' }),
    )

    expect(result.success).toBe(true)
    expect(result.status).toBe('completed')
    expect(h.calls).toEqual(['scout', 'plan', 'docs', 'build'])
    expect(result.phases.map((p) => p.name)).toEqual(['docs', 'build', 'plan', 'scout'])
    expect(result.phases.every((p) => p.status === 'completed' && p.attempts === 1)).toBe(true)
  })

  it('carries phase summaries forward to later phases', async () => {
    const seen = vi.fn<FunctionHandler>(() => Promise.resolve<PhaseOutput>({ status: 'ok' }))
    const h = await createHarness({ scout: ok('found 3 files'), plan: seen })

    await h.orchestrator.run(
      spec([phase('scout'), phase('plan', ['scout'])]),
      createTask({ workflowId: 'wf-session', description: 'find auth code' }),
    )

    expect(seen.mock.calls[0]?.[0].context.summaries).toEqual({ scout: 'found 3 files' })
  })

  it('skips disabled phases and every phase that depends on them', async () => {
    const h = await createHarness({ scout: ok(), build: ok() })

    const result = await h.orchestrator.run(
      spec([phase('scout'), phase('docs', ['scout'], { enabled: false }), phase('build', ['docs'])]),
      createTask({ workflowId: 'wf-disabled', description: 'x' }),
    )

    expect(result.success).toBe(true)
    expect(h.calls).toEqual(['scout'])
    expect(result.phases.map((p) => [p.name, p.status])).toEqual([
      ['scout', 'completed'],
      ['docs', 'skipped'],
      ['build', 'skipped'],
    ])
    expect(eventNames(h, 'phase:skipped').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-disabled', phase: 'docs', reason: 'disabled' },
      { workflowId: 'wf-disabled', phase: 'build', reason: 'dependency "docs" skipped' },
    ])
  })

  it('never persists a completed phase whose dependencies have not completed', async () => {
    const h = await createHarness({ scout: ok(), build: ok(), lint: failing(), review: ok(), test: ok() })
    const saved = recordWorkflowSaves(h.store)

    const result = await h.orchestrator.run(
      spec(
        [
          phase('scout'),
          phase('docs', ['scout'], { enabled: false }),
          phase('build', ['docs']),
          phase('lint', ['scout'], { maxRetries: 1 }),
          phase('review', ['lint']),
          phase('test', ['scout']),
        ],
        2,
        'continue',
      ),
      createTask({ workflowId: 'wf-invariant', description: 'x' }),
    )

    expect(result.phases.map((p) => [p.name, p.status])).toEqual([
      ['scout', 'completed'],
      ['docs', 'skipped'],
      ['build', 'skipped'],
      ['lint', 'failed'],
      ['review', 'skipped'],
      ['test', 'completed'],
    ])
    expect(saved.length).toBeGreaterThan(0)
    expect(saved.flatMap(dependencyViolations)).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Retries and failure policies
// ---------------------------------------------------------------------------

describe('WorkflowOrchestrator - retries and failure policies', () => {
  it('completes scout → plan → build when build fails twice and maxRetries is 3', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: flaky(2) })

    const result = await h.orchestrator.run(
      spec([phase('scout'), phase('plan', ['scout']), phase('build', ['plan'], { maxRetries: 3 })]),
      createTask({ workflowId: 'wf-retry', description: 'find auth code' }),
    )

    expect(result.success).toBe(true)
    const build = result.phases.find((p) => p.name === 'build')
    expect(build?.status).toBe('completed')
    expect(build?.attempts).toBe(3)
    expect(build?.strategy).toBe('retry-backoff')
    expect(eventNames(h, 'phase:retrying').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-retry', phase: 'build', attempt: 1, category: 'unknown', delayMs: 0 },
      { workflowId: 'wf-retry', phase: 'build', attempt: 2, category: 'unknown', delayMs: 0 },
    ])
  })

  it('makes exactly maxRetries attempts, then halts with a failure checkpoint', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: failing() })

    const result = await h.orchestrator.run(
      spec([phase('scout'), phase('plan', ['scout']), phase('build', ['plan'], { maxRetries: 3 })]),
      createTask({ workflowId: 'wf-bounded', description: 'x' }),
    )

    expect(h.calls.filter((c) => c === 'build')).toHaveLength(3)
    expect(result.success).toBe(false)
    expect(result.status).toBe('halted')
    expect(result.checkpoint).toBe('wf-bounded/failure-build')
    const build = result.phases.find((p) => p.name === 'build')
    expect(build).toMatchObject({
      status: 'failed',
      attempts: 3,
      errorCategory: 'unknown',
      error: 'Phase "build" reported an error: tests failed',
      hint: 'Check the phase logs for details.',
    })

    const checkpoint = await h.store.readCheckpoint('wf-bounded/failure-build')
    expect(checkpoint.workflow_id).toBe('wf-bounded')
    expect(checkpoint.phase_states['build']).toEqual({ status: 'failed', attempts: 3 })
    expect(checkpoint.phase_states['plan']?.status).toBe('completed')
  })

  it('stops scheduling under the stop policy', async () => {
    const h = await createHarness({ a: failing(), b: ok() })

    const result = await h.orchestrator.run(
      spec([phase('a', [], { maxRetries: 1 }), phase('b')]),
      createTask({ workflowId: 'wf-stop', description: 'x' }),
    )

    expect(h.calls).toEqual(['a'])
    expect(result.phases.map((p) => p.status)).toEqual(['failed', 'pending'])
  })

  it('skips dependents and keeps going under the continue policy', async () => {
    const h = await createHarness({ a: failing(), b: ok(), c: ok(), d: ok() })

    const result = await h.orchestrator.run(
      spec([phase('a', [], { maxRetries: 1 }), phase('b', ['a']), phase('c'), phase('d', ['b'])], 1, 'continue'),
      createTask({ workflowId: 'wf-continue', description: 'x' }),
    )

    expect(result.status).toBe('failed')
    expect(result.success).toBe(false)
    expect(result.phases.map((p) => [p.name, p.status])).toEqual([
      ['a', 'failed'],
      ['b', 'skipped'],
      ['c', 'completed'],
      ['d', 'skipped'],
    ])
    expect(eventNames(h, 'phase:skipped').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-continue', phase: 'b', reason: 'dependency "a" failed' },
      { workflowId: 'wf-continue', phase: 'd', reason: 'dependency "a" failed' },
    ])
  })
})

// ---------------------------------------------------------------------------
// Parallel batches
// ---------------------------------------------------------------------------

describe('WorkflowOrchestrator - parallel batches', () => {
  it('runs independent phases together and commits once for the batch', async () => {
    let inFlight = 0
    let peak = 0
    const parallel: FunctionHandler = async () => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await sleep(10)
      inFlight--
      return { status: 'ok' }
    }
    const h = await createHarness({ scout: ok(), lint: parallel, test: parallel, docs: parallel })

    const result = await h.orchestrator.run(
      spec([phase('scout'), phase('lint', ['scout']), phase('test', ['scout']), phase('docs', ['scout'])], 3),
      createTask({ workflowId: 'wf-batch', description: 'x' }),
    )

    expect(result.success).toBe(true)
    expect(peak).toBe(3)
    expect(h.commits).toEqual(['phaseflow: scout', 'phaseflow: lint, test, docs'])
    expect(eventNames(h, 'batch:committed').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-batch', phases: ['scout'], ref: 'ref-1' },
      { workflowId: 'wf-batch', phases: ['lint', 'test', 'docs'], ref: 'ref-2' },
    ])
  })

  it('does not commit sequential phases that opt out', async () => {
    const h = await createHarness({ scout: ok(), plan: ok() })

    await h.orchestrator.run(
      spec([phase('scout', [], { commits: false }), phase('plan', ['scout'])]),
      createTask({ workflowId: 'wf-commits', description: 'x' }),
    )

    expect(h.commits).toEqual(['phaseflow: plan'])
  })

  it('does not commit batched phases that opt out', async () => {
    const h = await createHarness({ scout: ok(), lint: ok(), test: ok() })

    const result = await h.orchestrator.run(
      spec(
        [phase('scout'), phase('lint', ['scout'], { commits: false }), phase('test', ['scout'], { commits: false })],
        2,
      ),
      createTask({ workflowId: 'wf-batch-commits', description: 'x' }),
    )

    expect(result.success).toBe(true)
    expect(h.commits).toEqual(['phaseflow: scout'])
    expect(eventNames(h, 'batch:committed').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-batch-commits', phases: ['scout'], ref: 'ref-1' },
    ])
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('WorkflowOrchestrator - validation', () => {
  it('rejects a cyclic spec before running anything', async () => {
    const h = await createHarness({ a: ok(), b: ok() })

    await expect(
      h.orchestrator.run(spec([phase('a', ['b']), phase('b', ['a'])]), createTask({ description: 'x' })),
    ).rejects.toThrow(WorkflowCycleError)
    expect(h.calls).toEqual([])
  })

  it('rejects a workflow id that already has state', async () => {
    const h = await createHarness({ a: ok() })
    const task = createTask({ workflowId: 'wf-dup', description: 'x' })
    await h.orchestrator.run(spec([phase('a')]), task)

    await expect(h.orchestrator.run(spec([phase('a')]), task)).rejects.toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// Resume and interruption
// ---------------------------------------------------------------------------

describe('WorkflowOrchestrator - resume', () => {
  it('re-runs only the phases that did not complete', async () => {
    let buildWorks = false
    const h = await createHarness({
      scout: ok(),
      plan: ok(),
      build: () => Promise.resolve<PhaseOutput>(buildWorks ? { status: 'ok' } : { status: 'error' }),
    })
    const first = await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-resume', description: 'x' }))
    expect(first.status).toBe('halted')

    buildWorks = true
    h.calls.length = 0
    const second = await h.orchestrator.resume('wf-resume')

    expect(second.success).toBe(true)
    expect(h.calls).toEqual(['build'])
    expect(second.phases.find((p) => p.name === 'build')?.attempts).toBe(1)
    expect(second.checkpoint).toBe('wf-resume/completed-build')
  })

  it('gives repeated checkpoint labels a numeric suffix', async () => {
    const h = await createHarness({ a: failing() })
    await h.orchestrator.run(spec([phase('a', [], { maxRetries: 1 })]), createTask({ workflowId: 'wf-n', description: 'x' }))

    const again = await h.orchestrator.resume('wf-n')

    expect(again.checkpoint).toBe('wf-n/failure-a-2')
  })

  it('resumes from the newest checkpoint when the live state is corrupt', async () => {
    const stateDir = join(workDir, 'file-state')
    let buildWorks = false
    const h = await createHarness(
      {
        scout: ok(),
        plan: ok(),
        build: () => Promise.resolve<PhaseOutput>(buildWorks ? { status: 'ok' } : { status: 'error' }),
      },
      { store: createFileStateStore(stateDir) },
    )
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-corrupt', description: 'x' }))
    await writeFile(join(stateDir, 'documents', `${encodeURIComponent('workflow:wf-corrupt')}.json`), '{ nope')

    buildWorks = true
    const result = await h.orchestrator.resume('wf-corrupt')

    expect(result.success).toBe(true)
    expect(eventNames(h, 'checkpoint:restored').map((e) => e.payload)).toEqual([
      { workflowId: 'wf-corrupt', name: 'wf-corrupt/failure-build' },
    ])
  })

  it('resumes from a named checkpoint', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: ok() })
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-named', description: 'x' }))
    h.calls.length = 0

    const result = await h.orchestrator.resume('wf-named', { checkpoint: 'wf-named/completed-scout' })

    expect(result.success).toBe(true)
    expect(h.calls).toEqual(['plan', 'build'])
    expect(result.checkpoint).toBe('wf-named/completed-build-2')
  })

  it('checkpoints only the state document of its own workflow', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: ok() })
    await h.store.save('recovery:telemetry', { records: [] })
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-a', description: 'x' }))
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-b', description: 'x' }))

    const checkpoint = await h.store.readCheckpoint('wf-b/completed-build')
    expect(Object.keys(checkpoint.documents)).toEqual(['workflow:wf-b'])
    expect(checkpoint.keys).toEqual(['workflow:wf-b'])
  })

  it('rejects a named checkpoint that belongs to another workflow', async () => {
    const h = await createHarness({ scout: ok(), plan: ok(), build: ok() })
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-a', description: 'x' }))
    await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-b', description: 'x' }))

    await expect(h.orchestrator.resume('wf-b', { checkpoint: 'wf-a/completed-scout' })).rejects.toThrow(ConfigError)
    await expect(h.orchestrator.resume('wf-b', { checkpoint: 'wf-a/completed-scout' })).rejects.toThrow(
      'Checkpoint "wf-a/completed-scout" belongs to workflow "wf-a", not "wf-b"',
    )
  })

  it('throws WorkflowNotFoundError when nothing is stored', async () => {
    const h = await createHarness({})

    await expect(h.orchestrator.resume('wf-missing')).rejects.toThrow(WorkflowNotFoundError)
  })

  it('halts with an interrupted checkpoint when aborted', async () => {
    const controller = new AbortController()
    const h = await createHarness({
      scout: ok(),
      plan: () => {
        controller.abort()
        return Promise.resolve<PhaseOutput>({ status: 'ok' })
      },
      build: ok(),
    })

    const result = await h.orchestrator.run(spec(SDLC), createTask({ workflowId: 'wf-abort', description: 'x' }), {
      signal: controller.signal,
    })

    expect(result.status).toBe('halted')
    expect(result.checkpoint).toBe('wf-abort/interrupted')
    expect(h.calls).toEqual(['scout', 'plan'])
    expect(result.phases.map((p) => p.status)).toEqual(['completed', 'completed', 'pending'])
  })
})
