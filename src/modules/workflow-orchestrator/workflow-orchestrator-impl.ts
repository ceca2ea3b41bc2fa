/**
 * WorkflowOrchestrator implementation.
 *
 * Factory: createWorkflowOrchestrator(deps) → WorkflowOrchestrator
 *
 * The orchestrator owns WorkflowState. It persists the state document
 * (`workflow:<id>`) after every phase transition, from its own control flow
 * only; handlers never write it. Every attempt of a phase runs through the
 * recovery engine, and each settled phase is reported on the event bus.
 *
 * Checkpoints snapshot only the workflow's own state document. Their names
 * are `<workflowId>/<label>`, with a numeric suffix when a name is taken:
 *   completed-<phase>   after a phase completes
 *   failure-<phase>     when the stop policy halts the workflow
 *   interrupted         when the run is aborted
 */

import type {
  Phase,
  PhaseName,
  Task,
  WorkflowId,
  WorkflowResult,
  WorkflowSpec,
  WorkflowState,
} from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { WorkflowEvents } from '../../core/event-bus.types.js'
import {
  ConfigError,
  PhaseflowError,
  StateCorruptionError,
  WorkflowNotFoundError,
} from '../../core/errors.js'
import type { StateStore } from '../../persistence/state-store.js'
import {
  WorkflowStateSchema,
  type CheckpointPhaseState,
} from '../../persistence/schemas/workflow-state.js'
import type { RecoveryEngine } from '../../recovery/recovery-engine.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { maskSecrets } from '../../utils/masking.js'
import type { DeterministicDiscovery } from '../discovery/deterministic-discovery.js'
import { NoopCommitter, type WorkspaceCommitter } from '../git/workspace-committer.js'
import { ParallelAggregator } from '../parallel-aggregator/parallel-aggregator.js'
import type { PhaseExecutor } from '../phase-executor/phase-executor.js'
import { assertValidWorkflow, type FunctionHandlerLookup } from '../workflow-spec/spec-validator.js'
import { Session } from './session.js'
import {
  blockedDependents,
  createInitialState,
  pendingPhases,
  phaseState,
  readyPhases,
  resetForResume,
  toOutcomes,
  transitionPhase,
  unreachablePhases,
} from './workflow-state.js'
import { workflowStateKey } from './task.js'
import type { ResumeOptions, RunOptions, WorkflowOrchestrator } from './workflow-orchestrator.js'

const logger = createLogger('workflow-orchestrator')

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface WorkflowOrchestratorDeps {
  store: StateStore
  executor: PhaseExecutor
  recovery: RecoveryEngine
  eventBus: TypedEventBus
  /** Performs the workspace commit after a phase or batch; no commits when absent */
  committer?: WorkspaceCommitter
  /** Receives the artifacts of completed workflows for informed discovery */
  discovery?: DeterministicDiscovery
  /** Used to reject specs naming unregistered function handlers */
  functionHandlers?: FunctionHandlerLookup
}

// ---------------------------------------------------------------------------
// Internal types
// ---------------------------------------------------------------------------

interface RunContext {
  readonly key: string
  readonly spec: WorkflowSpec
  readonly state: WorkflowState
  readonly session: Session
  readonly signal?: AbortSignal
}

interface PhaseRunResult {
  phase: PhaseName
  succeeded: boolean
  aborted: boolean
}

type ResumeSource =
  | { kind: 'state'; state: WorkflowState; checkpoint?: string }
  | { kind: 'corrupt'; message: string }

function nowIso(): string {
  return new Date().toISOString()
}

function rawLogPathOf(error: Error): string | undefined {
  if (!(error instanceof PhaseflowError)) return undefined
  const path = error.context['rawLogPath']
  return typeof path === 'string' ? path : undefined
}

function checkpointPhaseStates(state: WorkflowState): Record<PhaseName, CheckpointPhaseState> {
  const phases: Record<PhaseName, CheckpointPhaseState> = {}
  for (const [name, current] of Object.entries(state.phases)) {
    phases[name] = {
      status: current.status,
      attempts: current.attempts,
      ...(current.result !== undefined ? { result: current.result } : {}),
    }
  }
  return phases
}

// ---------------------------------------------------------------------------
// WorkflowOrchestratorImpl
// ---------------------------------------------------------------------------

export class WorkflowOrchestratorImpl implements WorkflowOrchestrator {
  private readonly _deps: WorkflowOrchestratorDeps
  private readonly _aggregator: ParallelAggregator

  constructor(deps: WorkflowOrchestratorDeps) {
    this._deps = deps
    this._aggregator = new ParallelAggregator(deps.committer ?? new NoopCommitter())
  }

  async run(spec: WorkflowSpec, task: Task, options: RunOptions = {}): Promise<WorkflowResult> {
    assertValidWorkflow(spec, this._deps.functionHandlers)

    const key = workflowStateKey(task.workflowId)
    if (await this._stateExists(key)) {
      throw new ConfigError(
        `Workflow "${task.workflowId}" already exists; resume it or choose another workflow id`,
        { workflowId: task.workflowId },
      )
    }

    const ctx: RunContext = {
      key,
      spec,
      state: createInitialState(spec, task),
      session: new Session(),
      signal: options.signal,
    }
    for (const phase of spec.phases) {
      if (!phase.enabled) {
        transitionPhase(ctx.state, phase.name, 'skipped', { finishedAt: nowIso() })
        this._emit('phase:skipped', { workflowId: task.workflowId, phase: phase.name, reason: 'disabled' })
      }
    }

    logger.info({ workflowId: task.workflowId, spec: spec.name, phases: spec.phases.length }, 'Starting workflow')
    this._emit('workflow:started', { workflowId: task.workflowId, specName: spec.name, resumed: false })
    return this._execute(ctx)
  }

  async resume(workflowId: WorkflowId, options: ResumeOptions = {}): Promise<WorkflowResult> {
    const key = workflowStateKey(workflowId)
    const source = await this._loadForResume(workflowId, key, options.checkpoint)

    if (source.kind === 'corrupt') {
      logger.error({ workflowId }, source.message)
      this._emit('workflow:finished', { workflowId, status: 'failed', success: false })
      return {
        workflowId,
        success: false,
        status: 'failed',
        phases: [],
        fatalError: { category: 'state-corruption', message: source.message },
      }
    }

    const { state } = source
    const spec = state.spec
    assertValidWorkflow(spec, this._deps.functionHandlers)
    const reset = resetForResume(spec, state)
    const ctx: RunContext = { key, spec, state, session: new Session(state.session), signal: options.signal }

    if (source.checkpoint !== undefined) {
      this._emit('checkpoint:restored', { workflowId, name: source.checkpoint })
    }
    logger.info({ workflowId, reset, checkpoint: source.checkpoint }, 'Resuming workflow')
    this._emit('workflow:started', { workflowId, specName: spec.name, resumed: true })
    return this._execute(ctx)
  }

  // -------------------------------------------------------------------------
  // Main loop
  // -------------------------------------------------------------------------

  private async _execute(ctx: RunContext): Promise<WorkflowResult> {
    let fatalError: WorkflowResult['fatalError']
    try {
      ctx.state.status = 'running'
      await this._persist(ctx)
      await this._loop(ctx)
    } catch (err) {
      const error = toError(err)
      fatalError = { category: this._deps.recovery.classify(err), message: maskSecrets(error.message) }
      logger.error({ err: error, workflowId: ctx.state.workflowId }, 'Workflow stopped by an unexpected error')
      ctx.state.status = 'failed'
      try {
        await this._persist(ctx)
      } catch (persistErr) {
        logger.error({ err: persistErr, workflowId: ctx.state.workflowId }, 'Failed to persist final workflow state')
      }
    }
    return this._finish(ctx, fatalError)
  }

  private async _loop(ctx: RunContext): Promise<void> {
    const { spec, state } = ctx

    for (;;) {
      if (ctx.signal?.aborted === true) {
        await this._interrupt(ctx)
        return
      }

      await this._skipUnreachable(ctx)

      const pending = pendingPhases(spec, state)
      if (pending.length === 0) break

      const ready = readyPhases(spec, state)
      if (ready.length === 0) {
        for (const phase of pending) {
          await this._skip(ctx, phase.name, 'dependencies can no longer be satisfied')
        }
        break
      }

      const batch = ready.slice(0, spec.maxParallel)
      const [first] = batch
      const results =
        batch.length === 1 && first !== undefined
          ? [await this._runPhase(ctx, first, true)]
          : await this._runBatch(ctx, batch)

      if (ctx.signal?.aborted || results.some((r) => r.aborted)) {
        await this._interrupt(ctx)
        return
      }

      for (const result of results) {
        if (result.succeeded) continue
        if (spec.failurePolicy === 'stop') {
          await this._halt(ctx, result.phase)
          return
        }
        for (const dependent of blockedDependents(spec, state, result.phase)) {
          await this._skip(ctx, dependent, `dependency "${result.phase}" failed`)
        }
      }
    }

    const anyFailed = Object.values(state.phases).some((p) => p.status === 'failed')
    state.status = anyFailed ? 'failed' : 'completed'
    await this._persist(ctx)
    if (state.status === 'completed') await this._recordDiscoveryOutcome(ctx)
  }

  private async _runBatch(ctx: RunContext, batch: Phase[]): Promise<PhaseRunResult[]> {
    const workflowId = ctx.state.workflowId
    const names = batch.map((p) => p.name)
    this._emit('batch:started', { workflowId, phases: names })

    const result = await this._aggregator.runBatch(
      batch,
      ctx.spec.maxParallel,
      (phase) => this._runPhase(ctx, phase, false),
      { signal: ctx.signal },
    )

    const results: PhaseRunResult[] = []
    for (const outcome of result.outcomes) {
      if (!outcome.ok) throw outcome.error
      results.push(outcome.value)
    }

    if (result.commit?.committed === true && result.commit.ref !== undefined) {
      this._emit('batch:committed', { workflowId, phases: result.committedPhases, ref: result.commit.ref })
    }
    for (const r of results) {
      if (r.succeeded) await this._checkpoint(ctx, `completed-${r.phase}`)
    }
    return results
  }

  // -------------------------------------------------------------------------
  // Single phase
  // -------------------------------------------------------------------------

  /**
   * Run one phase to a terminal status. Retries happen inside; the promise
   * only rejects when state cannot be persisted.
   */
  private async _runPhase(ctx: RunContext, phase: Phase, sequential: boolean): Promise<PhaseRunResult> {
    const { state } = ctx
    const workflowId = state.workflowId

    transitionPhase(state, phase.name, 'running', { startedAt: nowIso(), attempts: 0 })
    await this._persist(ctx)

    const outcome = await this._deps.recovery.handle(
      (attempt) => {
        phaseState(state, phase.name).attempts = attempt
        this._emit('phase:started', { workflowId, phase: phase.name, attempt })
        return this._deps.executor.execute({
          task: state.task,
          phase,
          attempt,
          session: ctx.session.snapshot(),
          signal: ctx.signal,
        })
      },
      {
        operation: `${workflowId}:${phase.name}`,
        maxAttempts: phase.maxRetries,
        signal: ctx.signal,
        // The in-memory state is authoritative; rewriting it replaces a damaged document
        restoreCheckpoint: () => this._persist(ctx),
        onRetry: async (notice) => {
          this._emit('phase:retrying', {
            workflowId,
            phase: phase.name,
            attempt: notice.attempt,
            category: notice.category,
            delayMs: notice.delayMs,
          })
          await this._persist(ctx)
        },
      },
    )

    if (outcome.succeeded) {
      const { output, rawLogPath } = outcome.result
      transitionPhase(state, phase.name, 'completed', {
        attempts: outcome.attempts,
        result: output,
        finishedAt: nowIso(),
        ...(outcome.attempts > 1 ? { strategy: outcome.strategy } : {}),
        ...(rawLogPath !== undefined ? { rawLogPath } : {}),
      })
      ctx.session.record(phase.name, output, phase.handler.type === 'discovery')
      state.session = ctx.session.snapshot()
      await this._persist(ctx)
      this._emit('phase:completed', { workflowId, phase: phase.name, attempts: outcome.attempts, output })

      if (sequential) {
        if (phase.commits) await this._commit(ctx, [phase.name])
        await this._checkpoint(ctx, `completed-${phase.name}`)
      }
      return { phase: phase.name, succeeded: true, aborted: false }
    }

    const aborted = ctx.signal?.aborted === true
    const message = aborted ? 'Interrupted' : maskSecrets(outcome.error.message)
    const rawLogPath = rawLogPathOf(outcome.error)
    transitionPhase(state, phase.name, 'failed', {
      attempts: outcome.attempts,
      error: message,
      errorCategory: outcome.category,
      strategy: outcome.strategy,
      hint: outcome.fallback.hint,
      finishedAt: nowIso(),
      ...(rawLogPath !== undefined ? { rawLogPath } : {}),
    })
    await this._persist(ctx)
    this._emit('phase:failed', {
      workflowId,
      phase: phase.name,
      attempts: outcome.attempts,
      category: outcome.category,
      message,
    })
    logger.warn(
      { workflowId, phase: phase.name, attempts: outcome.attempts, category: outcome.category },
      'Phase failed',
    )
    return { phase: phase.name, succeeded: false, aborted }
  }

  /** Skip pending phases cut off by a failed or skipped dependency, transitively */
  private async _skipUnreachable(ctx: RunContext): Promise<void> {
    for (;;) {
      const unreachable = unreachablePhases(ctx.spec, ctx.state)
      if (unreachable.length === 0) return
      for (const { phase, dependency, dependencyStatus } of unreachable) {
        await this._skip(ctx, phase, `dependency "${dependency}" ${dependencyStatus}`)
      }
    }
  }

  private async _skip(ctx: RunContext, phase: PhaseName, reason: string): Promise<void> {
    transitionPhase(ctx.state, phase, 'skipped', { finishedAt: nowIso() })
    await this._persist(ctx)
    this._emit('phase:skipped', { workflowId: ctx.state.workflowId, phase, reason })
  }

  private async _commit(ctx: RunContext, phases: PhaseName[]): Promise<void> {
    const committer = this._deps.committer
    if (committer === undefined) return
    try {
      const result = await committer.commit(`phaseflow: ${phases.join(', ')}`)
      if (result.committed && result.ref !== undefined) {
        this._emit('batch:committed', { workflowId: ctx.state.workflowId, phases, ref: result.ref })
      }
    } catch (err) {
      logger.error({ err, workflowId: ctx.state.workflowId, phases }, 'Workspace commit failed')
    }
  }

  // -------------------------------------------------------------------------
  // Halting, checkpoints and persistence
  // -------------------------------------------------------------------------

  private async _halt(ctx: RunContext, failedPhase: PhaseName): Promise<void> {
    ctx.state.status = 'halted'
    await this._checkpoint(ctx, `failure-${failedPhase}`)
    logger.warn({ workflowId: ctx.state.workflowId, phase: failedPhase }, 'Workflow halted by failure policy')
  }

  private async _interrupt(ctx: RunContext): Promise<void> {
    ctx.state.status = 'halted'
    await this._checkpoint(ctx, 'interrupted')
    logger.warn({ workflowId: ctx.state.workflowId }, 'Workflow interrupted')
  }

  private async _checkpoint(ctx: RunContext, label: string): Promise<void> {
    const { state } = ctx
    const base = `${state.workflowId}/${label}`
    const taken = new Set((await this._deps.store.listCheckpoints()).map((c) => c.name))
    let name = base
    for (let n = 2; taken.has(name); n++) name = `${base}-${String(n)}`

    state.lastCheckpoint = name
    await this._persist(ctx)
    await this._deps.store.checkpoint(name, {
      workflowId: state.workflowId,
      phaseStates: checkpointPhaseStates(state),
      keys: [ctx.key],
    })
    this._emit('checkpoint:created', { workflowId: state.workflowId, name })
  }

  private async _persist(ctx: RunContext): Promise<void> {
    ctx.state.updatedAt = nowIso()
    await this._deps.store.save(ctx.key, ctx.state)
  }

  private async _stateExists(key: string): Promise<boolean> {
    try {
      return (await this._deps.store.load(key)) !== undefined
    } catch (err) {
      if (err instanceof StateCorruptionError) return true
      throw err
    }
  }

  /**
   * Pick the state to resume from: the named checkpoint, else the live
   * document, else the newest readable checkpoint of the workflow.
   */
  private async _loadForResume(workflowId: WorkflowId, key: string, checkpoint?: string): Promise<ResumeSource> {
    const store = this._deps.store

    if (checkpoint !== undefined) {
      const document = await store.readCheckpoint(checkpoint)
      if (document.workflow_id !== undefined && document.workflow_id !== workflowId) {
        throw new ConfigError(
          `Checkpoint "${checkpoint}" belongs to workflow "${document.workflow_id}", not "${workflowId}"`,
          { checkpoint, workflowId, checkpointWorkflowId: document.workflow_id },
        )
      }
      const snapshot = document.documents[key]
      if (snapshot === undefined) throw new WorkflowNotFoundError(workflowId)
      const parsed = WorkflowStateSchema.safeParse(snapshot)
      if (!parsed.success) {
        return { kind: 'corrupt', message: `Checkpoint "${checkpoint}" holds an unreadable state for "${workflowId}"` }
      }
      return { kind: 'state', state: parsed.data, checkpoint }
    }

    let live: unknown
    let liveDamaged = false
    try {
      live = await store.load(key)
    } catch (err) {
      if (!(err instanceof StateCorruptionError)) throw err
      logger.warn({ err, workflowId }, 'Workflow state is corrupt; looking for a checkpoint')
      liveDamaged = true
    }
    if (live !== undefined) {
      const parsed = WorkflowStateSchema.safeParse(live)
      if (parsed.success) return { kind: 'state', state: parsed.data }
      logger.warn({ workflowId, issues: parsed.error.issues.length }, 'Workflow state is malformed; looking for a checkpoint')
      liveDamaged = true
    }

    const checkpoints = await store.listCheckpoints(workflowId)
    for (const summary of [...checkpoints].reverse()) {
      try {
        const document = await store.readCheckpoint(summary.name)
        const parsed = WorkflowStateSchema.safeParse(document.documents[key])
        if (parsed.success) return { kind: 'state', state: parsed.data, checkpoint: summary.name }
      } catch (err) {
        logger.warn({ err, checkpoint: summary.name }, 'Skipping unreadable checkpoint')
      }
    }

    if (!liveDamaged && checkpoints.length === 0) throw new WorkflowNotFoundError(workflowId)
    return { kind: 'corrupt', message: `No readable state or checkpoint for workflow "${workflowId}"` }
  }

  private async _recordDiscoveryOutcome(ctx: RunContext): Promise<void> {
    const discovery = this._deps.discovery
    if (discovery === undefined) return
    const artifacts = ctx.spec.phases
      .filter((phase) => phase.handler.type !== 'discovery')
      .flatMap((phase) => ctx.state.phases[phase.name]?.result?.artifacts ?? [])
    if (artifacts.length > 0) await discovery.recordOutcome(ctx.state.task, artifacts)
  }

  private _finish(ctx: RunContext, fatalError: WorkflowResult['fatalError']): WorkflowResult {
    const { state } = ctx
    const success = state.status === 'completed'
    this._emit('workflow:finished', { workflowId: state.workflowId, status: state.status, success })
    logger.info({ workflowId: state.workflowId, status: state.status }, 'Workflow finished')
    return {
      workflowId: state.workflowId,
      success,
      status: state.status,
      phases: toOutcomes(ctx.spec, state),
      ...(state.lastCheckpoint !== undefined ? { checkpoint: state.lastCheckpoint } : {}),
      ...(fatalError !== undefined ? { fatalError } : {}),
    }
  }

  private _emit<K extends keyof WorkflowEvents>(event: K, payload: WorkflowEvents[K]): void {
    this._deps.eventBus.emit(event, payload)
  }
}

export function createWorkflowOrchestrator(deps: WorkflowOrchestratorDeps): WorkflowOrchestrator {
  return new WorkflowOrchestratorImpl(deps)
}
