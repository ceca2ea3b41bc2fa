/**
 * Phase state machine and scheduling helpers over WorkflowState.
 *
 * Legal transitions:
 *   pending → running | skipped
 *   running → completed | failed | skipped
 * Everything else raises InvalidTransitionError. Resuming a workflow resets
 * phases through resetForResume(), which is not a transition.
 */

import type {
  Phase,
  PhaseName,
  PhaseOutcome,
  PhaseState,
  PhaseStatus,
  Task,
  WorkflowSpec,
  WorkflowState,
} from '../../core/types.js'
import { InvalidTransitionError } from '../../core/errors.js'
import { transitiveDependents } from '../workflow-spec/dependency-resolver.js'

export const PHASE_TRANSITIONS: Readonly<Record<PhaseStatus, readonly PhaseStatus[]>> = {
  pending: ['running', 'skipped'],
  running: ['completed', 'failed', 'skipped'],
  completed: [],
  failed: [],
  skipped: [],
}

export function canTransition(from: PhaseStatus, to: PhaseStatus): boolean {
  return PHASE_TRANSITIONS[from].includes(to)
}

export function createInitialState(spec: WorkflowSpec, task: Task, now = new Date()): WorkflowState {
  const phases: Record<PhaseName, PhaseState> = {}
  for (const phase of spec.phases) {
    phases[phase.name] = { status: 'pending', attempts: 0 }
  }
  const timestamp = now.toISOString()
  return {
    workflowId: task.workflowId,
    spec,
    task,
    status: 'pending',
    phases,
    session: { summaries: {}, discoveredItems: [] },
    createdAt: timestamp,
    updatedAt: timestamp,
  }
}

export function phaseState(state: WorkflowState, name: PhaseName): PhaseState {
  const current = state.phases[name]
  if (current === undefined) {
    throw new InvalidTransitionError(name, 'unknown', 'any')
  }
  return current
}

/**
 * Move a phase to `to`, merging `patch` into its state.
 * @throws {InvalidTransitionError}
 */
export function transitionPhase(
  state: WorkflowState,
  name: PhaseName,
  to: PhaseStatus,
  patch: Partial<Omit<PhaseState, 'status'>> = {},
): PhaseState {
  const current = phaseState(state, name)
  if (!canTransition(current.status, to)) {
    throw new InvalidTransitionError(name, current.status, to)
  }
  const next: PhaseState = { ...current, ...patch, status: to }
  state.phases[name] = next
  return next
}

// ---------------------------------------------------------------------------
// Scheduling
// ---------------------------------------------------------------------------

/** Pending phases whose dependencies have all completed, in declaration order */
export function readyPhases(spec: WorkflowSpec, state: WorkflowState): Phase[] {
  return spec.phases.filter(
    (phase) =>
      state.phases[phase.name]?.status === 'pending' &&
      phase.dependsOn.every((dep) => state.phases[dep]?.status === 'completed'),
  )
}

export interface UnreachablePhase {
  phase: PhaseName
  dependency: PhaseName
  dependencyStatus: 'failed' | 'skipped'
}

/**
 * Pending phases with a dependency that ended without completing (a disabled
 * phase counts as skipped), in declaration order. Callers mark them skipped.
 */
export function unreachablePhases(spec: WorkflowSpec, state: WorkflowState): UnreachablePhase[] {
  const unreachable: UnreachablePhase[] = []
  for (const phase of spec.phases) {
    if (state.phases[phase.name]?.status !== 'pending') continue
    for (const dependency of phase.dependsOn) {
      const status = state.phases[dependency]?.status
      if (status === 'failed' || status === 'skipped') {
        unreachable.push({ phase: phase.name, dependency, dependencyStatus: status })
        break
      }
    }
  }
  return unreachable
}

export function pendingPhases(spec: WorkflowSpec, state: WorkflowState): Phase[] {
  return spec.phases.filter((phase) => state.phases[phase.name]?.status === 'pending')
}

/**
 * Pending transitive dependents of `failed`, in declaration order.
 * Callers mark them skipped.
 */
export function blockedDependents(spec: WorkflowSpec, state: WorkflowState, failed: PhaseName): PhaseName[] {
  const nodes = spec.phases.map((p) => ({ name: p.name, dependsOn: p.dependsOn }))
  return transitiveDependents(nodes, failed).filter((name) => state.phases[name]?.status === 'pending')
}

/**
 * Prepare a persisted state for another run: failed, skipped and stale
 * running phases go back to pending with a fresh attempt budget. Disabled
 * phases stay skipped.
 *
 * @returns names of the phases that were reset
 */
export function resetForResume(spec: WorkflowSpec, state: WorkflowState): PhaseName[] {
  const reset: PhaseName[] = []
  for (const phase of spec.phases) {
    const current = state.phases[phase.name]
    if (current === undefined) {
      state.phases[phase.name] = { status: 'pending', attempts: 0 }
      reset.push(phase.name)
      continue
    }
    if (current.status === 'completed' || current.status === 'pending') continue
    if (current.status === 'skipped' && !phase.enabled) continue
    state.phases[phase.name] = { status: 'pending', attempts: 0 }
    reset.push(phase.name)
  }
  return reset
}

export function toOutcomes(spec: WorkflowSpec, state: WorkflowState): PhaseOutcome[] {
  return spec.phases.map((phase) => {
    const current = state.phases[phase.name] ?? { status: 'pending', attempts: 0 }
    const outcome: PhaseOutcome = { name: phase.name, status: current.status, attempts: current.attempts }
    if (current.strategy !== undefined) outcome.strategy = current.strategy
    if (current.errorCategory !== undefined) outcome.errorCategory = current.errorCategory
    if (current.error !== undefined) outcome.error = current.error
    if (current.hint !== undefined) outcome.hint = current.hint
    if (current.result !== undefined) outcome.output = current.result
    return outcome
  })
}
