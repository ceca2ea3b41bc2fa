/**
 * ParallelAggregator: runs a batch of independent phases with bounded
 * concurrency and performs exactly one workspace commit for the batch.
 *
 * Phases in a batch run with their own commits deferred. Once every launched
 * phase has settled, a single commit is made if at least one of them
 * succeeded with `commits` set. Outcomes are reported in declaration order regardless of the
 * order in which phases finish.
 */

import type { Phase, PhaseName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import type { CommitResult, WorkspaceCommitter } from '../git/workspace-committer.js'

const logger = createLogger('parallel-aggregator')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SucceededFlag {
  succeeded: boolean
}

export type PhaseRunOutcome<R extends SucceededFlag> =
  | { phase: PhaseName; ok: true; value: R }
  | { phase: PhaseName; ok: false; error: Error }

export interface BatchResult<R extends SucceededFlag> {
  /** One entry per launched phase, in declaration order */
  outcomes: PhaseRunOutcome<R>[]
  /** Succeeded phases that take part in the batch commit, in declaration order */
  committedPhases: PhaseName[]
  /** Absent when no committing phase succeeded */
  commit?: CommitResult
  /** Set when the batch commit itself failed */
  commitError?: Error
}

export interface BatchOptions {
  /** Commit message; defaults to one naming the succeeded phases */
  message?: string
  /** Once aborted, no further phases are launched */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// ParallelAggregator
// ---------------------------------------------------------------------------

export class ParallelAggregator {
  constructor(private readonly _committer: WorkspaceCommitter) {}

  async runBatch<R extends SucceededFlag>(
    phases: readonly Phase[],
    maxParallel: number,
    runPhase: (phase: Phase) => Promise<R>,
    options: BatchOptions = {},
  ): Promise<BatchResult<R>> {
    const slots: (PhaseRunOutcome<R> | undefined)[] = new Array<PhaseRunOutcome<R> | undefined>(phases.length)
    const limit = Math.max(1, Math.min(maxParallel, phases.length))
    let next = 0

    const worker = async (): Promise<void> => {
      for (;;) {
        if (options.signal?.aborted === true) return
        const index = next++
        const phase = phases[index]
        if (phase === undefined) return
        try {
          slots[index] = { phase: phase.name, ok: true, value: await runPhase(phase) }
        } catch (err) {
          slots[index] = { phase: phase.name, ok: false, error: toError(err) }
        }
      }
    }

    logger.debug({ phases: phases.map((p) => p.name), limit }, 'Running batch')
    await Promise.all(Array.from({ length: limit }, () => worker()))

    const outcomes = slots.filter((slot): slot is PhaseRunOutcome<R> => slot !== undefined)
    const committing = new Set(phases.filter((p) => p.commits).map((p) => p.name))
    const committedPhases = outcomes
      .filter((o) => o.ok && o.value.succeeded && committing.has(o.phase))
      .map((o) => o.phase)
    if (committedPhases.length === 0) {
      logger.info({ phases: outcomes.map((o) => o.phase) }, 'No committing phase in batch succeeded; skipping commit')
      return { outcomes, committedPhases }
    }

    const message = options.message ?? `phaseflow: ${committedPhases.join(', ')}`
    try {
      const commit = await this._committer.commit(message)
      return { outcomes, committedPhases, commit }
    } catch (err) {
      const commitError = toError(err)
      logger.error({ err: commitError, phases: committedPhases }, 'Batch commit failed')
      return { outcomes, committedPhases, commitError }
    }
  }
}

export function createParallelAggregator(committer: WorkspaceCommitter): ParallelAggregator {
  return new ParallelAggregator(committer)
}
