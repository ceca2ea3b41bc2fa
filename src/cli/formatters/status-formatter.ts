/**
 * Human-readable formatters for `phaseflow run`, `resume`, `status` and
 * `list`.
 */

import type { PhaseOutcome, PhaseState, WorkflowResult, WorkflowState } from '../../core/types.js'
import type { WorkflowSummary } from '../../core/engine.js'
import { formatDuration } from '../../utils/helpers.js'
import { formatTable } from '../utils/formatting.js'

const PHASE_HEADERS = ['Phase', 'Status', 'Attempts', 'Duration', 'Detail']
const PHASE_KEYS = ['phase', 'status', 'attempts', 'duration', 'detail']

/** Error (with category and hint) for failed phases, otherwise the summary */
function phaseDetail(entry: {
  error?: string
  errorCategory?: string
  hint?: string
  summary?: string
}): string {
  if (entry.error !== undefined) {
    const category = entry.errorCategory !== undefined ? `[${entry.errorCategory}] ` : ''
    const hint = entry.hint !== undefined ? ` (${entry.hint})` : ''
    return `${category}${entry.error}${hint}`
  }
  return entry.summary ?? ''
}

function phaseDuration(state: PhaseState): string {
  if (state.startedAt === undefined || state.finishedAt === undefined) return '-'
  const ms = Date.parse(state.finishedAt) - Date.parse(state.startedAt)
  return Number.isNaN(ms) || ms < 0 ? '-' : formatDuration(ms)
}

// ---------------------------------------------------------------------------
// renderWorkflowStatus
// ---------------------------------------------------------------------------

/**
 * Render a persisted workflow state.
 *
 * Output sections:
 *  - Header: Workflow <id>  Spec: <name>  Status: <status>
 *  - Task description and last checkpoint
 *  - Phase table in declaration order
 */
export function renderWorkflowStatus(state: WorkflowState): string {
  const lines: string[] = []
  lines.push(`Workflow ${state.workflowId}  Spec: ${state.spec.name}  Status: ${state.status}`)
  lines.push(`Task: ${state.task.description}`)
  if (state.lastCheckpoint !== undefined) {
    lines.push(`Last checkpoint: ${state.lastCheckpoint}`)
  }
  lines.push('')

  const rows = state.spec.phases.map((phase) => {
    const current = state.phases[phase.name] ?? { status: 'pending', attempts: 0 }
    return {
      phase: phase.name,
      status: current.status,
      attempts: String(current.attempts),
      duration: phaseDuration(current),
      detail: phaseDetail({ ...current, summary: current.result?.summary }),
    }
  })
  lines.push(formatTable(PHASE_HEADERS, rows, PHASE_KEYS))
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderWorkflowResult
// ---------------------------------------------------------------------------

function outcomeRow(outcome: PhaseOutcome): Record<string, string> {
  return {
    phase: outcome.name,
    status: outcome.status,
    attempts: String(outcome.attempts),
    detail: phaseDetail({ ...outcome, summary: outcome.output?.summary }),
  }
}

/** Render the result returned by run() or resume() */
export function renderWorkflowResult(result: WorkflowResult): string {
  const lines: string[] = []
  lines.push(`Workflow ${result.workflowId} ${result.status}`)
  if (result.fatalError !== undefined) {
    lines.push(`Fatal error [${result.fatalError.category}]: ${result.fatalError.message}`)
  }
  if (result.phases.length > 0) {
    lines.push('')
    lines.push(
      formatTable(['Phase', 'Status', 'Attempts', 'Detail'], result.phases.map(outcomeRow), [
        'phase',
        'status',
        'attempts',
        'detail',
      ]),
    )
  }
  if (result.checkpoint !== undefined) {
    lines.push('')
    lines.push(`Checkpoint: ${result.checkpoint}`)
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderWorkflowList
// ---------------------------------------------------------------------------

export function renderWorkflowList(workflows: WorkflowSummary[]): string {
  if (workflows.length === 0) return 'No workflows found.'
  const rows = workflows.map((w) => ({
    workflowId: w.workflowId,
    specName: w.specName,
    status: w.status,
    updatedAt: w.updatedAt,
    lastCheckpoint: w.lastCheckpoint ?? '-',
  }))
  return formatTable(
    ['Workflow', 'Spec', 'Status', 'Updated', 'Last checkpoint'],
    rows,
    ['workflowId', 'specName', 'status', 'updatedAt', 'lastCheckpoint'],
  )
}
