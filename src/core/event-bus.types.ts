/**
 * WorkflowEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "phase:completed", "batch:committed")
 */

import type {
  ErrorCategory,
  PhaseName,
  PhaseOutput,
  WorkflowId,
  WorkflowStatus,
} from './types.js'

/**
 * Complete typed map of all events emitted on the workflow event bus.
 * Use `keyof WorkflowEvents` to constrain event keys.
 */
export interface WorkflowEvents {
  // -------------------------------------------------------------------------
  // Workflow lifecycle
  // -------------------------------------------------------------------------

  /** A workflow run started (fresh or resumed) */
  'workflow:started': { workflowId: WorkflowId; specName: string; resumed: boolean }

  /** A workflow run reached a terminal status */
  'workflow:finished': { workflowId: WorkflowId; status: WorkflowStatus; success: boolean }

  // -------------------------------------------------------------------------
  // Phase lifecycle
  // -------------------------------------------------------------------------

  'phase:started': { workflowId: WorkflowId; phase: PhaseName; attempt: number }

  'phase:retrying': {
    workflowId: WorkflowId
    phase: PhaseName
    attempt: number
    category: ErrorCategory
    delayMs: number
  }

  'phase:completed': { workflowId: WorkflowId; phase: PhaseName; attempts: number; output: PhaseOutput }

  'phase:failed': {
    workflowId: WorkflowId
    phase: PhaseName
    attempts: number
    category: ErrorCategory
    message: string
  }

  /** Phase was skipped because a dependency failed, was disabled, or was unreachable */
  'phase:skipped': { workflowId: WorkflowId; phase: PhaseName; reason: string }

  // -------------------------------------------------------------------------
  // Batches, workspace and checkpoints
  // -------------------------------------------------------------------------

  'batch:started': { workflowId: WorkflowId; phases: PhaseName[] }

  /** The single end-of-batch workspace mutation was performed */
  'batch:committed': { workflowId: WorkflowId; phases: PhaseName[]; ref: string }

  'checkpoint:created': { workflowId: WorkflowId; name: string }

  'checkpoint:restored': { workflowId: WorkflowId; name: string }
}
