/**
 * Workflow orchestrator module.
 */

export type { WorkflowOrchestrator, RunOptions, ResumeOptions } from './workflow-orchestrator.js'
export { WorkflowOrchestratorImpl, createWorkflowOrchestrator } from './workflow-orchestrator-impl.js'
export type { WorkflowOrchestratorDeps } from './workflow-orchestrator-impl.js'
export { createTask, workflowStateKey } from './task.js'
export type { TaskInput } from './task.js'
export { Session, MAX_SUMMARY_LENGTH } from './session.js'
export {
  PHASE_TRANSITIONS,
  blockedDependents,
  canTransition,
  createInitialState,
  readyPhases,
  resetForResume,
  toOutcomes,
  transitionPhase,
} from './workflow-state.js'
