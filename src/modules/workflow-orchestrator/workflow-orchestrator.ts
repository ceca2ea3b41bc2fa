/**
 * WorkflowOrchestrator interface: sequences the phases of a workflow by
 * dependency, runs independent phases in parallel, checkpoints state and
 * resumes interrupted or failed runs.
 *
 * Create an instance via `createWorkflowOrchestrator()` from
 * workflow-orchestrator-impl.ts.
 */

import type { Task, WorkflowId, WorkflowResult, WorkflowSpec } from '../../core/types.js'

export interface RunOptions {
  /** Aborting stops scheduling, terminates running handlers and halts the workflow */
  signal?: AbortSignal
}

export interface ResumeOptions extends RunOptions {
  /** Resume from this checkpoint instead of the live workflow document */
  checkpoint?: string
}

export interface WorkflowOrchestrator {
  /**
   * Validate `spec` and run it for `task`.
   *
   * @throws {WorkflowSpecError | WorkflowCycleError} when the spec is invalid
   * @throws {ConfigError} when state already exists for the task's workflow id
   */
  run(spec: WorkflowSpec, task: Task, options?: RunOptions): Promise<WorkflowResult>

  /**
   * Continue a workflow from its persisted state: failed, skipped and stale
   * running phases are reset to pending; completed phases are kept.
   *
   * @throws {WorkflowNotFoundError} when neither state nor checkpoints exist
   * @throws {CheckpointNotFoundError} when a named checkpoint does not exist
   * @throws {ConfigError} when a named checkpoint belongs to another workflow
   */
  resume(workflowId: WorkflowId, options?: ResumeOptions): Promise<WorkflowResult>
}
