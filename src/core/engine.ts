/**
 * Engine interface: the public contract for a fully wired phaseflow
 * instance: state store, recovery engine, discovery, phase executor,
 * workspace committer and workflow orchestrator.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createEngine()` from engine-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { WorkflowId, WorkflowSpec, WorkflowState, WorkflowStatus } from './types.js'
import type { PhaseflowConfig } from '../modules/config/config-schema.js'
import type { StateStore } from '../persistence/state-store.js'
import type { FunctionHandler, HandlerRegistry } from '../modules/phase-executor/handler-registry.js'
import type { WorkspaceCommitter } from '../modules/git/workspace-committer.js'
import type { WorkflowOrchestrator } from '../modules/workflow-orchestrator/workflow-orchestrator.js'

// ---------------------------------------------------------------------------
// EngineOptions
// ---------------------------------------------------------------------------

export interface EngineOptions {
  /** Loaded, frozen configuration */
  config: PhaseflowConfig

  /** Working directory of handler processes, discovery root and git repository */
  projectRoot: string

  /** In-process handlers available to `function` phases */
  functionHandlers?: Record<string, FunctionHandler>

  /** Environment credentials are read from (default: process.env) */
  env?: NodeJS.ProcessEnv

  /** Replaces the configured backend; tests pass an in-memory store */
  store?: StateStore

  /** Replaces the git committer chosen from `git.enabled` */
  committer?: WorkspaceCommitter
}

// ---------------------------------------------------------------------------
// Engine interface
// ---------------------------------------------------------------------------

/** Summary row for `phaseflow list` */
export interface WorkflowSummary {
  workflowId: WorkflowId
  specName: string
  status: WorkflowStatus
  updatedAt: string
  lastCheckpoint?: string
}

/**
 * Lifecycle:
 *  1. Create via `createEngine(options)`; services are initialized in order
 *  2. Load a workflow spec and run or resume it through `orchestrator`
 *  3. Call `shutdown()` to close services in reverse order
 */
export interface Engine {
  readonly eventBus: TypedEventBus
  readonly orchestrator: WorkflowOrchestrator
  readonly store: StateStore
  readonly handlers: HandlerRegistry
  readonly isReady: boolean

  /**
   * Parse and validate a YAML or JSON workflow spec file, applying the
   * configured default timeout and concurrency.
   * @throws {WorkflowSpecError | WorkflowCycleError}
   */
  loadWorkflowSpec(filePath: string): Promise<WorkflowSpec>

  /**
   * Current persisted state of a workflow.
   * @throws {WorkflowNotFoundError}
   * @throws {StateCorruptionError} when the document is unreadable
   */
  getWorkflowState(workflowId: WorkflowId): Promise<WorkflowState>

  /** Every workflow with a readable state document, oldest update first */
  listWorkflows(): Promise<WorkflowSummary[]>

  /**
   * Close all services in reverse initialization order.
   * Safe to call multiple times.
   */
  shutdown(): Promise<void>
}
