/**
 * Core types for phaseflow
 * Shared type definitions used across all modules
 */

/** Unique identifier for a workflow run */
export type WorkflowId = string

/** Name of a phase within a workflow (e.g. "scout", "plan") */
export type PhaseName = string

/** Built-in phase names; user-defined names are also allowed */
export const BUILT_IN_PHASES = ['scout', 'plan', 'build', 'test', 'review'] as const
export type BuiltInPhase = (typeof BUILT_IN_PHASES)[number]

/** Status of an individual phase */
export const PHASE_STATUSES = ['pending', 'running', 'completed', 'failed', 'skipped'] as const
export type PhaseStatus = (typeof PHASE_STATUSES)[number]

/** Overall status of a workflow run */
export const WORKFLOW_STATUSES = ['pending', 'running', 'completed', 'failed', 'halted'] as const
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number]

/** What the orchestrator does when a phase fails */
export type FailurePolicy = 'stop' | 'continue'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Failure taxonomy used by the recovery engine */
export const ERROR_CATEGORIES = [
  'network',
  'filesystem',
  'external-service',
  'validation',
  'state-corruption',
  'timeout',
  'unknown',
] as const
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number]

/** Where a task came from */
export interface TaskSource {
  kind: 'issue' | 'spec-file'
  ref: string
}

/** A unit of work submitted to the orchestrator. Frozen once accepted. */
export interface Task {
  readonly workflowId: WorkflowId
  readonly description: string
  readonly source?: TaskSource
}

/**
 * How a phase is executed. Mapped to a concrete handler when the workflow
 * is defined; unknown types are rejected during validation.
 */
export type HandlerReference =
  | { type: 'agent'; command: string; args: string[]; env: Record<string, string> }
  | { type: 'script'; command: string; args: string[]; env: Record<string, string> }
  | { type: 'discovery' }
  | { type: 'function'; name: string }

export const HANDLER_TYPES = ['agent', 'script', 'discovery', 'function'] as const
export type HandlerType = HandlerReference['type']

/** A named step of a workflow. Never mutated during execution. */
export interface Phase {
  readonly name: PhaseName
  readonly handler: HandlerReference
  readonly timeoutMs: number
  readonly maxRetries: number
  readonly dependsOn: readonly PhaseName[]
  readonly enabled: boolean
  /** Whether a sequentially executed phase commits its own workspace changes */
  readonly commits: boolean
  readonly options: Readonly<Record<string, unknown>>
}

/** Validated workflow definition; phases are kept in declaration order */
export interface WorkflowSpec {
  readonly name: string
  readonly phases: readonly Phase[]
  readonly maxParallel: number
  readonly failurePolicy: FailurePolicy
}

/** Structured output produced by a phase handler */
export interface PhaseOutput {
  status: 'ok' | 'error'
  summary?: string
  artifacts?: string[]
  data?: Record<string, unknown>
}

/** Persisted per-phase state */
export interface PhaseState {
  status: PhaseStatus
  attempts: number
  result?: PhaseOutput
  error?: string
  errorCategory?: ErrorCategory
  strategy?: string
  /** Recovery hint recorded when attempts ran out */
  hint?: string
  rawLogPath?: string
  startedAt?: string
  finishedAt?: string
}

/** Mutable workflow state owned by the orchestrator */
export interface WorkflowState {
  workflowId: WorkflowId
  /** The validated definition the run was started with; resume re-uses it */
  spec: WorkflowSpec
  task: Task
  status: WorkflowStatus
  phases: Record<PhaseName, PhaseState>
  /** Summaries carried forward between phases */
  session: SessionSnapshot
  lastCheckpoint?: string
  createdAt: string
  updatedAt: string
}

/** Serializable form of the orchestrator-owned Session */
export interface SessionSnapshot {
  summaries: Record<PhaseName, string>
  discoveredItems: string[]
}

/** Outcome of a single phase as reported to callers */
export interface PhaseOutcome {
  name: PhaseName
  status: PhaseStatus
  attempts: number
  strategy?: string
  errorCategory?: ErrorCategory
  error?: string
  hint?: string
  output?: PhaseOutput
}

/** Aggregated result of a workflow run */
export interface WorkflowResult {
  workflowId: WorkflowId
  success: boolean
  status: WorkflowStatus
  /** Per-phase outcomes in declaration order */
  phases: PhaseOutcome[]
  checkpoint?: string
  fatalError?: { category: ErrorCategory; message: string }
}
