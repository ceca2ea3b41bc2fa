/**
 * Error definitions for phaseflow
 * Provides structured error hierarchy for all orchestration operations
 */

/** Base error class for all phaseflow errors */
export class PhaseflowError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PhaseflowError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PhaseflowError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PhaseflowError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a workflow spec is malformed */
export class WorkflowSpecError extends PhaseflowError {
  public readonly errors: string[]

  constructor(errors: string[], context: Record<string, unknown> = {}) {
    super(`Workflow spec validation failed:\n${errors.join('\n')}`, 'WORKFLOW_SPEC_ERROR', {
      errors,
      ...context,
    })
    this.name = 'WorkflowSpecError'
    this.errors = errors
  }
}

/** Error thrown when phase dependencies form a cycle */
export class WorkflowCycleError extends PhaseflowError {
  constructor(cycle: string[]) {
    super(`Circular dependency detected between phases: ${cycle.join(' -> ')}`, 'WORKFLOW_CYCLE', {
      cycle,
    })
    this.name = 'WorkflowCycleError'
  }
}

/** Error thrown when a phase is moved through an illegal state transition */
export class InvalidTransitionError extends PhaseflowError {
  constructor(phase: string, from: string, to: string) {
    super(`Illegal transition for phase "${phase}": ${from} -> ${to}`, 'INVALID_TRANSITION', {
      phase,
      from,
      to,
    })
    this.name = 'InvalidTransitionError'
  }
}

/** Error thrown when a phase handler reports failure */
export class PhaseExecutionError extends PhaseflowError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PHASE_EXECUTION_ERROR', context)
    this.name = 'PhaseExecutionError'
  }
}

/** Error thrown when a phase exceeds its timeout */
export class PhaseTimeoutError extends PhaseflowError {
  constructor(phase: string, timeoutMs: number) {
    super(`Phase "${phase}" timed out after ${String(timeoutMs)}ms`, 'PHASE_TIMEOUT', {
      phase,
      timeoutMs,
    })
    this.name = 'PhaseTimeoutError'
  }
}

/** Error thrown when a persisted document cannot be read or parsed */
export class StateCorruptionError extends PhaseflowError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_CORRUPTION', context)
    this.name = 'StateCorruptionError'
  }
}

/** Error thrown when restoring a checkpoint that does not exist */
export class CheckpointNotFoundError extends PhaseflowError {
  constructor(name: string) {
    super(`Checkpoint not found: ${name}`, 'CHECKPOINT_NOT_FOUND', { name })
    this.name = 'CheckpointNotFoundError'
  }
}

/** Error thrown when a checkpoint name is re-used */
export class CheckpointExistsError extends PhaseflowError {
  constructor(name: string) {
    super(`Checkpoint already exists: ${name}`, 'CHECKPOINT_EXISTS', { name })
    this.name = 'CheckpointExistsError'
  }
}

/** Error thrown when no state exists for a workflow id */
export class WorkflowNotFoundError extends PhaseflowError {
  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`, 'WORKFLOW_NOT_FOUND', { workflowId })
    this.name = 'WorkflowNotFoundError'
  }
}

/** Error thrown by external services that signal a rate limit */
export class RateLimitError extends PhaseflowError {
  public readonly retryAfterSeconds: number | undefined

  constructor(message: string, retryAfterSeconds?: number) {
    super(message, 'RATE_LIMITED', { retryAfterSeconds })
    this.name = 'RateLimitError'
    this.retryAfterSeconds = retryAfterSeconds
  }
}

/** Error thrown when git operations fail */
export class GitError extends PhaseflowError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}
