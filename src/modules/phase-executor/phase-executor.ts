/**
 * PhaseExecutor: runs a single attempt of a phase through its handler.
 *
 * One attempt either resolves with validated structured output or rejects
 * with a PhaseExecutionError / PhaseTimeoutError. Retrying is the caller's
 * concern (the orchestrator wraps every attempt in the recovery engine).
 */

import type { Phase, PhaseOutput, SessionSnapshot, Task } from '../../core/types.js'

export interface PhaseRequest {
  task: Task
  phase: Phase
  /** 1-based attempt number */
  attempt: number
  session: SessionSnapshot
  signal?: AbortSignal
}

export interface PhaseResult {
  output: PhaseOutput
  /** Raw process output, for agent and script handlers */
  rawLogPath?: string
  durationMs: number
}

export interface PhaseExecutor {
  execute(request: PhaseRequest): Promise<PhaseResult>
}
