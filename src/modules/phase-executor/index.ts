/**
 * Phase executor module.
 */

export type { PhaseExecutor, PhaseRequest, PhaseResult } from './phase-executor.js'
export { PhaseExecutorImpl, createPhaseExecutor, rawLogPathFor } from './phase-executor-impl.js'
export type { PhaseExecutorOptions } from './phase-executor-impl.js'
export { HandlerRegistry, createHandlerRegistry } from './handler-registry.js'
export type { FunctionHandler, FunctionHandlerInput, PhaseContext } from './handler-registry.js'
export { ProcessHandle, runProcess } from './process-handle.js'
export type { ProcessCommand, ProcessResult } from './process-handle.js'
export { findLastJsonObject, parseStructuredOutput, validatePhaseOutput } from './output-parser.js'
