/**
 * Barrel exports for the workflow-spec module.
 */

export {
  buildWorkflowSpec,
  assertValidWorkflow,
  createPhase,
  createWorkflowSpec,
  DEFAULT_PHASE_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
} from './spec-validator.js'
export type {
  FunctionHandlerLookup,
  SpecValidationOptions,
  PhaseInput,
  WorkflowSpecInput,
} from './spec-validator.js'
export { parseSpecFile, parseSpecString, detectFormat } from './spec-parser.js'
export type { SpecFormat } from './spec-parser.js'
export { detectCycle, validateDependencies, transitiveDependents } from './dependency-resolver.js'
export type { DependencyNode } from './dependency-resolver.js'
export { WorkflowSpecFileSchema, HandlerDefinitionSchema, SUPPORTED_SPEC_VERSIONS } from './schemas.js'
export type { WorkflowSpecFile, PhaseDefinition, HandlerDefinition } from './schemas.js'
