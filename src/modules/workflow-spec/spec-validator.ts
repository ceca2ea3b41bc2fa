/**
 * Workflow spec validator.
 *
 * Combines Zod schema validation, handler type checks, dependency reference
 * checks and cycle detection. Every check runs at acceptance time so that
 * a malformed workflow never starts a phase.
 */

import {
  HANDLER_TYPES,
  type FailurePolicy,
  type HandlerReference,
  type Phase,
  type WorkflowSpec,
} from '../../core/types.js'
import { WorkflowCycleError, WorkflowSpecError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { WorkflowSpecFileSchema } from './schemas.js'
import { detectCycle, validateDependencies } from './dependency-resolver.js'

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_PHASE_TIMEOUT_MS = 600_000
export const DEFAULT_MAX_RETRIES = 3

const KNOWN_HANDLER_TYPES: ReadonlySet<string> = new Set(HANDLER_TYPES)

/** Lookup of in-process handlers; satisfied by HandlerRegistry */
export interface FunctionHandlerLookup {
  has(name: string): boolean
}

export interface SpecValidationOptions {
  /** Registry used to reject `function` handlers that are not registered */
  functionHandlers?: FunctionHandlerLookup
  /** Timeout applied to phases that do not declare one */
  defaultTimeoutMs?: number
  /** Concurrency used when the spec does not declare max_parallel */
  defaultMaxParallel?: number
}

// ---------------------------------------------------------------------------
// Programmatic construction
// ---------------------------------------------------------------------------

export interface PhaseInput {
  name: string
  handler: HandlerReference
  timeoutMs?: number
  maxRetries?: number
  dependsOn?: readonly string[]
  enabled?: boolean
  commits?: boolean
  options?: Readonly<Record<string, unknown>>
}

/** Build a frozen Phase, filling in defaults */
export function createPhase(input: PhaseInput): Phase {
  return Object.freeze({
    name: input.name,
    handler: Object.freeze({ ...input.handler }),
    timeoutMs: input.timeoutMs ?? DEFAULT_PHASE_TIMEOUT_MS,
    maxRetries: input.maxRetries ?? DEFAULT_MAX_RETRIES,
    dependsOn: Object.freeze([...(input.dependsOn ?? [])]),
    enabled: input.enabled ?? true,
    commits: input.commits ?? true,
    options: Object.freeze({ ...(input.options ?? {}) }),
  })
}

export interface WorkflowSpecInput {
  name: string
  phases: readonly (Phase | PhaseInput)[]
  maxParallel?: number
  failurePolicy?: FailurePolicy
}

/** Build a frozen WorkflowSpec; call assertValidWorkflow() to validate it */
export function createWorkflowSpec(input: WorkflowSpecInput): WorkflowSpec {
  return Object.freeze({
    name: input.name,
    phases: Object.freeze(input.phases.map((p) => createPhase(p))),
    maxParallel: input.maxParallel ?? 1,
    failurePolicy: input.failurePolicy ?? 'stop',
  })
}

// ---------------------------------------------------------------------------
// assertValidWorkflow
// ---------------------------------------------------------------------------

/**
 * Validate an already-typed WorkflowSpec.
 *
 * @throws {WorkflowSpecError} for duplicate names, unknown or self
 *   dependencies, unknown handler types and unregistered function handlers
 * @throws {WorkflowCycleError} when dependencies form a cycle
 */
export function assertValidWorkflow(
  spec: WorkflowSpec,
  functionHandlers?: FunctionHandlerLookup,
): void {
  const errors: string[] = []

  if (spec.phases.length === 0) {
    errors.push('A workflow needs at least one phase')
  }
  if (!Number.isInteger(spec.maxParallel) || spec.maxParallel < 1) {
    errors.push(`maxParallel must be a positive integer, got ${String(spec.maxParallel)}`)
  }

  for (const phase of spec.phases) {
    const type: string = phase.handler.type
    if (!KNOWN_HANDLER_TYPES.has(type)) {
      errors.push(`Phase "${phase.name}" uses unknown handler type "${type}"`)
    } else if (phase.handler.type === 'function' && functionHandlers !== undefined) {
      if (!functionHandlers.has(phase.handler.name)) {
        errors.push(`Phase "${phase.name}" references unregistered function handler "${phase.handler.name}"`)
      }
    }
    if (phase.maxRetries < 1) {
      errors.push(`Phase "${phase.name}" must allow at least one attempt`)
    }
  }

  errors.push(...validateDependencies(spec.phases))

  if (errors.length > 0) {
    throw new WorkflowSpecError(errors, { workflow: spec.name })
  }

  const cycle = detectCycle(spec.phases)
  if (cycle !== null) {
    throw new WorkflowCycleError(cycle)
  }
}

// ---------------------------------------------------------------------------
// buildWorkflowSpec
// ---------------------------------------------------------------------------

/**
 * Unknown handler types are reported before the schema parse so that the
 * message names the phase instead of a discriminator path.
 */
function findUnknownHandlerTypes(raw: unknown): string[] {
  if (!isPlainObject(raw) || !Array.isArray(raw.phases)) return []
  const errors: string[] = []
  for (const entry of raw.phases) {
    if (!isPlainObject(entry) || !isPlainObject(entry.handler)) continue
    const type = entry.handler.type
    if (typeof type === 'string' && !KNOWN_HANDLER_TYPES.has(type)) {
      const name = typeof entry.name === 'string' ? entry.name : '?'
      errors.push(`Phase "${name}" uses unknown handler type "${type}"`)
    }
  }
  return errors
}

/**
 * Validate a raw (unknown) workflow spec document and convert it into a
 * frozen WorkflowSpec.
 *
 * @param raw - Output of parseSpecFile/parseSpecString
 * @throws {WorkflowSpecError | WorkflowCycleError}
 */
export function buildWorkflowSpec(raw: unknown, options: SpecValidationOptions = {}): WorkflowSpec {
  const handlerErrors = findUnknownHandlerTypes(raw)
  if (handlerErrors.length > 0) {
    throw new WorkflowSpecError(handlerErrors)
  }

  const parseResult = WorkflowSpecFileSchema.safeParse(raw)
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : ''
      return `${issue.message}${path}`
    })
    throw new WorkflowSpecError(errors)
  }

  const file = parseResult.data
  const spec = createWorkflowSpec({
    name: file.name,
    maxParallel: file.max_parallel ?? options.defaultMaxParallel ?? 1,
    failurePolicy: file.failure_policy,
    phases: file.phases.map((p) => ({
      name: p.name,
      handler: p.handler,
      timeoutMs: p.timeout_ms ?? options.defaultTimeoutMs ?? DEFAULT_PHASE_TIMEOUT_MS,
      maxRetries: p.max_retries,
      dependsOn: p.depends_on,
      enabled: p.enabled,
      commits: p.commits,
      options: p.options,
    })),
  })

  assertValidWorkflow(spec, options.functionHandlers)
  return spec
}
