/**
 * Zod schemas for workflow spec YAML/JSON files.
 *
 * Field names in files are snake_case; the validator maps them onto the
 * camelCase WorkflowSpec/Phase types from core.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Supported spec versions
// ---------------------------------------------------------------------------

export const SUPPORTED_SPEC_VERSIONS = ['1', '1.0'] as const

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

const ProcessHandlerFields = {
  command: z.string().min(1, 'Handler command is required'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
}

export const HandlerDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('agent'), ...ProcessHandlerFields }),
  z.object({ type: z.literal('script'), ...ProcessHandlerFields }),
  z.object({ type: z.literal('discovery') }),
  z.object({ type: z.literal('function'), name: z.string().min(1, 'Function handler name is required') }),
])

export type HandlerDefinition = z.infer<typeof HandlerDefinitionSchema>

// ---------------------------------------------------------------------------
// PhaseDefinitionSchema
// ---------------------------------------------------------------------------

/** Phase names end up in file names (logs, checkpoints) */
export const PhaseNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, 'Phase name may only contain letters, digits, "_" and "-"')

export const PhaseDefinitionSchema = z.object({
  name: PhaseNameSchema,
  handler: HandlerDefinitionSchema,
  timeout_ms: z.number().int().positive().optional(),
  /** Maximum number of attempts for this phase */
  max_retries: z.number().int().min(1).default(3),
  depends_on: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  commits: z.boolean().default(true),
  options: z.record(z.string(), z.unknown()).default({}),
})

export type PhaseDefinition = z.infer<typeof PhaseDefinitionSchema>

// ---------------------------------------------------------------------------
// WorkflowSpecFileSchema
// ---------------------------------------------------------------------------

export const WorkflowSpecFileSchema = z.object({
  version: z.string().superRefine((v, ctx) => {
    if (!SUPPORTED_SPEC_VERSIONS.some((supported) => supported === v)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Workflow spec version '${v}' is not supported. Supported versions: ${SUPPORTED_SPEC_VERSIONS.join(', ')}`,
      })
    }
  }),
  name: z.string().min(1, 'Workflow name is required'),
  max_parallel: z.number().int().min(1).optional(),
  failure_policy: z.enum(['stop', 'continue']).default('stop'),
  phases: z.array(PhaseDefinitionSchema).min(1, 'A workflow needs at least one phase'),
})

export type WorkflowSpecFile = z.infer<typeof WorkflowSpecFileSchema>
