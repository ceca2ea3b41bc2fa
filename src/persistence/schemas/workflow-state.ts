/**
 * Zod schemas for documents the engine persists through a StateStore.
 *
 * Reads are lenient: unknown fields are dropped and optional fields are
 * defaulted, so documents written by newer versions still load.
 */

import { z } from 'zod'
import {
  ERROR_CATEGORIES,
  PHASE_STATUSES,
  WORKFLOW_STATUSES,
  type PhaseOutput,
  type PhaseState,
  type WorkflowSpec,
  type WorkflowState,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const PhaseStatusEnum = z.enum(PHASE_STATUSES)
export const WorkflowStatusEnum = z.enum(WORKFLOW_STATUSES)
export const ErrorCategoryEnum = z.enum(ERROR_CATEGORIES)

// ---------------------------------------------------------------------------
// Phase output (also the structured output contract of phase handlers)
// ---------------------------------------------------------------------------

export const PhaseOutputSchema: z.ZodType<PhaseOutput, z.ZodTypeDef, unknown> = z.object({
  status: z.enum(['ok', 'error']),
  summary: z.string().optional(),
  artifacts: z.array(z.string()).optional(),
  data: z.record(z.string(), z.unknown()).optional(),
})

// ---------------------------------------------------------------------------
// Workflow state
// ---------------------------------------------------------------------------

export const PhaseStateSchema: z.ZodType<PhaseState, z.ZodTypeDef, unknown> = z.object({
  status: PhaseStatusEnum,
  attempts: z.number().int().min(0).default(0),
  result: PhaseOutputSchema.optional(),
  error: z.string().optional(),
  errorCategory: ErrorCategoryEnum.optional(),
  strategy: z.string().optional(),
  hint: z.string().optional(),
  rawLogPath: z.string().optional(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
})

export const TaskSchema = z.object({
  workflowId: z.string().min(1),
  description: z.string(),
  source: z
    .object({
      kind: z.enum(['issue', 'spec-file']),
      ref: z.string(),
    })
    .optional(),
})

const HandlerReferenceSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('agent'),
    command: z.string(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).default({}),
  }),
  z.object({
    type: z.literal('script'),
    command: z.string(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).default({}),
  }),
  z.object({ type: z.literal('discovery') }),
  z.object({ type: z.literal('function'), name: z.string() }),
])

export const StoredWorkflowSpecSchema: z.ZodType<WorkflowSpec, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  phases: z.array(
    z.object({
      name: z.string(),
      handler: HandlerReferenceSchema,
      timeoutMs: z.number().int().positive(),
      maxRetries: z.number().int().min(1),
      dependsOn: z.array(z.string()).default([]),
      enabled: z.boolean().default(true),
      commits: z.boolean().default(true),
      options: z.record(z.string(), z.unknown()).default({}),
    }),
  ),
  maxParallel: z.number().int().min(1),
  failurePolicy: z.enum(['stop', 'continue']),
})

export const WorkflowStateSchema: z.ZodType<WorkflowState, z.ZodTypeDef, unknown> = z.object({
  workflowId: z.string().min(1),
  spec: StoredWorkflowSpecSchema,
  task: TaskSchema,
  status: WorkflowStatusEnum,
  phases: z.record(z.string(), PhaseStateSchema),
  session: z
    .object({
      summaries: z.record(z.string(), z.string()).default({}),
      discoveredItems: z.array(z.string()).default([]),
    })
    .default({}),
  lastCheckpoint: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

// ---------------------------------------------------------------------------
// Checkpoint document
// ---------------------------------------------------------------------------

export const CHECKPOINT_FORMAT_VERSION = 1

export const CheckpointPhaseStateSchema = z.object({
  status: PhaseStatusEnum,
  attempts: z.number().int().min(0).default(0),
  result: PhaseOutputSchema.optional(),
})

export type CheckpointPhaseState = z.infer<typeof CheckpointPhaseStateSchema>

export const CheckpointDocumentSchema = z.object({
  format_version: z.literal(CHECKPOINT_FORMAT_VERSION),
  name: z.string().min(1),
  workflow_id: z.string().optional(),
  timestamp: z.string(),
  /** Creation order within a store; breaks timestamp ties */
  sequence: z.number().int().min(0).default(0),
  phase_states: z.record(z.string(), CheckpointPhaseStateSchema).default({}),
  /** Live documents at the time of the checkpoint, keyed by state key */
  documents: z.record(z.string(), z.unknown()).default({}),
  /** Keys a scoped snapshot was limited to; absent for a full snapshot */
  keys: z.array(z.string()).optional(),
})

export type CheckpointDocument = z.infer<typeof CheckpointDocumentSchema>
