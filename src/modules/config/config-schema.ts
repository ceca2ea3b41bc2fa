/**
 * Zod validation schemas for the phaseflow configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - discovery
 *  - recovery (with per-category overrides)
 *  - agent invocation
 *  - git workspace commits
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const StateBackendSchema = z.enum(['file', 'sqlite'])
export type StateBackend = z.infer<typeof StateBackendSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory holding state documents, checkpoints, logs and discovery output */
    state_dir: z.string().min(1),
    /** Upper bound on concurrently running phases */
    max_parallel: z.number().int().min(1).max(64),
    state_backend: StateBackendSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export const DiscoveryLevelSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)])

export const DiscoveryConfigSchema = z
  .object({
    max_items: z.number().int().min(1),
    /** Levels to skip; level 4 can be listed but always runs as the terminal fallback */
    disabled_levels: z.array(DiscoveryLevelSchema),
    /** Extensions (with leading dot) treated as source files by the minimal level */
    extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/)),
    /** Extra directory names ignored while walking the project tree */
    ignore: z.array(z.string()),
    /** Number of past outcomes kept for the informed level */
    history_limit: z.number().int().min(1),
  })
  .strict()

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

export const CategoryOverrideSchema = z
  .object({
    max_attempts: z.number().int().min(1).optional(),
    retriable: z.boolean().optional(),
  })
  .strict()

export type CategoryOverride = z.infer<typeof CategoryOverrideSchema>

export const CategoryOverridesSchema = z
  .object({
    network: CategoryOverrideSchema.optional(),
    filesystem: CategoryOverrideSchema.optional(),
    'external-service': CategoryOverrideSchema.optional(),
    validation: CategoryOverrideSchema.optional(),
    'state-corruption': CategoryOverrideSchema.optional(),
    timeout: CategoryOverrideSchema.optional(),
    unknown: CategoryOverrideSchema.optional(),
  })
  .strict()

export const RecoveryConfigSchema = z
  .object({
    backoff_base: z.number().min(1),
    /** Milliseconds per backoff "second"; tests set this to 0 */
    backoff_unit_ms: z.number().int().min(0),
    max_backoff_ms: z.number().int().min(0),
    history_limit: z.number().int().min(1),
    ema_alpha: z.number().gt(0).max(1),
    categories: CategoryOverridesSchema,
  })
  .strict()

export type RecoveryConfig = z.infer<typeof RecoveryConfigSchema>

// ---------------------------------------------------------------------------
// Agent invocation
// ---------------------------------------------------------------------------

export const AgentConfigSchema = z
  .object({
    default_timeout_ms: z.number().int().positive(),
    /** Environment variables read once at startup and passed to handlers */
    env_passthrough: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)),
  })
  .strict()

export type AgentConfig = z.infer<typeof AgentConfigSchema>

// ---------------------------------------------------------------------------
// Git
// ---------------------------------------------------------------------------

export const GitConfigSchema = z
  .object({
    enabled: z.boolean(),
    /** "Name <email>" passed to `git commit --author` */
    commit_author: z.string().optional(),
  })
  .strict()

export type GitConfig = z.infer<typeof GitConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const PhaseflowConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    discovery: DiscoveryConfigSchema,
    recovery: RecoveryConfigSchema,
    agent: AgentConfigSchema,
    git: GitConfigSchema,
  })
  .strict()

export type PhaseflowConfig = z.infer<typeof PhaseflowConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env and CLI overlays before merging)
// ---------------------------------------------------------------------------

export const PartialPhaseflowConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    discovery: DiscoveryConfigSchema.partial().optional(),
    recovery: RecoveryConfigSchema.partial().optional(),
    agent: AgentConfigSchema.partial().optional(),
    git: GitConfigSchema.partial().optional(),
  })
  .strict()

export type PartialPhaseflowConfig = z.infer<typeof PartialPhaseflowConfigSchema>
