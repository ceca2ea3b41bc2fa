/**
 * Helpers shared by the workflow commands: configuration loading, engine
 * construction and error-to-exit-code mapping.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Workflow failure or unexpected error
 *   2 - Configuration error (bad config, invalid workflow spec, cycle)
 */

import { createEngine } from '../../core/engine-impl.js'
import type { Engine } from '../../core/engine.js'
import { ConfigError, WorkflowCycleError, WorkflowSpecError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialPhaseflowConfig, PhaseflowConfig } from '../../modules/config/config-schema.js'
import { join } from 'node:path'
import { setLogLevel } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIG_ERROR = 2

// ---------------------------------------------------------------------------
// CommandContext
// ---------------------------------------------------------------------------

/** Where a command runs; tests point these at temporary directories */
export interface CommandContext {
  projectRoot: string
  /** Directory holding the user-level config.yaml (default: ~/.phaseflow) */
  globalConfigDir?: string
  /** Environment read for PHASEFLOW_* overrides and credentials */
  env?: NodeJS.ProcessEnv
}

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(value: string | undefined): OutputFormat {
  return value === 'json' ? 'json' : 'human'
}

// ---------------------------------------------------------------------------
// Engine bootstrap
// ---------------------------------------------------------------------------

export async function loadConfig(
  ctx: CommandContext,
  cliOverrides: PartialPhaseflowConfig = {},
): Promise<PhaseflowConfig> {
  const configSystem = createConfigSystem({
    projectConfigDir: join(ctx.projectRoot, '.phaseflow'),
    ...(ctx.globalConfigDir !== undefined ? { globalConfigDir: ctx.globalConfigDir } : {}),
    ...(ctx.env !== undefined ? { env: ctx.env } : {}),
    cliOverrides,
  })
  await configSystem.load()
  return configSystem.getConfig()
}

/**
 * Load configuration, apply its log level and build an engine. The caller
 * owns the engine and must shut it down.
 */
export async function openEngine(
  ctx: CommandContext,
  cliOverrides: PartialPhaseflowConfig = {},
): Promise<Engine> {
  const config = await loadConfig(ctx, cliOverrides)
  setLogLevel(config.global.log_level)
  return createEngine({
    config,
    projectRoot: ctx.projectRoot,
    ...(ctx.env !== undefined ? { env: ctx.env } : {}),
  })
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

export function isConfigurationError(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof WorkflowSpecError || err instanceof WorkflowCycleError
}

/** Write `err` to stderr and return the matching exit code */
export function reportError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
  return isConfigurationError(err) ? EXIT_CONFIG_ERROR : EXIT_FAILURE
}
