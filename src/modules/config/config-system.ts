/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PhaseflowConfig, PartialPhaseflowConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .phaseflow/ directory (default: <cwd>/.phaseflow) */
  projectConfigDir?: string
  /** Path to the global user-level .phaseflow/ directory (default: ~/.phaseflow) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPhaseflowConfig
  /** Environment to read PHASEFLOW_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated phaseflow configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated, frozen configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): PhaseflowConfig

  /**
   * Return a single value by dot-notation key (e.g. "global.log_level").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
