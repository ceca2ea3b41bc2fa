/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.phaseflow/config.yaml)
 *     → project config      (./.phaseflow/config.yaml)
 *     → environment vars    (PHASEFLOW_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { deepMerge, isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  PhaseflowConfigSchema,
  PartialPhaseflowConfigSchema,
  type PhaseflowConfig,
  type PartialPhaseflowConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

type EnvKind = 'scalar' | 'int-list'

/**
 * Map of PHASEFLOW_ environment variable names to config paths.
 * Scalars are coerced to boolean/number where they look like one.
 */
const ENV_VAR_MAP: Record<string, { path: string; kind: EnvKind }> = {
  PHASEFLOW_LOG_LEVEL: { path: 'global.log_level', kind: 'scalar' },
  PHASEFLOW_STATE_DIR: { path: 'global.state_dir', kind: 'scalar' },
  PHASEFLOW_MAX_PARALLEL: { path: 'global.max_parallel', kind: 'scalar' },
  PHASEFLOW_STATE_BACKEND: { path: 'global.state_backend', kind: 'scalar' },
  PHASEFLOW_DISCOVERY_MAX_ITEMS: { path: 'discovery.max_items', kind: 'scalar' },
  PHASEFLOW_DISCOVERY_DISABLED_LEVELS: { path: 'discovery.disabled_levels', kind: 'int-list' },
  PHASEFLOW_AGENT_TIMEOUT_MS: { path: 'agent.default_timeout_ms', kind: 'scalar' },
  PHASEFLOW_GIT_ENABLED: { path: 'git.enabled', kind: 'scalar' },
}

function coerceScalar(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

function setByPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  let cursor = target
  for (const part of parts.slice(0, -1)) {
    const next = cursor[part]
    if (isPlainObject(next)) {
      cursor = next
    } else {
      const created: Record<string, unknown> = {}
      cursor[part] = created
      cursor = created
    }
  }
  cursor[parts[parts.length - 1] ?? ''] = value
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialPhaseflowConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, { path, kind }] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    const value =
      kind === 'int-list'
        ? rawValue
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s.length > 0)
            .map((s) => Number(s))
        : coerceScalar(rawValue)
    setByPath(overrides, path, value)
  }

  const parsed = PartialPhaseflowConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PhaseflowConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPhaseflowConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.phaseflow')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.phaseflow')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, 'config.yaml'))
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 4. Environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = PhaseflowConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = deepFreeze(result.data)
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): PhaseflowConfig {
    if (this._config === null) {
      throw new ConfigError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPhaseflowConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialPhaseflowConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

/**
 * Read the configured pass-through environment variables once. The returned
 * record is opaque to the engine and handed unchanged to phase handlers.
 */
export function readCredentials(
  config: PhaseflowConfig,
  env: NodeJS.ProcessEnv = process.env
): Readonly<Record<string, string>> {
  const credentials: Record<string, string> = {}
  for (const name of config.agent.env_passthrough) {
    const value = env[name]
    if (value !== undefined && value !== '') credentials[name] = value
  }
  return Object.freeze(credentials)
}
