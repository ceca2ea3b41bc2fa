/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - Frozen result
 *  - Credential pass-through
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem, readCredentials, readEnvOverrides } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `phaseflow-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.phaseflow')
  globalConfigDir = join(testDir, 'global', '.phaseflow')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.config_format_version).toBe('1')
    expect(config.global.log_level).toBe('info')
    expect(config.global.max_parallel).toBe(3)
    expect(config.global.state_backend).toBe('file')
    expect(config.recovery.backoff_base).toBe(2)
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('returns a frozen config', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.discovery.extensions)).toBe(true)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().global.max_parallel).toBe(DEFAULT_CONFIG.global.max_parallel)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'global:\n  log_level: debug\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().global.log_level).toBe('debug')
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'global:\n  log_level: debug\n')
    await writeYaml(projectConfigDir, 'global:\n  log_level: warn\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().global.log_level).toBe('warn')
  })

  it('env var overrides project config', async () => {
    await writeYaml(projectConfigDir, 'global:\n  max_parallel: 2\n')
    const system = createSystem({ env: { PHASEFLOW_MAX_PARALLEL: '5' } })
    await system.load()
    expect(system.getConfig().global.max_parallel).toBe(5)
  })

  it('CLI overrides take highest priority', async () => {
    await writeYaml(projectConfigDir, 'global:\n  state_backend: file\n')
    const system = createSystem({
      env: { PHASEFLOW_STATE_BACKEND: 'file' },
      cliOverrides: { global: { state_backend: 'sqlite' } },
    })
    await system.load()
    expect(system.getConfig().global.state_backend).toBe('sqlite')
  })

  it('defaults preserved when not overridden', async () => {
    await writeYaml(projectConfigDir, 'discovery:\n  max_items: 10\n')
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.discovery.max_items).toBe(10)
    expect(config.discovery.extensions).toEqual(DEFAULT_CONFIG.discovery.extensions)
  })

  it('replaces arrays rather than merging them', async () => {
    await writeYaml(projectConfigDir, 'agent:\n  env_passthrough: [MY_TOKEN]\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().agent.env_passthrough).toEqual(['MY_TOKEN'])
  })

  it('merges per-category recovery overrides', async () => {
    await writeYaml(projectConfigDir, 'recovery:\n  categories:\n    network:\n      max_attempts: 7\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().recovery.categories.network).toEqual({ max_attempts: 7 })
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('throws ConfigError for invalid log_level', async () => {
    await writeYaml(projectConfigDir, 'global:\n  log_level: INVALID\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for max_parallel of 0', async () => {
    await writeYaml(projectConfigDir, 'global:\n  max_parallel: 0\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for unknown top-level keys', async () => {
    await writeYaml(projectConfigDir, 'providers:\n  claude: {}\n')
    await expect(createSystem().load()).rejects.toThrow(/Invalid config file/)
  })

  it('throws ConfigError for malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'global: [unclosed\n')
    await expect(createSystem().load()).rejects.toThrow(/Failed to read config file/)
  })

  it('ignores invalid environment overrides', async () => {
    const system = createSystem({ env: { PHASEFLOW_STATE_BACKEND: 'postgres' } })
    await system.load()
    expect(system.getConfig().global.state_backend).toBe('file')
  })
})

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

describe('ConfigSystem - get()', () => {
  it('reads nested values by dot-notation', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('recovery.ema_alpha')).toBe(0.2)
    expect(system.get('global.missing')).toBeUndefined()
    expect(system.get('global.log_level.deeper')).toBeUndefined()
  })
})

describe('readEnvOverrides', () => {
  it('parses comma-separated disabled levels', () => {
    expect(readEnvOverrides({ PHASEFLOW_DISCOVERY_DISABLED_LEVELS: '1, 2' })).toEqual({
      discovery: { disabled_levels: [1, 2] },
    })
  })

  it('coerces booleans', () => {
    expect(readEnvOverrides({ PHASEFLOW_GIT_ENABLED: 'false' })).toEqual({ git: { enabled: false } })
  })
})

describe('readCredentials', () => {
  it('reads only configured, non-empty variables', () => {
    const credentials = readCredentials(DEFAULT_CONFIG, {
      ANTHROPIC_API_KEY: 'test-secret',
      GITHUB_TOKEN: '',
      UNRELATED: 'x',
    })
    expect(credentials).toEqual({ ANTHROPIC_API_KEY: 'test-secret' })
    expect(Object.isFrozen(credentials)).toBe(true)
  })
})
