/**
 * Built-in default values for the phaseflow configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  PhaseflowConfig,
  GlobalSettings,
  DiscoveryConfig,
  RecoveryConfig,
  AgentConfig,
  GitConfig,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
  state_dir: '.phaseflow/state',
  max_parallel: 3,
  state_backend: 'file',
}

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  max_items: 200,
  disabled_levels: [],
  extensions: [
    '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs',
    '.py', '.go', '.rs', '.java', '.kt', '.rb',
    '.c', '.h', '.cpp', '.hpp', '.cs', '.swift',
    '.php', '.scala', '.sh', '.sql',
  ],
  ignore: [],
  history_limit: 50,
}

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
  backoff_base: 2,
  backoff_unit_ms: 1000,
  max_backoff_ms: 60_000,
  history_limit: 100,
  ema_alpha: 0.2,
  categories: {},
}

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  // 10 minutes per attempt
  default_timeout_ms: 600_000,
  env_passthrough: ['ANTHROPIC_API_KEY', 'GITHUB_TOKEN', 'GITHUB_REPO_URL'],
}

export const DEFAULT_GIT_CONFIG: GitConfig = {
  enabled: true,
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PhaseflowConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  discovery: DEFAULT_DISCOVERY_CONFIG,
  recovery: DEFAULT_RECOVERY_CONFIG,
  agent: DEFAULT_AGENT_CONFIG,
  git: DEFAULT_GIT_CONFIG,
}
