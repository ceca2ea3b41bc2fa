/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  readEnvOverrides,
  readCredentials,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PhaseflowConfigSchema,
  PartialPhaseflowConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  PhaseflowConfig,
  PartialPhaseflowConfig,
  DiscoveryConfig,
  RecoveryConfig,
  AgentConfig,
  GitConfig,
  StateBackend,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
