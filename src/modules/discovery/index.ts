/**
 * Deterministic discovery module.
 */

export { DeterministicDiscovery, createDeterministicDiscovery } from './deterministic-discovery.js'
export type { DiscoveryOptions } from './deterministic-discovery.js'
export {
  HISTORY_KEY,
  InMemoryDiscoveryHistory,
  StoredDiscoveryHistory,
} from './history-store.js'
export type { DiscoveryHistory, HistoryEntry } from './history-store.js'
export { discoveryDocumentPath, runDiscoveryPhase, writeDiscoveryDocument } from './discovery-handler.js'
export { normalizeItems } from './normalize.js'
export { computeSeed, extractKeywords } from './seed.js'
export { walkProject } from './project-walker.js'
export { DISCOVERY_LEVEL_NAMES } from './types.js'
export type { DiscoveryLevel, DiscoveryResult, LevelOutcome } from './types.js'
