/**
 * Types for deterministic discovery.
 *
 * DiscoveryResult uses the snake_case field names of the discovery document
 * written to `<stateDir>/discovery/<workflowId>.json`.
 */

export type DiscoveryLevel = 1 | 2 | 3 | 4

export const DISCOVERY_LEVEL_NAMES: Readonly<Record<DiscoveryLevel, string>> = {
  1: 'informed',
  2: 'structural',
  3: 'minimal',
  4: 'empty',
}

export type LevelOutcomeStatus = 'succeeded' | 'failed' | 'skipped'

export interface LevelOutcome {
  level: DiscoveryLevel
  name: string
  outcome: LevelOutcomeStatus
  reason?: string
}

export interface DiscoveryResult {
  /** Discovery always answers; the empty level is the terminal fallback */
  success: true
  level: DiscoveryLevel
  /** Project-relative POSIX paths, deduplicated and sorted by code unit */
  items: string[]
  seed: number
  fallback_chain: LevelOutcome[]
}

/** What a level reports back to the fallback chain */
export type LevelAttempt =
  | { outcome: 'succeeded'; items: string[] }
  | { outcome: 'failed'; reason: string }
