/**
 * DeterministicDiscovery: finds the files relevant to a task without any
 * model involvement.
 *
 * Levels are tried from most to least informed and the first success wins.
 * The same description against the same project tree and history always
 * yields the same result; `discover()` never throws.
 */

import { resolve } from 'node:path'
import type { Task } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { InMemoryDiscoveryHistory, type DiscoveryHistory } from './history-store.js'
import { emptyLevel, informedLevel, minimalLevel, structuralLevel, type LevelInput } from './levels.js'
import { normalizeItems } from './normalize.js'
import { computeSeed, extractKeywords } from './seed.js'
import {
  DISCOVERY_LEVEL_NAMES,
  type DiscoveryLevel,
  type DiscoveryResult,
  type LevelAttempt,
  type LevelOutcome,
} from './types.js'

const logger = createLogger('discovery')

export interface DiscoveryOptions {
  /** Project root the walk starts from */
  root: string
  maxItems?: number
  disabledLevels?: readonly DiscoveryLevel[]
  extensions?: readonly string[]
  ignore?: readonly string[]
  history?: DiscoveryHistory
}

const LEVELS: ReadonlyArray<{ level: DiscoveryLevel; run: (input: LevelInput) => Promise<LevelAttempt> }> = [
  { level: 1, run: informedLevel },
  { level: 2, run: structuralLevel },
  { level: 3, run: minimalLevel },
  { level: 4, run: emptyLevel },
]

const DEFAULT_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.py', '.go', '.rs', '.java']

export class DeterministicDiscovery {
  private readonly _root: string
  private readonly _maxItems: number
  private readonly _disabled: ReadonlySet<DiscoveryLevel>
  private readonly _extensions: readonly string[]
  private readonly _ignore: readonly string[]
  private readonly _history: DiscoveryHistory

  constructor(options: DiscoveryOptions) {
    this._root = resolve(options.root)
    this._maxItems = options.maxItems ?? 200
    this._disabled = new Set(options.disabledLevels ?? [])
    this._extensions = options.extensions ?? DEFAULT_EXTENSIONS
    this._ignore = options.ignore ?? []
    this._history = options.history ?? new InMemoryDiscoveryHistory()
  }

  get root(): string {
    return this._root
  }

  async discover(task: Task): Promise<DiscoveryResult> {
    const seed = computeSeed(task.description)
    const input: LevelInput = {
      root: this._root,
      keywords: extractKeywords(task.description),
      seed,
      maxItems: this._maxItems,
      extensions: this._extensions,
      ignore: this._ignore,
      history: this._history,
    }
    const chain: LevelOutcome[] = []

    for (const { level, run } of LEVELS) {
      const name = DISCOVERY_LEVEL_NAMES[level]
      // The empty level is the terminal fallback and cannot be disabled
      if (level !== 4 && this._disabled.has(level)) {
        chain.push({ level, name, outcome: 'skipped', reason: 'disabled' })
        continue
      }

      let attempt: LevelAttempt
      try {
        attempt = await run(input)
      } catch (err) {
        attempt = { outcome: 'failed', reason: toError(err).message }
      }

      if (attempt.outcome === 'failed') {
        logger.debug({ workflowId: task.workflowId, level, reason: attempt.reason }, 'Discovery level failed')
        chain.push({ level, name, outcome: 'failed', reason: attempt.reason })
        continue
      }

      const items = normalizeItems(attempt.items, this._root, this._maxItems)
      chain.push({ level, name, outcome: 'succeeded' })
      logger.info({ workflowId: task.workflowId, level, items: items.length }, 'Discovery complete')
      return { success: true, level, items, seed, fallback_chain: chain }
    }

    // Unreachable while the empty level is in LEVELS
    return { success: true, level: 4, items: [], seed, fallback_chain: chain }
  }

  /**
   * Remember which files a task ended up touching so later tasks with
   * overlapping keywords can start from them.
   */
  async recordOutcome(task: Task, items: readonly string[]): Promise<void> {
    const keywords = extractKeywords(task.description)
    const normalized = normalizeItems(items, this._root, Number.POSITIVE_INFINITY)
    if (keywords.length === 0 || normalized.length === 0) return
    try {
      await this._history.record({ keywords, items: normalized, recordedAt: new Date().toISOString() })
    } catch (err) {
      logger.warn({ err, workflowId: task.workflowId }, 'Failed to record discovery outcome')
    }
  }
}

export function createDeterministicDiscovery(options: DiscoveryOptions): DeterministicDiscovery {
  return new DeterministicDiscovery(options)
}
