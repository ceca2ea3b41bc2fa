/**
 * DiscoveryHistory: outcomes of past tasks, kept in the state store under
 * `discovery:history` and consulted by the informed level.
 */

import { z } from 'zod'
import type { StateStore } from '../../persistence/state-store.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('discovery:history')

export const HISTORY_KEY = 'discovery:history'

const HistoryEntrySchema = z.object({
  keywords: z.array(z.string()),
  items: z.array(z.string()),
  recordedAt: z.string(),
})

const HistoryDocumentSchema = z.object({
  entries: z.array(HistoryEntrySchema).default([]),
})

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>

export interface DiscoveryHistory {
  /** Entries oldest first */
  entries(): Promise<HistoryEntry[]>
  record(entry: HistoryEntry): Promise<void>
}

/** Keeps entries in memory only; used when no store is configured */
export class InMemoryDiscoveryHistory implements DiscoveryHistory {
  private readonly _entries: HistoryEntry[] = []

  constructor(private readonly _limit = 50) {}

  entries(): Promise<HistoryEntry[]> {
    return Promise.resolve([...this._entries])
  }

  record(entry: HistoryEntry): Promise<void> {
    this._entries.push(entry)
    const excess = this._entries.length - this._limit
    if (excess > 0) this._entries.splice(0, excess)
    return Promise.resolve()
  }
}

export class StoredDiscoveryHistory implements DiscoveryHistory {
  constructor(
    private readonly _store: StateStore,
    private readonly _limit = 50,
  ) {}

  async entries(): Promise<HistoryEntry[]> {
    const raw = await this._store.load(HISTORY_KEY)
    if (raw === undefined) return []
    const parsed = HistoryDocumentSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Discovery history has an unexpected shape; ignoring it')
      return []
    }
    return parsed.data.entries
  }

  async record(entry: HistoryEntry): Promise<void> {
    let existing: HistoryEntry[]
    try {
      existing = await this.entries()
    } catch (err) {
      logger.warn({ err }, 'Discovery history unreadable; starting a new one')
      existing = []
    }
    const entries = [...existing, entry].slice(-this._limit)
    await this._store.save(HISTORY_KEY, { entries })
  }
}
