/**
 * StateStore interface: key/value document persistence with immutable
 * named checkpoints.
 *
 * All engine state (workflow documents, recovery telemetry, discovery
 * history) goes through this contract. Two backends implement it:
 *  - FileStateStore   (one JSON file per document, atomic rename)
 *  - SqliteStateStore (better-sqlite3, one transaction per write)
 */

import type { BaseService } from '../core/di.js'
import { StateCorruptionError } from '../core/errors.js'
import type { CheckpointDocument, CheckpointPhaseState } from './schemas/workflow-state.js'

export type StateBackendKind = 'file' | 'sqlite'

/** Optional metadata recorded alongside a checkpoint snapshot */
export interface CheckpointMeta {
  workflowId?: string
  phaseStates?: Record<string, CheckpointPhaseState>
  /** Snapshot only these keys; every live document when absent */
  keys?: string[]
}

export interface CheckpointSummary {
  name: string
  workflowId?: string
  timestamp: string
  sequence: number
}

export interface StateStore extends BaseService {
  readonly backend: StateBackendKind

  /** Persist a JSON-serializable document under `key`, replacing any previous value */
  save(key: string, value: unknown): Promise<void>

  /**
   * Load the document stored under `key`.
   * @returns undefined when no document exists
   * @throws {StateCorruptionError} when the stored document cannot be parsed
   */
  load(key: string): Promise<unknown>

  /** Remove a document; returns whether it existed */
  delete(key: string): Promise<boolean>

  /** Keys of all live documents, optionally filtered by prefix, sorted */
  keys(prefix?: string): Promise<string[]>

  /**
   * Snapshot every live document (or only `meta.keys`) under an immutable name.
   * @throws {CheckpointExistsError} when the name is already taken
   */
  checkpoint(name: string, meta?: CheckpointMeta): Promise<CheckpointDocument>

  /**
   * Read a checkpoint without touching live documents.
   * @throws {CheckpointNotFoundError}
   */
  readCheckpoint(name: string): Promise<CheckpointDocument>

  /**
   * Replace live documents with the snapshot taken by `checkpoint(name)`: all
   * of them for a full snapshot, only the snapshot's keys for a scoped one.
   * @throws {CheckpointNotFoundError}
   */
  restore(name: string): Promise<CheckpointDocument>

  /** Checkpoints oldest first, optionally only those of one workflow */
  listCheckpoints(workflowId?: string): Promise<CheckpointSummary[]>
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/** Serialize a document; rejects values JSON cannot represent */
export function serializeDocument(key: string, value: unknown): string {
  const json = JSON.stringify(value)
  if (json === undefined) {
    throw new TypeError(`Value for "${key}" is not JSON-serializable`)
  }
  return json
}

export function parseDocument(key: string, raw: string, location: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new StateCorruptionError(`Document "${key}" is unreadable: ${message}`, { key, location })
  }
}

export function compareCheckpoints(a: CheckpointSummary, b: CheckpointSummary): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1
  return a.sequence - b.sequence
}
