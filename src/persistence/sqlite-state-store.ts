/**
 * SqliteStateStore: StateStore backed by better-sqlite3.
 *
 * better-sqlite3 is synchronous, so every operation runs to completion
 * before the next begins; multi-row writes use a transaction.
 */

import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { createLogger } from '../utils/logger.js'
import {
  CheckpointExistsError,
  CheckpointNotFoundError,
  StateCorruptionError,
} from '../core/errors.js'
import { DatabaseWrapper } from './database.js'
import { runMigrations } from './migrations/index.js'
import {
  CHECKPOINT_FORMAT_VERSION,
  CheckpointDocumentSchema,
  type CheckpointDocument,
} from './schemas/workflow-state.js'
import {
  compareCheckpoints,
  parseDocument,
  serializeDocument,
  type CheckpointMeta,
  type CheckpointSummary,
  type StateStore,
} from './state-store.js'

const logger = createLogger('persistence:sqlite-store')

export const IN_MEMORY_DATABASE = ':memory:'

interface DocumentRow {
  key: string
  value: string
}

interface CheckpointRow {
  seq: number
  name: string
  workflow_id: string | null
  created_at: string
  body: string
}

export class SqliteStateStore implements StateStore {
  readonly backend = 'sqlite' as const

  private readonly _wrapper: DatabaseWrapper
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  async initialize(): Promise<void> {
    if (this._path !== IN_MEMORY_DATABASE) {
      await mkdir(dirname(this._path), { recursive: true })
    }
    this._wrapper.open()
    runMigrations(this._wrapper.db)
    logger.debug({ path: this._path }, 'SQLite state store initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }

  // -------------------------------------------------------------------------
  // Documents
  // -------------------------------------------------------------------------

  async save(key: string, value: unknown): Promise<void> {
    const json = serializeDocument(key, value)
    this._wrapper.db
      .prepare<[string, string]>(
        `INSERT INTO documents (key, value, updated_at) VALUES (?, ?, datetime('now'))
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, json)
  }

  async load(key: string): Promise<unknown> {
    const row = this._wrapper.db
      .prepare<[string], DocumentRow>('SELECT key, value FROM documents WHERE key = ?')
      .get(key)
    if (row === undefined) return undefined
    return parseDocument(key, row.value, `${this._path}#documents/${key}`)
  }

  async delete(key: string): Promise<boolean> {
    const result = this._wrapper.db.prepare<[string]>('DELETE FROM documents WHERE key = ?').run(key)
    return result.changes > 0
  }

  async keys(prefix = ''): Promise<string[]> {
    return this._wrapper.db
      .prepare<[], { key: string }>('SELECT key FROM documents ORDER BY key')
      .all()
      .map((row) => row.key)
      .filter((key) => key.startsWith(prefix))
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  async checkpoint(name: string, meta: CheckpointMeta = {}): Promise<CheckpointDocument> {
    const db = this._wrapper.db

    const write = db.transaction((): CheckpointDocument => {
      const taken = db
        .prepare<[string], { seq: number }>('SELECT seq FROM checkpoints WHERE name = ?')
        .get(name)
      if (taken !== undefined) throw new CheckpointExistsError(name)

      const rows =
        meta.keys === undefined
          ? db.prepare<[], DocumentRow>('SELECT key, value FROM documents ORDER BY key').all()
          : meta.keys.flatMap((key) => {
              const row = db.prepare<[string], DocumentRow>('SELECT key, value FROM documents WHERE key = ?').get(key)
              return row === undefined ? [] : [row]
            })
      const documents: Record<string, unknown> = {}
      for (const row of rows) {
        try {
          documents[row.key] = parseDocument(row.key, row.value, this._path)
        } catch (err) {
          if (!(err instanceof StateCorruptionError)) throw err
          logger.warn({ key: row.key, name }, 'Corrupt document left out of checkpoint')
        }
      }

      const timestamp = new Date().toISOString()
      const body: Omit<CheckpointDocument, 'sequence'> = {
        format_version: CHECKPOINT_FORMAT_VERSION,
        name,
        workflow_id: meta.workflowId,
        timestamp,
        phase_states: meta.phaseStates ?? {},
        documents,
        ...(meta.keys !== undefined ? { keys: [...meta.keys] } : {}),
      }
      const result = db
        .prepare<[string, string | null, string, string]>(
          'INSERT INTO checkpoints (name, workflow_id, created_at, body) VALUES (?, ?, ?, ?)',
        )
        .run(name, meta.workflowId ?? null, timestamp, JSON.stringify(body))

      return { ...body, sequence: Number(result.lastInsertRowid) }
    })

    const doc = write()
    logger.debug({ name, documents: Object.keys(doc.documents).length }, 'Checkpoint written')
    return doc
  }

  async readCheckpoint(name: string): Promise<CheckpointDocument> {
    const row = this._wrapper.db
      .prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE name = ?')
      .get(name)
    if (row === undefined) throw new CheckpointNotFoundError(name)
    return this._parseCheckpoint(row)
  }

  async restore(name: string): Promise<CheckpointDocument> {
    const doc = await this.readCheckpoint(name)
    const db = this._wrapper.db

    const scope = doc.keys
    const replace = db.transaction(() => {
      if (scope === undefined) {
        db.prepare('DELETE FROM documents').run()
      } else {
        const remove = db.prepare<[string]>('DELETE FROM documents WHERE key = ?')
        for (const key of scope) remove.run(key)
      }
      const insert = db.prepare<[string, string]>('INSERT INTO documents (key, value) VALUES (?, ?)')
      for (const [key, value] of Object.entries(doc.documents)) {
        insert.run(key, serializeDocument(key, value))
      }
    })
    replace()

    logger.info({ name }, 'Restored checkpoint')
    return doc
  }

  async listCheckpoints(workflowId?: string): Promise<CheckpointSummary[]> {
    const rows = this._wrapper.db
      .prepare<[], Omit<CheckpointRow, 'body'>>('SELECT seq, name, workflow_id, created_at FROM checkpoints')
      .all()
    return rows
      .filter((row) => workflowId === undefined || row.workflow_id === workflowId)
      .map((row) => ({
        name: row.name,
        workflowId: row.workflow_id ?? undefined,
        timestamp: row.created_at,
        sequence: row.seq,
      }))
      .sort(compareCheckpoints)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _parseCheckpoint(row: CheckpointRow): CheckpointDocument {
    const raw = parseDocument(row.name, row.body, `${this._path}#checkpoints/${row.name}`)
    const result = CheckpointDocumentSchema.safeParse(raw)
    if (!result.success) {
      throw new StateCorruptionError(`Checkpoint "${row.name}" is malformed: ${result.error.message}`, {
        name: row.name,
      })
    }
    return { ...result.data, sequence: row.seq }
  }
}

export function createSqliteStateStore(databasePath: string): StateStore {
  return new SqliteStateStore(databasePath)
}
