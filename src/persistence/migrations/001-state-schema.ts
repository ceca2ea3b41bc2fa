/**
 * Migration 001: state store schema.
 *
 *  - documents   live key/value documents
 *  - checkpoints immutable named snapshots; seq orders them
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const stateSchemaMigration: Migration = {
  version: 1,
  name: '001-state-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        key        TEXT PRIMARY KEY,
        value      TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS checkpoints (
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        name        TEXT    NOT NULL UNIQUE,
        workflow_id TEXT,
        created_at  TEXT    NOT NULL,
        body        TEXT    NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_checkpoints_workflow ON checkpoints(workflow_id);
    `)
  },
}
