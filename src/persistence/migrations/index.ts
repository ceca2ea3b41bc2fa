/**
 * Migration runner for the SQLite persistence layer.
 *
 * Responsibilities:
 *  - Ensure the `schema_migrations` table exists
 *  - Track which migrations have already been applied
 *  - Apply pending migrations in version order (idempotent)
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { stateSchemaMigration } from './001-state-schema.js'

const logger = createLogger('persistence:migrations')

// ---------------------------------------------------------------------------
// Migration interface
// ---------------------------------------------------------------------------

export interface Migration {
  /** Unique version number (integer) */
  version: number
  /** Human-readable name for the migration */
  name: string
  /** Execute the migration; must be idempotent */
  up(db: BetterSqlite3Database): void
}

// ---------------------------------------------------------------------------
// Registered migrations; add new migrations here in version order
// ---------------------------------------------------------------------------

const MIGRATIONS: Migration[] = [stateSchemaMigration]

// ---------------------------------------------------------------------------
// Migration runner
// ---------------------------------------------------------------------------

/**
 * Ensure `schema_migrations` table exists and run any pending migrations.
 * Safe to call multiple times: already-applied migrations are skipped.
 *
 * @returns the versions applied by this call
 */
export function runMigrations(db: BetterSqlite3Database): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version   INTEGER PRIMARY KEY,
      name      TEXT    NOT NULL,
      applied_at TEXT   NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version),
  )

  const pending = MIGRATIONS.filter((m) => !appliedVersions.has(m.version)).sort(
    (a, b) => a.version - b.version,
  )

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return []
  }

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)',
  )

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration')

    // Run the migration and record it atomically
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
  }

  return pending.map((m) => m.version)
}
