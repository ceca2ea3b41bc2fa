/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by the state store
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/**
 * Opens a SQLite database, applies required PRAGMAs, and exposes the raw
 * BetterSqlite3 instance.
 */
export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database at the configured path and apply all required PRAGMAs.
   * Idempotent: calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)

    const journalMode: unknown = this._db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      // In-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')
  }

  /**
   * Close the database. Idempotent: calling close() when already closed is a no-op.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  /** Whether the database is currently open */
  get isOpen(): boolean {
    return this._db !== null
  }
}
