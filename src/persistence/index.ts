/**
 * Barrel exports for the persistence layer.
 */

import { join } from 'node:path'
import type { StateBackendKind, StateStore } from './state-store.js'
import { createFileStateStore } from './file-state-store.js'
import { createSqliteStateStore } from './sqlite-state-store.js'

export type { StateStore, StateBackendKind, CheckpointMeta, CheckpointSummary } from './state-store.js'
export { FileStateStore, createFileStateStore } from './file-state-store.js'
export { SqliteStateStore, createSqliteStateStore, IN_MEMORY_DATABASE } from './sqlite-state-store.js'
export { DatabaseWrapper } from './database.js'
export { runMigrations } from './migrations/index.js'
export * from './schemas/workflow-state.js'

/**
 * Create the configured backend rooted at `stateDir`.
 * The SQLite backend keeps everything in `<stateDir>/state.db`.
 */
export function createStateStore(backend: StateBackendKind, stateDir: string): StateStore {
  return backend === 'sqlite'
    ? createSqliteStateStore(join(stateDir, 'state.db'))
    : createFileStateStore(stateDir)
}
