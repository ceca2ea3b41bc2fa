/**
 * FileStateStore: one JSON file per document under a state directory.
 *
 * Layout:
 *   <root>/documents/<encoded key>.json
 *   <root>/checkpoints/<encoded name>.json
 *
 * Every write goes to a temporary file in the target directory and is then
 * renamed over the target. Checkpoints are published with link(2), which
 * fails when the name already exists.
 */

import { mkdir, readFile, readdir, rename, writeFile, link, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import { randomBytes } from 'node:crypto'
import { createLogger } from '../utils/logger.js'
import {
  CheckpointExistsError,
  CheckpointNotFoundError,
  StateCorruptionError,
} from '../core/errors.js'
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

const logger = createLogger('persistence:file-store')

const JSON_SUFFIX = '.json'

function encodeName(name: string): string {
  return encodeURIComponent(name) + JSON_SUFFIX
}

function decodeName(fileName: string): string | null {
  if (!fileName.endsWith(JSON_SUFFIX)) return null
  return decodeURIComponent(fileName.slice(0, -JSON_SUFFIX.length))
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

export class FileStateStore implements StateStore {
  readonly backend = 'file' as const

  private readonly _documentsDir: string
  private readonly _checkpointsDir: string
  /** Per-key write chain so concurrent saves land in call order */
  private readonly _writeChains = new Map<string, Promise<void>>()

  constructor(rootDir: string) {
    this._documentsDir = join(rootDir, 'documents')
    this._checkpointsDir = join(rootDir, 'checkpoints')
  }

  async initialize(): Promise<void> {
    await mkdir(this._documentsDir, { recursive: true })
    await mkdir(this._checkpointsDir, { recursive: true })
    logger.debug({ dir: this._documentsDir }, 'File state store initialized')
  }

  async shutdown(): Promise<void> {
    await Promise.all(this._writeChains.values())
  }

  // -------------------------------------------------------------------------
  // Documents
  // -------------------------------------------------------------------------

  async save(key: string, value: unknown): Promise<void> {
    const json = serializeDocument(key, value)
    const target = join(this._documentsDir, encodeName(key))
    const previous = this._writeChains.get(key) ?? Promise.resolve()
    const next = previous.then(() => this._atomicWrite(target, json))
    const tail: Promise<void> = next
      .catch((err: unknown) => {
        logger.error({ key, err }, 'Failed to save document')
      })
      .then(() => {
        if (this._writeChains.get(key) === tail) this._writeChains.delete(key)
      })
    this._writeChains.set(key, tail)
    await next
  }

  async load(key: string): Promise<unknown> {
    await this._writeChains.get(key)
    const path = join(this._documentsDir, encodeName(key))
    const raw = await this._readIfExists(path)
    if (raw === undefined) return undefined
    return parseDocument(key, raw, path)
  }

  async delete(key: string): Promise<boolean> {
    await this._writeChains.get(key)
    try {
      await unlink(join(this._documentsDir, encodeName(key)))
      return true
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false
      throw err
    }
  }

  async keys(prefix = ''): Promise<string[]> {
    await Promise.all(this._writeChains.values())
    const entries = await readdir(this._documentsDir)
    return entries
      .map(decodeName)
      .filter((key): key is string => key !== null && key.startsWith(prefix))
      .sort()
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  async checkpoint(name: string, meta: CheckpointMeta = {}): Promise<CheckpointDocument> {
    const existing = await this._readCheckpointFiles()
    if (existing.some((c) => c.name === name)) {
      throw new CheckpointExistsError(name)
    }

    const documents: Record<string, unknown> = {}
    for (const key of meta.keys ?? (await this.keys())) {
      try {
        const value = await this.load(key)
        if (value !== undefined) documents[key] = value
      } catch (err) {
        if (!(err instanceof StateCorruptionError)) throw err
        logger.warn({ key, name }, 'Corrupt document left out of checkpoint')
      }
    }

    const doc: CheckpointDocument = {
      format_version: CHECKPOINT_FORMAT_VERSION,
      name,
      workflow_id: meta.workflowId,
      timestamp: new Date().toISOString(),
      sequence: existing.reduce((max, c) => Math.max(max, c.sequence), 0) + 1,
      phase_states: meta.phaseStates ?? {},
      documents,
      ...(meta.keys !== undefined ? { keys: [...meta.keys] } : {}),
    }

    const target = join(this._checkpointsDir, encodeName(name))
    const tmp = this._tmpPath(target)
    await writeFile(tmp, JSON.stringify(doc), 'utf-8')
    try {
      await link(tmp, target)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
        throw new CheckpointExistsError(name)
      }
      throw err
    } finally {
      await unlink(tmp)
    }

    logger.debug({ name, documents: Object.keys(documents).length }, 'Checkpoint written')
    return doc
  }

  async readCheckpoint(name: string): Promise<CheckpointDocument> {
    const path = join(this._checkpointsDir, encodeName(name))
    const raw = await this._readIfExists(path)
    if (raw === undefined) throw new CheckpointNotFoundError(name)
    return this._parseCheckpoint(name, raw, path)
  }

  async restore(name: string): Promise<CheckpointDocument> {
    const doc = await this.readCheckpoint(name)
    const current = doc.keys ?? (await this.keys())

    for (const [key, value] of Object.entries(doc.documents)) {
      await this.save(key, value)
    }
    for (const key of current) {
      if (!(key in doc.documents)) await this.delete(key)
    }

    logger.info({ name }, 'Restored checkpoint')
    return doc
  }

  async listCheckpoints(workflowId?: string): Promise<CheckpointSummary[]> {
    const summaries = await this._readCheckpointFiles()
    return summaries
      .filter((c) => workflowId === undefined || c.workflowId === workflowId)
      .sort(compareCheckpoints)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _tmpPath(target: string): string {
    return `${target}.${String(process.pid)}.${randomBytes(4).toString('hex')}.tmp`
  }

  private async _atomicWrite(target: string, content: string): Promise<void> {
    const tmp = this._tmpPath(target)
    await writeFile(tmp, content, 'utf-8')
    await rename(tmp, target)
  }

  private async _readIfExists(path: string): Promise<string | undefined> {
    try {
      return await readFile(path, 'utf-8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return undefined
      throw err
    }
  }

  private _parseCheckpoint(name: string, raw: string, path: string): CheckpointDocument {
    const result = CheckpointDocumentSchema.safeParse(parseDocument(name, raw, path))
    if (!result.success) {
      throw new StateCorruptionError(`Checkpoint "${name}" is malformed: ${result.error.message}`, {
        name,
        location: path,
      })
    }
    return result.data
  }

  private async _readCheckpointFiles(): Promise<CheckpointSummary[]> {
    const summaries: CheckpointSummary[] = []
    for (const entry of await readdir(this._checkpointsDir)) {
      const name = decodeName(entry)
      if (name === null) continue
      const path = join(this._checkpointsDir, entry)
      let doc: CheckpointDocument
      try {
        doc = this._parseCheckpoint(name, await readFile(path, 'utf-8'), path)
      } catch (err) {
        if (!(err instanceof StateCorruptionError)) throw err
        logger.warn({ name }, 'Skipping unreadable checkpoint')
        continue
      }
      summaries.push({
        name: doc.name,
        workflowId: doc.workflow_id,
        timestamp: doc.timestamp,
        sequence: doc.sequence,
      })
    }
    return summaries
  }
}

export function createFileStateStore(rootDir: string): StateStore {
  return new FileStateStore(rootDir)
}
