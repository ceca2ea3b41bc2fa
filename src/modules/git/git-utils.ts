/**
 * git-utils.ts: low-level git command helpers.
 *
 * Git is driven through child_process.spawn; no git library is involved.
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
}

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * @param args    - Arguments to pass to git (e.g., ['status', '--porcelain'])
 * @param options - Optional spawn options (cwd, env)
 * @returns       - Object with stdout, stderr, and exit code; never rejects
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args, cwd: options?.cwd }, 'spawnGit')

    const proc = spawn('git', args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}
