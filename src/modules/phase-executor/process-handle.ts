/**
 * ProcessHandle: runs one phase handler process to completion.
 *
 * Responsibilities:
 *  - Spawning the child process with the handler's command and environment
 *  - Writing the JSON invocation to stdin
 *  - Collecting stdout / stderr into buffers
 *  - Enforcing the phase timeout via SIGKILL
 *  - Terminating the process when the workflow is aborted
 */

import { spawn } from 'node:child_process'
import type { ChildProcess } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('phase-executor:process')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessCommand {
  command: string
  args: readonly string[]
  cwd?: string
  env: NodeJS.ProcessEnv
  stdin?: string
  timeoutMs?: number
  signal?: AbortSignal
}

export interface ProcessResult {
  stdout: string
  stderr: string
  /** null when the process was ended by a signal */
  exitCode: number | null
  timedOut: boolean
  aborted: boolean
  durationMs: number
}

// ---------------------------------------------------------------------------
// ProcessHandle
// ---------------------------------------------------------------------------

export class ProcessHandle {
  private readonly _cmd: ProcessCommand
  private _proc: ChildProcess | null = null
  private _timeoutHandle: ReturnType<typeof setTimeout> | null = null
  private _timedOut = false
  private _aborted = false
  readonly startedAt: Date = new Date()

  constructor(cmd: ProcessCommand) {
    this._cmd = cmd
  }

  /**
   * Spawn the process and resolve once it has closed.
   * Rejects only when the process cannot be started at all.
   */
  run(): Promise<ProcessResult> {
    const cmd = this._cmd

    return new Promise<ProcessResult>((resolve, reject) => {
      if (cmd.signal?.aborted === true) {
        this._aborted = true
        resolve(this._result('', '', null))
        return
      }

      const proc = spawn(cmd.command, [...cmd.args], {
        cwd: cmd.cwd,
        env: cmd.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      })
      this._proc = proc

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      // A handler that exits without reading stdin closes the pipe early
      proc.stdin.on('error', (err) => {
        logger.debug({ err, command: cmd.command }, 'stdin closed by handler')
      })
      if (cmd.stdin !== undefined && cmd.stdin !== '') {
        proc.stdin.write(cmd.stdin)
      }
      proc.stdin.end()

      if (cmd.timeoutMs !== undefined && cmd.timeoutMs > 0) {
        this._timeoutHandle = setTimeout(() => {
          this._timedOut = true
          proc.kill('SIGKILL')
        }, cmd.timeoutMs)
      }

      const onAbort = (): void => {
        this.terminate('SIGTERM')
      }
      cmd.signal?.addEventListener('abort', onAbort, { once: true })

      proc.on('error', (err) => {
        this._clearTimer()
        cmd.signal?.removeEventListener('abort', onAbort)
        reject(err)
      })

      proc.on('close', (exitCode) => {
        this._clearTimer()
        cmd.signal?.removeEventListener('abort', onAbort)
        resolve(
          this._result(
            Buffer.concat(stdoutChunks).toString('utf-8'),
            Buffer.concat(stderrChunks).toString('utf-8'),
            exitCode,
          ),
        )
      })
    })
  }

  /**
   * Send a signal to the child process.
   *
   * @param signal - 'SIGTERM' for graceful shutdown, 'SIGKILL' for immediate termination
   */
  terminate(signal: 'SIGTERM' | 'SIGKILL'): void {
    if (this._proc !== null && this._proc.exitCode === null) {
      this._aborted = true
      this._clearTimer()
      this._proc.kill(signal)
    }
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt.getTime()
  }

  private _clearTimer(): void {
    if (this._timeoutHandle !== null) {
      clearTimeout(this._timeoutHandle)
      this._timeoutHandle = null
    }
  }

  private _result(stdout: string, stderr: string, exitCode: number | null): ProcessResult {
    return {
      stdout,
      stderr,
      exitCode,
      timedOut: this._timedOut,
      aborted: this._aborted,
      durationMs: this.elapsedMs,
    }
  }
}

export function runProcess(cmd: ProcessCommand): Promise<ProcessResult> {
  return new ProcessHandle(cmd).run()
}
