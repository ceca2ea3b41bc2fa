/**
 * PhaseExecutorImpl: dispatches a phase attempt on its handler variant.
 *
 *  - agent / script: child process, JSON invocation on stdin, structured
 *    output on the last JSON line of stdout, raw output kept under
 *    `<stateDir>/logs/<workflowId>/<phase>-<attempt>.log`
 *  - discovery: built-in deterministic discovery
 *  - function: handler registered on the HandlerRegistry
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { HandlerReference, PhaseOutput } from '../../core/types.js'
import { PhaseExecutionError, PhaseTimeoutError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import { maskSecrets } from '../../utils/masking.js'
import type { DeterministicDiscovery } from '../discovery/deterministic-discovery.js'
import { runDiscoveryPhase } from '../discovery/discovery-handler.js'
import type { HandlerRegistry, PhaseContext } from './handler-registry.js'
import { parseStructuredOutput, validatePhaseOutput } from './output-parser.js'
import type { PhaseExecutor, PhaseRequest, PhaseResult } from './phase-executor.js'
import { runProcess, type ProcessCommand, type ProcessResult } from './process-handle.js'

const logger = createLogger('phase-executor')

type ProcessHandlerReference = Extract<HandlerReference, { type: 'agent' | 'script' }>

export interface PhaseExecutorOptions {
  stateDir: string
  /** Working directory of handler processes */
  projectRoot: string
  registry: HandlerRegistry
  discovery?: DeterministicDiscovery
  /** Opaque pass-through credentials, exported to handler processes */
  credentials?: Readonly<Record<string, string>>
  /** Base environment of handler processes */
  env?: NodeJS.ProcessEnv
  /** Swappable for tests */
  spawnProcess?: (cmd: ProcessCommand) => Promise<ProcessResult>
}

export function rawLogPathFor(stateDir: string, workflowId: string, phase: string, attempt: number): string {
  return join(stateDir, 'logs', encodeURIComponent(workflowId), `${phase}-${String(attempt)}.log`)
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/)
  return lines[lines.length - 1] ?? ''
}

export class PhaseExecutorImpl implements PhaseExecutor {
  private readonly _options: PhaseExecutorOptions
  private readonly _spawn: (cmd: ProcessCommand) => Promise<ProcessResult>

  constructor(options: PhaseExecutorOptions) {
    this._options = options
    this._spawn = options.spawnProcess ?? runProcess
  }

  async execute(request: PhaseRequest): Promise<PhaseResult> {
    const { phase } = request
    const startedAt = Date.now()
    logger.debug({ workflowId: request.task.workflowId, phase: phase.name, attempt: request.attempt }, 'Executing phase')

    const handler = phase.handler
    switch (handler.type) {
      case 'agent':
      case 'script':
        return this._executeProcess(request, handler, startedAt)

      case 'discovery': {
        if (this._options.discovery === undefined) {
          throw new PhaseExecutionError(`Phase "${phase.name}" needs discovery but none is configured`, {
            phase: phase.name,
          })
        }
        const discovery = this._options.discovery
        const output = await this._withTimeout(request, () =>
          runDiscoveryPhase(discovery, request.task, this._options.stateDir),
        )
        return { output, durationMs: Date.now() - startedAt }
      }

      case 'function': {
        const fn = this._options.registry.get(handler.name)
        if (fn === undefined) {
          throw new PhaseExecutionError(`Function handler "${handler.name}" is not registered`, {
            phase: phase.name,
          })
        }
        const raw = await this._withTimeout(request, (signal) =>
          fn({
            task: request.task,
            phase,
            options: phase.options,
            context: this._context(request),
            signal,
          }),
        )
        const parsed = validatePhaseOutput(raw)
        if (!parsed.ok) {
          throw new PhaseExecutionError(`Phase "${phase.name}" returned ${parsed.reason}`, { phase: phase.name })
        }
        return { output: this._accept(request, parsed.output), durationMs: Date.now() - startedAt }
      }
    }
  }

  // -------------------------------------------------------------------------
  // Process handlers
  // -------------------------------------------------------------------------

  private async _executeProcess(
    request: PhaseRequest,
    handler: ProcessHandlerReference,
    startedAt: number,
  ): Promise<PhaseResult> {
    const { phase, task } = request
    const rawLogPath = rawLogPathFor(this._options.stateDir, task.workflowId, phase.name, request.attempt)
    const stdin = JSON.stringify({
      task,
      phase,
      options: phase.options,
      context: this._context(request),
    })

    let result: ProcessResult
    try {
      result = await this._spawn({
        command: handler.command,
        args: handler.args,
        cwd: this._options.projectRoot,
        env: { ...(this._options.env ?? process.env), ...this._options.credentials, ...handler.env },
        stdin,
        timeoutMs: phase.timeoutMs,
        signal: request.signal,
      })
    } catch (err) {
      throw new PhaseExecutionError(
        `Failed to start handler "${handler.command}" for phase "${phase.name}": ${toError(err).message}`,
        { phase: phase.name, command: handler.command },
      )
    }

    await this._writeRawLog(rawLogPath, result)
    const context = { phase: phase.name, attempt: request.attempt, rawLogPath, exitCode: result.exitCode }

    if (result.timedOut) throw new PhaseTimeoutError(phase.name, phase.timeoutMs)
    if (result.aborted) {
      throw new PhaseExecutionError(`Phase "${phase.name}" was aborted`, { ...context, aborted: true })
    }
    if (result.exitCode !== 0) {
      const detail = lastLine(result.stderr)
      throw new PhaseExecutionError(
        `Phase "${phase.name}" exited with code ${String(result.exitCode)}${detail !== '' ? `: ${maskSecrets(detail)}` : ''}`,
        context,
      )
    }

    const parsed = parseStructuredOutput(result.stdout)
    if (!parsed.ok) {
      throw new PhaseExecutionError(`Phase "${phase.name}" produced ${parsed.reason}`, context)
    }
    return { output: this._accept(request, parsed.output), rawLogPath, durationMs: Date.now() - startedAt }
  }

  private async _writeRawLog(path: string, result: ProcessResult): Promise<void> {
    const body = [
      `exit: ${result.exitCode === null ? 'signal' : String(result.exitCode)}`,
      `duration_ms: ${String(result.durationMs)}`,
      '--- stdout ---',
      result.stdout,
      '--- stderr ---',
      result.stderr,
    ].join('\n')
    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, maskSecrets(body), 'utf-8')
    } catch (err) {
      logger.warn({ err, path }, 'Failed to write raw phase log')
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _context(request: PhaseRequest): PhaseContext {
    return {
      workflowId: request.task.workflowId,
      attempt: request.attempt,
      stateDir: this._options.stateDir,
      summaries: { ...request.session.summaries },
      discoveredItems: [...request.session.discoveredItems],
    }
  }

  /** An `error` status is a failed attempt even when the handler itself succeeded */
  private _accept(request: PhaseRequest, output: PhaseOutput): PhaseOutput {
    if (output.status === 'error') {
      throw new PhaseExecutionError(
        `Phase "${request.phase.name}" reported an error: ${output.summary ?? 'no summary'}`,
        { phase: request.phase.name, attempt: request.attempt },
      )
    }
    return output
  }

  /**
   * Run an in-process handler under the phase timeout. The handler's signal
   * aborts on timeout and when the caller's signal aborts.
   */
  private async _withTimeout<T>(request: PhaseRequest, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const { phase } = request
    const controller = new AbortController()
    const onAbort = (): void => {
      controller.abort()
    }
    request.signal?.addEventListener('abort', onAbort, { once: true })
    let timer: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new PhaseTimeoutError(phase.name, phase.timeoutMs))
      }, phase.timeoutMs)
    })

    try {
      return await Promise.race([run(controller.signal), timeout])
    } finally {
      if (timer !== undefined) clearTimeout(timer)
      request.signal?.removeEventListener('abort', onAbort)
    }
  }
}

export function createPhaseExecutor(options: PhaseExecutorOptions): PhaseExecutor {
  return new PhaseExecutorImpl(options)
}
