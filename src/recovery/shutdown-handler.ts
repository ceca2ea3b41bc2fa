/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for a
 * running workflow.
 *
 * First signal: aborts the supplied controller. The orchestrator stops
 * scheduling, terminates running phase processes, writes an `interrupted`
 * checkpoint and returns, so the CLI can exit normally.
 * Second signal: exits immediately with 128 + signal number.
 *
 * Returns a cleanup function that removes the listeners.
 */

import type pino from 'pino'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

const SIGNAL_EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143,
}

export interface ShutdownHandlerOptions {
  controller: AbortController
  logger?: pino.Logger
  /** Replaced in tests */
  exit?: (code: number) => void
}

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { controller } = options
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number) => process.exit(code))

  const onSignal = (signal: 'SIGINT' | 'SIGTERM'): void => {
    if (controller.signal.aborted) {
      log.warn({ signal }, 'Second signal received; exiting immediately')
      exit(SIGNAL_EXIT_CODES[signal])
      return
    }
    log.info({ signal }, 'Graceful shutdown initiated; stopping after running phases are terminated')
    controller.abort(new Error(`Received ${signal}`))
  }

  const sigintHandler = (): void => onSignal('SIGINT')
  const sigtermHandler = (): void => onSignal('SIGTERM')

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
