/**
 * `phaseflow resume` command
 *
 * Continues a failed, halted or interrupted workflow. Completed phases are
 * kept; failed, skipped and stale running phases run again with a fresh
 * attempt budget.
 *
 * Usage:
 *   phaseflow resume <workflow-id>                          Resume from the live state
 *   phaseflow resume <workflow-id> --checkpoint <name>      Resume from a named checkpoint
 *   phaseflow resume <workflow-id> --output-format json     Stream NDJSON events
 *
 * When the live state is corrupt the newest readable checkpoint of the
 * workflow is used instead.
 */

import type { Command } from 'commander'
import type { Engine } from '../../core/engine.js'
import { setupGracefulShutdown } from '../../recovery/shutdown-handler.js'
import { createLogger } from '../../utils/logger.js'
import { renderWorkflowResult } from '../formatters/status-formatter.js'
import { emitEvent, streamWorkflowEvents } from '../formatters/streaming.js'
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  openEngine,
  parseOutputFormat,
  reportError,
  type CommandContext,
  type OutputFormat,
} from './shared.js'

const logger = createLogger('resume-cmd')

export interface ResumeActionOptions {
  workflowId: string
  checkpoint?: string
  outputFormat: OutputFormat
  /** Replaces the SIGINT/SIGTERM wiring */
  signal?: AbortSignal
}

/**
 * Core action for the resume command. Returns the exit code.
 */
export async function runResumeAction(options: ResumeActionOptions, ctx: CommandContext): Promise<number> {
  let engine: Engine
  try {
    engine = await openEngine(ctx)
  } catch (err) {
    return reportError(err)
  }

  const controller = new AbortController()
  const cleanupSignals = options.signal === undefined ? setupGracefulShutdown({ controller, logger }) : undefined
  const stopStreaming = options.outputFormat === 'json' ? streamWorkflowEvents(engine.eventBus) : undefined

  try {
    const result = await engine.orchestrator.resume(options.workflowId, {
      signal: options.signal ?? controller.signal,
      ...(options.checkpoint !== undefined ? { checkpoint: options.checkpoint } : {}),
    })

    if (options.outputFormat === 'json') {
      emitEvent('workflow:result', result)
    } else {
      process.stdout.write(renderWorkflowResult(result) + '\n')
    }
    return result.success ? EXIT_SUCCESS : EXIT_FAILURE
  } catch (err) {
    logger.debug({ err }, 'resume failed')
    return reportError(err)
  } finally {
    stopStreaming?.()
    cleanupSignals?.()
    await engine.shutdown()
  }
}

export function registerResumeCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('resume <workflow-id>')
    .description('Resume a failed, halted or interrupted workflow')
    .option('--checkpoint <name>', 'Resume from this checkpoint instead of the live state')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', 'human')
    .action(async (workflowId: string, opts: { checkpoint?: string; outputFormat: string }) => {
      process.exitCode = await runResumeAction(
        {
          workflowId,
          outputFormat: parseOutputFormat(opts.outputFormat),
          ...(opts.checkpoint !== undefined ? { checkpoint: opts.checkpoint } : {}),
        },
        { projectRoot },
      )
    })
}
