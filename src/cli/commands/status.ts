/**
 * `phaseflow status` command
 *
 * Displays the persisted state of a workflow.
 *
 * Usage:
 *   phaseflow status <workflow-id>                        Human-readable phase table
 *   phaseflow status <workflow-id> --output-format json   Single JSON document
 *
 * Exit codes:
 *   0 - Success
 *   1 - Workflow not found, unreadable state or unexpected error
 *   2 - Configuration error
 */

import type { Command } from 'commander'
import type { Engine } from '../../core/engine.js'
import { renderWorkflowStatus } from '../formatters/status-formatter.js'
import {
  EXIT_SUCCESS,
  openEngine,
  parseOutputFormat,
  reportError,
  type CommandContext,
  type OutputFormat,
} from './shared.js'

export interface StatusActionOptions {
  workflowId: string
  outputFormat: OutputFormat
}

/**
 * Core action for the status command. Returns the exit code.
 */
export async function runStatusAction(options: StatusActionOptions, ctx: CommandContext): Promise<number> {
  let engine: Engine
  try {
    engine = await openEngine(ctx)
  } catch (err) {
    return reportError(err)
  }

  try {
    const state = await engine.getWorkflowState(options.workflowId)
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(state) + '\n')
    } else {
      process.stdout.write(renderWorkflowStatus(state) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  } finally {
    await engine.shutdown()
  }
}

export function registerStatusCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('status <workflow-id>')
    .description('Show the persisted state of a workflow')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (workflowId: string, opts: { outputFormat: string }) => {
      process.exitCode = await runStatusAction(
        { workflowId, outputFormat: parseOutputFormat(opts.outputFormat) },
        { projectRoot },
      )
    })
}
