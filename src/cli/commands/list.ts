/**
 * `phaseflow list` command
 *
 * Lists every workflow with a readable state document.
 *
 * Usage:
 *   phaseflow list
 *   phaseflow list --output-format json
 */

import type { Command } from 'commander'
import type { Engine } from '../../core/engine.js'
import { renderWorkflowList } from '../formatters/status-formatter.js'
import {
  EXIT_SUCCESS,
  openEngine,
  parseOutputFormat,
  reportError,
  type CommandContext,
  type OutputFormat,
} from './shared.js'

export interface ListActionOptions {
  outputFormat: OutputFormat
}

export async function runListAction(options: ListActionOptions, ctx: CommandContext): Promise<number> {
  let engine: Engine
  try {
    engine = await openEngine(ctx)
  } catch (err) {
    return reportError(err)
  }

  try {
    const workflows = await engine.listWorkflows()
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(workflows) + '\n')
    } else {
      process.stdout.write(renderWorkflowList(workflows) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  } finally {
    await engine.shutdown()
  }
}

export function registerListCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('list')
    .description('List known workflows')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runListAction({ outputFormat: parseOutputFormat(opts.outputFormat) }, { projectRoot })
    })
}
