/**
 * `phaseflow run` command
 *
 * Loads a YAML or JSON workflow spec and runs it to completion.
 *
 * Usage:
 *   phaseflow run <workflow-spec>                        Run with a generated workflow id
 *   phaseflow run <workflow-spec> --task "add login"     Describe the task handed to phases
 *   phaseflow run <workflow-spec> --workflow-id wf-1     Use a fixed workflow id
 *   phaseflow run <workflow-spec> --max-parallel 2       Override the spec's concurrency
 *   phaseflow run <workflow-spec> --backend sqlite       Choose the state backend
 *   phaseflow run <workflow-spec> --output-format json   Stream NDJSON events
 *
 * SIGINT/SIGTERM stop the workflow at the next safe point and write an
 * `interrupted` checkpoint; a second signal exits immediately.
 */

import type { Command } from 'commander'
import { resolve } from 'node:path'
import type { PartialPhaseflowConfig, StateBackend } from '../../modules/config/config-schema.js'
import { StateBackendSchema } from '../../modules/config/config-schema.js'
import { ConfigError } from '../../core/errors.js'
import type { Engine } from '../../core/engine.js'
import type { WorkflowSpec } from '../../core/types.js'
import { createTask } from '../../modules/workflow-orchestrator/task.js'
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

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  specPath: string
  task?: string
  workflowId?: string
  maxParallel?: number
  backend?: StateBackend
  outputFormat: OutputFormat
  /** Replaces the SIGINT/SIGTERM wiring; tests abort through this */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

/** @throws {ConfigError} when the value is not a positive integer */
export function parseMaxParallel(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`--max-parallel must be a positive integer, got "${value}"`)
  }
  return parsed
}

/** @throws {ConfigError} for anything other than file or sqlite */
export function parseBackend(value: string): StateBackend {
  const parsed = StateBackendSchema.safeParse(value)
  if (!parsed.success) {
    throw new ConfigError(`--backend must be "file" or "sqlite", got "${value}"`)
  }
  return parsed.data
}

function cliOverrides(options: RunActionOptions): PartialPhaseflowConfig {
  const global: NonNullable<PartialPhaseflowConfig['global']> = {}
  if (options.backend !== undefined) global.state_backend = options.backend
  if (options.maxParallel !== undefined) global.max_parallel = options.maxParallel
  return Object.keys(global).length > 0 ? { global } : {}
}

function withMaxParallel(spec: WorkflowSpec, maxParallel: number | undefined): WorkflowSpec {
  if (maxParallel === undefined) return spec
  return Object.freeze({ ...spec, maxParallel })
}

// ---------------------------------------------------------------------------
// runRunAction: testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the run command. Returns the exit code.
 */
export async function runRunAction(options: RunActionOptions, ctx: CommandContext): Promise<number> {
  let engine: Engine
  try {
    engine = await openEngine(ctx, cliOverrides(options))
  } catch (err) {
    return reportError(err)
  }

  const controller = new AbortController()
  const cleanupSignals = options.signal === undefined ? setupGracefulShutdown({ controller, logger }) : undefined
  const stopStreaming = options.outputFormat === 'json' ? streamWorkflowEvents(engine.eventBus) : undefined

  try {
    const loaded = await engine.loadWorkflowSpec(resolve(ctx.projectRoot, options.specPath))
    const spec = withMaxParallel(loaded, options.maxParallel)
    const task = createTask({
      description: options.task ?? spec.name,
      ...(options.workflowId !== undefined ? { workflowId: options.workflowId } : {}),
      source: { kind: 'spec-file', ref: options.specPath },
    })

    const result = await engine.orchestrator.run(spec, task, { signal: options.signal ?? controller.signal })

    if (options.outputFormat === 'json') {
      emitEvent('workflow:result', result)
    } else {
      process.stdout.write(renderWorkflowResult(result) + '\n')
    }
    return result.success ? EXIT_SUCCESS : EXIT_FAILURE
  } catch (err) {
    logger.debug({ err }, 'run failed')
    return reportError(err)
  } finally {
    stopStreaming?.()
    cleanupSignals?.()
    await engine.shutdown()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('run <workflow-spec>')
    .description('Run a workflow spec from the beginning')
    .option('--task <text>', 'Task description handed to every phase')
    .option('--workflow-id <id>', 'Workflow id (default: generated)')
    .option('--max-parallel <n>', 'Maximum number of phases running at once')
    .option('--backend <backend>', 'State backend: file or sqlite')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', 'human')
    .action(
      async (
        specPath: string,
        opts: { task?: string; workflowId?: string; maxParallel?: string; backend?: string; outputFormat: string },
      ) => {
        let maxParallel: number | undefined
        let backend: StateBackend | undefined
        try {
          maxParallel = opts.maxParallel !== undefined ? parseMaxParallel(opts.maxParallel) : undefined
          backend = opts.backend !== undefined ? parseBackend(opts.backend) : undefined
        } catch (err) {
          process.exitCode = reportError(err)
          return
        }

        process.exitCode = await runRunAction(
          {
            specPath,
            outputFormat: parseOutputFormat(opts.outputFormat),
            ...(opts.task !== undefined ? { task: opts.task } : {}),
            ...(opts.workflowId !== undefined ? { workflowId: opts.workflowId } : {}),
            ...(maxParallel !== undefined ? { maxParallel } : {}),
            ...(backend !== undefined ? { backend } : {}),
          },
          { projectRoot },
        )
      },
    )
}
