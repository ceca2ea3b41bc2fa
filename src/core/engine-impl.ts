/**
 * EngineImpl: concrete implementation of the Engine interface.
 *
 * The createEngine() factory:
 *  1. Instantiates the TypedEventBus
 *  2. Creates the configured state store and the recovery engine on top of it
 *  3. Creates discovery, the handler registry, the phase executor and the
 *     workspace committer via constructor injection
 *  4. Registers long-lived services in a ServiceRegistry and initializes them
 *  5. Builds the workflow orchestrator over the wired modules
 *
 * All wiring happens here; modules never import one another's factories.
 */

import { isAbsolute, resolve } from 'node:path'
import { createLogger } from '../utils/logger.js'
import { createEventBus, type TypedEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import { StateCorruptionError, WorkflowNotFoundError } from './errors.js'
import type { WorkflowId, WorkflowSpec, WorkflowState } from './types.js'
import type { Engine, EngineOptions, WorkflowSummary } from './engine.js'
import type { PhaseflowConfig } from '../modules/config/config-schema.js'
import { readCredentials } from '../modules/config/config-system-impl.js'
import { createStateStore } from '../persistence/index.js'
import type { StateStore } from '../persistence/state-store.js'
import { WorkflowStateSchema } from '../persistence/schemas/workflow-state.js'
import { createRecoveryEngine } from '../recovery/recovery-engine.js'
import { resolvePolicies } from '../recovery/recovery-policies.js'
import { createDeterministicDiscovery } from '../modules/discovery/deterministic-discovery.js'
import { StoredDiscoveryHistory } from '../modules/discovery/history-store.js'
import { createHandlerRegistry, type HandlerRegistry } from '../modules/phase-executor/handler-registry.js'
import { createPhaseExecutor } from '../modules/phase-executor/phase-executor-impl.js'
import { createGitCommitter } from '../modules/git/git-committer.js'
import { NoopCommitter, type WorkspaceCommitter } from '../modules/git/workspace-committer.js'
import { buildWorkflowSpec } from '../modules/workflow-spec/spec-validator.js'
import { parseSpecFile } from '../modules/workflow-spec/spec-parser.js'
import type { WorkflowOrchestrator } from '../modules/workflow-orchestrator/workflow-orchestrator.js'
import { createWorkflowOrchestrator } from '../modules/workflow-orchestrator/workflow-orchestrator-impl.js'
import { workflowStateKey } from '../modules/workflow-orchestrator/task.js'

const logger = createLogger('engine')

const WORKFLOW_KEY_PREFIX = 'workflow:'

// ---------------------------------------------------------------------------
// EngineImpl
// ---------------------------------------------------------------------------

class EngineImpl implements Engine {
  private _ready = false
  private _shutdown = false

  constructor(
    readonly eventBus: TypedEventBus,
    readonly orchestrator: WorkflowOrchestrator,
    readonly store: StateStore,
    readonly handlers: HandlerRegistry,
    private readonly _registry: ServiceRegistry,
    private readonly _config: PhaseflowConfig,
  ) {}

  get isReady(): boolean {
    return this._ready
  }

  markReady(): void {
    this._ready = true
  }

  loadWorkflowSpec(filePath: string): Promise<WorkflowSpec> {
    return parseSpecFile(filePath).then((raw) =>
      buildWorkflowSpec(raw, {
        functionHandlers: this.handlers,
        defaultTimeoutMs: this._config.agent.default_timeout_ms,
        defaultMaxParallel: this._config.global.max_parallel,
      }),
    )
  }

  async getWorkflowState(workflowId: WorkflowId): Promise<WorkflowState> {
    const key = workflowStateKey(workflowId)
    const raw = await this.store.load(key)
    if (raw === undefined) throw new WorkflowNotFoundError(workflowId)
    const parsed = WorkflowStateSchema.safeParse(raw)
    if (!parsed.success) {
      throw new StateCorruptionError(`State document "${key}" is malformed`, {
        key,
        issues: parsed.error.issues,
      })
    }
    return parsed.data
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    const summaries: WorkflowSummary[] = []
    for (const key of await this.store.keys(WORKFLOW_KEY_PREFIX)) {
      const workflowId = key.slice(WORKFLOW_KEY_PREFIX.length)
      try {
        const state = await this.getWorkflowState(workflowId)
        summaries.push({
          workflowId,
          specName: state.spec.name,
          status: state.status,
          updatedAt: state.updatedAt,
          ...(state.lastCheckpoint !== undefined ? { lastCheckpoint: state.lastCheckpoint } : {}),
        })
      } catch (err) {
        logger.warn({ err, workflowId }, 'Skipping unreadable workflow state')
      }
    }
    return summaries.sort((a, b) => (a.updatedAt < b.updatedAt ? -1 : a.updatedAt > b.updatedAt ? 1 : 0))
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    this._ready = false

    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during engine shutdown')
    }
    logger.debug('Engine shutdown complete')
  }
}

// ---------------------------------------------------------------------------
// createEngine factory
// ---------------------------------------------------------------------------

/** state_dir is taken relative to the project root unless absolute */
export function resolveStateDir(config: PhaseflowConfig, projectRoot: string): string {
  const dir = config.global.state_dir
  return isAbsolute(dir) ? dir : resolve(projectRoot, dir)
}

/**
 * Wire every module from `options.config` and initialize the services.
 *
 * If initialization fails, any partially initialized services are shut down
 * before the error is re-thrown.
 */
export async function createEngine(options: EngineOptions): Promise<Engine> {
  const { config } = options
  const projectRoot = resolve(options.projectRoot)
  const stateDir = resolveStateDir(config, projectRoot)

  logger.debug({ stateDir, backend: config.global.state_backend }, 'Initializing engine')

  const eventBus = createEventBus()
  const store = options.store ?? createStateStore(config.global.state_backend, stateDir)

  const recovery = createRecoveryEngine({
    store,
    policies: resolvePolicies(config.recovery.categories),
    backoffBase: config.recovery.backoff_base,
    backoffUnitMs: config.recovery.backoff_unit_ms,
    maxBackoffMs: config.recovery.max_backoff_ms,
    historyLimit: config.recovery.history_limit,
    emaAlpha: config.recovery.ema_alpha,
  })

  const discovery = createDeterministicDiscovery({
    root: projectRoot,
    maxItems: config.discovery.max_items,
    disabledLevels: config.discovery.disabled_levels,
    extensions: config.discovery.extensions,
    ignore: config.discovery.ignore,
    history: new StoredDiscoveryHistory(store, config.discovery.history_limit),
  })

  const handlers = createHandlerRegistry(options.functionHandlers)

  const executor = createPhaseExecutor({
    stateDir,
    projectRoot,
    registry: handlers,
    discovery,
    credentials: readCredentials(config, options.env),
    ...(options.env !== undefined ? { env: options.env } : {}),
  })

  const committer: WorkspaceCommitter =
    options.committer ??
    (config.git.enabled
      ? createGitCommitter(projectRoot, config.git.commit_author !== undefined ? { author: config.git.commit_author } : {})
      : new NoopCommitter())

  // The store must initialize before recovery, which reads its telemetry from it
  const registry = new ServiceRegistry()
  registry.register('stateStore', store)
  registry.register('recovery', recovery)

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed; cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  const orchestrator = createWorkflowOrchestrator({
    store,
    executor,
    recovery,
    eventBus,
    committer,
    discovery,
    functionHandlers: handlers,
  })

  const engine = new EngineImpl(eventBus, orchestrator, store, handlers, registry, config)
  engine.markReady()
  logger.debug('Engine ready')
  return engine
}
