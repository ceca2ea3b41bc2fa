/**
 * phaseflow - main module exports
 * Public API surface for embedding the engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { maskSecrets } from './utils/masking.js'

// Engine
export { createEngine, resolveStateDir } from './core/engine-impl.js'
export type { Engine, EngineOptions, WorkflowSummary } from './core/engine.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { WorkflowEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export {
  createConfigSystem,
  readCredentials,
  DEFAULT_CONFIG,
  PhaseflowConfigSchema,
} from './modules/config/index.js'
export type { ConfigSystem, ConfigSystemOptions, PhaseflowConfig, PartialPhaseflowConfig } from './modules/config/index.js'

// Workflow specs
export {
  buildWorkflowSpec,
  createPhase,
  createWorkflowSpec,
  parseSpecFile,
  parseSpecString,
} from './modules/workflow-spec/index.js'
export type { PhaseInput, WorkflowSpecInput } from './modules/workflow-spec/index.js'

// Orchestration
export { createWorkflowOrchestrator, createTask } from './modules/workflow-orchestrator/index.js'
export type { WorkflowOrchestrator, WorkflowOrchestratorDeps, RunOptions, ResumeOptions } from './modules/workflow-orchestrator/index.js'
export { createPhaseExecutor, createHandlerRegistry, HandlerRegistry } from './modules/phase-executor/index.js'
export type { FunctionHandler, FunctionHandlerInput, PhaseContext, PhaseExecutor } from './modules/phase-executor/index.js'
export { ParallelAggregator } from './modules/parallel-aggregator/index.js'
export { createGitCommitter, NoopCommitter } from './modules/git/index.js'
export type { WorkspaceCommitter, CommitResult } from './modules/git/index.js'

// Discovery
export { createDeterministicDiscovery, DeterministicDiscovery, StoredDiscoveryHistory } from './modules/discovery/index.js'
export type { DiscoveryResult, DiscoveryLevel } from './modules/discovery/index.js'

// Persistence
export { createStateStore, createFileStateStore, createSqliteStateStore } from './persistence/index.js'
export type { StateStore, CheckpointDocument } from './persistence/index.js'

// Recovery
export { createRecoveryEngine, classifyError, resolvePolicies, setupGracefulShutdown } from './recovery/index.js'
export type { RecoveryEngine, RecoveryEngineOptions } from './recovery/index.js'
