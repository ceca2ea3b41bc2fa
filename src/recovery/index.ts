/**
 * Public API for the recovery module.
 */

export {
  RecoveryEngineImpl,
  createRecoveryEngine,
  TELEMETRY_KEY,
  type RecoveryEngine,
  type RecoveryEngineOptions,
  type RecoveryContext,
  type RecoveryResult,
  type RecoveryTelemetry,
  type RetryNotice,
  type ErrorRecord,
} from './recovery-engine.js'

export {
  classifyError,
  createErrorClassifier,
  DEFAULT_CLASSIFICATION_RULES,
  type ErrorClassifier,
  type ClassificationRule,
} from './error-classifier.js'

export {
  DEFAULT_POLICIES,
  resolvePolicies,
  type CategoryPolicy,
  type RecoveryFallback,
  type RecoveryPolicies,
  type RecoveryStrategy,
} from './recovery-policies.js'

export { setupGracefulShutdown, type ShutdownHandlerOptions } from './shutdown-handler.js'
