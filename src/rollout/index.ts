/**
 * Restart orchestration core - health-gated batch rollout with failure isolation
 *
 * @module rollout
 * @packageDocumentation
 */

// Top-level driver
export {
  RolloutController,
  type RolloutControllerDependencies,
  type RolloutControllerEvents,
  type RunOptions,
  type BatchStartedEvent,
  type RolloutAbortedEvent,
} from './rollout-controller.js';

// Per-host protocol
export {
  RestartCoordinator,
  type RestartCoordinatorDependencies,
  type RestartCoordinatorEvents,
  type ProcessOptions,
  type TransitionEvent,
  type RetryEvent,
} from './restart-coordinator.js';

// Planning
export { BatchPlanner, planBatches, groupHosts, primaryGroup, UNGROUPED } from './batch-planner.js';

// State
export { HostState, InvalidTransitionError, canTransition, isTerminalStage } from './host-state.js';

// Capabilities
export type {
  RemoteExecutor,
  HealthChecker,
  CapabilityCallOptions,
  MaybePromise,
} from './capabilities.js';

// Errors
export {
  RolloutError,
  RolloutErrorCode,
  ConfigError,
  ExecutionError,
  HealthCheckError,
  RollbackError,
  InterruptedError,
  toRolloutError,
  type ConfigIssue,
} from './errors.js';

// Results
export { buildRolloutResult, countOutcomes, formatRolloutSummary, isRolloutSuccessful } from './result.js';
export { ConcurrencyLimiter, resolveConcurrency } from './concurrency-limiter.js';
