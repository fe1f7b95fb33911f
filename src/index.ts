export * from './rollout/index.js';
export * from './types/rollout.js';
export type { ServiceDefinition, HostConnection } from './types/service.js';

// Configuration
export { resolvePolicy, policyFromSection } from './config/policy.js';
export {
  loadRolloutFile,
  loadRolloutPlan,
  parseRolloutFile,
  toRolloutPlan,
  defaultRolloutFilePath,
  type RolloutPlan,
  type Environment,
} from './config/loader.js';
export { DEFAULT_ROLLOUT_POLICY } from './config/defaults.js';
export type { RolloutFile } from './types/schemas/rollout.js';

// Adapters
export { CommandRemoteExecutor, type CommandRemoteExecutorConfig } from './adapters/command-executor.js';
export { HttpHealthChecker, type HttpHealthCheckerConfig } from './adapters/http-health-checker.js';

// Logging
export { createLogger, type CreateLoggerOptions } from './utils/logger.js';
