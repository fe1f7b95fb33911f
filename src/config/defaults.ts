/**
 * Default Configuration Constants
 *
 * Rollout policy defaults and adapter constants, centralized for tuning.
 */

import type { RolloutPolicy } from '../types/rollout.js';

/**
 * Rollout policy defaults
 */
export const DEFAULT_ROLLOUT_POLICY: Readonly<RolloutPolicy> = Object.freeze({
  /** One host at a time unless configured otherwise */
  batchSize: 1,

  /** Retries after the first attempt */
  maxRetries: 3,

  /** Constant 5s between attempts */
  retryDelayMs: 5_000,
  retryBackoffMultiplier: 1,
  maxRetryDelayMs: 60_000,

  healthCheckTimeoutMs: 10_000,

  /** Any failure in a batch stops the rollout */
  failureThresholdPerBatch: 0,

  rollbackOnFailure: false,
  restartOnHealthFailure: false,

  cancelGracePeriodMs: 10_000,
  pauseBetweenBatchesMs: 0,
});

/**
 * Command executor adapter
 */
export const COMMAND_EXECUTOR = {
  /** Hard timeout for one restart/rollback command (ms) */
  DEFAULT_COMMAND_TIMEOUT_MS: 120_000, // 2 minutes

  /** Characters of stderr kept on an ExecutionError */
  MAX_STDERR_LENGTH: 500,
} as const;

/**
 * HTTP health checker adapter
 */
export const HTTP_HEALTH_CHECK = {
  /** Status codes treated as healthy when a service lists none */
  DEFAULT_EXPECTED_STATUS: Object.freeze([200]),
} as const;

/**
 * Rollout file location relative to the package root
 */
export const DEFAULT_ROLLOUT_FILE = 'config/rollout.yaml';
