/**
 * Rollout policy resolution.
 */

import type { RolloutPolicy } from '../types/rollout.js';
import { RolloutPolicySchema, type PolicySection } from '../types/schemas/rollout.js';
import { ConfigError } from '../rollout/errors.js';
import { DEFAULT_ROLLOUT_POLICY } from './defaults.js';

/**
 * Overlay a partial policy over the defaults and validate the result.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolvePolicy(overrides: Partial<RolloutPolicy> = {}): RolloutPolicy {
  const merged: Record<string, unknown> = { ...DEFAULT_ROLLOUT_POLICY };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = RolloutPolicySchema.safeParse(merged);
  if (!parsed.success) {
    throw ConfigError.fromZod('Rollout policy validation failed', parsed.error);
  }

  return Object.freeze(parsed.data);
}

/**
 * Convert the snake_case `policy` section of a rollout file.
 */
export function policyFromSection(section: PolicySection): Partial<RolloutPolicy> {
  return {
    batchSize: section.batch_size,
    maxRetries: section.max_retries,
    retryDelayMs: section.retry_delay_ms,
    retryBackoffMultiplier: section.retry_backoff_multiplier,
    maxRetryDelayMs: section.max_retry_delay_ms,
    healthCheckTimeoutMs: section.health_check_timeout_ms,
    failureThresholdPerBatch: section.failure_threshold_per_batch,
    rollbackOnFailure: section.rollback_on_failure,
    restartOnHealthFailure: section.restart_on_health_failure,
    maxConcurrency: section.max_concurrency,
    cancelGracePeriodMs: section.cancel_grace_period_ms,
    pauseBetweenBatchesMs: section.pause_between_batches_ms,
  };
}
