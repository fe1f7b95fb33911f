/**
 * Rollout Configuration Schemas
 *
 * Zod schemas for the in-code RolloutPolicy and for the snake_case rollout
 * file (policy, services, hosts, per-environment overrides).
 *
 * @module schemas/rollout
 */

import { z } from 'zod';
import { DEFAULT_ROLLOUT_POLICY } from '../../config/defaults.js';

/**
 * RolloutPolicy (camelCase, as used in code)
 */
export const RolloutPolicySchema = z.object({
  batchSize: z.number().int().min(1, 'must be >= 1'),
  maxRetries: z.number().int().min(0, 'must be >= 0'),
  retryDelayMs: z.number().int().min(0, 'must be >= 0'),
  retryBackoffMultiplier: z.number().min(1, 'must be >= 1'),
  maxRetryDelayMs: z.number().int().min(0, 'must be >= 0'),
  healthCheckTimeoutMs: z.number().int().positive('must be positive'),
  failureThresholdPerBatch: z.number().min(0, 'must be >= 0').max(1, 'must be <= 1'),
  rollbackOnFailure: z.boolean(),
  restartOnHealthFailure: z.boolean(),
  maxConcurrency: z.number().int().min(1, 'must be >= 1').optional(),
  cancelGracePeriodMs: z.number().int().min(0, 'must be >= 0'),
  pauseBetweenBatchesMs: z.number().int().min(0, 'must be >= 0'),
}).refine(
  (data) => data.maxRetryDelayMs >= data.retryDelayMs,
  {
    message: 'must be >= retryDelayMs',
    path: ['maxRetryDelayMs'],
  }
);

/**
 * `policy` section of the rollout file (all keys optional, defaults apply)
 */
export const PolicySectionSchema = z.object({
  batch_size: z.number().int().min(1, 'must be >= 1').optional(),
  max_retries: z.number().int().min(0, 'must be >= 0').optional(),
  retry_delay_ms: z.number().int().min(0, 'must be >= 0').optional(),
  retry_backoff_multiplier: z.number().min(1, 'must be >= 1').optional(),
  max_retry_delay_ms: z.number().int().min(0, 'must be >= 0').optional(),
  health_check_timeout_ms: z.number().int().positive('must be positive').optional(),
  failure_threshold_per_batch: z.number().min(0, 'must be >= 0').max(1, 'must be <= 1').optional(),
  rollback_on_failure: z.boolean().optional(),
  restart_on_health_failure: z.boolean().optional(),
  max_concurrency: z.number().int().min(1, 'must be >= 1').optional(),
  cancel_grace_period_ms: z.number().int().min(0, 'must be >= 0').optional(),
  pause_between_batches_ms: z.number().int().min(0, 'must be >= 0').optional(),
});

const CommandSchema = z.array(z.string().min(1, 'argument cannot be empty')).min(1, 'command cannot be empty');

/**
 * `services.<group>` entry
 */
export const ServiceSectionSchema = z.object({
  service: z.string().min(1, 'service name cannot be empty').optional(),
  restart_command: CommandSchema,
  rollback_command: CommandSchema.optional(),
  health_url: z.string().min(1, 'health URL cannot be empty').optional(),
  expected_status: z.array(z.number().int().min(100).max(599)).min(1).optional(),
  command_timeout_ms: z.number().int().positive('must be positive').optional(),
});

/**
 * `hosts[]` entry
 */
export const HostEntrySchema = z.object({
  id: z.string().min(1, 'host id cannot be empty'),
  address: z.string().min(1, 'address cannot be empty').optional(),
  groups: z.array(z.string().min(1)).min(1, 'host needs at least one group'),
});

/**
 * Executor-level settings
 */
export const ExecutorSectionSchema = z.object({
  max_connections: z.number().int().min(1, 'must be >= 1').optional(),
});

/**
 * Complete rollout file after environment overrides are applied
 */
export const RolloutFileSchema = z.object({
  policy: PolicySectionSchema.default({}),
  executor: ExecutorSectionSchema.default({}),
  services: z.record(z.string(), ServiceSectionSchema),
  hosts: z.array(HostEntrySchema).min(1, 'at least one host is required'),
})
  .refine(
    (data) =>
      (data.policy.max_retry_delay_ms ?? DEFAULT_ROLLOUT_POLICY.maxRetryDelayMs) >=
      (data.policy.retry_delay_ms ?? DEFAULT_ROLLOUT_POLICY.retryDelayMs),
    {
      message: 'must be >= retry_delay_ms',
      path: ['policy', 'max_retry_delay_ms'],
    }
  )
  .refine(
    (data) => new Set(data.hosts.map((host) => host.id)).size === data.hosts.length,
    {
      message: 'host ids must be unique',
      path: ['hosts'],
    }
  )
  .refine(
    (data) => data.hosts.every((host) => data.services[host.groups[0]] !== undefined),
    {
      message: 'every host group needs a services entry',
      path: ['services'],
    }
  );

export type PolicySection = z.infer<typeof PolicySectionSchema>;
export type ServiceSection = z.infer<typeof ServiceSectionSchema>;
export type HostEntry = z.infer<typeof HostEntrySchema>;
export type RolloutFile = z.infer<typeof RolloutFileSchema>;
