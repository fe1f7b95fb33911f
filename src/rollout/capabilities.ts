/**
 * Pluggable capabilities consumed by the orchestrator.
 *
 * Transport, authentication and probe protocols live behind these two
 * interfaces; see src/adapters for the command and HTTP implementations.
 */

import type { Host } from '../types/rollout.js';

/** Convenience type that allows synchronous or asynchronous return values. */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Options passed on every plugin call.
 */
export interface CapabilityCallOptions {
  /** Aborted when the rollout force-terminates the host */
  signal: AbortSignal;
}

/**
 * Runs restart (and optionally rollback) on one host.
 *
 * Both methods resolve on success and throw (preferably an ExecutionError /
 * RollbackError) on failure.
 */
export interface RemoteExecutor {
  restart(host: Host, options: CapabilityCallOptions): Promise<void>;

  /** Absent when no rollback capability exists */
  rollback?(host: Host, options: CapabilityCallOptions): Promise<void>;

  /** Connection-count ceiling; bounds in-batch concurrency when set */
  readonly maxConnections?: number;
}

/**
 * Probes a host. Resolves true when healthy, false when reachable but
 * unhealthy, and throws on probe failure.
 */
export interface HealthChecker {
  check(host: Host, timeoutMs: number, options: CapabilityCallOptions): MaybePromise<boolean>;
}
