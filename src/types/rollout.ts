/**
 * Rollout Types
 *
 * Shared data model for the restart orchestrator: hosts, per-host lifecycle
 * state, rollout policy, batches and the aggregate rollout result.
 *
 * @module types/rollout
 */

/**
 * A target machine. Immutable once loaded into a rollout.
 */
export interface Host {
  /** Unique host identifier */
  readonly id: string;

  /** Group tags (e.g. 'nginx', 'tomcat'). The first tag is the rollout group. */
  readonly groups: readonly string[];

  /** Opaque connection descriptor, interpreted only by the RemoteExecutor */
  readonly connection?: unknown;
}

/**
 * Per-host lifecycle stage.
 */
export enum HostStage {
  PENDING = 'pending',
  RESTARTING = 'restarting',
  AWAITING_HEALTH = 'awaiting_health',
  HEALTHY = 'healthy',
  FAILED = 'failed',
  ROLLED_BACK = 'rolled_back',
}

/** Stages from which no further automatic transition occurs. */
export const TERMINAL_STAGES: ReadonlySet<HostStage> = new Set([
  HostStage.HEALTHY,
  HostStage.FAILED,
  HostStage.ROLLED_BACK,
]);

/**
 * Serializable error record kept on HostState (never a live Error).
 */
export interface ErrorRecord {
  code: string;
  name: string;
  message: string;
  /** Epoch ms */
  at: number;
}

/**
 * One stage transition in a host's history.
 */
export interface StageTransition {
  from: HostStage;
  to: HostStage;
  attempt: number;
  timestamp: number;
  error?: ErrorRecord;
}

/**
 * Read-only view of a host's state.
 */
export interface HostStateSnapshot {
  hostId: string;
  stage: HostStage;
  attempt: number;
  lastError?: ErrorRecord;
  rollbackError?: ErrorRecord;
  history: readonly StageTransition[];
}

/**
 * Rollout policy. Loaded once at rollout start, immutable afterwards.
 */
export interface RolloutPolicy {
  /** Maximum hosts per batch */
  batchSize: number;
  /** Retries allowed after the first attempt (shared by restart and probe) */
  maxRetries: number;
  /** Delay before the first retry (ms) */
  retryDelayMs: number;
  /** Multiplier applied to the delay after each retry (1 = constant) */
  retryBackoffMultiplier: number;
  /** Upper bound for the retry delay (ms) */
  maxRetryDelayMs: number;
  /** Timeout handed to every health probe (ms) */
  healthCheckTimeoutMs: number;
  /** Fraction (0-1) of a batch allowed to fail before the rollout aborts */
  failureThresholdPerBatch: number;
  /** Invoke RemoteExecutor.rollback for hosts that end Failed */
  rollbackOnFailure: boolean;
  /** Re-run the restart command when a probe fails instead of re-probing */
  restartOnHealthFailure: boolean;
  /** Optional cap on hosts processed concurrently within a batch */
  maxConcurrency?: number;
  /** Time in-flight hosts get to finish after cancellation (ms) */
  cancelGracePeriodMs: number;
  /** Pause between consecutive batches (ms) */
  pauseBetweenBatchesMs: number;
}

/**
 * Ordered, fixed subset of hosts processed concurrently as a unit.
 */
export interface Batch {
  readonly index: number;
  /** Rollout group the batch belongs to */
  readonly group: string;
  readonly hosts: readonly Host[];
}

export type BatchStatus = 'completed' | 'aborted' | 'skipped';

export interface BatchReport {
  index: number;
  group: string;
  hostIds: string[];
  /** (Failed + RolledBack) / batch length; 0 for skipped batches */
  failureRate: number;
  status: BatchStatus;
}

export type AbortReason = 'failure_threshold' | 'cancelled';

export interface RolloutCounts {
  healthy: number;
  failed: number;
  rolledBack: number;
  skipped: number;
  total: number;
}

/**
 * Aggregate outcome of one rollout. Produced once and frozen.
 */
export interface RolloutResult {
  rolloutId: string;
  /** Epoch ms */
  startedAt: number;
  /** Epoch ms */
  finishedAt: number;
  /** Monotonic, sub-millisecond */
  durationMs: number;
  counts: RolloutCounts;
  aborted: boolean;
  abortReason?: AbortReason;
  batches: BatchReport[];
  /** Host id → terminal (or, for skipped hosts, pending) snapshot */
  hosts: Record<string, HostStateSnapshot>;
  /** Hosts never dispatched because the rollout aborted */
  skipped: string[];
}
