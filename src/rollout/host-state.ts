/**
 * Host State
 *
 * Per-host lifecycle record. Stage changes are restricted to the transition
 * table below; the attempt counter is bounded by the policy's maxRetries.
 *
 * Pending → Restarting → AwaitingHealth → Healthy
 *                 ↑  ↺        ↺ │
 *                 └─────────────┘ (restartOnHealthFailure)
 * Restarting | AwaitingHealth → Failed → RolledBack
 *
 * A pending host may also be forced to Failed when a cancelled rollout
 * reaches it before it started.
 *
 * @module rollout/host-state
 */

import type { ErrorRecord, HostStateSnapshot, StageTransition } from '../types/rollout.js';
import { HostStage, TERMINAL_STAGES } from '../types/rollout.js';

const ALLOWED_TRANSITIONS: Readonly<Record<HostStage, readonly HostStage[]>> = {
  [HostStage.PENDING]: [HostStage.RESTARTING, HostStage.FAILED],
  [HostStage.RESTARTING]: [HostStage.RESTARTING, HostStage.AWAITING_HEALTH, HostStage.FAILED],
  [HostStage.AWAITING_HEALTH]: [
    HostStage.AWAITING_HEALTH,
    HostStage.RESTARTING,
    HostStage.HEALTHY,
    HostStage.FAILED,
  ],
  [HostStage.HEALTHY]: [],
  [HostStage.FAILED]: [HostStage.ROLLED_BACK],
  [HostStage.ROLLED_BACK]: [],
};

/**
 * Raised on an illegal stage change. Indicates a coordinator bug, not a host
 * failure, so it is not part of the rollout error taxonomy.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly hostId: string,
    public readonly from: HostStage,
    public readonly to: HostStage
  ) {
    super(`Invalid transition for host ${hostId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function isTerminalStage(stage: HostStage): boolean {
  return TERMINAL_STAGES.has(stage);
}

export function canTransition(from: HostStage, to: HostStage): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Mutable per-host state. Owned by exactly one host task at a time.
 */
export class HostState {
  private currentStage: HostStage = HostStage.PENDING;
  private attemptCount = 0;
  private error?: ErrorRecord;
  private rollbackFailure?: ErrorRecord;
  private readonly transitions: StageTransition[] = [];

  constructor(
    public readonly hostId: string,
    private readonly maxRetries: number,
    private readonly now: () => number = Date.now
  ) {}

  get stage(): HostStage {
    return this.currentStage;
  }

  get attempt(): number {
    return this.attemptCount;
  }

  get lastError(): ErrorRecord | undefined {
    return this.error;
  }

  /**
   * Frozen copy; later transitions do not show up in it.
   */
  get history(): readonly StageTransition[] {
    return Object.freeze([...this.transitions]);
  }

  isTerminal(): boolean {
    return isTerminalStage(this.currentStage);
  }

  /**
   * Whether another retry is available under the policy budget.
   */
  hasRetriesLeft(): boolean {
    return this.attemptCount < this.maxRetries;
  }

  /**
   * Move to a new stage and record it.
   *
   * @throws InvalidTransitionError when the edge is not in the table
   */
  transition(to: HostStage, error?: ErrorRecord): StageTransition {
    const from = this.currentStage;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(this.hostId, from, to);
    }

    if (error) {
      this.error = error;
    }

    const record: StageTransition = {
      from,
      to,
      attempt: this.attemptCount,
      timestamp: this.now(),
      ...(error && { error }),
    };
    this.currentStage = to;
    this.transitions.push(record);
    return record;
  }

  /**
   * Record a failed attempt and consume one retry.
   *
   * @throws Error when the retry budget is already exhausted
   */
  recordRetry(error: ErrorRecord): void {
    if (!this.hasRetriesLeft()) {
      throw new Error(`Retry budget exhausted for host ${this.hostId}`);
    }
    this.error = error;
    this.attemptCount += 1;
  }

  recordRollbackFailure(error: ErrorRecord): void {
    this.rollbackFailure = error;
  }

  snapshot(): HostStateSnapshot {
    return {
      hostId: this.hostId,
      stage: this.currentStage,
      attempt: this.attemptCount,
      ...(this.error && { lastError: { ...this.error } }),
      ...(this.rollbackFailure && { rollbackError: { ...this.rollbackFailure } }),
      history: this.transitions.map((t) => ({ ...t })),
    };
  }
}
