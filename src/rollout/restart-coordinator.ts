/**
 * Restart Coordinator
 *
 * Drives one host through the restart protocol: run the restart command,
 * probe health, retry both under a shared attempt budget, and escalate to
 * rollback when the budget is exhausted.
 *
 * Responsibilities:
 * - Enforce the HostState transition table for the host being processed
 *   (and only that host).
 * - Suspend only the current host's task during retry backoff.
 * - Normalise every plugin failure into the rollout error taxonomy and keep
 *   it on the host's state instead of throwing.
 * - Emit a `transition` event per stage change for observability hooks.
 * - Honour cooperative cancellation (no new retries) and force termination
 *   (plugin calls receive an aborted signal; state is left to the caller).
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { Host, HostStateSnapshot, RolloutPolicy } from '../types/rollout.js';
import { HostStage } from '../types/rollout.js';
import type { CapabilityCallOptions, HealthChecker, RemoteExecutor } from './capabilities.js';
import {
  HealthCheckError,
  InterruptedError,
  RollbackError,
  toRolloutError,
  type RolloutError,
} from './errors.js';
import { HostState } from './host-state.js';
import { backoffDelay, delay, OperationTimeoutError, RetryAbortedError, withTimeout } from '../utils/retry.js';
import { lazyLog } from '../utils/logger.js';

/**
 * Payload of a stage transition event.
 */
export interface TransitionEvent {
  hostId: string;
  from: HostStage;
  to: HostStage;
  attempt: number;
  timestamp: number;
  error?: RolloutError;
}

/**
 * Payload emitted before a retry backoff starts.
 */
export interface RetryEvent {
  hostId: string;
  attempt: number;
  delayMs: number;
  error: RolloutError;
}

export interface RestartCoordinatorEvents {
  transition: (event: TransitionEvent) => void;
  retry: (event: RetryEvent) => void;
}

export interface RestartCoordinatorDependencies {
  remoteExecutor: RemoteExecutor;
  healthChecker: HealthChecker;
  logger?: Logger;
  /** Time source override (useful for testing). */
  now?: () => number;
}

export interface ProcessOptions {
  /** Existing state for the host; a fresh Pending state is created when omitted */
  state?: HostState;
  /** Cooperative cancellation: no retry is started once aborted */
  cancelSignal?: AbortSignal;
  /** Force termination: forwarded to every plugin call */
  killSignal?: AbortSignal;
}

type Phase = 'restart' | 'health';

type AttemptOutcome = { ok: true } | { ok: false; error: RolloutError };

/**
 * Per-host restart state machine driver.
 */
export class RestartCoordinator extends EventEmitter<RestartCoordinatorEvents> {
  private readonly executor: RemoteExecutor;
  private readonly checker: HealthChecker;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(dependencies: RestartCoordinatorDependencies) {
    super();
    this.executor = dependencies.remoteExecutor;
    this.checker = dependencies.healthChecker;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? Date.now;
  }

  /**
   * Process one host to a terminal stage.
   *
   * A host that is already terminal is returned untouched, without any
   * RemoteExecutor or HealthChecker call.
   *
   * If the state is forced terminal by its owner while a plugin call is in
   * flight, the call's outcome is discarded and the forced state returned.
   */
  public async process(
    host: Host,
    policy: RolloutPolicy,
    options: ProcessOptions = {}
  ): Promise<HostStateSnapshot> {
    const state = options.state ?? new HostState(host.id, policy.maxRetries, this.now);

    if (state.isTerminal()) {
      lazyLog(this.logger, 'debug', () => ({ hostId: host.id, stage: state.stage }), 'Host already terminal, skipping');
      return state.snapshot();
    }

    if (state.stage !== HostStage.PENDING) {
      throw new Error(`Host ${host.id} is already being processed (stage ${state.stage})`);
    }

    const callOptions: CapabilityCallOptions = {
      signal: options.killSignal ?? new AbortController().signal,
    };

    if (options.cancelSignal?.aborted) {
      return this.fail(host, state, policy, new InterruptedError('Rollout cancelled before host started', host.id), callOptions);
    }

    this.move(state, HostStage.RESTARTING);
    let phase: Phase = 'restart';

    for (;;) {
      const outcome = phase === 'restart'
        ? await this.attemptRestart(host, callOptions)
        : await this.attemptHealthCheck(host, policy, callOptions);

      if (state.isTerminal()) {
        return state.snapshot();
      }

      if (outcome.ok) {
        if (phase === 'restart') {
          this.move(state, HostStage.AWAITING_HEALTH);
          phase = 'health';
          continue;
        }
        this.move(state, HostStage.HEALTHY);
        this.logger?.info({ hostId: host.id, attempt: state.attempt }, 'Host healthy');
        return state.snapshot();
      }

      if (outcome.error instanceof InterruptedError || !state.hasRetriesLeft()) {
        return this.fail(host, state, policy, outcome.error, callOptions);
      }

      state.recordRetry(outcome.error.toRecord());
      const delayMs = backoffDelay(state.attempt, {
        initialDelayMs: policy.retryDelayMs,
        maxDelayMs: policy.maxRetryDelayMs,
        backoffMultiplier: policy.retryBackoffMultiplier,
      });

      this.logger?.warn(
        { hostId: host.id, attempt: state.attempt, maxRetries: policy.maxRetries, delayMs, phase, error: outcome.error.message },
        'Host attempt failed, retrying'
      );
      const retryEvent: RetryEvent = { hostId: host.id, attempt: state.attempt, delayMs, error: outcome.error };
      this.notify('retry', () => this.emit('retry', retryEvent));

      try {
        await delay(delayMs, options.cancelSignal);
      } catch (error) {
        if (!(error instanceof RetryAbortedError)) {
          throw error;
        }
        if (state.isTerminal()) {
          return state.snapshot();
        }
        return this.fail(
          host,
          state,
          policy,
          new InterruptedError('Rollout cancelled during retry backoff', host.id, error),
          callOptions
        );
      }

      if (state.isTerminal()) {
        return state.snapshot();
      }

      if (phase === 'health' && policy.restartOnHealthFailure) {
        phase = 'restart';
      }
      this.move(state, phase === 'restart' ? HostStage.RESTARTING : HostStage.AWAITING_HEALTH);
    }
  }

  private async attemptRestart(host: Host, callOptions: CapabilityCallOptions): Promise<AttemptOutcome> {
    try {
      await this.executor.restart(host, callOptions);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: toRolloutError(error, host.id, 'execution') };
    }
  }

  private async attemptHealthCheck(
    host: Host,
    policy: RolloutPolicy,
    callOptions: CapabilityCallOptions
  ): Promise<AttemptOutcome> {
    const timeoutMs = policy.healthCheckTimeoutMs;
    try {
      const healthy = await withTimeout(
        Promise.resolve(this.checker.check(host, timeoutMs, callOptions)),
        timeoutMs,
        `Health check for ${host.id}`
      );
      if (healthy) {
        return { ok: true };
      }
      return { ok: false, error: new HealthCheckError(`Host ${host.id} reported unhealthy`, host.id) };
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        return { ok: false, error: new HealthCheckError(error.message, host.id, true, error) };
      }
      return { ok: false, error: toRolloutError(error, host.id, 'health') };
    }
  }

  /**
   * Transition to Failed and, when configured, attempt a best-effort rollback.
   */
  private async fail(
    host: Host,
    state: HostState,
    policy: RolloutPolicy,
    error: RolloutError,
    callOptions: CapabilityCallOptions
  ): Promise<HostStateSnapshot> {
    this.move(state, HostStage.FAILED, error);
    this.logger?.warn(
      { hostId: host.id, attempt: state.attempt, code: error.code, error: error.message },
      'Host failed'
    );

    const rollback = this.executor.rollback;
    if (
      !policy.rollbackOnFailure ||
      !rollback ||
      error instanceof InterruptedError ||
      callOptions.signal.aborted
    ) {
      return state.snapshot();
    }

    try {
      await rollback.call(this.executor, host, callOptions);
    } catch (rollbackFailure) {
      const rollbackError = rollbackFailure instanceof RollbackError
        ? rollbackFailure
        : new RollbackError(
          `Rollback failed for ${host.id}: ${toRolloutError(rollbackFailure, host.id, 'rollback').message}`,
          host.id,
          rollbackFailure instanceof Error ? rollbackFailure : undefined
        );
      state.recordRollbackFailure(rollbackError.toRecord());
      this.logger?.error({ hostId: host.id, error: rollbackError.message }, 'Rollback failed');
      return state.snapshot();
    }

    if (callOptions.signal.aborted) {
      return state.snapshot();
    }

    this.move(state, HostStage.ROLLED_BACK);
    this.logger?.info({ hostId: host.id }, 'Host rolled back');
    return state.snapshot();
  }

  private move(state: HostState, to: HostStage, error?: RolloutError): void {
    const record = state.transition(to, error?.toRecord());
    lazyLog(
      this.logger,
      'debug',
      () => ({ hostId: state.hostId, from: record.from, to, attempt: record.attempt }),
      'Host transition'
    );
    const event: TransitionEvent = {
      hostId: state.hostId,
      from: record.from,
      to,
      attempt: record.attempt,
      timestamp: record.timestamp,
      ...(error && { error }),
    };
    this.notify('transition', () => this.emit('transition', event));
  }

  /**
   * Listener failures never affect the host being processed.
   */
  private notify(event: keyof RestartCoordinatorEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err, event }, 'Error in restart coordinator event listener');
    }
  }
}
