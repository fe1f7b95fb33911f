/**
 * Rollout Controller
 *
 * Top-level driver of a fleet restart. Plans the batches once, runs each
 * batch through the RestartCoordinator with a strict barrier between batches,
 * and aborts the rollout when a batch's failure rate exceeds the policy
 * threshold or the caller cancels.
 *
 * The controller owns the policy and every HostState of a rollout; each host
 * task mutates only its own state. After a cancellation grace period expires
 * the controller takes ownership back and force-fails hosts still in flight.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  AbortReason,
  Batch,
  BatchReport,
  Host,
  RolloutPolicy,
  RolloutResult,
} from '../types/rollout.js';
import { HostStage } from '../types/rollout.js';
import { resolvePolicy } from '../config/policy.js';
import { BatchPlanner } from './batch-planner.js';
import type { HealthChecker, RemoteExecutor } from './capabilities.js';
import { ConcurrencyLimiter, resolveConcurrency } from './concurrency-limiter.js';
import { InterruptedError, RolloutError, toRolloutError } from './errors.js';
import { HostState } from './host-state.js';
import { RestartCoordinator, type TransitionEvent, type RetryEvent } from './restart-coordinator.js';
import { buildRolloutResult } from './result.js';
import { delay, RetryAbortedError } from '../utils/retry.js';
import { TimerGuard } from '../utils/timer-guard.js';

export interface BatchStartedEvent {
  index: number;
  group: string;
  hostIds: string[];
}

export interface RolloutAbortedEvent {
  rolloutId: string;
  reason: AbortReason;
  skipped: string[];
}

/**
 * Lifecycle events emitted by the controller for observability hooks.
 */
export interface RolloutControllerEvents {
  rollout_started: (payload: { rolloutId: string; hosts: number; batches: number }) => void;
  batch_started: (payload: BatchStartedEvent) => void;
  batch_completed: (payload: BatchReport) => void;
  transition: (event: TransitionEvent) => void;
  retry: (event: RetryEvent) => void;
  rollout_aborted: (payload: RolloutAbortedEvent) => void;
  rollout_completed: (result: RolloutResult) => void;
}

export interface RolloutControllerDependencies {
  remoteExecutor: RemoteExecutor;
  healthChecker: HealthChecker;
  planner?: BatchPlanner;
  /** Defaults to a coordinator over the same executor and checker */
  coordinator?: RestartCoordinator;
  logger?: Logger;
  /** Time source override (useful for testing). */
  now?: () => number;
  /** Monotonic clock for durationMs (useful for testing). */
  monotonicNow?: () => number;
  /** Rollout id generator (useful for testing). */
  generateId?: () => string;
}

export interface RunOptions {
  /** Aborting this signal cancels the rollout (same as cancel()) */
  signal?: AbortSignal;
}

/** Per-run cancellation handles. */
interface ActiveRollout {
  rolloutId: string;
  /** Cooperative: stop starting work */
  cancel: AbortController;
  /** Forced: abort in-flight plugin calls */
  kill: AbortController;
}

const GRACE_EXPIRED = Symbol('grace_expired');

/**
 * Multi-host restart orchestrator.
 */
export class RolloutController extends EventEmitter<RolloutControllerEvents> {
  private readonly executor: RemoteExecutor;
  private readonly planner: BatchPlanner;
  private readonly coordinator: RestartCoordinator;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly monotonicNow: () => number;
  private readonly generateId: () => string;
  private active?: ActiveRollout;

  constructor(dependencies: RolloutControllerDependencies) {
    super();
    this.executor = dependencies.remoteExecutor;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? Date.now;
    this.monotonicNow = dependencies.monotonicNow ?? (() => performance.now());
    this.generateId = dependencies.generateId ?? randomUUID;
    this.planner = dependencies.planner ?? new BatchPlanner();
    this.coordinator = dependencies.coordinator ?? new RestartCoordinator({
      remoteExecutor: dependencies.remoteExecutor,
      healthChecker: dependencies.healthChecker,
      logger: this.logger?.child({ component: 'restart-coordinator' }),
      now: this.now,
    });

    this.coordinator.on('transition', (event) => this.notify('transition', () => this.emit('transition', event)));
    this.coordinator.on('retry', (event) => this.notify('retry', () => this.emit('retry', event)));
  }

  /**
   * Whether a rollout is currently running.
   */
  public isRunning(): boolean {
    return this.active !== undefined;
  }

  /**
   * Cancel the running rollout. No new batch starts; in-flight hosts get the
   * policy's grace period before they are force-failed.
   *
   * @returns false when no rollout is running
   */
  public cancel(reason = 'cancelled by caller'): boolean {
    if (!this.active || this.active.cancel.signal.aborted) {
      return false;
    }
    this.logger?.warn({ rolloutId: this.active.rolloutId, reason }, 'Rollout cancellation requested');
    this.active.cancel.abort(new Error(reason));
    return true;
  }

  /**
   * Run a rollout over `hosts`.
   *
   * Always resolves with a RolloutResult once the rollout starts, even when
   * every host fails.
   *
   * @throws ConfigError for an invalid policy or host set (before any host is touched)
   */
  public async run(
    hosts: readonly Host[],
    policyInput: Partial<RolloutPolicy> = {},
    options: RunOptions = {}
  ): Promise<RolloutResult> {
    if (this.active) {
      throw new Error('Rollout already in progress');
    }

    const policy = resolvePolicy(policyInput);
    const batches = this.planner.plan(hosts, policy);

    const rollout: ActiveRollout = {
      rolloutId: this.generateId(),
      cancel: new AbortController(),
      kill: new AbortController(),
    };
    this.active = rollout;

    const onExternalAbort = (): void => {
      this.cancel('cancelled by signal');
    };
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      return await this.execute(rollout, hosts, batches, policy);
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.active = undefined;
    }
  }

  private async execute(
    rollout: ActiveRollout,
    hosts: readonly Host[],
    batches: Batch[],
    policy: RolloutPolicy
  ): Promise<RolloutResult> {
    const startedAt = this.now();
    const startedMark = this.monotonicNow();
    const states = new Map<string, HostState>();
    for (const host of hosts) {
      states.set(host.id, new HostState(host.id, policy.maxRetries, this.now));
    }

    this.logger?.info(
      { rolloutId: rollout.rolloutId, hosts: hosts.length, batches: batches.length, batchSize: policy.batchSize },
      'Rollout started'
    );
    this.notify('rollout_started', () =>
      this.emit('rollout_started', { rolloutId: rollout.rolloutId, hosts: hosts.length, batches: batches.length })
    );

    const reports: BatchReport[] = [];
    let abortReason: AbortReason | undefined;
    let nextBatch = 0;

    for (; nextBatch < batches.length; nextBatch++) {
      const batch = batches[nextBatch];

      if (nextBatch > 0 && policy.pauseBetweenBatchesMs > 0) {
        try {
          await delay(policy.pauseBetweenBatchesMs, rollout.cancel.signal);
        } catch (error) {
          if (!(error instanceof RetryAbortedError)) {
            throw error;
          }
        }
      }

      if (rollout.cancel.signal.aborted) {
        abortReason = 'cancelled';
        break;
      }

      const report = await this.runBatch(rollout, batch, policy, states);
      reports.push(report);
      this.notify('batch_completed', () => this.emit('batch_completed', report));

      if (report.status === 'aborted') {
        abortReason = rollout.cancel.signal.aborted ? 'cancelled' : 'failure_threshold';
        nextBatch++;
        break;
      }
    }

    const skipped: string[] = [];
    for (const batch of batches.slice(nextBatch)) {
      const hostIds = batch.hosts.map((host) => host.id);
      skipped.push(...hostIds);
      reports.push({ index: batch.index, group: batch.group, hostIds, failureRate: 0, status: 'skipped' });
    }

    const result = buildRolloutResult({
      rolloutId: rollout.rolloutId,
      startedAt,
      finishedAt: this.now(),
      durationMs: this.monotonicNow() - startedMark,
      batches: reports,
      hosts: hosts.map((host) => this.requireState(states, host.id).snapshot()),
      skipped,
      abortReason,
    });

    if (abortReason) {
      this.logger?.warn(
        { rolloutId: rollout.rolloutId, reason: abortReason, skipped: skipped.length, counts: result.counts },
        'Rollout aborted'
      );
      const payload: RolloutAbortedEvent = { rolloutId: rollout.rolloutId, reason: abortReason, skipped };
      this.notify('rollout_aborted', () => this.emit('rollout_aborted', payload));
    } else {
      this.logger?.info(
        { rolloutId: rollout.rolloutId, counts: result.counts, durationMs: result.durationMs },
        'Rollout completed'
      );
    }
    this.notify('rollout_completed', () => this.emit('rollout_completed', result));

    return result;
  }

  /**
   * Process every host of a batch concurrently and wait for all of them to
   * reach a terminal stage (or for the cancellation grace period to expire).
   */
  private async runBatch(
    rollout: ActiveRollout,
    batch: Batch,
    policy: RolloutPolicy,
    states: Map<string, HostState>
  ): Promise<BatchReport> {
    const hostIds = batch.hosts.map((host) => host.id);
    const concurrency = resolveConcurrency(batch.hosts.length, policy.maxConcurrency, this.executor.maxConnections);
    const limiter = new ConcurrencyLimiter(concurrency);

    this.logger?.info({ batch: batch.index, group: batch.group, hosts: hostIds, concurrency }, 'Batch started');
    this.notify('batch_started', () =>
      this.emit('batch_started', { index: batch.index, group: batch.group, hostIds })
    );

    const tasks = batch.hosts.map((host) =>
      limiter.run(() => this.processHost(rollout, host, policy, this.requireState(states, host.id)))
    );

    const settled = Promise.all(tasks);
    const graceTimer = new TimerGuard(`grace:${batch.index}`);
    const batchDone = new AbortController();

    try {
      const outcome = await Promise.race([
        settled,
        this.waitForGraceExpiry(rollout.cancel.signal, policy.cancelGracePeriodMs, graceTimer, batchDone.signal),
      ]);

      if (outcome === GRACE_EXPIRED) {
        this.forceInterrupt(rollout, batch, states);
      }
    } finally {
      graceTimer.clear();
      batchDone.abort();
    }

    let failures = 0;
    for (const host of batch.hosts) {
      const stage = this.requireState(states, host.id).stage;
      if (stage === HostStage.FAILED || stage === HostStage.ROLLED_BACK) {
        failures++;
      }
    }

    const failureRate = failures / batch.hosts.length;
    const thresholdExceeded = failureRate > policy.failureThresholdPerBatch;
    const status = thresholdExceeded || rollout.cancel.signal.aborted ? 'aborted' : 'completed';

    this.logger?.info(
      { batch: batch.index, failures, failureRate, threshold: policy.failureThresholdPerBatch, status },
      'Batch completed'
    );

    return { index: batch.index, group: batch.group, hostIds, failureRate, status };
  }

  private async processHost(
    rollout: ActiveRollout,
    host: Host,
    policy: RolloutPolicy,
    state: HostState
  ): Promise<void> {
    try {
      await this.coordinator.process(host, policy, {
        state,
        cancelSignal: rollout.cancel.signal,
        killSignal: rollout.kill.signal,
      });
    } catch (error) {
      // Coordinator invariant violation; record it on the host and keep the batch going.
      this.logger?.error({ err: error, hostId: host.id }, 'Unexpected error while processing host');
      if (!state.isTerminal()) {
        const rolloutError = error instanceof RolloutError ? error : toRolloutError(error, host.id, 'execution');
        state.transition(HostStage.FAILED, rolloutError.toRecord());
      }
    }
  }

  /**
   * Resolves GRACE_EXPIRED `graceMs` after `cancelSignal` aborts. Never
   * resolves when the batch finishes first.
   */
  private waitForGraceExpiry(
    cancelSignal: AbortSignal,
    graceMs: number,
    timer: TimerGuard,
    batchDone: AbortSignal
  ): Promise<typeof GRACE_EXPIRED> {
    return new Promise((resolve) => {
      const start = (): void => {
        timer.set(() => resolve(GRACE_EXPIRED), graceMs);
      };
      if (cancelSignal.aborted) {
        start();
      } else {
        cancelSignal.addEventListener('abort', start, { once: true, signal: batchDone });
      }
    });
  }

  /**
   * Take back ownership of hosts still in flight after the grace period.
   */
  private forceInterrupt(rollout: ActiveRollout, batch: Batch, states: Map<string, HostState>): void {
    rollout.kill.abort(new Error('cancellation grace period expired'));

    for (const host of batch.hosts) {
      const state = this.requireState(states, host.id);
      if (state.isTerminal()) {
        continue;
      }
      const error = new InterruptedError('Cancellation grace period expired', host.id);
      const record = state.transition(HostStage.FAILED, error.toRecord());
      this.logger?.warn({ hostId: host.id, from: record.from }, 'Host force-terminated');
      const event: TransitionEvent = {
        hostId: host.id,
        from: record.from,
        to: record.to,
        attempt: record.attempt,
        timestamp: record.timestamp,
        error,
      };
      this.notify('transition', () => this.emit('transition', event));
    }
  }

  private requireState(states: Map<string, HostState>, hostId: string): HostState {
    const state = states.get(hostId);
    if (!state) {
      throw new Error(`No state tracked for host ${hostId}`);
    }
    return state;
  }

  private notify(event: keyof RolloutControllerEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err, event }, 'Error in rollout controller event listener');
    }
  }
}
