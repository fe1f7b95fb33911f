import { describe, it, expect, vi } from 'vitest';
import { RestartCoordinator, type RetryEvent, type TransitionEvent } from '../../../src/rollout/restart-coordinator.js';
import { HostState } from '../../../src/rollout/host-state.js';
import { HostStage } from '../../../src/types/rollout.js';
import type { HealthChecker, RemoteExecutor } from '../../../src/rollout/capabilities.js';
import {
  RestartOnlyExecutor,
  ScriptedExecutor,
  ScriptedHealthChecker,
  makeHost,
  testPolicy,
} from '../../helpers/fleet-fakes.js';

const host = makeHost('h1', 'nginx');

function coordinatorWith(remoteExecutor: RemoteExecutor, healthChecker: HealthChecker = new ScriptedHealthChecker()) {
  return new RestartCoordinator({ remoteExecutor, healthChecker });
}

const stages = (events: TransitionEvent[]) => events.map((event) => [event.from, event.to]);

describe('RestartCoordinator.process', () => {
  it('reaches healthy with no retries when everything succeeds', async () => {
    const executor = new ScriptedExecutor();
    const checker = new ScriptedHealthChecker();
    const coordinator = coordinatorWith(executor, checker);
    const events: TransitionEvent[] = [];
    coordinator.on('transition', (event) => events.push(event));

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2 }));

    expect(result.stage).toBe(HostStage.HEALTHY);
    expect(result.attempt).toBe(0);
    expect(executor.restartCalls).toEqual(['h1']);
    expect(checker.checkCalls).toEqual(['h1']);
    expect(stages(events)).toEqual([
      [HostStage.PENDING, HostStage.RESTARTING],
      [HostStage.RESTARTING, HostStage.AWAITING_HEALTH],
      [HostStage.AWAITING_HEALTH, HostStage.HEALTHY],
    ]);
  });

  it.each([1, 2])('reaches healthy with attempt == %i after that many restart failures', async (k) => {
    const executor = new ScriptedExecutor({ restartFailures: { h1: k } });
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2 }));

    expect(result.stage).toBe(HostStage.HEALTHY);
    expect(result.attempt).toBe(k);
    expect(executor.restartCalls).toHaveLength(k + 1);
    expect(result.lastError?.code).toBe('EXECUTION_ERROR');
  });

  it('fails after exhausting maxRetries when restart always fails', async () => {
    const executor = new ScriptedExecutor({ restartFailures: { h1: 'always' } });
    const checker = new ScriptedHealthChecker();
    const coordinator = coordinatorWith(executor, checker);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2 }));

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.attempt).toBe(2);
    expect(executor.restartCalls).toHaveLength(3);
    expect(checker.checkCalls).toEqual([]);
    expect(result.lastError).toMatchObject({ code: 'EXECUTION_ERROR', message: 'restart failed on h1' });
    expect(executor.rollbackCalls).toEqual([]);
  });

  it('rolls back a failed host when rollbackOnFailure is set', async () => {
    const executor = new ScriptedExecutor({ restartFailures: { h1: 'always' } });
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 1, rollbackOnFailure: true }));

    expect(result.stage).toBe(HostStage.ROLLED_BACK);
    expect(result.attempt).toBe(1);
    expect(executor.rollbackCalls).toEqual(['h1']);
    expect(result.lastError?.code).toBe('EXECUTION_ERROR');
    expect(result.history.map((t) => t.to).slice(-2)).toEqual([HostStage.FAILED, HostStage.ROLLED_BACK]);
  });

  it('stays failed and records the rollback error when rollback fails', async () => {
    const executor = new ScriptedExecutor({ restartFailures: { h1: 'always' }, rollbackFailures: ['h1'] });
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 0, rollbackOnFailure: true }));

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.lastError?.code).toBe('EXECUTION_ERROR');
    expect(result.rollbackError).toMatchObject({ code: 'ROLLBACK_ERROR', message: 'rollback failed on h1' });
  });

  it('stays failed when the executor has no rollback capability', async () => {
    const executor = new RestartOnlyExecutor();
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 0, rollbackOnFailure: true }));

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result).not.toHaveProperty('rollbackError');
  });

  it('re-probes without restarting when a single probe fails', async () => {
    const executor = new ScriptedExecutor();
    const checker = new ScriptedHealthChecker({ unhealthyProbes: { h1: 1 } });
    const coordinator = coordinatorWith(executor, checker);
    const events: TransitionEvent[] = [];
    coordinator.on('transition', (event) => events.push(event));

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2 }));

    expect(result.stage).toBe(HostStage.HEALTHY);
    expect(result.attempt).toBe(1);
    expect(executor.restartCalls).toEqual(['h1']);
    expect(checker.checkCalls).toEqual(['h1', 'h1']);
    expect(result.lastError).toMatchObject({ code: 'HEALTH_CHECK_ERROR', message: 'Host h1 reported unhealthy' });
    expect(stages(events)).toContainEqual([HostStage.AWAITING_HEALTH, HostStage.AWAITING_HEALTH]);
  });

  it('re-runs the restart when restartOnHealthFailure is set', async () => {
    const executor = new ScriptedExecutor();
    const checker = new ScriptedHealthChecker({ unhealthyProbes: { h1: 1 } });
    const coordinator = coordinatorWith(executor, checker);
    const events: TransitionEvent[] = [];
    coordinator.on('transition', (event) => events.push(event));

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2, restartOnHealthFailure: true }));

    expect(result.stage).toBe(HostStage.HEALTHY);
    expect(executor.restartCalls).toEqual(['h1', 'h1']);
    expect(stages(events)).toContainEqual([HostStage.AWAITING_HEALTH, HostStage.RESTARTING]);
  });

  it('fails with a health check error when probes keep throwing', async () => {
    const checker = new ScriptedHealthChecker({ unhealthyProbes: { h1: 'always' }, throwing: ['h1'] });
    const executor = new ScriptedExecutor();
    const coordinator = coordinatorWith(executor, checker);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 2 }));

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.attempt).toBe(2);
    expect(checker.checkCalls).toHaveLength(3);
    expect(executor.restartCalls).toHaveLength(1);
    expect(result.lastError).toMatchObject({ code: 'HEALTH_CHECK_ERROR', message: 'connection refused by h1' });
  });

  it('shares one retry budget between restart and health failures', async () => {
    const policy = testPolicy({ maxRetries: 1 });
    const coordinator = coordinatorWith(
      new ScriptedExecutor({ restartFailures: { h1: 1 } }),
      new ScriptedHealthChecker({ unhealthyProbes: { h1: 1 } })
    );

    const result = await coordinator.process(host, policy);

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.attempt).toBe(1);
    expect(result.lastError?.code).toBe('HEALTH_CHECK_ERROR');
  });

  it('times out a hanging probe', async () => {
    const checker: HealthChecker = { check: () => new Promise<boolean>(() => undefined) };
    const coordinator = coordinatorWith(new ScriptedExecutor(), checker);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 0, healthCheckTimeoutMs: 20 }));

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.lastError).toMatchObject({
      code: 'HEALTH_CHECK_ERROR',
      message: 'Health check for h1 timed out after 20ms',
    });
  });

  it('wraps non-Error throws from the executor', async () => {
    const executor: RemoteExecutor = {
      restart: () => Promise.reject('ssh: connect to host h1 port 22: Connection refused'),
    };
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(host, testPolicy({ maxRetries: 0 }));

    expect(result.lastError).toMatchObject({
      code: 'EXECUTION_ERROR',
      name: 'ExecutionError',
      message: 'ssh: connect to host h1 port 22: Connection refused',
    });
  });

  it('is a no-op for a host that is already healthy', async () => {
    const executor = new ScriptedExecutor();
    const checker = new ScriptedHealthChecker();
    const coordinator = coordinatorWith(executor, checker);
    const policy = testPolicy();
    const state = new HostState('h1', policy.maxRetries);

    await coordinator.process(host, policy, { state });
    const again = await coordinator.process(host, policy, { state });

    expect(again.stage).toBe(HostStage.HEALTHY);
    expect(executor.restartCalls).toEqual(['h1']);
    expect(checker.checkCalls).toEqual(['h1']);
    expect(again.history).toHaveLength(3);
  });

  it('emits retry events with the backoff delay', async () => {
    const coordinator = coordinatorWith(new ScriptedExecutor({ restartFailures: { h1: 2 } }));
    const retries: RetryEvent[] = [];
    coordinator.on('retry', (event) => retries.push(event));

    await coordinator.process(
      host,
      testPolicy({ maxRetries: 2, retryDelayMs: 5, retryBackoffMultiplier: 2, maxRetryDelayMs: 100 })
    );

    expect(retries.map((event) => [event.attempt, event.delayMs])).toEqual([
      [1, 5],
      [2, 10],
    ]);
  });

  it('keeps going when a listener throws', async () => {
    const coordinator = coordinatorWith(new ScriptedExecutor());
    coordinator.on('transition', () => {
      throw new Error('listener exploded');
    });

    const result = await coordinator.process(host, testPolicy());

    expect(result.stage).toBe(HostStage.HEALTHY);
  });

  it('fails without calling the executor when cancelled before start', async () => {
    const executor = new ScriptedExecutor();
    const coordinator = coordinatorWith(executor);
    const cancel = new AbortController();
    cancel.abort();

    const result = await coordinator.process(host, testPolicy(), { cancelSignal: cancel.signal });

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.lastError?.code).toBe('INTERRUPTED');
    expect(executor.restartCalls).toEqual([]);
  });

  it('stops at the retry backoff once cancelled', async () => {
    const cancel = new AbortController();
    const executor = new ScriptedExecutor({
      restartFailures: { h1: 'always' },
      onRestart: () => cancel.abort(),
    });
    const coordinator = coordinatorWith(executor);

    const result = await coordinator.process(
      host,
      testPolicy({ maxRetries: 3, retryDelayMs: 60_000, maxRetryDelayMs: 60_000, rollbackOnFailure: true }),
      { cancelSignal: cancel.signal }
    );

    expect(result.stage).toBe(HostStage.FAILED);
    expect(result.attempt).toBe(1);
    expect(result.lastError).toMatchObject({ code: 'INTERRUPTED', message: 'Rollout cancelled during retry backoff' });
    expect(executor.restartCalls).toEqual(['h1']);
    expect(executor.rollbackCalls).toEqual([]);
  });

  it('refuses a host that is already in progress', async () => {
    const coordinator = coordinatorWith(new ScriptedExecutor());
    const state = new HostState('h1', 1);
    state.transition(HostStage.RESTARTING);

    await expect(coordinator.process(host, testPolicy(), { state })).rejects.toThrow(
      'Host h1 is already being processed (stage restarting)'
    );
  });

  it('passes the kill signal and timeout to the health checker', async () => {
    const check = vi.fn().mockResolvedValue(true);
    const kill = new AbortController();
    const coordinator = coordinatorWith(new ScriptedExecutor(), { check });

    await coordinator.process(host, testPolicy({ healthCheckTimeoutMs: 250 }), { killSignal: kill.signal });

    expect(check).toHaveBeenCalledWith(host, 250, { signal: kill.signal });
  });
});
