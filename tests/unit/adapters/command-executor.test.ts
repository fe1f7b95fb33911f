import { describe, it, expect, vi } from 'vitest';
import { execa } from 'execa';
import {
  CommandRemoteExecutor,
  execaRunner,
  type CommandOutcome,
  type CommandRunner,
} from '../../../src/adapters/command-executor.js';
import { ExecutionError, InterruptedError, RollbackError } from '../../../src/rollout/errors.js';
import type { ServiceDefinition } from '../../../src/types/service.js';
import type { Host } from '../../../src/types/rollout.js';

vi.mock('execa', () => ({
  execa: vi.fn(async () => ({
    failed: true,
    exitCode: 2,
    stdout: '',
    stderr: 'permission denied',
    timedOut: false,
    isCanceled: false,
    shortMessage: 'Command failed with exit code 2: ssh web1 true',
  })),
}));

const nginx: ServiceDefinition = {
  group: 'nginx',
  service: 'nginx',
  restartCommand: ['ssh', '{address}', 'sudo', 'systemctl', 'restart', '{service}'],
  expectedStatus: [200],
};

const tomcat: ServiceDefinition = {
  group: 'tomcat',
  service: 'tomcat9',
  restartCommand: ['ssh', '{address}', 'sudo', 'systemctl', 'restart', '{service}'],
  rollbackCommand: ['ssh', '{address}', 'sudo', '/opt/deploy/rollback.sh', '{service}', '{host}'],
  expectedStatus: [200],
  commandTimeoutMs: 5_000,
};

const services = new Map([
  ['nginx', nginx],
  ['tomcat', tomcat],
]);

const web1: Host = { id: 'web1', groups: ['nginx'], connection: { address: 'web1.example.internal' } };
const app1: Host = { id: 'app1', groups: ['tomcat'] };

const succeeded: CommandOutcome = { failed: false, exitCode: 0, stderr: '', timedOut: false, isCanceled: false };

function executorWith(outcome: CommandOutcome) {
  const runCommand = vi.fn<CommandRunner>().mockResolvedValue(outcome);
  const executor = new CommandRemoteExecutor({ services, runCommand, maxConnections: 4 });
  return { executor, runCommand };
}

describe('CommandRemoteExecutor', () => {
  const signal = new AbortController().signal;

  it('renders the restart command for the host', async () => {
    const { executor, runCommand } = executorWith(succeeded);

    await executor.restart(web1, { signal });

    expect(runCommand).toHaveBeenCalledWith(
      'ssh',
      ['web1.example.internal', 'sudo', 'systemctl', 'restart', 'nginx'],
      { timeout: 120_000, signal }
    );
    expect(executor.maxConnections).toBe(4);
  });

  it('uses the host id as address and the service timeout', async () => {
    const { executor, runCommand } = executorWith(succeeded);

    await executor.rollback(app1, { signal });

    expect(runCommand).toHaveBeenCalledWith(
      'ssh',
      ['app1', 'sudo', '/opt/deploy/rollback.sh', 'tomcat9', 'app1'],
      { timeout: 5_000, signal }
    );
  });

  it('raises an ExecutionError with exit code and stderr', async () => {
    const { executor } = executorWith({
      failed: true,
      exitCode: 5,
      stderr: '  Unit nginx.service not found.\n',
      timedOut: false,
      isCanceled: false,
    });

    const failure = executor.restart(web1, { signal });

    await expect(failure).rejects.toBeInstanceOf(ExecutionError);
    await expect(failure).rejects.toMatchObject({
      message: 'restart command for web1 exited with code 5: Unit nginx.service not found.',
      exitCode: 5,
      hostId: 'web1',
    });
  });

  it('reports a timed out command', async () => {
    const { executor } = executorWith({ failed: true, stderr: '', timedOut: true, isCanceled: false });

    await expect(executor.restart(app1, { signal })).rejects.toThrow('restart command for app1 timed out after 5000ms');
  });

  it('reports a command that could not be spawned', async () => {
    const { executor } = executorWith({
      failed: true,
      stderr: '',
      timedOut: false,
      isCanceled: false,
      shortMessage: 'Command failed with ENOENT: ssh web1.example.internal',
    });

    const failure = executor.restart(web1, { signal });

    await expect(failure).rejects.toThrow(
      'restart command for web1 failed to run: Command failed with ENOENT: ssh web1.example.internal'
    );
    await expect(failure).rejects.toMatchObject({ exitCode: undefined });
  });

  it('truncates long stderr', async () => {
    const { executor } = executorWith({
      failed: true,
      exitCode: 1,
      stderr: 'x'.repeat(600),
      timedOut: false,
      isCanceled: false,
    });

    await expect(executor.restart(web1, { signal })).rejects.toThrow(
      `restart command for web1 exited with code 1: ${'x'.repeat(500)}...`
    );
  });

  it('maps a cancelled command to an InterruptedError', async () => {
    const { executor } = executorWith({ failed: true, stderr: '', timedOut: false, isCanceled: true });

    const failure = executor.restart(web1, { signal });

    await expect(failure).rejects.toBeInstanceOf(InterruptedError);
    await expect(failure).rejects.toThrow('restart command for web1 was cancelled');
  });

  it('raises a RollbackError when the rollback command fails', async () => {
    const { executor } = executorWith({ failed: true, exitCode: 1, stderr: '', timedOut: false, isCanceled: false });

    const failure = executor.rollback(app1, { signal });

    await expect(failure).rejects.toBeInstanceOf(RollbackError);
    await expect(failure).rejects.toThrow('rollback command for app1 exited with code 1');
  });

  it('refuses a rollback for a group without a rollback command', async () => {
    const { executor, runCommand } = executorWith(succeeded);

    await expect(executor.rollback(web1, { signal })).rejects.toThrow('No rollback command for host web1');
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('refuses a host without a service definition', async () => {
    const { executor } = executorWith(succeeded);

    await expect(executor.restart({ id: 'db1', groups: ['postgres'] }, { signal })).rejects.toThrow(
      'No service definition for host db1'
    );
  });
});

describe('execaRunner', () => {
  it('runs through execa without rejecting and keeps the outcome fields', async () => {
    const signal = new AbortController().signal;

    const outcome = await execaRunner('ssh', ['web1', 'true'], { timeout: 1_000, signal });

    expect(execa).toHaveBeenCalledWith('ssh', ['web1', 'true'], { timeout: 1_000, signal, reject: false });
    expect(outcome).toEqual({
      failed: true,
      exitCode: 2,
      stderr: 'permission denied',
      timedOut: false,
      isCanceled: false,
      shortMessage: 'Command failed with exit code 2: ssh web1 true',
    });
  });
});
