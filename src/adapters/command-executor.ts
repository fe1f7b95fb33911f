/**
 * Command Remote Executor
 *
 * RemoteExecutor that runs the templated restart/rollback argv of a host's
 * service group as a local process (typically `ssh <address> sudo systemctl
 * restart <service>`). Transport and authentication are whatever the command
 * itself uses.
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import type { Host } from '../types/rollout.js';
import type { ServiceDefinition } from '../types/service.js';
import type { CapabilityCallOptions, RemoteExecutor } from '../rollout/capabilities.js';
import { ExecutionError, InterruptedError, RollbackError } from '../rollout/errors.js';
import { COMMAND_EXECUTOR } from '../config/defaults.js';
import { renderTemplate, serviceFor, templateContext } from './template.js';

/**
 * Outcome of one command run, as far as the executor cares.
 */
export interface CommandOutcome {
  failed: boolean;
  exitCode?: number;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
  /** Set when the process could not be spawned (no exit code) */
  shortMessage?: string;
}

export interface CommandRunOptions {
  timeout: number;
  signal: AbortSignal;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandRunOptions
) => Promise<CommandOutcome>;

/**
 * Default runner: spawn through execa without rejecting on failure.
 */
export const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    timeout: options.timeout,
    signal: options.signal,
    reject: false,
  });
  return {
    failed: result.failed,
    exitCode: result.exitCode,
    stderr: result.stderr,
    timedOut: result.timedOut,
    isCanceled: result.isCanceled,
    ...('shortMessage' in result && typeof result.shortMessage === 'string' && { shortMessage: result.shortMessage }),
  };
};

export interface CommandRemoteExecutorConfig {
  /** Service definitions keyed by rollout group */
  services: ReadonlyMap<string, ServiceDefinition>;
  /** Default per-command timeout (ms) */
  commandTimeoutMs?: number;
  /** Advertised connection ceiling */
  maxConnections?: number;
  logger?: Logger;
  /** Process runner override (useful for testing). */
  runCommand?: CommandRunner;
}

type CommandKind = 'restart' | 'rollback';

function truncate(text: string, max: number): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

export class CommandRemoteExecutor implements RemoteExecutor {
  public readonly maxConnections?: number;
  private readonly services: ReadonlyMap<string, ServiceDefinition>;
  private readonly commandTimeoutMs: number;
  private readonly logger?: Logger;
  private readonly runner: CommandRunner;

  constructor(config: CommandRemoteExecutorConfig) {
    this.services = config.services;
    this.commandTimeoutMs = config.commandTimeoutMs ?? COMMAND_EXECUTOR.DEFAULT_COMMAND_TIMEOUT_MS;
    this.maxConnections = config.maxConnections;
    this.logger = config.logger;
    this.runner = config.runCommand ?? execaRunner;
  }

  async restart(host: Host, options: CapabilityCallOptions): Promise<void> {
    const service = serviceFor(this.services, host);
    if (!service) {
      throw new ExecutionError(`No service definition for host ${host.id}`, host.id);
    }
    await this.runCommand('restart', host, service, service.restartCommand, options);
  }

  async rollback(host: Host, options: CapabilityCallOptions): Promise<void> {
    const service = serviceFor(this.services, host);
    if (!service?.rollbackCommand) {
      throw new RollbackError(`No rollback command for host ${host.id}`, host.id);
    }
    await this.runCommand('rollback', host, service, service.rollbackCommand, options);
  }

  private async runCommand(
    kind: CommandKind,
    host: Host,
    service: ServiceDefinition,
    template: readonly string[],
    options: CapabilityCallOptions
  ): Promise<void> {
    const context = templateContext(host, service);
    const [file, ...args] = template.map((part) => renderTemplate(part, context));
    const timeout = service.commandTimeoutMs ?? this.commandTimeoutMs;

    this.logger?.debug({ hostId: host.id, kind, command: [file, ...args].join(' ') }, 'Running command');

    const result = await this.runner(file, args, { timeout, signal: options.signal });

    if (!result.failed) {
      return;
    }

    if (result.isCanceled) {
      throw new InterruptedError(`${kind} command for ${host.id} was cancelled`, host.id);
    }

    const stderr = truncate(result.stderr, COMMAND_EXECUTOR.MAX_STDERR_LENGTH);
    let reason: string;
    if (result.timedOut) {
      reason = `timed out after ${timeout}ms`;
    } else if (result.exitCode !== undefined) {
      reason = `exited with code ${result.exitCode}`;
    } else {
      reason = `failed to run: ${result.shortMessage ?? 'no exit code'}`;
    }
    const message = `${kind} command for ${host.id} ${reason}${stderr ? `: ${stderr}` : ''}`;

    this.logger?.debug({ hostId: host.id, kind, exitCode: result.exitCode, timedOut: result.timedOut }, 'Command failed');

    if (kind === 'rollback') {
      throw new RollbackError(message, host.id);
    }
    throw new ExecutionError(message, host.id, result.exitCode);
  }
}
