/**
 * Error taxonomy for the restart orchestrator.
 *
 * Only ConfigError ever escapes a rollout. Every other error is captured on
 * the host's state and in the rollout result.
 */

import type { ZodError } from 'zod';
import type { ErrorRecord } from '../types/rollout.js';

export enum RolloutErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  HEALTH_CHECK_ERROR = 'HEALTH_CHECK_ERROR',
  ROLLBACK_ERROR = 'ROLLBACK_ERROR',
  INTERRUPTED = 'INTERRUPTED',
}

/**
 * Base class for orchestrator errors
 */
export class RolloutError extends Error {
  public readonly timestamp: number;

  constructor(
    message: string,
    public readonly code: RolloutErrorCode,
    public readonly context: Record<string, unknown> = {},
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RolloutError';
    this.timestamp = Date.now();
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Convert to a serializable record for HostState
   */
  toRecord(): ErrorRecord {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
      at: this.timestamp,
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause?.message,
    };
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid policy or input. Fatal, raised before any host is touched.
 */
export class ConfigError extends RolloutError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = [],
    cause?: Error
  ) {
    super(message, RolloutErrorCode.CONFIG_ERROR, { issues }, cause);
    this.name = 'ConfigError';
  }

  /**
   * Build a ConfigError from a failed zod parse, one line per issue.
   */
  static fromZod(prefix: string, error: ZodError): ConfigError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : 'root',
      message: issue.message,
    }));
    const lines = issues.map((issue) => `${issue.path} ${issue.message}`);
    return new ConfigError(`${prefix}:\n${lines.join('\n')}`, issues);
  }
}

/**
 * Restart command failed on a host
 */
export class ExecutionError extends RolloutError {
  constructor(
    message: string,
    public readonly hostId: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, RolloutErrorCode.EXECUTION_ERROR, { hostId, exitCode }, cause);
    this.name = 'ExecutionError';
  }
}

/**
 * Health probe failed, reported unhealthy, or timed out
 */
export class HealthCheckError extends RolloutError {
  constructor(
    message: string,
    public readonly hostId: string,
    public readonly timedOut: boolean = false,
    cause?: Error
  ) {
    super(message, RolloutErrorCode.HEALTH_CHECK_ERROR, { hostId, timedOut }, cause);
    this.name = 'HealthCheckError';
  }
}

/**
 * Rollback attempt failed. Non-fatal.
 */
export class RollbackError extends RolloutError {
  constructor(message: string, public readonly hostId: string, cause?: Error) {
    super(message, RolloutErrorCode.ROLLBACK_ERROR, { hostId }, cause);
    this.name = 'RollbackError';
  }
}

/**
 * Host work stopped because the rollout was cancelled
 */
export class InterruptedError extends RolloutError {
  constructor(message: string, public readonly hostId: string, cause?: Error) {
    super(message, RolloutErrorCode.INTERRUPTED, { hostId }, cause);
    this.name = 'InterruptedError';
  }
}

export type PluginErrorKind = 'execution' | 'health' | 'rollback';

/**
 * Map an unknown value thrown by a plugin into the rollout taxonomy.
 *
 * @param error - Value thrown by RemoteExecutor or HealthChecker
 * @param hostId - Host the call was made for
 * @param kind - Which capability threw (selects the fallback type)
 */
export function toRolloutError(
  error: unknown,
  hostId: string,
  kind: PluginErrorKind
): RolloutError {
  if (error instanceof RolloutError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (cause?.name === 'AbortError') {
    return new InterruptedError(message || 'Operation aborted', hostId, cause);
  }

  switch (kind) {
    case 'execution':
      return new ExecutionError(message, hostId, undefined, cause);
    case 'health':
      return new HealthCheckError(
        message,
        hostId,
        cause?.name === 'TimeoutError' || /timed?\s*out/i.test(message),
        cause
      );
    case 'rollback':
      return new RollbackError(message, hostId, cause);
  }
}
