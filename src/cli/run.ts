/**
 * fleet-restart command implementation
 *
 * Usage:
 *   fleet-restart [--file <path>] [--env <name>] [--json] [--dry-run]
 */

import type { Logger } from 'pino';
import { loadRolloutPlan, type RolloutPlan } from '../config/loader.js';
import { CommandRemoteExecutor } from '../adapters/command-executor.js';
import { HttpHealthChecker } from '../adapters/http-health-checker.js';
import { planBatches } from '../rollout/batch-planner.js';
import { ConfigError } from '../rollout/errors.js';
import { RolloutController } from '../rollout/rollout-controller.js';
import { formatRolloutSummary, isRolloutSuccessful } from '../rollout/result.js';
import { createLogger } from '../utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_ROLLOUT_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface CLIArgs {
  _: string[];
  file?: string;
  env?: string;
  json?: boolean;
  'dry-run'?: boolean;
  help?: boolean;
}

const FLAG_OPTIONS = new Set(['json', 'dry-run', 'help']);
const VALUE_OPTIONS = new Set(['file', 'env']);

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const key = arg.slice(2);
    if (FLAG_OPTIONS.has(key)) {
      if (key === 'json') result.json = true;
      else if (key === 'dry-run') result['dry-run'] = true;
      else result.help = true;
      continue;
    }

    if (VALUE_OPTIONS.has(key)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Option --${key} requires a value`, [{ path: key, message: 'requires a value' }]);
      }
      if (key === 'file') result.file = value;
      else result.env = value;
      i++;
      continue;
    }

    throw new ConfigError(`Unknown option: ${arg}`, [{ path: key, message: 'unknown option' }]);
  }

  return result;
}

export const HELP_TEXT = `
fleet-restart - Restart services across a fleet in health-gated batches

USAGE:
  fleet-restart [options]

OPTIONS:
  --file <path>                         Rollout file (default: config/rollout.yaml)
  --env <name>                          production | development | test (default: NODE_ENV)
  --json                                Print the rollout result as JSON
  --dry-run                             Print the batch plan without touching hosts
  --help                                Show this help message

EXIT CODES:
  0  every host restarted and healthy
  1  rollout finished with failures or was aborted
  2  configuration error

ENVIRONMENT VARIABLES:
  FLEET_RESTART_LOG_LEVEL               trace | debug | info | warn | error | silent
`;

/**
 * Hooks that tests replace; defaults talk to the real process.
 */
export interface CliEnvironment {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
  /** Builds the controller for a loaded plan */
  createController?: (plan: RolloutPlan, logger: Logger) => RolloutController;
  /** Registers a cancellation hook (SIGINT/SIGTERM); returns an unregister function */
  onInterrupt?: (handler: () => void) => () => void;
}

function defaultController(plan: RolloutPlan, logger: Logger): RolloutController {
  return new RolloutController({
    remoteExecutor: new CommandRemoteExecutor({
      services: plan.services,
      maxConnections: plan.maxConnections,
      logger: logger.child({ component: 'command-executor' }),
    }),
    healthChecker: new HttpHealthChecker({
      services: plan.services,
      logger: logger.child({ component: 'http-health-checker' }),
    }),
    logger: logger.child({ component: 'rollout-controller' }),
  });
}

function processInterrupts(handler: () => void): () => void {
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
  return () => {
    process.removeListener('SIGINT', handler);
    process.removeListener('SIGTERM', handler);
  };
}

function formatPlan(plan: RolloutPlan): string {
  const batches = planBatches(plan.hosts, plan.policy);
  const lines = [`Rollout plan: ${plan.hosts.length} hosts in ${batches.length} batches`];
  for (const batch of batches) {
    lines.push(`  batch ${batch.index + 1} [${batch.group}]: ${batch.hosts.map((host) => host.id).join(', ')}`);
  }
  return lines.join('\n');
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], env: CliEnvironment): Promise<number> {
  let args: CLIArgs;
  let plan: RolloutPlan;

  try {
    args = parseArgs(argv);
    if (args.help) {
      env.stdout(HELP_TEXT);
      return EXIT_SUCCESS;
    }
    plan = loadRolloutPlan(args.file, args.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      env.stderr(`Error: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  if (args['dry-run']) {
    try {
      env.stdout(formatPlan(plan));
    } catch (error) {
      if (error instanceof ConfigError) {
        env.stderr(`Error: ${error.message}`);
        return EXIT_CONFIG_ERROR;
      }
      throw error;
    }
    return EXIT_SUCCESS;
  }

  const logger = env.logger ?? createLogger({ component: 'fleet-restart' });
  const controller = (env.createController ?? defaultController)(plan, logger);
  const unregister = (env.onInterrupt ?? processInterrupts)(() => {
    controller.cancel('interrupted by signal');
  });

  try {
    const result = await controller.run(plan.hosts, plan.policy);
    env.stdout(args.json ? JSON.stringify(result, null, 2) : formatRolloutSummary(result));
    return isRolloutSuccessful(result) ? EXIT_SUCCESS : EXIT_ROLLOUT_FAILED;
  } catch (error) {
    if (error instanceof ConfigError) {
      env.stderr(`Error: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  } finally {
    unregister();
  }
}
