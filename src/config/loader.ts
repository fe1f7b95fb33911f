/**
 * Rollout File Loader
 *
 * Loads a rollout file (policy, services, hosts) from YAML, applies the
 * environment-specific overrides, validates it and converts it into the
 * in-code model.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { Host, RolloutPolicy } from '../types/rollout.js';
import type { HostConnection, ServiceDefinition } from '../types/service.js';
import { RolloutFileSchema, type RolloutFile } from '../types/schemas/rollout.js';
import { ConfigError } from '../rollout/errors.js';
import { DEFAULT_ROLLOUT_FILE, HTTP_HEALTH_CHECK } from './defaults.js';
import { policyFromSection, resolvePolicy } from './policy.js';

export type Environment = 'production' | 'development' | 'test';

const ENVIRONMENTS: readonly Environment[] = ['production', 'development', 'test'];

/**
 * Everything a rollout needs, resolved from a rollout file.
 */
export interface RolloutPlan {
  policy: RolloutPolicy;
  hosts: Host[];
  services: Map<string, ServiceDefinition>;
  maxConnections?: number;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars in `source` replace `target`.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultRolloutFilePath(): string {
  return join(findPackageRoot(), DEFAULT_ROLLOUT_FILE);
}

function resolveEnvironment(environment?: string): Environment {
  const env = environment ?? process.env.NODE_ENV ?? 'development';
  return ENVIRONMENTS.find((candidate) => candidate === env) ?? 'development';
}

/**
 * Parse rollout file contents: apply the environment overrides and validate.
 *
 * @throws ConfigError on YAML syntax errors or schema violations
 */
export function parseRolloutFile(contents: string, environment?: string, source = 'rollout file'): RolloutFile {
  let document: unknown;
  try {
    document = yaml.load(contents);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      [],
      error instanceof Error ? error : undefined
    );
  }

  if (!isPlainObject(document)) {
    throw new ConfigError(`${source} must contain a YAML mapping`, [{ path: 'root', message: 'must be a mapping' }]);
  }

  const { environments, ...base } = document;
  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const override = environments[resolveEnvironment(environment)];
    if (isPlainObject(override)) {
      merged = deepMerge(base, override);
    }
  }

  const parsed = RolloutFileSchema.safeParse(merged);
  if (!parsed.success) {
    throw ConfigError.fromZod(`Configuration validation failed for ${source}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Load a rollout file from disk.
 *
 * @param filePath - Defaults to config/rollout.yaml in the package root
 * @param environment - Defaults to NODE_ENV, then 'development'
 */
export function loadRolloutFile(filePath?: string, environment?: string): RolloutFile {
  const finalPath = filePath ?? defaultRolloutFilePath();

  let contents: string;
  try {
    contents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (cause && 'code' in cause && cause.code === 'ENOENT') {
      throw new ConfigError(`Rollout file not found: ${finalPath}`, [{ path: 'file', message: 'not found' }], cause);
    }
    throw new ConfigError(`Failed to read rollout file ${finalPath}: ${String(error)}`, [], cause);
  }

  return parseRolloutFile(contents, environment, finalPath);
}

/**
 * Convert a validated rollout file into policy, hosts and service definitions.
 */
export function toRolloutPlan(file: RolloutFile): RolloutPlan {
  const services = new Map<string, ServiceDefinition>();
  for (const [group, section] of Object.entries(file.services)) {
    services.set(group, {
      group,
      service: section.service ?? group,
      restartCommand: section.restart_command,
      ...(section.rollback_command && { rollbackCommand: section.rollback_command }),
      ...(section.health_url && { healthUrl: section.health_url }),
      expectedStatus: section.expected_status ?? HTTP_HEALTH_CHECK.DEFAULT_EXPECTED_STATUS,
      ...(section.command_timeout_ms !== undefined && { commandTimeoutMs: section.command_timeout_ms }),
    });
  }

  const hosts: Host[] = file.hosts.map((entry) => {
    const connection: HostConnection = { address: entry.address ?? entry.id };
    return Object.freeze({ id: entry.id, groups: Object.freeze([...entry.groups]), connection });
  });

  return {
    policy: resolvePolicy(policyFromSection(file.policy)),
    hosts,
    services,
    ...(file.executor.max_connections !== undefined && { maxConnections: file.executor.max_connections }),
  };
}

/**
 * Load and convert a rollout file in one step.
 */
export function loadRolloutPlan(filePath?: string, environment?: string): RolloutPlan {
  return toRolloutPlan(loadRolloutFile(filePath, environment));
}
