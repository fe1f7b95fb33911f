/**
 * Batch Planner
 *
 * Divides a host set into ordered batches. Hosts are partitioned by their
 * rollout group (first tag), input order is kept within a group, and each
 * group is chunked into batches of at most `batchSize` so that a whole group
 * is validated before the rollout crosses into the next one.
 *
 * Pure function of its inputs.
 *
 * @module rollout/batch-planner
 */

import type { Batch, Host, RolloutPolicy } from '../types/rollout.js';
import { ConfigError } from './errors.js';

/** Group assigned to hosts that carry no tags. */
export const UNGROUPED = 'ungrouped';

/**
 * Rollout group of a host (its first tag).
 */
export function primaryGroup(host: Host): string {
  return host.groups[0] ?? UNGROUPED;
}

/**
 * Partition hosts by rollout group. Groups keep first-appearance order.
 */
export function groupHosts(hosts: readonly Host[]): Map<string, Host[]> {
  const groups = new Map<string, Host[]>();
  for (const host of hosts) {
    const group = primaryGroup(host);
    const members = groups.get(group);
    if (members) {
      members.push(host);
    } else {
      groups.set(group, [host]);
    }
  }
  return groups;
}

/**
 * Plan the batches for a rollout.
 *
 * @throws ConfigError when `batchSize` < 1, hosts is empty, or host ids repeat
 */
export function planBatches(
  hosts: readonly Host[],
  policy: Pick<RolloutPolicy, 'batchSize'>
): Batch[] {
  if (!Number.isInteger(policy.batchSize) || policy.batchSize < 1) {
    throw new ConfigError(`batchSize must be an integer >= 1 (got ${policy.batchSize})`, [
      { path: 'batchSize', message: 'must be an integer >= 1' },
    ]);
  }

  if (hosts.length === 0) {
    throw new ConfigError('Host set is empty', [{ path: 'hosts', message: 'must not be empty' }]);
  }

  const seen = new Set<string>();
  for (const host of hosts) {
    if (seen.has(host.id)) {
      throw new ConfigError(`Duplicate host id: ${host.id}`, [
        { path: 'hosts', message: `duplicate host id ${host.id}` },
      ]);
    }
    seen.add(host.id);
  }

  const batches: Batch[] = [];
  for (const [group, members] of groupHosts(hosts)) {
    for (let offset = 0; offset < members.length; offset += policy.batchSize) {
      batches.push(
        Object.freeze({
          index: batches.length,
          group,
          hosts: Object.freeze(members.slice(offset, offset + policy.batchSize)),
        })
      );
    }
  }

  return batches;
}

/**
 * Object facade over planBatches, injectable into the RolloutController.
 */
export class BatchPlanner {
  plan(hosts: readonly Host[], policy: Pick<RolloutPolicy, 'batchSize'>): Batch[] {
    return planBatches(hosts, policy);
  }
}
