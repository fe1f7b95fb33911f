/**
 * Rollout result assembly and presentation.
 *
 * @module rollout/result
 */

import type {
  AbortReason,
  BatchReport,
  HostStateSnapshot,
  RolloutCounts,
  RolloutResult,
} from '../types/rollout.js';
import { HostStage } from '../types/rollout.js';

export interface RolloutResultInput {
  rolloutId: string;
  startedAt: number;
  finishedAt: number;
  /** Monotonic elapsed time; falls back to finishedAt - startedAt */
  durationMs?: number;
  batches: BatchReport[];
  hosts: HostStateSnapshot[];
  skipped: string[];
  abortReason?: AbortReason;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Count hosts by outcome.
 */
export function countOutcomes(hosts: readonly HostStateSnapshot[], skipped: readonly string[]): RolloutCounts {
  const counts: RolloutCounts = {
    healthy: 0,
    failed: 0,
    rolledBack: 0,
    skipped: skipped.length,
    total: hosts.length,
  };

  for (const host of hosts) {
    if (host.stage === HostStage.HEALTHY) counts.healthy++;
    else if (host.stage === HostStage.FAILED) counts.failed++;
    else if (host.stage === HostStage.ROLLED_BACK) counts.rolledBack++;
  }

  return counts;
}

/**
 * Build the immutable RolloutResult.
 */
export function buildRolloutResult(input: RolloutResultInput): RolloutResult {
  const hosts: Record<string, HostStateSnapshot> = {};
  for (const snapshot of input.hosts) {
    hosts[snapshot.hostId] = snapshot;
  }

  const result: RolloutResult = {
    rolloutId: input.rolloutId,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    durationMs: Math.max(0, input.durationMs ?? input.finishedAt - input.startedAt),
    counts: countOutcomes(input.hosts, input.skipped),
    aborted: input.abortReason !== undefined,
    ...(input.abortReason && { abortReason: input.abortReason }),
    batches: input.batches,
    hosts,
    skipped: input.skipped,
  };

  return deepFreeze(result);
}

/**
 * A rollout succeeded when it ran to completion and every host is healthy.
 */
export function isRolloutSuccessful(result: RolloutResult): boolean {
  return !result.aborted && result.counts.failed === 0 && result.counts.rolledBack === 0;
}

/**
 * Human-readable multi-line summary (CLI output).
 */
export function formatRolloutSummary(result: RolloutResult): string {
  const { counts } = result;
  const lines: string[] = [];

  const status = result.aborted
    ? `ABORTED (${result.abortReason ?? 'unknown'})`
    : isRolloutSuccessful(result)
      ? 'SUCCEEDED'
      : 'COMPLETED WITH FAILURES';

  lines.push(`Rollout ${result.rolloutId}: ${status} in ${(result.durationMs / 1000).toFixed(1)}s`);
  lines.push(
    `  hosts: ${counts.total}  healthy: ${counts.healthy}  failed: ${counts.failed}  ` +
    `rolled back: ${counts.rolledBack}  skipped: ${counts.skipped}`
  );

  for (const batch of result.batches) {
    const rate = `${Math.round(batch.failureRate * 100)}%`;
    lines.push(`  batch ${batch.index + 1} [${batch.group}] ${batch.status}, failure rate ${rate}: ${batch.hostIds.join(', ')}`);
  }

  for (const host of Object.values(result.hosts)) {
    if (host.stage === HostStage.FAILED || host.stage === HostStage.ROLLED_BACK) {
      const reason = host.lastError ? ` - ${host.lastError.code}: ${host.lastError.message}` : '';
      lines.push(`  ${host.hostId}: ${host.stage} after ${host.attempt} retries${reason}`);
      if (host.rollbackError) {
        lines.push(`    rollback: ${host.rollbackError.message}`);
      }
    }
  }

  return lines.join('\n');
}
