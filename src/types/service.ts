/**
 * Service definitions consumed by the command and HTTP adapters.
 *
 * @module types/service
 */

/**
 * How to restart, roll back and probe the service of one rollout group.
 */
export interface ServiceDefinition {
  /** Rollout group (first host tag) this definition applies to */
  group: string;
  /** Service name substituted for `{service}` */
  service: string;
  /** argv, with `{host}`, `{address}` and `{service}` placeholders */
  restartCommand: readonly string[];
  rollbackCommand?: readonly string[];
  /** Probe URL with the same placeholders; absent means no HTTP probe */
  healthUrl?: string;
  /** Status codes treated as healthy */
  expectedStatus: readonly number[];
  /** Per-command timeout override (ms) */
  commandTimeoutMs?: number;
}

/**
 * Connection descriptor produced by the rollout file loader.
 */
export interface HostConnection {
  address: string;
}
