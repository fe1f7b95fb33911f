/**
 * HTTP Health Checker
 *
 * Probes the `health_url` of a host's service group with a GET request.
 * Healthy iff the response status is one of the group's expected codes.
 * Groups without a health URL are reported healthy once restarted.
 */

import type { Logger } from 'pino';
import type { Host } from '../types/rollout.js';
import type { ServiceDefinition } from '../types/service.js';
import type { CapabilityCallOptions, HealthChecker } from '../rollout/capabilities.js';
import { HealthCheckError, InterruptedError } from '../rollout/errors.js';
import { renderTemplate, serviceFor, templateContext } from './template.js';

export interface HttpHealthCheckerConfig {
  /** Service definitions keyed by rollout group */
  services: ReadonlyMap<string, ServiceDefinition>;
  logger?: Logger;
}

export class HttpHealthChecker implements HealthChecker {
  private readonly services: ReadonlyMap<string, ServiceDefinition>;
  private readonly logger?: Logger;

  constructor(config: HttpHealthCheckerConfig) {
    this.services = config.services;
    this.logger = config.logger;
  }

  async check(host: Host, timeoutMs: number, options: CapabilityCallOptions): Promise<boolean> {
    const service = serviceFor(this.services, host);
    if (!service?.healthUrl) {
      this.logger?.debug({ hostId: host.id }, 'No health URL configured, treating host as healthy');
      return true;
    }

    const url = renderTemplate(service.healthUrl, templateContext(host, service));
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onKill = (): void => controller.abort();
    options.signal.addEventListener('abort', onKill, { once: true });

    try {
      const response = await fetch(url, { method: 'GET', signal: controller.signal });
      await response.body?.cancel();

      const healthy = service.expectedStatus.includes(response.status);
      this.logger?.debug({ hostId: host.id, url, status: response.status, healthy }, 'Health probe finished');
      return healthy;
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (timedOut) {
        throw new HealthCheckError(`Health probe ${url} timed out after ${timeoutMs}ms`, host.id, true, cause);
      }
      if (options.signal.aborted) {
        throw new InterruptedError(`Health probe ${url} was cancelled`, host.id, cause);
      }
      const message = cause?.message ?? String(error);
      throw new HealthCheckError(`Health probe ${url} failed: ${message}`, host.id, false, cause);
    } finally {
      clearTimeout(timer);
      options.signal.removeEventListener('abort', onKill);
    }
  }
}
