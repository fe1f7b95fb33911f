/**
 * Placeholder substitution shared by the command and HTTP adapters.
 */

import type { Host } from '../types/rollout.js';
import type { HostConnection, ServiceDefinition } from '../types/service.js';
import { primaryGroup } from '../rollout/batch-planner.js';

export interface TemplateContext {
  host: string;
  address: string;
  service: string;
}

function isHostConnection(value: unknown): value is HostConnection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'address' in value &&
    typeof value.address === 'string'
  );
}

/**
 * Network address of a host: its connection address, else its id.
 */
export function resolveAddress(host: Host): string {
  return isHostConnection(host.connection) ? host.connection.address : host.id;
}

export function templateContext(host: Host, service: ServiceDefinition): TemplateContext {
  return {
    host: host.id,
    address: resolveAddress(host),
    service: service.service,
  };
}

/**
 * Replace `{host}`, `{address}` and `{service}`. Unknown placeholders are kept.
 */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(/\{(host|address|service)\}/g, (_, key: keyof TemplateContext) => context[key]);
}

/**
 * Look up the service definition for a host's rollout group.
 */
export function serviceFor(
  services: ReadonlyMap<string, ServiceDefinition>,
  host: Host
): ServiceDefinition | undefined {
  return services.get(primaryGroup(host));
}
