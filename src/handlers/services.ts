/**
 * Service catalogue command handlers.
 * @module handlers/services
 */

import { HAClientError, wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputList, outputMessage } from '../output.js';
import type { CommandContext, ServiceField, ServiceMap, ServiceTarget } from '../types.js';
import { compareStrings, formatValue } from '../utils.js';
import { openRest } from './connection.js';

export interface ServiceListOptions {
  readonly domain?: string;
}

export interface ServiceListItem {
  readonly domain: string;
  readonly service: string;
  readonly name: string;
  readonly description: string;
}

export interface ServiceDetail extends ServiceListItem {
  readonly fields: Record<string, ServiceField>;
  readonly target: ServiceTarget | null;
}

/**
 * Split `domain.service` at the first dot.
 *
 * @throws {HAClientError} When there is no dot
 */
export function splitServiceName(fullName: string): { domain: string; service: string } {
  const index = fullName.indexOf('.');
  if (index === -1) {
    throw new HAClientError(`invalid service format: ${fullName} (expected domain.service)`);
  }
  return { domain: fullName.slice(0, index), service: fullName.slice(index + 1) };
}

/**
 * Flatten the service map into one row per service, sorted by domain and
 * then service. `domain` filters case-insensitively.
 */
export function flattenServices(services: ServiceMap, domain?: string): ServiceListItem[] {
  const wanted = domain?.toLowerCase();
  const items: ServiceListItem[] = [];
  for (const [domainName, byName] of Object.entries(services)) {
    if (wanted && domainName.toLowerCase() !== wanted) continue;
    for (const [service, info] of Object.entries(byName)) {
      items.push({
        domain: domainName,
        service,
        name: info.name ?? '',
        description: info.description ?? '',
      });
    }
  }
  return items.sort(
    (a, b) => compareStrings(a.domain, b.domain) || compareStrings(a.service, b.service)
  );
}

/**
 * Look up one service.
 *
 * @throws {HAClientError} When the domain or service does not exist
 */
export function findService(services: ServiceMap, domain: string, service: string): ServiceDetail {
  const byName = services[domain];
  if (!byName) {
    throw new HAClientError(`domain not found: ${domain}`);
  }
  const info = byName[service];
  if (!info) {
    throw new HAClientError(`service not found: ${domain}.${service}`);
  }
  return {
    domain,
    service,
    name: info.name ?? '',
    description: info.description ?? '',
    fields: info.fields ?? {},
    target: info.target ?? null,
  };
}

/**
 * Human-readable description of a service: header, target kinds and fields.
 */
export function describeService(detail: ServiceDetail): string[] {
  const lines = [
    `Service:       ${detail.domain}.${detail.service}`,
    `Name:          ${detail.name}`,
    `Description:   ${detail.description}`,
  ];

  const { target } = detail;
  if (target) {
    lines.push('\nTarget:');
    if (target.entity?.length) lines.push('  - Entities');
    if (target.device?.length) lines.push('  - Devices');
    if (target.area?.length) lines.push('  - Areas');
  }

  const fields = Object.entries(detail.fields).sort(([a], [b]) => compareStrings(a, b));
  if (fields.length > 0) {
    lines.push('\nFields:');
    for (const [name, field] of fields) {
      lines.push(`  ${name}${field.required ? ' (required)' : ''}`);
      if (field.description) lines.push(`    ${field.description}`);
      if (field.example !== undefined && field.example !== null) {
        lines.push(`    Example: ${formatValue(field.example)}`);
      }
    }
  }
  return lines;
}

/**
 * List available services.
 *
 * @example
 * ```bash
 * hass-cli services
 * hass-cli services -d light
 * ```
 */
export async function handleServices(ctx: CommandContext<ServiceListOptions>): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Fetching services...');
  let services: ServiceMap;
  try {
    services = await client.getServices();
  } catch (err) {
    throw wrapError('failed to get services', err);
  }

  outputList(flattenServices(services, ctx.options.domain), {
    noun: 'services',
    columns: [
      { header: 'SERVICE', value: (s) => `${s.domain}.${s.service}` },
      { header: 'NAME', value: (s) => s.name, maxWidth: 25 },
      { header: 'DESCRIPTION', value: (s) => s.description, maxWidth: 50 },
    ],
  });
}

/**
 * Show a service's description, targets and fields.
 *
 * @example
 * ```bash
 * hass-cli services inspect light.turn_on
 * ```
 */
export async function handleServicesInspect(ctx: CommandContext): Promise<void> {
  const [fullName = ''] = ctx.args;
  const { domain, service } = splitServiceName(fullName);
  const client = await openRest(ctx.globals);

  outputInfo('Fetching service details...');
  let services: ServiceMap;
  try {
    services = await client.getServices();
  } catch (err) {
    throw wrapError('failed to get services', err);
  }

  const detail = findService(services, domain, service);
  if (isJsonOutput()) {
    output(detail);
    return;
  }
  for (const line of describeService(detail)) {
    outputMessage(line);
  }
}
