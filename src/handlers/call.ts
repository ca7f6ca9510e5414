/**
 * Service call command handler.
 * @module handlers/call
 */

import { errorMessage, HAClientError, wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputMessage } from '../output.js';
import type { CommandContext, HAState } from '../types.js';
import { isRecord, parseKeyValue } from '../utils.js';
import { openRest } from './connection.js';
import { splitServiceName } from './services.js';

export interface CallOptions {
  readonly entity?: string;
  readonly area?: string;
  readonly data?: string;
  readonly set?: readonly string[];
}

/**
 * Merge the call flags into service data. Later sources win:
 * `--entity`, then `--area`, then `--data`, then each `--set` in order.
 *
 * @example
 * ```typescript
 * buildServiceData({ entity: 'light.kitchen', set: ['brightness=128'] });
 * // { entity_id: 'light.kitchen', brightness: 128 }
 * ```
 */
export function buildServiceData(options: CallOptions): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  if (options.entity) data.entity_id = options.entity;
  if (options.area) data.area_id = options.area;

  if (options.data) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(options.data);
    } catch (err) {
      const reason = errorMessage(err);
      throw new HAClientError(`invalid JSON in --data: ${reason}`, undefined, { cause: err });
    }
    if (!isRecord(parsed)) {
      throw new HAClientError('invalid JSON in --data: expected an object');
    }
    Object.assign(data, parsed);
  }

  for (const pair of options.set ?? []) {
    const [key, value] = parseKeyValue(pair, '--set');
    data[key] = value;
  }
  return data;
}

/**
 * Call a service.
 *
 * @example
 * ```bash
 * hass-cli call light.turn_on -e light.living_room
 * hass-cli call light.turn_on -a kitchen --data '{"brightness": 128}'
 * hass-cli call climate.set_temperature -e climate.hall -s temperature=21
 * hass-cli call homeassistant.restart
 * ```
 */
export async function handleCall(ctx: CommandContext<CallOptions>): Promise<void> {
  const [fullName = ''] = ctx.args;
  const { domain, service } = splitServiceName(fullName);
  const client = await openRest(ctx.globals);
  const data = buildServiceData(ctx.options);

  outputInfo(`Calling ${domain}.${service}...`);
  let changed: HAState[];
  try {
    changed = await client.callService(domain, service, data);
  } catch (err) {
    throw wrapError('service call failed', err);
  }

  if (isJsonOutput()) {
    output({ success: true, changed_states: changed });
    return;
  }

  outputMessage(`Service ${domain}.${service} called successfully`);
  if (changed.length > 0) {
    outputMessage(`\nChanged states (${changed.length}):`);
    for (const state of changed) {
      outputMessage(`  ${state.entity_id}: ${state.state}`);
    }
  }
}
