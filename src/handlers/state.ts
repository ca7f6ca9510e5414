/**
 * Entity state command handlers.
 * @module handlers/state
 */

import { wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputMessage } from '../output.js';
import type { CommandContext, HAState } from '../types.js';
import { compareStrings, formatTime, formatValue, parseKeyValue } from '../utils.js';
import { openRest } from './connection.js';

export interface StateSetOptions {
  readonly attr?: readonly string[];
}

/**
 * Aligned, human-readable view of a state. Attributes are listed by key.
 */
export function describeState(state: HAState): string[] {
  const lines = [
    `Entity:        ${state.entity_id}`,
    `State:         ${state.state}`,
    `Last Changed:  ${formatTime(state.last_changed ?? '')}`,
    `Last Updated:  ${formatTime(state.last_updated ?? '')}`,
  ];
  const attributes = Object.entries(state.attributes).sort(([a], [b]) => compareStrings(a, b));
  if (attributes.length > 0) {
    lines.push('\nAttributes:');
    for (const [key, value] of attributes) {
      lines.push(`  ${key}: ${formatValue(value)}`);
    }
  }
  return lines;
}

/**
 * Collect `--attr key=value` flags. Returns undefined when none were given,
 * so the server keeps the existing attributes.
 */
export function parseAttributes(pairs: readonly string[] | undefined): Record<string, unknown> | undefined {
  if (!pairs || pairs.length === 0) return undefined;
  return Object.fromEntries(pairs.map((pair) => parseKeyValue(pair)));
}

/**
 * Show the current state of an entity.
 *
 * @example
 * ```bash
 * hass-cli state get light.kitchen
 * hass-cli state get sensor.outdoor_temperature --json
 * ```
 */
export async function handleStateGet(ctx: CommandContext): Promise<void> {
  const [entityId = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  outputInfo(`Fetching state for ${entityId}...`);
  let state: HAState;
  try {
    state = await client.getState(entityId);
  } catch (err) {
    throw wrapError('failed to get state', err);
  }

  if (isJsonOutput()) {
    output(state);
    return;
  }
  for (const line of describeState(state)) {
    outputMessage(line);
  }
}

/**
 * Overwrite an entity's state in Home Assistant. The device itself is not
 * touched; use `call` for that.
 *
 * @example
 * ```bash
 * hass-cli state set input_boolean.guest_mode on
 * hass-cli state set sensor.test 42 --attr unit_of_measurement=°C --attr friendly_name="Test"
 * ```
 */
export async function handleStateSet(ctx: CommandContext<StateSetOptions>): Promise<void> {
  const [entityId = '', newState = ''] = ctx.args;
  const attributes = parseAttributes(ctx.options.attr);
  const client = await openRest(ctx.globals);

  outputInfo(`Setting state for ${entityId} to ${newState}...`);
  let state: HAState;
  try {
    state = await client.setState(entityId, newState, attributes);
  } catch (err) {
    throw wrapError('failed to set state', err);
  }

  if (isJsonOutput()) {
    output(state);
    return;
  }
  outputMessage('State set successfully');
  outputMessage(`Entity:        ${state.entity_id}`);
  outputMessage(`State:         ${state.state}`);
}
