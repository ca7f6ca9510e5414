/**
 * Script command handlers.
 *
 * Script IDs may be given with or without the `script.` prefix.
 *
 * @module handlers/scripts
 */

import { wrapError } from '../errors.js';
import { output, outputInfo, outputList, outputMessage } from '../output.js';
import type { RestClient } from '../rest.js';
import type { CommandContext, HAState, ScriptConfig } from '../types.js';
import { compareStrings, formatTime, normalizeScriptID, parseJsonArray, parseJsonObject, slugify } from '../utils.js';
import { openRest } from './connection.js';
import { showTraces, type DebugOptions } from './traces.js';

export interface ScriptCreateOptions {
  readonly description?: string;
  readonly icon?: string;
  readonly mode?: string;
  readonly sequence?: string;
}

export interface ScriptEditOptions extends ScriptCreateOptions {
  readonly alias?: string;
}

export interface ScriptRunOptions {
  readonly data?: string;
}

export interface ScriptInfo {
  readonly entity_id: string;
  readonly name: string;
  readonly state: string;
  readonly icon?: string;
  readonly mode?: string;
  readonly description?: string;
  readonly last_triggered?: string;
}

function stringAttribute(attributes: Record<string, unknown>, key: string): string {
  const value = attributes[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Pick the `script.*` states and sort them by friendly name, ignoring case.
 */
export function collectScripts(states: readonly HAState[]): ScriptInfo[] {
  return states
    .filter((s) => s.entity_id.startsWith('script.'))
    .map((s) => {
      const info: Record<string, string> = {};
      for (const key of ['icon', 'mode', 'description', 'last_triggered']) {
        const value = stringAttribute(s.attributes, key);
        if (value) info[key] = value;
      }
      return {
        entity_id: s.entity_id,
        name: stringAttribute(s.attributes, 'friendly_name'),
        state: s.state,
        ...info,
      };
    })
    .sort((a, b) => compareStrings(a.name.toLowerCase(), b.name.toLowerCase()));
}

/**
 * Apply the edit flags that were given to a stored script configuration.
 * An empty `--alias` or `--sequence` leaves the field unchanged.
 */
export function applyScriptEdits(config: ScriptConfig, options: ScriptEditOptions): ScriptConfig {
  return {
    ...config,
    ...(options.alias ? { alias: options.alias } : {}),
    ...(options.description !== undefined ? { description: options.description } : {}),
    ...(options.icon !== undefined ? { icon: options.icon } : {}),
    ...(options.mode !== undefined ? { mode: options.mode } : {}),
    ...(options.sequence ? { sequence: parseJsonArray(options.sequence, 'sequence') } : {}),
  };
}

async function fetchScriptConfig(client: RestClient, id: string): Promise<ScriptConfig> {
  outputInfo('Fetching current script configuration...');
  try {
    return await client.getScriptConfig(id);
  } catch (err) {
    throw wrapError('failed to get script', err);
  }
}

/**
 * List scripts.
 *
 * @example
 * ```bash
 * hass-cli scripts
 * hass-cli scripts --json
 * ```
 */
export async function handleScripts(ctx: CommandContext): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Fetching scripts...');
  let states: HAState[];
  try {
    states = await client.getStates();
  } catch (err) {
    throw wrapError('failed to get states', err);
  }

  outputList(collectScripts(states), {
    noun: 'scripts',
    columns: [
      { header: 'ENTITY ID', value: (s) => s.entity_id },
      { header: 'NAME', value: (s) => s.name, maxWidth: 30 },
      { header: 'STATE', value: (s) => s.state },
      { header: 'MODE', value: (s) => s.mode ?? '' },
      {
        header: 'LAST TRIGGERED',
        value: (s) => (s.last_triggered ? formatTime(s.last_triggered) : '-'),
      },
    ],
  });
}

/**
 * Print a script's stored configuration, falling back to its state for a
 * `script.*` entity ID with no stored configuration.
 *
 * @example
 * ```bash
 * hass-cli scripts inspect morning_routine
 * hass-cli scripts inspect script.morning_routine
 * ```
 */
export async function handleScriptsInspect(ctx: CommandContext): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeScriptID(input);
  const client = await openRest(ctx.globals);

  outputInfo('Fetching script configuration...');
  let config: ScriptConfig;
  try {
    config = await client.getScriptConfig(id);
  } catch (err) {
    if (input.startsWith('script.')) {
      const state = await client.getState(input).catch(() => undefined);
      if (state) {
        output(state);
        return;
      }
    }
    throw wrapError('failed to get script', err);
  }
  output(config);
}

/**
 * Create a script. Its ID is the slug of the name.
 *
 * @example
 * ```bash
 * hass-cli scripts create "Morning Routine" --sequence '[{"action": "light.turn_on", "target": {"entity_id": "light.bedroom"}}]'
 * ```
 */
export async function handleScriptsCreate(ctx: CommandContext<ScriptCreateOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  const { description, icon, mode, sequence } = ctx.options;
  const client = await openRest(ctx.globals);

  const config: ScriptConfig = {
    alias: name,
    ...(description ? { description } : {}),
    ...(icon ? { icon } : {}),
    mode: mode || 'single',
    sequence: sequence ? parseJsonArray(sequence, 'sequence') : [],
  };
  const id = slugify(name);

  outputInfo(`Creating script '${name}'...`);
  try {
    await client.createScript(id, config);
  } catch (err) {
    throw wrapError('failed to create script', err);
  }

  outputMessage(`Script created: ${name}`);
  outputMessage(`Entity ID: script.${id}`);
  outputMessage(
    '\nNote: You may need to reload scripts or restart Home Assistant for the new script to appear.'
  );
}

/**
 * Change fields of an existing script.
 *
 * @example
 * ```bash
 * hass-cli scripts edit morning_routine --mode restart
 * ```
 */
export async function handleScriptsEdit(ctx: CommandContext<ScriptEditOptions>): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeScriptID(input);
  const client = await openRest(ctx.globals);

  const config = applyScriptEdits(await fetchScriptConfig(client, id), ctx.options);

  outputInfo('Updating script...');
  try {
    await client.updateScript(id, config);
  } catch (err) {
    throw wrapError('failed to update script', err);
  }
  outputMessage(`Script updated: ${config.alias}`);
}

/**
 * Change a script's alias. The entity ID stays the same.
 *
 * @example
 * ```bash
 * hass-cli scripts rename morning_routine "Wake Up"
 * ```
 */
export async function handleScriptsRename(ctx: CommandContext): Promise<void> {
  const [input = '', newName = ''] = ctx.args;
  const id = normalizeScriptID(input);
  const client = await openRest(ctx.globals);

  const config = await fetchScriptConfig(client, id);

  outputInfo('Renaming script...');
  try {
    await client.updateScript(id, { ...config, alias: newName });
  } catch (err) {
    throw wrapError('failed to rename script', err);
  }
  outputMessage(`Script renamed: '${config.alias}' -> '${newName}'`);
}

/**
 * Run a script, optionally passing variables.
 *
 * @example
 * ```bash
 * hass-cli scripts run morning_routine
 * hass-cli scripts run notify_all --data '{"message": "Hello"}'
 * ```
 */
export async function handleScriptsRun(ctx: CommandContext<ScriptRunOptions>): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeScriptID(input);
  const data = ctx.options.data ? parseJsonObject(ctx.options.data, 'data') : {};
  const client = await openRest(ctx.globals);

  outputInfo(`Triggering script '${id}'...`);
  try {
    await client.callService('script', id, data);
  } catch (err) {
    throw wrapError('failed to trigger script', err);
  }
  outputMessage(`Script triggered: script.${id}`);
}

/**
 * Show execution traces of a script.
 *
 * @example
 * ```bash
 * hass-cli scripts debug morning_routine
 * hass-cli scripts debug morning_routine --run-id 1a2b3c4d
 * ```
 */
export async function handleScriptsDebug(ctx: CommandContext<DebugOptions>): Promise<void> {
  const [input = ''] = ctx.args;
  await showTraces(ctx.globals, 'script', normalizeScriptID(input), ctx.options);
}

/**
 * Delete a script.
 *
 * @example
 * ```bash
 * hass-cli scripts delete morning_routine
 * ```
 */
export async function handleScriptsDelete(ctx: CommandContext): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeScriptID(input);
  const client = await openRest(ctx.globals);

  outputInfo(`Deleting script '${id}'...`);
  try {
    await client.deleteScript(id);
  } catch (err) {
    throw wrapError('failed to delete script', err);
  }
  outputMessage(`Script deleted: ${id}`);
  outputMessage(
    '\nNote: You may need to reload scripts or restart Home Assistant for the change to take effect.'
  );
}
