/**
 * Automation command handlers.
 *
 * Stored configurations are keyed by config ID (a millisecond timestamp for
 * automations created here). Service calls need the entity ID, so commands
 * that call services resolve a config ID through the `id` attribute of the
 * `automation.*` states.
 *
 * @module handlers/automations
 */

import { HAClientError, wrapError } from '../errors.js';
import { output, outputInfo, outputList, outputMessage } from '../output.js';
import type { RestClient } from '../rest.js';
import type { AutomationConfig, CommandContext, HAState } from '../types.js';
import {
  compareStrings,
  configIdOf,
  formatTime,
  normalizeAutomationID,
  parseJsonArray,
  slugify,
} from '../utils.js';
import { openRest } from './connection.js';
import { showTraces, type DebugOptions } from './traces.js';

export interface AutomationCreateOptions {
  readonly description?: string;
  readonly mode?: string;
  readonly triggers?: string;
  readonly conditions?: string;
  readonly actions?: string;
}

export interface AutomationEditOptions extends AutomationCreateOptions {
  readonly alias?: string;
}

export interface AutomationInfo {
  readonly entity_id: string;
  readonly name: string;
  readonly state: string;
  readonly config_id?: string;
  readonly mode?: string;
  readonly last_triggered?: string;
  readonly current?: number;
}

const ENTITY_PREFIX = 'automation.';

/** Config IDs of automations created through the API are integers. */
const NUMERIC_ID = /^[+-]?\d+$/;

function stringAttribute(attributes: Record<string, unknown>, key: string): string {
  const value = attributes[key];
  return typeof value === 'string' ? value : '';
}

// =============================================================================
// Pure Helpers
// =============================================================================

/**
 * Pick the `automation.*` states and sort them by friendly name, ignoring
 * case.
 */
export function collectAutomations(states: readonly HAState[]): AutomationInfo[] {
  return states
    .filter((s) => s.entity_id.startsWith(ENTITY_PREFIX))
    .map((s) => {
      const configId = configIdOf(s.attributes);
      const mode = stringAttribute(s.attributes, 'mode');
      const lastTriggered = stringAttribute(s.attributes, 'last_triggered');
      const current = s.attributes.current;
      return {
        entity_id: s.entity_id,
        name: stringAttribute(s.attributes, 'friendly_name'),
        state: s.state,
        ...(configId ? { config_id: configId } : {}),
        ...(mode ? { mode } : {}),
        ...(lastTriggered ? { last_triggered: lastTriggered } : {}),
        ...(typeof current === 'number' && current !== 0 ? { current: Math.trunc(current) } : {}),
      };
    })
    .sort((a, b) => compareStrings(a.name.toLowerCase(), b.name.toLowerCase()));
}

/** `-` for a missing or `None` timestamp, the local time otherwise. */
export function formatLastTriggered(value: string | undefined): string {
  if (!value || value === 'None') return '-';
  return formatTime(value);
}

/**
 * Turn a user-supplied automation reference into an entity ID.
 *
 * - `automation.x` is already an entity ID.
 * - An all-digit ID is looked up as a config ID among the states.
 * - Anything else, including an unmatched config ID, becomes `automation.<id>`.
 */
export function resolveAutomationEntityID(id: string, states: readonly HAState[]): string {
  if (id.startsWith(ENTITY_PREFIX)) return id;
  if (NUMERIC_ID.test(id)) {
    const match = states.find(
      (s) => s.entity_id.startsWith(ENTITY_PREFIX) && configIdOf(s.attributes) === id
    );
    if (match) return match.entity_id;
  }
  return `${ENTITY_PREFIX}${id}`;
}

/**
 * Apply the edit flags that were given to a stored automation. An empty
 * `--alias` or JSON flag leaves the field unchanged.
 */
export function applyAutomationEdits(
  config: AutomationConfig,
  options: AutomationEditOptions
): AutomationConfig {
  return {
    ...config,
    ...(options.alias ? { alias: options.alias } : {}),
    ...(options.description !== undefined ? { description: options.description } : {}),
    ...(options.mode !== undefined ? { mode: options.mode } : {}),
    ...(options.triggers ? { triggers: parseJsonArray(options.triggers, 'triggers') } : {}),
    ...(options.conditions ? { conditions: parseJsonArray(options.conditions, 'conditions') } : {}),
    ...(options.actions ? { actions: parseJsonArray(options.actions, 'actions') } : {}),
  };
}

/**
 * Build the configuration of a new automation.
 */
export function buildAutomationConfig(
  id: string,
  name: string,
  options: AutomationCreateOptions
): AutomationConfig {
  return {
    id,
    alias: name,
    ...(options.description ? { description: options.description } : {}),
    mode: options.mode || 'single',
    triggers: options.triggers ? parseJsonArray(options.triggers, 'triggers') : [],
    conditions: options.conditions ? parseJsonArray(options.conditions, 'conditions') : [],
    actions: options.actions ? parseJsonArray(options.actions, 'actions') : [],
  };
}

// =============================================================================
// Client Helpers
// =============================================================================

async function fetchAutomationConfig(client: RestClient, id: string): Promise<AutomationConfig> {
  outputInfo('Fetching current automation configuration...');
  try {
    return await client.getAutomationConfig(id);
  } catch (err) {
    throw wrapError('failed to get automation', err);
  }
}

async function resolveEntityID(client: RestClient, id: string): Promise<string> {
  if (id.startsWith(ENTITY_PREFIX) || !NUMERIC_ID.test(id)) {
    return resolveAutomationEntityID(id, []);
  }
  let states: HAState[];
  try {
    states = await client.getStates();
  } catch (err) {
    throw wrapError('failed to get states', err);
  }
  return resolveAutomationEntityID(id, states);
}

type AutomationService = 'trigger' | 'turn_on' | 'turn_off';

const SERVICE_WORDING: Record<AutomationService, { progress: string; verb: string; done: string }> = {
  trigger: { progress: 'Triggering', verb: 'trigger', done: 'triggered' },
  turn_on: { progress: 'Enabling', verb: 'enable', done: 'enabled' },
  turn_off: { progress: 'Disabling', verb: 'disable', done: 'disabled' },
};

async function callAutomationService(ctx: CommandContext, service: AutomationService): Promise<void> {
  const [id = ''] = ctx.args;
  const { progress, verb, done } = SERVICE_WORDING[service];
  const client = await openRest(ctx.globals);
  const entityId = await resolveEntityID(client, id);

  outputInfo(`${progress} automation '${entityId}'...`);
  try {
    await client.callService('automation', service, { entity_id: entityId });
  } catch (err) {
    throw wrapError(`failed to ${verb} automation`, err);
  }
  outputMessage(`Automation ${done}: ${entityId}`);
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * List automations.
 *
 * @example
 * ```bash
 * hass-cli automations
 * hass-cli automations --json
 * ```
 */
export async function handleAutomations(ctx: CommandContext): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Fetching automations...');
  let states: HAState[];
  try {
    states = await client.getStates();
  } catch (err) {
    throw wrapError('failed to get states', err);
  }

  outputList(collectAutomations(states), {
    noun: 'automations',
    columns: [
      { header: 'CONFIG ID', value: (a) => a.config_id || '-' },
      { header: 'NAME', value: (a) => a.name, maxWidth: 35 },
      { header: 'STATE', value: (a) => a.state },
      { header: 'MODE', value: (a) => a.mode ?? '' },
      { header: 'LAST TRIGGERED', value: (a) => formatLastTriggered(a.last_triggered) },
    ],
  });
}

/**
 * Print an automation's stored configuration. Accepts a config ID or an
 * `automation.*` entity ID.
 *
 * @example
 * ```bash
 * hass-cli automations inspect 1767672291452
 * hass-cli automations inspect automation.motion_lights
 * ```
 */
export async function handleAutomationsInspect(ctx: CommandContext): Promise<void> {
  const [input = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  let configId = normalizeAutomationID(input);
  if (input.startsWith(ENTITY_PREFIX)) {
    outputInfo('Looking up automation config ID...');
    let state: HAState;
    try {
      state = await client.getState(input);
    } catch (err) {
      throw wrapError('failed to get automation state', err);
    }
    configId = configIdOf(state.attributes);
    if (!configId) {
      throw new HAClientError(`could not find config ID for ${input}`);
    }
  }

  outputInfo('Fetching automation configuration...');
  try {
    output(await client.getAutomationConfig(configId));
  } catch (err) {
    throw wrapError('failed to get automation', err);
  }
}

/**
 * Create an automation. Its config ID is the current time in milliseconds.
 *
 * @example
 * ```bash
 * hass-cli automations create "Sunset Lights" \
 *   --triggers '[{"trigger": "sun", "event": "sunset"}]' \
 *   --actions '[{"action": "light.turn_on", "target": {"entity_id": "light.porch"}}]'
 * ```
 */
export async function handleAutomationsCreate(
  ctx: CommandContext<AutomationCreateOptions>
): Promise<void> {
  const [name = ''] = ctx.args;
  const id = String(Date.now());
  const config = buildAutomationConfig(id, name, ctx.options);
  const client = await openRest(ctx.globals);

  outputInfo(`Creating automation '${name}'...`);
  try {
    await client.createAutomation(id, config);
  } catch (err) {
    throw wrapError('failed to create automation', err);
  }

  outputMessage(`Automation created: ${name}`);
  outputMessage(`Config ID: ${id}`);
  outputMessage(`Entity ID will be: automation.${slugify(name)}`);
  outputMessage(
    '\nNote: You may need to reload automations or restart Home Assistant for the new automation to appear.'
  );
}

/**
 * Change fields of an existing automation.
 *
 * @example
 * ```bash
 * hass-cli automations edit 1767672291452 --mode restart
 * ```
 */
export async function handleAutomationsEdit(
  ctx: CommandContext<AutomationEditOptions>
): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeAutomationID(input);
  const client = await openRest(ctx.globals);

  const config = applyAutomationEdits(await fetchAutomationConfig(client, id), ctx.options);

  outputInfo('Updating automation...');
  try {
    await client.updateAutomation(id, config);
  } catch (err) {
    throw wrapError('failed to update automation', err);
  }
  outputMessage(`Automation updated: ${config.alias}`);
}

/**
 * Change an automation's alias.
 *
 * @example
 * ```bash
 * hass-cli automations rename 1767672291452 "Porch Lights at Sunset"
 * ```
 */
export async function handleAutomationsRename(ctx: CommandContext): Promise<void> {
  const [input = '', newName = ''] = ctx.args;
  const id = normalizeAutomationID(input);
  const client = await openRest(ctx.globals);

  const config = await fetchAutomationConfig(client, id);

  outputInfo('Renaming automation...');
  try {
    await client.updateAutomation(id, { ...config, alias: newName });
  } catch (err) {
    throw wrapError('failed to rename automation', err);
  }
  outputMessage(`Automation renamed: '${config.alias}' -> '${newName}'`);
}

/**
 * Run an automation's actions now, skipping its triggers.
 *
 * @example
 * ```bash
 * hass-cli automations trigger automation.motion_lights
 * hass-cli automations trigger 1767672291452
 * ```
 */
export async function handleAutomationsTrigger(ctx: CommandContext): Promise<void> {
  await callAutomationService(ctx, 'trigger');
}

/**
 * Show execution traces of an automation.
 *
 * @example
 * ```bash
 * hass-cli automations debug 1767672291452
 * hass-cli automations debug 1767672291452 --run-id 1a2b3c4d
 * ```
 */
export async function handleAutomationsDebug(ctx: CommandContext<DebugOptions>): Promise<void> {
  const [input = ''] = ctx.args;
  await showTraces(ctx.globals, 'automation', normalizeAutomationID(input), ctx.options);
}

/**
 * Delete an automation.
 *
 * @example
 * ```bash
 * hass-cli automations delete 1767672291452
 * ```
 */
export async function handleAutomationsDelete(ctx: CommandContext): Promise<void> {
  const [input = ''] = ctx.args;
  const id = normalizeAutomationID(input);
  const client = await openRest(ctx.globals);

  outputInfo(`Deleting automation '${id}'...`);
  try {
    await client.deleteAutomation(id);
  } catch (err) {
    throw wrapError('failed to delete automation', err);
  }
  outputMessage(`Automation deleted: ${id}`);
  outputMessage(
    '\nNote: You may need to reload automations or restart Home Assistant for the change to take effect.'
  );
}

/**
 * Turn an automation on.
 *
 * @example
 * ```bash
 * hass-cli automations enable automation.motion_lights
 * ```
 */
export async function handleAutomationsEnable(ctx: CommandContext): Promise<void> {
  await callAutomationService(ctx, 'turn_on');
}

/**
 * Turn an automation off so its triggers are ignored.
 *
 * @example
 * ```bash
 * hass-cli automations disable 1767672291452
 * ```
 */
export async function handleAutomationsDisable(ctx: CommandContext): Promise<void> {
  await callAutomationService(ctx, 'turn_off');
}
