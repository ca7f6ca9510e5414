/**
 * Helper (`input_*` entity) command handlers.
 *
 * Creation and deletion go through the WebSocket collection commands
 * (`input_select/create`, `input_number/delete` ...). Renaming and
 * enabling or disabling go through the entity registry.
 *
 * @module handlers/helpers
 */

import { HAClientError, wrapError } from '../errors.js';
import { output, outputInfo, outputList, outputMessage } from '../output.js';
import type { CommandContext, EntityEntry, HAState, HelperResult } from '../types.js';
import { compareStrings, parseHelperID, parseJsonArg } from '../utils.js';
import { openRest, withWebSocket } from './connection.js';

export interface IconOptions {
  readonly icon?: string;
}

export interface SelectOptions extends IconOptions {
  readonly options?: string;
}

export interface NumberOptions extends IconOptions {
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly mode: string;
  readonly initial?: number;
}

export interface TextOptions extends IconOptions {
  readonly min: number;
  readonly max: number;
  readonly mode: string;
  readonly pattern?: string;
}

export interface RenameOptions {
  readonly name?: string;
  readonly newId?: string;
}

export interface HelperInfo {
  readonly entity_id: string;
  readonly name: string;
  readonly state: string;
  readonly type: string;
  readonly options?: readonly string[];
  readonly friendly_name?: string;
}

// =============================================================================
// Pure Helpers
// =============================================================================

/**
 * Pick the `input_*` states, sorted by entity ID. Selects carry their options.
 */
export function collectHelpers(states: readonly HAState[]): HelperInfo[] {
  return states
    .filter((s) => s.entity_id.startsWith('input_'))
    .map((s) => {
      const [type = ''] = s.entity_id.split('.');
      const friendly = s.attributes.friendly_name;
      const name = friendly === undefined || friendly === null ? '' : String(friendly);
      const options = s.attributes.options;
      return {
        entity_id: s.entity_id,
        name,
        state: s.state,
        type,
        ...(type === 'input_select' && Array.isArray(options) && options.length > 0
          ? { options: options.map((o) => String(o)) }
          : {}),
        ...(name ? { friendly_name: name } : {}),
      };
    })
    .sort((a, b) => compareStrings(a.entity_id, b.entity_id));
}

/**
 * Parse `--options` as a non-empty JSON array of strings.
 *
 * @throws {HAClientError} On invalid JSON, a non-string option or an empty list
 */
export function parseSelectOptions(text: string | undefined): string[] {
  const value = parseJsonArg(text ?? '', 'options');
  if (!Array.isArray(value) || !value.every((o): o is string => typeof o === 'string')) {
    throw new HAClientError('invalid options JSON: expected an array of strings');
  }
  if (value.length === 0) {
    throw new HAClientError('at least one option is required');
  }
  return value;
}

/**
 * Validate `helpers rename` flags and build the registry update.
 *
 * @throws {HAClientError} When neither flag is given, or the new ID is not a
 * helper in the same domain
 */
export function buildRenameUpdates(helperId: string, options: RenameOptions): Record<string, unknown> {
  if (!options.name && !options.newId) {
    throw new HAClientError('must provide --name or --new-id');
  }
  const { domain } = parseHelperID(helperId);

  if (options.newId) {
    let newDomain: string;
    try {
      newDomain = parseHelperID(options.newId).domain;
    } catch (err) {
      throw wrapError('invalid new entity ID', err);
    }
    if (newDomain !== domain) {
      throw new HAClientError(`new entity ID must use the same domain (${domain})`);
    }
  }

  return {
    ...(options.name ? { name: options.name } : {}),
    ...(options.newId ? { new_entity_id: options.newId } : {}),
  };
}

function printCreated(domain: string, label: string, helper: HelperResult, details: string[] = []): void {
  outputMessage(`${label} created: ${helper.name}`);
  outputMessage(`Entity ID: ${domain}.${helper.id}`);
  for (const line of details) outputMessage(line);
  outputMessage(
    `\nNote: You may need to reload ${domain} or restart Home Assistant for the new helper to appear.`
  );
}

// =============================================================================
// Listing
// =============================================================================

/**
 * List helpers.
 *
 * @example
 * ```bash
 * hass-cli helpers
 * hass-cli helpers --json
 * ```
 */
export async function handleHelpers(ctx: CommandContext): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Fetching helpers...');
  let states: HAState[];
  try {
    states = await client.getStates();
  } catch (err) {
    throw wrapError('failed to get states', err);
  }

  outputList(collectHelpers(states), {
    noun: 'helpers',
    columns: [
      { header: 'ENTITY ID', value: (h) => h.entity_id },
      { header: 'TYPE', value: (h) => h.type },
      { header: 'STATE', value: (h) => h.state },
      { header: 'NAME', value: (h) => h.name },
    ],
  });
}

/**
 * Print a helper's state as JSON.
 *
 * @example
 * ```bash
 * hass-cli helpers inspect input_select.house_mode
 * ```
 */
export async function handleHelpersInspect(ctx: CommandContext): Promise<void> {
  const [helperId = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  try {
    output(await client.getState(helperId));
  } catch (err) {
    throw wrapError('failed to get helper state', err);
  }
}

// =============================================================================
// Creation
// =============================================================================

/**
 * Create a dropdown.
 *
 * @example
 * ```bash
 * hass-cli helpers create-select "House Mode" --options '["Home", "Away", "Night"]'
 * ```
 */
export async function handleHelpersCreateSelect(ctx: CommandContext<SelectOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  const options = parseSelectOptions(ctx.options.options);

  await withWebSocket(ctx.globals, async (client) => {
    let helper: HelperResult;
    try {
      helper = await client.createInputSelect(name, options, ctx.options.icon);
    } catch (err) {
      throw wrapError('failed to create input_select', err);
    }
    printCreated('input_select', 'Input select', helper);
  });
}

/**
 * Create a toggle.
 *
 * @example
 * ```bash
 * hass-cli helpers create-boolean "Guest Mode" --icon mdi:account-multiple
 * ```
 */
export async function handleHelpersCreateBoolean(ctx: CommandContext<IconOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    let helper: HelperResult;
    try {
      helper = await client.createInputBoolean(name, ctx.options.icon);
    } catch (err) {
      throw wrapError('failed to create input_boolean', err);
    }
    printCreated('input_boolean', 'Input boolean', helper);
  });
}

/**
 * Create a button.
 *
 * @example
 * ```bash
 * hass-cli helpers create-button "Reset Counters"
 * ```
 */
export async function handleHelpersCreateButton(ctx: CommandContext<IconOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    let helper: HelperResult;
    try {
      helper = await client.createInputButton(name, ctx.options.icon);
    } catch (err) {
      throw wrapError('failed to create input_button', err);
    }
    printCreated('input_button', 'Input button', helper);
  });
}

/**
 * Create a number slider or box.
 *
 * @example
 * ```bash
 * hass-cli helpers create-number "Target Temp" --min 15 --max 25 --step 0.5 --mode box
 * ```
 */
export async function handleHelpersCreateNumber(ctx: CommandContext<NumberOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  const { min, max, step, mode, icon, initial } = ctx.options;

  await withWebSocket(ctx.globals, async (client) => {
    let helper: HelperResult;
    try {
      helper = await client.createInputNumber({
        name,
        min,
        max,
        step,
        mode,
        ...(icon ? { icon } : {}),
        ...(initial !== undefined ? { initial } : {}),
      });
    } catch (err) {
      throw wrapError('failed to create input_number', err);
    }
    printCreated('input_number', 'Input number', helper, [
      `Range: ${min.toFixed(2)} to ${max.toFixed(2)} (step: ${step.toFixed(2)})`,
    ]);
  });
}

/**
 * Create a text input.
 *
 * @example
 * ```bash
 * hass-cli helpers create-text "Door Code" --max 8 --mode password --pattern '[0-9]*'
 * ```
 */
export async function handleHelpersCreateText(ctx: CommandContext<TextOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  const { min, max, mode, pattern, icon } = ctx.options;

  await withWebSocket(ctx.globals, async (client) => {
    let helper: HelperResult;
    try {
      helper = await client.createInputText({
        name,
        min,
        max,
        mode,
        ...(pattern ? { pattern } : {}),
        ...(icon ? { icon } : {}),
      });
    } catch (err) {
      throw wrapError('failed to create input_text', err);
    }
    const details = [`Length: ${min} to ${max} characters`];
    if (pattern) details.push(`Pattern: ${pattern}`);
    printCreated('input_text', 'Input text', helper, details);
  });
}

// =============================================================================
// Modification
// =============================================================================

/**
 * Replace the options of a dropdown.
 *
 * @example
 * ```bash
 * hass-cli helpers edit-select input_select.house_mode --options '["Home", "Away"]'
 * ```
 */
export async function handleHelpersEditSelect(ctx: CommandContext<SelectOptions>): Promise<void> {
  const [helperId = ''] = ctx.args;
  if (!helperId.startsWith('input_select.')) {
    throw new HAClientError(
      'helper ID must be an input_select entity (e.g., input_select.my_dropdown)'
    );
  }
  const client = await openRest(ctx.globals);
  const options = parseSelectOptions(ctx.options.options);

  try {
    await client.setInputSelectOptions(helperId, options);
  } catch (err) {
    throw wrapError('failed to update options', err);
  }
  outputMessage(`Input select updated: ${helperId}`);
}

/**
 * Change a helper's friendly name and/or entity ID.
 *
 * @example
 * ```bash
 * hass-cli helpers rename input_boolean.guest --name "Guest Mode"
 * hass-cli helpers rename input_boolean.guest --new-id input_boolean.guest_mode
 * ```
 */
export async function handleHelpersRename(ctx: CommandContext<RenameOptions>): Promise<void> {
  const [helperId = ''] = ctx.args;
  const { name, newId } = ctx.options;
  const updates = buildRenameUpdates(helperId, ctx.options);

  await withWebSocket(ctx.globals, async (client) => {
    let entity: EntityEntry;
    try {
      entity = await client.updateEntity(helperId, updates);
    } catch (err) {
      throw wrapError('failed to rename helper', err);
    }

    if (newId && newId !== helperId) {
      outputMessage(`Helper entity ID updated: ${helperId} -> ${entity.entity_id}`);
    } else {
      outputMessage(`Helper updated: ${entity.entity_id}`);
    }
    if (name) {
      outputMessage(`New name: ${entity.name || name}`);
    }
  });
}

/**
 * Delete a helper.
 *
 * @example
 * ```bash
 * hass-cli helpers delete input_boolean.guest_mode
 * ```
 */
export async function handleHelpersDelete(ctx: CommandContext): Promise<void> {
  const [helperId = ''] = ctx.args;
  const { domain, objectId } = parseHelperID(helperId);

  await withWebSocket(ctx.globals, async (client) => {
    try {
      await client.deleteHelper(domain, objectId);
    } catch (err) {
      throw wrapError('failed to delete helper', err);
    }
    outputMessage(`Helper deleted: ${helperId}`);
    outputMessage(
      `\nNote: You may need to reload ${domain} or restart Home Assistant for the change to take effect.`
    );
  });
}

async function setHelperDisabled(ctx: CommandContext, disable: boolean): Promise<void> {
  const [helperId = ''] = ctx.args;
  parseHelperID(helperId);
  const verb = disable ? 'disable' : 'enable';

  await withWebSocket(ctx.globals, async (client) => {
    let entity: EntityEntry;
    try {
      entity = await client.updateEntity(helperId, { disabled_by: disable ? 'user' : null });
    } catch (err) {
      throw wrapError(`failed to ${verb} helper`, err);
    }
    outputMessage(`Helper ${verb}d: ${entity.entity_id}`);
  });
}

/**
 * Re-enable a disabled helper.
 *
 * @example
 * ```bash
 * hass-cli helpers enable input_boolean.guest_mode
 * ```
 */
export async function handleHelpersEnable(ctx: CommandContext): Promise<void> {
  await setHelperDisabled(ctx, false);
}

/**
 * Disable a helper in the entity registry.
 *
 * @example
 * ```bash
 * hass-cli helpers disable input_boolean.guest_mode
 * ```
 */
export async function handleHelpersDisable(ctx: CommandContext): Promise<void> {
  await setHelperDisabled(ctx, true);
}
