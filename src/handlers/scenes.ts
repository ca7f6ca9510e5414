/**
 * Scene command handlers.
 *
 * Scenes are addressed by their config ID (a millisecond timestamp assigned at
 * creation), not by entity ID. Activation goes through
 * `hass-cli call scene.turn_on -e scene.<name>`.
 *
 * @module handlers/scenes
 */

import { HAClientError, wrapError } from '../errors.js';
import { output, outputInfo, outputList, outputMessage } from '../output.js';
import type { RestClient } from '../rest.js';
import type { CommandContext, HAState, SceneConfig, SceneEntityState } from '../types.js';
import { compareStrings, configIdOf, slugify } from '../utils.js';
import { openRest } from './connection.js';

export interface SceneCreateOptions {
  readonly entity?: readonly string[];
  readonly icon?: string;
}

export interface SceneInfo {
  readonly entity_id: string;
  readonly name: string;
  readonly state: string;
  readonly icon?: string;
  readonly config_id?: string;
  readonly attributes: Record<string, unknown>;
}

/** Attributes a scene never stores; the server derives them from the entity. */
const UNCAPTURED_ATTRIBUTES: ReadonlySet<string> = new Set([
  'friendly_name',
  'icon',
  'entity_id',
  'supported_features',
  'device_class',
]);

function stringAttribute(attributes: Record<string, unknown>, key: string): string {
  const value = attributes[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Reduce an entity state to what a scene stores for it.
 */
export function captureSceneEntity(state: HAState): SceneEntityState {
  const captured: SceneEntityState = { state: state.state };
  for (const [key, value] of Object.entries(state.attributes)) {
    if (!UNCAPTURED_ATTRIBUTES.has(key)) captured[key] = value;
  }
  return captured;
}

/**
 * Pick the `scene.*` states and sort them by friendly name, ignoring case.
 */
export function collectScenes(states: readonly HAState[]): SceneInfo[] {
  return states
    .filter((s) => s.entity_id.startsWith('scene.'))
    .map((s) => {
      const icon = stringAttribute(s.attributes, 'icon');
      const configId = configIdOf(s.attributes);
      return {
        entity_id: s.entity_id,
        name: stringAttribute(s.attributes, 'friendly_name'),
        state: s.state,
        ...(icon ? { icon } : {}),
        ...(configId ? { config_id: configId } : {}),
        attributes: s.attributes,
      };
    })
    .sort((a, b) => compareStrings(a.name.toLowerCase(), b.name.toLowerCase()));
}

async function captureState(client: RestClient, entityId: string, context: string): Promise<SceneEntityState> {
  try {
    return captureSceneEntity(await client.getState(entityId));
  } catch (err) {
    throw wrapError(context, err);
  }
}

async function fetchSceneConfig(client: RestClient, id: string): Promise<SceneConfig> {
  outputInfo('Fetching scene configuration...');
  try {
    return await client.getSceneConfig(id);
  } catch (err) {
    throw wrapError('failed to get scene', err);
  }
}

async function saveScene(client: RestClient, id: string, config: SceneConfig): Promise<void> {
  outputInfo('Updating scene...');
  try {
    await client.updateScene(id, config);
  } catch (err) {
    throw wrapError('failed to update scene', err);
  }
}

/**
 * List scenes.
 *
 * @example
 * ```bash
 * hass-cli scenes
 * hass-cli scenes --json
 * ```
 */
export async function handleScenes(ctx: CommandContext): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Fetching scenes...');
  let states: HAState[];
  try {
    states = await client.getStates();
  } catch (err) {
    throw wrapError('failed to get states', err);
  }

  outputList(collectScenes(states), {
    noun: 'scenes',
    columns: [
      { header: 'ENTITY ID', value: (s) => s.entity_id },
      { header: 'NAME', value: (s) => s.name, maxWidth: 30 },
      { header: 'CONFIG ID', value: (s) => s.config_id || '-' },
      { header: 'ICON', value: (s) => s.icon || '-' },
    ],
  });
}

/**
 * Print a scene's stored configuration. A `scene.*` entity ID without a
 * stored configuration prints its state instead.
 *
 * @example
 * ```bash
 * hass-cli scenes inspect 1767672291452
 * hass-cli scenes inspect scene.movie_night
 * ```
 */
export async function handleScenesInspect(ctx: CommandContext): Promise<void> {
  const [id = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  outputInfo('Fetching scene configuration...');
  let config: SceneConfig;
  try {
    config = await client.getSceneConfig(id);
  } catch (err) {
    if (id.startsWith('scene.')) {
      const state = await client.getState(id).catch(() => undefined);
      if (state) {
        output(state);
        return;
      }
    }
    throw wrapError('failed to get scene', err);
  }
  output(config);
}

/**
 * Create a scene from the current states of the given entities.
 *
 * @example
 * ```bash
 * hass-cli scenes create "Movie Night" -e light.living_room -e light.kitchen
 * hass-cli scenes create "Good Morning" -e light.bedroom --icon mdi:weather-sunny
 * ```
 */
export async function handleScenesCreate(ctx: CommandContext<SceneCreateOptions>): Promise<void> {
  const [name = ''] = ctx.args;
  const entityIds = ctx.options.entity ?? [];
  if (entityIds.length === 0) {
    throw new HAClientError('at least one entity is required (use -e flag)');
  }

  const client = await openRest(ctx.globals);
  const id = String(Date.now());

  outputInfo('Capturing entity states...');
  const entities: Record<string, SceneEntityState> = {};
  for (const entityId of entityIds) {
    entities[entityId] = await captureState(client, entityId, `failed to get state for ${entityId}`);
  }

  const config: SceneConfig = {
    id,
    name,
    entities,
    ...(ctx.options.icon ? { icon: ctx.options.icon } : {}),
  };

  outputInfo(`Creating scene '${name}'...`);
  try {
    await client.createScene(id, config);
  } catch (err) {
    throw wrapError('failed to create scene', err);
  }

  outputMessage(`Scene created: ${name} (ID: ${id})`);
  outputMessage(`Entity ID will be: scene.${slugify(name)}`);
  outputMessage(
    '\nNote: You may need to reload scenes or restart Home Assistant for the new scene to appear.'
  );
}

/**
 * Delete a scene by config ID.
 *
 * @example
 * ```bash
 * hass-cli scenes delete 1767672291452
 * ```
 */
export async function handleScenesDelete(ctx: CommandContext): Promise<void> {
  const [id = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  outputInfo(`Deleting scene ${id}...`);
  try {
    await client.deleteScene(id);
  } catch (err) {
    throw wrapError('failed to delete scene', err);
  }

  outputMessage(`Scene deleted: ${id}`);
  outputMessage(
    '\nNote: You may need to reload scenes or restart Home Assistant for the change to take effect.'
  );
}

/**
 * Add an entity to a scene, capturing its current state.
 *
 * @example
 * ```bash
 * hass-cli scenes add-entity 1767672291452 light.kitchen
 * ```
 */
export async function handleScenesAddEntity(ctx: CommandContext): Promise<void> {
  const [id = '', entityId = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  const config = await fetchSceneConfig(client, id);
  const current = config.entities ?? {};
  if (Object.hasOwn(current, entityId)) {
    throw new HAClientError(`entity ${entityId} already exists in scene`);
  }

  outputInfo('Capturing entity state...');
  const captured = await captureState(client, entityId, 'failed to get entity state');

  await saveScene(client, id, {
    ...config,
    entities: { ...current, [entityId]: captured },
  });
  outputMessage(`Added ${entityId} to scene ${config.name}`);
}

/**
 * Remove an entity from a scene.
 *
 * @example
 * ```bash
 * hass-cli scenes remove-entity 1767672291452 light.kitchen
 * ```
 */
export async function handleScenesRemoveEntity(ctx: CommandContext): Promise<void> {
  const [id = '', entityId = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  const config = await fetchSceneConfig(client, id);
  const current = config.entities ?? {};
  if (!Object.hasOwn(current, entityId)) {
    throw new HAClientError(`entity ${entityId} not found in scene`);
  }

  const entities = Object.fromEntries(
    Object.entries(current).filter(([key]) => key !== entityId)
  );
  await saveScene(client, id, { ...config, entities });
  outputMessage(`Removed ${entityId} from scene ${config.name}`);
}
