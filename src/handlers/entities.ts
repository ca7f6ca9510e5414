/**
 * Entity registry command handlers.
 * @module handlers/entities
 */

import { errorMessage, wrapError } from '../errors.js';
import { output, outputInfo, outputList } from '../output.js';
import type { AreaEntry, CommandContext, DeviceEntry, EntityEntry, HAState } from '../types.js';
import { compareStrings } from '../utils.js';
import { openRest, withWebSocket } from './connection.js';

export interface EntityListOptions {
  readonly domain?: string;
  readonly area?: string;
  readonly device?: string;
}

/**
 * A registry entry joined with its resolved area and current state.
 */
export interface EntityWithState {
  readonly entity_id: string;
  readonly state: string;
  readonly area_id: string | null;
  readonly area_name?: string;
  readonly device_id: string | null;
  readonly platform: string;
  readonly name: string | null;
  readonly original_name: string | null;
  readonly disabled_by: string | null;
  readonly hidden_by: string | null;
  readonly last_changed?: string;
}

/**
 * Join registry entries with device areas and states, then filter and sort
 * by entity ID. An entity without its own area takes its device's area.
 */
export function combineEntities(
  entities: readonly EntityEntry[],
  areas: readonly AreaEntry[],
  devices: readonly DeviceEntry[],
  states: readonly HAState[],
  filter: EntityListOptions = {}
): EntityWithState[] {
  const areaNames = new Map(areas.map((a) => [a.area_id, a.name]));
  const deviceAreas = new Map<string, string>();
  for (const device of devices) {
    if (device.area_id) deviceAreas.set(device.id, device.area_id);
  }
  const stateById = new Map(states.map((s) => [s.entity_id, s]));

  const domain = filter.domain?.toLowerCase();
  const area = filter.area?.toLowerCase();

  const combined: EntityWithState[] = [];
  for (const entity of entities) {
    const areaId =
      entity.area_id ?? (entity.device_id ? (deviceAreas.get(entity.device_id) ?? null) : null);
    const areaName = areaId ? (areaNames.get(areaId) ?? '') : '';
    const state = stateById.get(entity.entity_id);

    if (domain) {
      const [entityDomain, objectId] = entity.entity_id.split('.', 2);
      if (objectId === undefined || entityDomain?.toLowerCase() !== domain) continue;
    }
    if (area && !areaName.toLowerCase().includes(area)) continue;
    if (filter.device) {
      if (!entity.device_id?.startsWith(filter.device)) continue;
    }

    combined.push({
      entity_id: entity.entity_id,
      state: state?.state ?? '',
      area_id: areaId,
      ...(areaName ? { area_name: areaName } : {}),
      device_id: entity.device_id,
      platform: entity.platform,
      name: entity.name,
      original_name: entity.original_name ?? null,
      disabled_by: entity.disabled_by,
      hidden_by: entity.hidden_by,
      ...(state?.last_changed ? { last_changed: state.last_changed } : {}),
    });
  }

  return combined.sort((a, b) => compareStrings(a.entity_id, b.entity_id));
}

/**
 * List registered entities with their area and current state.
 *
 * @example
 * ```bash
 * hass-cli entities
 * hass-cli entities -d light -a kitchen
 * hass-cli entities -D 4ee3f48b --json
 * ```
 */
export async function handleEntities(ctx: CommandContext<EntityListOptions>): Promise<void> {
  const { entities, areas, devices } = await withWebSocket(ctx.globals, async (client) => {
    outputInfo('Fetching entities...');
    let entityList: EntityEntry[];
    try {
      entityList = await client.getEntities();
    } catch (err) {
      throw wrapError('failed to get entities', err);
    }

    let areaList: AreaEntry[] = [];
    try {
      areaList = await client.getAreas();
    } catch (err) {
      outputInfo(`Warning: could not fetch areas: ${errorMessage(err)}`);
    }

    let deviceList: DeviceEntry[] = [];
    try {
      deviceList = await client.getDevices();
    } catch (err) {
      outputInfo(`Warning: could not fetch devices: ${errorMessage(err)}`);
    }

    return { entities: entityList, areas: areaList, devices: deviceList };
  });

  let states: HAState[] = [];
  try {
    states = await (await openRest(ctx.globals)).getStates();
  } catch (err) {
    outputInfo(`Warning: could not fetch states: ${errorMessage(err)}`);
  }

  const combined = combineEntities(entities, areas, devices, states, ctx.options);
  outputList(combined, {
    noun: 'entities',
    columns: [
      { header: 'ENTITY ID', value: (e) => e.entity_id },
      { header: 'STATE', value: (e) => e.state, maxWidth: 15 },
      { header: 'NAME', value: (e) => e.name || e.original_name || '', maxWidth: 30 },
      { header: 'AREA', value: (e) => e.area_name ?? '' },
    ],
  });
}

/**
 * Print an entity's current state as JSON.
 *
 * @example
 * ```bash
 * hass-cli entities inspect light.kitchen
 * ```
 */
export async function handleEntitiesInspect(ctx: CommandContext): Promise<void> {
  const [entityId = ''] = ctx.args;
  const client = await openRest(ctx.globals);

  outputInfo('Fetching entity state...');
  try {
    output(await client.getState(entityId));
  } catch (err) {
    throw wrapError('failed to get entity', err);
  }
}
