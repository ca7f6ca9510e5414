/**
 * Area registry command handlers.
 * @module handlers/areas
 */

import { errorMessage, HAClientError, wrapError } from '../errors.js';
import { output, outputInfo, outputList } from '../output.js';
import type { AreaEntry, CommandContext, DeviceEntry, EntityEntry } from '../types.js';
import { compareStrings } from '../utils.js';
import { withWebSocket } from './connection.js';
import { deviceDisplayName } from './devices.js';

export interface AreaWithCounts {
  readonly area_id: string;
  readonly name: string;
  readonly floor_id: string | null;
  readonly icon: string | null;
  readonly aliases: readonly string[];
  readonly device_count: number;
  readonly entity_count: number;
}

export interface AreaDetail {
  readonly area_id: string;
  readonly name: string;
  readonly floor_id: string | null;
  readonly icon: string | null;
  readonly aliases: readonly string[];
  readonly devices: readonly {
    readonly id: string;
    readonly name: string;
    readonly manufacturer: string | null;
    readonly model: string | null;
  }[];
  readonly entities: readonly {
    readonly entity_id: string;
    readonly name: string | null;
    readonly platform: string;
  }[];
}

/**
 * Area of an entity: its own, else the area of its device.
 */
function entityArea(entity: EntityEntry, deviceAreas: ReadonlyMap<string, string>): string | null {
  if (entity.area_id) return entity.area_id;
  if (entity.device_id) return deviceAreas.get(entity.device_id) ?? null;
  return null;
}

function deviceAreaMap(devices: readonly DeviceEntry[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const device of devices) {
    if (device.area_id) map.set(device.id, device.area_id);
  }
  return map;
}

/**
 * Count devices and entities per area, sorted by name ignoring case.
 */
export function countAreas(
  areas: readonly AreaEntry[],
  devices: readonly DeviceEntry[],
  entities: readonly EntityEntry[]
): AreaWithCounts[] {
  const deviceAreas = deviceAreaMap(devices);
  const deviceCounts = new Map<string, number>();
  const entityCounts = new Map<string, number>();

  for (const device of devices) {
    if (device.area_id) {
      deviceCounts.set(device.area_id, (deviceCounts.get(device.area_id) ?? 0) + 1);
    }
  }
  for (const entity of entities) {
    const areaId = entityArea(entity, deviceAreas);
    if (areaId) entityCounts.set(areaId, (entityCounts.get(areaId) ?? 0) + 1);
  }

  return areas
    .map((area) => ({
      area_id: area.area_id,
      name: area.name,
      floor_id: area.floor_id,
      icon: area.icon,
      aliases: area.aliases,
      device_count: deviceCounts.get(area.area_id) ?? 0,
      entity_count: entityCounts.get(area.area_id) ?? 0,
    }))
    .sort((a, b) => compareStrings(a.name.toLowerCase(), b.name.toLowerCase()));
}

/**
 * Find an area by ID, or by name ignoring case.
 *
 * @throws {HAClientError} When no area matches
 */
export function findArea(areas: readonly AreaEntry[], idOrName: string): AreaEntry {
  const lowered = idOrName.toLowerCase();
  const area = areas.find((a) => a.area_id === idOrName || a.name.toLowerCase() === lowered);
  if (!area) {
    throw new HAClientError(`area not found: ${idOrName}`);
  }
  return area;
}

/** Collect an area's devices (by name) and entities (by entity ID). */
export function describeArea(
  area: AreaEntry,
  devices: readonly DeviceEntry[],
  entities: readonly EntityEntry[]
): AreaDetail {
  const deviceAreas = deviceAreaMap(devices);
  const areaDevices = devices
    .filter((d) => d.area_id === area.area_id)
    .map((d) => ({
      id: d.id,
      name: deviceDisplayName(d),
      manufacturer: d.manufacturer,
      model: d.model,
    }))
    .sort((a, b) => compareStrings(a.name, b.name));
  const areaEntities = entities
    .filter((e) => entityArea(e, deviceAreas) === area.area_id)
    .map((e) => ({ entity_id: e.entity_id, name: e.name, platform: e.platform }))
    .sort((a, b) => compareStrings(a.entity_id, b.entity_id));

  return {
    area_id: area.area_id,
    name: area.name,
    floor_id: area.floor_id,
    icon: area.icon,
    aliases: area.aliases,
    devices: areaDevices,
    entities: areaEntities,
  };
}

/**
 * List areas with their device and entity counts.
 *
 * @example
 * ```bash
 * hass-cli areas
 * hass-cli areas --json
 * ```
 */
export async function handleAreas(ctx: CommandContext): Promise<void> {
  await withWebSocket(ctx.globals, async (client) => {
    outputInfo('Fetching areas...');
    let areas: AreaEntry[];
    try {
      areas = await client.getAreas();
    } catch (err) {
      throw wrapError('failed to get areas', err);
    }

    let devices: DeviceEntry[] = [];
    try {
      devices = await client.getDevices();
    } catch (err) {
      outputInfo(`Warning: could not fetch devices: ${errorMessage(err)}`);
    }

    let entities: EntityEntry[] = [];
    try {
      entities = await client.getEntities();
    } catch (err) {
      outputInfo(`Warning: could not fetch entities: ${errorMessage(err)}`);
    }

    outputList(countAreas(areas, devices, entities), {
      noun: 'areas',
      columns: [
        { header: 'AREA ID', value: (a) => a.area_id },
        { header: 'NAME', value: (a) => a.name },
        { header: 'DEVICES', value: (a) => String(a.device_count), align: 'right' },
        { header: 'ENTITIES', value: (a) => String(a.entity_count), align: 'right' },
      ],
    });
  });
}

/**
 * Print an area with its devices and entities as JSON.
 *
 * @example
 * ```bash
 * hass-cli areas inspect living_room
 * hass-cli areas inspect Kitchen
 * ```
 */
export async function handleAreasInspect(ctx: CommandContext): Promise<void> {
  const [idOrName = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    let areas: AreaEntry[];
    try {
      areas = await client.getAreas();
    } catch (err) {
      throw wrapError('failed to get areas', err);
    }
    const area = findArea(areas, idOrName);

    let devices: DeviceEntry[];
    try {
      devices = await client.getDevices();
    } catch (err) {
      throw wrapError('failed to get devices', err);
    }

    let entities: EntityEntry[];
    try {
      entities = await client.getEntities();
    } catch (err) {
      throw wrapError('failed to get entities', err);
    }

    output(describeArea(area, devices, entities));
  });
}
