/**
 * Device registry command handlers.
 * @module handlers/devices
 */

import { errorMessage, HAClientError, wrapError } from '../errors.js';
import { output, outputInfo, outputList, outputMessage, type TableColumn } from '../output.js';
import type { AreaEntry, CommandContext, DeviceEntry } from '../types.js';
import { compareStrings, findByIdPrefix } from '../utils.js';
import { withWebSocket } from './connection.js';

export interface DeviceListOptions {
  readonly manufacturer?: string;
  readonly area?: string;
}

// =============================================================================
// Display Helpers
// =============================================================================

/** User-assigned name, else integration name, else the registry ID. */
export function deviceDisplayName(device: DeviceEntry): string {
  return device.name_by_user || device.name || device.id;
}

export function deviceManufacturer(device: DeviceEntry): string {
  return device.manufacturer || 'Unknown';
}

export function deviceModel(device: DeviceEntry): string {
  return device.model || 'Unknown';
}

/** Map area IDs to area names. */
export function areaNames(areas: readonly AreaEntry[]): Map<string, string> {
  return new Map(areas.map((a) => [a.area_id, a.name]));
}

/**
 * Apply the `--manufacturer` and `--area` filters.
 * Manufacturer is a case-insensitive substring match. Area matches the area
 * ID exactly, or the area name ignoring case or as a substring.
 */
export function filterDevices(
  devices: readonly DeviceEntry[],
  names: ReadonlyMap<string, string>,
  filter: DeviceListOptions
): DeviceEntry[] {
  const manufacturer = filter.manufacturer?.toLowerCase();
  const area = filter.area?.toLowerCase();

  return devices.filter((d) => {
    if (manufacturer && !(d.manufacturer ?? '').toLowerCase().includes(manufacturer)) {
      return false;
    }
    if (filter.area && area !== undefined) {
      if (!d.area_id) return false;
      if (d.area_id !== filter.area) {
        const name = (names.get(d.area_id) ?? '').toLowerCase();
        if (name !== area && !name.includes(area)) return false;
      }
    }
    return true;
  });
}

/** Sort by display name, ignoring case. */
export function sortDevices(devices: readonly DeviceEntry[]): DeviceEntry[] {
  return [...devices].sort((a, b) =>
    compareStrings(deviceDisplayName(a).toLowerCase(), deviceDisplayName(b).toLowerCase())
  );
}

function deviceColumns(names: ReadonlyMap<string, string>): TableColumn<DeviceEntry>[] {
  return [
    { header: 'ID', value: (d) => d.id },
    { header: 'NAME', value: deviceDisplayName, maxWidth: 35 },
    { header: 'MANUFACTURER', value: deviceManufacturer, maxWidth: 18 },
    { header: 'MODEL', value: deviceModel, maxWidth: 18 },
    {
      header: 'AREA',
      value: (d) => (d.area_id ? (names.get(d.area_id) ?? d.area_id) : ''),
    },
  ];
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * List registered devices.
 *
 * @example
 * ```bash
 * hass-cli devices
 * hass-cli devices -m philips
 * hass-cli devices -a kitchen --json
 * ```
 */
export async function handleDevices(ctx: CommandContext<DeviceListOptions>): Promise<void> {
  await withWebSocket(ctx.globals, async (client) => {
    outputInfo('Fetching devices...');
    let devices: DeviceEntry[];
    try {
      devices = await client.getDevices();
    } catch (err) {
      throw wrapError('failed to get devices', err);
    }

    let areas: AreaEntry[] = [];
    try {
      areas = await client.getAreas();
    } catch (err) {
      outputInfo(`Warning: could not fetch areas: ${errorMessage(err)}`);
    }

    const names = areaNames(areas);
    const filtered = sortDevices(filterDevices(devices, names, ctx.options));
    outputList(filtered, { noun: 'devices', columns: deviceColumns(names) });
  });
}

async function findDevice(
  client: { getDevices(): Promise<DeviceEntry[]> },
  id: string
): Promise<DeviceEntry> {
  outputInfo('Fetching devices...');
  let devices: DeviceEntry[];
  try {
    devices = await client.getDevices();
  } catch (err) {
    throw wrapError('failed to get devices', err);
  }
  return findByIdPrefix(devices, id, deviceDisplayName);
}

/**
 * Print one device registry entry as JSON. Accepts a unique ID prefix.
 *
 * @example
 * ```bash
 * hass-cli devices inspect 4ee3f48b
 * ```
 */
export async function handleDevicesInspect(ctx: CommandContext): Promise<void> {
  const [id = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    output(await findDevice(client, id));
  });
}

/**
 * Remove a device by detaching every config entry from it.
 *
 * @example
 * ```bash
 * hass-cli devices remove 4ee3f48b
 * ```
 */
export async function handleDevicesRemove(ctx: CommandContext): Promise<void> {
  const [id = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    const device = await findDevice(client, id);
    if (device.config_entries.length === 0) {
      throw new HAClientError(
        'device has no config entries - it may already be orphaned or managed differently'
      );
    }

    outputInfo(`Removing device ${device.id} (${deviceDisplayName(device)})...`);
    for (const entryId of device.config_entries) {
      outputInfo(`  Removing config entry ${entryId}...`);
      try {
        await client.removeConfigEntryFromDevice(device.id, entryId);
      } catch (err) {
        if (err instanceof Error && err.message.includes('does not support device removal')) {
          throw new HAClientError(
            'integration does not support device removal via API - use the Home Assistant UI or remove the integration',
            undefined,
            { cause: err }
          );
        }
        throw wrapError(`failed to remove config entry ${entryId}`, err);
      }
    }

    outputMessage(`Device removed: ${device.id} (${deviceDisplayName(device)})`);
  });
}

async function setDeviceDisabled(ctx: CommandContext, disable: boolean): Promise<void> {
  const [id = ''] = ctx.args;
  await withWebSocket(ctx.globals, async (client) => {
    const found = await findDevice(client, id);
    const verb = disable ? 'disable' : 'enable';
    outputInfo(`${disable ? 'Disabling' : 'Enabling'} device ${found.id} (${deviceDisplayName(found)})...`);

    let device: DeviceEntry;
    try {
      device = disable ? await client.disableDevice(found.id) : await client.enableDevice(found.id);
    } catch (err) {
      throw wrapError(`failed to ${verb} device`, err);
    }
    outputMessage(`Device ${verb}d: ${device.id} (${deviceDisplayName(device)})`);
  });
}

/**
 * Disable a device and its entities.
 *
 * @example
 * ```bash
 * hass-cli devices disable 4ee3f48b
 * ```
 */
export async function handleDevicesDisable(ctx: CommandContext): Promise<void> {
  await setDeviceDisabled(ctx, true);
}

/**
 * Re-enable a disabled device.
 *
 * @example
 * ```bash
 * hass-cli devices enable 4ee3f48b
 * ```
 */
export async function handleDevicesEnable(ctx: CommandContext): Promise<void> {
  await setDeviceDisabled(ctx, false);
}
