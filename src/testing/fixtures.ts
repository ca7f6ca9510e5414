/**
 * Registry and state builders for tests.
 * @module testing/fixtures
 */

import type { AreaEntry, DeviceEntry, EntityEntry, HAState } from '../types.js';

export function device(id: string, overrides: Partial<DeviceEntry> = {}): DeviceEntry {
  return {
    id,
    area_id: null,
    config_entries: [],
    disabled_by: null,
    manufacturer: null,
    model: null,
    name: null,
    name_by_user: null,
    ...overrides,
  };
}

export function area(areaId: string, name: string): AreaEntry {
  return { area_id: areaId, name, aliases: [], floor_id: null, icon: null };
}

export function entity(entityId: string, overrides: Partial<EntityEntry> = {}): EntityEntry {
  return {
    entity_id: entityId,
    area_id: null,
    device_id: null,
    disabled_by: null,
    hidden_by: null,
    name: null,
    platform: 'demo',
    ...overrides,
  };
}

export function state(
  entityId: string,
  value: string,
  attributes: Record<string, unknown> = {}
): HAState {
  return { entity_id: entityId, state: value, attributes };
}
