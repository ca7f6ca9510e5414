import { afterEach, describe, expect, it, vi } from 'vitest';
import { setOutputConfig } from '../output.js';
import { captureOutput, testContext, testGlobals } from '../testing/context.js';
import { area, device, entity } from '../testing/fixtures.js';
import { MockHAServer } from '../testing/ws-mock.js';
import { countAreas, describeArea, findArea, handleAreas, handleAreasInspect } from './areas.js';

const kitchen = area('kitchen', 'Kitchen');
const areas = [area('bedroom', 'Master Bedroom'), kitchen, area('garage', 'garage')];
const devices = [
  device('d1', { name: 'Zeta Speaker', area_id: 'kitchen', manufacturer: 'Sonos' }),
  device('d2', { name: 'Alpha Plug', area_id: 'kitchen' }),
  device('d3', { name: 'Loose Sensor' }),
];
const entities = [
  entity('light.z', { area_id: 'kitchen' }),
  entity('media_player.zeta', { device_id: 'd1' }),
  entity('sensor.loose', { device_id: 'd3' }),
  entity('light.bed', { area_id: 'bedroom', name: 'Bed Lamp' }),
];

describe('countAreas', () => {
  it('should count devices and entities through device areas', () => {
    expect(
      countAreas(areas, devices, entities).map((a) => [a.area_id, a.device_count, a.entity_count])
    ).toEqual([
      ['garage', 0, 0],
      ['kitchen', 2, 2],
      ['bedroom', 0, 1],
    ]);
  });
});

describe('findArea', () => {
  it('should match the ID or the name ignoring case', () => {
    expect(findArea(areas, 'kitchen')).toBe(kitchen);
    expect(findArea(areas, 'MASTER BEDROOM').area_id).toBe('bedroom');
  });

  it('should fail for an unknown area', () => {
    expect(() => findArea(areas, 'attic')).toThrow('area not found: attic');
  });
});

describe('describeArea', () => {
  it('should list sorted devices and entities of the area', () => {
    const detail = describeArea(kitchen, devices, entities);

    expect(detail.devices).toEqual([
      { id: 'd2', name: 'Alpha Plug', manufacturer: null, model: null },
      { id: 'd1', name: 'Zeta Speaker', manufacturer: 'Sonos', model: null },
    ]);
    expect(detail.entities).toEqual([
      { entity_id: 'light.z', name: null, platform: 'demo' },
      { entity_id: 'media_player.zeta', name: null, platform: 'demo' },
    ]);
  });
});

describe('area handlers', () => {
  let server: MockHAServer | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    setOutputConfig({ format: 'human', verbose: false });
    await server?.close();
  });

  it('should print the area table', async () => {
    server = await MockHAServer.start({
      'config/area_registry/list': () => areas,
      'config/device_registry/list': () => devices,
      'config/entity_registry/list': () => entities,
    });
    const out = captureOutput();

    await handleAreas(testContext(testGlobals(server.url), [], {}));

    expect(out.stdout).toEqual([
      [
        'AREA ID  NAME            DEVICES  ENTITIES',
        '-------  ----            -------  --------',
        'garage   garage                0         0',
        'kitchen  Kitchen               2         2',
        'bedroom  Master Bedroom        0         1',
      ].join('\n'),
      '\nTotal: 3 areas',
    ]);
  });

  it('should still count devices when entities are unavailable', async () => {
    server = await MockHAServer.start({
      'config/area_registry/list': () => [kitchen],
      'config/device_registry/list': () => devices,
    });
    setOutputConfig({ format: 'json' });
    const out = captureOutput();

    await handleAreas(testContext(testGlobals(server.url), [], {}));

    expect(JSON.parse(out.stdout.join('\n'))).toEqual([
      {
        area_id: 'kitchen',
        name: 'Kitchen',
        floor_id: null,
        icon: null,
        aliases: [],
        device_count: 2,
        entity_count: 0,
      },
    ]);
  });

  it('should inspect an area by name', async () => {
    server = await MockHAServer.start({
      'config/area_registry/list': () => areas,
      'config/device_registry/list': () => devices,
      'config/entity_registry/list': () => entities,
    });
    const out = captureOutput();

    await handleAreasInspect(testContext(testGlobals(server.url), ['master bedroom'], {}));

    expect(JSON.parse(out.stdout.join('\n'))).toEqual({
      area_id: 'bedroom',
      name: 'Master Bedroom',
      floor_id: null,
      icon: null,
      aliases: [],
      devices: [],
      entities: [{ entity_id: 'light.bed', name: 'Bed Lamp', platform: 'demo' }],
    });
  });
});
