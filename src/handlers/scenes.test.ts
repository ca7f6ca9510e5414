import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { setOutputConfig } from '../output.js';
import { captureOutput, testContext, testGlobals } from '../testing/context.js';
import { state } from '../testing/fixtures.js';
import { TEST_URL, mockFetch } from '../testing/rest-mock.js';
import {
  captureSceneEntity,
  collectScenes,
  handleScenes,
  handleScenesAddEntity,
  handleScenesCreate,
  handleScenesInspect,
  handleScenesRemoveEntity,
} from './scenes.js';

const livingRoom = state('light.living_room', 'on', {
  brightness: 180,
  color_mode: 'brightness',
  friendly_name: 'Living Room',
  supported_features: 40,
  icon: 'mdi:lamp',
});

const movieNight = {
  id: '1700000000000',
  name: 'Movie Night',
  entities: { 'light.living_room': { state: 'on', brightness: 180 } },
};

const globals = testGlobals(TEST_URL);

describe('captureSceneEntity', () => {
  it('should keep the state and settable attributes only', () => {
    expect(captureSceneEntity(livingRoom)).toEqual({
      state: 'on',
      brightness: 180,
      color_mode: 'brightness',
    });
  });
});

describe('collectScenes', () => {
  it('should pick scenes sorted by name with their config IDs', () => {
    const scenes = collectScenes([
      state('scene.relax', 'scening', { friendly_name: 'relax', id: 1700000000001 }),
      livingRoom,
      state('scene.movie', 'unknown', {
        friendly_name: 'Movie Night',
        icon: 'mdi:movie',
        id: '1700000000000',
      }),
    ]);

    expect(scenes.map((s) => [s.entity_id, s.config_id, s.icon])).toEqual([
      ['scene.movie', '1700000000000', 'mdi:movie'],
      ['scene.relax', '1700000000001', undefined],
    ]);
  });
});

describe('scene handlers', () => {
  beforeEach(() => {
    setOutputConfig({ format: 'human', verbose: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('should list scenes with placeholders for missing fields', async () => {
    mockFetch({ 'GET /api/states': () => [state('scene.relax', 'unknown', { friendly_name: 'Relax' })] });
    const out = captureOutput();

    await handleScenes(testContext(globals, [], {}));

    expect(out.stdout).toEqual([
      [
        'ENTITY ID    NAME   CONFIG ID  ICON',
        '---------    ----   ---------  ----',
        'scene.relax  Relax  -          -',
      ].join('\n'),
      '\nTotal: 1 scenes',
    ]);
  });

  it('should create a scene from current states', async () => {
    vi.spyOn(Date, 'now').mockReturnValue(1700000000000);
    const requests = mockFetch({
      'GET /api/states/light.living_room': () => livingRoom,
      'POST /api/config/scene/config/1700000000000': () => ({ result: 'ok' }),
    });
    const out = captureOutput();

    await handleScenesCreate(
      testContext(globals, ['Movie Night'], { entity: ['light.living_room'], icon: 'mdi:movie' })
    );

    expect(requests.at(-1)?.body).toEqual({
      id: '1700000000000',
      name: 'Movie Night',
      entities: { 'light.living_room': { state: 'on', brightness: 180, color_mode: 'brightness' } },
      icon: 'mdi:movie',
    });
    expect(out.stdout).toEqual([
      'Scene created: Movie Night (ID: 1700000000000)',
      'Entity ID will be: scene.movie_night',
      '\nNote: You may need to reload scenes or restart Home Assistant for the new scene to appear.',
    ]);
  });

  it('should require at least one entity', async () => {
    await expect(handleScenesCreate(testContext(globals, ['Empty'], {}))).rejects.toThrow(
      'at least one entity is required (use -e flag)'
    );
  });

  it('should name the entity whose state could not be captured', async () => {
    mockFetch({});
    await expect(
      handleScenesCreate(testContext(globals, ['Broken'], { entity: ['light.gone'] }))
    ).rejects.toThrow('failed to get state for light.gone: Resource not found');
  });

  it('should add an entity with its captured state', async () => {
    const requests = mockFetch({
      'GET /api/config/scene/config/1700000000000': () => movieNight,
      'GET /api/states/light.kitchen': () => state('light.kitchen', 'off', { friendly_name: 'K' }),
      'POST /api/config/scene/config/1700000000000': () => ({ result: 'ok' }),
    });
    const out = captureOutput();

    await handleScenesAddEntity(testContext(globals, ['1700000000000', 'light.kitchen'], {}));

    expect(requests.at(-1)?.body).toEqual({
      ...movieNight,
      entities: { ...movieNight.entities, 'light.kitchen': { state: 'off' } },
    });
    expect(out.stdout).toEqual(['Added light.kitchen to scene Movie Night']);
  });

  it('should refuse to add an entity twice', async () => {
    mockFetch({ 'GET /api/config/scene/config/1700000000000': () => movieNight });
    await expect(
      handleScenesAddEntity(testContext(globals, ['1700000000000', 'light.living_room'], {}))
    ).rejects.toThrow('entity light.living_room already exists in scene');
  });

  it('should remove an entity', async () => {
    const requests = mockFetch({
      'GET /api/config/scene/config/1700000000000': () => movieNight,
      'POST /api/config/scene/config/1700000000000': () => ({ result: 'ok' }),
    });
    const out = captureOutput();

    await handleScenesRemoveEntity(
      testContext(globals, ['1700000000000', 'light.living_room'], {})
    );

    expect(requests.at(-1)?.body).toEqual({ ...movieNight, entities: {} });
    expect(out.stdout).toEqual(['Removed light.living_room from scene Movie Night']);
  });

  it('should fail to remove an entity that is not in the scene', async () => {
    mockFetch({ 'GET /api/config/scene/config/1700000000000': () => movieNight });
    await expect(
      handleScenesRemoveEntity(testContext(globals, ['1700000000000', 'light.kitchen'], {}))
    ).rejects.toThrow('entity light.kitchen not found in scene');
  });

  it('should not treat inherited keys as scene entities', async () => {
    mockFetch({ 'GET /api/config/scene/config/1700000000000': () => movieNight });
    await expect(
      handleScenesRemoveEntity(testContext(globals, ['1700000000000', 'toString'], {}))
    ).rejects.toThrow('entity toString not found in scene');
  });

  it('should add an entity to a scene stored without entities', async () => {
    const bare = { id: movieNight.id, name: movieNight.name };
    const requests = mockFetch({
      'GET /api/config/scene/config/1700000000000': () => bare,
      'GET /api/states/light.kitchen': () => state('light.kitchen', 'on'),
      'POST /api/config/scene/config/1700000000000': () => ({ result: 'ok' }),
    });
    captureOutput();

    await handleScenesAddEntity(testContext(globals, ['1700000000000', 'light.kitchen'], {}));

    expect(requests.at(-1)?.body).toEqual({ ...bare, entities: { 'light.kitchen': { state: 'on' } } });
  });

  it('should fall back to the state for a scene entity ID', async () => {
    const sceneState = state('scene.movie', 'unknown', { friendly_name: 'Movie Night' });
    mockFetch({ 'GET /api/states/scene.movie': () => sceneState });
    const out = captureOutput();

    await handleScenesInspect(testContext(globals, ['scene.movie'], {}));

    expect(JSON.parse(out.stdout.join('\n'))).toEqual(sceneState);
  });

  it('should report a missing scene config', async () => {
    mockFetch({});
    await expect(handleScenesInspect(testContext(globals, ['42'], {}))).rejects.toThrow(
      'failed to get scene: Resource not found (not_found, HTTP 404)'
    );
  });
});
