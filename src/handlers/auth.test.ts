import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfigFrom, saveConfigTo } from '../config.js';
import { setOutputConfig } from '../output.js';
import { captureOutput, testContext, testGlobals } from '../testing/context.js';
import { TEST_URL, mockFetch } from '../testing/rest-mock.js';
import { TEST_TOKEN } from '../testing/ws-mock.js';
import { handleLogin, handleLogout, handleStatus } from './auth.js';

describe('auth handlers', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    setOutputConfig({ format: 'human', verbose: false });
    dir = await mkdtemp(join(tmpdir(), 'hass-cli-auth-'));
    configPath = join(dir, 'hass-cli', 'config.yaml');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    setOutputConfig({ format: 'human', verbose: false });
    await rm(dir, { recursive: true, force: true });
  });

  describe('handleLogin', () => {
    it('should check the token and save the configuration', async () => {
      const requests = mockFetch({ 'GET /api/': () => ({ message: 'API running.' }) });
      const out = captureOutput();

      await handleLogin(testContext(testGlobals(TEST_URL, { config: configPath, timeout: 12 }), [], {}));

      expect(requests.map((r) => `${r.method} ${r.path}`)).toEqual(['GET /api/']);
      expect(out.stdout).toEqual([
        `Successfully logged in to ${TEST_URL}`,
        `Configuration saved to ${configPath}`,
      ]);
      expect(await loadConfigFrom(configPath)).toEqual({
        server: { url: TEST_URL, token: TEST_TOKEN },
        defaults: { output: 'human', timeout: 12 },
      });
    });

    it('should report an invalid token without saving', async () => {
      mockFetch({ 'GET /api/': () => ({ message: 'API running.' }) });

      await expect(
        handleLogin(
          testContext(testGlobals(TEST_URL, { config: configPath, token: 'wrong-secret' }), [], {})
        )
      ).rejects.toThrow('authentication failed: invalid token');
      await expect(stat(configPath)).rejects.toThrow();
    });

    it('should reject a URL without a scheme', async () => {
      await expect(
        handleLogin(testContext(testGlobals('ha.test:8123', { config: configPath }), [], {}))
      ).rejects.toThrow('URL must start with http:// or https://');
    });

    it('should log progress to stderr when verbose', async () => {
      mockFetch({ 'GET /api/': () => ({ message: 'API running.' }) });
      setOutputConfig({ verbose: true });
      const out = captureOutput();

      await handleLogin(testContext(testGlobals(TEST_URL, { config: configPath }), [], {}));

      expect(out.stderr).toEqual([`Testing connection to ${TEST_URL}...`]);
    });
  });

  describe('handleLogout', () => {
    it('should say so when there is nothing to remove', async () => {
      const out = captureOutput();

      await handleLogout(testContext(testGlobals(TEST_URL, { config: configPath }), [], {}));

      expect(out.stdout).toEqual(['Already logged out (no configuration found)']);
    });

    it('should delete the stored configuration', async () => {
      await saveConfigTo(
        { server: { url: TEST_URL, token: TEST_TOKEN }, defaults: { output: 'human', timeout: 30 } },
        configPath
      );
      const out = captureOutput();

      await handleLogout(testContext(testGlobals(TEST_URL, { config: configPath }), [], {}));

      expect(out.stdout).toEqual(['Successfully logged out', `Configuration removed from ${configPath}`]);
      await expect(readFile(configPath, 'utf8')).rejects.toThrow();
    });
  });

  describe('handleStatus', () => {
    const serverConfig = {
      version: '2024.6.0',
      location_name: 'Home',
      time_zone: 'Europe/Amsterdam',
      country: 'NL',
      language: 'en',
      components: ['light', 'sensor', 'scene'],
    };

    it('should print the server details', async () => {
      mockFetch({ 'GET /api/config': () => serverConfig });
      const out = captureOutput();

      await handleStatus(testContext(testGlobals(TEST_URL), [], {}));

      expect(out.stdout).toEqual([
        'Connected to Home Assistant\n',
        'Version:       2024.6.0',
        'Location:      Home',
        'Time Zone:     Europe/Amsterdam',
        'Country:       NL',
        'Language:      en',
        'Components:    3 loaded',
      ]);
    });

    it('should print the raw config as JSON', async () => {
      mockFetch({ 'GET /api/config': () => serverConfig });
      setOutputConfig({ format: 'json' });
      const out = captureOutput();

      await handleStatus(testContext(testGlobals(TEST_URL), [], {}));

      expect(JSON.parse(out.stdout.join('\n'))).toEqual(serverConfig);
    });

    it('should wrap connection failures', async () => {
      mockFetch({});

      await expect(handleStatus(testContext(testGlobals(TEST_URL), [], {}))).rejects.toThrow(
        /^failed to connect: /
      );
    });
  });
});
