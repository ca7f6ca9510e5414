/**
 * Credential store for the Home Assistant CLI.
 *
 * Server URL and access token live in a YAML file, by default
 * `~/.config/hass-cli/config.yaml`:
 *
 * ```yaml
 * server:
 *   url: http://homeassistant.local:8123
 *   token: <long-lived access token>
 * defaults:
 *   output: human
 *   timeout: 30
 * ```
 *
 * @module config
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { dump, load } from 'js-yaml';
import { errorMessage, HAClientError, NotConfiguredError } from './errors.js';
import type { GlobalOptions } from './types.js';
import { isRecord } from './utils.js';

// =============================================================================
// Types
// =============================================================================

export interface ServerConfig {
  readonly url: string;
  readonly token: string;
}

export interface DefaultsConfig {
  readonly output: string;
  readonly timeout: number;
}

export interface Config {
  readonly server: ServerConfig;
  readonly defaults: DefaultsConfig;
}

// =============================================================================
// Constants
// =============================================================================

/** Output mode written by `login` and assumed when the file has none. */
export const DEFAULT_OUTPUT = 'human' as const;

/** Request timeout in seconds. */
export const DEFAULT_TIMEOUT_SECONDS = 30 as const;

/**
 * Path of the config file when `--config` is not given.
 */
export function defaultConfigPath(): string {
  return join(homedir(), '.config', 'hass-cli', 'config.yaml');
}

// =============================================================================
// Parsing
// =============================================================================

function stringField(section: Record<string, unknown>, key: string, path: string): string {
  const value = section[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new Error(`${path}.${key} must be a string`);
  }
  return value;
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`${key} must be a mapping`);
  }
  return value;
}

/**
 * Validate a decoded YAML document and fill in defaults.
 *
 * @throws {Error} If a field has the wrong type
 */
export function parseConfig(raw: unknown): Config {
  if (raw === undefined || raw === null) raw = {};
  if (!isRecord(raw)) {
    throw new Error('config must be a mapping');
  }

  const server = sectionOf(raw, 'server');
  const defaults = sectionOf(raw, 'defaults');

  const timeout = defaults.timeout;
  if (timeout !== undefined && timeout !== null && !Number.isInteger(timeout)) {
    throw new Error('defaults.timeout must be an integer');
  }

  return {
    server: {
      url: stringField(server, 'url', 'server'),
      token: stringField(server, 'token', 'server'),
    },
    defaults: {
      output: stringField(defaults, 'output', 'defaults') || DEFAULT_OUTPUT,
      timeout: typeof timeout === 'number' && timeout !== 0 ? timeout : DEFAULT_TIMEOUT_SECONDS,
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// =============================================================================
// File Operations
// =============================================================================

/**
 * Load the config file at `path`.
 *
 * @throws {NotConfiguredError} If the file does not exist
 * @throws {HAClientError} If the file cannot be read or parsed
 */
export async function loadConfigFrom(path: string): Promise<Config> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) throw new NotConfiguredError();
    const reason = errorMessage(err);
    throw new HAClientError(`failed to read config file: ${reason}`, undefined, { cause: err });
  }

  try {
    return parseConfig(load(text));
  } catch (err) {
    const reason = errorMessage(err);
    throw new HAClientError(`failed to parse config file: ${reason}`, undefined, { cause: err });
  }
}

/**
 * Write the config to `path`, creating the parent directory (0700).
 * The file is readable by its owner only (0600).
 */
export async function saveConfigTo(config: Config, path: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true, mode: 0o700 });
  } catch (err) {
    const reason = errorMessage(err);
    throw new HAClientError(`failed to create config directory: ${reason}`, undefined, {
      cause: err,
    });
  }

  try {
    await writeFile(path, dump(config), { mode: 0o600 });
  } catch (err) {
    const reason = errorMessage(err);
    throw new HAClientError(`failed to write config file: ${reason}`, undefined, { cause: err });
  }
}

/**
 * Remove the config file. A file that is already gone is not an error.
 */
export async function deleteConfigFrom(path: string): Promise<void> {
  try {
    await rm(path);
  } catch (err) {
    if (isMissingFile(err)) return;
    const reason = errorMessage(err);
    throw new HAClientError(`failed to delete config file: ${reason}`, undefined, { cause: err });
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** True when both the server URL and the token are set. */
export function isConfigured(config: Config): boolean {
  return config.server.url !== '' && config.server.token !== '';
}

/**
 * Token for display: first and last four characters only.
 *
 * @example
 * ```typescript
 * redactedToken(config); // 'abcd...wxyz'
 * ```
 */
export function redactedToken(config: Config): string {
  const { token } = config.server;
  if (token.length <= 8) return '***';
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

/** Config file path honouring `--config`. */
export function configPathFor(globals: GlobalOptions): string {
  return globals.config || defaultConfigPath();
}

/**
 * Load credentials for a command, applying `--url` and `--token`.
 * Both flags together work without any config file.
 *
 * @throws {NotConfiguredError} If no URL and token can be resolved
 */
export async function resolveConfig(globals: GlobalOptions): Promise<Config> {
  const { url, token } = globals;
  let config: Config;
  try {
    config = await loadConfigFrom(configPathFor(globals));
  } catch (err) {
    if (!(err instanceof NotConfiguredError) || !url || !token) throw err;
    config = {
      server: { url, token },
      defaults: { output: DEFAULT_OUTPUT, timeout: globals.timeout },
    };
  }

  const resolved: Config = {
    ...config,
    server: {
      url: url || config.server.url,
      token: token || config.server.token,
    },
  };

  if (!isConfigured(resolved)) {
    throw new NotConfiguredError();
  }
  return resolved;
}
