/**
 * Credential and connectivity command handlers.
 * @module handlers/auth
 */

import { createInterface } from 'node:readline/promises';
import {
  configPathFor,
  DEFAULT_OUTPUT,
  deleteConfigFrom,
  loadConfigFrom,
  saveConfigTo,
  type Config,
} from '../config.js';
import { errorMessage, HAClientError, isUnauthorized, NotConfiguredError, wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputMessage } from '../output.js';
import { RestClient } from '../rest.js';
import type { CommandContext, HAConfig } from '../types.js';
import { openRest } from './connection.js';

/**
 * Ask a question on stdin and return the trimmed answer.
 */
async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

/**
 * Store the server URL and access token after checking them against the
 * server. Missing values are prompted for.
 *
 * @example
 * ```bash
 * hass-cli login --url http://homeassistant.local:8123 --token "$HA_TOKEN"
 * hass-cli login   # prompts for both
 * ```
 */
export async function handleLogin(ctx: CommandContext): Promise<void> {
  const { globals } = ctx;

  const url =
    globals.url || (await prompt('Home Assistant URL (e.g., http://homeassistant.local:8123): '));
  if (!url) {
    throw new HAClientError('URL is required');
  }
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    throw new HAClientError('URL must start with http:// or https://');
  }

  const token = globals.token || (await prompt('Long-lived access token: '));
  if (!token) {
    throw new HAClientError('token is required');
  }

  outputInfo(`Testing connection to ${url}...`);
  try {
    await new RestClient(url, token, globals.timeout).checkConnection();
  } catch (err) {
    if (isUnauthorized(err)) {
      throw new HAClientError('authentication failed: invalid token', 'AUTH_FAILED', {
        cause: err,
      });
    }
    throw wrapError('connection failed', err);
  }

  const config: Config = {
    server: { url, token },
    defaults: { output: DEFAULT_OUTPUT, timeout: globals.timeout },
  };
  const path = configPathFor(globals);
  try {
    await saveConfigTo(config, path);
  } catch (err) {
    throw wrapError('failed to save configuration', err);
  }

  outputMessage(`Successfully logged in to ${url}`);
  outputMessage(`Configuration saved to ${path}`);
}

/**
 * Delete the stored credentials. The token itself stays valid on the server.
 *
 * @example
 * ```bash
 * hass-cli logout
 * ```
 */
export async function handleLogout(ctx: CommandContext): Promise<void> {
  const path = configPathFor(ctx.globals);

  try {
    await loadConfigFrom(path);
  } catch (err) {
    if (err instanceof NotConfiguredError) {
      outputMessage('Already logged out (no configuration found)');
      return;
    }
    outputInfo(`Warning: could not read config: ${errorMessage(err)}`);
  }

  try {
    await deleteConfigFrom(path);
  } catch (err) {
    throw wrapError('failed to delete configuration', err);
  }

  outputMessage('Successfully logged out');
  outputMessage(`Configuration removed from ${path}`);
}

/**
 * Check connectivity and show the server's version and location.
 *
 * @example
 * ```bash
 * hass-cli status
 * # Connected to Home Assistant
 * #
 * # Version:       2024.1.0
 * # ...
 * ```
 */
export async function handleStatus(ctx: CommandContext): Promise<void> {
  const client = await openRest(ctx.globals);

  outputInfo('Checking connection...');
  let config: HAConfig;
  try {
    config = await client.getConfig();
  } catch (err) {
    throw wrapError('failed to connect', err);
  }

  if (isJsonOutput()) {
    output(config);
    return;
  }

  outputMessage('Connected to Home Assistant\n');
  outputMessage(`Version:       ${config.version}`);
  outputMessage(`Location:      ${config.location_name}`);
  outputMessage(`Time Zone:     ${config.time_zone}`);
  if (config.state) outputMessage(`State:         ${config.state}`);
  if (config.country) outputMessage(`Country:       ${config.country}`);
  if (config.language) outputMessage(`Language:      ${config.language}`);
  outputMessage(`Components:    ${config.components.length} loaded`);
}
