#!/usr/bin/env node

/**
 * Home Assistant CLI
 *
 * Manage devices, entities, areas, scenes, scripts, automations and helpers
 * of a Home Assistant server from the terminal.
 *
 * @example
 * ```bash
 * hass-cli login --url http://homeassistant.local:8123 --token "$HA_TOKEN"
 * hass-cli entities -d light
 * hass-cli call light.turn_on -e light.kitchen -s brightness=128
 * hass-cli watch 'binary_sensor.*'
 * ```
 *
 * @module hass-cli
 */

import { CommanderError } from 'commander';
import { createProgram } from './src/cli.js';
import { errorMessage, HAClientError } from './src/errors.js';
import { outputError } from './src/output.js';

/** Commander codes for help output, which is not an error to report. */
const HELP_CODES: ReadonlySet<string> = new Set(['commander.help', 'commander.helpDisplayed']);

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (!HELP_CODES.has(err.code)) {
        outputError(err.message.replace(/^error: /, ''), err.code);
      }
      process.exitCode = err.exitCode;
      return;
    }
    if (err instanceof HAClientError) {
      outputError(err.message, err.code);
    } else {
      outputError(errorMessage(err));
    }
    process.exitCode = 1;
  }
}

await main();
