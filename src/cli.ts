/**
 * Command line surface: global flags, command tree and dispatch.
 * @module cli
 */

import { Command, InvalidArgumentError, type OptionValues } from 'commander';
import { DEFAULT_TIMEOUT_SECONDS } from './config.js';
import {
  handleAreas,
  handleAreasInspect,
  handleAutomations,
  handleAutomationsCreate,
  handleAutomationsDebug,
  handleAutomationsDelete,
  handleAutomationsDisable,
  handleAutomationsEdit,
  handleAutomationsEnable,
  handleAutomationsInspect,
  handleAutomationsRename,
  handleAutomationsTrigger,
  handleCall,
  handleDevices,
  handleDevicesDisable,
  handleDevicesEnable,
  handleDevicesInspect,
  handleDevicesRemove,
  handleEntities,
  handleEntitiesInspect,
  handleHelpers,
  handleHelpersCreateBoolean,
  handleHelpersCreateButton,
  handleHelpersCreateNumber,
  handleHelpersCreateSelect,
  handleHelpersCreateText,
  handleHelpersDelete,
  handleHelpersDisable,
  handleHelpersEditSelect,
  handleHelpersEnable,
  handleHelpersInspect,
  handleHelpersRename,
  handleLogin,
  handleLogout,
  handleScenes,
  handleScenesAddEntity,
  handleScenesCreate,
  handleScenesDelete,
  handleScenesInspect,
  handleScenesRemoveEntity,
  handleScripts,
  handleScriptsCreate,
  handleScriptsDebug,
  handleScriptsDelete,
  handleScriptsEdit,
  handleScriptsInspect,
  handleScriptsRename,
  handleScriptsRun,
  handleServices,
  handleServicesInspect,
  handleStateGet,
  handleStateSet,
  handleStatus,
  handleWatch,
} from './handlers/index.js';
import { outputMessage, setOutputConfig } from './output.js';
import type { CommandHandler, GlobalOptions } from './types.js';

/** Reported by `hass-cli version`. */
export const VERSION = '0.1.0' as const;

// =============================================================================
// Option Parsers
// =============================================================================

/** Accumulate a repeatable option into an array. */
export function collect(value: string, previous?: string[]): string[] {
  return [...(previous ?? []), value];
}

export function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`invalid integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`invalid number: ${value}`);
  }
  return parsed;
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Attach a handler to a command. The handler receives the command's operands,
 * its own options and the global flags; the output mode is set from the
 * global flags first.
 */
function bind<O extends object>(command: Command, handler: CommandHandler<O>): Command {
  return command.action(async () => {
    const globals = command.optsWithGlobals<GlobalOptions & OptionValues>();
    setOutputConfig({ format: globals.json ? 'json' : 'human', verbose: Boolean(globals.verbose) });
    await handler({ args: command.args, options: command.opts<O & OptionValues>(), globals });
  });
}

// =============================================================================
// Command Tree
// =============================================================================

function addDeviceCommands(program: Command): void {
  const devices = program
    .command('devices')
    .description('List and manage devices')
    .option('-m, --manufacturer <name>', 'filter by manufacturer (substring, case-insensitive)')
    .option('-a, --area <area>', 'filter by area ID or name');
  bind(devices, handleDevices);

  bind(devices.command('inspect <device_id>').description('Show a device (ID prefix accepted)'), handleDevicesInspect);
  bind(devices.command('remove <device_id>').description('Remove a device from Home Assistant'), handleDevicesRemove);
  bind(devices.command('disable <device_id>').description('Disable a device'), handleDevicesDisable);
  bind(devices.command('enable <device_id>').description('Enable a disabled device'), handleDevicesEnable);
}

function addEntityCommands(program: Command): void {
  const entities = program
    .command('entities')
    .description('List entities with their state and area')
    .option('-d, --domain <domain>', 'filter by domain (e.g., light, sensor)')
    .option('-a, --area <area>', 'filter by area name (substring)')
    .option('-D, --device <device_id>', 'filter by device ID (prefix accepted)');
  bind(entities, handleEntities);

  bind(entities.command('inspect <entity_id>').description('Show the full state of an entity'), handleEntitiesInspect);
}

function addAreaCommands(program: Command): void {
  const areas = program.command('areas').description('List areas with device and entity counts');
  bind(areas, handleAreas);

  bind(areas.command('inspect <area>').description('Show an area with its devices and entities'), handleAreasInspect);
}

function addSceneCommands(program: Command): void {
  const scenes = program.command('scenes').description('List and manage scenes');
  bind(scenes, handleScenes);

  bind(scenes.command('inspect <scene_id>').description('Show a scene configuration'), handleScenesInspect);
  bind(
    scenes
      .command('create <name>')
      .description('Create a scene from the current state of entities')
      .option('-e, --entity <entity_id>', 'entity to capture (repeatable)', collect)
      .option('--icon <icon>', 'icon (e.g., mdi:movie)'),
    handleScenesCreate
  );
  bind(scenes.command('delete <scene_id>').description('Delete a scene'), handleScenesDelete);
  bind(
    scenes.command('add-entity <scene_id> <entity_id>').description('Add an entity to a scene'),
    handleScenesAddEntity
  );
  bind(
    scenes.command('remove-entity <scene_id> <entity_id>').description('Remove an entity from a scene'),
    handleScenesRemoveEntity
  );
}

function addScriptCommands(program: Command): void {
  const scripts = program.command('scripts').description('List and manage scripts');
  bind(scripts, handleScripts);

  bind(scripts.command('inspect <script_id>').description('Show a script configuration'), handleScriptsInspect);
  bind(
    scripts
      .command('create <name>')
      .description('Create a script')
      .option('--description <text>', 'description')
      .option('--icon <icon>', 'icon (e.g., mdi:script)')
      .option('--mode <mode>', 'single, restart, queued or parallel', 'single')
      .option('--sequence <json>', 'JSON array of actions'),
    handleScriptsCreate
  );
  bind(
    scripts
      .command('edit <script_id>')
      .description('Change fields of a script')
      .option('--alias <name>', 'new alias')
      .option('--description <text>', 'new description')
      .option('--icon <icon>', 'new icon')
      .option('--mode <mode>', 'new mode')
      .option('--sequence <json>', 'new JSON array of actions'),
    handleScriptsEdit
  );
  bind(
    scripts.command('rename <script_id> <new_name>').description('Change the alias of a script'),
    handleScriptsRename
  );
  bind(
    scripts
      .command('run <script_id>')
      .alias('trigger')
      .description('Run a script')
      .option('--data <json>', 'JSON variables passed to the script'),
    handleScriptsRun
  );
  bind(
    scripts
      .command('debug <script_id>')
      .description('Show execution traces')
      .option('--run-id <id>', 'show one trace in full'),
    handleScriptsDebug
  );
  bind(scripts.command('delete <script_id>').description('Delete a script'), handleScriptsDelete);
}

function addAutomationCommands(program: Command): void {
  const automations = program.command('automations').description('List and manage automations');
  bind(automations, handleAutomations);

  bind(
    automations.command('inspect <automation_id>').description('Show an automation configuration'),
    handleAutomationsInspect
  );
  bind(
    automations
      .command('create <name>')
      .description('Create an automation')
      .option('--description <text>', 'description')
      .option('--mode <mode>', 'single, restart, queued or parallel', 'single')
      .option('--triggers <json>', 'JSON array of triggers')
      .option('--conditions <json>', 'JSON array of conditions')
      .option('--actions <json>', 'JSON array of actions'),
    handleAutomationsCreate
  );
  bind(
    automations
      .command('edit <automation_id>')
      .description('Change fields of an automation')
      .option('--alias <name>', 'new alias')
      .option('--description <text>', 'new description')
      .option('--mode <mode>', 'new mode')
      .option('--triggers <json>', 'new JSON array of triggers')
      .option('--conditions <json>', 'new JSON array of conditions')
      .option('--actions <json>', 'new JSON array of actions'),
    handleAutomationsEdit
  );
  bind(
    automations
      .command('rename <automation_id> <new_name>')
      .description('Change the alias of an automation'),
    handleAutomationsRename
  );
  bind(
    automations
      .command('trigger <automation_id>')
      .alias('run')
      .description('Run the actions of an automation now'),
    handleAutomationsTrigger
  );
  bind(
    automations
      .command('debug <automation_id>')
      .description('Show execution traces')
      .option('--run-id <id>', 'show one trace in full'),
    handleAutomationsDebug
  );
  bind(automations.command('delete <automation_id>').description('Delete an automation'), handleAutomationsDelete);
  bind(automations.command('enable <automation_id>').description('Turn an automation on'), handleAutomationsEnable);
  bind(automations.command('disable <automation_id>').description('Turn an automation off'), handleAutomationsDisable);
}

function addServiceCommands(program: Command): void {
  const services = program
    .command('services')
    .description('List available services')
    .option('-d, --domain <domain>', 'filter by domain');
  bind(services, handleServices);

  bind(
    services.command('inspect <service>').description('Show fields and targets of a service (domain.service)'),
    handleServicesInspect
  );

  bind(
    program
      .command('call <service>')
      .description('Call a service (domain.service)')
      .option('-e, --entity <entity_id>', 'target entity')
      .option('-a, --area <area_id>', 'target area')
      .option('--data <json>', 'service data as a JSON object')
      .option('-s, --set <key=value>', 'service data field (repeatable)', collect),
    handleCall
  );
}

function addStateCommands(program: Command): void {
  const state = program.command('state').description('Read or overwrite entity states');

  bind(state.command('get <entity_id>').description('Show the state of an entity'), handleStateGet);
  bind(
    state
      .command('set <entity_id> <state>')
      .description("Overwrite an entity's state")
      .option('--attr <key=value>', 'attribute (repeatable)', collect),
    handleStateSet
  );
}

function addHelperCommands(program: Command): void {
  const helpers = program.command('helpers').description('List and manage helpers (input_* entities)');
  bind(helpers, handleHelpers);

  bind(helpers.command('inspect <helper_id>').description('Show the state of a helper'), handleHelpersInspect);
  bind(
    helpers
      .command('create-select <name>')
      .description('Create a dropdown')
      .requiredOption('--options <json>', 'JSON array of options')
      .option('--icon <icon>', 'icon'),
    handleHelpersCreateSelect
  );
  bind(
    helpers.command('create-boolean <name>').description('Create a toggle').option('--icon <icon>', 'icon'),
    handleHelpersCreateBoolean
  );
  bind(
    helpers.command('create-button <name>').description('Create a button').option('--icon <icon>', 'icon'),
    handleHelpersCreateButton
  );
  bind(
    helpers
      .command('create-number <name>')
      .description('Create a number input')
      .option('--min <n>', 'minimum value', parseNumber, 0)
      .option('--max <n>', 'maximum value', parseNumber, 100)
      .option('--step <n>', 'step size', parseNumber, 1)
      .option('--mode <mode>', 'slider or box', 'slider')
      .option('--initial <n>', 'initial value', parseNumber)
      .option('--icon <icon>', 'icon'),
    handleHelpersCreateNumber
  );
  bind(
    helpers
      .command('create-text <name>')
      .description('Create a text input')
      .option('--min <n>', 'minimum length', parseInteger, 0)
      .option('--max <n>', 'maximum length', parseInteger, 100)
      .option('--mode <mode>', 'text or password', 'text')
      .option('--pattern <regex>', 'validation pattern')
      .option('--icon <icon>', 'icon'),
    handleHelpersCreateText
  );
  bind(
    helpers
      .command('edit-select <helper_id>')
      .description('Replace the options of a dropdown')
      .option('--options <json>', 'JSON array of options'),
    handleHelpersEditSelect
  );
  bind(
    helpers
      .command('rename <helper_id>')
      .description('Change the name or entity ID of a helper')
      .option('--name <name>', 'new friendly name')
      .option('--new-id <entity_id>', 'new entity ID (same domain)'),
    handleHelpersRename
  );
  bind(helpers.command('delete <helper_id>').description('Delete a helper'), handleHelpersDelete);
  bind(helpers.command('enable <helper_id>').description('Enable a helper'), handleHelpersEnable);
  bind(helpers.command('disable <helper_id>').description('Disable a helper'), handleHelpersDisable);
}

/**
 * Build the `hass-cli` program. Errors from commander itself surface as
 * `CommanderError` rejections instead of exiting the process.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(): Command {
  const program = new Command('hass-cli')
    .description('Command-line interface for Home Assistant')
    .option('-j, --json', 'output JSON')
    .option('-c, --config <path>', 'config file (default: ~/.config/hass-cli/config.yaml)')
    .option('--url <url>', 'Home Assistant URL (overrides config)')
    .option('--token <token>', 'access token (overrides config)')
    .option('--timeout <seconds>', 'request timeout in seconds', parseInteger, DEFAULT_TIMEOUT_SECONDS)
    .option('-v, --verbose', 'print progress and warnings')
    .exitOverride()
    .configureOutput({ outputError: () => undefined });

  program
    .command('version')
    .description('Print the version')
    .action(() => outputMessage(`hass-cli version ${VERSION}`));

  bind(
    program.command('login').description('Store the server URL and access token (--url, --token)'),
    handleLogin
  );
  bind(program.command('logout').description('Remove stored credentials'), handleLogout);
  bind(program.command('status').description('Check the connection and show server info'), handleStatus);

  addDeviceCommands(program);
  addEntityCommands(program);
  addAreaCommands(program);
  addSceneCommands(program);
  addScriptCommands(program);
  addAutomationCommands(program);
  addServiceCommands(program);
  addStateCommands(program);
  bind(program.command('watch [patterns...]').description('Stream state changes'), handleWatch);
  addHelperCommands(program);

  return program;
}
