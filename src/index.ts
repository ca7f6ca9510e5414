/**
 * Home Assistant CLI
 *
 * Library entry point: the REST and WebSocket clients, the credential store
 * and the command program.
 *
 * @module hass-cli
 */

// =============================================================================
// Core Types and Errors
// =============================================================================

export * from './errors.js';
export * from './types.js';

// =============================================================================
// Clients
// =============================================================================

export { HAWebSocketClient, httpToWS, WEBSOCKET_PATH } from './client.js';
export { RestClient } from './rest.js';

// =============================================================================
// Configuration
// =============================================================================

export type { Config, DefaultsConfig, ServerConfig } from './config.js';
export {
  defaultConfigPath,
  deleteConfigFrom,
  loadConfigFrom,
  parseConfig,
  resolveConfig,
  saveConfigTo,
} from './config.js';

// =============================================================================
// Output System
// =============================================================================

export type { OutputAdapter, OutputConfig, OutputFormat, TableColumn } from './output.js';
export {
  DefaultOutputAdapter,
  formatTable,
  getOutputConfig,
  isJsonOutput,
  JsonOutputAdapter,
  output,
  outputError,
  outputList,
  outputMessage,
  setOutputConfig,
} from './output.js';

// =============================================================================
// Command Program
// =============================================================================

export { createProgram, VERSION } from './cli.js';
