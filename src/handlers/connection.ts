/**
 * Client construction shared by the command handlers.
 * @module handlers/connection
 */

import { HAWebSocketClient } from '../client.js';
import { resolveConfig } from '../config.js';
import { outputInfo } from '../output.js';
import { RestClient } from '../rest.js';
import type { GlobalOptions } from '../types.js';

/**
 * Build a REST client from the resolved credentials.
 */
export async function openRest(globals: GlobalOptions): Promise<RestClient> {
  const config = await resolveConfig(globals);
  return new RestClient(config.server.url, config.server.token, globals.timeout);
}

/**
 * Open an authenticated WebSocket, run `fn` with it and always close it.
 *
 * @example
 * ```typescript
 * const areas = await withWebSocket(ctx.globals, (ws) => ws.getAreas());
 * ```
 */
export async function withWebSocket<T>(
  globals: GlobalOptions,
  fn: (client: HAWebSocketClient) => Promise<T>
): Promise<T> {
  const config = await resolveConfig(globals);
  outputInfo('Connecting to Home Assistant...');
  const client = await HAWebSocketClient.connect(
    config.server.url,
    config.server.token,
    globals.timeout * 1000
  );
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
