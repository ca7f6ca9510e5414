/**
 * Live state change stream.
 * @module handlers/watch
 */

import { wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputMessage } from '../output.js';
import type { CommandContext, HAEvent, HAEventMessage } from '../types.js';
import { formatEventTime, matchesPatterns } from '../utils.js';
import { withWebSocket } from './connection.js';

/** The part of the WebSocket client the watch loop reads from. */
export interface EventSource {
  readEvent(): Promise<HAEventMessage>;
  close(): void;
}

/**
 * One-line summary of a `state_changed` event, e.g.
 * `[14:03:07] light.kitchen: off -> on`.
 */
export function formatStateChange(event: HAEvent): string {
  const oldValue = event.data.old_state?.state ?? 'unavailable';
  const newValue = event.data.new_state?.state ?? 'unavailable';
  const entityId = event.data.entity_id ?? '';
  return `[${formatEventTime(event.time_fired)}] ${entityId}: ${oldValue} -> ${newValue}`;
}

/**
 * Print state changes until `signal` aborts or the connection fails.
 * Aborting closes the source, which ends the pending read.
 *
 * @param patterns - Lowercased entity patterns; empty means every entity
 * @throws {HAClientError} `connection error: …` when the read fails without an abort
 */
export async function watchEvents(
  source: EventSource,
  patterns: readonly string[],
  signal: AbortSignal
): Promise<void> {
  const onAbort = (): void => source.close();
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    while (!signal.aborted) {
      let message: HAEventMessage;
      try {
        message = await source.readEvent();
      } catch (err) {
        if (signal.aborted) break;
        throw wrapError('connection error', err);
      }

      const { event } = message;
      if (event.event_type !== 'state_changed') continue;
      if (patterns.length > 0 && !matchesPatterns(event.data.entity_id ?? '', patterns)) continue;

      if (isJsonOutput()) {
        output(event);
      } else {
        outputMessage(formatStateChange(event));
      }
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
  }

  outputMessage('\nStopped watching');
}

/**
 * Stream state changes, optionally filtered by entity patterns. A trailing
 * `*` makes a pattern a prefix match. Stops on Ctrl+C or SIGTERM.
 *
 * @example
 * ```bash
 * hass-cli watch
 * hass-cli watch light.living_room
 * hass-cli watch 'light.*' 'sensor.*' --json
 * ```
 */
export async function handleWatch(ctx: CommandContext): Promise<void> {
  const patterns = ctx.args.map((p) => p.toLowerCase());

  await withWebSocket(ctx.globals, async (client) => {
    outputInfo('Subscribing to state changes...');
    try {
      await client.subscribeEvents('state_changed');
    } catch (err) {
      throw wrapError('failed to subscribe', err);
    }

    outputMessage('Watching for state changes... (press Ctrl+C to stop)');
    if (patterns.length > 0) {
      outputMessage(`Filtering: ${patterns.join(', ')}`);
    }
    outputMessage('');

    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
    try {
      await watchEvents(client, patterns, controller.signal);
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
  });
}
