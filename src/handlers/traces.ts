/**
 * Trace listing shared by `scripts debug` and `automations debug`.
 * @module handlers/traces
 */

import { wrapError } from '../errors.js';
import { isJsonOutput, output, outputInfo, outputList, outputMessage, type TableColumn } from '../output.js';
import type { GlobalOptions, TraceSummary } from '../types.js';
import { formatDuration, formatTime } from '../utils.js';
import { withWebSocket } from './connection.js';

export interface DebugOptions {
  readonly runId?: string;
}

/** Run IDs are long hex strings; the table keeps the first 16 characters. */
const RUN_ID_WIDTH = 16;

export const TRACE_COLUMNS: readonly TableColumn<TraceSummary>[] = [
  {
    header: 'RUN ID',
    value: (t) => (t.run_id.length > RUN_ID_WIDTH ? `${t.run_id.slice(0, RUN_ID_WIDTH)}...` : t.run_id),
  },
  { header: 'STATE', value: (t) => t.state },
  { header: 'RESULT', value: (t) => t.script_execution ?? '' },
  { header: 'STARTED', value: (t) => formatTime(t.timestamp.start) },
  { header: 'DURATION', value: (t) => formatDuration(t.timestamp.start, t.timestamp.finish) },
];

/**
 * Print one trace as JSON when a run ID is given, otherwise the list of
 * stored traces for the item.
 */
export async function showTraces(
  globals: GlobalOptions,
  domain: 'script' | 'automation',
  itemId: string,
  options: DebugOptions
): Promise<void> {
  await withWebSocket(globals, async (client) => {
    if (options.runId) {
      outputInfo('Fetching trace details...');
      try {
        output(await client.getTrace(domain, itemId, options.runId));
      } catch (err) {
        throw wrapError('failed to get trace', err);
      }
      return;
    }

    outputInfo(`Fetching traces for ${domain} '${itemId}'...`);
    let traces: TraceSummary[];
    try {
      traces = await client.listTraces(domain, itemId);
    } catch (err) {
      throw wrapError('failed to list traces', err);
    }

    outputList(traces, { noun: 'traces', columns: TRACE_COLUMNS });
    if (!isJsonOutput() && traces.length > 0) {
      outputMessage('\nUse --run-id <id> to see detailed trace information');
    }
  });
}
