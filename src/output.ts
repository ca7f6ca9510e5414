/**
 * Output configuration and logging module.
 *
 * Every command prints through this module so that `--json` switches all
 * output to machine-readable form. Two modes are supported:
 * - `human`: tables and aligned key/value text
 * - `json`: pretty-printed JSON
 *
 * Diagnostics (`outputInfo`, `outputWarning`) go to stderr so that piping
 * stdout stays clean.
 *
 * @module output
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Output format modes.
 * - `human`: Human-readable tables and text
 * - `json`: Machine-readable JSON
 */
export type OutputFormat = 'human' | 'json';

/**
 * Output configuration options.
 */
export interface OutputConfig {
  /** Output format mode */
  format: OutputFormat;
  /** Whether diagnostics are printed */
  verbose: boolean;
}

/**
 * Column definition for table formatting.
 */
export interface TableColumn<T> {
  /** Column header text */
  readonly header: string;
  /** Function to extract cell value from row data */
  readonly value: (row: T) => string;
  /** Cells longer than this are cut and end in `...` */
  readonly maxWidth?: number;
  /** Text alignment */
  readonly align?: 'left' | 'right';
}

/**
 * Options for {@link outputList}.
 */
export interface ListOptions<T> {
  /** Plural noun used in the empty and total lines, e.g. `devices` */
  readonly noun: string;
  /** Columns of the human-readable table */
  readonly columns: readonly TableColumn<T>[];
}

// =============================================================================
// Global Configuration
// =============================================================================

/** Global output configuration */
let outputConfig: OutputConfig = {
  format: 'human',
  verbose: false,
};

/** Cached adapter instance (set by getAdapter) */
let currentAdapter: OutputAdapter | null = null;

/**
 * Get the current output configuration.
 */
export function getOutputConfig(): Readonly<OutputConfig> {
  return outputConfig;
}

/**
 * Set the output configuration.
 */
export function setOutputConfig(config: Partial<OutputConfig>): void {
  outputConfig = { ...outputConfig, ...config };
  currentAdapter = null; // Reset adapter when config changes
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonOutput(): boolean {
  return outputConfig.format === 'json';
}

// =============================================================================
// Strategy Pattern - Output Adapters
// =============================================================================

/**
 * Output adapter interface for the Strategy pattern.
 * One implementation per output format.
 */
export interface OutputAdapter {
  /** Format and output arbitrary data */
  formatData(data: unknown): void;
  /** Format and output a list */
  formatList<T>(items: readonly T[], options: ListOptions<T>): void;
  /** Format and output an error */
  formatError(error: string | Error, code?: string): void;
}

/**
 * JSON output adapter - outputs data as indented JSON.
 */
export class JsonOutputAdapter implements OutputAdapter {
  formatData(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  formatList<T>(items: readonly T[]): void {
    console.log(JSON.stringify(items, null, 2));
  }

  formatError(error: string | Error, code?: string): void {
    const message = error instanceof Error ? error.message : error;
    console.log(JSON.stringify({ success: false, error: message, code }, null, 2));
  }
}

/**
 * Default output adapter - human-readable tables.
 */
export class DefaultOutputAdapter implements OutputAdapter {
  formatData(data: unknown): void {
    if (typeof data === 'object' && data !== null) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      console.log(String(data));
    }
  }

  formatList<T>(items: readonly T[], options: ListOptions<T>): void {
    if (items.length === 0) {
      console.log(`No ${options.noun} found`);
      return;
    }
    console.log(formatTable(items, options.columns));
    console.log(`\nTotal: ${items.length} ${options.noun}`);
  }

  formatError(error: string | Error): void {
    const message = error instanceof Error ? error.message : error;
    console.error(`Error: ${message}`);
  }
}

/**
 * Get the appropriate output adapter based on current configuration.
 */
export function getOutputAdapter(): OutputAdapter {
  switch (outputConfig.format) {
    case 'json':
      return new JsonOutputAdapter();
    default:
      return new DefaultOutputAdapter();
  }
}

// =============================================================================
// Output Functions (delegate to adapters)
// =============================================================================

function getAdapter(): OutputAdapter {
  if (!currentAdapter) {
    currentAdapter = getOutputAdapter();
  }
  return currentAdapter;
}

/**
 * Output data in the configured format.
 */
export function output(data: unknown): void {
  getAdapter().formatData(data);
}

/**
 * Output a list of items as a table, or as a JSON array.
 *
 * @example
 * ```typescript
 * outputList(areas, {
 *   noun: 'areas',
 *   columns: [
 *     { header: 'AREA ID', value: (a) => a.area_id },
 *     { header: 'NAME', value: (a) => a.name },
 *   ],
 * });
 * ```
 */
export function outputList<T>(items: readonly T[], options: ListOptions<T>): void {
  getAdapter().formatList(items, options);
}

/**
 * Output an error.
 */
export function outputError(error: string | Error, code?: string): void {
  getAdapter().formatError(error, code);
}

/**
 * Output a plain line to stdout.
 */
export function outputMessage(message: string): void {
  console.log(message);
}

/**
 * Output a diagnostic line to stderr. Printed only with `--verbose`.
 */
export function outputInfo(message: string): void {
  if (outputConfig.verbose) {
    console.error(message);
  }
}

/**
 * Output a warning line to stderr, regardless of verbosity.
 */
export function outputWarning(message: string): void {
  console.error(`Warning: ${message}`);
}

// =============================================================================
// Table Formatting Utility
// =============================================================================

/** Spaces between adjacent columns. */
const COLUMN_GAP = 2 as const;

/**
 * Cut a cell to `maxWidth`, replacing the tail with `...`.
 */
export function truncate(value: string, maxWidth?: number): string {
  if (maxWidth === undefined || value.length <= maxWidth) return value;
  return `${value.slice(0, Math.max(0, maxWidth - 3))}...`;
}

/**
 * Format rows as an aligned text table with a dashed header underline.
 * The last column is not padded so lines carry no trailing spaces.
 *
 * @example
 * ```
 * AREA ID  NAME
 * -------  ----
 * kitchen  Kitchen
 * ```
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  const cells = rows.map((row) => columns.map((col) => truncate(col.value(row), col.maxWidth)));

  const widths = columns.map((col, i) =>
    cells.reduce((max, row) => Math.max(max, (row[i] ?? '').length), col.header.length)
  );

  const renderRow = (values: readonly string[]): string =>
    values
      .map((value, i) => {
        const width = widths[i] ?? 0;
        const aligned = columns[i]?.align === 'right' ? value.padStart(width) : value;
        return i === values.length - 1 ? aligned : aligned.padEnd(width + COLUMN_GAP);
      })
      .join('')
      .trimEnd();

  const lines = [
    renderRow(columns.map((col) => col.header)),
    renderRow(columns.map((col) => '-'.repeat(col.header.length))),
    ...cells.map(renderRow),
  ];
  return lines.join('\n');
}
