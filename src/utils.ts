/**
 * Utility functions for the Home Assistant CLI.
 * @module utils
 */

import { errorMessage, HAClientError } from './errors.js';

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Turn a display name into an object ID the way Home Assistant does for new
 * scenes, scripts and automations.
 *
 * @example
 * ```typescript
 * slugify('Movie Night!');  // 'movie_night'
 * slugify('café résumé');   // 'caf_r_sum'
 * ```
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

/** Strip a leading `script.` from a script ID. */
export function normalizeScriptID(input: string): string {
  return input.startsWith('script.') ? input.slice('script.'.length) : input;
}

/** Strip a leading `automation.` from an automation ID. */
export function normalizeAutomationID(input: string): string {
  return input.startsWith('automation.') ? input.slice('automation.'.length) : input;
}

/**
 * Read the `id` attribute of a scene or automation state as a string.
 * The server sends it either as a string or as a number.
 */
export function configIdOf(attributes: Record<string, unknown>): string {
  const id = attributes.id;
  if (typeof id === 'string') return id;
  if (typeof id === 'number') return id.toFixed(0);
  return '';
}

/**
 * Split a helper entity ID into its domain and object ID.
 *
 * @throws {HAClientError} If the ID is not `<input_*>.<object_id>`
 */
export function parseHelperID(entityId: string): { domain: string; objectId: string } {
  const parts = entityId.split('.');
  const [domain, objectId] = parts;
  if (parts.length !== 2 || domain === undefined || objectId === undefined) {
    throw new HAClientError('invalid helper ID format (expected domain.object_id)');
  }
  if (!domain.startsWith('input_')) {
    throw new HAClientError('not a helper entity (must start with input_)');
  }
  return { domain, objectId };
}

// =============================================================================
// Matching
// =============================================================================

/**
 * Check an entity ID against watch patterns.
 * A trailing `*` makes a pattern a prefix match; anything else must match
 * exactly. Comparison ignores case. An empty list matches nothing.
 *
 * @example
 * ```typescript
 * matchesPatterns('light.kitchen', ['light.*']);  // true
 * matchesPatterns('light.kitchen', ['*']);        // true
 * matchesPatterns('light.kitchen', ['light']);    // false
 * ```
 */
export function matchesPatterns(entityId: string, patterns: readonly string[]): boolean {
  const id = entityId.toLowerCase();
  return patterns.some((pattern) => {
    const p = pattern.toLowerCase();
    return p.endsWith('*') ? id.startsWith(p.slice(0, -1)) : id === p;
  });
}

/**
 * Find an item by exact ID, or else by a unique ID prefix.
 * With several prefix matches the candidates are listed on stderr.
 *
 * @param items - Items to search
 * @param id - Full or partial ID
 * @param describe - Label printed next to each ambiguous candidate
 * @param noun - Noun used in the not-found error
 */
export function findByIdPrefix<T extends { readonly id: string }>(
  items: readonly T[],
  id: string,
  describe: (item: T) => string,
  noun = 'device'
): T {
  const exact = items.find((item) => item.id === id);
  if (exact) return exact;

  const matches = items.filter((item) => item.id.startsWith(id));
  const [first] = matches;
  if (first === undefined) {
    throw new HAClientError(`no ${noun} found with ID: ${id}`);
  }
  if (matches.length > 1) {
    console.error(`Multiple ${noun}s match '${id}':`);
    for (const item of matches) {
      console.error(`  ${item.id}  ${describe(item)}`);
    }
    throw new HAClientError('please provide a more specific ID');
  }
  return first;
}

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Parse a JSON command line argument.
 *
 * @param text - Raw flag value
 * @param what - Name used in the error, e.g. `sequence`
 * @throws {HAClientError} If the text is not valid JSON
 */
export function parseJsonArg(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = errorMessage(err);
    throw new HAClientError(`invalid ${what} JSON: ${reason}`, undefined, { cause: err });
  }
}

/**
 * Parse a JSON argument that must be an array of objects.
 */
export function parseJsonArray(text: string, what: string): Record<string, unknown>[] {
  const value = parseJsonArg(text, what);
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new HAClientError(`invalid ${what} JSON: expected an array of objects`);
  }
  return value;
}

/**
 * Parse a JSON argument that must be an object.
 */
export function parseJsonObject(text: string, what: string): Record<string, unknown> {
  const value = parseJsonArg(text, what);
  if (!isRecord(value)) {
    throw new HAClientError(`invalid ${what} JSON: expected an object`);
  }
  return value;
}

/**
 * Split `key=value` at the first `=`. The value is JSON-decoded when it is
 * valid JSON and kept as a string otherwise.
 *
 * @example
 * ```typescript
 * parseKeyValue('brightness=128');   // ['brightness', 128]
 * parseKeyValue('unit=°C');          // ['unit', '°C']
 * parseKeyValue('expr=a=b');         // ['expr', 'a=b']
 * ```
 */
export function parseKeyValue(pair: string, flag = 'attribute'): [string, unknown] {
  const index = pair.indexOf('=');
  if (index === -1) {
    throw new HAClientError(`invalid ${flag} format: ${pair} (expected key=value)`);
  }
  const key = pair.slice(0, index);
  const raw = pair.slice(index + 1);
  try {
    return [key, JSON.parse(raw)];
  } catch {
    return [key, raw];
  }
}

/**
 * Render an attribute or example value on one line: strings as they are,
 * objects and arrays as compact JSON.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/** Type guard for plain JSON objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Time Formatting
// =============================================================================

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse a full RFC 3339 timestamp. Returns null for anything else,
 * including date-only strings that `Date` would otherwise accept.
 */
export function parseTimestamp(text: string): Date | null {
  const match = RFC3339.exec(text);
  if (!match) return null;
  const fraction = (match[2] ?? '').slice(0, 4);
  const date = new Date(`${match[1] ?? ''}${fraction}${match[3] ?? ''}`);
  return Number.isNaN(date.getTime()) ? null : date;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a timestamp as local `YYYY-MM-DD HH:MM:SS`.
 * Input that is not RFC 3339 is returned unchanged.
 */
export function formatTime(timestamp: string): string {
  const d = parseTimestamp(timestamp);
  if (!d) return timestamp;
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  return `${date} ${formatClock(d)}`;
}

/**
 * Format a timestamp as local `HH:MM:SS`.
 * Input that is not RFC 3339 is returned unchanged.
 */
export function formatEventTime(timestamp: string): string {
  const d = parseTimestamp(timestamp);
  return d ? formatClock(d) : timestamp;
}

function formatClock(d: Date): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/**
 * Format the time between two timestamps.
 * Below one second the result is in milliseconds (`250ms`); above it reads
 * like `1.5s`, `1m5s` or `1h0m2s`. Empty when either timestamp is missing or
 * invalid.
 */
export function formatDuration(start?: string | null, finish?: string | null): string {
  if (!start || !finish) return '';
  const s = parseTimestamp(start);
  const f = parseTimestamp(finish);
  if (!s || !f) return '';

  const ms = f.getTime() - s.getTime();
  if (ms < 1000) return `${ms}ms`;

  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = (ms % 60_000) / 1000;

  let out = '';
  if (hours > 0) out += `${hours}h`;
  if (hours > 0 || minutes > 0) out += `${minutes}m`;
  return `${out}${Number(seconds.toFixed(3))}s`;
}

// =============================================================================
// Sorting
// =============================================================================

/**
 * Code-unit string comparison, for sort orders that must not depend on the
 * runtime locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
