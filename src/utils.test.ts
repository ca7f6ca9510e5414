import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  compareStrings,
  configIdOf,
  findByIdPrefix,
  formatDuration,
  formatEventTime,
  formatTime,
  formatValue,
  matchesPatterns,
  normalizeAutomationID,
  normalizeScriptID,
  parseHelperID,
  parseJsonArray,
  parseJsonObject,
  parseKeyValue,
  parseTimestamp,
  slugify,
} from './utils.js';

describe('slugify', () => {
  it('should lowercase and collapse non-alphanumerics', () => {
    expect(slugify('Movie Night!')).toBe('movie_night');
    expect(slugify('  Good -- Morning  ')).toBe('good_morning');
    expect(slugify('café résumé')).toBe('caf_r_sum');
  });

  it('should return an empty string when nothing survives', () => {
    expect(slugify('!!!')).toBe('');
  });
});

describe('ID normalization', () => {
  it('should strip the domain prefix once', () => {
    expect(normalizeScriptID('script.morning')).toBe('morning');
    expect(normalizeScriptID('morning')).toBe('morning');
    expect(normalizeAutomationID('automation.lights_on')).toBe('lights_on');
    expect(normalizeAutomationID('1700000000000')).toBe('1700000000000');
  });

  it('should read a config ID sent as a string or a number', () => {
    expect(configIdOf({ id: 'abc' })).toBe('abc');
    expect(configIdOf({ id: 1700000000000 })).toBe('1700000000000');
    expect(configIdOf({})).toBe('');
  });
});

describe('parseHelperID', () => {
  it('should split a helper entity ID', () => {
    expect(parseHelperID('input_boolean.guest_mode')).toEqual({
      domain: 'input_boolean',
      objectId: 'guest_mode',
    });
  });

  it('should reject malformed IDs and non-helper domains', () => {
    expect(() => parseHelperID('guest_mode')).toThrow(
      'invalid helper ID format (expected domain.object_id)'
    );
    expect(() => parseHelperID('a.b.c')).toThrow('invalid helper ID format');
    expect(() => parseHelperID('light.kitchen')).toThrow(
      'not a helper entity (must start with input_)'
    );
  });
});

describe('matchesPatterns', () => {
  it('should match exact IDs and trailing wildcards ignoring case', () => {
    expect(matchesPatterns('light.kitchen', ['light.*'])).toBe(true);
    expect(matchesPatterns('Light.Kitchen', ['light.kitchen'])).toBe(true);
    expect(matchesPatterns('light.kitchen', ['*'])).toBe(true);
    expect(matchesPatterns('light.kitchen', ['light'])).toBe(false);
    expect(matchesPatterns('sensor.temp', ['light.*', 'switch.*'])).toBe(false);
  });

  it('should match nothing for an empty pattern list', () => {
    expect(matchesPatterns('light.kitchen', [])).toBe(false);
  });
});

describe('findByIdPrefix', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const items = [{ id: 'abc123' }, { id: 'abc456' }, { id: 'def789' }];

  it('should prefer an exact match and accept a unique prefix', () => {
    expect(findByIdPrefix(items, 'def', () => '')).toBe(items[2]);
    expect(findByIdPrefix([{ id: 'ab' }, { id: 'abc' }], 'ab', () => '')).toEqual({ id: 'ab' });
  });

  it('should report missing and ambiguous IDs', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => findByIdPrefix(items, 'zzz', () => '', 'device')).toThrow(
      'no device found with ID: zzz'
    );
    expect(() => findByIdPrefix(items, 'abc', (i) => `item ${i.id}`)).toThrow(
      'please provide a more specific ID'
    );
    expect(stderr).toHaveBeenCalledWith("Multiple devices match 'abc':");
    expect(stderr).toHaveBeenCalledWith('  abc123  item abc123');
  });
});

describe('JSON arguments', () => {
  it('should parse objects and arrays of objects', () => {
    expect(parseJsonObject('{"a":1}', 'data')).toEqual({ a: 1 });
    expect(parseJsonArray('[{"service":"light.turn_on"}]', 'sequence')).toEqual([
      { service: 'light.turn_on' },
    ]);
  });

  it('should name the argument in errors', () => {
    expect(() => parseJsonObject('[]', 'data')).toThrow('invalid data JSON: expected an object');
    expect(() => parseJsonArray('[1]', 'sequence')).toThrow(
      'invalid sequence JSON: expected an array of objects'
    );
    expect(() => parseJsonObject('{', 'data')).toThrow(/^invalid data JSON: /);
  });
});

describe('parseKeyValue', () => {
  it('should decode JSON values and keep the rest as strings', () => {
    expect(parseKeyValue('brightness=128')).toEqual(['brightness', 128]);
    expect(parseKeyValue('on=true')).toEqual(['on', true]);
    expect(parseKeyValue('unit=°C')).toEqual(['unit', '°C']);
    expect(parseKeyValue('expr=a=b')).toEqual(['expr', 'a=b']);
    expect(parseKeyValue('rgb=[255,0,0]')).toEqual(['rgb', [255, 0, 0]]);
  });

  it('should reject a pair without an equals sign', () => {
    expect(() => parseKeyValue('brightness', '--set')).toThrow(
      'invalid --set format: brightness (expected key=value)'
    );
  });
});

describe('formatValue', () => {
  it('should print strings bare and objects as compact JSON', () => {
    expect(formatValue('on')).toBe('on');
    expect(formatValue(21.5)).toBe('21.5');
    expect(formatValue(null)).toBe('null');
    expect(formatValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });
});

describe('timestamps', () => {
  it('should parse RFC 3339 with or without fractions', () => {
    expect(parseTimestamp('2024-03-01T10:00:00Z')?.toISOString()).toBe(
      '2024-03-01T10:00:00.000Z'
    );
    expect(parseTimestamp('2024-03-01T10:00:00.123456+00:00')?.toISOString()).toBe(
      '2024-03-01T10:00:00.123Z'
    );
  });

  it('should reject date-only and garbage input', () => {
    expect(parseTimestamp('2024-03-01')).toBeNull();
    expect(parseTimestamp('yesterday')).toBeNull();
  });

  it('should pass through values it cannot parse', () => {
    expect(formatTime('')).toBe('');
    expect(formatTime('never')).toBe('never');
    expect(formatEventTime('soon')).toBe('soon');
  });

  it('should format local wall-clock times', () => {
    expect(formatTime('2024-03-01T10:00:00Z')).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(formatEventTime('2024-03-01T10:00:00Z')).toMatch(/^\d{2}:\d{2}:\d{2}$/);
  });
});

describe('formatDuration', () => {
  it('should use milliseconds below one second', () => {
    expect(formatDuration('2024-03-01T10:00:00Z', '2024-03-01T10:00:00.250Z')).toBe('250ms');
  });

  it('should use seconds, minutes and hours above it', () => {
    expect(formatDuration('2024-03-01T10:00:00Z', '2024-03-01T10:00:01.500Z')).toBe('1.5s');
    expect(formatDuration('2024-03-01T10:00:00Z', '2024-03-01T10:01:05Z')).toBe('1m5s');
    expect(formatDuration('2024-03-01T10:00:00Z', '2024-03-01T11:00:02Z')).toBe('1h0m2s');
  });

  it('should be empty when a timestamp is missing or invalid', () => {
    expect(formatDuration('2024-03-01T10:00:00Z', null)).toBe('');
    expect(formatDuration(undefined, '2024-03-01T10:00:00Z')).toBe('');
    expect(formatDuration('bad', '2024-03-01T10:00:00Z')).toBe('');
  });
});

describe('compareStrings', () => {
  it('should order by code unit', () => {
    expect(['b', 'B', 'a'].sort(compareStrings)).toEqual(['B', 'a', 'b']);
  });
});
