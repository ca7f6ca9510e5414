import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommanderError, InvalidArgumentError } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { collect, createProgram, parseInteger, parseNumber, VERSION } from './cli.js';
import { isJsonOutput, setOutputConfig } from './output.js';
import { captureOutput } from './testing/context.js';
import { state } from './testing/fixtures.js';
import { TEST_URL, mockFetch } from './testing/rest-mock.js';
import { TEST_TOKEN } from './testing/ws-mock.js';

const MISSING_CONFIG = join(tmpdir(), 'hass-cli-test-missing', 'config.yaml');

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(['node', 'hass-cli', ...args]);
}

describe('option parsers', () => {
  it('should collect repeated values', () => {
    expect(collect('a')).toEqual(['a']);
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });

  it('should parse integers', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger(' -3 ')).toBe(-3);
    expect(() => parseInteger('4.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('ten')).toThrow('invalid integer: ten');
  });

  it('should parse numbers', () => {
    expect(parseNumber('0.5')).toBe(0.5);
    expect(parseNumber('-10')).toBe(-10);
    expect(() => parseNumber('')).toThrow('invalid number: ');
    expect(() => parseNumber('Infinity')).toThrow('invalid number: Infinity');
  });
});

describe('createProgram', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    setOutputConfig({ format: 'human', verbose: false });
  });

  it('should print the version', async () => {
    const out = captureOutput();

    await run('version');

    expect(out.stdout).toEqual([`hass-cli version ${VERSION}`]);
  });

  it('should pass operands, options and global flags to the handler', async () => {
    const requests = mockFetch({
      'POST /api/services/light/turn_on': () => [state('light.kitchen', 'on')],
    });
    const out = captureOutput();

    await run(
      'call',
      'light.turn_on',
      '-e',
      'light.kitchen',
      '-s',
      'brightness=128',
      '-s',
      'effect=colorloop',
      '--url',
      TEST_URL,
      '--token',
      TEST_TOKEN,
      '--config',
      MISSING_CONFIG,
      '--json'
    );

    expect(requests[0]?.body).toEqual({
      entity_id: 'light.kitchen',
      brightness: 128,
      effect: 'colorloop',
    });
    expect(isJsonOutput()).toBe(true);
    expect(JSON.parse(out.stdout.join('\n'))).toMatchObject({ success: true });
  });

  it('should reject unknown commands without exiting', async () => {
    await expect(run('frobnicate')).rejects.toMatchObject({
      code: 'commander.unknownCommand',
    });
  });

  it('should reject a malformed timeout', async () => {
    const err: unknown = await run('--timeout', 'soon', 'version').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommanderError);
    expect(err).toMatchObject({ code: 'commander.invalidArgument' });
    expect(String(err)).toContain('invalid integer: soon');
  });

  it('should report a missing operand', async () => {
    await expect(run('state', 'get')).rejects.toMatchObject({
      code: 'commander.missingArgument',
    });
  });
});
