/**
 * ftl-check configuration parsing and loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../../src/index.js';

describe('createDefaultConfig', () => {
  it('enables every rule at its own severity', () => {
    expect(createDefaultConfig()).toEqual({
      rules: {
        'syntax-error': 'on',
        'duplicate-id': 'on',
        'undefined-message-reference': 'on',
        'undefined-term-reference': 'on',
        'circular-reference': 'on',
        'unused-term': 'on',
      },
      severity: {
        'syntax-error': 'error',
        'duplicate-id': 'warning',
        'undefined-message-reference': 'warning',
        'undefined-term-reference': 'warning',
        'circular-reference': 'warning',
        'unused-term': 'info',
      },
    });
  });
});

describe('parseConfig', () => {
  it('merges settings over the defaults', () => {
    const config = parseConfig({
      rules: { 'unused-term': 'off' },
      severity: { 'circular-reference': 'error' },
    });

    expect(config.rules['unused-term']).toBe('off');
    expect(config.rules['duplicate-id']).toBe('on');
    expect(config.severity['circular-reference']).toBe('error');
    expect(config.severity['unused-term']).toBe('info');
  });

  it('accepts an empty object', () => {
    expect(parseConfig({})).toEqual(createDefaultConfig());
  });

  it.each([
    [null, 'Invalid configuration: must be an object'],
    [[], 'Invalid configuration: must be an object'],
    [{ rules: [] }, 'Invalid configuration: rules must be an object'],
    [{ rules: { nope: 'on' } }, 'Invalid configuration: unknown rule nope'],
    [
      { rules: { 'unused-term': 'maybe' } },
      `Invalid configuration: rule unused-term has invalid state "maybe" (must be 'on', 'off', or 'warn')`,
    ],
    [
      { severity: { 'unused-term': 'fatal' } },
      `Invalid configuration: rule unused-term has invalid severity "fatal" (must be 'error', 'warning', or 'info')`,
    ],
  ])('rejects %j', (data, message) => {
    expect(() => parseConfig(data)).toThrow(message);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ftl-check-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null without a configuration file', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('reads the configuration file', () => {
    writeFileSync(
      join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ rules: { 'duplicate-id': 'warn' } })
    );

    expect(loadConfig(dir)?.rules['duplicate-id']).toBe('warn');
  });

  it('rejects invalid JSON', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '{ rules: ');

    expect(() => loadConfig(dir)).toThrow(/^Invalid configuration: invalid JSON \(/);
  });
});
