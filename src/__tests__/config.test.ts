/**
 * Tests for configuration loading and validation
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ConfigManager } from '../config/manager.js';
import { DEFAULT_CONFIG, mergeConfigs, validateConfig } from '../config/schema.js';

describe('validateConfig', () => {
  test('accepts an empty object', () => {
    expect(validateConfig({})).toBe(true);
  });

  test('accepts a complete config', () => {
    expect(
      validateConfig({ settingsFile: 'repos.txt', tabWidth: 8, indentMode: 'strict' })
    ).toBe(true);
  });

  test('rejects non-objects', () => {
    expect(validateConfig(null)).toBe(false);
    expect(validateConfig('settings.txt')).toBe(false);
    expect(validateConfig([])).toBe(false);
  });

  test('rejects invalid field values', () => {
    expect(validateConfig({ settingsFile: '' })).toBe(false);
    expect(validateConfig({ tabWidth: 0 })).toBe(false);
    expect(validateConfig({ tabWidth: 2.5 })).toBe(false);
    expect(validateConfig({ tabWidth: '4' })).toBe(false);
    expect(validateConfig({ indentMode: 'loose' })).toBe(false);
  });
});

describe('mergeConfigs', () => {
  test('override wins only where it sets a value', () => {
    expect(mergeConfigs(DEFAULT_CONFIG, { tabWidth: 2, settingsFile: undefined })).toEqual({
      settingsFile: 'settings.txt',
      tabWidth: 2,
      indentMode: 'lenient',
    });
  });
});

describe('ConfigManager', () => {
  let dir: string;
  let warnings: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'repotree-config-'));
    warnings = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const manager = () => new ConfigManager(dir, (message) => warnings.push(message));

  test('returns defaults when there is no config file', async () => {
    const config = await manager().load();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  test('reads values from .repotree.json', async () => {
    await writeFile(join(dir, '.repotree.json'), JSON.stringify({ tabWidth: 2, indentMode: 'strict' }));

    const config = await manager().load();

    expect(config).toEqual({ settingsFile: 'settings.txt', tabWidth: 2, indentMode: 'strict' });
  });

  test('overrides take precedence over the file', async () => {
    await writeFile(join(dir, '.repotree.json'), JSON.stringify({ settingsFile: 'a.txt', tabWidth: 2 }));

    const config = await manager().load({ settingsFile: 'b.txt' });

    expect(config).toEqual({ settingsFile: 'b.txt', tabWidth: 2, indentMode: 'lenient' });
  });

  test('warns and falls back to defaults on malformed JSON', async () => {
    await writeFile(join(dir, '.repotree.json'), '{ not json');

    const config = await manager().load({ tabWidth: 3 });

    expect(config).toEqual({ ...DEFAULT_CONFIG, tabWidth: 3 });
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith('Failed to parse .repotree.json: ')).toBe(true);
    expect(warnings[0].endsWith(', using defaults')).toBe(true);
  });

  test('warns and falls back to defaults on an invalid config', async () => {
    await writeFile(join(dir, '.repotree.json'), JSON.stringify({ tabWidth: -1 }));

    const config = await manager().load();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual(['Invalid .repotree.json format, using defaults']);
  });
});
