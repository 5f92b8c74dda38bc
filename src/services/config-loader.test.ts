import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../utils/errors';
import { loadConfig, mergeConfig, parseConfig } from './config-loader';

describe('config-loader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-loader-'));
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  it('loads the bundled defaults', async () => {
    const config = await loadConfig();
    expect(Array.from(config.characterSets.upper)).toHaveLength(26);
    expect(Array.from(config.characterSets.lower)).toHaveLength(26);
    expect(config.characterSets.digit).toBe('0123456789');
    expect(Array.from(config.characterSets.symbol)).toHaveLength(32);
    expect(config.extraction.threshold).toBe(140);
    expect(config.font.unitsPerEm).toBe(1000);
    expect(config.scale.characters.g).toEqual({ verticalOffset: -210 });
  });

  it('merges a configuration file over the defaults', async () => {
    const file = path.join(dir, 'custom.json');
    await fs.writeJson(file, { extraction: { threshold: 120 }, layout: { columns: 10 } });

    const config = await loadConfig({ configPath: file });
    expect(config.extraction).toEqual({ threshold: 120, safetyMargin: 2, minInkPixels: 12 });
    expect(config.layout.columns).toBe(10);
    expect(config.layout.cellWidth).toBe(120);
  });

  it('adds character overrides to the scale table', async () => {
    const file = path.join(dir, 'overrides.json');
    await fs.writeJson(file, { x: { verticalOffset: -5 }, g: { scaleFactor: 4 } });

    const config = await loadConfig({ characterOverridesPath: file });
    expect(config.scale.characters.x).toEqual({ verticalOffset: -5 });
    expect(config.scale.characters.g).toEqual({ verticalOffset: -210, scaleFactor: 4 });
  });

  it('rejects a threshold that would count template labels as ink', async () => {
    const file = path.join(dir, 'bright.json');
    await fs.writeJson(file, { extraction: { threshold: 200 } });
    await expect(loadConfig({ configPath: file })).rejects.toThrow(/extraction\.threshold/);
  });

  it('rejects whitespace in a character set', async () => {
    const file = path.join(dir, 'spaced.json');
    await fs.writeJson(file, { characterSets: { symbol: '! ' } });
    await expect(loadConfig({ configPath: file })).rejects.toThrow(/characterSets\.symbol: must not contain whitespace/);
  });

  it('rejects malformed overrides', async () => {
    const file = path.join(dir, 'bad-overrides.json');
    await fs.writeJson(file, { xy: { scaleFactor: 2 } });
    await expect(loadConfig({ characterOverridesPath: file })).rejects.toBeInstanceOf(ConfigError);
  });

  it('reports a missing file with its path', async () => {
    const file = path.join(dir, 'missing.json');
    const error = await loadConfig({ configPath: file }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.context.path).toBe(file);
  });

  it('reports unparseable JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "layout": ');
    await expect(loadConfig({ configPath: file })).rejects.toBeInstanceOf(ConfigError);
  });

  it('lists every invalid field', () => {
    expect(() => parseConfig({}, 'inline')).toThrow(ConfigError);
    expect(() => parseConfig({}, 'inline')).toThrow(/characterSets: Required/);
  });

  describe('mergeConfig', () => {
    it('merges objects key by key and replaces everything else', () => {
      expect(mergeConfig({ a: { b: 1, c: [1, 2] }, d: 'x' }, { a: { c: [3] }, e: true })).toEqual({ a: { b: 1, c: [3] }, d: 'x', e: true });
    });

    it('keeps the base for an undefined overlay', () => {
      expect(mergeConfig({ a: 1 }, undefined)).toEqual({ a: 1 });
    });
  });
});
