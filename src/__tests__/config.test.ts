/**
 * Config Tests
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, loadConfig, localConfigPath, parseConfig, saveConfig } from '../config.js';

describe('config', () => {
  let cwd: string;
  let globalDir: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'slotgraph-config-cwd-'));
    globalDir = await mkdtemp(join(tmpdir(), 'slotgraph-config-home-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
    await rm(globalDir, { recursive: true, force: true });
  });

  it('fills in every default', () => {
    expect(defaultConfig()).toEqual({
      version: '0.1.0',
      store: { saveMode: 'w', lazy: false, indent: 2 },
      cli: { maxDepth: 8, preload: [] },
    });
  });

  it('keeps given values and defaults the rest', () => {
    const config = parseConfig({ store: { lazy: true }, cli: { preload: ['./types.js'] } });
    expect(config.store).toEqual({ saveMode: 'w', lazy: true, indent: 2 });
    expect(config.cli).toEqual({ maxDepth: 8, preload: ['./types.js'] });
  });

  it('names the source and path of invalid settings', () => {
    expect(() => parseConfig({ store: { saveMode: 'r' } }, 'test.json')).toThrow('Invalid test.json: store.saveMode:');
    expect(() => parseConfig({ store: { indent: 12 } })).toThrow('Invalid config: store.indent:');
  });

  it('falls back to defaults without any config file', async () => {
    expect(await loadConfig(cwd, globalDir)).toEqual(defaultConfig());
  });

  it('reads the global config when there is no local one', async () => {
    await writeFile(join(globalDir, 'config.json'), JSON.stringify({ cli: { maxDepth: 3 } }));
    const config = await loadConfig(cwd, globalDir);
    expect(config.cli.maxDepth).toBe(3);
  });

  it('prefers the local config over the global one', async () => {
    await writeFile(join(globalDir, 'config.json'), JSON.stringify({ cli: { maxDepth: 3 } }));
    const local = defaultConfig();
    local.store.indent = 4;
    await saveConfig(local, cwd);

    const config = await loadConfig(cwd, globalDir);
    expect(config.store.indent).toBe(4);
    expect(config.cli.maxDepth).toBe(8);

    const written = await readFile(localConfigPath(cwd), 'utf-8');
    expect(written.endsWith('}\n')).toBe(true);
  });

  it('rejects malformed JSON', async () => {
    await mkdir(join(cwd, '.slotgraph'), { recursive: true });
    await writeFile(localConfigPath(cwd), '{');
    await expect(loadConfig(cwd, globalDir)).rejects.toThrow(`Invalid JSON in ${localConfigPath(cwd)}`);
  });
});
