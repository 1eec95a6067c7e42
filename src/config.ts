/**
 * slotgraph Configuration
 *
 * Manages .slotgraph/config.json in the current project directory.
 * Also supports global config at ~/.slotgraph/config.json.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

/** Directory name for local slotgraph config */
export const CONFIG_DIR = '.slotgraph';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global slotgraph home directory */
export const GLOBAL_CONFIG_DIR = join(homedir(), '.slotgraph');

export const ConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  store: z
    .object({
      /** Open mode used by `save` when none is given */
      saveMode: z.enum(['w', 'a', 'r+']).default('w'),
      /** Open stores lazily in commands that support it */
      lazy: z.boolean().default(false),
      /** JSON indentation of store headers */
      indent: z.number().int().min(0).max(8).default(2),
    })
    .default({}),
  cli: z
    .object({
      /** Depth limit of `inspect` */
      maxDepth: z.number().int().positive().default(8),
      /** Modules imported before `dump` so their types register */
      preload: z.array(z.string()).default([]),
    })
    .default({}),
});

export type SlotGraphConfig = z.infer<typeof ConfigSchema>;

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): SlotGraphConfig {
  return ConfigSchema.parse({});
}

/**
 * Validate a raw config object, filling in defaults.
 */
export function parseConfig(raw: unknown, source = 'config'): SlotGraphConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${details}`);
  }
  return result.data;
}

/**
 * Resolve the local .slotgraph directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), CONFIG_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Load the config from the local .slotgraph/ directory.
 * Falls back to global config if local doesn't exist.
 */
export async function loadConfig(cwd?: string, globalDir: string = GLOBAL_CONFIG_DIR): Promise<SlotGraphConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(globalDir, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        throw new Error(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return parseConfig(parsed, configPath);
    }
  }

  return defaultConfig();
}

/**
 * Save the config to the local .slotgraph/ directory.
 */
export async function saveConfig(config: SlotGraphConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
