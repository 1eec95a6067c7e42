/**
 * slotgraph dump — Print the graph stored in a store as JSON
 */

import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadConfig } from '../config.js';
import { reportError } from '../cli/report.js';
import { toJSONValue, type JsonValue } from '../serialize/json.js';
import { serialize } from '../serialize/serializer.js';
import { StoreFile } from '../store/file.js';
import { load, readStructure, withSession } from '../store/mapper.js';

interface DumpOptions {
  json?: boolean;
  raw?: boolean;
  lazy?: boolean;
  require?: string[];
}

export interface DumpStoreOptions {
  /** Show composite and dataset tags as stored instead of resolving them. */
  raw?: boolean;
  /** Read array leaves through a lazy session. */
  lazy?: boolean;
}

/**
 * Import modules for their side effects, so the composite, primitive and
 * dataset types they define are registered before loading.
 */
export async function preloadModules(modules: readonly string[], cwd: string = process.cwd()): Promise<void> {
  for (const specifier of modules) {
    const target = specifier.startsWith('.') || specifier.startsWith('/')
      ? pathToFileURL(resolve(cwd, specifier)).href
      : specifier;
    await import(target);
  }
}

/**
 * JSON view of a store.
 */
export function dumpStore(path: string, options: DumpStoreOptions = {}): JsonValue {
  if (options.raw) {
    const file = StoreFile.open(path, 'r');
    try {
      return toJSONValue(readStructure(file));
    } finally {
      file.close();
    }
  }
  if (options.lazy) {
    return withSession(path, 'r', (session) => toJSONValue(serialize(session.value)));
  }
  return toJSONValue(serialize(load(path)));
}

export async function dumpCommand(store: string, options: DumpOptions): Promise<void> {
  try {
    const config = await loadConfig();
    const modules = [...config.cli.preload, ...(options.require ?? [])];

    if (modules.length > 0) {
      const spinner = options.json ? null : ora(`Loading ${modules.length} module(s)...`).start();
      try {
        await preloadModules(modules);
        spinner?.succeed(`Loaded ${modules.length} module(s)`);
      } catch (err) {
        spinner?.fail('Module preload failed');
        throw err;
      }
    }

    const view = dumpStore(store, { raw: options.raw, lazy: options.lazy ?? config.store.lazy });
    const output = JSON.stringify(view, null, 2);
    if (options.json) {
      console.log(output);
      return;
    }

    console.log();
    console.log(chalk.bold(`📦 ${resolve(store)}`));
    console.log();
    console.log(output);
    console.log();
  } catch (err) {
    reportError('Dump failed', err);
  }
}
