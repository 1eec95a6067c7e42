/**
 * slotgraph import — Write a JSON view (as printed by `dump`) into a store
 */

import chalk from 'chalk';
import ora from 'ora';
import { readFile } from 'node:fs/promises';
import { loadConfig } from '../config.js';
import { reportError } from '../cli/report.js';
import { fromJSONValue, type JsonValue } from '../serialize/json.js';
import { StoreFile, isOpenMode, type OpenMode, type StoreOptions } from '../store/file.js';
import { writeStructure } from '../store/mapper.js';

interface ImportOptions {
  mode?: string;
}

/**
 * Store a JSON view verbatim. Type tags are written as they appear; they
 * are resolved only when the store is loaded.
 */
export function importJSON(json: JsonValue, store: string, mode: OpenMode, options: StoreOptions = {}): void {
  const file = StoreFile.open(store, mode, options);
  try {
    writeStructure(file, fromJSONValue(json));
  } finally {
    file.close();
  }
}

export async function importCommand(source: string, store: string, options: ImportOptions): Promise<void> {
  try {
    const config = await loadConfig();
    const mode = options.mode ?? config.store.saveMode;
    if (!isOpenMode(mode) || mode === 'r') {
      throw new Error(`Invalid mode "${mode}" (use w, a or r+)`);
    }

    const spinner = ora(`Importing ${source}...`).start();
    try {
      const json: JsonValue = JSON.parse(await readFile(source, 'utf-8'));
      importJSON(json, store, mode, { indent: config.store.indent });
    } catch (err) {
      spinner.fail('Import failed');
      throw err;
    }
    spinner.succeed(`Imported into ${chalk.cyan(store)}`);
  } catch (err) {
    reportError('Import failed', err);
  }
}
