#!/usr/bin/env node

/**
 * slotgraph CLI
 *
 * Look inside object-graph stores.
 *
 * Usage:
 *   slotgraph inspect <store>          Show the group/attribute/array tree
 *   slotgraph dump <store>             Print the stored graph as JSON
 *   slotgraph import <json> <store>    Write a JSON dump into a store
 *   slotgraph types                    List registered types
 *   slotgraph config                   View configuration
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  inspectCommand,
  dumpCommand,
  importCommand,
  typesCommand,
  configCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('slotgraph')
  .description('Inspect and convert object-graph stores.')
  .version(version);

// ─── slotgraph inspect ───────────────────────────────────────

program
  .command('inspect <store>')
  .description('Show the groups, attributes and array leaves of a store')
  .option('-d, --depth <n>', 'Maximum group depth to expand')
  .action(inspectCommand);

// ─── slotgraph dump ──────────────────────────────────────────

program
  .command('dump <store>')
  .description('Load a store and print its graph as JSON')
  .option('--json', 'Print only the JSON document')
  .option('--raw', 'Print the stored structure without resolving types')
  .option('--lazy', 'Read array leaves through a lazy session')
  .option('-r, --require <modules...>', 'Modules to import first so their types register')
  .action(dumpCommand);

// ─── slotgraph import ────────────────────────────────────────

program
  .command('import <json> <store>')
  .description('Write a JSON document printed by `dump --raw` into a store')
  .option('-m, --mode <mode>', 'Open mode: w, a or r+ (default from config)')
  .action(importCommand);

// ─── slotgraph types ─────────────────────────────────────────

program
  .command('types')
  .description('List registered composite, primitive and dataset types')
  .option('--json', 'Output as JSON')
  .option('-r, --require <modules...>', 'Modules to import first so their types register')
  .action(typesCommand);

// ─── slotgraph config ────────────────────────────────────────

program
  .command('config')
  .description('View configuration')
  .option('--json', 'Output as JSON')
  .action(configCommand);

program.parse();
