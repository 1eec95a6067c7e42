/**
 * slotgraph types — List registered composite, primitive and dataset types
 */

import chalk from 'chalk';
import { reportError } from '../cli/report.js';
import { listComposites, listDatasets, listPrimitives } from '../registry/index.js';
import { slotTable } from '../slots/composite.js';
import { preloadModules } from './dump.js';

interface TypesOptions {
  json?: boolean;
  require?: string[];
}

export interface TypeListing {
  composites: Array<{ name: string; slots: string[] }>;
  primitives: string[];
  datasets: string[];
}

export function listTypes(): TypeListing {
  return {
    composites: listComposites().map(({ name, type }) => ({ name, slots: [...slotTable(type).keys()] })),
    primitives: listPrimitives().map((entry) => entry.name),
    datasets: listDatasets().map((entry) => entry.name),
  };
}

export async function typesCommand(options: TypesOptions): Promise<void> {
  try {
    await preloadModules(options.require ?? []);
    const listing = listTypes();

    if (options.json) {
      console.log(JSON.stringify(listing, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold('🧩 Registered types'));
    console.log();
    console.log(`  ${chalk.dim('Composites:')}`);
    if (listing.composites.length === 0) {
      console.log(chalk.dim('    (none; load your modules with --require)'));
    }
    for (const composite of listing.composites) {
      console.log(`    • ${chalk.cyan(composite.name)} ${chalk.dim(`(${composite.slots.join(', ')})`)}`);
    }
    console.log(`  ${chalk.dim('Primitives:')}  ${listing.primitives.join(', ')}`);
    console.log(`  ${chalk.dim('Datasets:')}    ${listing.datasets.join(', ')}`);
    console.log();
  } catch (err) {
    reportError('Listing types failed', err);
  }
}
