/**
 * slotgraph config — View configuration
 */

import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { loadConfig, localConfigPath } from '../config.js';
import { reportError } from '../cli/report.js';

interface ConfigOptions {
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    const config = await loadConfig();
    const configPath = localConfigPath();

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold('⚙️  slotgraph Configuration'));
    console.log(chalk.dim(`   ${existsSync(configPath) ? configPath : '(defaults)'}`));
    console.log();
    console.log(`  ${chalk.dim('Version:')}      ${config.version}`);
    console.log(`  ${chalk.dim('Save mode:')}    ${config.store.saveMode}`);
    console.log(`  ${chalk.dim('Lazy:')}         ${config.store.lazy ? chalk.green('yes') : 'no'}`);
    console.log(`  ${chalk.dim('Indent:')}       ${config.store.indent}`);
    console.log(`  ${chalk.dim('Max depth:')}    ${config.cli.maxDepth}`);
    if (config.cli.preload.length > 0) {
      console.log(`  ${chalk.dim('Preload:')}`);
      for (const module of config.cli.preload) {
        console.log(`    • ${module}`);
      }
    } else {
      console.log(`  ${chalk.dim('Preload:')}      ${chalk.dim('(none)')}`);
    }
    console.log();
  } catch (err) {
    reportError('Reading config failed', err);
  }
}
