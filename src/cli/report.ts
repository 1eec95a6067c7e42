/**
 * Command error reporting
 */

import chalk from 'chalk';

/**
 * Print a failed command's error and exit with status 1. The stack trace is
 * shown when DEBUG is set.
 */
export function reportError(label: string, err: unknown): never {
  console.error();
  console.error(chalk.red(`✗ ${label}`));
  if (err instanceof Error) {
    console.error(chalk.red(`  ${err.message}`));
    if (process.env.DEBUG && err.stack) {
      console.error(chalk.dim(err.stack));
    }
  } else {
    console.error(chalk.red(`  ${String(err)}`));
  }
  process.exit(1);
}
