/**
 * slotgraph inspect — Show the group/attribute/array tree of a store
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { reportError } from '../cli/report.js';
import { CONTAINER_KEY, DATASET_KEY, TYPE_KEY } from '../serialize/keys.js';
import { StoreFile, type GroupNode } from '../store/file.js';

interface InspectOptions {
  depth?: string;
}

function groupLabel(group: GroupNode): string {
  const tag = group.getAttribute(TYPE_KEY);
  if (typeof tag === 'string') return ` <${tag}>`;
  const container = group.getAttribute(CONTAINER_KEY);
  return typeof container === 'string' ? ` [${container}]` : '';
}

/**
 * Plain-text outline of a store, two spaces of indent per level. Groups
 * deeper than `maxDepth` are collapsed to "…".
 */
export function describeStore(root: GroupNode, maxDepth = 8): string[] {
  const lines = [`/${groupLabel(root)}`];

  const walk = (group: GroupNode, depth: number): void => {
    const indent = '  '.repeat(depth);
    for (const [name, value] of group.attributes()) {
      if (name === TYPE_KEY || name === CONTAINER_KEY) continue;
      lines.push(`${indent}${name} = ${JSON.stringify(value)}`);
    }
    for (const name of group.keys()) {
      if (group.kindOf(name) === 'array') {
        const leaf = group.array(name);
        const tag = leaf.getAttribute(DATASET_KEY);
        lines.push(`${indent}${name}: ${leaf.dtype}[${leaf.shape.join(', ')}]${typeof tag === 'string' ? ` <${tag}>` : ''}`);
        continue;
      }
      const child = group.group(name);
      lines.push(`${indent}${name}/${groupLabel(child)}`);
      if (depth >= maxDepth) {
        lines.push(`${indent}  …`);
      } else {
        walk(child, depth + 1);
      }
    }
  };

  walk(root, 1);
  return lines;
}

export async function inspectCommand(store: string, options: InspectOptions): Promise<void> {
  try {
    const config = await loadConfig();
    const maxDepth = options.depth ? parseInt(options.depth, 10) : config.cli.maxDepth;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new Error(`Invalid depth: ${options.depth}`);
    }

    const file = StoreFile.open(store, 'r');
    try {
      console.log();
      console.log(chalk.bold(`📦 ${file.path}`));
      console.log();
      for (const line of describeStore(file.root, maxDepth)) {
        console.log(`  ${line}`);
      }
      console.log();
    } finally {
      file.close();
    }
  } catch (err) {
    reportError('Inspect failed', err);
  }
}
