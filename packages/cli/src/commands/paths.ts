/**
 * netmerge paths
 *
 * List the absolute paths of the named nodes in a document.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  absolutePath,
  localName,
  readDocument,
  walk,
  type MergeDocument,
} from '@netmerge/engine';
import { createCommandLogger, logFullError } from '../logger.js';

export interface PathEntry {
  path: string;
  tag: string;
}

/**
 * Named nodes of `doc` in document order, optionally restricted to one tag
 */
export function listPaths(doc: MergeDocument, tag?: string): PathEntry[] {
  const entries: PathEntry[] = [];
  walk(doc.root, node => {
    if (localName(node) === undefined) return;
    if (tag !== undefined && node.tag !== tag) return;
    const path = absolutePath(node, doc);
    if (path !== null) {
      entries.push({ path, tag: node.tag });
    }
  });
  return entries;
}

export const pathsCommand = new Command('paths')
  .description('List the absolute paths of named nodes in a document')
  .argument('<file>', 'Document to inspect')
  .option('-t, --tag <tag>', 'Only list nodes with this tag')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: { tag?: string; json?: boolean }) => {
    const log = createCommandLogger('paths');
    log.command(`paths ${file}`, { ...options });

    try {
      const entries = listPaths(await readDocument(file), options.tag);

      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      for (const entry of entries) {
        console.log(`${entry.path} ${chalk.gray(entry.tag)}`);
      }
      console.log(chalk.gray(`\n  ${entries.length} path(s)\n`));
    } catch (err) {
      logFullError('paths', err, { file });
      console.log(chalk.red(`\n  ${err instanceof Error ? err.message : String(err)}\n`));
      process.exit(1);
    }
  });
