/**
 * netmerge check
 *
 * Validate that every reference in a document resolves to a node of the
 * expected type.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  collectReferences,
  collectIdentities,
  IDENTITY_ATTRIBUTE,
  readDocument,
  validateReferences,
  type MergeDocument,
  type ReferenceIssue,
} from '@netmerge/engine';
import { createCommandLogger, logFullError } from '../logger.js';

export interface CheckResult {
  references: number;
  issues: ReferenceIssue[];
  /** Identity values carried by more than one node */
  duplicateIdentities: string[];
}

export function checkDocument(doc: MergeDocument): CheckResult {
  const refs = collectReferences(doc.root);

  const counts = new Map<string, number>();
  for (const node of collectIdentities(doc.root)) {
    const identity = node.attributes[IDENTITY_ATTRIBUTE];
    counts.set(identity, (counts.get(identity) ?? 0) + 1);
  }

  return {
    references: refs.length,
    issues: validateReferences(doc, refs),
    duplicateIdentities: [...counts].filter(([, count]) => count > 1).map(([identity]) => identity),
  };
}

export const checkCommand = new Command('check')
  .description('Check that references resolve and identities are unique')
  .argument('<file>', 'Document to check')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: { json?: boolean }) => {
    const log = createCommandLogger('check');
    log.command(`check ${file}`, { ...options });

    try {
      const result = checkDocument(await readDocument(file));
      const valid = result.issues.length === 0 && result.duplicateIdentities.length === 0;

      if (options.json) {
        console.log(JSON.stringify({ valid, ...result }, null, 2));
      } else if (valid) {
        console.log(chalk.green(`\n  ✓ ${result.references} reference(s) checked, no issues\n`));
      } else {
        console.log('');
        for (const issue of result.issues) {
          console.log(chalk.red(`  - ${issue.holder}: ${issue.message}`));
        }
        for (const identity of result.duplicateIdentities) {
          console.log(chalk.red(`  - duplicate identity ${identity}`));
        }
        console.log('');
      }

      if (!valid) {
        log.warn(`${result.issues.length} reference issue(s), ${result.duplicateIdentities.length} duplicate identities`);
        process.exit(1);
      }
    } catch (err) {
      logFullError('check', err, { file });
      console.log(chalk.red(`\n  ${err instanceof Error ? err.message : String(err)}\n`));
      process.exit(1);
    }
  });
