/**
 * netmerge merge
 *
 * Merge the packages a plan lists into the destination document.
 * Any strict clash or missing source package aborts before anything is written.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { formatClashes, MergeStepError, NetmergeError, type MergeResult } from '@netmerge/engine';
import { loadPlan, PlanError } from '../plan.js';
import { runMergePlan } from '../runner.js';
import { createCommandLogger, logFullError } from '../logger.js';

interface MergeCommandOptions {
  output?: string;
  dryRun?: boolean;
  json?: boolean;
}

export const mergeCommand = new Command('merge')
  .description('Merge source documents into a destination as described by a merge plan')
  .argument('<plan>', 'Path to the merge plan (JSON)')
  .option('-o, --output <file>', 'Output file (overrides the plan)')
  .option('--dry-run', 'Merge and report without writing the output')
  .option('--json', 'Print the merge summary as JSON')
  .action(async (planPath: string, options: MergeCommandOptions) => {
    const log = createCommandLogger('merge');
    log.command(`merge ${planPath}`, { ...options });

    const spinner = options.json ? undefined : ora('Loading merge plan...').start();

    try {
      const plan = await loadPlan(planPath);
      const result = await runMergePlan(plan, {
        output: options.output ? path.resolve(options.output) : undefined,
        dryRun: options.dryRun,
        logger: log,
        onLoad: file => {
          if (spinner) spinner.text = `Loading ${path.relative(process.cwd(), file)}...`;
        },
      });

      if (options.json) {
        console.log(JSON.stringify(summarize(result.merge, result.output, result.written), null, 2));
        if (!result.success) process.exit(1);
        return;
      }

      const report = formatClashes(result.merge.clashes);

      if (!result.success) {
        spinner?.fail('Merge failed');
        console.log('');
        console.log(chalk.red(report));
        console.log(chalk.red('\n  Destination not written.\n'));
        process.exit(1);
      }

      spinner?.succeed(result.written ? `Merged into ${result.output}` : 'Merge complete (dry run)');

      if (report) {
        console.log('');
        console.log(chalk.yellow(report));
      }

      console.log('');
      console.log(chalk.gray(`  Relocated references: ${result.merge.relocation.rewritten}`));
      console.log(chalk.gray(`  Repaired identities:  ${result.merge.identities.length}`));
      if (options.dryRun) {
        console.log(chalk.cyan(`\n  Dry run - would write ${result.output}`));
      }
      console.log('');
    } catch (err) {
      spinner?.fail('Merge failed');
      logFullError('merge', err, { plan: planPath });
      printError(err);
      process.exit(1);
    }
  });

/**
 * Machine-readable summary of a run
 */
export function summarize(merge: MergeResult, output: string, written: boolean) {
  return {
    success: merge.success,
    output,
    written,
    strictClashes: merge.clashes.strict,
    gracefulClashes: merge.clashes.graceful,
    missingSources: merge.clashes.missingSources,
    relocated: merge.relocation.rewritten,
    unmappedReferences: merge.relocation.unmapped.length,
    identities: merge.identities.map(({ previous, next }) => ({ previous, next })),
  };
}

function printError(err: unknown): void {
  if (err instanceof PlanError) {
    console.log(chalk.red(`\n  ${err.message}\n`));
    return;
  }
  if (err instanceof MergeStepError) {
    console.log(chalk.red(`\n  ${err.message}`));
    console.log(chalk.gray(`  source: ${err.source}`));
    console.log(chalk.gray(`  package: ${err.pkg}\n`));
    return;
  }
  if (err instanceof NetmergeError) {
    console.log(chalk.red(`\n  [${err.code}] ${err.message}\n`));
    return;
  }
  console.log(chalk.red(`\n  ${err instanceof Error ? err.message : String(err)}\n`));
}
