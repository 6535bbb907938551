/**
 * Runs a merge plan: load documents, merge, write the destination
 */

import {
  mergeDocuments,
  readDocument,
  silentLogger,
  writeDocument,
  type MergeInput,
  type MergeLogger,
  type MergeResult,
} from '@netmerge/engine';
import type { MergePlan } from './plan.js';

export interface RunOptions {
  /** Overrides the plan's output file */
  output?: string;
  /** Merge without writing */
  dryRun?: boolean;
  logger?: MergeLogger;
  /** Called before each document is read */
  onLoad?: (file: string) => void;
}

export interface RunResult {
  success: boolean;
  merge: MergeResult;
  /** File the destination was (or, on a dry run, would be) written to */
  output: string;
  written: boolean;
}

/**
 * Thrown when neither the plan nor the caller names an output file
 */
export class MissingOutputError extends Error {
  constructor() {
    super('No output file: set "output" in the plan or pass --output');
    this.name = 'MissingOutputError';
  }
}

export async function runMergePlan(plan: MergePlan, options: RunOptions = {}): Promise<RunResult> {
  const { logger = silentLogger, onLoad } = options;
  const output = options.output ?? plan.output;
  if (output === undefined) {
    throw new MissingOutputError();
  }

  onLoad?.(plan.destination);
  const destination = await readDocument(plan.destination);

  const inputs: MergeInput[] = [];
  for (const source of plan.sources) {
    onLoad?.(source.file);
    inputs.push({
      doc: await readDocument(source.file),
      packages: source.packages,
      tolerateMissing: source.tolerateMissing,
      prefix: source.prefix,
    });
  }

  logger.info(`Merging ${inputs.length} source(s) into ${plan.destination}`);
  const merge = mergeDocuments(destination, inputs, {
    uniqueIdentities: plan.uniqueIdentities,
    onDuplicateSourceKey: plan.onDuplicateSourceKey,
    logger,
  });

  if (!merge.success) {
    logger.error('Merge failed; destination not written', { output });
    return { success: false, merge, output, written: false };
  }

  if (options.dryRun) {
    logger.info('Dry run; destination not written', { output });
    return { success: true, merge, output, written: false };
  }

  await writeDocument(destination, output);
  logger.info(`Wrote ${output}`);
  return { success: true, merge, output, written: true };
}
