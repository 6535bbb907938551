/**
 * Merge plan: which packages of which documents merge into the destination
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

const packageSchema = z.object({
  name: z.string().min(1),
  graceful: z.array(z.string().min(1)).optional(),
});

const prefixSchema = z.object({
  prefix: z.string().min(1),
  tag: z.string().min(1),
  referenceTags: z.array(z.string().regex(/-T?REF$/, 'must be a reference tag (-REF or -TREF)')).default([]),
});

const sourceSchema = z.object({
  file: z.string().min(1),
  packages: z.array(packageSchema).min(1),
  tolerateMissing: z.array(z.string().min(1)).optional(),
  prefix: prefixSchema.optional(),
});

export const mergePlanSchema = z.object({
  destination: z.string().min(1),
  output: z.string().min(1).optional(),
  sources: z.array(sourceSchema).min(1),
  uniqueIdentities: z.boolean().default(true),
  onDuplicateSourceKey: z.enum(['error', 'first-wins']).default('error'),
});

export type MergePlan = z.infer<typeof mergePlanSchema>;
export type PlanSource = z.infer<typeof sourceSchema>;

export interface PlanIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a plan file cannot be read or does not match the schema
 */
export class PlanError extends Error {
  file: string;
  issues: PlanIssue[];

  constructor(file: string, issues: PlanIssue[], options?: { cause?: unknown }) {
    super(`Invalid merge plan ${file}:\n${issues.map(issue => `  - ${issue.path}: ${issue.message}`).join('\n')}`, options);
    this.name = 'PlanError';
    this.file = file;
    this.issues = issues;
  }
}

/**
 * Validate raw plan data. File paths are resolved against `baseDir`.
 */
export function parsePlan(data: unknown, file: string, baseDir: string): MergePlan {
  const result = mergePlanSchema.safeParse(data);
  if (!result.success) {
    throw new PlanError(
      file,
      result.error.issues.map(issue => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message,
      }))
    );
  }

  const plan = result.data;
  return {
    ...plan,
    destination: path.resolve(baseDir, plan.destination),
    output: plan.output === undefined ? undefined : path.resolve(baseDir, plan.output),
    sources: plan.sources.map(source => ({ ...source, file: path.resolve(baseDir, source.file) })),
  };
}

/**
 * Read and validate a plan file
 */
export async function loadPlan(file: string): Promise<MergePlan> {
  const planPath = path.resolve(file);

  let content: string;
  try {
    content = await fs.readFile(planPath, 'utf-8');
  } catch (err) {
    throw new PlanError(planPath, [{ path: '(file)', message: reason(err) }], { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new PlanError(planPath, [{ path: '(json)', message: reason(err) }], { cause: err });
  }

  return parsePlan(data, planPath, path.dirname(planPath));
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
