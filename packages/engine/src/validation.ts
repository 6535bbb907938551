/**
 * Reference integrity checks for merged documents
 */

import type { MergeDocument } from './model/document.js';
import { resolvePath } from './paths.js';
import { readReference, referenceTarget, type ReferenceField } from './references.js';

export interface ReferenceIssue {
  reference: string;
  /** Tag of the node holding the reference */
  holder: string;
  message: string;
}

/**
 * Check that every reference resolves in `doc`, and that the node it
 * resolves to has the tag its DEST attribute names.
 */
export function validateReferences(doc: MergeDocument, refs: readonly ReferenceField[]): ReferenceIssue[] {
  const issues: ReferenceIssue[] = [];

  for (const ref of refs) {
    const reference = readReference(ref);
    const holder = ref.node.tag;
    const target = resolvePath(doc, reference);

    if (!target) {
      issues.push({ reference, holder, message: `reference "${reference}" does not resolve in ${doc.name}` });
      continue;
    }

    const expected = referenceTarget(ref);
    if (expected !== undefined && target.tag !== expected) {
      issues.push({
        reference,
        holder,
        message: `reference "${reference}" points at <${target.tag}>, expected <${expected}>`,
      });
    }
  }

  return issues;
}
