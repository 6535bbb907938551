/**
 * Reference fields and their relocation.
 *
 * A reference is a text value holding an absolute path, either a leaf's text
 * (`<PDU-REF DEST="I-SIGNAL-I-PDU">/Communication/Pdu/P1</PDU-REF>`) or an
 * attribute value.
 */

import { walk, type TreeNode } from './model/node.js';
import type { PathMap } from './paths.js';
import { REFERENCE_DEST_ATTRIBUTE, isReferenceTag } from './schema.js';
import { PrefixNotFoundError, UnmappedReferenceError } from './errors.js';

export type ReferenceField =
  | { kind: 'text'; node: TreeNode }
  | { kind: 'attribute'; node: TreeNode; attribute: string };

export interface RelocationReport {
  rewritten: number;
  /** Reference texts that had no entry in the path map */
  unmapped: string[];
}

export function textReference(node: TreeNode): ReferenceField {
  return { kind: 'text', node };
}

export function attributeReference(node: TreeNode, attribute: string): ReferenceField {
  return { kind: 'attribute', node, attribute };
}

export function readReference(ref: ReferenceField): string {
  if (ref.kind === 'text') {
    return ref.node.text ?? '';
  }
  return ref.node.attributes[ref.attribute] ?? '';
}

function writeReference(ref: ReferenceField, value: string): void {
  if (ref.kind === 'text') {
    ref.node.text = value;
  } else {
    ref.node.attributes[ref.attribute] = value;
  }
}

/**
 * Tag of the node a reference expects to point at, from its DEST attribute
 */
export function referenceTarget(ref: ReferenceField): string | undefined {
  return ref.kind === 'text' ? ref.node.attributes[REFERENCE_DEST_ATTRIBUTE] : undefined;
}

/**
 * All text references under `root` (root included), in document order.
 * Without `tags`, every `-REF` / `-TREF` leaf counts as a reference.
 */
export function collectReferences(root: TreeNode, tags?: readonly string[]): ReferenceField[] {
  const wanted = tags ? new Set(tags) : undefined;
  const refs: ReferenceField[] = [];

  walk(root, node => {
    const matches = wanted ? wanted.has(node.tag) : isReferenceTag(node.tag);
    if (matches && node.text !== undefined) {
      refs.push(textReference(node));
    }
  });

  return refs;
}

/**
 * Rewrite every reference whose text is a key of `pathMap`.
 *
 * References absent from the map are left as they are. With `strict`, any
 * unmapped reference raises UnmappedReferenceError and nothing is rewritten.
 */
export function relocate(
  refs: readonly ReferenceField[],
  pathMap: ReadonlyMap<string, string>,
  options: { strict?: boolean } = {}
): RelocationReport {
  const unmapped = refs.map(readReference).filter(text => !pathMap.has(text));

  if (options.strict && unmapped.length > 0) {
    throw new UnmappedReferenceError(unmapped);
  }

  let rewritten = 0;
  for (const ref of refs) {
    const target = pathMap.get(readReference(ref));
    if (target !== undefined) {
      writeReference(ref, target);
      rewritten++;
    }
  }

  return { rewritten, unmapped };
}

/**
 * Replace the first occurrence of `oldPrefix` with `newPrefix` in every
 * reference. If any reference lacks `oldPrefix`, PrefixNotFoundError is
 * raised and no reference is modified.
 */
export function relocatePrefix(refs: readonly ReferenceField[], oldPrefix: string, newPrefix: string): void {
  for (const ref of refs) {
    const text = readReference(ref);
    if (!text.includes(oldPrefix)) {
      throw new PrefixNotFoundError(oldPrefix, text);
    }
  }

  for (const ref of refs) {
    const text = readReference(ref);
    const index = text.indexOf(oldPrefix);
    writeReference(ref, text.slice(0, index) + newPrefix + text.slice(index + oldPrefix.length));
  }
}
