/**
 * Naming utilities for merged documents
 * Prefixes element names and rewrites the references that point at them
 */

import type { MergeDocument } from '../model/document.js';
import { findDescendants, type TreeNode } from '../model/node.js';
import {
  DATA_ELEMENT_REFERENCE_TAGS,
  IDENTITY_ATTRIBUTE,
  INTERFACE_REFERENCE_TAGS,
  NAME_TAG,
  isReferenceTag,
} from '../schema.js';
import { InvalidReferenceTagError } from '../errors.js';
import { joinPath, splitPath } from '../paths.js';
import { replaceIdentity, type IdentityGenerator } from '../identity.js';

const dataElementReferenceTags: ReadonlySet<string> = new Set(DATA_ELEMENT_REFERENCE_TAGS);
const interfaceReferenceTags: ReadonlySet<string> = new Set(INTERFACE_REFERENCE_TAGS);

/**
 * Prefix a local name. Names are concatenated without a separator, the way
 * the format's tooling names variants (`ABC` + `Signal` -> `ABCSignal`).
 */
export function prefixName(prefix: string, name: string): string {
  return `${prefix}${name}`;
}

/**
 * Prefix the local name of every descendant of `parent` tagged `tag`.
 * Renamed elements get a new identity, since they are new elements as far as
 * the format's tools are concerned.
 *
 * Returns the renamed elements.
 */
export function prefixElementsOfType(
  parent: TreeNode,
  prefix: string,
  tag: string,
  generate?: IdentityGenerator
): TreeNode[] {
  const renamed: TreeNode[] = [];

  for (const element of findDescendants(parent, tag)) {
    const holder = element.children.find(child => child.tag === NAME_TAG);
    if (!holder || holder.text === undefined) continue;

    if (element.attributes[IDENTITY_ATTRIBUTE] !== undefined) {
      replaceIdentity(element, generate);
    }
    holder.text = prefixName(prefix, holder.text);
    renamed.push(element);
  }

  return renamed;
}

/**
 * Rewrite references of type `refTag` under `parent` so they point at names
 * prefixed by prefixElementsOfType.
 *
 * - data element references `/<pkg>/<interface>/<element>`: the third segment
 * - interface references `/<pkg>/<interface>`: the second segment
 * - any other reference: the last segment
 *
 * `filter` restricts the rewrite to matching reference nodes.
 */
export function prefixReferencesOfType(
  parent: TreeNode,
  prefix: string,
  refTag: string,
  filter: (ref: TreeNode) => boolean = () => true
): TreeNode[] {
  if (!isReferenceTag(refTag)) {
    throw new InvalidReferenceTagError(refTag);
  }

  const rewritten: TreeNode[] = [];

  for (const ref of findDescendants(parent, refTag)) {
    if (ref.text === undefined || !filter(ref)) continue;

    const segments = splitPath(ref.text);
    const index = prefixedSegmentIndex(refTag, segments.length);
    if (index < 0) continue;

    segments[index] = prefixName(prefix, segments[index]);
    ref.text = joinPath(segments);
    rewritten.push(ref);
  }

  return rewritten;
}

function prefixedSegmentIndex(refTag: string, length: number): number {
  if (dataElementReferenceTags.has(refTag)) {
    return length > 2 ? 2 : -1;
  }
  if (interfaceReferenceTags.has(refTag)) {
    return length > 1 ? 1 : -1;
  }
  return length - 1;
}

/**
 * Prefix elements of `tag` and the references of `refTags` that point at them,
 * in one pass over `doc`.
 */
export function prefixDocumentElements(
  doc: MergeDocument,
  prefix: string,
  tag: string,
  refTags: readonly string[],
  generate?: IdentityGenerator
): { elements: number; references: number } {
  const elements = prefixElementsOfType(doc.root, prefix, tag, generate).length;
  let references = 0;
  for (const refTag of refTags) {
    references += prefixReferencesOfType(doc.root, prefix, refTag).length;
  }
  return { elements, references };
}
