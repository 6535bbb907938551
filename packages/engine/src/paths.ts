/**
 * Path resolution over documents without parent pointers.
 *
 * An absolute path is the `/`-joined chain of local names from the root to a
 * node. Anonymous wrappers (ELEMENTS, AR-PACKAGES, triggering containers...)
 * contribute no segment.
 */

import type { MergeDocument } from './model/document.js';
import { localName, type TreeNode } from './model/node.js';
import { isTransparentTag } from './schema.js';
import { PathNotFoundError, PathResolutionError } from './errors.js';

const SEPARATOR = '/';

/**
 * Names of `node` and its named ancestors, root first
 */
function collectSegments(node: TreeNode, doc: MergeDocument): string[] {
  const segments: string[] = [];
  let current: TreeNode | undefined = node;

  while (current) {
    const name = localName(current);
    if (name !== undefined) {
      segments.unshift(name);
    }
    if (doc.isRoot(current)) {
      return segments;
    }
    const parent = doc.parentOf(current);
    if (!parent) {
      throw new PathResolutionError(current.tag, doc.name);
    }
    current = parent;
  }

  return segments;
}

export function joinPath(segments: readonly string[]): string {
  return SEPARATOR + segments.join(SEPARATOR);
}

export function splitPath(path: string): string[] {
  return path.split(SEPARATOR).filter(segment => segment.length > 0);
}

/**
 * Trailing `/segment` of a path, separator included
 */
export function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf(SEPARATOR));
}

/**
 * Parent path of a path (`/A/B/C` -> `/A/B`)
 */
export function parentPath(path: string): string {
  const index = path.lastIndexOf(SEPARATOR);
  return index <= 0 ? SEPARATOR : path.slice(0, index);
}

/**
 * Absolute path of `node` in `doc`.
 *
 * Returns `null` for anonymous nodes that are not transparent containers:
 * they have no identity of their own and must be matched structurally.
 * Throws PathResolutionError when the parent chain is broken.
 */
export function absolutePath(node: TreeNode, doc: MergeDocument): string | null {
  const segments = collectSegments(node, doc);
  if (localName(node) === undefined && !isTransparentTag(node.tag) && !doc.isRoot(node)) {
    return null;
  }
  return joinPath(segments);
}

/**
 * Path of the naming scope `node` belongs to: its own path when it is named,
 * otherwise the path of its nearest named ancestor (or the root).
 */
export function scopePath(node: TreeNode, doc: MergeDocument): string {
  return joinPath(collectSegments(node, doc));
}

/**
 * Find the node an absolute path points at.
 *
 * Each segment is matched against the local names of the current node's
 * descendants, searching through anonymous wrappers but not through other
 * named nodes.
 */
export function resolvePath(doc: MergeDocument, path: string): TreeNode | undefined {
  let current = doc.root;
  for (const segment of splitPath(path)) {
    const next = findInScope(current, segment);
    if (!next) return undefined;
    current = next;
  }
  return current;
}

/**
 * Like resolvePath, but a path that does not resolve is an error
 */
export function requireNode(doc: MergeDocument, path: string): TreeNode {
  let current = doc.root;
  for (const segment of splitPath(path)) {
    const next = findInScope(current, segment);
    if (!next) {
      throw new PathNotFoundError(path, doc.name, segment);
    }
    current = next;
  }
  return current;
}

function findInScope(node: TreeNode, name: string): TreeNode | undefined {
  for (const child of node.children) {
    const childName = localName(child);
    if (childName === name) return child;
    if (childName === undefined) {
      const found = findInScope(child, name);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Old absolute path -> new absolute path, produced by one merge call
 */
export type PathMap = Map<string, string>;

/**
 * Path of a child named by `segment` (`/Name`) under `scope`
 */
export function childPath(scope: string, segment: string): string {
  return scope === SEPARATOR ? segment : scope + segment;
}

/**
 * Fold `next` into `into` so that chained relocations stay correct:
 * an entry a -> b in `into` becomes a -> c when `next` maps b -> c.
 * Returns `into`.
 */
export function accumulatePathMap(into: PathMap, next: ReadonlyMap<string, string>): PathMap {
  for (const [from, to] of into) {
    const moved = next.get(to);
    if (moved !== undefined) {
      into.set(from, moved);
    }
  }
  for (const [from, to] of next) {
    into.set(from, to);
  }
  return into;
}
