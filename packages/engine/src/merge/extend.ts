/**
 * Merge a list of source nodes into a destination container
 */

import type { MergeDocument } from '../model/document.js';
import { cloneNode, localName, type TreeNode } from '../model/node.js';
import {
  absolutePath,
  childPath,
  lastSegment,
  parentPath,
  scopePath,
  type PathMap,
} from '../paths.js';
import { attach } from '../structure.js';
import { DuplicateSourceKeyError } from '../errors.js';
import { silentLogger, type MergeLogger } from '../logger.js';
import type { MergeMode, NameClashSet } from './clashes.js';

/**
 * Identity of a node for merge matching. `undefined` means the node has no
 * key: it never matches and never clashes.
 */
export type KeyFn = (node: TreeNode) => string | undefined;

/**
 * How to treat two source nodes that share a key
 * - error: raise DuplicateSourceKeyError before anything is attached
 * - first-wins: keep the first, drop the rest with a warning
 */
export type DuplicateSourcePolicy = 'error' | 'first-wins';

export interface ExtendOptions {
  /** Clash tracking for the current run */
  clashes: NameClashSet;
  /** Defaults to 'strict' */
  mode?: MergeMode;
  /** Key of a source node, defaults to its local name */
  keyOfSrc?: KeyFn;
  /** Key of a destination child, defaults to its local name */
  keyOfDst?: KeyFn;
  onDuplicateSourceKey?: DuplicateSourcePolicy;
  /** Attach deep copies so the source document is left untouched */
  clone?: boolean;
  logger?: MergeLogger;
}

interface KeyedNode {
  node: TreeNode;
  key: string | undefined;
}

/**
 * Extend `dstContainer` with `srcNodes`, checking for name clashes against
 * the container's existing children.
 *
 * Returns a map from each source node's path in `srcDoc` to the path it has
 * (or, for a duplicate, already had) in `dstDoc`.
 *
 * @example
 * ```ts
 * const clashes = new NameClashSet();
 * const moved = extend(srcPdus.children, dstPdus, src, dst, { clashes, mode: 'graceful' });
 * relocate(collectReferences(dst.root, ['PDU-REF']), moved);
 * ```
 */
export function extend(
  srcNodes: readonly TreeNode[],
  dstContainer: TreeNode,
  srcDoc: MergeDocument,
  dstDoc: MergeDocument,
  options: ExtendOptions
): PathMap {
  const pathMap: PathMap = new Map();
  if (srcNodes.length === 0) {
    return pathMap;
  }

  const {
    clashes,
    mode = 'strict',
    keyOfSrc = localName,
    keyOfDst = localName,
    onDuplicateSourceKey = 'error',
    clone = false,
    logger = silentLogger,
  } = options;

  const existing = dstContainer.children.map(node => ({ node, key: keyOfDst(node) }));
  const incoming = srcNodes.map(node => ({ node, key: keyOfSrc(node) }));
  const sourceScope = sourceScopeOf(srcNodes[0], srcDoc);
  const destinationScope = scopePath(dstContainer, dstDoc);

  const admitted = dedupeSourceKeys(incoming, onDuplicateSourceKey, sourceScope, logger);

  // Where each source node ends up
  for (const { node, key } of incoming) {
    const srcPath = absolutePath(node, srcDoc);
    if (srcPath === null) continue;

    const duplicate = key === undefined ? undefined : existing.find(el => el.key === key);
    const dstPath = duplicate
      ? absolutePath(duplicate.node, dstDoc) ?? scopePath(duplicate.node, dstDoc)
      : childPath(destinationScope, lastSegment(srcPath));

    pathMap.set(srcPath, dstPath);
  }

  // Coarse admission gate: any shared key blocks the clashing nodes (graceful)
  // or the whole batch (strict)
  const dstKeys = new Set(existing.flatMap(el => (el.key === undefined ? [] : [el.key])));
  const clashing = [...new Set(incoming.flatMap(el => (el.key !== undefined && dstKeys.has(el.key) ? [el.key] : [])))].sort();

  let toAttach: KeyedNode[];
  if (clashing.length > 0) {
    logger.warn(`${clashing.length} name clashes found in ${sourceScope} and ${destinationScope}`);
    logger.warn(`Conflicting elements: ${clashing.join(', ')}`);

    clashes.record({
      mode,
      keys: clashing,
      sourceScope,
      destinationScope,
      source: srcDoc.name,
    });

    toAttach = mode === 'graceful'
      ? admitted.filter(el => el.key === undefined || !clashing.includes(el.key))
      : [];
  } else {
    toAttach = admitted;
  }

  if (toAttach.length > 0) {
    attach(
      dstContainer,
      toAttach.map(el => (clone ? cloneNode(el.node) : el.node)),
      dstDoc
    );
  }

  return pathMap;
}

function sourceScopeOf(node: TreeNode, doc: MergeDocument): string {
  const path = absolutePath(node, doc);
  return path === null ? scopePath(node, doc) : parentPath(path);
}

function dedupeSourceKeys(
  incoming: KeyedNode[],
  policy: DuplicateSourcePolicy,
  scope: string,
  logger: MergeLogger
): KeyedNode[] {
  const seen = new Set<string>();
  const kept: KeyedNode[] = [];

  for (const entry of incoming) {
    if (entry.key === undefined) {
      kept.push(entry);
      continue;
    }
    if (seen.has(entry.key)) {
      if (policy === 'error') {
        throw new DuplicateSourceKeyError(entry.key, scope);
      }
      logger.warn(`Dropping second source node "${entry.key}" in ${scope} (first wins)`);
      continue;
    }
    seen.add(entry.key);
    kept.push(entry);
  }

  return kept;
}
