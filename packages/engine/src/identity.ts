/**
 * Identity (UUID attribute) uniqueness across a merged document
 */

import { v4 as uuid } from 'uuid';
import type { MergeDocument } from './model/document.js';
import { localName, walk, type TreeNode } from './model/node.js';
import { IDENTITY_ATTRIBUTE } from './schema.js';
import { silentLogger, type MergeLogger } from './logger.js';
import { IdentityExhaustedError } from './errors.js';

const MAX_IDENTITY_ATTEMPTS = 16;

export type IdentityGenerator = () => string;

export interface IdentityReplacement {
  node: TreeNode;
  previous: string;
  next: string;
}

/**
 * Nodes carrying an identity attribute, in document order
 */
export function collectIdentities(root: TreeNode): TreeNode[] {
  const nodes: TreeNode[] = [];
  walk(root, node => {
    if (node.attributes[IDENTITY_ATTRIBUTE] !== undefined) {
      nodes.push(node);
    }
  });
  return nodes;
}

/**
 * Give `node` a freshly generated identity. Returns the new value, or
 * undefined when the node has no identity to replace.
 */
export function replaceIdentity(
  node: TreeNode,
  generate: IdentityGenerator = uuid,
  logger: MergeLogger = silentLogger
): string | undefined {
  const previous = node.attributes[IDENTITY_ATTRIBUTE];
  if (previous === undefined) {
    logger.warn(`Trying to replace the identity of <${node.tag}> ${localName(node) ?? ''} with no identity`);
    return undefined;
  }

  const next = generate();
  logger.debug(`Replacing identity of <${node.tag}> ${localName(node) ?? ''} with ${next}`, { previous });
  node.attributes[IDENTITY_ATTRIBUTE] = next;
  return next;
}

/**
 * Replace every repeated identity value with a fresh one. The first
 * occurrence in document order keeps its value.
 *
 * Run once, after every merge into `doc` is done; a later merge could bring
 * the repaired value back in. Throws IdentityExhaustedError when `generate`
 * keeps returning values already in use.
 */
export function ensureUniqueIdentities(
  doc: MergeDocument,
  options: { generate?: IdentityGenerator; logger?: MergeLogger } = {}
): IdentityReplacement[] {
  const { generate = uuid, logger = silentLogger } = options;
  const seen = new Set<string>();
  const replacements: IdentityReplacement[] = [];

  for (const node of collectIdentities(doc.root)) {
    const current = node.attributes[IDENTITY_ATTRIBUTE];
    if (!seen.has(current)) {
      seen.add(current);
      continue;
    }

    let next = replaceIdentity(node, generate, logger);
    for (let attempts = 1; next !== undefined && seen.has(next); attempts++) {
      if (attempts >= MAX_IDENTITY_ATTEMPTS) {
        throw new IdentityExhaustedError(current, attempts);
      }
      next = replaceIdentity(node, generate, logger);
    }
    if (next !== undefined) {
      seen.add(next);
      replacements.push({ node, previous: current, next });
    }
  }

  return replacements;
}
