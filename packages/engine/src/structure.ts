/**
 * Structural invariants: the attach primitives that keep the parent index
 * current, and ordered synthesis of containers the format requires.
 */

import type { MergeDocument } from './model/document.js';
import { createNamedNode, createNode, findChild, type TreeNode } from './model/node.js';
import {
  ELEMENTS_TAG,
  IDENTITY_ATTRIBUTE,
  PACKAGES_TAG,
  PACKAGE_TAG,
  isTransparentTag,
} from './schema.js';
import { MissingRequiredContainerError, TransparentInsertError } from './errors.js';
import { silentLogger, type MergeLogger } from './logger.js';

/**
 * One entry of an ordered container schema. Entries without `create` must
 * already be present.
 */
export interface ContainerSpec {
  tag: string;
  create?: () => TreeNode;
}

export type ContainerSchema = readonly ContainerSpec[];

export function isTransparent(node: TreeNode): boolean {
  return isTransparentTag(node.tag);
}

/**
 * Append `child` to `parent` and record it in the document's parent index.
 *
 * Arrays and transparent containers are flattened: their children are
 * appended one by one, each re-parented to `parent`.
 */
export function attach(parent: TreeNode, child: TreeNode | readonly TreeNode[], doc: MergeDocument): void {
  if (isNodeList(child)) {
    for (const el of [...child]) {
      appendOne(parent, el, doc);
    }
    return;
  }

  if (isTransparent(child)) {
    for (const el of [...child.children]) {
      appendOne(parent, el, doc);
    }
    return;
  }

  appendOne(parent, child, doc);
}

/**
 * Insert a single node at `index` among `parent`'s children
 */
export function insertAt(parent: TreeNode, child: TreeNode, index: number, doc: MergeDocument): void {
  if (isTransparent(child)) {
    throw new TransparentInsertError(child.tag);
  }
  placeAt(parent, child, index, doc);
}

/**
 * Remove `child` from `parent` and drop it from the parent index.
 * Returns false when `child` is not a child of `parent`.
 */
export function detach(parent: TreeNode, child: TreeNode, doc: MergeDocument): boolean {
  const index = parent.children.indexOf(child);
  if (index === -1) return false;
  parent.children.splice(index, 1);
  doc.unlink(child);
  return true;
}

function appendOne(parent: TreeNode, child: TreeNode, doc: MergeDocument): void {
  placeAt(parent, child, parent.children.length, doc);
}

// Places `child` itself, never its children.
function placeAt(parent: TreeNode, child: TreeNode, index: number, doc: MergeDocument): void {
  parent.children.splice(index, 0, child);
  doc.link(child, parent);
}

function isNodeList(value: TreeNode | readonly TreeNode[]): value is readonly TreeNode[] {
  return Array.isArray(value);
}

/**
 * Make sure `parent` holds every container of `schema`, in schema order.
 *
 * Present containers become the insertion anchor. A missing container with a
 * factory is created and inserted right after the anchor (first position when
 * there is no anchor yet). Created containers are placed as they are, even
 * transparent ones. A missing container without a factory is fatal.
 *
 * Returns the containers by tag.
 */
export function ensureContainers(
  parent: TreeNode,
  schema: ContainerSchema,
  doc: MergeDocument,
  logger: MergeLogger = silentLogger
): Map<string, TreeNode> {
  const containers = new Map<string, TreeNode>();
  let anchor: TreeNode | undefined;

  for (const { tag, create } of schema) {
    const found = findChild(parent, tag);
    if (found) {
      containers.set(tag, found);
      anchor = found;
      continue;
    }

    if (!create) {
      throw new MissingRequiredContainerError(tag, parent.tag);
    }

    logger.info(`Creating missing element '${tag}' in ${parent.tag}`);
    const created = create();

    if (!anchor) {
      placeAt(parent, created, 0, doc);
    } else {
      const anchorIndex = parent.children.indexOf(anchor);
      if (anchorIndex === -1) {
        logger.warn(`Anchor <${anchor.tag}> is no longer in ${parent.tag}; appending '${tag}' at the end`);
        appendOne(parent, created, doc);
      } else {
        placeAt(parent, created, anchorIndex + 1, doc);
      }
    }

    containers.set(tag, created);
    anchor = created;
  }

  return containers;
}

/**
 * Factory for an empty container, usable as a ContainerSpec `create`
 */
export function createContainer(tag: string): () => TreeNode {
  return () => createNode(tag);
}

/**
 * A new, empty package: `<AR-PACKAGE UUID=..><SHORT-NAME/><ELEMENTS/></AR-PACKAGE>`
 */
export function createPackage(name: string, identity: string): TreeNode {
  return createNamedNode(PACKAGE_TAG, name, {
    attributes: { [IDENTITY_ATTRIBUTE]: identity },
    children: [createNode(ELEMENTS_TAG)],
  });
}
