/**
 * Tagged tree node model
 */

import { NAME_TAG } from '../schema.js';

/**
 * A tagged element with attributes and ordered children.
 * Nodes carry no parent pointer; parents live in the owning document's index.
 */
export interface TreeNode {
  tag: string;
  attributes: Record<string, string>;
  children: TreeNode[];
  /** Text content of a leaf node */
  text?: string;
}

export interface NodeInit {
  attributes?: Record<string, string>;
  children?: TreeNode[];
  text?: string;
}

export function createNode(tag: string, init: NodeInit = {}): TreeNode {
  const node: TreeNode = {
    tag,
    attributes: { ...init.attributes },
    children: init.children ? [...init.children] : [],
  };
  if (init.text !== undefined) {
    node.text = init.text;
  }
  return node;
}

/**
 * Create a leaf holding text, e.g. `<SHORT-NAME>Pdu</SHORT-NAME>`
 */
export function createLeaf(tag: string, text: string, attributes?: Record<string, string>): TreeNode {
  return createNode(tag, { text, attributes });
}

/**
 * Create a node whose first child is its name-holder
 */
export function createNamedNode(tag: string, name: string, init: NodeInit = {}): TreeNode {
  return createNode(tag, {
    ...init,
    children: [createLeaf(NAME_TAG, name), ...(init.children ?? [])],
  });
}

/**
 * The text of the node's first name-holder child, if it has one
 */
export function localName(node: TreeNode): string | undefined {
  const holder = node.children.find(child => child.tag === NAME_TAG);
  return holder?.text;
}

export function findChild(node: TreeNode, tag: string): TreeNode | undefined {
  return node.children.find(child => child.tag === tag);
}

/**
 * Depth-first, pre-order walk over `node` and all its descendants.
 * Returning `false` from the visitor skips that node's subtree.
 */
export function walk(node: TreeNode, visit: (node: TreeNode) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of node.children) {
    walk(child, visit);
  }
}

/**
 * All descendants (excluding `node` itself) with the given tag, in document order
 */
export function findDescendants(node: TreeNode, tag: string): TreeNode[] {
  const found: TreeNode[] = [];
  for (const child of node.children) {
    walk(child, n => {
      if (n.tag === tag) found.push(n);
    });
  }
  return found;
}

export function cloneNode(node: TreeNode): TreeNode {
  return createNode(node.tag, {
    attributes: node.attributes,
    children: node.children.map(cloneNode),
    text: node.text,
  });
}

/**
 * Structural equality: tag, trimmed text, attributes and children in order
 */
export function nodesEqual(a: TreeNode, b: TreeNode): boolean {
  if (a.tag !== b.tag) return false;
  if ((a.text ?? '').trim() !== (b.text ?? '').trim()) return false;

  const aKeys = Object.keys(a.attributes);
  if (aKeys.length !== Object.keys(b.attributes).length) return false;
  if (aKeys.some(key => a.attributes[key] !== b.attributes[key])) return false;

  if (a.children.length !== b.children.length) return false;
  return a.children.every((child, i) => nodesEqual(child, b.children[i]));
}
