/**
 * Document: a root node plus the parent index the engine maintains for it
 */

import type { TreeNode } from './node.js';

export class MergeDocument {
  /** Label used in logs and errors, usually the file path */
  readonly name: string;
  readonly root: TreeNode;
  private readonly parents = new Map<TreeNode, TreeNode>();

  constructor(name: string, root: TreeNode) {
    this.name = name;
    this.root = root;
  }

  /**
   * Wrap a freshly parsed tree and index every node in it
   */
  static fromTree(name: string, root: TreeNode): MergeDocument {
    const doc = new MergeDocument(name, root);
    doc.linkSubtree(root);
    return doc;
  }

  parentOf(node: TreeNode): TreeNode | undefined {
    return this.parents.get(node);
  }

  isRoot(node: TreeNode): boolean {
    return node === this.root;
  }

  /**
   * Record `parent` as the parent of `child` and index the child's subtree.
   *
   * @internal Only the structure module's attach primitives call this; tree
   * mutations made elsewhere are invisible to path resolution.
   */
  link(child: TreeNode, parent: TreeNode): void {
    this.parents.set(child, parent);
    this.linkSubtree(child);
  }

  /** @internal */
  unlink(child: TreeNode): void {
    this.parents.delete(child);
  }

  private linkSubtree(node: TreeNode): void {
    for (const child of node.children) {
      this.parents.set(child, node);
      this.linkSubtree(child);
    }
  }
}
