import { createNamedNode, createNode, localName, type TreeNode } from '../model/node.js';
import { MergeDocument } from '../model/document.js';
import type { MergeLogger } from '../logger.js';
import type { IdentityGenerator } from '../identity.js';

export function named(
  tag: string,
  name: string,
  children: TreeNode[] = [],
  attributes: Record<string, string> = {}
): TreeNode {
  return createNamedNode(tag, name, { children, attributes });
}

export function pkg(name: string, elements: TreeNode[] = [], subPackages?: TreeNode[], identity?: string): TreeNode {
  const children = [createNode('ELEMENTS', { children: elements })];
  if (subPackages) {
    children.push(createNode('AR-PACKAGES', { children: subPackages }));
  }
  return createNamedNode('AR-PACKAGE', name, {
    children,
    attributes: identity === undefined ? {} : { UUID: identity },
  });
}

export function documentOf(name: string, packages: TreeNode[]): MergeDocument {
  return MergeDocument.fromTree(
    name,
    createNode('AUTOSAR', { children: [createNode('AR-PACKAGES', { children: packages })] })
  );
}

export function names(nodes: readonly TreeNode[]): Array<string | undefined> {
  return nodes.map(localName);
}

export function tags(nodes: readonly TreeNode[]): string[] {
  return nodes.map(node => node.tag);
}

/** Deterministic identities: id-1, id-2, ... */
export function sequence(prefix = 'id'): IdentityGenerator {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export interface LogEntry {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
}

export function recordingLogger(): { logger: MergeLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    logger: {
      info: message => entries.push({ level: 'info', message }),
      warn: message => entries.push({ level: 'warn', message }),
      error: message => entries.push({ level: 'error', message }),
      debug: message => entries.push({ level: 'debug', message }),
    },
  };
}
