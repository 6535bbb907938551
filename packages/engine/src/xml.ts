/**
 * XML codec: network description files <-> engine documents
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { MergeDocument } from './model/document.js';
import type { TreeNode } from './model/node.js';
import { DocumentParseError } from './errors.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

type OrderedEntry = Record<string, unknown>;

function isEntry(value: unknown): value is OrderedEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function readAttributes(entry: OrderedEntry): Record<string, string> {
  const raw = entry[ATTRIBUTES_KEY];
  const attributes: Record<string, string> = {};
  if (!isEntry(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    const text = scalarText(value);
    if (text !== undefined) {
      attributes[key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key] = text;
    }
  }
  return attributes;
}

function toNode(entry: OrderedEntry, documentName: string): TreeNode | undefined {
  const tag = Object.keys(entry).find(key => key !== ATTRIBUTES_KEY);
  if (tag === undefined || tag === TEXT_KEY) return undefined;

  const content = entry[tag];
  if (!Array.isArray(content)) {
    throw new DocumentParseError(documentName, `unexpected content in <${tag}>`);
  }

  const node: TreeNode = { tag, attributes: readAttributes(entry), children: [] };
  const texts: string[] = [];

  for (const item of content) {
    if (!isEntry(item)) continue;
    if (TEXT_KEY in item) {
      const text = scalarText(item[TEXT_KEY]);
      if (text !== undefined) texts.push(text);
      continue;
    }
    const child = toNode(item, documentName);
    if (child) node.children.push(child);
  }

  if (texts.length > 0) {
    node.text = texts.join('');
  }
  return node;
}

function toEntry(node: TreeNode): OrderedEntry {
  const content: OrderedEntry[] = [];
  if (node.text !== undefined) {
    content.push({ [TEXT_KEY]: node.text });
  }
  for (const child of node.children) {
    content.push(toEntry(child));
  }

  const entry: OrderedEntry = { [node.tag]: content };
  const attributes = Object.entries(node.attributes);
  if (attributes.length > 0) {
    entry[ATTRIBUTES_KEY] = Object.fromEntries(attributes.map(([key, value]) => [ATTRIBUTE_PREFIX + key, value]));
  }
  return entry;
}

/**
 * Parse XML text into an indexed document
 */
export function parseDocument(xml: string, name: string): MergeDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new DocumentParseError(name, `${valid.err.msg} (line ${valid.err.line})`);
  }

  const parsed: unknown = parser.parse(xml);
  const roots = (Array.isArray(parsed) ? parsed : [])
    .filter(isEntry)
    .map(entry => toNode(entry, name))
    .filter((node): node is TreeNode => node !== undefined);

  if (roots.length !== 1) {
    throw new DocumentParseError(name, `expected one root element, found ${roots.length}`);
  }

  return MergeDocument.fromTree(name, roots[0]);
}

export function serializeDocument(doc: MergeDocument): string {
  const xml: unknown = builder.build([toEntry(doc.root)]);
  return DECLARATION + String(xml).trimStart();
}

export async function readDocument(file: string): Promise<MergeDocument> {
  const content = await readFile(file, 'utf-8');
  return parseDocument(content, file);
}

export async function writeDocument(doc: MergeDocument, file: string): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, serializeDocument(doc));
}
