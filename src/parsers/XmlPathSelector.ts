// src/parsers/XmlPathSelector.ts
import { cleanXmlText } from '../utils/xml-text-cleaner';

export const ATTRIBUTE_PREFIX = '@_';
export const TEXT_NODE_NAME = '#text';
const ANY_DEPTH = '**';

export type XmlElement = Record<string, unknown>;

export function isXmlElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function isChildKey(key: string): boolean {
  return !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_NODE_NAME;
}

function childNodes(element: XmlElement): unknown[] {
  const children: unknown[] = [];
  for (const [key, value] of Object.entries(element)) {
    if (isChildKey(key)) {
      children.push(...toList(value));
    }
  }
  return children;
}

export function parsePath(selector: string): string[] {
  return selector.split('/').map(segment => segment.trim()).filter(segment => segment.length > 0);
}

function selectNodes(nodes: unknown[], segments: string[]): unknown[] {
  if (segments.length === 0) return nodes;

  const [head, ...rest] = segments;
  const matches: unknown[] = [];

  for (const node of nodes) {
    if (!isXmlElement(node)) continue;

    if (head === ANY_DEPTH) {
      matches.push(...selectNodes([node], rest));
      for (const child of childNodes(node)) {
        matches.push(...selectNodes([child], segments));
      }
      continue;
    }

    // "name|orgname": whichever alternatives the element has, in listed order
    for (const alternative of head.split('|')) {
      const key = alternative.startsWith('@') ? ATTRIBUTE_PREFIX + alternative.slice(1) : alternative;
      matches.push(...selectNodes(toList(node[key]), rest));
    }
  }

  return matches;
}

/**
 * Text content of a parsed node: own text plus the text of its child elements,
 * attributes excluded, cleaned and whitespace-normalized.
 */
export function nodeText(node: unknown): string {
  if (typeof node === 'string') return cleanXmlText(node);
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) {
    return node.map(nodeText).filter(text => text.length > 0).join(' ');
  }
  if (isXmlElement(node)) {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) continue;
      const text = nodeText(value);
      if (text.length > 0) parts.push(text);
    }
    return parts.join(' ');
  }
  return '';
}

/**
 * Text of every node matching `selector` under `root`, in match order.
 * Empty strings are kept so callers can decide what "empty" means.
 */
export function selectValues(root: unknown, selector: string): string[] {
  const segments = parsePath(selector);
  if (segments.length === 0) return [];
  if (segments[segments.length - 1] === ANY_DEPTH) {
    throw new Error(`Selector cannot end with ${ANY_DEPTH}: ${selector}`);
  }
  return selectNodes([root], segments).map(nodeText);
}
