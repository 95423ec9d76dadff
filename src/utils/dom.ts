import { isText } from 'domhandler';
import type { Element } from 'domhandler';

/**
 * Direct text-node children of an element, trimmed, empties dropped.
 * Nested elements are skipped, so `a<br>b` yields two fragments.
 */
export function ownTextFragments(element: Element): string[] {
  return element.children
    .filter(isText)
    .map((node) => node.data.trim())
    .filter((text) => text.length > 0);
}

export function ownText(element: Element): string {
  return element.children
    .filter(isText)
    .map((node) => node.data)
    .join('');
}

// XPath normalize-space: only ASCII whitespace, full-width spaces are kept
export function normalizeSpace(text: string): string {
  return text.replace(/[ \t\r\n]+/g, ' ').replace(/^ | $/g, '');
}
