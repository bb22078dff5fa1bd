/**
 * Directive attribute parsing: `key=value`, `key="quoted value"`, bare flags.
 */

import type { DirectiveAttributes } from '../ast/index.js';

/**
 * Where an attribute value sits in the parsed text (for inline-parsing captions)
 */
export interface AttributeValueRange {
  start: number;
  end: number;
}

export interface ParsedAttributes {
  attributes: DirectiveAttributes;
  /** Value ranges as offsets into the parsed text */
  ranges: ReadonlyMap<string, AttributeValueRange>;
}

export function parseAttributes(text: string): ParsedAttributes {
  const attributes = new Map<string, string | true>();
  const ranges = new Map<string, AttributeValueRange>();
  const keyPattern = /[A-Za-z_][\w-]*/y;
  let i = 0;

  while (i < text.length) {
    while (i < text.length && /\s/.test(text[i])) i++;
    if (i >= text.length) break;

    keyPattern.lastIndex = i;
    const key = keyPattern.exec(text);
    if (!key) {
      // Not an attribute: skip the token
      while (i < text.length && !/\s/.test(text[i])) i++;
      continue;
    }
    i += key[0].length;

    if (text[i] !== '=') {
      attributes.set(key[0], true);
      continue;
    }
    i++;

    const quote = text[i];
    let start: number;
    let end: number;
    if (quote === '"' || quote === "'") {
      start = i + 1;
      const close = text.indexOf(quote, start);
      // An unterminated quote runs to the end of the line
      end = close === -1 ? text.length : close;
      i = close === -1 ? text.length : close + 1;
    } else {
      start = i;
      while (i < text.length && !/\s/.test(text[i])) i++;
      end = i;
    }

    attributes.set(key[0], text.slice(start, end));
    ranges.set(key[0], { start, end });
  }

  // Own properties only: `__proto__` stays an ordinary key
  return { attributes: Object.freeze(Object.fromEntries(attributes)), ranges };
}

function ownAttribute(attributes: DirectiveAttributes, key: string): string | true | undefined {
  return Object.hasOwn(attributes, key) ? attributes[key] : undefined;
}

export function stringAttribute(attributes: DirectiveAttributes, key: string): string | null {
  const value = ownAttribute(attributes, key);
  return typeof value === 'string' ? value : null;
}

export function flagAttribute(attributes: DirectiveAttributes, key: string): boolean {
  const value = ownAttribute(attributes, key);
  return value === true || value === 'true';
}

export function integerAttribute(attributes: DirectiveAttributes, key: string): number | null {
  const value = stringAttribute(attributes, key);
  if (value === null || !/^\d{1,9}$/.test(value)) return null;
  return Number.parseInt(value, 10);
}
