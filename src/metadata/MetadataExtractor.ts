/**
 * Metadata Extractor
 *
 * Reads the optional front matter at the top of a document:
 *
 *   --- meta ---
 *   title: "Test Doc"
 *   version: 1
 *   tags: [draft, internal]
 *   ---
 *
 * Values are quoted strings, integers, floats, booleans or lists; anything
 * else is kept as a bare string.
 *
 * @since 2026-10-19
 */

import { ParseErrorKind } from '../errors/index.js';
import { unhandledRecovery, type RecoveryController } from '../recovery/index.js';
import type { SourceMap } from '../span/index.js';
import { isBlank, lineEnd, trimLine, type Line } from '../block/LineScanner.js';
import { Metadata } from './Metadata.js';
import type { MetadataValue, ParsedValue } from './types.js';

export const METADATA_OPEN = '--- meta ---';
export const METADATA_CLOSE = '---';

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?\d+\.\d+$/;
const MAX_LIST_NESTING = 32;

export interface MetadataExtraction {
  metadata: Metadata | null;
  /** Index of the first line after the front matter */
  next: number;
}

export class MetadataExtractor {
  constructor(
    private readonly source: SourceMap,
    private readonly recovery: RecoveryController
  ) {}

  /**
   * Read front matter starting at `lines[from]`. Leading blank lines are
   * allowed; when the first other line is not the opener nothing is consumed.
   */
  extract(lines: readonly Line[], from: number): MetadataExtraction {
    let open = from;
    while (open < lines.length && isBlank(lines[open])) open++;
    if (open >= lines.length || lines[open].text.trimEnd() !== METADATA_OPEN) {
      return { metadata: null, next: from };
    }

    let close = -1;
    for (let i = open + 1; i < lines.length; i++) {
      if (lines[i].text.trim() === METADATA_CLOSE) {
        close = i;
        break;
      }
    }

    let contentEnd = close;
    if (close === -1) {
      this.recovery.report(
        ParseErrorKind.MalformedMetadata,
        this.lineSpan(lines[open]),
        `Front matter opened by "${METADATA_OPEN}" is never closed by "${METADATA_CLOSE}"`
      );
      contentEnd = open + 1;
      while (contentEnd < lines.length && isEntryLine(lines[contentEnd])) contentEnd++;
    }

    const entries = new Map<string, MetadataValue>();
    for (let i = open + 1; i < contentEnd; i++) {
      this.readEntry(lines[i], entries);
    }

    const last = close === -1 ? lines[contentEnd - 1] : lines[close];
    const span = this.source.span(lines[open].start, lineEnd(last));

    return {
      metadata: new Metadata(entries, span),
      next: close === -1 ? contentEnd : close + 1,
    };
  }

  private readEntry(line: Line, entries: Map<string, MetadataValue>): void {
    const trimmed = trimLine(line);
    if (trimmed.text.length === 0 || trimmed.text.startsWith('#')) return;

    const colon = trimmed.text.indexOf(':');
    const key = colon === -1 ? '' : trimmed.text.slice(0, colon).trim();
    if (!key) {
      this.recovery.report(
        ParseErrorKind.MalformedMetadata,
        this.lineSpan(trimmed),
        `Expected "key: value" in front matter, found "${trimmed.text}"`
      );
      return;
    }

    const rawValue = trimmed.text.slice(colon + 1);
    const parsed = parseMetadataValue(rawValue);
    if (!parsed.valid) {
      const valueStart = trimmed.start + colon + 1 + (rawValue.length - rawValue.trimStart().length);
      const strategy = this.recovery.report(
        ParseErrorKind.MalformedMetadata,
        this.source.span(valueStart, lineEnd(trimmed)),
        `Unrecognised value syntax for "${key}"`
      );
      // The entry keeps the raw string
      if (strategy !== 'keep-raw-value') unhandledRecovery(strategy);
    }

    // A repeated key keeps the last value
    entries.set(key, parsed.value);
  }

  private lineSpan(line: Line) {
    const trimmed = trimLine(line);
    return this.source.span(trimmed.start, lineEnd(trimmed));
  }
}

function isEntryLine(line: Line): boolean {
  const text = line.text.trim();
  return text.length > 0 && (text.startsWith('#') || text.includes(':'));
}

// =============================================================================
// Value grammar
// =============================================================================

export function parseMetadataValue(raw: string): ParsedValue {
  return parseValue(raw, 0);
}

function parseValue(raw: string, depth: number): ParsedValue {
  const text = raw.trim();
  if (text === '') return { value: '', valid: true };

  if (text[0] === '"' || text[0] === "'") {
    const quoted = readQuoted(text, 0);
    if (!quoted || quoted.end !== text.length) return { value: text, valid: false };
    return { value: quoted.value, valid: true };
  }

  if (text[0] === '[') {
    return parseList(text, depth);
  }

  if (INTEGER.test(text)) {
    const value = Number(text);
    return { value: Number.isSafeInteger(value) ? value : text, valid: true };
  }
  if (FLOAT.test(text)) {
    return { value: Number(text), valid: true };
  }
  if (text === 'true' || text === 'false') {
    return { value: text === 'true', valid: true };
  }

  return { value: text, valid: true };
}

/**
 * Quoted string starting at `text[start]`. Double quotes take backslash
 * escapes, single quotes only `''`.
 */
function readQuoted(text: string, start: number): { value: string; end: number } | null {
  const quote = text[start];
  let value = '';
  let i = start + 1;

  while (i < text.length) {
    const char = text[i];
    if (quote === '"' && char === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
      i += 2;
      continue;
    }
    if (char === quote) {
      if (quote === "'" && text[i + 1] === "'") {
        value += "'";
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += char;
    i++;
  }

  return null;
}

function parseList(text: string, depth: number): ParsedValue {
  const invalid: ParsedValue = { value: text, valid: false };
  if (!text.endsWith(']') || text.length < 2 || depth >= MAX_LIST_NESTING) return invalid;

  const inner = text.slice(1, -1);
  if (inner.trim() === '') return { value: [], valid: true };

  const items = splitListItems(inner);
  if (!items) return invalid;

  const values: MetadataValue[] = [];
  for (const item of items) {
    // Empty items are dropped: `[a, , b]` and `[a, b,]` hold two values
    if (item.trim() === '') continue;
    const parsed = parseValue(item, depth + 1);
    if (!parsed.valid) return invalid;
    values.push(parsed.value);
  }

  return { value: Object.freeze(values), valid: true };
}

/**
 * Split on top-level commas, skipping quoted text and nested lists
 */
function splitListItems(inner: string): string[] | null {
  const items: string[] = [];
  let depth = 0;
  let itemStart = 0;
  let i = 0;

  while (i < inner.length) {
    const char = inner[i];
    if (char === '"' || char === "'") {
      const quoted = readQuoted(inner, i);
      if (!quoted) return null;
      i = quoted.end;
      continue;
    }
    if (char === '[') depth++;
    if (char === ']') {
      depth--;
      if (depth < 0) return null;
    }
    if (char === ',' && depth === 0) {
      items.push(inner.slice(itemStart, i));
      itemStart = i + 1;
    }
    i++;
  }

  if (depth !== 0) return null;
  items.push(inner.slice(itemStart));
  return items;
}
