/**
 * Tests for span invariants over whole documents
 */
import { describe, it, expect } from 'vitest';
import { parseWithRecovery, type Block, type Inline, type Span } from '../src/index.js';

const SAMPLE = [
  '--- meta ---',
  'title: "Ünïcödé"',
  '---',
  '',
  '# Grüße *wörld*',
  '',
  'Some text with `cødé` and [[Seite|https://example.de/ü]] and a note[^1].',
  'Second line  ',
  'after a hard break.',
  '',
  '- ëins',
  '- zwëi',
  '  - nested ñ',
  '',
  '| Spalte | Wert |',
  '|:------|-----:|',
  '| ä | 1 |',
  '| ö |',
  '',
  '::callout type=tip title="Tipp"',
  'Inside 😀 **callout**.',
  '::',
  '',
  '::figure src="bild.png" caption="Ein *Bild*"',
  '> zitiert',
  '::',
  '',
  '::footnotes',
  '[^1]: Fußnote.',
  '::',
].join('\n');

/**
 * Every sequence of sibling spans, with a label for failure messages
 */
function collectSiblings(blocks: readonly Block[], label: string, out: Array<[string, Span[]]>): void {
  out.push([label, blocks.map((block) => block.span)]);

  blocks.forEach((block, index) => {
    const path = `${label}/${index}:${block.type}`;
    switch (block.type) {
      case 'heading':
      case 'paragraph':
        collectInlines(block.content, path, out);
        break;
      case 'list':
        out.push([`${path}/items`, block.items.map((item) => item.span)]);
        block.items.forEach((item, i) => collectSiblings(item.blocks, `${path}/item${i}`, out));
        break;
      case 'callout':
      case 'quote':
        collectSiblings(block.blocks, path, out);
        break;
      case 'figure':
        if (block.caption) collectInlines(block.caption, `${path}/caption`, out);
        collectSiblings(block.blocks, path, out);
        break;
      case 'table':
        out.push([`${path}/rows`, block.rows.map((row) => row.span)]);
        block.rows.forEach((row, r) => {
          out.push([`${path}/row${r}`, row.cells.map((cell) => cell.span)]);
          row.cells.forEach((cell, c) => collectInlines(cell.content, `${path}/row${r}/cell${c}`, out));
        });
        break;
      case 'footnotes':
        out.push([`${path}/definitions`, block.definitions.map((definition) => definition.span)]);
        block.definitions.forEach((definition, d) => collectSiblings(definition.blocks, `${path}/def${d}`, out));
        break;
      default:
        break;
    }
  });
}

function collectInlines(inlines: readonly Inline[], label: string, out: Array<[string, Span[]]>): void {
  out.push([label, inlines.map((inline) => inline.span)]);
  inlines.forEach((inline, index) => {
    if (inline.type === 'emphasis' || inline.type === 'strong' || inline.type === 'strikethrough' || inline.type === 'link') {
      collectInlines(inline.children, `${label}/${index}:${inline.type}`, out);
    }
  });
}

describe('span invariants', () => {
  const result = parseWithRecovery(SAMPLE);
  const byteLength = Buffer.byteLength(SAMPLE, 'utf8');
  const siblings: Array<[string, Span[]]> = [];
  collectSiblings(result.document.blocks, 'root', siblings);

  it('should span the whole buffer with the document', () => {
    expect(result.document.span).toEqual({ start: 0, end: byteLength, len: byteLength });
  });

  it('should parse the sample structure', () => {
    expect(result.document.blocks.map((block) => block.type)).toEqual([
      'heading',
      'paragraph',
      'list',
      'table',
      'callout',
      'figure',
      'footnotes',
    ]);
    expect(result.errors.map((error) => error.message)).toEqual(['Row has 1 cells, expected 2']);
  });

  it('should keep every span inside the buffer with len = end - start', () => {
    for (const [label, spans] of siblings) {
      for (const span of spans) {
        expect(span.start, label).toBeGreaterThanOrEqual(0);
        expect(span.end, label).toBeLessThanOrEqual(byteLength);
        expect(span.len, label).toBe(span.end - span.start);
      }
    }
    for (const error of result.errors) {
      expect(error.span.end).toBeLessThanOrEqual(byteLength);
    }
  });

  it('should never overlap sibling spans', () => {
    for (const [label, spans] of siblings) {
      for (let i = 1; i < spans.length; i++) {
        expect(spans[i].start, label).toBeGreaterThanOrEqual(spans[i - 1].end);
      }
    }
  });

  it('should point text spans at their UTF-8 bytes', () => {
    const source = Buffer.from(SAMPLE, 'utf8');
    const heading = result.document.blocks[0];
    expect(heading.type).toBe('heading');
    if (heading.type !== 'heading') return;

    const [text, emphasis] = heading.content;
    expect(text.type === 'text' && text.content).toBe('Grüße ');
    expect(source.subarray(text.span.start, text.span.end).toString('utf8')).toBe('Grüße ');
    expect(source.subarray(emphasis.span.start, emphasis.span.end).toString('utf8')).toBe('*wörld*');
  });
});
