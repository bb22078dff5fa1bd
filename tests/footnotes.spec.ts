/**
 * Tests for ::footnotes and footnote references
 */
import { describe, it, expect } from 'vitest';
import { parse, parseWithRecovery, inlineText, type Block, type FootnotesBlock } from '../src/index.js';

function footnotes(block: Block | undefined): FootnotesBlock {
  expect(block?.type).toBe('footnotes');
  if (block?.type !== 'footnotes') throw new Error(`Expected footnotes, got ${block?.type}`);
  return block;
}

describe('::footnotes', () => {
  it('should collect definitions with indented continuations', () => {
    const text = '::footnotes\n[^1]: First note.\n    Indented continuation.\n[^src]: Second.\n::';
    const block = footnotes(parse(text).blocks[0]);

    expect(block.definitions.map((definition) => definition.id)).toEqual(['1', 'src']);
    const [first] = block.definitions;
    expect(first.span).toEqual({ start: 12, end: 56, len: 44 });
    expect(first.blocks.map((child) => (child.type === 'paragraph' ? inlineText(child.content) : child.type))).toEqual([
      'First note. Indented continuation.',
    ]);
  });

  it('should report content that is not a definition', () => {
    const result = parseWithRecovery('::footnotes\nstray\n[^1]: ok\n::');

    expect(result.errors).toEqual([
      {
        kind: 'invalid_footnote_definition',
        span: { start: 12, end: 17, len: 5 },
        message: 'Expected a "[^id]: text" footnote definition, found "stray"',
      },
    ]);
    expect(footnotes(result.document.blocks[0]).definitions).toHaveLength(1);
  });

  it('should report an unindented line after a blank', () => {
    const result = parseWithRecovery('::footnotes\n[^1]: ok\n\nloose\n::');

    expect(result.errors.map((error) => error.kind)).toEqual(['invalid_footnote_definition']);
    expect(footnotes(result.document.blocks[0]).definitions).toHaveLength(1);
  });

  it('should need the footnotes module under md', () => {
    const text = 'Text[^1]\n\n::footnotes\n[^1]: Note\n::';

    expect(parse(text, 'md').blocks.map((block) => block.type)).toEqual(['paragraph', 'raw']);

    const blocks = parse(text, { profile: 'md', modules: ['footnotes'] }).blocks;
    expect(blocks.map((block) => block.type)).toEqual(['paragraph', 'footnotes']);
    expect(blocks[0].type === 'paragraph' && blocks[0].content.map((inline) => inline.type)).toEqual([
      'text',
      'footnote_ref',
    ]);
  });
});
