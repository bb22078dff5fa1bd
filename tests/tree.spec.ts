/**
 * Tests for DocumentTree queries
 */
import { describe, it, expect } from 'vitest';
import { DocumentTree, inlineText, parse, type BlockType } from '../src/index.js';

describe('DocumentTree', () => {
  it('should walk blocks depth-first with their depth', () => {
    const tree = new DocumentTree(parse('::callout\n> q\n::\n\nafter'));
    const visited: Array<[BlockType, number]> = [];

    tree.walkBlocks((block, depth) => {
      visited.push([block.type, depth]);
    });

    expect(visited).toEqual([
      ['callout', 0],
      ['quote', 1],
      ['paragraph', 2],
      ['paragraph', 0],
    ]);
  });

  it('should stop walking when the callback returns false', () => {
    const tree = new DocumentTree(parse('a\n\nb\n\nc'));
    let count = 0;

    tree.walkBlocks(() => {
      count++;
      return count < 2;
    });

    expect(count).toBe(2);
  });

  it('should find blocks and inlines by type', () => {
    const tree = new DocumentTree(parse('# *One*\n\n- *two*\n- three'));

    expect(tree.findBlocks('paragraph')).toHaveLength(2);
    expect(tree.findInlines('emphasis').map((emphasis) => inlineText(emphasis.children))).toEqual(['One', 'two']);
  });

  it('should resolve footnote references', () => {
    const tree = new DocumentTree(parse('a[^1] b[^2]\n\n::footnotes\n[^1]: x\n::'));
    const [first] = tree.findInlines('footnote_ref');

    expect(tree.resolveFootnote(first)?.id).toBe('1');
    expect(tree.danglingFootnoteRefs().map((ref) => ref.id)).toEqual(['2']);
  });

  it('should keep the first definition of a repeated id', () => {
    const tree = new DocumentTree(parse('::footnotes\n[^1]: first\n[^1]: second\n::'));
    const definition = tree.footnoteDefinitions().get('1');

    expect(definition?.span.start).toBe(12);
  });

  it('should list headings as an outline', () => {
    const tree = new DocumentTree(parse('# One\n\n## Two *b*'));
    expect(tree.outline()).toEqual([
      { level: 1, text: 'One' },
      { level: 2, text: 'Two b' },
    ]);
  });

  it('should collect the text content', () => {
    const tree = new DocumentTree(parse('# Title\n\nSome **bold**\ntext.'));
    expect(tree.getTextContent()).toBe('Title Some bold text.');
  });
});
