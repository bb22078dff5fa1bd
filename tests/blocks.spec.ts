/**
 * Tests for block structure: headings, code, directives, quotes, HTML
 */
import { describe, it, expect } from 'vitest';
import { parse, parseWithRecovery, DocumentParseError, type Block } from '../src/index.js';

function only(blocks: readonly Block[]): Block {
  expect(blocks).toHaveLength(1);
  return blocks[0];
}

describe('headings', () => {
  it('should parse ATX headings at levels 1 to 6', () => {
    for (let level = 1; level <= 6; level++) {
      const block = only(parse(`${'#'.repeat(level)} Title`).blocks);
      expect(block.type).toBe('heading');
      if (block.type !== 'heading') continue;
      expect(block.level).toBe(level);
      expect(block.content).toEqual([
        {
          type: 'text',
          content: 'Title',
          span: { start: level + 1, end: level + 6, len: 5 },
        },
      ]);
    }
  });

  it('should span the whole heading line', () => {
    expect(only(parse('# Hello').blocks).span).toEqual({ start: 0, end: 7, len: 7 });
  });

  it('should strip a closing sequence', () => {
    const block = only(parse('## Title ##').blocks);
    expect(block.type === 'heading' && block.content.map((inline) => inline.type === 'text' && inline.content)).toEqual(
      ['Title']
    );
  });

  it('should not treat "#" without a space as a heading', () => {
    expect(only(parse('#NoSpace').blocks).type).toBe('paragraph');
  });

  it('should clamp headings deeper than six levels', () => {
    const result = parseWithRecovery('####### Seven');

    const block = only(result.document.blocks);
    expect(block.type === 'heading' && block.level).toBe(6);
    expect(result.errors).toEqual([
      {
        kind: 'invalid_heading_level',
        span: { start: 0, end: 13, len: 13 },
        message: 'Heading level 7 exceeds the maximum of 6',
      },
    ]);
  });

  it('should throw for a seven-level heading under md-strict', () => {
    expect(() => parse('####### Seven', 'md-strict')).toThrow(DocumentParseError);
  });
});

describe('code blocks', () => {
  it('should keep the fence language and raw content', () => {
    const block = only(parse('```ts\nconst x = 1;\n```').blocks);
    expect(block).toEqual({
      type: 'code_block',
      language: 'ts',
      content: 'const x = 1;',
      span: { start: 0, end: 22, len: 22 },
    });
  });

  it('should run an unclosed fence to the end of input', () => {
    const result = parseWithRecovery('```\ncode\n::');

    expect(result.ok).toBe(true);
    const block = only(result.document.blocks);
    expect(block.type === 'code_block' && block.content).toBe('code\n::');
  });

  it('should not close a directive from inside a fence', () => {
    const result = parseWithRecovery('::callout\n```\n::\n```\n::');

    expect(result.ok).toBe(true);
    const callout = only(result.document.blocks);
    expect(callout.type).toBe('callout');
    if (callout.type !== 'callout') return;
    expect(callout.blocks).toEqual([
      { type: 'code_block', language: null, content: '::', span: { start: 10, end: 20, len: 10 } },
    ]);
  });

  it('should read a fence line padded with long whitespace runs in linear time', () => {
    const padding = ' '.repeat(20000);
    const started = performance.now();

    const rejected = parse(`\`\`\`${padding}\`x`).blocks;
    const accepted = only(parse(`\`\`\`${padding}ts${padding}\nx\n\`\`\``).blocks);

    expect(performance.now() - started).toBeLessThan(1000);
    expect(rejected.map((block) => block.type)).toEqual(['paragraph']);
    expect(accepted.type === 'code_block' && accepted.language).toBe('ts');
  });
});

describe('container directives', () => {
  it('should read callout attributes', () => {
    const block = only(parse('::callout type="warning" title="Be Careful"\nStay *alert*.\n::').blocks);

    expect(block.type).toBe('callout');
    if (block.type !== 'callout') return;
    expect(block.kind).toBe('warning');
    expect(block.title).toBe('Be Careful');
    expect(block.attributes).toEqual({ type: 'warning', title: 'Be Careful' });
    expect(block.blocks.map((child) => child.type)).toEqual(['paragraph']);
  });

  it('should default the callout kind to note', () => {
    const block = only(parse('::callout\nx\n::').blocks);
    expect(block.type === 'callout' && [block.kind, block.title]).toEqual(['note', null]);
  });

  it('should nest directives', () => {
    const callout = only(parse('::callout\n::quote\ninner\n::\n::').blocks);
    expect(callout.type).toBe('callout');
    if (callout.type !== 'callout') return;

    const quote = only(callout.blocks);
    expect(quote.type).toBe('quote');
    expect(quote.type === 'quote' && quote.blocks.map((child) => child.type)).toEqual(['paragraph']);
  });

  it('should inline-parse a figure caption at its source position', () => {
    const figure = only(parse('::figure src="img.png" alt="A cat" caption="The *cat*"\n::').blocks);

    expect(figure.type).toBe('figure');
    if (figure.type !== 'figure') return;
    expect(figure.src).toBe('img.png');
    expect(figure.alt).toBe('A cat');
    expect(figure.caption).toEqual([
      { type: 'text', content: 'The ', span: { start: 44, end: 48, len: 4 } },
      {
        type: 'emphasis',
        children: [{ type: 'text', content: 'cat', span: { start: 49, end: 52, len: 3 } }],
        span: { start: 48, end: 53, len: 5 },
      },
    ]);
    expect(figure.blocks).toEqual([]);
  });

  it('should leave the caption null without a caption attribute', () => {
    const figure = only(parse('::figure src="a.png"\nBody text.\n::').blocks);
    expect(figure.type === 'figure' && figure.caption).toBeNull();
    expect(figure.type === 'figure' && figure.blocks.map((child) => child.type)).toEqual(['paragraph']);
  });

  it('should keep math content raw', () => {
    expect(only(parse('::math display\nE = mc^2\n::').blocks)).toMatchObject({
      type: 'math',
      display: true,
      content: 'E = mc^2',
    });
    expect(only(parse('::math\nx *y*\n::').blocks)).toMatchObject({ type: 'math', display: false, content: 'x *y*' });
  });

  it('should keep html directive content raw', () => {
    expect(only(parse('::html\n<div>hi</div>\n::').blocks)).toMatchObject({
      type: 'html',
      content: '<div>hi</div>',
    });
  });

  it('should report an unterminated directive and keep its children', () => {
    const result = parseWithRecovery('::callout\nbody');

    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      {
        kind: 'unterminated_container',
        span: { start: 0, end: 9, len: 9 },
        message: 'Directive "::callout" is never closed',
      },
    ]);
    const callout = only(result.document.blocks);
    expect(callout.span).toEqual({ start: 0, end: 14, len: 14 });
    expect(callout.type === 'callout' && callout.blocks.map((child) => child.type)).toEqual(['paragraph']);
  });

  it('should report a stray closing line', () => {
    const result = parseWithRecovery('::');

    expect(result.document.blocks).toEqual([]);
    expect(result.errors).toEqual([
      {
        kind: 'unknown_directive',
        span: { start: 0, end: 2, len: 2 },
        message: 'Closing "::" without an open directive',
      },
    ]);
  });

  it('should ignore a stray closing line under md', () => {
    expect(parseWithRecovery('::', 'md').ok).toBe(true);
  });

  it('should refuse LiteDoc-only directives under md-strict', () => {
    expect(() => parse('::callout\nx\n::', 'md-strict')).toThrow(
      'Directive "::callout" is not enabled by the md-strict profile at bytes 0..9'
    );
  });
});

describe('unknown directives', () => {
  const text = '::unknown_block_type\ncontent\n::';
  const raw = {
    type: 'raw',
    directive: 'unknown_block_type',
    content: 'content',
    attributes: {},
    span: { start: 0, end: 31, len: 31 },
  };

  it('should keep the body raw and report under litedoc', () => {
    const result = parseWithRecovery(text);

    expect(result.document.blocks).toEqual([raw]);
    expect(result.errors.map((error) => error.kind)).toEqual(['unknown_directive']);
    expect(parse(text).blocks).toEqual([raw]);
  });

  it('should keep the body raw silently under md', () => {
    const result = parseWithRecovery(text, 'md');
    expect(result.ok).toBe(true);
    expect(result.document.blocks).toEqual([raw]);
  });

  it('should throw under md-strict', () => {
    let caught: unknown;
    try {
      parse(text, 'md-strict');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DocumentParseError);
    if (!(caught instanceof DocumentParseError)) return;
    expect(caught.kind).toBe('unknown_directive');
    expect(caught.span).toEqual({ start: 0, end: 20, len: 20 });
    expect(caught.message).toBe('Unknown directive "::unknown_block_type" at bytes 0..20');
  });
});

describe('other blocks', () => {
  it('should separate paragraphs by thematic breaks', () => {
    expect(parse('a\n\n---\n\nb').blocks.map((block) => block.type)).toEqual([
      'paragraph',
      'thematic_break',
      'paragraph',
    ]);
  });

  it('should parse ">" quotes with lazy paragraph lines', () => {
    const quote = only(parse('> quoted *text*\n> more').blocks);
    expect(quote.type).toBe('quote');
    if (quote.type !== 'quote') return;

    const paragraph = only(quote.blocks);
    expect(paragraph.type === 'paragraph' && paragraph.content.map((inline) => inline.type)).toEqual([
      'text',
      'emphasis',
      'soft_break',
      'text',
    ]);
    expect(quote.span).toEqual({ start: 0, end: 22, len: 22 });
  });

  it('should read HTML blocks under md until a blank line', () => {
    const blocks = parse('<div>\nhello\n</div>\n\npara', 'md').blocks;
    expect(blocks.map((block) => block.type)).toEqual(['html', 'paragraph']);
    expect(blocks[0]).toMatchObject({ content: '<div>\nhello\n</div>' });
  });

  it('should join paragraph lines and trim the last one', () => {
    const paragraph = only(parse('first\n  second  ').blocks);
    expect(paragraph.span).toEqual({ start: 0, end: 14, len: 14 });
  });
});
