/**
 * Tests for front matter extraction
 */
import { describe, it, expect } from 'vitest';
import { parse, parseWithRecovery } from '../src/index.js';
import { parseMetadataValue } from '../src/metadata/index.js';

describe('parseMetadataValue', () => {
  it('should parse scalars', () => {
    expect(parseMetadataValue('"Test Doc"')).toEqual({ value: 'Test Doc', valid: true });
    expect(parseMetadataValue("'it''s'")).toEqual({ value: "it's", valid: true });
    expect(parseMetadataValue('42')).toEqual({ value: 42, valid: true });
    expect(parseMetadataValue('-7')).toEqual({ value: -7, valid: true });
    expect(parseMetadataValue('3.14')).toEqual({ value: 3.14, valid: true });
    expect(parseMetadataValue('true')).toEqual({ value: true, valid: true });
    expect(parseMetadataValue('false')).toEqual({ value: false, valid: true });
    expect(parseMetadataValue('')).toEqual({ value: '', valid: true });
    expect(parseMetadataValue(' hello world ')).toEqual({ value: 'hello world', valid: true });
  });

  it('should apply escapes inside double quotes', () => {
    expect(parseMetadataValue('"line\\nbreak"')).toEqual({ value: 'line\nbreak', valid: true });
  });

  it('should parse lists with quoted commas', () => {
    expect(parseMetadataValue('[a, 2, "c, d"]')).toEqual({ value: ['a', 2, 'c, d'], valid: true });
    expect(parseMetadataValue('[]')).toEqual({ value: [], valid: true });
  });

  it('should drop empty list items', () => {
    expect(parseMetadataValue('[a, , b]')).toEqual({ value: ['a', 'b'], valid: true });
    expect(parseMetadataValue('[a, b,]')).toEqual({ value: ['a', 'b'], valid: true });
    expect(parseMetadataValue('[,]')).toEqual({ value: [], valid: true });
  });

  it('should read a leading plus sign as a bare string', () => {
    expect(parseMetadataValue('+5')).toEqual({ value: '+5', valid: true });
    expect(parseMetadataValue('+1.5')).toEqual({ value: '+1.5', valid: true });
  });

  it('should refuse lists nested deeper than 32 levels', () => {
    expect(parseMetadataValue(`${'['.repeat(32)}a${']'.repeat(32)}`).valid).toBe(true);
    const deep = `${'['.repeat(33)}a${']'.repeat(33)}`;
    expect(parseMetadataValue(deep)).toEqual({ value: deep, valid: false });
  });

  it('should keep integers beyond the safe range as strings', () => {
    expect(parseMetadataValue('99999999999999999999')).toEqual({ value: '99999999999999999999', valid: true });
  });

  it('should flag unrecognised syntax and keep the raw text', () => {
    expect(parseMetadataValue('"unterminated')).toEqual({ value: '"unterminated', valid: false });
    expect(parseMetadataValue('"a" tail')).toEqual({ value: '"a" tail', valid: false });
    expect(parseMetadataValue('[a, b')).toEqual({ value: '[a, b', valid: false });
  });
});

describe('front matter', () => {
  it('should extract typed values', () => {
    const text = '--- meta ---\ntitle: "Test Doc"\nversion: 1\n---\n\n# Body';
    const doc = parse(text);

    expect(doc.metadata?.get('title')).toBe('Test Doc');
    expect(doc.metadata?.get('version')).toBe(1);
    expect(doc.metadata?.has('title')).toBe(true);
    expect(doc.metadata?.get('missing', 'fallback')).toBe('fallback');
    expect(doc.metadata?.span).toEqual({ start: 0, end: 45, len: 45 });
    expect(doc.blocks.map((block) => block.type)).toEqual(['heading']);
  });

  it('should keep entries in order and skip comments', () => {
    const text = [
      '--- meta ---',
      'title: "Test Doc"',
      'version: 1',
      'draft: true',
      'ratio: 0.5',
      'tags: [a, b]',
      '# comment',
      '---',
    ].join('\n');
    const doc = parse(text);

    expect(doc.metadata?.keys()).toEqual(['title', 'version', 'draft', 'ratio', 'tags']);
    expect(doc.metadata?.toJSON()).toEqual({
      title: 'Test Doc',
      version: 1,
      draft: true,
      ratio: 0.5,
      tags: ['a', 'b'],
    });
    expect(doc.blocks).toEqual([]);
  });

  it('should keep the last value of a repeated key', () => {
    const doc = parse('--- meta ---\na: 1\na: 2\n---');
    expect(doc.metadata?.keys()).toEqual(['a']);
    expect(doc.metadata?.get('a')).toBe(2);
  });

  it('should allow blank lines before the front matter', () => {
    const doc = parse('\n\n--- meta ---\na: 1\n---');
    expect(doc.metadata?.get('a')).toBe(1);
  });

  it('should return null metadata without front matter', () => {
    expect(parse('# Title').metadata).toBeNull();
  });

  it('should parse a later "---" as a thematic break', () => {
    const doc = parse('--- meta ---\na: 1\n---\n\n---');
    expect(doc.blocks.map((block) => block.type)).toEqual(['thematic_break']);
  });

  it('should report a malformed value and keep it raw', () => {
    const result = parseWithRecovery('--- meta ---\ntitle: "oops\n---');

    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      {
        kind: 'malformed_metadata',
        span: { start: 20, end: 25, len: 5 },
        message: 'Unrecognised value syntax for "title"',
      },
    ]);
    expect(result.document.metadata?.get('title')).toBe('"oops');
  });

  it('should report a line without a key', () => {
    const result = parseWithRecovery('--- meta ---\njust text\nkey: v\n---');

    expect(result.errors.map((error) => error.message)).toEqual([
      'Expected "key: value" in front matter, found "just text"',
    ]);
    expect(result.document.metadata?.keys()).toEqual(['key']);
  });

  it('should end unclosed front matter at the last entry line', () => {
    const result = parseWithRecovery('--- meta ---\ntitle: Hello\n\n# Heading');

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].kind).toBe('malformed_metadata');
    expect(result.errors[0].span).toEqual({ start: 0, end: 12, len: 12 });
    expect(result.document.metadata?.get('title')).toBe('Hello');
    expect(result.document.blocks.map((block) => block.type)).toEqual(['heading']);
  });

  it('should throw for malformed metadata under md-strict', () => {
    expect(() => parse('--- meta ---\ntitle: "oops\n---', 'md-strict')).toThrow(
      'Unrecognised value syntax for "title" at bytes 20..25'
    );
  });
});
