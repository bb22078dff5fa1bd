/**
 * Tests for line classification and directive attributes
 */
import { describe, it, expect } from 'vitest';
import {
  isMalformedListMarker,
  isTableSeparator,
  isThematicBreak,
  matchDirectiveOpen,
  matchHeading,
  matchListMarker,
  splitLines,
} from '../src/block/LineScanner.js';
import { flagAttribute, integerAttribute, parseAttributes, stringAttribute } from '../src/block/attributes.js';
import { splitCells } from '../src/block/TableParser.js';

describe('LineScanner', () => {
  it('should split on LF and CRLF without a trailing empty line', () => {
    expect(splitLines('a\r\nb\n')).toEqual([
      { text: 'a', start: 0 },
      { text: 'b', start: 3 },
    ]);
  });

  it('should match headings and their content range', () => {
    expect(matchHeading('## Title ##')).toEqual({ level: 2, contentStart: 3, contentEnd: 8 });
    expect(matchHeading('#')).toEqual({ level: 1, contentStart: 1, contentEnd: 1 });
    expect(matchHeading('#NoSpace')).toBeNull();
  });

  it('should recognise thematic breaks', () => {
    expect(isThematicBreak('* * *')).toBe(true);
    expect(isThematicBreak('---')).toBe(true);
    expect(isThematicBreak('--')).toBe(false);
  });

  it('should match directive openers', () => {
    expect(matchDirectiveOpen('::callout type=note')).toEqual({ name: 'callout', attributesOffset: 9 });
    expect(matchDirectiveOpen('::')).toBeNull();
    expect(matchDirectiveOpen('::1abc')).toBeNull();
  });

  it('should match list markers', () => {
    expect(matchListMarker('1. x')).toEqual({ ordered: true, number: 1, contentOffset: 3 });
    expect(matchListMarker('-   x')).toEqual({ ordered: false, number: null, contentOffset: 4 });
    expect(matchListMarker('- ')).toEqual({ ordered: false, number: null, contentOffset: 2 });
    expect(matchListMarker('-x')).toBeNull();
  });

  it('should flag malformed list markers', () => {
    expect(isMalformedListMarker('-x')).toBe(true);
    expect(isMalformedListMarker('1) a')).toBe(true);
    expect(isMalformedListMarker('12345678901. a')).toBe(true);
    expect(isMalformedListMarker('- a')).toBe(false);
    expect(isMalformedListMarker('---')).toBe(false);
  });

  it('should recognise separator rows', () => {
    expect(isTableSeparator('| :-- | --: |')).toBe(true);
    expect(isTableSeparator('| a |')).toBe(false);
    expect(isTableSeparator('---')).toBe(false);
  });

  it('should split cells without the outer pipes', () => {
    expect(splitCells({ text: '| a | b |', start: 10 })).toEqual([
      { text: 'a', start: 12 },
      { text: 'b', start: 16 },
    ]);
    expect(splitCells({ text: 'a | b', start: 0 })).toEqual([
      { text: 'a', start: 0 },
      { text: 'b', start: 4 },
    ]);
  });
});

describe('parseAttributes', () => {
  it('should read quoted values, bare values and flags', () => {
    const { attributes, ranges } = parseAttributes('type=warning title="Be Careful" ordered');

    expect(attributes).toEqual({ type: 'warning', title: 'Be Careful', ordered: true });
    expect(ranges.get('title')).toEqual({ start: 20, end: 30 });
    expect(ranges.has('ordered')).toBe(false);
  });

  it('should run an unterminated quote to the end', () => {
    expect(parseAttributes('title="open').attributes).toEqual({ title: 'open' });
  });

  it('should keep keys named like Object.prototype members', () => {
    const { attributes } = parseAttributes('__proto__=x constructor');

    expect(Object.keys(attributes)).toEqual(['__proto__', 'constructor']);
    expect(stringAttribute(attributes, '__proto__')).toBe('x');
    expect(flagAttribute(attributes, 'constructor')).toBe(true);
    expect(Object.isFrozen(attributes)).toBe(true);
  });

  it('should not read inherited members as attributes', () => {
    const { attributes } = parseAttributes('type=note');

    expect(stringAttribute(attributes, 'toString')).toBeNull();
    expect(flagAttribute(attributes, 'hasOwnProperty')).toBe(false);
  });

  it('should only accept plain integers', () => {
    expect(integerAttribute({ start: '12' }, 'start')).toBe(12);
    expect(integerAttribute({ start: '-1' }, 'start')).toBeNull();
    expect(integerAttribute({ start: true }, 'start')).toBeNull();
  });
});
