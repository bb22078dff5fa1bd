/**
 * SourceMap
 *
 * Converts the UTF-16 indices the scanners work with into UTF-8 byte
 * offsets, and byte offsets back into line/column locations.
 *
 * @since 2026-10-19
 */

import { createSpan, type Span } from './Span.js';

/**
 * A resolved position in the source
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;

  /** 1-based column, counted in UTF-16 code units */
  column: number;

  /** UTF-8 byte offset */
  offset: number;
}

const ASCII_ONLY = /^[\x00-\x7f]*$/;

export class SourceMap {
  readonly byteLength: number;
  private readonly byteOffsets: Uint32Array | null;
  private readonly lineStarts: number[];

  constructor(readonly text: string) {
    this.byteOffsets = ASCII_ONLY.test(text) ? null : SourceMap.computeByteOffsets(text);
    this.byteLength = this.byteOffsets ? this.byteOffsets[text.length] : text.length;
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
    }
  }

  /**
   * Byte offset of the character at `index` (or of the end of input)
   */
  byteOffset(index: number): number {
    const clamped = Math.max(0, Math.min(index, this.text.length));
    return this.byteOffsets ? this.byteOffsets[clamped] : clamped;
  }

  /**
   * Span covering the UTF-16 range `[startIndex, endIndex)`
   */
  span(startIndex: number, endIndex: number): Span {
    return createSpan(this.byteOffset(startIndex), this.byteOffset(Math.max(startIndex, endIndex)));
  }

  /**
   * UTF-16 index of the character starting at (or containing) a byte offset
   */
  indexOf(byteOffset: number): number {
    if (!this.byteOffsets) return Math.max(0, Math.min(byteOffset, this.text.length));

    let low = 0;
    let high = this.text.length;
    while (low < high) {
      const mid = (low + high + 1) >>> 1;
      if (this.byteOffsets[mid] <= byteOffset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }

  /**
   * Text covered by a span
   */
  sliceBytes(span: Span): string {
    return this.text.slice(this.indexOf(span.start), this.indexOf(span.end));
  }

  /**
   * Line and column of a byte offset
   */
  locate(byteOffset: number): SourceLocation {
    const index = this.indexOf(byteOffset);

    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >>> 1;
      if (this.lineStarts[mid] <= index) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return {
      line: low + 1,
      column: index - this.lineStarts[low] + 1,
      offset: this.byteOffset(index),
    };
  }

  private static computeByteOffsets(text: string): Uint32Array {
    const offsets = new Uint32Array(text.length + 1);
    let bytes = 0;

    for (let i = 0; i < text.length; i++) {
      offsets[i] = bytes;
      const code = text.charCodeAt(i);
      if (code < 0x80) {
        bytes += 1;
      } else if (code < 0x800) {
        bytes += 2;
      } else if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
        const next = text.charCodeAt(i + 1);
        if (next >= 0xdc00 && next <= 0xdfff) {
          // Surrogate pair: the low half shares the end of the 4-byte sequence
          bytes += 4;
          offsets[++i] = bytes;
          continue;
        }
        bytes += 3;
      } else {
        bytes += 3;
      }
    }

    offsets[text.length] = bytes;
    return offsets;
  }
}
