/**
 * Span
 *
 * Byte ranges into the original source buffer. Spans are plain integers and
 * never hold a reference to the text they were taken from.
 *
 * @since 2026-10-19
 */

/**
 * A half-open `[start, end)` range of UTF-8 byte offsets
 */
export interface Span {
  /** Starting byte offset (inclusive) */
  readonly start: number;

  /** Ending byte offset (exclusive) */
  readonly end: number;

  /** `end - start` */
  readonly len: number;
}

/**
 * Create a span, rejecting negative or inverted ranges
 */
export function createSpan(start: number, end: number): Span {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
    throw new RangeError(`Invalid span ${start}..${end}`);
  }
  return { start, end, len: end - start };
}

/**
 * Smallest span covering both inputs
 */
export function mergeSpans(a: Span, b: Span): Span {
  return createSpan(Math.min(a.start, b.start), Math.max(a.end, b.end));
}

export function isEmptySpan(span: Span): boolean {
  return span.len === 0;
}

/**
 * Check whether a byte offset falls inside the span
 */
export function spanContains(span: Span, offset: number): boolean {
  return offset >= span.start && offset < span.end;
}
