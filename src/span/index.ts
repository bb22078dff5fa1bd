/**
 * Span tracking
 *
 * Byte-offset spans attached to every node, and the source map that
 * produces them.
 */

export { createSpan, mergeSpans, isEmptySpan, spanContains } from './Span.js';
export type { Span } from './Span.js';
export { SourceMap } from './SourceMap.js';
export type { SourceLocation } from './SourceMap.js';
