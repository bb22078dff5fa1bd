/**
 * Inline parsing of leaf text
 */

export { InlineParser } from './InlineParser.js';
export { LeafText, type TextSegment } from './LeafText.js';
