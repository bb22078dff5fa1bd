/**
 * Block parsing
 */

export { BlockParser } from './BlockParser.js';
export { ListParser, type BareListResult } from './ListParser.js';
export { TableParser, splitCells, type BareTableResult } from './TableParser.js';
export { FootnotesParser } from './FootnotesParser.js';
export { LineGroup } from './LineGroup.js';
export {
  parseAttributes,
  stringAttribute,
  flagAttribute,
  integerAttribute,
  type AttributeValueRange,
  type ParsedAttributes,
} from './attributes.js';
export * from './LineScanner.js';
export { EMPTY_ATTRIBUTES, type BlockParserContext, type NestedBlockParser } from './types.js';
