/**
 * Document tree types and queries
 */

export * from './types.js';
export {
  DocumentTree,
  blockInlines,
  childBlocks,
  childInlines,
  inlineText,
  type BlockOfType,
  type InlineOfType,
} from './DocumentTree.js';
