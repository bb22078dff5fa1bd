/**
 * Front matter extraction
 */

export { Metadata } from './Metadata.js';
export {
  MetadataExtractor,
  parseMetadataValue,
  METADATA_OPEN,
  METADATA_CLOSE,
  type MetadataExtraction,
} from './MetadataExtractor.js';
export type { MetadataValue, ParsedValue } from './types.js';
