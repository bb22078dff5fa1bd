/**
 * Diagnostics and error classes
 */

export { ParseErrorKind } from './types.js';
export type { ParseError } from './types.js';
export {
  LitedocError,
  DocumentParseError,
  NestingDepthExceededError,
  InvalidParserOptionsError,
  formatParseError,
} from './errors.js';
