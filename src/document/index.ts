/**
 * Document assembly and the public parser API
 */

export { Parser, parse, parseWithRecovery, type ParseResult } from './Parser.js';
export { DocumentAssembler, type Assembly } from './DocumentAssembler.js';
export {
  parserOptionsSchema,
  resolveParserOptions,
  DEFAULT_MAX_NESTING_DEPTH,
  type ParserOptions,
  type ResolvedParserOptions,
} from './options.js';
export { readDocumentDirectives, type DocumentDirectives } from './directives.js';
