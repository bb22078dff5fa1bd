/**
 * litedoc-parser
 *
 * Deterministic LiteDoc / Markdown parser producing a typed document tree
 * with UTF-8 byte spans on every node.
 *
 * ## Recommended API (use these):
 * - parse, parseWithRecovery - One-shot parsing
 * - Parser - Reusable parser bound to a profile and options
 * - DocumentTree - Queries over a parsed document
 *
 * ## Types:
 * - Document, Block, Inline and their variants from './ast'
 * - ParseError, ParseErrorKind from './errors'
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

// Entry points and options
export {
  Parser,
  parse,
  parseWithRecovery,
  resolveParserOptions,
  parserOptionsSchema,
  DEFAULT_MAX_NESTING_DEPTH,
  type ParseResult,
  type ParserOptions,
  type ResolvedParserOptions,
} from './document/index.js';

// Document tree
export * from './ast/index.js';
export { Metadata, type MetadataValue } from './metadata/index.js';

// Profiles and modules
export { Profile, Module, ProfilePolicy, profileFromName, moduleFromName } from './profile/index.js';
export type { Construct, DirectiveName, InlineFeatures } from './profile/index.js';

// Errors and diagnostics
export * from './errors/index.js';
export {
  recoveryFor,
  type RecoveryAction,
  type RecoveryStrategy,
  type RecoveryStrategyFor,
} from './recovery/index.js';

// Spans
export * from './span/index.js';
