/**
 * Types for parse diagnostics
 *
 * @since 2026-10-19
 */

import type { Span } from '../span/index.js';

/**
 * Structural cause of a diagnostic
 */
export const ParseErrorKind = {
  /** A container directive has no matching `::` */
  UnterminatedContainer: 'unterminated_container',
  /** Directive name not recognised by the profile, or a stray `::` */
  UnknownDirective: 'unknown_directive',
  /** Missing separator row, mismatched column count, non-row line in a table */
  MalformedTable: 'malformed_table',
  /** Front matter line or value that does not follow the grammar */
  MalformedMetadata: 'malformed_metadata',
  /** More than six `#` */
  InvalidHeadingLevel: 'invalid_heading_level',
  /** Malformed marker, or a stray line, inside a list */
  InvalidListMarker: 'invalid_list_marker',
  /** Content in a footnotes block before any `[^id]:` definition */
  InvalidFootnoteDefinition: 'invalid_footnote_definition',
} as const;

export type ParseErrorKind = (typeof ParseErrorKind)[keyof typeof ParseErrorKind];

/**
 * A diagnostic collected during parsing
 */
export interface ParseError {
  readonly kind: ParseErrorKind;

  /** Offending construct, always inside the source buffer */
  readonly span: Span;

  readonly message: string;
}
