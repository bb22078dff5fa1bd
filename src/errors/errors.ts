/**
 * Error classes thrown by the parser
 *
 * Diagnostics are data (see ParseError); these classes are only thrown by the
 * strict entry point, the nesting guard, and option validation.
 */

import type { Span } from '../span/index.js';
import type { ParseError, ParseErrorKind } from './types.js';

/**
 * Base class for every error thrown by this package
 */
export class LitedocError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown by `parse` for the first fatal diagnostic
 */
export class DocumentParseError extends LitedocError {
  public readonly kind: ParseErrorKind;
  public readonly span: Span;
  public readonly diagnostic: ParseError;

  constructor(diagnostic: ParseError) {
    super(formatParseError(diagnostic), 'PARSE_ERROR', { kind: diagnostic.kind });
    this.kind = diagnostic.kind;
    this.span = diagnostic.span;
    this.diagnostic = diagnostic;
  }
}

/**
 * Containers nested deeper than the configured limit
 */
export class NestingDepthExceededError extends LitedocError {
  public readonly limit: number;
  public readonly span: Span;

  constructor(limit: number, span: Span) {
    super(
      `Nesting depth exceeds the limit of ${limit} at bytes ${span.start}..${span.end}`,
      'NESTING_DEPTH_EXCEEDED',
      { limit }
    );
    this.limit = limit;
    this.span = span;
  }
}

export class InvalidParserOptionsError extends LitedocError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid parser options: ${issues.join('; ')}`, 'INVALID_OPTIONS', { issues });
    this.issues = issues;
  }
}

/**
 * "message at bytes start..end"
 */
export function formatParseError(error: ParseError): string {
  return `${error.message} at bytes ${error.span.start}..${error.span.end}`;
}
