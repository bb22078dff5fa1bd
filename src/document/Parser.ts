/**
 * Parser
 *
 * Public entry points. `parseWithRecovery` always returns a document plus
 * the diagnostics; `parse` runs the same parse and throws for the first
 * diagnostic the profile treats as fatal.
 *
 * @example
 * ```typescript
 * const parser = new Parser('md');
 * const doc = parser.parse('# Title\n\nSome *text*.');
 * const { ok, errors } = parser.parseWithRecovery('::list\n- item');
 * ```
 */

import type { Document } from '../ast/index.js';
import { DocumentParseError, type ParseError } from '../errors/index.js';
import type { Profile } from '../profile/index.js';
import { DocumentAssembler, type Assembly } from './DocumentAssembler.js';
import { resolveParserOptions, type ParserOptions, type ResolvedParserOptions } from './options.js';

export interface ParseResult {
  /** Best-effort document, present even when `ok` is false */
  readonly document: Document;
  readonly errors: readonly ParseError[];
  /** `errors.length === 0` */
  readonly ok: boolean;
}

export class Parser {
  readonly options: Readonly<ResolvedParserOptions>;

  constructor(options?: Profile | ParserOptions) {
    this.options = Object.freeze(resolveParserOptions(options));
  }

  get profile(): Profile {
    return this.options.profile;
  }

  /**
   * Parse, throwing DocumentParseError for the first fatal diagnostic
   */
  parse(text: string): Document {
    const { document, recovery } = this.run(text);
    const fatal = recovery.firstFatal();
    if (fatal) {
      throw new DocumentParseError(fatal);
    }
    return document;
  }

  /**
   * Parse, collecting diagnostics instead of throwing
   */
  parseWithRecovery(text: string): ParseResult {
    const { document, recovery } = this.run(text);
    const errors = Object.freeze([...recovery.diagnostics]);
    return Object.freeze({ document, errors, ok: errors.length === 0 });
  }

  private run(text: string): Assembly {
    if (typeof text !== 'string') {
      throw new TypeError(`Expected document text to be a string, got ${typeof text}`);
    }

    const assembly = new DocumentAssembler(this.options).assemble(text);

    if (this.options.debug) {
      const { document, recovery } = assembly;
      console.debug(
        `🔍 Parsed ${document.blocks.length} blocks (${document.profile}) with ${recovery.diagnostics.length} diagnostics`
      );
    }

    return assembly;
  }
}

/**
 * Parse `text`, throwing DocumentParseError on the first fatal diagnostic.
 * The default profile is `litedoc`.
 */
export function parse(text: string, options?: Profile | ParserOptions): Document {
  return new Parser(options).parse(text);
}

/**
 * Parse `text`, never throwing for malformed input
 */
export function parseWithRecovery(text: string, options?: Profile | ParserOptions): ParseResult {
  return new Parser(options).parseWithRecovery(text);
}
