/**
 * Recovery Controller
 *
 * Collects diagnostics from the metadata extractor and the block parsers and
 * tells them which recovery strategy to apply, so parsing always runs to the
 * end of the buffer. The entry points decide afterwards whether a diagnostic
 * is fatal.
 *
 * @since 2026-10-19
 */

import type { ParseError, ParseErrorKind } from '../errors/index.js';
import type { Profile } from '../profile/index.js';
import type { SourceMap, Span } from '../span/index.js';
import { recoveryFor, type RecoveryStrategyFor } from './RecoveryPolicy.js';

export interface RecoveryControllerOptions {
  /** Log each recovered diagnostic */
  debug?: boolean;
}

export class RecoveryController {
  private readonly errors: ParseError[] = [];
  private readonly debug: boolean;

  constructor(
    private profile: Profile,
    private readonly source: SourceMap,
    options: RecoveryControllerOptions = {}
  ) {
    this.debug = options.debug ?? false;
  }

  /**
   * Switch the profile fatality is judged by (an `@profile` directive was read)
   */
  useProfile(profile: Profile): void {
    this.profile = profile;
  }

  /**
   * Record a diagnostic and return the strategy the caller must apply
   */
  report<K extends ParseErrorKind>(kind: K, span: Span, message: string): RecoveryStrategyFor<K> {
    this.errors.push(Object.freeze({ kind, span, message }));
    const { strategy } = recoveryFor(kind, this.profile);

    if (this.debug) {
      const { line, column } = this.source.locate(span.start);
      console.warn(`⚠️ ${kind} at ${line}:${column}: ${message} (recovery: ${strategy})`);
    }

    return strategy;
  }

  /**
   * Diagnostics in the order they were reported
   */
  get diagnostics(): readonly ParseError[] {
    return this.errors;
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /**
   * First diagnostic with no viable recovery under the current profile
   */
  firstFatal(): ParseError | undefined {
    return this.errors.find((error) => recoveryFor(error.kind, this.profile).fatal);
  }
}
