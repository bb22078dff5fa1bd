/**
 * Recovery Policy
 *
 * What to do when a construct is malformed, as a lookup from
 * (ParseErrorKind, Profile) to a recovery action: the strategy comes from
 * the kind, fatality from the profile. Adding a profile or an error kind is
 * an edit to these tables.
 *
 * @since 2026-10-19
 */

import { ParseErrorKind } from '../errors/index.js';
import { Profile } from '../profile/index.js';

/**
 * Deterministic substitute action for a malformed construct
 */
export type RecoveryStrategy =
  /** Close the container where the failure was detected, keep its children */
  | 'close-at-failure'
  /** Keep the directive body as a raw block */
  | 'substitute-raw'
  /** Pad short table rows with empty cells, truncate long ones */
  | 'pad-or-truncate'
  /** Keep the value as its raw string */
  | 'keep-raw-value'
  /** Clamp the heading level to 6 */
  | 'clamp-level'
  /** Treat the line as paragraph text */
  | 'treat-as-paragraph'
  /** Drop the offending line */
  | 'skip';

const STRATEGIES = {
  [ParseErrorKind.UnterminatedContainer]: 'close-at-failure',
  [ParseErrorKind.UnknownDirective]: 'substitute-raw',
  [ParseErrorKind.MalformedTable]: 'pad-or-truncate',
  [ParseErrorKind.MalformedMetadata]: 'keep-raw-value',
  [ParseErrorKind.InvalidHeadingLevel]: 'clamp-level',
  [ParseErrorKind.InvalidListMarker]: 'treat-as-paragraph',
  [ParseErrorKind.InvalidFootnoteDefinition]: 'skip',
} as const satisfies Record<ParseErrorKind, RecoveryStrategy>;

/**
 * Strategy assigned to diagnostics of kind `K`. Sites that branch on it
 * check it exhaustively with `unhandledRecovery`.
 */
export type RecoveryStrategyFor<K extends ParseErrorKind> = (typeof STRATEGIES)[K];

export interface RecoveryAction<K extends ParseErrorKind = ParseErrorKind> {
  readonly strategy: RecoveryStrategyFor<K>;

  /** The strict entry point throws for this diagnostic */
  readonly fatal: boolean;
}

const FATAL: Readonly<Record<Profile, boolean>> = Object.freeze({
  [Profile.Litedoc]: false,
  [Profile.Md]: false,
  [Profile.MdStrict]: true,
});

/**
 * Exhaustiveness guard for call sites that switch on a reported strategy
 */
export function unhandledRecovery(strategy: never): never {
  throw new Error(`Unhandled recovery strategy: ${String(strategy)}`);
}

export function recoveryFor<K extends ParseErrorKind>(kind: K, profile: Profile): RecoveryAction<K> {
  return Object.freeze({ strategy: STRATEGIES[kind], fatal: FATAL[profile] });
}
