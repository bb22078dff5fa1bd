/**
 * Types for profile policy
 *
 * @since 2026-10-19
 */

/**
 * Dialect profile a document is parsed with
 */
export const Profile = {
  /** Full LiteDoc syntax: container directives, footnotes, callouts, math, wiki links */
  Litedoc: 'litedoc',
  /** Markdown core with GFM-style tables, strikethrough and autolinks */
  Md: 'md',
  /** Markdown core where any malformed construct is a hard error */
  MdStrict: 'md-strict',
} as const;

export type Profile = (typeof Profile)[keyof typeof Profile];

/**
 * Optional feature modules, enabled per document with `@modules`
 */
export const Module = {
  Tables: 'tables',
  Footnotes: 'footnotes',
  Math: 'math',
  Tasks: 'tasks',
  Strikethrough: 'strikethrough',
  Autolink: 'autolink',
  Html: 'html',
} as const;

export type Module = (typeof Module)[keyof typeof Module];

/**
 * Container directive names with a dedicated block kind
 */
export type DirectiveName =
  | 'list'
  | 'callout'
  | 'quote'
  | 'figure'
  | 'table'
  | 'footnotes'
  | 'math'
  | 'html';

/**
 * Constructs whose recognition depends on the profile
 */
export type Construct =
  | 'list_directive'
  | 'quote_directive'
  | 'table_directive'
  | 'callout_directive'
  | 'figure_directive'
  | 'footnotes_directive'
  | 'math_directive'
  | 'html_directive'
  | 'html_block'
  | 'pipe_table'
  | 'task_item'
  | 'wiki_link'
  | 'footnote_ref'
  | 'strikethrough'
  | 'bare_autolink';

/**
 * What a profile does with a directive name it does not recognise
 */
export type UnknownDirectiveHandling = 'report' | 'tolerate';

/**
 * Static rules for one profile
 */
export interface ProfileRules {
  /** Constructs recognised without any module */
  readonly constructs: ReadonlySet<Construct>;

  /** Unknown directives become diagnostics, or pass through silently */
  readonly unknownDirectives: UnknownDirectiveHandling;

  /** Every diagnostic is a hard error */
  readonly strict: boolean;
}

/**
 * Inline constructs switched on for a parse
 */
export interface InlineFeatures {
  wikiLinks: boolean;
  footnoteRefs: boolean;
  strikethrough: boolean;
  bareAutolinks: boolean;
}
