/**
 * Types for the document tree
 *
 * Blocks and inlines are closed unions discriminated by `type`. Every node
 * carries the byte span of the source it was derived from.
 *
 * @since 2026-10-19
 */

import type { Span } from '../span/index.js';
import type { Module, Profile } from '../profile/index.js';
import type { Metadata } from '../metadata/Metadata.js';

/**
 * Attributes from a directive's opening line (`::callout type=note title="Hi"`).
 * Bare flags (`::list ordered`) map to `true`.
 */
export type DirectiveAttributes = Readonly<Record<string, string | true>>;

// =============================================================================
// Inline nodes
// =============================================================================

export interface TextInline {
  readonly type: 'text';
  readonly content: string;
  readonly span: Span;
}

export interface EmphasisInline {
  readonly type: 'emphasis';
  readonly children: readonly Inline[];
  readonly span: Span;
}

export interface StrongInline {
  readonly type: 'strong';
  readonly children: readonly Inline[];
  readonly span: Span;
}

export interface StrikethroughInline {
  readonly type: 'strikethrough';
  readonly children: readonly Inline[];
  readonly span: Span;
}

export interface CodeSpanInline {
  readonly type: 'code_span';
  /** Raw code, never inline-parsed */
  readonly content: string;
  readonly span: Span;
}

/**
 * `[[label|destination]]` or `[label](destination "title")`
 */
export interface LinkInline {
  readonly type: 'link';
  /** Label content */
  readonly children: readonly Inline[];
  readonly destination: string;
  readonly title: string | null;
  readonly span: Span;
}

export interface AutoLinkInline {
  readonly type: 'autolink';
  readonly destination: string;
  readonly span: Span;
}

/**
 * `[^id]`. The matching definition may be anywhere in the document, or missing.
 */
export interface FootnoteRefInline {
  readonly type: 'footnote_ref';
  readonly id: string;
  readonly span: Span;
}

export interface HardBreakInline {
  readonly type: 'hard_break';
  readonly span: Span;
}

export interface SoftBreakInline {
  readonly type: 'soft_break';
  readonly span: Span;
}

export type Inline =
  | TextInline
  | EmphasisInline
  | StrongInline
  | StrikethroughInline
  | CodeSpanInline
  | LinkInline
  | AutoLinkInline
  | FootnoteRefInline
  | HardBreakInline
  | SoftBreakInline;

export type InlineType = Inline['type'];

/**
 * Inline nodes that own children
 */
export type ContainerInline = EmphasisInline | StrongInline | StrikethroughInline | LinkInline;

// =============================================================================
// Block nodes
// =============================================================================

export interface HeadingBlock {
  readonly type: 'heading';
  /** 1-6 */
  readonly level: number;
  readonly content: readonly Inline[];
  readonly span: Span;
}

export interface ParagraphBlock {
  readonly type: 'paragraph';
  readonly content: readonly Inline[];
  readonly span: Span;
}

export type ListKind = 'ordered' | 'unordered';

export interface ListItem {
  readonly blocks: readonly Block[];
  /** Task state for `[ ]` / `[x]` items, null for plain items */
  readonly checked: boolean | null;
  readonly span: Span;
}

export interface ListBlock {
  readonly type: 'list';
  readonly kind: ListKind;
  /** First number of an ordered list */
  readonly start: number | null;
  readonly items: readonly ListItem[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface CodeBlock {
  readonly type: 'code_block';
  readonly language: string | null;
  readonly content: string;
  readonly span: Span;
}

export interface CalloutBlock {
  readonly type: 'callout';
  /** Free-form kind tag from `type=` (note, warning, tip, ...) */
  readonly kind: string;
  readonly title: string | null;
  readonly blocks: readonly Block[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface QuoteBlock {
  readonly type: 'quote';
  readonly blocks: readonly Block[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface FigureBlock {
  readonly type: 'figure';
  readonly src: string;
  readonly alt: string;
  readonly caption: readonly Inline[] | null;
  readonly blocks: readonly Block[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export type ColumnAlignment = 'left' | 'center' | 'right' | null;

export interface TableCell {
  readonly content: readonly Inline[];
  readonly span: Span;
}

export interface TableRow {
  readonly header: boolean;
  readonly cells: readonly TableCell[];
  readonly span: Span;
}

export interface TableBlock {
  readonly type: 'table';
  readonly alignments: readonly ColumnAlignment[];
  /** Header row first, then data rows */
  readonly rows: readonly TableRow[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface FootnoteDef {
  readonly id: string;
  readonly blocks: readonly Block[];
  readonly span: Span;
}

export interface FootnotesBlock {
  readonly type: 'footnotes';
  readonly definitions: readonly FootnoteDef[];
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface MathBlock {
  readonly type: 'math';
  readonly display: boolean;
  readonly content: string;
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export interface ThematicBreakBlock {
  readonly type: 'thematic_break';
  readonly span: Span;
}

export interface HtmlBlock {
  readonly type: 'html';
  readonly content: string;
  readonly span: Span;
}

/**
 * Content passed through unparsed: unknown directives, tolerated extended syntax
 */
export interface RawBlock {
  readonly type: 'raw';
  /** Directive name the content was wrapped in, if any */
  readonly directive: string | null;
  readonly content: string;
  readonly attributes: DirectiveAttributes;
  readonly span: Span;
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ListBlock
  | CodeBlock
  | CalloutBlock
  | QuoteBlock
  | FigureBlock
  | TableBlock
  | FootnotesBlock
  | MathBlock
  | ThematicBreakBlock
  | HtmlBlock
  | RawBlock;

export type BlockType = Block['type'];

// =============================================================================
// Document
// =============================================================================

/**
 * Root of a parsed document. Built once per parse call, never mutated after.
 */
export interface Document {
  /** Profile actually used (an `@profile` directive may override the parser's) */
  readonly profile: Profile;

  /** Modules enabled by options and `@modules` */
  readonly modules: readonly Module[];

  /** Front matter, or null when the document has none */
  readonly metadata: Metadata | null;

  readonly blocks: readonly Block[];

  /** Whole buffer */
  readonly span: Span;
}
