/**
 * Types shared by the block parsers
 */

import type { Block, DirectiveAttributes } from '../ast/index.js';
import type { InlineParser } from '../inline/index.js';
import type { ProfilePolicy } from '../profile/index.js';
import type { RecoveryController } from '../recovery/index.js';
import type { SourceMap } from '../span/index.js';
import type { Line } from './LineScanner.js';

/**
 * Per-parse state the block parsers share. Built fresh for every call.
 */
export interface BlockParserContext {
  readonly source: SourceMap;
  readonly policy: ProfilePolicy;
  readonly recovery: RecoveryController;
  readonly inline: InlineParser;

  /** Deepest container nesting allowed */
  readonly maxNestingDepth: number;
}

/**
 * Recursive block parse used for list items, quotes and footnote bodies
 */
export interface NestedBlockParser {
  parseBlocks(lines: readonly Line[], depth: number): Block[];
}

export const EMPTY_ATTRIBUTES: DirectiveAttributes = Object.freeze({});
