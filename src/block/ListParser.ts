/**
 * List Parser
 *
 * Bare lists (`- item`, `1. item`) and `::list` bodies. An item is its marker
 * line plus continuation lines indented to the item's content column, lazy
 * paragraph continuations, and blank lines followed by indented content; its
 * lines are dedented and block-parsed one level deeper.
 *
 * @since 2026-10-19
 */

import type { DirectiveAttributes, ListBlock, ListItem } from '../ast/index.js';
import { ParseErrorKind } from '../errors/index.js';
import { unhandledRecovery } from '../recovery/index.js';
import { mergeSpans, type Span } from '../span/index.js';
import { flagAttribute, integerAttribute } from './attributes.js';
import { LineGroup } from './LineGroup.js';
import {
  dedent,
  indentWidth,
  isBlank,
  isMalformedListMarker,
  isThematicBreak,
  lineEnd,
  matchListMarker,
  sliceLine,
  startsBlock,
  trimLine,
  trimLineStart,
  type Line,
  type ListMarkerMatch,
} from './LineScanner.js';
import { EMPTY_ATTRIBUTES, type BlockParserContext, type NestedBlockParser } from './types.js';

const TASK_MARKER = /^\[([ xX])\](?=[ \t]|$)/;

/**
 * An item being collected
 */
interface ItemDraft {
  group: LineGroup;
  /** Column continuation lines must reach; infinite for items opened without a marker */
  contentColumn: number;
  checked: boolean | null;
}

export interface BareListResult {
  block: ListBlock;
  /** Index of the first line not consumed */
  next: number;
}

export class ListParser {
  constructor(
    private readonly context: BlockParserContext,
    private readonly blocks: NestedBlockParser
  ) {}

  /**
   * Bare list starting at `lines[index]`. Ends at a marker of the other kind,
   * at a malformed marker, or at an unindented line after a blank.
   */
  parseBare(lines: readonly Line[], index: number, first: ListMarkerMatch, depth: number): BareListResult {
    const items: ListItem[] = [];
    let draft = this.openItem(lines[index], first);
    let i = index + 1;

    while (i < lines.length) {
      const line = lines[i];
      if (isBlank(line)) {
        draft.group.addBlank(line);
        i++;
        continue;
      }
      if (indentWidth(line.text) >= draft.contentColumn) {
        draft.group.add(dedent(line, draft.contentColumn));
        i++;
        continue;
      }

      const marker = this.readMarker(line);
      if (marker) {
        // Switching between ordered and unordered starts a new list
        if (marker.ordered !== first.ordered) break;
        items.push(this.closeItem(draft, depth));
        draft = this.openItem(line, marker);
        i++;
        continue;
      }

      const stripped = trimLine(line);
      if (isMalformedListMarker(stripped.text)) {
        const strategy = this.context.recovery.report(
          ParseErrorKind.InvalidListMarker,
          this.context.source.span(stripped.start, lineEnd(stripped)),
          `Malformed list marker in "${stripped.text}"`
        );
        if (strategy !== 'treat-as-paragraph') unhandledRecovery(strategy);
        // The list ends here and the caller parses the line as paragraph text
        break;
      }
      if (!draft.group.hasPendingBlank && this.isLazyContinuation(stripped.text)) {
        draft.group.add(trimLineStart(line));
        i++;
        continue;
      }
      break;
    }

    items.push(this.closeItem(draft, depth));

    return {
      block: {
        type: 'list',
        kind: first.ordered ? 'ordered' : 'unordered',
        start: first.ordered ? first.number : null,
        items,
        attributes: EMPTY_ATTRIBUTES,
        span: mergeSpans(items[0].span, items[items.length - 1].span),
      },
      next: i,
    };
  }

  /**
   * Body of a `::list` directive: always one list. The kind comes from the
   * `ordered`/`unordered` flag, else from the first marker.
   */
  parseDirective(body: readonly Line[], attributes: DirectiveAttributes, span: Span, depth: number): ListBlock {
    let ordered: boolean | null = flagAttribute(attributes, 'ordered')
      ? true
      : flagAttribute(attributes, 'unordered')
        ? false
        : null;
    let start = integerAttribute(attributes, 'start');
    let sawMarker = false;

    const items: ListItem[] = [];
    let draft: ItemDraft | null = null;

    for (const line of body) {
      if (isBlank(line)) {
        draft?.group.addBlank(line);
        continue;
      }
      if (draft && indentWidth(line.text) >= draft.contentColumn) {
        draft.group.add(dedent(line, draft.contentColumn));
        continue;
      }

      const marker = this.readMarker(line);
      if (marker) {
        if (draft) items.push(this.closeItem(draft, depth));
        if (!sawMarker) {
          ordered ??= marker.ordered;
          if (start === null && marker.ordered) start = marker.number;
          sawMarker = true;
        }
        draft = this.openItem(line, marker);
        continue;
      }

      const stripped = trimLine(line);
      const malformed = isMalformedListMarker(stripped.text);
      if (draft && !malformed && !draft.group.hasPendingBlank) {
        // Lazy continuation; directive lines here belong to the item
        draft.group.add(trimLineStart(line));
        continue;
      }

      const strategy = this.context.recovery.report(
        ParseErrorKind.InvalidListMarker,
        this.context.source.span(stripped.start, lineEnd(stripped)),
        malformed ? `Malformed list marker in "${stripped.text}"` : 'Line in a list body does not belong to an item'
      );
      if (strategy !== 'treat-as-paragraph') unhandledRecovery(strategy);

      // A paragraph of the current item, or of a new one
      if (draft) {
        draft.group.addSeparate(trimLineStart(line));
      } else {
        draft = {
          group: new LineGroup(stripped.start, trimLineStart(line)),
          contentColumn: Number.POSITIVE_INFINITY,
          checked: null,
        };
      }
    }

    if (draft) items.push(this.closeItem(draft, depth));

    return {
      type: 'list',
      kind: ordered ? 'ordered' : 'unordered',
      start: ordered ? (start ?? 1) : null,
      items,
      attributes,
      span,
    };
  }

  private readMarker(line: Line): ListMarkerMatch | null {
    const text = trimLineStart(line).text;
    if (isThematicBreak(text)) return null;
    return matchListMarker(text);
  }

  private openItem(line: Line, marker: ListMarkerMatch): ItemDraft {
    const stripped = trimLineStart(line);
    const contentColumn = indentWidth(line.text) + marker.contentOffset;
    let content = sliceLine(stripped, marker.contentOffset);
    let checked: boolean | null = null;

    if (this.context.policy.recognizes('task_item')) {
      const task = TASK_MARKER.exec(content.text);
      if (task) {
        checked = task[1] !== ' ';
        content = trimLineStart(sliceLine(content, task[0].length));
      }
    }

    return { group: new LineGroup(stripped.start, content), contentColumn, checked };
  }

  private closeItem(draft: ItemDraft, depth: number): ListItem {
    const { group } = draft;
    return {
      blocks: this.blocks.parseBlocks(group.lines, depth + 1),
      checked: draft.checked,
      span: this.context.source.span(group.start, group.end),
    };
  }

  private isLazyContinuation(text: string): boolean {
    return !startsBlock(text, this.context.policy.recognizes('html_block'));
  }
}
