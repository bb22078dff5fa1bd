/**
 * Block Parser
 *
 * Line-oriented scanner that partitions a document into blocks. Container
 * directives (`::name attrs` ... `::`) are tracked on an explicit stack of
 * open frames:
 * - callout, quote and figure frames block-parse their body into children
 * - list, table and footnotes frames collect body lines for their parsers
 * - math, html and unrecognised directives capture raw content
 *
 * List items, `>` quotes and footnote definitions recurse through
 * `parseBlocks` one level deeper; both paths are bounded by the nesting limit.
 *
 * @since 2026-10-19
 */

import type { Block, CodeBlock, DirectiveAttributes, HeadingBlock, Inline } from '../ast/index.js';
import { NestingDepthExceededError, ParseErrorKind } from '../errors/index.js';
import { LeafText } from '../inline/index.js';
import { isDirectiveName, type DirectiveName } from '../profile/index.js';
import { unhandledRecovery } from '../recovery/index.js';
import type { Span } from '../span/index.js';
import {
  flagAttribute,
  parseAttributes,
  stringAttribute,
  type AttributeValueRange,
} from './attributes.js';
import { FootnotesParser } from './FootnotesParser.js';
import {
  dedent,
  indentWidth,
  isBlank,
  isDirectiveClose,
  isFenceClose,
  isHtmlStart,
  isQuoteLine,
  isTableRow,
  isTableSeparator,
  isThematicBreak,
  lineEnd,
  matchDirectiveOpen,
  matchFenceOpen,
  matchHeading,
  matchListMarker,
  sliceLine,
  startsBlock,
  trimLine,
  trimLineStart,
  type DirectiveMatch,
  type FenceMatch,
  type HeadingMatch,
  type Line,
} from './LineScanner.js';
import { ListParser } from './ListParser.js';
import { TableParser } from './TableParser.js';
import { EMPTY_ATTRIBUTES, type BlockParserContext, type NestedBlockParser } from './types.js';

/**
 * Directives whose body is parsed as blocks; the others collect lines
 */
const BLOCK_BODY_DIRECTIVES: ReadonlySet<DirectiveName> = new Set<DirectiveName>(['callout', 'quote', 'figure']);

/**
 * An open container directive
 */
interface DirectiveFrame {
  readonly name: string;

  /** Null when the body is kept raw (unrecognised directive) */
  readonly directive: DirectiveName | null;

  readonly attributes: DirectiveAttributes;
  readonly attributeRanges: ReadonlyMap<string, AttributeValueRange>;

  /** Source index of the attribute text on the opening line */
  readonly attributesStart: number;

  /** Opening line, trimmed */
  readonly open: Line;

  readonly depth: number;
  readonly collectsLines: boolean;

  /** Parsed children (block-body frames) */
  readonly children: Block[];

  /** Collected body (line frames) */
  readonly body: Line[];

  /** Directives opened inside a line frame and not yet closed */
  nested: number;

  /** Backtick count of a fence open inside a line frame, 0 if none */
  fence: number;

  /** Source index after the last content consumed while the frame was open */
  end: number;
}

export class BlockParser implements NestedBlockParser {
  private readonly lists: ListParser;
  private readonly tables: TableParser;
  private readonly footnotes: FootnotesParser;

  constructor(private readonly context: BlockParserContext) {
    this.lists = new ListParser(context, this);
    this.tables = new TableParser(context);
    this.footnotes = new FootnotesParser(context, this);
  }

  /**
   * Parse top-level lines
   */
  parse(lines: readonly Line[]): Block[] {
    return this.parseBlocks(lines, 0);
  }

  /**
   * Parse `lines` as a block sequence nested `depth` containers deep
   */
  parseBlocks(lines: readonly Line[], depth: number): Block[] {
    if (depth > this.context.maxNestingDepth) {
      throw new NestingDepthExceededError(this.context.maxNestingDepth, this.lineSpan(lines[0]));
    }

    const root: Block[] = [];
    const stack: DirectiveFrame[] = [];
    let i = 0;

    while (i < lines.length) {
      const before = i;
      const frame: DirectiveFrame | undefined = stack[stack.length - 1];

      if (frame?.collectsLines) {
        this.collectLine(frame, lines[i], stack, root);
        i++;
      } else {
        i = this.parseBlockAt(lines, i, depth, stack, root);
      }

      this.extendFrames(stack, lines, before, i);
    }

    // Whatever is still open was never closed
    while (stack.length > 0) {
      this.closeFrame(stack, root, null);
    }

    return root;
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private parseBlockAt(
    lines: readonly Line[],
    index: number,
    depth: number,
    stack: DirectiveFrame[],
    root: Block[]
  ): number {
    const line = lines[index];
    if (isBlank(line)) return index + 1;

    const target = stack.length > 0 ? stack[stack.length - 1].children : root;
    const currentDepth = depth + stack.length;
    const stripped = trimLineStart(line);
    const text = stripped.text;

    if (isDirectiveClose(text)) {
      this.closeDirective(stack, root, trimLine(line));
      return index + 1;
    }

    const directive = matchDirectiveOpen(text);
    if (directive) {
      this.openFrame(stack, trimLine(line), directive, currentDepth + 1);
      return index + 1;
    }

    const fence = matchFenceOpen(text);
    if (fence) {
      return this.parseCodeBlock(lines, index, fence, target);
    }

    const heading = matchHeading(text);
    if (heading) {
      target.push(this.parseHeading(stripped, heading));
      return index + 1;
    }

    if (isThematicBreak(text)) {
      target.push({ type: 'thematic_break', span: this.lineSpan(line) });
      return index + 1;
    }

    if (isQuoteLine(text)) {
      return this.parseQuote(lines, index, currentDepth, target);
    }

    if (this.startsPipeTable(lines, index)) {
      const { block, next } = this.tables.parseBare(lines, index);
      target.push(block);
      return next;
    }

    if (this.htmlBlocks && isHtmlStart(text)) {
      return this.parseHtmlBlock(lines, index, target);
    }

    const marker = matchListMarker(text);
    if (marker) {
      const { block, next } = this.lists.parseBare(lines, index, marker, currentDepth);
      target.push(block);
      return next;
    }

    return this.parseParagraph(lines, index, target);
  }

  // ===========================================================================
  // Directive frames
  // ===========================================================================

  private openFrame(stack: DirectiveFrame[], open: Line, match: DirectiveMatch, depth: number): void {
    const { policy, recovery, maxNestingDepth } = this.context;
    if (depth > maxNestingDepth) {
      throw new NestingDepthExceededError(maxNestingDepth, this.lineSpan(open));
    }

    const { name } = match;
    let directive: DirectiveName | null = null;
    if (policy.recognizesDirective(name)) {
      directive = name;
    } else if (policy.reportsUnknownDirectives) {
      recovery.report(
        ParseErrorKind.UnknownDirective,
        this.lineSpan(open),
        isDirectiveName(name)
          ? `Directive "::${name}" is not enabled by the ${policy.profile} profile`
          : `Unknown directive "::${name}"`
      );
    }

    const { attributes, ranges } = parseAttributes(open.text.slice(match.attributesOffset));
    stack.push({
      name,
      directive,
      attributes,
      attributeRanges: ranges,
      attributesStart: open.start + match.attributesOffset,
      open,
      depth,
      collectsLines: directive === null || !BLOCK_BODY_DIRECTIVES.has(directive),
      children: [],
      body: [],
      nested: 0,
      fence: 0,
      end: lineEnd(open),
    });
  }

  /**
   * Line frames take every line until their own `::`, counting nested
   * directives and code fences so an inner `::` does not close them.
   */
  private collectLine(frame: DirectiveFrame, line: Line, stack: DirectiveFrame[], root: Block[]): void {
    const text = line.text.trimStart();

    if (frame.fence > 0) {
      if (isFenceClose(text, frame.fence)) frame.fence = 0;
      frame.body.push(line);
      return;
    }

    if (isDirectiveClose(text)) {
      if (frame.nested === 0) {
        this.closeFrame(stack, root, trimLine(line));
        return;
      }
      frame.nested--;
    } else if (matchDirectiveOpen(text)) {
      frame.nested++;
    } else {
      const fence = matchFenceOpen(text);
      if (fence) frame.fence = fence.ticks;
    }

    frame.body.push(line);
  }

  private closeDirective(stack: DirectiveFrame[], root: Block[], close: Line): void {
    if (stack.length > 0) {
      this.closeFrame(stack, root, close);
      return;
    }

    if (this.context.policy.reportsUnknownDirectives) {
      this.context.recovery.report(
        ParseErrorKind.UnknownDirective,
        this.lineSpan(close),
        'Closing "::" without an open directive'
      );
    }
  }

  /**
   * Pop the innermost frame and attach its block to the parent. Without a
   * closing line the frame is closed where its content ended.
   */
  private closeFrame(stack: DirectiveFrame[], root: Block[], close: Line | null): void {
    const frame = stack.pop();
    if (!frame) return;

    if (!close) {
      this.context.recovery.report(
        ParseErrorKind.UnterminatedContainer,
        this.lineSpan(frame.open),
        `Directive "::${frame.name}" is never closed`
      );
    }

    const span = this.context.source.span(frame.open.start, close ? lineEnd(close) : frame.end);
    const block = this.finishFrame(frame, span);
    const parent = stack[stack.length - 1];
    (parent ? parent.children : root).push(block);
  }

  private finishFrame(frame: DirectiveFrame, span: Span): Block {
    const { attributes } = frame;

    switch (frame.directive) {
      case null:
        return { type: 'raw', directive: frame.name, content: joinLines(frame.body), attributes, span };
      case 'callout':
        return {
          type: 'callout',
          kind: stringAttribute(attributes, 'type') ?? 'note',
          title: stringAttribute(attributes, 'title'),
          blocks: frame.children,
          attributes,
          span,
        };
      case 'quote':
        return { type: 'quote', blocks: frame.children, attributes, span };
      case 'figure':
        return {
          type: 'figure',
          src: stringAttribute(attributes, 'src') ?? '',
          alt: stringAttribute(attributes, 'alt') ?? '',
          caption: this.parseCaption(frame),
          blocks: frame.children,
          attributes,
          span,
        };
      case 'list':
        return this.lists.parseDirective(frame.body, attributes, span, frame.depth);
      case 'table':
        return this.tables.parseDirective(frame.body, attributes, span);
      case 'footnotes':
        return this.footnotes.parse(frame.body, attributes, span, frame.depth);
      case 'math':
        return {
          type: 'math',
          display:
            flagAttribute(attributes, 'display') ||
            flagAttribute(attributes, 'block') ||
            stringAttribute(attributes, 'mode') === 'display',
          content: joinLines(frame.body),
          attributes,
          span,
        };
      case 'html':
        return { type: 'html', content: joinLines(frame.body), span };
      default: {
        const unreachable: never = frame.directive;
        throw new Error(`Unhandled directive: ${String(unreachable)}`);
      }
    }
  }

  /**
   * `caption="..."` is inline-parsed where it sits on the opening line
   */
  private parseCaption(frame: DirectiveFrame): Inline[] | null {
    const range = frame.attributeRanges.get('caption');
    if (!range) return null;
    const text = stringAttribute(frame.attributes, 'caption') ?? '';
    return this.context.inline.parse(LeafText.single(text, frame.attributesStart + range.start));
  }

  /**
   * Open frames cover everything consumed while they were open
   */
  private extendFrames(stack: DirectiveFrame[], lines: readonly Line[], from: number, to: number): void {
    if (stack.length === 0) return;
    for (let k = to - 1; k >= from; k--) {
      if (isBlank(lines[k])) continue;
      const end = lineEnd(trimLine(lines[k]));
      for (const frame of stack) frame.end = Math.max(frame.end, end);
      return;
    }
  }

  // ===========================================================================
  // Leaf blocks
  // ===========================================================================

  private parseHeading(stripped: Line, match: HeadingMatch): HeadingBlock {
    let level = match.level;
    if (level > 6) {
      const strategy = this.context.recovery.report(
        ParseErrorKind.InvalidHeadingLevel,
        this.lineSpan(stripped),
        `Heading level ${level} exceeds the maximum of 6`
      );
      if (strategy !== 'clamp-level') unhandledRecovery(strategy);
      level = 6;
    }

    const content = sliceLine(stripped, match.contentStart, match.contentEnd);
    return {
      type: 'heading',
      level,
      content: this.context.inline.parse(LeafText.single(content.text, content.start)),
      span: this.lineSpan(stripped),
    };
  }

  /**
   * Fenced code runs to a closing fence at least as long as the opener, or
   * to the end of the input
   */
  private parseCodeBlock(lines: readonly Line[], index: number, fence: FenceMatch, target: Block[]): number {
    const open = trimLine(lines[index]);
    const indent = indentWidth(lines[index].text);
    const content: string[] = [];
    let end = lineEnd(open);
    let i = index + 1;

    while (i < lines.length) {
      const line = lines[i];
      i++;
      if (indentWidth(line.text) < 4 && isFenceClose(line.text, fence.ticks)) {
        end = lineEnd(trimLine(line));
        break;
      }
      content.push(dedent(line, indent).text);
      end = lineEnd(line);
    }

    const block: CodeBlock = {
      type: 'code_block',
      language: fence.language,
      content: content.join('\n'),
      span: this.context.source.span(open.start, end),
    };
    target.push(block);
    return i;
  }

  private parseQuote(lines: readonly Line[], index: number, depth: number, target: Block[]): number {
    const inner: Line[] = [];
    const start = trimLineStart(lines[index]).start;
    let end = start;
    let i = index;

    while (i < lines.length) {
      const stripped = trimLineStart(lines[i]);
      if (i > index && (indentWidth(lines[i].text) >= 4 || !isQuoteLine(stripped.text))) break;

      let content = sliceLine(stripped, 1);
      if (content.text.startsWith(' ') || content.text.startsWith('\t')) content = sliceLine(content, 1);
      inner.push(content);
      end = lineEnd(trimLine(lines[i]));
      i++;
    }

    target.push({
      type: 'quote',
      blocks: this.parseBlocks(inner, depth + 1),
      attributes: EMPTY_ATTRIBUTES,
      span: this.context.source.span(start, end),
    });
    return i;
  }

  private parseHtmlBlock(lines: readonly Line[], index: number, target: Block[]): number {
    let i = index;
    while (i < lines.length && !isBlank(lines[i])) i++;

    const block = lines.slice(index, i);
    target.push({
      type: 'html',
      content: joinLines(block),
      span: this.context.source.span(trimLineStart(block[0]).start, lineEnd(trimLine(block[block.length - 1]))),
    });
    return i;
  }

  private parseParagraph(lines: readonly Line[], index: number, target: Block[]): number {
    const segments: Line[] = [trimLineStart(lines[index])];
    let i = index + 1;
    while (i < lines.length && !this.interruptsParagraph(lines, i)) {
      segments.push(trimLineStart(lines[i]));
      i++;
    }

    // Trailing whitespace on the last line is not content
    const last = trimLine(segments[segments.length - 1]);
    segments[segments.length - 1] = last;

    target.push({
      type: 'paragraph',
      content: this.context.inline.parse(new LeafText(segments)),
      span: this.context.source.span(segments[0].start, lineEnd(last)),
    });
    return i;
  }

  private interruptsParagraph(lines: readonly Line[], index: number): boolean {
    const line = lines[index];
    if (isBlank(line)) return true;
    return startsBlock(trimLineStart(line).text, this.htmlBlocks) || this.startsPipeTable(lines, index);
  }

  private startsPipeTable(lines: readonly Line[], index: number): boolean {
    return (
      this.context.policy.recognizes('pipe_table') &&
      index + 1 < lines.length &&
      isTableRow(lines[index].text) &&
      isTableSeparator(lines[index + 1].text)
    );
  }

  private get htmlBlocks(): boolean {
    return this.context.policy.recognizes('html_block');
  }

  private lineSpan(line: Line | undefined): Span {
    if (!line) return this.context.source.span(0, 0);
    const trimmed = trimLine(line);
    return this.context.source.span(trimmed.start, lineEnd(trimmed));
  }
}

function joinLines(lines: readonly Line[]): string {
  return lines.map((line) => line.text).join('\n');
}
