/**
 * Inline Parser
 *
 * Turns leaf text (paragraphs, headings, table cells, captions) into inline
 * nodes. One left-to-right scan emits text, atomic nodes (code spans, links,
 * autolinks, footnote references, breaks) and delimiter runs; a delimiter
 * stack then pairs `*`, `**` and `~~` runs into emphasis, strong and
 * strikethrough containers. Unpaired delimiters stay literal text, so the
 * parse is total and never reports diagnostics.
 *
 * @since 2026-10-19
 */

import type { Inline } from '../ast/index.js';
import type { InlineFeatures } from '../profile/index.js';
import { mergeSpans, type SourceMap, type Span } from '../span/index.js';
import type { LeafText } from './LeafText.js';
import { ScanIndex } from './ScanIndex.js';

interface PieceLinks {
  previous: Piece | null;
  next: Piece | null;
}

interface NodePiece extends PieceLinks {
  kind: 'node';
  node: Inline;
}

/**
 * Unconsumed part of a delimiter run: `[start, end)` shrinks as pairs are
 * matched while `length` keeps the run's original size
 */
interface DelimiterRun extends PieceLinks {
  kind: 'delimiter';
  char: '*' | '~';
  start: number;
  end: number;
  readonly length: number;
  readonly canOpen: boolean;
  readonly canClose: boolean;
  previousDelimiter: DelimiterRun | null;
  nextDelimiter: DelimiterRun | null;
}

type Piece = NodePiece | DelimiterRun;

interface ScanContext {
  leaf: LeafText;
  index: ScanIndex;
  source: SourceMap;
  features: InlineFeatures;
}

const ASCII_PUNCTUATION = /^[!-\/:-@[-`{-~]$/;
const ESCAPED_PUNCTUATION = /\\([!-\/:-@[-`{-~])/g;
const WHITESPACE = /\s/;
const URI_AUTOLINK = /<([A-Za-z][A-Za-z0-9+.-]{1,31}:[^\s<>]*)>/y;
const EMAIL_AUTOLINK =
  /<([A-Za-z0-9.!#$%&'*+/=?^_`{|}~-]+@[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*)>/y;
const BARE_URI = /(?:https?:\/\/|ftp:\/\/|www\.)[^\s<>]*/y;
const TRAILING_PUNCTUATION = '?!.,:*_~\'";';

export class InlineParser {
  constructor(
    private readonly source: SourceMap,
    private readonly features: InlineFeatures
  ) {}

  parse(leaf: LeafText): Inline[] {
    if (leaf.isEmpty) return [];
    const context: ScanContext = {
      leaf,
      index: new ScanIndex(leaf.text),
      source: this.source,
      features: this.features,
    };
    return new InlineScanner(context, 0, leaf.text.length, true).scan();
  }
}

class InlineScanner {
  private readonly text: string;
  private readonly index: ScanIndex;
  private first: Piece | null = null;
  private last: Piece | null = null;
  private firstDelimiter: DelimiterRun | null = null;
  private lastDelimiter: DelimiterRun | null = null;
  private pos: number;
  private textStart: number;

  constructor(
    private readonly context: ScanContext,
    private readonly from: number,
    private readonly end: number,
    private readonly allowLinks: boolean
  ) {
    this.text = context.leaf.text;
    this.index = context.index;
    this.pos = from;
    this.textStart = from;
  }

  scan(): Inline[] {
    while (this.pos < this.end) {
      if (!this.scanAt(this.text[this.pos])) this.pos++;
    }
    this.flushText(this.end);
    this.processEmphasis();
    return this.toInlines(this.first, null);
  }

  private scanAt(char: string): boolean {
    const { features } = this.context;
    switch (char) {
      case '\\':
        return this.scanEscape();
      case '`':
        return this.scanCodeSpan();
      case '[':
        return this.scanBracket();
      case '<':
        return this.scanAngleAutolink();
      case '*':
        return this.scanDelimiterRun('*');
      case '~':
        return features.strikethrough && this.scanDelimiterRun('~');
      case '\n':
        return this.scanLineBreak();
      case 'h':
      case 'f':
      case 'w':
        return this.allowLinks && features.bareAutolinks && this.scanBareAutolink();
      default:
        return false;
    }
  }

  // ===========================================================================
  // Atomic constructs
  // ===========================================================================

  private scanEscape(): boolean {
    if (this.pos + 1 >= this.end) return false;
    const next = this.text[this.pos + 1];

    if (next === '\n') {
      this.flushText(this.pos);
      this.pushNode({ type: 'hard_break', span: this.span(this.pos, this.pos + 2) });
      this.advanceTo(this.pos + 2);
      return true;
    }
    if (ASCII_PUNCTUATION.test(next)) {
      this.flushText(this.pos);
      this.pushNode({ type: 'text', content: next, span: this.span(this.pos, this.pos + 2) });
      this.advanceTo(this.pos + 2);
      return true;
    }
    return false;
  }

  private scanCodeSpan(): boolean {
    const open = this.runLength(this.pos, '`');
    const tick = this.index.backtickRun(open, this.pos + open);

    // No closing run of the same length: the opening run is literal
    if (tick === -1 || tick + open > this.end) {
      this.pos += open;
      return true;
    }

    let content = this.text.slice(this.pos + open, tick).replace(/\n/g, ' ');
    if (content.length >= 2 && content.startsWith(' ') && content.endsWith(' ') && content.trim()) {
      content = content.slice(1, -1);
    }
    this.flushText(this.pos);
    this.pushNode({ type: 'code_span', content, span: this.span(this.pos, tick + open) });
    this.advanceTo(tick + open);
    return true;
  }

  private scanBracket(): boolean {
    const { features } = this.context;
    if (this.allowLinks && features.wikiLinks && this.text[this.pos + 1] === '[' && this.scanWikiLink()) {
      return true;
    }
    if (features.footnoteRefs && this.text[this.pos + 1] === '^' && this.scanFootnoteRef()) {
      return true;
    }
    return this.allowLinks && this.scanLink();
  }

  /**
   * `[[destination]]` or `[[label|destination]]`
   */
  private scanWikiLink(): boolean {
    const labelStart = this.pos + 2;
    const close = this.index.nextDoubleClose(labelStart);
    if (close === -1 || close + 2 > this.end) return false;
    if (this.indexBefore(this.index.next('\n', labelStart), close)) return false;

    const pipe = this.index.next('|', labelStart);
    const labelEnd = this.indexBefore(pipe, close) ? pipe : close;
    const destinationStart = labelEnd === close ? labelStart : pipe + 1;
    if (this.index.nextNonSpace(destinationStart) >= close) return false;
    const destination = this.text.slice(destinationStart, close).trim();

    const children = this.scanNested(labelStart, labelEnd);
    this.flushText(this.pos);
    this.pushNode({
      type: 'link',
      children,
      destination,
      title: null,
      span: this.span(this.pos, close + 2),
    });
    this.advanceTo(close + 2);
    return true;
  }

  private scanFootnoteRef(): boolean {
    const idStart = this.pos + 2;
    const stop = this.index.footnoteStop(idStart);
    if (stop === idStart || stop >= this.end || this.text[stop] !== ']') return false;

    this.flushText(this.pos);
    this.pushNode({ type: 'footnote_ref', id: this.text.slice(idStart, stop), span: this.span(this.pos, stop + 1) });
    this.advanceTo(stop + 1);
    return true;
  }

  /**
   * `[label](destination "title")`
   */
  private scanLink(): boolean {
    const labelEnd = this.index.matchingBracket(this.pos);
    if (labelEnd === -1 || labelEnd + 1 >= this.end || this.text[labelEnd + 1] !== '(') return false;

    const target = this.readLinkTarget(labelEnd + 2);
    if (!target) return false;

    const children = this.scanNested(this.pos + 1, labelEnd);
    this.flushText(this.pos);
    this.pushNode({
      type: 'link',
      children,
      destination: target.destination.replace(ESCAPED_PUNCTUATION, '$1'),
      title: target.title,
      span: this.span(this.pos, target.end),
    });
    this.advanceTo(target.end);
    return true;
  }

  private readLinkTarget(from: number): { destination: string; title: string | null; end: number } | null {
    let i = this.skipWhitespace(from);
    let destination: string;

    if (this.text[i] === '<') {
      const close = this.index.next('>', i + 1);
      if (close === -1 || close >= this.end) return null;
      if (this.indexBefore(this.index.next('\n', i + 1), close)) return null;
      destination = this.text.slice(i + 1, close);
      i = close + 1;
    } else {
      const start = i;
      i = Math.min(this.index.destinationEnd(start), this.end);
      destination = this.text.slice(start, i);
    }

    i = this.skipWhitespace(i);
    let title: string | null = null;
    const quote = this.text[i];
    if (i < this.end && (quote === '"' || quote === "'")) {
      const close = this.index.next(quote, i + 1);
      if (close === -1 || close >= this.end) return null;
      title = this.text.slice(i + 1, close);
      i = this.skipWhitespace(close + 1);
    }

    if (i >= this.end || this.text[i] !== ')') return null;
    return { destination, title, end: i + 1 };
  }

  /**
   * `<scheme:...>` and `<user@host>`
   */
  private scanAngleAutolink(): boolean {
    const uri = this.matchAt(URI_AUTOLINK);
    const match = uri ?? this.matchAt(EMAIL_AUTOLINK);
    if (!match) return false;

    const destination = uri ? match[1] : `mailto:${match[1]}`;
    this.flushText(this.pos);
    this.pushNode({ type: 'autolink', destination, span: this.span(this.pos, this.pos + match[0].length) });
    this.advanceTo(this.pos + match[0].length);
    return true;
  }

  /**
   * `https://...`, `ftp://...` and `www....` at a word boundary
   */
  private scanBareAutolink(): boolean {
    const previous = this.pos > this.from ? this.text[this.pos - 1] : undefined;
    if (previous !== undefined && !/[\s*_~(]/.test(previous)) return false;

    const match = this.matchAt(BARE_URI);
    if (!match) return false;

    const url = trimTrailingPunctuation(match[0]);
    const prefixLength = url.startsWith('www.') ? 4 : url.indexOf('//') + 2;
    if (url.length <= prefixLength) return false;

    const destination = url.startsWith('www.') ? `http://${url}` : url;
    this.flushText(this.pos);
    this.pushNode({ type: 'autolink', destination, span: this.span(this.pos, this.pos + url.length) });
    this.advanceTo(this.pos + url.length);
    return true;
  }

  private scanLineBreak(): boolean {
    let textEnd = this.pos;
    while (textEnd > this.textStart && this.text[textEnd - 1] === ' ') textEnd--;
    const hard = this.pos - textEnd >= 2;

    this.flushText(textEnd);
    const span = this.span(textEnd, this.pos + 1);
    this.pushNode(hard ? { type: 'hard_break', span } : { type: 'soft_break', span });
    this.advanceTo(this.pos + 1);
    return true;
  }

  // ===========================================================================
  // Delimiters
  // ===========================================================================

  private scanDelimiterRun(char: '*' | '~'): boolean {
    const length = this.runLength(this.pos, char);
    if (char === '~' && length !== 2) {
      this.pos += length;
      return true;
    }

    const before = this.pos > this.from ? this.text[this.pos - 1] : undefined;
    const after = this.pos + length < this.end ? this.text[this.pos + length] : undefined;

    this.flushText(this.pos);
    const run: DelimiterRun = {
      kind: 'delimiter',
      char,
      start: this.pos,
      end: this.pos + length,
      length,
      canOpen: after !== undefined && !WHITESPACE.test(after),
      canClose: before !== undefined && !WHITESPACE.test(before),
      previous: null,
      next: null,
      previousDelimiter: this.lastDelimiter,
      nextDelimiter: null,
    };
    if (this.lastDelimiter) {
      this.lastDelimiter.nextDelimiter = run;
    } else {
      this.firstDelimiter = run;
    }
    this.lastDelimiter = run;
    this.append(run);
    this.advanceTo(this.pos + length);
    return true;
  }

  /**
   * Pair closers with the nearest compatible opener, innermost first. A
   * closer that finds no opener records how far down it looked, so later
   * closers of the same kind stop there.
   */
  private processEmphasis(): void {
    const openersBottom = new Map<string, DelimiterRun | null>();
    let closer = this.firstDelimiter;

    while (closer) {
      if (!closer.canClose) {
        closer = closer.nextDelimiter;
        continue;
      }

      const key = `${closer.char}:${closer.canOpen}:${closer.length % 3}`;
      const opener = this.findOpener(closer, openersBottom.get(key) ?? null);
      if (!opener) {
        openersBottom.set(key, closer.previousDelimiter);
        const next: DelimiterRun | null = closer.nextDelimiter;
        if (!closer.canOpen) this.unlinkDelimiter(closer);
        closer = next;
        continue;
      }

      const openLength = opener.end - opener.start;
      const closeLength = closer.end - closer.start;
      const used = closer.char === '~' || (openLength >= 2 && closeLength >= 2) ? 2 : 1;

      const children = this.toInlines(opener.next, closer);
      const span = this.span(opener.end - used, closer.start + used);
      const node: Inline =
        closer.char === '~'
          ? { type: 'strikethrough', children, span }
          : used === 2
            ? { type: 'strong', children, span }
            : { type: 'emphasis', children, span };

      const wrapper: NodePiece = { kind: 'node', node, previous: opener, next: closer };
      opener.next = wrapper;
      closer.previous = wrapper;
      opener.nextDelimiter = closer;
      closer.previousDelimiter = opener;

      opener.end -= used;
      closer.start += used;
      if (opener.end <= opener.start) this.remove(opener);
      if (closer.end <= closer.start) {
        const next: DelimiterRun | null = closer.nextDelimiter;
        this.remove(closer);
        closer = next;
      }
    }
  }

  private findOpener(closer: DelimiterRun, bottom: DelimiterRun | null): DelimiterRun | null {
    for (let opener = closer.previousDelimiter; opener && opener !== bottom; opener = opener.previousDelimiter) {
      if (opener.char !== closer.char || !opener.canOpen) continue;

      // A run that can both open and close only pairs when the lengths are not a multiple of 3
      if (closer.char === '*' && (opener.canClose || closer.canOpen)) {
        const total = opener.length + closer.length;
        if (total % 3 === 0 && !(opener.length % 3 === 0 && closer.length % 3 === 0)) continue;
      }
      return opener;
    }
    return null;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private scanNested(from: number, to: number): Inline[] {
    if (to <= from) return [];
    return new InlineScanner(this.context, from, to, false).scan();
  }

  private toInlines(from: Piece | null, until: Piece | null): Inline[] {
    const result: Inline[] = [];

    for (let piece = from; piece && piece !== until; piece = piece.next) {
      let node: Inline;
      if (piece.kind === 'node') {
        node = piece.node;
      } else if (piece.end > piece.start) {
        node = {
          type: 'text',
          content: this.text.slice(piece.start, piece.end),
          span: this.span(piece.start, piece.end),
        };
      } else {
        continue;
      }

      // Adjacent text merges into one node
      const previous = result[result.length - 1];
      if (node.type === 'text' && previous?.type === 'text' && previous.span.end === node.span.start) {
        result[result.length - 1] = {
          type: 'text',
          content: previous.content + node.content,
          span: mergeSpans(previous.span, node.span),
        };
      } else {
        result.push(node);
      }
    }

    return result;
  }

  private flushText(end: number): void {
    if (end <= this.textStart) return;
    this.pushNode({
      type: 'text',
      content: this.text.slice(this.textStart, end),
      span: this.span(this.textStart, end),
    });
  }

  private pushNode(node: Inline): void {
    this.append({ kind: 'node', node, previous: null, next: null });
  }

  private append(piece: Piece): void {
    piece.previous = this.last;
    if (this.last) {
      this.last.next = piece;
    } else {
      this.first = piece;
    }
    this.last = piece;
  }

  private remove(run: DelimiterRun): void {
    if (run.previous) {
      run.previous.next = run.next;
    } else {
      this.first = run.next;
    }
    if (run.next) {
      run.next.previous = run.previous;
    } else {
      this.last = run.previous;
    }
    this.unlinkDelimiter(run);
  }

  private unlinkDelimiter(run: DelimiterRun): void {
    if (run.previousDelimiter) {
      run.previousDelimiter.nextDelimiter = run.nextDelimiter;
    } else {
      this.firstDelimiter = run.nextDelimiter;
    }
    if (run.nextDelimiter) {
      run.nextDelimiter.previousDelimiter = run.previousDelimiter;
    } else {
      this.lastDelimiter = run.previousDelimiter;
    }
  }

  private advanceTo(position: number): void {
    this.pos = position;
    this.textStart = position;
  }

  private runLength(index: number, char: string): number {
    let length = 0;
    while (index + length < this.end && this.text[index + length] === char) length++;
    return length;
  }

  private skipWhitespace(index: number): number {
    let i = index;
    while (i < this.end && WHITESPACE.test(this.text[i])) i++;
    return i;
  }

  private indexBefore(index: number, limit: number): boolean {
    return index !== -1 && index < limit;
  }

  /**
   * Sticky match at the cursor that ends inside the scanned range
   */
  private matchAt(pattern: RegExp): RegExpExecArray | null {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.text);
    return match && this.pos + match[0].length <= this.end ? match : null;
  }

  private span(start: number, end: number): Span {
    const { leaf, source } = this.context;
    return source.span(leaf.sourceIndex(start), leaf.sourceIndex(end));
  }
}

function trimTrailingPunctuation(url: string): string {
  let opens = 0;
  let closes = 0;
  for (const char of url) {
    if (char === '(') opens++;
    if (char === ')') closes++;
  }

  let end = url.length;
  while (end > 0) {
    const last = url[end - 1];
    if (TRAILING_PUNCTUATION.includes(last)) {
      end--;
    } else if (last === ')' && closes > opens) {
      closes--;
      end--;
    } else {
      break;
    }
  }
  return url.slice(0, end);
}
