/**
 * Line Scanner
 *
 * Splits the buffer into lines and classifies them. Lines keep the UTF-16
 * index of their first character in the original buffer, so stripping
 * indentation (list items, quotes) never loses source positions.
 *
 * @since 2026-10-19
 */

/**
 * One source line without its terminator
 */
export interface Line {
  /** Line text, possibly with leading indentation already removed */
  readonly text: string;

  /** UTF-16 index of `text[0]` in the source buffer */
  readonly start: number;
}

export interface HeadingMatch {
  /** Number of `#`, not yet clamped */
  level: number;
  /** Content bounds within the matched text */
  contentStart: number;
  contentEnd: number;
}

export interface FenceMatch {
  ticks: number;
  language: string | null;
}

export interface DirectiveMatch {
  name: string;
  /** Offset of the attribute text within the matched text */
  attributesOffset: number;
}

export interface ListMarkerMatch {
  ordered: boolean;
  /** Number of an ordered marker */
  number: number | null;
  /** Marker width plus the spaces that follow it */
  contentOffset: number;
}

const THEMATIC_BREAK = /^(?:(?:-[ \t]*){3,}|(?:\*[ \t]*){3,}|(?:_[ \t]*){3,})$/;
const DIRECTIVE_OPEN = /^::([A-Za-z][\w-]*)(?=[ \t]|$)/;
const FENCE_OPEN = /^(`{3,})([^`]*)$/;
const FENCE_CLOSE = /^(`{3,})[ \t]*$/;
const LIST_MARKER = /^(?:([-*+])|(\d{1,9})\.)(?=[ \t]|$)/;
const MALFORMED_LIST_MARKER = /^(?:[-+][^\s+-]|\d{1,9}\)(?=[ \t]|$)|\d{10,}[.)](?=[ \t]|$))/;
const TABLE_SEPARATOR = /^\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)*\|?$/;
const HTML_START = /^<(?:[A-Za-z][A-Za-z0-9-]*(?=[\s/>]|$)|\/[A-Za-z]|!)/;

/**
 * Split `text` into lines. `\r\n` and `\n` terminate lines; a trailing
 * terminator does not produce an extra empty line.
 */
export function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let start = 0;

  while (start < text.length) {
    let end = text.indexOf('\n', start);
    if (end === -1) end = text.length;
    const textEnd = end > start && text.charCodeAt(end - 1) === 13 ? end - 1 : end;
    lines.push({ text: text.slice(start, textEnd), start });
    start = end + 1;
  }

  return lines;
}

export function lineEnd(line: Line): number {
  return line.start + line.text.length;
}

export function isBlank(line: Line): boolean {
  return line.text.trim().length === 0;
}

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t';
}

/**
 * Leading indentation in columns (tabs advance to the next multiple of 4)
 */
export function indentWidth(text: string): number {
  let columns = 0;
  for (const char of text) {
    if (char === ' ') columns++;
    else if (char === '\t') columns += 4 - (columns % 4);
    else break;
  }
  return columns;
}

/**
 * Remove up to `columns` columns of leading whitespace
 */
export function dedent(line: Line, columns: number): Line {
  let consumed = 0;
  let index = 0;
  while (index < line.text.length && consumed < columns) {
    const char = line.text[index];
    if (char === ' ') consumed++;
    else if (char === '\t') consumed += 4 - (consumed % 4);
    else break;
    index++;
  }
  return sliceLine(line, index);
}

/**
 * Line without its leading whitespace
 */
export function trimLineStart(line: Line): Line {
  let index = 0;
  while (isWhitespace(line.text[index])) index++;
  return sliceLine(line, index);
}

/**
 * Line without leading and trailing whitespace
 */
export function trimLine(line: Line): Line {
  const trimmed = trimLineStart(line);
  return { text: trimmed.text.trimEnd(), start: trimmed.start };
}

export function sliceLine(line: Line, from: number, to: number = line.text.length): Line {
  return { text: line.text.slice(from, to), start: line.start + from };
}

// =============================================================================
// Classification
// =============================================================================

export function matchHeading(text: string): HeadingMatch | null {
  let level = 0;
  while (text[level] === '#') level++;
  if (level === 0) return null;
  if (level < text.length && !isWhitespace(text[level])) return null;

  let contentStart = level;
  while (isWhitespace(text[contentStart])) contentStart++;
  let contentEnd = text.length;
  while (contentEnd > contentStart && isWhitespace(text[contentEnd - 1])) contentEnd--;

  // Optional closing sequence: `## Title ##`
  let closing = contentEnd;
  while (closing > contentStart && text[closing - 1] === '#') closing--;
  if (closing < contentEnd && (closing === contentStart || isWhitespace(text[closing - 1]))) {
    contentEnd = closing;
    while (contentEnd > contentStart && isWhitespace(text[contentEnd - 1])) contentEnd--;
  }

  return { level, contentStart, contentEnd };
}

export function isThematicBreak(text: string): boolean {
  return THEMATIC_BREAK.test(text.trim());
}

export function matchDirectiveOpen(text: string): DirectiveMatch | null {
  const match = DIRECTIVE_OPEN.exec(text);
  if (!match) return null;
  return { name: match[1], attributesOffset: match[0].length };
}

export function isDirectiveClose(text: string): boolean {
  return text.trim() === '::';
}

export function matchFenceOpen(text: string): FenceMatch | null {
  const match = FENCE_OPEN.exec(text);
  if (!match) return null;
  const language = match[2].trim().split(/[ \t]+/)[0];
  return { ticks: match[1].length, language: language ? language : null };
}

export function isFenceClose(text: string, ticks: number): boolean {
  const match = FENCE_CLOSE.exec(text.trim());
  return match !== null && match[1].length >= ticks;
}

export function matchListMarker(text: string): ListMarkerMatch | null {
  const match = LIST_MARKER.exec(text);
  if (!match) return null;

  const markerWidth = match[0].length;
  let spaces = 0;
  while (isWhitespace(text[markerWidth + spaces])) spaces++;
  const rest = text.slice(markerWidth + spaces);
  // Empty item, or content that is itself indented code: content starts one column in
  const contentOffset = rest.length === 0 || spaces > 4 ? markerWidth + 1 : markerWidth + spaces;

  return {
    ordered: match[2] !== undefined,
    number: match[2] !== undefined ? Number.parseInt(match[2], 10) : null,
    contentOffset: Math.min(contentOffset, text.length),
  };
}

/**
 * Something that looks like a list marker but is not one: `-item`,
 * `+item`, `1)`, or an ordered marker of ten or more digits.
 */
export function isMalformedListMarker(text: string): boolean {
  return !isThematicBreak(text) && MALFORMED_LIST_MARKER.test(text);
}

export function isQuoteLine(text: string): boolean {
  return text.startsWith('>');
}

export function isTableRow(text: string): boolean {
  return text.trimStart().startsWith('|');
}

export function isTableSeparator(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.includes('|') && TABLE_SEPARATOR.test(trimmed);
}

export function isHtmlStart(text: string): boolean {
  return HTML_START.test(text);
}

/**
 * Line that starts a new block and therefore cannot continue a paragraph
 */
export function startsBlock(text: string, htmlBlocks: boolean): boolean {
  return (
    isDirectiveClose(text) ||
    matchDirectiveOpen(text) !== null ||
    matchFenceOpen(text) !== null ||
    matchHeading(text) !== null ||
    isThematicBreak(text) ||
    isQuoteLine(text) ||
    matchListMarker(text) !== null ||
    (htmlBlocks && isHtmlStart(text))
  );
}
