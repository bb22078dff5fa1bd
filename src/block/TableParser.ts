/**
 * Table Parser
 *
 * Pipe tables, bare or inside `::table`. The header row fixes the column
 * count; rows that disagree are padded or truncated with a MalformedTable
 * diagnostic.
 *
 * @since 2026-10-19
 */

import type { ColumnAlignment, DirectiveAttributes, TableBlock, TableCell, TableRow } from '../ast/index.js';
import { ParseErrorKind } from '../errors/index.js';
import { LeafText } from '../inline/index.js';
import { unhandledRecovery } from '../recovery/index.js';
import type { Span } from '../span/index.js';
import {
  isBlank,
  isTableRow,
  isTableSeparator,
  lineEnd,
  sliceLine,
  trimLine,
  type Line,
} from './LineScanner.js';
import { EMPTY_ATTRIBUTES, type BlockParserContext } from './types.js';

export interface BareTableResult {
  block: TableBlock;
  next: number;
}

interface TableShape {
  alignments: ColumnAlignment[];
  rows: TableRow[];
}

export class TableParser {
  constructor(private readonly context: BlockParserContext) {}

  /**
   * Pipe table at `lines[index]`, whose next line is a separator row
   */
  parseBare(lines: readonly Line[], index: number): BareTableResult {
    const header = trimLine(lines[index]);
    const separator = trimLine(lines[index + 1]);
    const data: Line[] = [];

    let i = index + 2;
    while (i < lines.length && !isBlank(lines[i]) && isTableRow(lines[i].text)) {
      data.push(trimLine(lines[i]));
      i++;
    }

    const { alignments, rows } = this.build(header, separator, data);
    const last = data.length > 0 ? data[data.length - 1] : separator;

    return {
      block: {
        type: 'table',
        alignments,
        rows,
        attributes: EMPTY_ATTRIBUTES,
        span: this.context.source.span(header.start, lineEnd(last)),
      },
      next: i,
    };
  }

  /**
   * Body of a `::table` directive
   */
  parseDirective(body: readonly Line[], attributes: DirectiveAttributes, span: Span): TableBlock {
    const { source, recovery } = this.context;
    const rowLines: Line[] = [];

    for (const line of body) {
      if (isBlank(line)) continue;
      const trimmed = trimLine(line);
      if (!isTableRow(trimmed.text)) {
        recovery.report(
          ParseErrorKind.MalformedTable,
          source.span(trimmed.start, lineEnd(trimmed)),
          'Line in a table body is not a table row'
        );
        continue;
      }
      rowLines.push(trimmed);
    }

    if (rowLines.length === 0) {
      recovery.report(ParseErrorKind.MalformedTable, span, 'Table has no header row');
      return { type: 'table', alignments: [], rows: [], attributes, span };
    }

    const [header, ...rest] = rowLines;
    let separator: Line | null = null;
    let data = rest;
    if (rest.length > 0 && isTableSeparator(rest[0].text)) {
      separator = rest[0];
      data = rest.slice(1);
    } else {
      recovery.report(
        ParseErrorKind.MalformedTable,
        source.span(header.start, lineEnd(header)),
        'Table header is not followed by a separator row'
      );
    }

    const { alignments, rows } = this.build(header, separator, data);
    return { type: 'table', alignments, rows, attributes, span };
  }

  private build(header: Line, separator: Line | null, data: readonly Line[]): TableShape {
    const headerCells = splitCells(header);
    const columns = headerCells.length;

    const rows: TableRow[] = [this.buildRow(header, headerCells, true)];
    for (const line of data) {
      rows.push(this.buildRow(line, this.normalize(line, splitCells(line), columns, 'Row'), false));
    }

    let alignments: ColumnAlignment[] = new Array<ColumnAlignment>(columns).fill(null);
    if (separator) {
      const cells = this.normalize(separator, splitCells(separator), columns, 'Separator row');
      alignments = cells.map((cell) => parseAlignment(cell.text));
    }

    return { alignments, rows };
  }

  /**
   * Pad or truncate to `columns`
   */
  private normalize(row: Line, cells: Line[], columns: number, label: string): Line[] {
    if (cells.length === columns) return cells;

    const { source, recovery } = this.context;
    const strategy = recovery.report(
      ParseErrorKind.MalformedTable,
      source.span(row.start, lineEnd(row)),
      `${label} has ${cells.length} cells, expected ${columns}`
    );
    if (strategy !== 'pad-or-truncate') unhandledRecovery(strategy);

    if (cells.length > columns) return cells.slice(0, columns);
    const padded = [...cells];
    while (padded.length < columns) padded.push({ text: '', start: lineEnd(row) });
    return padded;
  }

  private buildRow(row: Line, cells: readonly Line[], header: boolean): TableRow {
    const { source, inline } = this.context;
    return {
      header,
      cells: cells.map(
        (cell): TableCell => ({
          content: inline.parse(LeafText.single(cell.text, cell.start)),
          span: source.span(cell.start, lineEnd(cell)),
        })
      ),
      span: source.span(row.start, lineEnd(row)),
    };
  }
}

/**
 * Cells of a trimmed row, each trimmed. Leading and trailing pipes are
 * optional; `\|` does not split.
 */
export function splitCells(row: Line): Line[] {
  const { text } = row;
  const from = text.startsWith('|') ? 1 : 0;
  let to = text.length;
  if (to > from && text.endsWith('|') && !text.endsWith('\\|')) to--;

  const cells: Line[] = [];
  let cellStart = from;
  for (let i = from; i < to; i++) {
    if (text[i] === '\\') {
      i++;
    } else if (text[i] === '|') {
      cells.push(trimLine(sliceLine(row, cellStart, i)));
      cellStart = i + 1;
    }
  }
  cells.push(trimLine(sliceLine(row, cellStart, to)));

  return cells;
}

function parseAlignment(cell: string): ColumnAlignment {
  const left = cell.startsWith(':');
  const right = cell.endsWith(':');
  if (left && right) return 'center';
  if (right) return 'right';
  if (left) return 'left';
  return null;
}
