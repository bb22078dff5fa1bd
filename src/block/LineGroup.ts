/**
 * Lines gathered for one list item or footnote definition. Blank lines are
 * held back until a content line follows, so trailing blanks never belong to
 * the group.
 */

import { lineEnd, type Line } from './LineScanner.js';

export class LineGroup {
  readonly lines: Line[] = [];
  private pending: Line[] = [];
  private lastEnd: number;

  /**
   * @param start - UTF-16 index where the group starts (marker or `[^id]:`)
   */
  constructor(
    readonly start: number,
    first: Line
  ) {
    this.lastEnd = lineEnd(first);
    this.lines.push(first);
  }

  get end(): number {
    return this.lastEnd;
  }

  get hasPendingBlank(): boolean {
    return this.pending.length > 0;
  }

  addBlank(line: Line): void {
    this.pending.push(line);
  }

  add(line: Line): void {
    this.lines.push(...this.pending, line);
    this.pending = [];
    this.lastEnd = lineEnd(line);
  }

  /**
   * Add a line as a paragraph of its own
   */
  addSeparate(line: Line): void {
    if (!this.hasPendingBlank) this.addBlank({ text: '', start: line.start });
    this.add(line);
  }
}
