/**
 * Leaf text handed to the inline parser. A paragraph may come from several
 * source lines whose indentation (list items, quotes) was stripped; the
 * segments are joined with `\n` and every joined index maps back to the
 * source.
 */

export interface TextSegment {
  readonly text: string;

  /** UTF-16 index of `text[0]` in the source buffer */
  readonly start: number;
}

export class LeafText {
  readonly text: string;
  private readonly joinedStarts: number[];

  constructor(readonly segments: readonly TextSegment[]) {
    this.joinedStarts = [];
    let offset = 0;
    for (const segment of segments) {
      this.joinedStarts.push(offset);
      offset += segment.text.length + 1;
    }
    this.text = segments.map((segment) => segment.text).join('\n');
  }

  static single(text: string, start: number): LeafText {
    return new LeafText([{ text, start }]);
  }

  get isEmpty(): boolean {
    return this.text.length === 0;
  }

  /**
   * Source index of the joined index `index`. The `\n` joining two segments
   * maps to the end of the first one.
   */
  sourceIndex(index: number): number {
    if (this.segments.length === 0) return 0;

    let low = 0;
    let high = this.joinedStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >>> 1;
      if (this.joinedStarts[mid] <= index) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const segment = this.segments[low];
    const offset = Math.max(0, Math.min(index - this.joinedStarts[low], segment.text.length));
    return segment.start + offset;
  }
}
