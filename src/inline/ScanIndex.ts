/**
 * Lookup tables over one leaf's joined text. Each table is built in a single
 * pass on first use and answers where a construct starting at a given index
 * ends.
 */

const WHITESPACE = /\s/;

export class ScanIndex {
  private brackets: Int32Array | null = null;
  private doubleCloses: Int32Array | null = null;
  private nonSpaces: Int32Array | null = null;
  private footnoteStops: Int32Array | null = null;
  private destinationEnds: Int32Array | null = null;
  private backticks: Map<number, number[]> | null = null;
  private readonly nextChar = new Map<string, Int32Array>();

  constructor(private readonly text: string) {}

  /**
   * Index of the `]` closing the `[` at `open`, or -1. Backslash escapes
   * hide the next character.
   */
  matchingBracket(open: number): number {
    if (!this.brackets) {
      const { text } = this;
      const table = new Int32Array(text.length).fill(-1);
      const stack: number[] = [];
      for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '\\') {
          i++;
        } else if (char === '[') {
          stack.push(i);
        } else if (char === ']') {
          const opener = stack.pop();
          if (opener !== undefined) table[opener] = i;
        }
      }
      this.brackets = table;
    }
    return open < this.brackets.length ? this.brackets[open] : -1;
  }

  /**
   * First index at or after `from` holding `char`, or -1
   */
  next(char: string, from: number): number {
    let table = this.nextChar.get(char);
    if (!table) {
      table = this.buildNext((i) => this.text[i] === char, -1);
      this.nextChar.set(char, table);
    }
    return from < table.length ? table[from] : -1;
  }

  /**
   * First `]]` starting at or after `from`, or -1
   */
  nextDoubleClose(from: number): number {
    if (!this.doubleCloses) {
      this.doubleCloses = this.buildNext((i) => this.text[i] === ']' && this.text[i + 1] === ']', -1);
    }
    return from < this.doubleCloses.length ? this.doubleCloses[from] : -1;
  }

  /**
   * First non-whitespace index at or after `from`, or the text length
   */
  nextNonSpace(from: number): number {
    if (!this.nonSpaces) {
      this.nonSpaces = this.buildNext((i) => !WHITESPACE.test(this.text[i]), this.text.length);
    }
    return from < this.nonSpaces.length ? this.nonSpaces[from] : this.text.length;
  }

  /**
   * First `]` or whitespace at or after `from`, or the text length
   */
  footnoteStop(from: number): number {
    if (!this.footnoteStops) {
      this.footnoteStops = this.buildNext((i) => this.text[i] === ']' || WHITESPACE.test(this.text[i]), this.text.length);
    }
    return from < this.footnoteStops.length ? this.footnoteStops[from] : this.text.length;
  }

  /**
   * End of a bare link destination starting at `from`: the first whitespace,
   * or the first `)` not balanced by a `(` since `from`
   */
  destinationEnd(from: number): number {
    if (!this.destinationEnds) this.destinationEnds = this.buildDestinationEnds();
    return from < this.destinationEnds.length ? this.destinationEnds[from] : this.text.length;
  }

  /**
   * Start of the first maximal backtick run of exactly `length` ticks at or
   * after `from`, or -1
   */
  backtickRun(length: number, from: number): number {
    if (!this.backticks) this.backticks = this.buildBacktickRuns();
    const starts = this.backticks.get(length);
    if (!starts) return -1;

    let low = 0;
    let high = starts.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (starts[mid] < from) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low < starts.length ? starts[low] : -1;
  }

  private buildNext(matches: (index: number) => boolean, missing: number): Int32Array {
    const length = this.text.length;
    const table = new Int32Array(length + 1);
    table[length] = missing;
    for (let i = length - 1; i >= 0; i--) {
      table[i] = matches(i) ? i : table[i + 1];
    }
    return table;
  }

  private buildDestinationEnds(): Int32Array {
    const { text } = this;
    const length = text.length;

    // Parentheses pair up within a whitespace-free stretch
    const closers = new Int32Array(length).fill(-1);
    const stack: number[] = [];
    for (let i = 0; i < length; i++) {
      const char = text[i];
      if (WHITESPACE.test(char)) {
        stack.length = 0;
      } else if (char === '(') {
        stack.push(i);
      } else if (char === ')') {
        const opener = stack.pop();
        if (opener !== undefined) closers[opener] = i;
      }
    }

    const ends = new Int32Array(length + 1);
    ends[length] = length;
    let nextSpace = length;
    for (let i = length - 1; i >= 0; i--) {
      const char = text[i];
      if (WHITESPACE.test(char)) {
        nextSpace = i;
        ends[i] = i;
      } else if (char === ')') {
        ends[i] = i;
      } else if (char === '(') {
        ends[i] = closers[i] === -1 ? nextSpace : ends[closers[i] + 1];
      } else {
        ends[i] = ends[i + 1];
      }
    }
    return ends;
  }

  private buildBacktickRuns(): Map<number, number[]> {
    const { text } = this;
    const runs = new Map<number, number[]>();
    let i = 0;
    while (i < text.length) {
      if (text[i] !== '`') {
        i++;
        continue;
      }
      const start = i;
      while (i < text.length && text[i] === '`') i++;
      const starts = runs.get(i - start);
      if (starts) {
        starts.push(start);
      } else {
        runs.set(i - start, [start]);
      }
    }
    return runs;
  }
}
