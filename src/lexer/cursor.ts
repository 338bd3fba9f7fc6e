/**
 * Single-pass reader over the characters of one source unit.
 *
 * Characters are code points, so an astral character such as an emoji counts
 * as one position, matching the offsets reported in spans.
 */
export class Cursor {
  private readonly chars: readonly string[];
  private idx: number = 0;

  constructor(source: string) {
    this.chars = Array.from(source);
  }

  /** Number of characters consumed so far. */
  get offset(): number {
    return this.idx;
  }

  get length(): number {
    return this.chars.length;
  }

  isEof(): boolean {
    return this.idx >= this.length;
  }

  peek(ahead: number = 0): string | undefined {
    return this.chars[this.idx + ahead];
  }

  bump(): string | undefined {
    const ch = this.chars[this.idx];
    if (ch !== undefined) this.idx++;
    return ch;
  }

  /** Consumes the longest run matching `predicate`; the first failing character stays unread. */
  takeWhile(predicate: (ch: string) => boolean): string {
    const start = this.idx;
    while (this.idx < this.chars.length && predicate(this.chars[this.idx])) {
      this.idx++;
    }
    return this.chars.slice(start, this.idx).join("");
  }

  /** Consumes spaces and returns how many. Tabs are left in place. */
  skipWhitespace(): number {
    return this.takeWhile((ch) => ch === " ").length;
  }

  /** Position of the last `ch` consumed at or after `from`, or -1. */
  lastIndexOf(ch: string, from: number): number {
    for (let i = this.idx - 1; i >= from; i--) {
      if (this.chars[i] === ch) return i;
    }
    return -1;
  }

  checkpoint(): number {
    return this.idx;
  }

  restore(mark: number): void {
    if (mark < 0 || mark > this.length) {
      throw new RangeError(`Checkpoint ${mark} is outside the source`);
    }
    this.idx = mark;
  }
}
