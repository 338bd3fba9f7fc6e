export type IndentDecision =
  | { kind: "indent" }
  | { kind: "dedent"; count: number }
  | { kind: "none" }
  | { kind: "inconsistent"; expected: readonly number[] };

/**
 * Stack of open indentation widths. The bottom entry is always 0 and entries
 * strictly increase towards the top.
 */
export class IndentationTracker {
  private readonly stack: number[] = [0];

  get top(): number {
    return this.stack[this.stack.length - 1];
  }

  /** Number of open levels above the base. */
  get depth(): number {
    return this.stack.length - 1;
  }

  get levels(): readonly number[] {
    return [...this.stack];
  }

  resolve(width: number): IndentDecision {
    if (width > this.top) {
      this.stack.push(width);
      return { kind: "indent" };
    }
    if (width === this.top) {
      return { kind: "none" };
    }
    if (!this.stack.includes(width)) {
      return { kind: "inconsistent", expected: this.levels };
    }

    let count = 0;
    while (this.top > width) {
      this.stack.pop();
      count++;
    }
    return { kind: "dedent", count };
  }

  /** Pops every level above the base, returning how many were open. */
  closeAll(): number {
    const count = this.depth;
    this.stack.length = 1;
    return count;
  }
}
