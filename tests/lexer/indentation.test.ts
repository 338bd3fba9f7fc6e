import { describe, it, expect } from "vitest";
import { IndentationTracker } from "../../src/lexer/indentation.js";

describe("IndentationTracker", () => {
  it("starts at level zero", () => {
    const tracker = new IndentationTracker();
    expect(tracker.levels).toEqual([0]);
    expect(tracker.top).toBe(0);
    expect(tracker.depth).toBe(0);
  });

  it("pushes a deeper width", () => {
    const tracker = new IndentationTracker();
    expect(tracker.resolve(4)).toEqual({ kind: "indent" });
    expect(tracker.resolve(8)).toEqual({ kind: "indent" });
    expect(tracker.levels).toEqual([0, 4, 8]);
  });

  it("reports no change at the current width", () => {
    const tracker = new IndentationTracker();
    tracker.resolve(2);
    expect(tracker.resolve(2)).toEqual({ kind: "none" });
    expect(tracker.levels).toEqual([0, 2]);
  });

  it("pops every level above an enclosing width", () => {
    const tracker = new IndentationTracker();
    tracker.resolve(2);
    tracker.resolve(4);
    tracker.resolve(6);
    expect(tracker.resolve(2)).toEqual({ kind: "dedent", count: 2 });
    expect(tracker.levels).toEqual([0, 2]);
    expect(tracker.resolve(0)).toEqual({ kind: "dedent", count: 1 });
    expect(tracker.levels).toEqual([0]);
  });

  it("leaves the stack alone on an inconsistent width", () => {
    const tracker = new IndentationTracker();
    tracker.resolve(4);
    tracker.resolve(8);
    expect(tracker.resolve(6)).toEqual({ kind: "inconsistent", expected: [0, 4, 8] });
    expect(tracker.levels).toEqual([0, 4, 8]);
  });

  it("closes every open level", () => {
    const tracker = new IndentationTracker();
    tracker.resolve(1);
    tracker.resolve(3);
    expect(tracker.closeAll()).toBe(2);
    expect(tracker.levels).toEqual([0]);
    expect(tracker.closeAll()).toBe(0);
  });

  it("does not expose the live stack", () => {
    const tracker = new IndentationTracker();
    const levels = tracker.levels;
    tracker.resolve(4);
    expect(levels).toEqual([0]);
  });
});
