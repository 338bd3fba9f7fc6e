import * as fs from "fs";
import type { ModulePath } from "./module-path.js";

/** A file or directory found while walking the project, not yet read. */
export interface DeferredSourceFile {
  modulePath: ModulePath;
  /** Absolute filesystem path. */
  fsPath: string;
  isDirectory: boolean;
}

/** Loaded text placed at `[start, end)` in the project-wide offset space. */
export class SourceCode {
  readonly end: number;
  private readonly chars: readonly string[];

  constructor(
    readonly start: number,
    readonly content: string,
  ) {
    this.chars = Array.from(content);
    this.end = start + this.chars.length;
  }

  contains(pos: number): boolean {
    return pos >= this.start && pos < this.end;
  }

  /** Text between two absolute offsets. */
  slice(absStart: number, absEnd: number): string {
    if (absStart < this.start || absStart > this.end || absEnd < absStart || absEnd > this.end) {
      throw new RangeError(`Range ${absStart}..${absEnd} is not within ${this.start}..${this.end}`);
    }
    return this.chars.slice(absStart - this.start, absEnd - this.start).join("");
  }
}

export class SourceFile {
  constructor(
    readonly modulePath: ModulePath,
    /** Absent for directories. */
    readonly sourceCode?: SourceCode,
  ) {}

  static load(deferred: DeferredSourceFile, offset: number): SourceFile {
    if (deferred.isDirectory) {
      return new SourceFile(deferred.modulePath);
    }
    const content = fs.readFileSync(deferred.fsPath, "utf-8");
    return new SourceFile(deferred.modulePath, new SourceCode(offset, content));
  }

  get offset(): number | undefined {
    return this.sourceCode?.start;
  }

  contains(pos: number): boolean {
    return this.sourceCode?.contains(pos) ?? false;
  }
}
