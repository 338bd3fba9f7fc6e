import { makeSpan } from "../lexer/tokens.js";
import { error, type Diagnostic } from "./diagnostic.js";

export type LexErrorKind = "InconsistentIndentation";

export class LexError extends Error {
  readonly kind: LexErrorKind = "InconsistentIndentation";

  constructor(
    /** Width of the offending line's leading spaces. */
    readonly width: number,
    /** Offset of the offending line's first character. */
    readonly offset: number,
    /** Indentation levels open when the line was read. */
    readonly expected: readonly number[],
    readonly source: string,
  ) {
    super(`Inconsistent indentation: width ${width} matches no open block`);
    this.name = "LexError";
  }

  toDiagnostic(): Diagnostic {
    return error(
      this.message,
      makeSpan(this.offset, this.offset + this.width),
      this.source,
      `Indent this line to one of: ${this.expected.join(", ")} spaces`,
    );
  }
}
