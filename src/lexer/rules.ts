import type { Cursor } from "./cursor.js";
import { TokenKind } from "./tokens.js";

export interface RuleMatch {
  kind: TokenKind;
  value: string;
}

/**
 * A token rule consulted before the built-in dispatch.
 *
 * `scan` is called with the cursor positioned on `ch` (not yet consumed). A
 * rule that matches consumes its characters and returns the token; a rule that
 * declines returns undefined and the lexer rewinds whatever it consumed.
 */
export interface LexerRule {
  readonly name: string;
  scan(cursor: Cursor, ch: string): RuleMatch | undefined;
}

export const DEFAULT_RULES: readonly LexerRule[] = [];

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["0", "\0"],
  ["\\", "\\"],
  ["'", "'"],
  ['"', '"'],
]);

/** Single-line string literals in single or double quotes. */
export const stringLiteralRule: LexerRule = {
  name: "string-literal",
  scan(cursor, ch) {
    if (ch !== '"' && ch !== "'") return undefined;
    cursor.bump();

    let value = "";
    for (;;) {
      const next = cursor.bump();
      if (next === undefined || next === "\n") return undefined;
      if (next === ch) return { kind: TokenKind.StringLiteral, value };
      if (next === "\\") {
        const escaped = cursor.bump();
        if (escaped === undefined || escaped === "\n") return undefined;
        // Unknown escapes are kept verbatim
        value += ESCAPES.get(escaped) ?? "\\" + escaped;
      } else {
        value += next;
      }
    }
  },
};
