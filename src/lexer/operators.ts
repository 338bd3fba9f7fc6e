import { TokenKind } from "./tokens.js";

export const OPERATORS: ReadonlyMap<string, TokenKind> = new Map([
  // Delimiters and punctuation
  ["(", TokenKind.LParen],
  [")", TokenKind.RParen],
  ["[", TokenKind.LBracket],
  ["]", TokenKind.RBracket],
  ["{", TokenKind.LBrace],
  ["}", TokenKind.RBrace],
  [":", TokenKind.Colon],
  [";", TokenKind.Semi],
  [".", TokenKind.Dot],
  [",", TokenKind.Comma],

  // Single-character operators
  ["+", TokenKind.Plus],
  ["-", TokenKind.Minus],
  ["*", TokenKind.Star],
  ["/", TokenKind.Slash],
  ["%", TokenKind.Percent],
  ["^", TokenKind.Caret],
  ["&", TokenKind.Amper],
  ["|", TokenKind.Pipe],
  ["~", TokenKind.Tilde],
  ["=", TokenKind.Equals],
  ["<", TokenKind.Less],
  [">", TokenKind.Greater],
  ["!", TokenKind.Not],
  ["@", TokenKind.At],

  // Two-character operators
  ["->", TokenKind.RArrow],
  ["==", TokenKind.EqualsEquals],
  ["!=", TokenKind.NotEquals],
  ["<=", TokenKind.LessEquals],
  [">=", TokenKind.GreaterEquals],
  ["<<", TokenKind.LShift],
  [">>", TokenKind.RShift],
  ["**", TokenKind.StarStar],
  ["+=", TokenKind.PlusEquals],
  ["-=", TokenKind.MinusEquals],
  ["*=", TokenKind.StarEquals],
  ["/=", TokenKind.SlashEquals],
  ["%=", TokenKind.PercentEquals],
  ["&=", TokenKind.AmperEquals],
  ["|=", TokenKind.PipeEquals],
  ["^=", TokenKind.CaretEquals],

  // Three-character operators
  ["<<=", TokenKind.LShiftEquals],
  [">>=", TokenKind.RShiftEquals],
  ["**=", TokenKind.StarStarEquals],
]);

export interface OperatorMatch {
  kind: TokenKind;
  length: 1 | 2 | 3;
}

/**
 * Longest-match lookup: `**=` wins over `**`, which wins over `*`.
 * Returns undefined when `first` starts no operator.
 */
export function matchOperator(first: string, second?: string, third?: string): OperatorMatch | undefined {
  if (second !== undefined) {
    if (third !== undefined) {
      const kind = OPERATORS.get(first + second + third);
      if (kind !== undefined) return { kind, length: 3 };
    }
    const kind = OPERATORS.get(first + second);
    if (kind !== undefined) return { kind, length: 2 };
  }
  const kind = OPERATORS.get(first);
  return kind === undefined ? undefined : { kind, length: 1 };
}
