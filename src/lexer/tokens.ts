export enum TokenKind {
  Comment = "Comment",

  // Literals
  Identifier = "Identifier",
  IntegerLiteral = "IntegerLiteral",
  StringLiteral = "StringLiteral",

  // Structure
  NewLine = "NewLine",
  Indent = "Indent",
  Dedent = "Dedent",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBracket = "[",
  RBracket = "]",
  LBrace = "{",
  RBrace = "}",

  // Punctuation
  Colon = ":",
  Semi = ";",
  Dot = ".",
  Comma = ",",

  // Operators
  Plus = "+",
  Minus = "-",
  Star = "*",
  Slash = "/",
  Percent = "%",
  Caret = "^",
  Amper = "&",
  Pipe = "|",
  Tilde = "~",
  Equals = "=",
  Less = "<",
  Greater = ">",
  Not = "!",
  At = "@",

  RArrow = "->",
  EqualsEquals = "==",
  NotEquals = "!=",
  LessEquals = "<=",
  GreaterEquals = ">=",
  LShift = "<<",
  RShift = ">>",
  StarStar = "**",

  // Assignment
  PlusEquals = "+=",
  MinusEquals = "-=",
  StarEquals = "*=",
  SlashEquals = "/=",
  PercentEquals = "%=",
  AmperEquals = "&=",
  PipeEquals = "|=",
  CaretEquals = "^=",
  LShiftEquals = "<<=",
  RShiftEquals = ">>=",
  StarStarEquals = "**=",

  Unknown = "Unknown",
}

/** Half-open character range, measured from the start of the lexed unit plus its base offset. */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly len: number;
}

export interface Token {
  readonly kind: TokenKind;
  /** Matched text; empty for Indent, Dedent and the closing NewLine. */
  readonly value: string;
  readonly span: Span;
}

export function makeSpan(start: number, end: number): Span {
  if (end < start) {
    throw new RangeError(`Span end ${end} is before its start ${start}`);
  }
  return { start, end, len: end - start };
}
