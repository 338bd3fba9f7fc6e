import { Cursor } from "./cursor.js";
import { IndentationTracker } from "./indentation.js";
import { matchOperator } from "./operators.js";
import { DEFAULT_RULES, type LexerRule } from "./rules.js";
import { TokenKind, makeSpan, type Token } from "./tokens.js";
import { LexError } from "../errors/lex-error.js";
import type { Diagnostic } from "../errors/diagnostic.js";

export interface LexerOptions {
  filename?: string;
  /** Added to every span, so units of one project get disjoint offsets. */
  baseOffset?: number;
  /** Consulted in order before the built-in dispatch. */
  rules?: readonly LexerRule[];
}

export type LexResult =
  | { ok: true; token: Token }
  | { ok: false; error: LexError };

export interface LexOutput {
  tokens: Token[];
  errors: Diagnostic[];
}

/**
 * Pull-based tokenizer for one source unit. Each call to `next()` yields one
 * token (or an indentation error) until the stream is exhausted.
 */
export class Lexer implements Iterable<LexResult> {
  readonly filename: string;
  readonly baseOffset: number;
  private readonly rules: readonly LexerRule[];
  private readonly cursor: Cursor;
  private readonly indentation = new IndentationTracker();
  // Structural tokens decided together but handed out one per call
  private readonly queue: Token[] = [];
  private isLineStart: boolean = true;
  private lineStart: number = 0;
  private lastScanned: TokenKind | undefined;
  private closed: boolean = false;

  constructor(source: string, options: LexerOptions = {}) {
    this.cursor = new Cursor(source);
    this.filename = options.filename ?? "<stdin>";
    this.baseOffset = options.baseOffset ?? 0;
    this.rules = options.rules ?? DEFAULT_RULES;
  }

  next(): LexResult | undefined {
    const queued = this.queue.shift();
    if (queued) return { ok: true, token: queued };

    if (this.isLineStart) {
      this.isLineStart = false;
      const width = this.cursor.skipWhitespace();
      if (!this.atBlankLine()) {
        const result = this.resolveIndentation(width);
        if (result) return result;
      }
    } else {
      this.cursor.skipWhitespace();
    }

    if (this.cursor.isEof()) return this.close();
    return { ok: true, token: this.scan() };
  }

  *[Symbol.iterator](): Iterator<LexResult> {
    for (let result = this.next(); result; result = this.next()) {
      yield result;
    }
  }

  /** Drains the stream, collecting indentation errors as diagnostics. */
  tokenize(): LexOutput {
    const tokens: Token[] = [];
    const errors: Diagnostic[] = [];
    for (const result of this) {
      if (result.ok) {
        tokens.push(result.token);
      } else {
        errors.push(result.error.toDiagnostic());
      }
    }
    return { tokens, errors };
  }

  // Whitespace-only and comment-only lines leave the indentation alone
  private atBlankLine(): boolean {
    const ch = this.cursor.peek();
    if (ch === "\r" && this.cursor.peek(1) === "\n") return true;
    return ch === undefined || ch === "\n" || ch === "#";
  }

  private resolveIndentation(width: number): LexResult | undefined {
    const decision = this.indentation.resolve(width);
    switch (decision.kind) {
      case "indent":
        return { ok: true, token: this.makeToken(TokenKind.Indent, "", this.lineStart, this.lineStart) };
      case "dedent": {
        for (let i = 0; i < decision.count; i++) {
          this.queue.push(this.makeToken(TokenKind.Dedent, "", this.lineStart, this.lineStart));
        }
        const first = this.queue.shift();
        return first ? { ok: true, token: first } : undefined;
      }
      case "inconsistent":
        return {
          ok: false,
          error: new LexError(width, this.baseOffset + this.lineStart, decision.expected, this.filename),
        };
      case "none":
        return undefined;
    }
  }

  private close(): LexResult | undefined {
    if (this.closed) return undefined;
    this.closed = true;

    const end = this.cursor.offset;
    if (this.lastScanned !== undefined && this.lastScanned !== TokenKind.NewLine) {
      this.queue.push(this.makeToken(TokenKind.NewLine, "", end, end));
    }
    const open = this.indentation.closeAll();
    for (let i = 0; i < open; i++) {
      this.queue.push(this.makeToken(TokenKind.Dedent, "", end, end));
    }

    const first = this.queue.shift();
    return first ? { ok: true, token: first } : undefined;
  }

  private scan(): Token {
    const start = this.cursor.offset;
    const token = this.applyRules(start) ?? this.scanDefault(start);
    this.lastScanned = token.kind;
    return token;
  }

  private applyRules(start: number): Token | undefined {
    const ch = this.cursor.peek();
    if (ch === undefined) return undefined;

    for (const rule of this.rules) {
      const mark = this.cursor.checkpoint();
      const match = rule.scan(this.cursor, ch);
      // A match that consumed nothing would never advance the stream
      if (match && this.cursor.offset > mark) {
        const newline = this.cursor.lastIndexOf("\n", mark);
        if (newline >= 0) {
          this.isLineStart = true;
          this.lineStart = newline + 1;
        }
        return this.makeToken(match.kind, match.value, start, this.cursor.offset);
      }
      this.cursor.restore(mark);
    }
    return undefined;
  }

  private scanDefault(start: number): Token {
    const ch = this.cursor.bump() ?? "";

    if (ch === "#") {
      const text = ch + this.cursor.takeWhile((c) => c !== "\n");
      return this.makeToken(TokenKind.Comment, text, start, this.cursor.offset);
    }

    if (isIdentStart(ch)) {
      const text = ch + this.cursor.takeWhile(isIdentBody);
      return this.makeToken(TokenKind.Identifier, text, start, this.cursor.offset);
    }

    if (isDigit(ch)) {
      const text = ch + this.cursor.takeWhile(isDigit);
      return this.makeToken(TokenKind.IntegerLiteral, text, start, this.cursor.offset);
    }

    if (ch === "\n") {
      this.isLineStart = true;
      this.lineStart = this.cursor.offset;
      return this.makeToken(TokenKind.NewLine, ch, start, this.cursor.offset);
    }

    const op = matchOperator(ch, this.cursor.peek(), this.cursor.peek(1));
    if (op) {
      let text = ch;
      for (let i = 1; i < op.length; i++) {
        text += this.cursor.bump() ?? "";
      }
      return this.makeToken(op.kind, text, start, this.cursor.offset);
    }

    return this.makeToken(TokenKind.Unknown, ch, start, this.cursor.offset);
  }

  private makeToken(kind: TokenKind, value: string, start: number, end: number): Token {
    return {
      kind,
      value,
      span: makeSpan(this.baseOffset + start, this.baseOffset + end),
    };
  }
}

function isIdentStart(ch: string): boolean {
  return ch === "_" || (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isIdentBody(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}
