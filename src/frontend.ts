import * as fs from "fs";
import { Lexer, type LexOutput } from "./lexer/lexer.js";
import { DEFAULT_RULES, stringLiteralRule, type LexerRule } from "./lexer/rules.js";
import type { Token } from "./lexer/tokens.js";

export { Lexer, type LexOutput, type LexResult, type LexerOptions } from "./lexer/lexer.js";
export { Cursor } from "./lexer/cursor.js";
export { TokenKind, makeSpan, type Span, type Token } from "./lexer/tokens.js";
export { DEFAULT_RULES, stringLiteralRule, type LexerRule, type RuleMatch } from "./lexer/rules.js";
export { LexError } from "./errors/lex-error.js";
export type { Diagnostic } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
export { SourceMap, SourceMapError } from "./source-map/source-map.js";
export { ModulePath } from "./source-map/module-path.js";

export interface LexOptions {
  /** Enables single-line string literals. */
  strings?: boolean;
  baseOffset?: number;
}

export interface LexFileResult extends LexOutput {
  source: string;
}

export function rulesFor(options: LexOptions): readonly LexerRule[] {
  return options.strings ? [stringLiteralRule] : DEFAULT_RULES;
}

/**
 * Lex a single source string.
 * Used by tests, the REPL and when source is provided directly.
 */
export function lex(source: string, filename: string, options: LexOptions = {}): LexOutput {
  const lexer = new Lexer(source, {
    filename,
    baseOffset: options.baseOffset,
    rules: rulesFor(options),
  });
  return lexer.tokenize();
}

export function lexFile(filePath: string, options: LexOptions = {}): LexFileResult {
  const source = fs.readFileSync(filePath, "utf-8");
  return { source, ...lex(source, filePath, options) };
}

/** One tab-separated line: kind, JSON-quoted value, span. */
export function formatToken(token: Token): string {
  return `${token.kind}\t${JSON.stringify(token.value)}\t${token.span.start}..${token.span.end}`;
}
