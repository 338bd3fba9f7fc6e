import * as readline from "node:readline";
import { formatDiagnostic } from "./errors/reporter.js";
import { Lexer } from "./lexer/lexer.js";
import type { LexerRule } from "./lexer/rules.js";
import { formatToken } from "./frontend.js";

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  rules?: readonly LexerRule[];
}

/** Turns the two-character sequence `\n` typed at the prompt into a newline. */
export function unescapeLine(line: string): string {
  return line.replaceAll("\\n", "\n");
}

/** Lexes one prompt line with a fresh lexer and returns what to print. */
export function lexLine(line: string, rules?: readonly LexerRule[]): string[] {
  const source = unescapeLine(line);
  const lexer = new Lexer(source, { filename: "<repl>", rules });
  const output: string[] = [];
  for (const result of lexer) {
    if (result.ok) {
      output.push(formatToken(result.token));
    } else {
      output.push(formatDiagnostic(source, result.error.toDiagnostic()).trimEnd());
    }
  }
  return output;
}

export async function startRepl(options: ReplOptions): Promise<void> {
  const rl = readline.createInterface({
    input: options.input,
    output: options.output,
    terminal: false,
  });

  options.output.write("Silver lexer output\n");
  rl.setPrompt("> ");
  rl.prompt();

  for await (const line of rl) {
    for (const out of lexLine(line, options.rules)) {
      options.output.write(out + "\n");
    }
    rl.prompt();
  }
}
