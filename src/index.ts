#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { formatDiagnostics } from "./errors/reporter.js";
import { formatToken, lexFile, rulesFor } from "./frontend.js";
import { startRepl } from "./repl.js";
import { SourceMap } from "./source-map/source-map.js";

const stringsByDefault = process.env.SILVER_STRINGS === "1";

function parseOffset(value: string): number {
  const offset = Number(value);
  if (!Number.isInteger(offset) || offset < 0) {
    throw new Error(`Invalid base offset '${value}'`);
  }
  return offset;
}

const program = new Command()
  .name("silver")
  .description("Lexer for the Silver language: tokens, indentation blocks and spans")
  .version("0.1.0");

program
  .command("lex <file>")
  .description("Print the token stream of a source file")
  .option("--strings", "Lex quoted string literals", stringsByDefault)
  .option("--base-offset <n>", "Offset added to every span", "0")
  .option("--json", "Print tokens as a JSON array")
  .action((file: string, opts: Record<string, unknown>) => {
    try {
      const baseOffset = parseOffset(String(opts.baseOffset));
      const result = lexFile(file, { strings: !!opts.strings, baseOffset });

      if (opts.json) {
        console.log(JSON.stringify(result.tokens, null, 2));
      } else {
        for (const tok of result.tokens) {
          console.log(formatToken(tok));
        }
      }

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(result.source, result.errors, baseOffset));
        process.exit(1);
      }
    } catch (e) {
      console.error(`${chalk.red("Error")}: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("repl")
  .description("Lex one line at a time from standard input (type \\n for a line break)")
  .option("--strings", "Lex quoted string literals", stringsByDefault)
  .action(async (opts: Record<string, unknown>) => {
    await startRepl({
      input: process.stdin,
      output: process.stdout,
      rules: rulesFor({ strings: !!opts.strings }),
    });
  });

program
  .command("tree [dir]")
  .description("Print the module tree of a project directory (defaults to the current directory)")
  .action((dir: string | undefined) => {
    try {
      const map = SourceMap.load(dir ?? process.cwd());
      process.stdout.write(map.render());
    } catch (e) {
      console.error(`${chalk.red("Error")}: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

await program.parseAsync();
