import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export interface LineColumn {
  line: number;
  column: number;
}

/** 1-based line and column of a character offset. Offsets past the end clamp to the end. */
export function lineColumn(source: string, offset: number): LineColumn {
  const chars = Array.from(source);
  const limit = Math.min(Math.max(offset, 0), chars.length);
  let line = 1;
  let column = 1;
  for (let i = 0; i < limit; i++) {
    if (chars[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

/**
 * Renders a diagnostic against the text it was lexed from. `baseOffset` is
 * subtracted from the span first, for units lexed at a non-zero base.
 */
export function formatDiagnostic(source: string, diag: Diagnostic, baseOffset: number = 0): string {
  const start = lineColumn(source, diag.span.start - baseOffset);
  const lines = source.split("\n");
  const line = lines[start.line - 1] ?? "";
  const lineNum = String(start.line);
  const padding = " ".repeat(lineNum.length);

  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold("error")
      : diag.severity === "warning"
        ? chalk.yellow.bold("warning")
        : chalk.blue.bold("info");

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.source}:${start.line}:${start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(start.column - 1)}${chalk.red("^".repeat(Math.max(1, diag.span.len)))}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[], baseOffset: number = 0): string {
  return diagnostics.map((d) => formatDiagnostic(source, d, baseOffset)).join("\n");
}
