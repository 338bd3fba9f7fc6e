import type { Span } from "../lexer/tokens.js";

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  /** Name of the file or input the span points into. */
  source: string;
  help?: string;
}

export function error(message: string, span: Span, source: string, help?: string): Diagnostic {
  return { severity: "error", message, span, source, help };
}
