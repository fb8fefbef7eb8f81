export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  /** Stable identifier of the rule, e.g. "MultipleExpansion" or "ParseError". */
  code: string;
  message: string;
  span: Span;
  help?: string;
}

export function error(code: string, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", code, message, span, help };
}

export function warning(code: string, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "warning", code, message, span, help };
}

export function fileSpan(source: string): Span {
  return {
    start: { offset: 0, line: 1, column: 1 },
    end: { offset: 0, line: 1, column: 1 },
    source,
  };
}
