export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type ErrorKind = "IndentationError" | "LexError" | "TranspileError";

export interface Diagnostic {
  kind: ErrorKind;
  message: string;
  span: Span;
  help?: string;
}

export function indentationError(message: string, span: Span, help?: string): Diagnostic {
  return { kind: "IndentationError", message, span, help };
}

export function lexError(message: string, span: Span, help?: string): Diagnostic {
  return { kind: "LexError", message, span, help };
}

export function transpileError(message: string, span: Span, help?: string): Diagnostic {
  return { kind: "TranspileError", message, span, help };
}

/** Span on a single line; columns are 1-based, `endCol` exclusive. */
export function makeSpan(source: string, line: number, startCol: number, endCol: number): Span {
  return {
    start: { line, column: startCol },
    end: { line, column: endCol },
    source,
  };
}
