import { TokenKind, BLOCK_UNIT, type Token } from "../lexer/tokens.js";
import { KEYWORDS, PRINT_TARGET, type Vocabulary } from "../lexer/keywords.js";
import { transpileError, makeSpan, type Diagnostic } from "../errors/diagnostic.js";

export interface TranspilerOptions {
  vocabulary?: Vocabulary;
}

export type TranspileResult =
  | { ok: true; output: string }
  | { ok: false; error: Diagnostic };

// Applied in order, each to every occurrence
const PUNCTUATION_FIXUPS: ReadonlyArray<readonly [string, string]> = [
  [" :", ":"],
  [" ,", ","],
  [" )", ")"],
  ["( ", "("],
  ["[ ", "["],
  [" ]", "]"],
  [". ", "."],
  [" .", "."],
];

/**
 * Removes the spaces that joining tokens with single spaces leaves next to
 * punctuation. Purely textual: string literals containing these pairs are
 * rewritten as well.
 */
export function fixPunctuationSpacing(text: string): string {
  let result = text;
  for (const [from, to] of PUNCTUATION_FIXUPS) {
    result = result.replaceAll(from, to);
  }
  return result;
}

export class Transpiler {
  private vocabulary: Vocabulary;
  private lines: string[] = [];
  private buffer: Token[] = [];
  private depth: number = 0;

  constructor(options: TranspilerOptions = {}) {
    this.vocabulary = options.vocabulary ?? KEYWORDS;
  }

  transpile(tokens: readonly Token[]): TranspileResult {
    this.lines = [];
    this.buffer = [];
    this.depth = 0;

    for (const token of tokens) {
      switch (token.kind) {
        case TokenKind.Indent:
          this.depth++;
          break;
        case TokenKind.Dedent:
          if (this.depth === 0) {
            return {
              ok: false,
              error: transpileError("Unbalanced block end", token.span, "Every Dedent must close an earlier Indent"),
            };
          }
          this.depth--;
          break;
        case TokenKind.Newline: {
          const error = this.flushLine(token);
          if (error) return { ok: false, error };
          break;
        }
        default:
          this.buffer.push(token);
      }
    }

    // Input that did not end on a Newline
    const last = tokens[tokens.length - 1];
    if (this.buffer.length > 0 && last) {
      const error = this.flushLine(last);
      if (error) return { ok: false, error };
    }

    return { ok: true, output: this.lines.join("\n") };
  }

  /** Assembles one logical line at the given depth. */
  assembleLine(tokens: readonly Token[], depth: number): string {
    const mapped = tokens.map((t) =>
      t.kind === TokenKind.Keyword ? this.vocabulary.get(t.value) ?? t.value : t.value,
    );
    const indent = " ".repeat(depth * BLOCK_UNIT);

    if (mapped[0] === PRINT_TARGET) {
      const args = fixPunctuationSpacing(mapped.slice(1).join(" "));
      return `${indent}${PRINT_TARGET}(${args})`;
    }
    return indent + fixPunctuationSpacing(mapped.join(" "));
  }

  private flushLine(at: Token): Diagnostic | null {
    if (this.buffer.length === 0) {
      const previous = this.lines[this.lines.length - 1];
      if (previous !== undefined && previous.trim() !== "") {
        this.lines.push("");
      }
      return null;
    }

    try {
      this.lines.push(this.assembleLine(this.buffer, this.depth));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      const line = this.buffer[0].span.start.line;
      return transpileError(`Transpilation failed: ${msg}`, makeSpan(at.span.source, line, 1, 2));
    }
    this.buffer = [];
    return null;
  }
}

export function transpile(tokens: readonly Token[], options?: TranspilerOptions): TranspileResult {
  return new Transpiler(options).transpile(tokens);
}
