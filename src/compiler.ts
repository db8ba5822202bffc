import { Lexer } from "./lexer/lexer.js";
import { Transpiler } from "./transpiler/transpiler.js";
import type { Token } from "./lexer/tokens.js";
import type { Vocabulary } from "./lexer/keywords.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface CompileOptions {
  emitTokens?: boolean;
  vocabulary?: Vocabulary;
  /** Called as each stage starts. */
  onStage?: (stage: "lex" | "transpile") => void;
}

export interface CompileResult {
  tokens?: Token[];
  /** Generated Python source; absent on failure or with `emitTokens`. */
  output?: string;
  /** Holds at most one diagnostic: the first error met. */
  errors: Diagnostic[];
}

/**
 * Translate AmhaPy source into Python source.
 */
export function compile(
  source: string,
  filename: string,
  options: CompileOptions = {},
): CompileResult {
  // 1. Lex
  options.onStage?.("lex");
  const lexed = new Lexer(source, filename, { vocabulary: options.vocabulary }).tokenize();
  if (!lexed.ok) {
    return { errors: [lexed.error] };
  }
  const tokens = lexed.tokens;

  if (options.emitTokens) {
    return { tokens, errors: [] };
  }

  // 2. Transpile
  options.onStage?.("transpile");
  const transpiled = new Transpiler({ vocabulary: options.vocabulary }).transpile(tokens);
  if (!transpiled.ok) {
    return { tokens, errors: [transpiled.error] };
  }

  return { tokens, output: transpiled.output, errors: [] };
}

export { Lexer, lex, type LexResult } from "./lexer/lexer.js";
export { Transpiler, transpile, type TranspileResult } from "./transpiler/transpiler.js";
export { KEYWORDS, PRINT_TARGET, type Vocabulary } from "./lexer/keywords.js";
export { TokenKind, type Token } from "./lexer/tokens.js";
export type { Diagnostic, ErrorKind } from "./errors/diagnostic.js";
