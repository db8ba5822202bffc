import { TokenKind, BLOCK_UNIT, TAB_WIDTH, type Token } from "./tokens.js";
import { KEYWORDS, type Vocabulary } from "./keywords.js";
import {
  indentationError,
  lexError,
  makeSpan,
  type Diagnostic,
} from "../errors/diagnostic.js";

export interface LexerOptions {
  vocabulary?: Vocabulary;
}

export type LexResult =
  | { ok: true; tokens: Token[] }
  | { ok: false; error: Diagnostic };

interface Matcher {
  kind: TokenKind.String | TokenKind.Operator | TokenKind.Punctuation | TokenKind.Number | TokenKind.Identifier;
  /** End offset of the lexeme starting at `pos`, or -1. */
  match(text: string, pos: number): number;
}

// Two-character operators must come before their one-character prefixes
const OPERATORS = [">=", "<=", "==", "!=", ">", "<", "+", "-", "*", "/", "%"];
const PUNCTUATION = [":", "(", ")", ",", "=", ".", "[", "]"];

function literalMatcher(kind: Matcher["kind"], symbols: string[]): Matcher {
  return {
    kind,
    match(text, pos) {
      for (const symbol of symbols) {
        if (text.startsWith(symbol, pos)) return pos + symbol.length;
      }
      return -1;
    },
  };
}

const MATCHERS: readonly Matcher[] = [
  {
    kind: TokenKind.String,
    match(text, pos) {
      const quote = text[pos];
      if (quote !== '"' && quote !== "'") return -1;
      let i = pos + 1;
      while (i < text.length) {
        const ch = text[i];
        if (ch === "\\") {
          i += 2;
        } else if (ch === quote) {
          return i + 1;
        } else {
          i++;
        }
      }
      return -1;
    },
  },
  literalMatcher(TokenKind.Operator, OPERATORS),
  literalMatcher(TokenKind.Punctuation, PUNCTUATION),
  {
    kind: TokenKind.Number,
    match(text, pos) {
      if (!isDigit(text[pos])) return -1;
      let i = pos;
      while (i < text.length && isDigit(text[i])) i++;
      if (text[i] === "." && isDigit(text[i + 1])) {
        i++;
        while (i < text.length && isDigit(text[i])) i++;
      }
      return i;
    },
  },
  {
    kind: TokenKind.Identifier,
    match(text, pos) {
      if (!isIdentStart(text[pos])) return -1;
      let i = pos + 1;
      while (i < text.length && (isIdentStart(text[i]) || isDigit(text[i]))) i++;
      return i;
    },
  },
];

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isEthiopic(ch: string): boolean {
  return ch >= "\u1200" && ch <= "\u137F";
}

// Ethiopic and Latin letters may be mixed within one identifier
function isIdentStart(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_" || isEthiopic(ch);
}

function isInlineSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

/** Index of the first `#` outside a string literal, or -1. */
function findCommentStart(text: string): number {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#") {
      return i;
    }
  }
  return -1;
}

export class Lexer {
  private source: string;
  private filename: string;
  private vocabulary: Vocabulary;
  private tokens: Token[] = [];
  private indentStack: number[] = [0];

  constructor(source: string, filename: string = "<stdin>", options: LexerOptions = {}) {
    this.source = source;
    this.filename = filename;
    this.vocabulary = options.vocabulary ?? KEYWORDS;
  }

  tokenize(): LexResult {
    this.tokens = [];
    this.indentStack = [0];

    const lines = this.source.split(/\r\n|\r|\n/);
    for (let i = 0; i < lines.length; i++) {
      const error = this.lexLine(lines[i], i + 1);
      if (error) return { ok: false, error };
    }

    // Close every block still open at end of input
    const lastLine = lines.length;
    while (this.indentStack.length > 1) {
      this.indentStack.pop();
      this.push(TokenKind.Dedent, "", lastLine, 1, 1);
    }
    if (this.indentStack.length !== 1 || this.indentStack[0] !== 0) {
      throw new Error(`Indentation stack not reset at end of input: [${this.indentStack.join(", ")}]`);
    }

    return { ok: true, tokens: this.tokens };
  }

  private lexLine(line: string, lineNo: number): Diagnostic | null {
    let indentChars = 0;
    let width = 0;
    while (indentChars < line.length && isInlineSpace(line[indentChars])) {
      width = line[indentChars] === "\t" ? width + TAB_WIDTH - (width % TAB_WIDTH) : width + 1;
      indentChars++;
    }

    const rest = line.slice(indentChars);
    if (rest.trim() === "" || rest.startsWith("#")) return null;

    const error = this.resolveIndentation(width, lineNo, indentChars);
    if (error) return error;

    const commentStart = findCommentStart(rest);
    const content = commentStart === -1 ? rest : rest.slice(0, commentStart);

    const scanError = this.scan(content, lineNo, indentChars);
    if (scanError) return scanError;

    const endCol = indentChars + content.length + 1;
    this.push(TokenKind.Newline, "", lineNo, endCol, endCol);
    return null;
  }

  private resolveIndentation(width: number, lineNo: number, indentChars: number): Diagnostic | null {
    const span = makeSpan(this.filename, lineNo, 1, Math.max(2, indentChars + 1));

    if (width % BLOCK_UNIT !== 0) {
      return indentationError(
        `Indentation must be a multiple of ${BLOCK_UNIT} spaces`,
        span,
        `Indent each block by exactly ${BLOCK_UNIT} spaces or one tab`,
      );
    }

    const top = this.currentLevel();
    if (width > top) {
      if (width !== top + BLOCK_UNIT) {
        return indentationError(
          `Indentation increased by more than one level (${BLOCK_UNIT} spaces)`,
          span,
        );
      }
      this.indentStack.push(width);
      this.push(TokenKind.Indent, "", lineNo, 1, indentChars + 1);
    } else if (width < top) {
      while (width < this.currentLevel()) {
        this.indentStack.pop();
        this.push(TokenKind.Dedent, "", lineNo, 1, indentChars + 1);
      }
      if (width !== this.currentLevel()) {
        return indentationError(
          `Indentation decreased to an inconsistent level`,
          span,
          `Dedent to a column where an enclosing block starts`,
        );
      }
    }
    return null;
  }

  private scan(content: string, lineNo: number, offset: number): Diagnostic | null {
    let pos = 0;
    while (pos < content.length) {
      if (isInlineSpace(content[pos])) {
        pos++;
        continue;
      }

      const found = this.matchAt(content, pos);
      if (found) {
        const value = content.slice(pos, found.end);
        const kind =
          found.kind === TokenKind.Identifier && this.vocabulary.has(value)
            ? TokenKind.Keyword
            : found.kind;
        this.push(kind, value, lineNo, offset + pos + 1, offset + found.end + 1);
        pos = found.end;
        continue;
      }

      // Gather the unrecognized run up to the next whitespace or token
      let end = pos + 1;
      while (end < content.length && !isInlineSpace(content[end]) && !this.matchAt(content, end)) {
        end++;
      }
      const span = makeSpan(this.filename, lineNo, offset + pos + 1, offset + end + 1);
      const first = content[pos];
      if (first === '"' || first === "'") {
        return lexError(
          `Unterminated string literal`,
          span,
          "String literals must close on the line they open on",
        );
      }
      return lexError(
        `Unexpected characters or sequence '${content.slice(pos, end)}'`,
        span,
      );
    }
    return null;
  }

  private matchAt(text: string, pos: number): { kind: Matcher["kind"]; end: number } | null {
    for (const matcher of MATCHERS) {
      const end = matcher.match(text, pos);
      if (end > pos) return { kind: matcher.kind, end };
    }
    return null;
  }

  private currentLevel(): number {
    return this.indentStack[this.indentStack.length - 1] ?? 0;
  }

  private push(kind: TokenKind, value: string, line: number, startCol: number, endCol: number): void {
    this.tokens.push({ kind, value, span: makeSpan(this.filename, line, startCol, endCol) });
  }
}

export function lex(source: string, filename?: string, options?: LexerOptions): LexResult {
  return new Lexer(source, filename, options).tokenize();
}
