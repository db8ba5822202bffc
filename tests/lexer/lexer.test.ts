import { describe, it, expect } from "vitest";
import { lex } from "../../src/lexer/lexer.js";
import { TokenKind, type Token } from "../../src/lexer/tokens.js";
import type { Diagnostic } from "../../src/errors/diagnostic.js";

describe("Lexer", () => {
  function tokens(source: string): Token[] {
    const result = lex(source, "test.amha");
    if (!result.ok) throw new Error(`unexpected error: ${result.error.message}`);
    return result.tokens;
  }

  function tokenKinds(source: string): TokenKind[] {
    return tokens(source).map((t) => t.kind);
  }

  function tokenPairs(source: string): [TokenKind, string][] {
    return tokens(source).map((t) => [t.kind, t.value]);
  }

  function lexFailure(source: string): Diagnostic {
    const result = lex(source, "test.amha");
    if (result.ok) throw new Error("expected lexing to fail");
    return result.error;
  }

  it("tokenizes empty input", () => {
    expect(tokenKinds("")).toEqual([]);
  });

  it("tokenizes an assignment", () => {
    expect(tokenPairs("x = 1")).toEqual([
      [TokenKind.Identifier, "x"],
      [TokenKind.Punctuation, "="],
      [TokenKind.Number, "1"],
      [TokenKind.Newline, ""],
    ]);
  });

  it("classifies vocabulary words as keywords", () => {
    expect(tokenPairs("አሳይ እውነት ያለበለዚያ_ከሆነ")).toEqual([
      [TokenKind.Keyword, "አሳይ"],
      [TokenKind.Keyword, "እውነት"],
      [TokenKind.Keyword, "ያለበለዚያ_ከሆነ"],
      [TokenKind.Newline, ""],
    ]);
  });

  it("distinguishes keywords from longer identifiers", () => {
    expect(tokenPairs("ከሆነው አሳይ_ስም")).toEqual([
      [TokenKind.Identifier, "ከሆነው"],
      [TokenKind.Identifier, "አሳይ_ስም"],
      [TokenKind.Newline, ""],
    ]);
  });

  it("accepts identifiers mixing both alphabets", () => {
    expect(tokenPairs("ስምname2 _ቁ")).toEqual([
      [TokenKind.Identifier, "ስምname2"],
      [TokenKind.Identifier, "_ቁ"],
      [TokenKind.Newline, ""],
    ]);
  });

  it("tokenizes operators, longest first", () => {
    const ops = tokens(">= <= == != > < + - * / %").filter((t) => t.kind === TokenKind.Operator);
    expect(ops.map((t) => t.value)).toEqual([">=", "<=", "==", "!=", ">", "<", "+", "-", "*", "/", "%"]);
  });

  it("tells == from = without spaces", () => {
    expect(tokenPairs("a==b")).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Operator, "=="],
      [TokenKind.Identifier, "b"],
      [TokenKind.Newline, ""],
    ]);
    expect(tokenPairs("a=b")[1]).toEqual([TokenKind.Punctuation, "="]);
  });

  it("tokenizes punctuation", () => {
    const punct = tokens(": ( ) , = . [ ]").filter((t) => t.kind === TokenKind.Punctuation);
    expect(punct.map((t) => t.value)).toEqual([":", "(", ")", ",", "=", ".", "[", "]"]);
  });

  it("tokenizes integer and decimal numbers", () => {
    expect(tokenPairs("42 3.14 7.")).toEqual([
      [TokenKind.Number, "42"],
      [TokenKind.Number, "3.14"],
      [TokenKind.Number, "7"],
      [TokenKind.Punctuation, "."],
      [TokenKind.Newline, ""],
    ]);
  });

  it("keeps string lexemes verbatim, quotes and escapes included", () => {
    expect(tokenPairs(String.raw`"ሰላም ዓለም" 'it\'s' "say \"hi\""`)).toEqual([
      [TokenKind.String, `"ሰላም ዓለም"`],
      [TokenKind.String, String.raw`'it\'s'`],
      [TokenKind.String, String.raw`"say \"hi\""`],
      [TokenKind.Newline, ""],
    ]);
  });

  it("strips trailing comments but not # inside strings", () => {
    expect(tokenKinds("x = 1 # note")).toEqual([
      TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Number, TokenKind.Newline,
    ]);
    expect(tokenPairs(`s = "a # b" # tail`)).toEqual([
      [TokenKind.Identifier, "s"],
      [TokenKind.Punctuation, "="],
      [TokenKind.String, `"a # b"`],
      [TokenKind.Newline, ""],
    ]);
  });

  it("skips blank and comment-only lines entirely", () => {
    const toks = tokens("# top\n\n   \n    # indented comment\nx = 1");
    expect(toks.map((t) => t.kind)).toEqual([
      TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Number, TokenKind.Newline,
    ]);
    expect(toks[0].span.start.line).toBe(5);
  });

  it("emits Indent and Dedent around a block", () => {
    expect(tokenKinds("ከሆነ x:\n    y = 1\nz = 2")).toEqual([
      TokenKind.Keyword, TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Newline,
      TokenKind.Indent, TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Number, TokenKind.Newline,
      TokenKind.Dedent, TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Number, TokenKind.Newline,
    ]);
  });

  it("closes every open block at end of input", () => {
    const kinds = tokenKinds("ከሆነ x:\n    ከሆነ y:\n        z = 1");
    expect(kinds.slice(-3)).toEqual([TokenKind.Newline, TokenKind.Dedent, TokenKind.Dedent]);
    expect(kinds.filter((k) => k === TokenKind.Indent)).toHaveLength(2);
    expect(kinds.filter((k) => k === TokenKind.Dedent)).toHaveLength(2);
  });

  it("emits one Dedent per closed level", () => {
    expect(tokenKinds("a:\n    b:\n        c\nd")).toEqual([
      TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Newline,
      TokenKind.Indent, TokenKind.Identifier, TokenKind.Punctuation, TokenKind.Newline,
      TokenKind.Indent, TokenKind.Identifier, TokenKind.Newline,
      TokenKind.Dedent, TokenKind.Dedent, TokenKind.Identifier, TokenKind.Newline,
    ]);
  });

  it("opens and closes exactly one level for a single block", () => {
    const kinds = tokenKinds("ከሆነ x:\n    y = 1\nz = 2");
    expect(kinds.filter((k) => k === TokenKind.Indent)).toHaveLength(1);
    expect(kinds.filter((k) => k === TokenKind.Dedent)).toHaveLength(1);
    expect(kinds.indexOf(TokenKind.Indent)).toBeLessThan(kinds.indexOf(TokenKind.Dedent));
  });

  it("yields the same tokens for tab and space indentation", () => {
    const spaces = "ከሆነ x:\n    ከሆነ y:\n        z = 1\nw = 2";
    const tabs = "ከሆነ x:\n\tከሆነ y:\n\t\tz = 1\nw = 2";
    const mixed = "ከሆነ x:\n  \tከሆነ y:\n    \tz = 1\nw = 2";
    expect(tokenPairs(tabs)).toEqual(tokenPairs(spaces));
    expect(tokenPairs(mixed)).toEqual(tokenPairs(spaces));
  });

  it("accepts CRLF line endings", () => {
    expect(tokenKinds("x = 1\r\ny = 2\r\n").filter((k) => k === TokenKind.Newline)).toHaveLength(2);
  });

  it("tracks line and column numbers", () => {
    const toks = tokens("ከሆነ x:\n    ስም = 2");
    const name = toks.find((t) => t.value === "ስም");
    expect(name?.span.start).toEqual({ line: 2, column: 5 });
    expect(name?.span.end).toEqual({ line: 2, column: 7 });
    expect(name?.span.source).toBe("test.amha");
  });

  it("uses a caller-supplied vocabulary", () => {
    const vocabulary = new Map([["ማሳያ", "print"]]);
    const result = lex("ማሳያ አሳይ", "test.amha", { vocabulary });
    expect(result.ok && result.tokens.map((t) => t.kind)).toEqual([
      TokenKind.Keyword, TokenKind.Identifier, TokenKind.Newline,
    ]);
  });

  describe("errors", () => {
    it("rejects indentation that is not a multiple of four", () => {
      const error = lexFailure("x = 1\n  y = 2");
      expect(error.kind).toBe("IndentationError");
      expect(error.message).toBe("Indentation must be a multiple of 4 spaces");
      expect(error.span.start.line).toBe(2);
    });

    it("rejects an indent of two levels at once", () => {
      const error = lexFailure("ከሆነ x:\n        y = 1");
      expect(error.kind).toBe("IndentationError");
      expect(error.message).toBe("Indentation increased by more than one level (4 spaces)");
      expect(error.span.start.line).toBe(2);
    });

    it("rejects a dedent to a column no block starts at", () => {
      const error = lexFailure("ከሆነ x:\n    y = 1\n  z = 2");
      expect(error.kind).toBe("IndentationError");
      expect(error.span.start.line).toBe(3);
    });

    it("rejects unknown characters with their line and column", () => {
      const error = lexFailure("x = 1\ny = x @ 2");
      expect(error.kind).toBe("LexError");
      expect(error.message).toBe("Unexpected characters or sequence '@'");
      expect(error.span.start).toEqual({ line: 2, column: 7 });
    });

    it("reports the whole unrecognized run", () => {
      const error = lexFailure("$$abc = 1");
      expect(error.message).toBe("Unexpected characters or sequence '$$'");
      expect(error.span.end.column).toBe(3);
    });

    it("rejects a string that does not close on its line", () => {
      const error = lexFailure('x = "abc\ny = 2');
      expect(error.kind).toBe("LexError");
      expect(error.message).toBe("Unterminated string literal");
      expect(error.span.start).toEqual({ line: 1, column: 5 });
    });
  });
});
