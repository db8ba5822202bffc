import type { Span } from "../errors/diagnostic.js";

export enum TokenKind {
  // Content
  Keyword = "Keyword",
  Identifier = "Identifier",
  String = "String",
  Number = "Number",
  Operator = "Operator",
  Punctuation = "Punctuation",

  // Structure
  Newline = "Newline",
  Indent = "Indent",
  Dedent = "Dedent",
}

export interface Token {
  readonly kind: TokenKind;
  // Empty for Newline, Indent and Dedent
  readonly value: string;
  readonly span: Span;
}

/** Columns one level of nesting adds or removes. */
export const BLOCK_UNIT = 4;

/** Column stop a leading tab advances to. */
export const TAB_WIDTH = 4;
