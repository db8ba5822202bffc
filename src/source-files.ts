import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import type { Token } from "./lexer/tokens.js";

export const SOURCE_EXTENSION = ".amha";

const BYTE_ORDER_MARK = "\uFEFF";

/** Pick the single .amha file in `dir` when no file was named. */
export async function resolveDefaultFile(file: string | undefined, dir: string = process.cwd()): Promise<string> {
  if (file) return file;
  const entries = await readdir(dir);
  const found = entries.filter(f => f.endsWith(SOURCE_EXTENSION));
  if (found.length === 0) {
    throw new Error(`No ${SOURCE_EXTENSION} file found in the current directory. Pass a file path explicitly.`);
  }
  if (found.length > 1) {
    throw new Error(`Multiple ${SOURCE_EXTENSION} files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(dir, found[0]);
}

export function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

export async function readSource(file: string): Promise<string> {
  return stripByteOrderMark(await readFile(file, "utf-8"));
}

/** One `--emit-tokens` line: kind, quoted value, line:column. */
export function formatToken(tok: Token): string {
  return `${tok.kind}\t${JSON.stringify(tok.value)}\t${tok.span.start.line}:${tok.span.start.column}`;
}
