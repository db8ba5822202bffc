import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

// Left margin sized to the line number so every `|` lines up
function gutter(width: number, mark: string, text: string = ""): string {
  const margin = `${" ".repeat(width)} ${chalk.blue(mark)}`;
  return text ? `${margin} ${text}` : margin;
}

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const { start, end } = diag.span;
  const sourceLine = source.split(/\r\n|\r|\n/)[start.line - 1] ?? "";
  const lineNum = String(start.line);
  const width = lineNum.length;
  const caret = " ".repeat(start.column - 1) + chalk.red("^".repeat(Math.max(1, end.column - start.column)));

  const out = [
    `${chalk.red.bold(`error[${diag.kind}]`)}: ${chalk.bold(diag.message)}`,
    gutter(width, "-->", `${diag.span.source}:${start.line}:${start.column}`),
    gutter(width, "|"),
    `${chalk.blue(lineNum)} ${chalk.blue("|")} ${sourceLine}`,
    gutter(width, "|", caret),
  ];
  if (diag.help) {
    out.push(gutter(width, "=", `${chalk.green("help")}: ${diag.help}`));
  }
  return out.join("\n") + "\n";
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
