import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const line = lines[diag.span.start.line - 1] ?? "";
  const lineNum = String(diag.span.start.line);
  const padding = " ".repeat(lineNum.length);

  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold(`error[${diag.code}]`)
      : diag.severity === "warning"
        ? chalk.yellow.bold(`warning[${diag.code}]`)
        : chalk.blue.bold(`info[${diag.code}]`);

  // Carets stop at the end of the first line of a multi-line span.
  const endColumn = diag.span.end.line === diag.span.start.line ? diag.span.end.column : line.length + 1;
  const width = Math.max(1, endColumn - diag.span.start.column);

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${diag.span.start.line}:${diag.span.start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(Math.max(0, diag.span.start.column - 1))}${chalk.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
