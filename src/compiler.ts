import { readFileSync } from "node:fs";
import { Lexer } from "./lexer/lexer.js";
import { Parser } from "./parser/parser.js";
import { Checker, type InstantiationReport } from "./checker/checker.js";
import type { Token } from "./lexer/tokens.js";
import type { ModuleDecl } from "./ast/nodes.js";
import type { Diagnostic } from "./errors/diagnostic.js";
import { error, fileSpan } from "./errors/diagnostic.js";

export interface CheckOptions {
  emitAst?: boolean;
  emitTokens?: boolean;
  /** Report warnings as errors. */
  warningsAsErrors?: boolean;
}

export interface CheckResult {
  tokens?: Token[];
  ast?: ModuleDecl;
  /** Fatal diagnostics only (severity: "error"). Non-empty means the check failed. */
  errors: Diagnostic[];
  /** Non-fatal diagnostics (severity: "warning" | "info"). */
  warnings: Diagnostic[];
  /** One entry per `check` declaration that bound successfully, in source order. */
  reports: InstantiationReport[];
}

/**
 * Check a single source string. Used by tests and by `checkFile`.
 */
export function checkSource(
  source: string,
  filename: string,
  options: CheckOptions = {},
): CheckResult {
  // 1. Lex
  const lexer = new Lexer(source, filename);
  const tokens = lexer.tokenize();

  if (options.emitTokens) {
    return { tokens, errors: [], warnings: [], reports: [] };
  }

  // 2. Parse
  const parser = new Parser(tokens, filename);
  const { module: ast, errors: parseErrors } = parser.parse();

  if (parseErrors.length > 0) {
    return { tokens, ast, errors: parseErrors, warnings: [], reports: [] };
  }

  if (options.emitAst) {
    return { tokens, ast, errors: [], warnings: [], reports: [] };
  }

  // 3. Check
  const checker = new Checker();
  const allDiags = checker.check(ast);
  const promoted = options.warningsAsErrors
    ? allDiags.map(d => (d.severity === "warning" ? { ...d, severity: "error" as const } : d))
    : allDiags;

  return {
    tokens,
    ast,
    errors: promoted.filter(d => d.severity === "error"),
    warnings: promoted.filter(d => d.severity !== "error"),
    reports: checker.getReports(),
  };
}

/**
 * Check a file from disk. A file that cannot be read gives a single error
 * diagnostic instead of throwing.
 */
export function checkFile(
  filePath: string,
  options: CheckOptions = {},
): CheckResult {
  let source: string;
  try {
    source = readFileSync(filePath, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return {
      errors: [error("FileError", `Cannot read '${filePath}': ${msg}`, fileSpan(filePath))],
      warnings: [],
      reports: [],
    };
  }
  return checkSource(source, filePath, options);
}
