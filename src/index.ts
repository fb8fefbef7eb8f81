#!/usr/bin/env node
import { Command } from "commander";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { checkSource } from "./compiler.js";
import { loadProjectConfig } from "./config.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { BUILTIN_GENERICS, BUILTIN_TYPES } from "./registry/builtins-registry.js";
import { substitutionToRecord } from "./checker/substitution.js";
import { typeToString } from "./checker/types.js";

async function resolveDefaultFile(file: string | undefined, entry: string | undefined): Promise<string> {
  if (file) return file;
  if (entry) return entry;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".tv"));
  if (found.length === 0) {
    throw new Error("No .tv file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .tv files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

interface CheckCommandOptions {
  emitTokens?: boolean;
  emitAst?: boolean;
  json?: boolean;
  warningsAsErrors?: boolean;
}

const program = new Command()
  .name("tvc")
  .description("Checker for variadic generic definitions and their instantiations")
  .version("0.1.0");

program
  .command("check [file]")
  .description("Check a .tv file (defaults to the tuplevar.json entry, or the single .tv file in the current directory)")
  .option("--emit-tokens", "Print the token stream")
  .option("--emit-ast", "Print the AST as JSON")
  .option("--json", "Print instantiation reports and diagnostics as JSON")
  .option("--warnings-as-errors", "Fail on warnings")
  .action(async (file: string | undefined, opts: CheckCommandOptions) => {
    try {
      const config = await loadProjectConfig(process.cwd());
      file = await resolveDefaultFile(file, config.entry);
      const source = await readFile(file, "utf-8");
      const result = checkSource(source, file, {
        emitTokens: !!opts.emitTokens,
        emitAst: !!opts.emitAst,
        warningsAsErrors: !!opts.warningsAsErrors || !!config.warningsAsErrors,
      });

      if (opts.json) {
        console.log(JSON.stringify({
          file,
          ok: result.errors.length === 0,
          instantiations: result.reports.map(r => ({
            target: r.target,
            definition: r.definition ?? null,
            substitution: substitutionToRecord(r.substitution),
            result: typeToString(r.result),
            line: r.span.start.line,
          })),
          diagnostics: [...result.errors, ...result.warnings].map(d => ({
            severity: d.severity,
            code: d.code,
            message: d.message,
            line: d.span.start.line,
            column: d.span.start.column,
            hint: d.help ?? null,
          })),
        }, null, 2));
        if (result.errors.length > 0) process.exit(1);
        return;
      }

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(source, [...result.errors, ...result.warnings]));
        process.exit(1);
      }
      if (result.warnings.length > 0) {
        console.error(formatDiagnostics(source, result.warnings));
      }

      if (opts.emitTokens && result.tokens) {
        for (const tok of result.tokens) {
          console.log(`${tok.kind}\t${JSON.stringify(tok.value)}\t${tok.span.start.line}:${tok.span.start.column}`);
        }
        return;
      }

      if (opts.emitAst && result.ast) {
        console.log(JSON.stringify(result.ast, null, 2));
        return;
      }

      for (const report of result.reports) {
        console.log(`${report.target} -> ${typeToString(report.result)}`);
      }
      console.log(`Checked ${file}: ${result.reports.length} instantiation(s), ${result.warnings.length} warning(s)`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("introspect")
  .description("Print the built-in types and generics as JSON")
  .option("--types", "Only built-in concrete types")
  .option("--generics", "Only built-in generics")
  .action((opts: { types?: boolean; generics?: boolean }) => {
    try {
      const all = !opts.types && !opts.generics;
      const output: Record<string, unknown> = {};
      if (all || opts.types) output.types = BUILTIN_TYPES;
      if (all || opts.generics) output.generics = BUILTIN_GENERICS;
      console.log(JSON.stringify(output, null, 2));
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
