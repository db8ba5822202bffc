#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { writeFile } from "node:fs/promises";
import { compile, type CompileResult } from "./compiler.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { KEYWORDS } from "./lexer/keywords.js";
import { runPython } from "./runner/runner.js";
import { SAMPLE_FILENAME, writeSample } from "./sample.js";
import { formatToken, readSource, resolveDefaultFile } from "./source-files.js";

function stageReporter(verbose: boolean): ((stage: "lex" | "transpile") => void) | undefined {
  if (!verbose) return undefined;
  return (stage) => {
    console.error(chalk.dim(stage === "lex" ? "Tokenizing..." : "Transpiling..."));
  };
}

async function compileSource(file: string, verbose: boolean, emitTokens = false): Promise<CompileResult> {
  const source = await readSource(file);
  const result = compile(source, file, { emitTokens, onStage: stageReporter(verbose) });
  if (result.errors.length > 0) {
    console.error(formatDiagnostics(source, result.errors));
    process.exit(1);
  }
  return result;
}

const program = new Command()
  .name("amhapyc")
  .description("AmhaPy transpiler: Amharic-keyword programs to Python 3")
  .version("0.3.0");

program
  .command("transpile [file]")
  .description("Transpile a .amha file to Python (defaults to the single .amha file in the current directory)")
  .option("-o, --output <file>", "Write the Python source to a file")
  .option("--emit-tokens", "Print the token stream")
  .option("-v, --verbose", "Report each stage on stderr")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const result = await compileSource(file, !!opts.verbose, !!opts.emitTokens);

      if (opts.emitTokens && result.tokens) {
        for (const tok of result.tokens) {
          console.log(formatToken(tok));
        }
        return;
      }

      const output = result.output ?? "";
      if (typeof opts.output === "string") {
        await writeFile(opts.output, `${output}\n`, "utf-8");
        console.log(`Transpiled ${file} -> ${opts.output}`);
        return;
      }
      console.log(output);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("run [file]")
  .description("Transpile a .amha file and run it with Python (defaults to the single .amha file in the current directory)")
  .option("--python <command>", "Python interpreter (default: AMHAPY_PYTHON env var or python3)")
  .option("-q, --quiet", "Print only the program output")
  .option("-v, --verbose", "Report each stage on stderr")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const result = await compileSource(file, !!opts.verbose);
      const code = result.output ?? "";

      if (!opts.quiet) {
        console.log(chalk.bold("--- Transpiled Python ---"));
        console.log(code);
        console.log(chalk.bold("--- Program output ---"));
      }

      const python = typeof opts.python === "string" ? opts.python : undefined;
      const run = await runPython(code, { python });
      if (run.stdout.length > 0) process.stdout.write(run.stdout);

      if (run.exitCode !== 0) {
        console.error(chalk.red.bold("Execution failed") + (run.exitCode === null ? "" : ` (exit code ${run.exitCode})`));
        if (run.stderr.trim().length > 0) console.error(run.stderr.trimEnd());
        process.exit(1);
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("sample [file]")
  .description(`Write a sample AmhaPy program (default: ${SAMPLE_FILENAME})`)
  .action(async (file: string | undefined) => {
    try {
      const target = file ?? SAMPLE_FILENAME;
      await writeSample(target);
      console.log(`Sample program written to ${target}`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("keywords")
  .description("List the AmhaPy keywords and their Python spelling")
  .option("--json", "Output as JSON")
  .action((opts: Record<string, unknown>) => {
    const entries = [...KEYWORDS.entries()];
    if (opts.json) {
      console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
      return;
    }
    const width = Math.max(...entries.map(([amharic]) => amharic.length));
    for (const [amharic, python] of entries) {
      console.log(`${amharic.padEnd(width)}  ${chalk.cyan(python)}`);
    }
  });

await program.parseAsync();
