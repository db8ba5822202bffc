import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";

export const DEFAULT_PYTHON = "python3";

/** The parts of a child process the runner talks to. */
export interface InterpreterProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
}

export type SpawnInterpreter = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => InterpreterProcess;

export interface RunOptions {
  python?: string;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnInterpreter;
}

/**
 * Outcome of running generated code. A non-zero `exitCode` means the
 * translated program itself failed; `stderr` then holds its traceback.
 */
export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

const spawnWithPipes: SpawnInterpreter = (command, args, env) =>
  spawn(command, args, { stdio: ["pipe", "pipe", "pipe"], env });

export function resolvePythonCommand(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) return explicit;
  const fromEnv = env.AMHAPY_PYTHON?.trim();
  return fromEnv ? fromEnv : DEFAULT_PYTHON;
}

/**
 * Hand generated Python source to an interpreter on its stdin and capture
 * what it prints. Rejects only when the interpreter cannot be started.
 */
export function runPython(code: string, options: RunOptions = {}): Promise<RunResult> {
  const env = options.env ?? process.env;
  const command = resolvePythonCommand(options.python, env);
  const launch = options.spawn ?? spawnWithPipes;

  return new Promise<RunResult>((resolve, reject) => {
    const child = launch(command, ["-"], { ...env, PYTHONIOENCODING: "utf-8" });
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer | string) => { stdout += String(chunk); });
    child.stderr.on("data", (chunk: Buffer | string) => { stderr += String(chunk); });
    child.on("error", (err: Error) => {
      reject(new Error(`Could not start '${command}': ${err.message}`));
    });
    child.on("close", (exitCode: number | null) => {
      resolve({ stdout, stderr, exitCode });
    });
    child.stdin.on("error", (err: Error) => {
      reject(new Error(`Could not send program to '${command}': ${err.message}`));
    });
    child.stdin.end(code);
  });
}
