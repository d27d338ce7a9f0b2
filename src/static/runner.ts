import { execFile } from "node:child_process";
import { ToolingError } from "../utils/errors.js";

export interface ProcessResult {
  /** Exit status; null when the process ended on a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
}

/**
 * Runs a command to completion. Resolves for any exit status; rejects only
 * with a ToolingError (binary missing, timed out, or could not run).
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  opts: RunOptions
) => Promise<ProcessResult>;

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export const runProcess: ProcessRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        timeout: opts.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const failure = classifyFailure(command, opts.timeoutMs, error);
        if (failure) {
          reject(failure);
          return;
        }
        resolve({ exitCode: exitCodeOf(error), stdout, stderr });
      }
    );
  });

function classifyFailure(
  command: string,
  timeoutMs: number,
  error: Error
): ToolingError | null {
  const code = "code" in error ? error.code : undefined;
  const killed = "killed" in error && error.killed === true;

  if (code === "ENOENT") {
    return new ToolingError(`${command}: command not found`, command, "not-found", {
      cause: error,
    });
  }
  if (killed) {
    return new ToolingError(
      `${command}: timed out after ${timeoutMs} ms`,
      command,
      "timeout",
      { cause: error }
    );
  }
  if (typeof code === "string") {
    // EACCES, output overflow and other spawn-level failures.
    return new ToolingError(`${command}: ${error.message}`, command, "crashed", {
      cause: error,
    });
  }
  return null;
}

function exitCodeOf(error: Error): number | null {
  const code = "code" in error ? error.code : undefined;
  return typeof code === "number" ? code : null;
}
