/**
 * Thin wrapper over node:child_process for safecrate.
 *
 * Two shapes: captured output for engine queries, inherited stdio for
 * interactive sessions (editor, shell, build output).
 */

import { execFile, spawn } from "node:child_process";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /**
   * Spawn error code, e.g. "ENOENT" when the binary is missing, or
   * MAX_BUFFER_EXCEEDED when captured output was cut off.
   */
  errorCode?: string;
}

/** errorCode set when captured output outgrew `maxBuffer` and the child was killed. */
export const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

export const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

export interface ExecOptions {
  timeout?: number;
  env?: NodeJS.ProcessEnv;
  /** Captured bytes per stream before the child is killed (exec only). */
  maxBuffer?: number;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Execute a command and capture output. Never rejects (reject:false semantics).
 */
export function exec(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve) => {
    const child = execFile(cmd, args, {
      timeout: opts.timeout ?? 0,
      env: opts.env,
      encoding: "utf8",
      maxBuffer: opts.maxBuffer ?? DEFAULT_MAX_BUFFER,
    }, (error, stdout, stderr) => {
      const code = errnoCode(error);
      if (code !== undefined) {
        resolve({ exitCode: 1, stdout, stderr, timedOut: false, errorCode: code });
        return;
      }

      const timedOut = error !== null && error.killed === true && child.exitCode === null;
      resolve({
        exitCode: child.exitCode ?? (error ? 1 : 0),
        stdout,
        stderr,
        timedOut,
      });
    });
  });
}

/**
 * Execute with stdio:inherit. Resolves with the exit code once the child closes.
 */
export function execInherit(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      stdio: "inherit",
      env: opts.env,
      timeout: opts.timeout ?? 0,
    });

    child.on("error", (error) => {
      resolve({ exitCode: 1, stdout: "", stderr: error.message, timedOut: false, errorCode: errnoCode(error) });
    });
    child.on("close", (code, signal) => {
      // Killed by signal: report the shell-style 128+n status.
      const exitCode = code ?? (signal === "SIGINT" ? 130 : signal === "SIGTERM" ? 143 : 1);
      resolve({ exitCode, stdout: "", stderr: "", timedOut: false });
    });
  });
}
