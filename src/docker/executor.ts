/**
 * Docker command execution with consistent error handling.
 *
 * Core execution layer - every engine call flows through safeDockerRun
 * (captured output) or runDockerInteractive (inherited stdio).
 */

import { DEFAULT_ENGINE, DOCKER_COMMAND_TIMEOUT } from "../constants.js";
import { DEFAULT_MAX_BUFFER, exec, execInherit, MAX_BUFFER_EXCEEDED, type ExecResult } from "../exec.js";
import { DockerCommandError, DockerError, DockerNotFoundError, DockerTimeoutError } from "../errors.js";
import { log } from "../logger.js";
import { getDockerEnv } from "../paths.js";

/** Result of a captured Docker command. */
export interface DockerResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface DockerRunOptions {
  /** Engine binary (default: docker). */
  engine?: string;
  /** Milliseconds before a captured query is killed. Interactive runs never time out. */
  timeout?: number;
  /** Throw DockerCommandError on non-zero exit. */
  check?: boolean;
}

function describe(engine: string, args: string[]): string {
  return `${engine} ${args.slice(0, 3).join(" ")}${args.length > 3 ? " ..." : ""}`;
}

function assertSpawned(result: ExecResult, engine: string): void {
  if (result.errorCode === "ENOENT") {
    throw new DockerNotFoundError(
      `Failed to execute ${engine} command. Is ${engine} installed and running?`
    );
  }
  if (result.errorCode !== undefined) {
    throw new DockerError(`Failed to execute ${engine} command (${result.errorCode}): ${result.stderr}`);
  }
}

/**
 * Run a Docker command capturing its output.
 *
 * @param args - Command arguments (without the engine binary).
 * @throws DockerNotFoundError if the engine binary is missing.
 * @throws DockerError on other spawn failures or output past the buffer limit.
 * @throws DockerTimeoutError if the command times out.
 * @throws DockerCommandError if `check` is set and the exit status is non-zero.
 */
export async function safeDockerRun(args: string[], options: DockerRunOptions = {}): Promise<DockerResult> {
  const engine = options.engine ?? DEFAULT_ENGINE;
  const timeout = options.timeout ?? DOCKER_COMMAND_TIMEOUT;

  log.debug(`$ ${engine} ${args.join(" ")}`);
  const result = await exec(engine, args, {
    timeout,
    env: getDockerEnv(),
  });

  if (result.errorCode === MAX_BUFFER_EXCEEDED) {
    throw new DockerError(
      `Docker output exceeded ${DEFAULT_MAX_BUFFER} bytes and was cut off. Command: ${describe(engine, args)}`
    );
  }
  assertSpawned(result, engine);

  if (result.timedOut) {
    throw new DockerTimeoutError(`Docker command timed out after ${timeout}ms. Command: ${describe(engine, args)}`);
  }

  if (options.check && result.exitCode !== 0) {
    throw new DockerCommandError(
      `Docker command failed: ${describe(engine, args)}`,
      result.exitCode,
      result.stderr
    );
  }

  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

/**
 * Run a Docker command attached to the calling terminal.
 *
 * Blocks for as long as the engine command runs (an editor session included).
 *
 * @returns The engine's exit status.
 * @throws DockerNotFoundError if the engine cannot be spawned.
 */
export async function runDockerInteractive(args: string[], options: Omit<DockerRunOptions, "timeout" | "check"> = {}): Promise<number> {
  const engine = options.engine ?? DEFAULT_ENGINE;

  log.debug(`$ ${engine} ${args.join(" ")}`);
  const result = await execInherit(engine, args, {
    env: getDockerEnv(),
  });

  assertSpawned(result, engine);
  return result.exitCode;
}
