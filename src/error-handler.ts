/**
 * Error reporting for the safecrate CLI.
 *
 * Turns a failed handler into log output plus a process exit code.
 */

import { DockerCommandError, DockerError, extractErrorDetails, SafecrateError } from "./errors.js";
import { log } from "./logger.js";

/** Known engine/container exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "General error or command failure",
    severity: "error",
  },
  125: {
    code: 125,
    name: "ENGINE_ERROR",
    description: "The container engine itself failed",
    suggestion: "Check that the engine is running and the image exists (safecrate init)",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable inside the container",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found inside the container",
    suggestion: "Verify the --cmd program exists in the base image",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "KILLED",
    description: "Container was killed (OOM or manual stop)",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Container terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Exited with code ${code}`,
      severity: "warn",
    }
  );
}

/** Ctrl+C or SIGTERM: the user ended the session, not a failure to diagnose. */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const message = context ? `${info.description} (${context})` : info.description;
  switch (info.severity) {
    case "error":
      log.error(message);
      break;
    case "warn":
      log.warn(message);
      break;
    default:
      log.dim(message);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Log a handler failure and return the exit code the process should end with.
 *
 * Engine failures keep the engine's status; everything else exits 1.
 */
export function reportError(error: unknown): number {
  if (error instanceof DockerError && error.exitCode !== undefined && error.exitCode !== 0) {
    log.error(error.message);
    if (error instanceof DockerCommandError && error.stderr.trim()) {
      log.dim(`Error: ${extractErrorDetails(error, 200)}`);
    }
    if (error.exitCode !== 1) {
      logExitCode(error.exitCode, "docker");
    }
    return error.exitCode;
  }

  if (error instanceof SafecrateError) {
    log.error(error.message);
  } else {
    log.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
  return 1;
}
