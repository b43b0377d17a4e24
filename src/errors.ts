/**
 * Unified exception hierarchy for safecrate.
 *
 * All custom exceptions inherit from SafecrateError for consistent error handling.
 * CLI catches these and converts to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other safecrate modules.
 */

/**
 * Base exception for all safecrate errors.
 */
export class SafecrateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SafecrateError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Invalid value in ~/.safecrate/config.yaml
 *   - Unusable engine name from SAFECRATE_ENGINE
 */
export class ConfigError extends SafecrateError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Path validation and access errors.
 *
 * Examples:
 *   - Directory does not exist
 *   - Path is a file where a directory is expected
 *   - Path has no basename (filesystem root)
 */
export class PathError extends SafecrateError {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/** Input validation errors (empty command, malformed image name). */
export class ValidationError extends SafecrateError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions. `exitCode` is set when the
 * engine itself reported a non-zero status.
 */
export class DockerError extends SafecrateError {
  readonly exitCode: number | undefined;

  constructor(message: string, exitCode?: number) {
    super(message);
    this.name = "DockerError";
    this.exitCode = exitCode;
  }
}

/** Raised when the engine binary cannot be spawned. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Failed to execute docker command. Is docker installed and running?") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when a Docker query times out. */
export class DockerTimeoutError extends DockerError {
  constructor(message = "Docker operation timed out") {
    super(message);
    this.name = "DockerTimeoutError";
  }
}

/** Raised when a captured Docker query exits non-zero. */
export class DockerCommandError extends DockerError {
  readonly stderr: string;

  constructor(message: string, exitCode: number, stderr = "") {
    super(message, exitCode);
    this.name = "DockerCommandError";
    this.stderr = stderr;
  }
}

/** Raised when Docker image build fails. */
export class ImageBuildError extends DockerError {
  constructor(message: string, exitCode?: number) {
    super(message, exitCode);
    this.name = "ImageBuildError";
  }
}

/** Raised when the base image has not been built yet. */
export class ImageNotFoundError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "ImageNotFoundError";
  }
}

/** Raised when container operations fail. */
export class ContainerError extends DockerError {
  constructor(message: string, exitCode?: number) {
    super(message, exitCode);
    this.name = "ContainerError";
  }
}

/** Raised when resume finds no kept container for the directory. */
export class ContainerNotFoundError extends ContainerError {
  constructor(message: string) {
    super(message);
    this.name = "ContainerNotFoundError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Prefers captured engine stderr, then the error message.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if (error instanceof DockerCommandError && error.stderr.trim()) {
    return error.stderr.trim().slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
