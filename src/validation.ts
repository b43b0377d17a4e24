/**
 * Input validation utilities for safecrate.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, commands
 */

import { ValidationError } from "./errors.js";

/**
 * Docker image reference: optional registry/namespace path, lowercase name,
 * optional tag. Digests are not accepted.
 */
const IMAGE_NAME_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*(?::[A-Za-z0-9_][A-Za-z0-9_.-]{0,127})?$/;

/** Engine binary: a bare command name or a path, no whitespace. */
const ENGINE_NAME_PATTERN = /^[^\s]+$/;

/**
 * Validate the in-container command passed to `sh -c`.
 *
 * @throws ValidationError if the command is blank or contains NUL bytes.
 */
export function validateCommand(cmd: string): string {
  if (cmd.trim() === "") {
    throw new ValidationError("Command must not be empty. Pass --cmd \"<shell command>\".");
  }
  if (cmd.includes("\0")) {
    throw new ValidationError("Command must not contain NUL bytes.");
  }
  return cmd;
}

export function isValidImageName(name: string): boolean {
  return IMAGE_NAME_PATTERN.test(name);
}

/**
 * @throws ValidationError if the name is not a valid image reference.
 */
export function validateImageName(name: string): string {
  if (!isValidImageName(name)) {
    throw new ValidationError(
      `Invalid image name '${name}'. Use lowercase letters, digits and [._-], with an optional :tag.`
    );
  }
  return name;
}

/**
 * @throws ValidationError if the engine name is empty or contains whitespace.
 */
export function validateEngineName(engine: string): string {
  if (!ENGINE_NAME_PATTERN.test(engine)) {
    throw new ValidationError(`Invalid container engine '${engine}'. Expected a command such as docker or podman.`);
  }
  return engine;
}
