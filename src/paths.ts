/**
 * Host path utilities for Docker mounts and build inputs.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It may be imported by: naming.ts, commands/*
 */

import { existsSync, realpathSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { platform } from "node:process";

import { PathError } from "./errors.js";

/**
 * Resolve a directory to its canonical absolute form.
 *
 * Symlinks, `.` and `..` are resolved so every spelling of the same
 * directory yields the same string.
 *
 * @throws PathError if the path does not exist or is not a directory.
 */
export function canonicalizeDirectory(path: string): string {
  const absolute = resolve(path);

  if (!existsSync(absolute)) {
    throw new PathError(`Directory does not exist: ${absolute}`);
  }

  let canonical: string;
  try {
    canonical = realpathSync(absolute);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PathError(`Cannot resolve directory ${absolute}: ${reason}`);
  }

  if (!statSync(canonical).isDirectory()) {
    throw new PathError(`Path must be a directory: ${canonical}`);
  }

  return canonical;
}

/**
 * Validate a file path (custom Dockerfile) and return it absolute.
 *
 * @throws PathError if the file does not exist or is a directory.
 */
export function validateFilePath(path: string): string {
  const filePath = resolve(path);

  if (!existsSync(filePath)) {
    throw new PathError(`File does not exist: ${filePath}`);
  }
  if (!statSync(filePath).isFile()) {
    throw new PathError(`Path must be a file: ${filePath}`);
  }

  return filePath;
}

/**
 * Environment for Docker subprocesses.
 *
 * On Windows (Git Bash/MSYS), path conversion is disabled so volume
 * specs reach Docker untouched.
 */
export function getDockerEnv(): NodeJS.ProcessEnv {
  const envCopy = { ...process.env };

  if (platform === "win32") {
    envCopy.MSYS_NO_PATHCONV = "1";
    envCopy.MSYS2_ARG_CONV_EXCL = "*";
  }

  return envCopy;
}
