/**
 * Container naming for safecrate.
 *
 * The container for a directory is always `<basename>_isolated`, derived from
 * the canonical path, so `open --keep-container`, `resume` and `remove`
 * address the same container from any spelling of the directory.
 */

import { basename } from "node:path";

import { CONTAINER_SUFFIX } from "./constants.js";
import { PathError } from "./errors.js";
import { canonicalizeDirectory } from "./paths.js";

/**
 * Build the container name for an already-canonical directory path.
 *
 * A basename that already ends in the suffix is not special-cased.
 *
 * @throws PathError if the path has no basename (filesystem root).
 */
export function containerNameFor(canonicalPath: string): string {
  const projectName = basename(canonicalPath);
  if (!projectName) {
    throw new PathError(`Invalid directory name: ${canonicalPath}`);
  }
  return `${projectName}_${CONTAINER_SUFFIX}`;
}

/** Canonical directory plus the container name derived from it. */
export interface ContainerTarget {
  hostDir: string;
  containerName: string;
}

/**
 * Canonicalize a user-supplied directory and derive its container name.
 *
 * @throws PathError if the directory is missing, not a directory, or unnamed.
 */
export function resolveContainerTarget(dir: string): ContainerTarget {
  const hostDir = canonicalizeDirectory(dir);
  return { hostDir, containerName: containerNameFor(hostDir) };
}

export function getContainerName(dir: string): string {
  return resolveContainerTarget(dir).containerName;
}
