/**
 * Docker inspection and listing operations.
 *
 * Read-only queries against the engine for containers and images.
 */

import { listContainersArgs, inspectImageArgs } from "./command-builder.js";
import { safeDockerRun, type DockerRunOptions } from "./executor.js";

type QueryOptions = Pick<DockerRunOptions, "engine">;

/** Split engine list output into trimmed, non-empty lines. */
export function parseNameList(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * List names of containers (running or stopped) matching a name filter.
 *
 * The engine's name filter is a substring match.
 *
 * @throws DockerCommandError if the engine reports a non-zero status.
 */
export async function listContainerNames(nameFilter: string, options: QueryOptions = {}): Promise<string[]> {
  const result = await safeDockerRun(listContainersArgs(nameFilter), { ...options, check: true });
  return parseNameList(result.stdout);
}

/**
 * Check whether a container with exactly this name exists.
 */
export async function containerExists(containerName: string, options: QueryOptions = {}): Promise<boolean> {
  const names = await listContainerNames(containerName, options);
  return names.includes(containerName);
}

/**
 * Check whether an image is present locally.
 */
export async function imageExists(imageName: string, options: QueryOptions = {}): Promise<boolean> {
  const result = await safeDockerRun(inspectImageArgs(imageName), options);
  return result.exitCode === 0;
}
