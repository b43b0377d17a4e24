/**
 * Remove command: delete the container kept for a directory.
 */

import type { SafecrateConfig } from "../config.js";
import { removeContainerArgs, runDockerInteractive } from "../docker/index.js";
import { ContainerError } from "../errors.js";
import { log } from "../logger.js";
import { getContainerName } from "../naming.js";

export interface RemoveOptions {
  /** Remove even if the container is running. */
  force?: boolean;
}

/**
 * @throws ContainerError if the engine refuses (e.g. running without --force).
 */
export async function remove(dir: string, options: RemoveOptions, config: SafecrateConfig): Promise<void> {
  const containerName = getContainerName(dir);

  const exitCode = await runDockerInteractive(
    removeContainerArgs(containerName, options.force ?? false),
    { engine: config.engine }
  );

  if (exitCode !== 0) {
    throw new ContainerError("Failed to remove container. Docker command exited with non-zero status.", exitCode);
  }

  log.success(`Removed container ${containerName}`);
}
