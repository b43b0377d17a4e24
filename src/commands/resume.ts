/**
 * Resume command: re-attach to a kept container.
 */

import type { SafecrateConfig } from "../config.js";
import { containerExists, runDockerInteractive, startAttachArgs } from "../docker/index.js";
import { ContainerError, ContainerNotFoundError } from "../errors.js";
import { log } from "../logger.js";
import { getContainerName } from "../naming.js";

export const ERR_NOTHING_TO_RESUME =
  "No existing container to resume. Run `safecrate open` first with --keep-container.";

/**
 * Start and attach to the container `open --keep-container` left for `dir`.
 *
 * @throws ContainerNotFoundError if no container with that exact name exists.
 * @throws ContainerError if `start -ai` exits non-zero.
 */
export async function resume(dir: string, config: SafecrateConfig): Promise<void> {
  const containerName = getContainerName(dir);

  if (!(await containerExists(containerName, { engine: config.engine }))) {
    throw new ContainerNotFoundError(ERR_NOTHING_TO_RESUME);
  }

  log.dim(`Resuming ${containerName}...`);
  const exitCode = await runDockerInteractive(startAttachArgs(containerName), { engine: config.engine });

  if (exitCode !== 0) {
    throw new ContainerError("Failed to resume container. Docker command exited with non-zero status.", exitCode);
  }
}
