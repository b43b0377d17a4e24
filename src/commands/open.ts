/**
 * Open command: run a directory in a fresh container.
 */

import {
  DEFAULT_NETWORK_MODE,
  DISABLED_NETWORK_MODE,
  WORKSPACE_DIR,
} from "../constants.js";
import type { SafecrateConfig } from "../config.js";
import { DockerRunCommandBuilder, imageExists, runDockerInteractive } from "../docker/index.js";
import { ContainerError, ImageNotFoundError } from "../errors.js";
import { log } from "../logger.js";
import { resolveContainerTarget, type ContainerTarget } from "../naming.js";
import { validateCommand } from "../validation.js";

export interface OpenOptions {
  /** Shell command run in the container; config.defaultCmd when unset. */
  cmd?: string;
  /** Keep the container after exit so it can be resumed. */
  keepContainer?: boolean;
  /** False disables networking (`--no-network`). */
  network?: boolean;
}

/**
 * Build the `run` invocation for a target directory.
 *
 * Without networking the container gets `--network none`.
 */
export function buildOpenArgs(
  target: ContainerTarget,
  imageName: string,
  cmd: string,
  options: Pick<OpenOptions, "keepContainer" | "network"> = {}
): string[] {
  const builder = new DockerRunCommandBuilder(imageName).withInteractive();

  if (!options.keepContainer) {
    builder.withAutoRemove();
  }
  builder.withName(target.containerName);
  builder.withNetwork(options.network === false ? DISABLED_NETWORK_MODE : DEFAULT_NETWORK_MODE);

  return builder
    .withMount({ host: target.hostDir, container: WORKSPACE_DIR })
    .withWorkdir(WORKSPACE_DIR)
    .withShellCommand(cmd)
    .build();
}

/**
 * Open a directory in an isolated container, attached to this terminal.
 *
 * @throws PathError if the directory is missing or not a directory.
 * @throws ImageNotFoundError if the base image has not been built.
 * @throws ContainerError if the engine exits non-zero.
 */
export async function open(dir: string, options: OpenOptions, config: SafecrateConfig): Promise<void> {
  const cmd = validateCommand(options.cmd ?? config.defaultCmd);
  const target = resolveContainerTarget(dir);

  if (!(await imageExists(config.image, { engine: config.engine }))) {
    throw new ImageNotFoundError(`Base image ${config.image} not found. Run \`safecrate init\` first.`);
  }

  log.dim(`Opening ${target.hostDir} in ${target.containerName}...`);
  if (options.network === false) {
    log.dim("Network disabled");
  }

  const exitCode = await runDockerInteractive(
    buildOpenArgs(target, config.image, cmd, options),
    { engine: config.engine }
  );

  if (exitCode !== 0) {
    throw new ContainerError("Failed to open container. Docker command exited with non-zero status.", exitCode);
  }

  if (options.keepContainer) {
    log.dim(`Container kept. Resume with: safecrate resume ${dir}`);
  }
}
