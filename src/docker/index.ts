/**
 * Docker operations for safecrate.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - command-builder.ts: Argument lists (DockerRunCommandBuilder, *Args helpers)
 * - executor.ts: Command execution (safeDockerRun, runDockerInteractive)
 * - inspect.ts: Read-only queries (listContainerNames, containerExists, imageExists)
 */

// Command construction
export {
  type MountSpec,
  DockerRunCommandBuilder,
  buildImageArgs,
  listContainersArgs,
  startAttachArgs,
  removeContainerArgs,
  inspectImageArgs,
} from "./command-builder.js";

// Executor
export {
  type DockerResult,
  type DockerRunOptions,
  safeDockerRun,
  runDockerInteractive,
} from "./executor.js";

// Inspect
export {
  parseNameList,
  listContainerNames,
  containerExists,
  imageExists,
} from "./inspect.js";
