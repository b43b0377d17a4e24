/**
 * safecrate - open untrusted code in isolated Docker containers.
 *
 * Library entry point; the CLI lives in cli.ts.
 */

export { VERSION, DEFAULT_IMAGE_NAME, CONTAINER_SUFFIX, WORKSPACE_DIR } from "./constants.js";
export { type SafecrateConfig, loadConfig, DEFAULT_CONFIG } from "./config.js";
export {
  SafecrateError,
  ConfigError,
  PathError,
  ValidationError,
  DockerError,
  DockerNotFoundError,
  DockerTimeoutError,
  DockerCommandError,
  ImageBuildError,
  ImageNotFoundError,
  ContainerError,
  ContainerNotFoundError,
} from "./errors.js";
export { containerNameFor, getContainerName, resolveContainerTarget, type ContainerTarget } from "./naming.js";
export { init, open, resume, remove, buildOpenArgs } from "./commands/index.js";
export { createProgram } from "./program.js";
export { reportError } from "./error-handler.js";
