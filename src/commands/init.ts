/**
 * Init command: build the safecrate base image.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { APP_NAME, DOCKERFILE_TEMPLATE_URL, getTempDockerfilePath } from "../constants.js";
import type { SafecrateConfig } from "../config.js";
import { buildImageArgs, runDockerInteractive } from "../docker/index.js";
import { ImageBuildError, PathError } from "../errors.js";
import { log } from "../logger.js";
import { validateFilePath } from "../paths.js";

export interface InitOptions {
  /** Custom Dockerfile; the bundled template is used when unset. */
  dockerfile?: string;
}

/** Contents of the bundled base image template. */
export function readDockerfileTemplate(): string {
  try {
    return readFileSync(fileURLToPath(DOCKERFILE_TEMPLATE_URL), "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PathError(`Bundled Dockerfile template is missing: ${reason}`);
  }
}

/**
 * Resolve the Dockerfile to build from.
 *
 * Without a custom path the bundled template is written to a temp file,
 * overwriting any earlier copy.
 */
export function prepareDockerfile(customPath?: string): string {
  if (customPath !== undefined) {
    return validateFilePath(customPath);
  }

  const tmpPath = getTempDockerfilePath();
  try {
    writeFileSync(tmpPath, readDockerfileTemplate(), { encoding: "utf-8" });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PathError(`Failed to write temporary Dockerfile ${tmpPath}: ${reason}`);
  }
  log.debug(`Wrote Dockerfile template to ${tmpPath}`);
  return tmpPath;
}

function printSecurityNotice(): void {
  log.newline();
  log.success("Built the base image!");
  log.yellow("WARNING: Running untrusted code in Docker is NOT 100% secure.");
  log.info("\tDocker escape is still possible. For maximum safety, run inside a full VM (e.g., VMware, VirtualBox, QEMU).");
  log.newline();
  log.info("Usage:");
  log.info(`\t$> ${APP_NAME} open UNTRUSTED_CODE_DIR`);
}

/**
 * Build the base image, using the current directory as build context.
 *
 * @throws ImageBuildError if the build exits non-zero (no banner is printed).
 */
export async function init(options: InitOptions, config: SafecrateConfig): Promise<void> {
  const dockerfilePath = prepareDockerfile(options.dockerfile);

  log.bold(`Building ${config.image}...`);
  const exitCode = await runDockerInteractive(
    buildImageArgs(config.image, dockerfilePath, "."),
    { engine: config.engine }
  );

  if (exitCode !== 0) {
    throw new ImageBuildError("Docker build failed. Docker command exited with non-zero status.", exitCode);
  }

  printSecurityNotice();
}
