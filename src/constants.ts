/**
 * Constants module for safecrate.
 *
 * Shared names, paths and timeouts are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

// === Version (SSOT: package.json) ===
function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();

// === Naming (SSOT) ===
export const APP_NAME = "safecrate";
export const DEFAULT_IMAGE_NAME = "safecrate_default";
export const CONTAINER_SUFFIX = "isolated";
export const DEFAULT_ENGINE = "docker";

// === Container paths ===
export const WORKSPACE_DIR = "/workspace";
export const CONTAINER_SHELL = "sh";

// === Defaults ===
export const DEFAULT_OPEN_CMD = "nvim .";
export const DEFAULT_NETWORK_MODE = "bridge";
export const DISABLED_NETWORK_MODE = "none";

// === Docker Timeouts (milliseconds) ===
export const DOCKER_COMMAND_TIMEOUT = 30_000; // Quick queries (ps, image inspect)

// === Build assets ===
/** Bundled Dockerfile template, shipped next to dist/ and src/. */
export const DOCKERFILE_TEMPLATE_URL = new URL("../assets/Dockerfile.template", import.meta.url);
export const TEMP_DOCKERFILE_NAME = "Dockerfile.safecrate";

/** Path the bundled template is materialized to when no custom Dockerfile is given. */
export function getTempDockerfilePath(): string {
  return join(tmpdir(), TEMP_DOCKERFILE_NAME);
}

// === Config ===
export const GLOBAL_CONFIG_DIR = ".safecrate";
export const GLOBAL_CONFIG_FILE = "config.yaml";

// === Environment Variables (SSOT for names) ===
export const SAFECRATE_ENV = {
  ENGINE: "SAFECRATE_ENGINE",
  IMAGE: "SAFECRATE_IMAGE",
  CMD: "SAFECRATE_CMD",
  CONFIG: "SAFECRATE_CONFIG",
} as const;
