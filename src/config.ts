/**
 * Configuration for safecrate.
 *
 * Sources (later wins):
 *   1. Built-in defaults
 *   2. Global config file (~/.safecrate/config.yaml, or $SAFECRATE_CONFIG)
 *   3. Environment (SAFECRATE_ENGINE, SAFECRATE_IMAGE, SAFECRATE_CMD)
 *
 * CLI flags are applied on top by the command handlers.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts, validation.ts
 *   It should NOT import from: cli, commands, docker
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import {
  DEFAULT_ENGINE,
  DEFAULT_IMAGE_NAME,
  DEFAULT_OPEN_CMD,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  SAFECRATE_ENV,
} from "./constants.js";
import { ConfigError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { validateCommand, validateEngineName, validateImageName } from "./validation.js";

/** Resolved settings every handler works from. */
export interface SafecrateConfig {
  /** Container engine binary (docker, podman, or a path). */
  engine: string;
  /** Base image built by `init` and run by `open`. */
  image: string;
  /** Command `open` runs when --cmd is not given. */
  defaultCmd: string;
}

type ConfigKey = keyof SafecrateConfig;

/** File keys and the config field each one sets. */
const FILE_KEYS = new Map<string, ConfigKey>([
  ["engine", "engine"],
  ["image", "image"],
  ["cmd", "defaultCmd"],
  ["defaultCmd", "defaultCmd"],
]);

const VALIDATORS: Record<ConfigKey, (value: string) => string> = {
  engine: validateEngineName,
  image: validateImageName,
  defaultCmd: validateCommand,
};

export const DEFAULT_CONFIG: Readonly<SafecrateConfig> = {
  engine: DEFAULT_ENGINE,
  image: DEFAULT_IMAGE_NAME,
  defaultCmd: DEFAULT_OPEN_CMD,
};

export function getGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[SAFECRATE_ENV.CONFIG] ?? join(homedir(), GLOBAL_CONFIG_DIR, GLOBAL_CONFIG_FILE);
}

/**
 * Parse a flat `key: value` YAML subset.
 * Blank lines and `#` comments are skipped; surrounding quotes are stripped.
 */
export function parseSimpleYaml(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (!match) {
      log.debug(`Ignoring config line: ${trimmed}`);
      continue;
    }

    const key = match[1];
    const value = match[2];
    if (key === undefined || value === undefined) {
      continue;
    }

    const cleanValue = value.replace(/^(["'])(.*)\1$/, "$2").trim();
    if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }

  return result;
}

function applyValue(config: SafecrateConfig, key: ConfigKey, value: string, source: string): void {
  try {
    config[key] = VALIDATORS[key](value);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigError(`${source}: ${error.message}`);
    }
    throw error;
  }
}

function applyFile(config: SafecrateConfig, path: string): void {
  if (!existsSync(path)) {
    return;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
  }

  log.debug(`Loaded config: ${path}`);
  for (const [key, value] of Object.entries(parseSimpleYaml(content))) {
    const field = FILE_KEYS.get(key);
    if (field === undefined) {
      log.debug(`Unknown config key '${key}' in ${path}`);
      continue;
    }
    applyValue(config, field, value, `${path} (${key})`);
  }
}

function applyEnv(config: SafecrateConfig, env: NodeJS.ProcessEnv): void {
  const envFields: [string, ConfigKey][] = [
    [SAFECRATE_ENV.ENGINE, "engine"],
    [SAFECRATE_ENV.IMAGE, "image"],
    [SAFECRATE_ENV.CMD, "defaultCmd"],
  ];

  for (const [name, field] of envFields) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      applyValue(config, field, value, name);
    }
  }
}

/**
 * Load safecrate configuration.
 *
 * @throws ConfigError if a file or environment value is invalid.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv; configPath?: string } = {}): SafecrateConfig {
  const env = options.env ?? process.env;
  const config: SafecrateConfig = { ...DEFAULT_CONFIG };

  applyFile(config, options.configPath ?? getGlobalConfigPath(env));
  applyEnv(config, env);

  return config;
}
