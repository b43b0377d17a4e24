import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, getGlobalConfigPath, loadConfig, parseSimpleYaml } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

describe("parseSimpleYaml", () => {
  it("reads key: value pairs, skipping comments and blanks", () => {
    const content = [
      "# safecrate settings",
      "",
      "engine: podman",
      "image: \"crate:dev\"",
      "cmd: 'cargo test'",
      "not a pair",
    ].join("\n");

    expect(parseSimpleYaml(content)).toEqual({
      engine: "podman",
      image: "crate:dev",
      cmd: "cargo test",
    });
  });

  it("drops empty values", () => {
    expect(parseSimpleYaml("engine:\nimage: ''\n")).toEqual({});
  });
});

describe("loadConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "safecrate-config-"));
    configPath = join(dir, "config.yaml");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults when no file or environment is set", () => {
    expect(loadConfig({ env: {}, configPath })).toEqual({
      engine: "docker",
      image: "safecrate_default",
      defaultCmd: "nvim .",
    });
  });

  it("applies the config file over defaults", () => {
    writeFileSync(configPath, "engine: podman\ncmd: bash\ncolor: never\n");

    expect(loadConfig({ env: {}, configPath })).toEqual({
      ...DEFAULT_CONFIG,
      engine: "podman",
      defaultCmd: "bash",
    });
  });

  it("applies the environment over the config file", () => {
    writeFileSync(configPath, "engine: podman\nimage: crate:file\n");

    const config = loadConfig({
      env: { SAFECRATE_ENGINE: "nerdctl", SAFECRATE_CMD: "zsh" },
      configPath,
    });

    expect(config).toEqual({ engine: "nerdctl", image: "crate:file", defaultCmd: "zsh" });
  });

  it("finds the file through SAFECRATE_CONFIG", () => {
    writeFileSync(configPath, "image: crate:env\n");

    expect(loadConfig({ env: { SAFECRATE_CONFIG: configPath } }).image).toBe("crate:env");
  });

  it("rejects an invalid image name from the file", () => {
    writeFileSync(configPath, "image: Not Valid\n");

    expect(() => loadConfig({ env: {}, configPath })).toThrow(ConfigError);
  });

  it("rejects an invalid engine from the environment", () => {
    expect(() => loadConfig({ env: { SAFECRATE_ENGINE: "my docker" }, configPath })).toThrow(
      "SAFECRATE_ENGINE: Invalid container engine 'my docker'. Expected a command such as docker or podman."
    );
  });
});

describe("getGlobalConfigPath", () => {
  it("defaults to ~/.safecrate/config.yaml", () => {
    expect(getGlobalConfigPath({})).toBe(join(homedir(), ".safecrate", "config.yaml"));
  });
});
