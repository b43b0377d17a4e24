import { describe, expect, it } from "vitest";

import { buildOpenArgs } from "../../src/commands/open.js";
import {
  DockerRunCommandBuilder,
  buildImageArgs,
  inspectImageArgs,
  listContainersArgs,
  removeContainerArgs,
  startAttachArgs,
} from "../../src/docker/command-builder.js";

const target = { hostDir: "/home/u/proj", containerName: "proj_isolated" };

describe("DockerRunCommandBuilder", () => {
  it("puts the image and shell command after all flags", () => {
    const args = new DockerRunCommandBuilder("img")
      .withShellCommand("echo hi")
      .withInteractive(false)
      .withName("c")
      .build();

    expect(args).toEqual(["run", "-i", "--name", "c", "img", "sh", "-c", "echo hi"]);
  });

  it("adds the mount mode only when given", () => {
    const args = new DockerRunCommandBuilder("img")
      .withMount({ host: "/a", container: "/b" })
      .withMount({ host: "/c", container: "/d", mode: "ro" })
      .build();

    expect(args).toEqual(["run", "-v", "/a:/b", "-v", "/c:/d:ro", "img"]);
  });
});

describe("buildOpenArgs", () => {
  it("builds a throwaway, networked run by default", () => {
    expect(buildOpenArgs(target, "safecrate_default", "ls")).toEqual([
      "run", "-it", "--rm",
      "--name", "proj_isolated",
      "--network", "bridge",
      "-v", "/home/u/proj:/workspace",
      "-w", "/workspace",
      "safecrate_default",
      "sh", "-c", "ls",
    ]);
  });

  it("drops --rm when the container is kept", () => {
    const args = buildOpenArgs(target, "safecrate_default", "nvim .", { keepContainer: true });

    expect(args).not.toContain("--rm");
    expect(args.slice(0, 4)).toEqual(["run", "-it", "--name", "proj_isolated"]);
  });

  it("never enables networking when the network is disabled", () => {
    const args = buildOpenArgs(target, "safecrate_default", "ls", { network: false });

    expect(args).not.toContain("bridge");
    expect(args.slice(5, 7)).toEqual(["--network", "none"]);
  });

  it("passes the command to sh -c as a single argument", () => {
    const args = buildOpenArgs(target, "safecrate_default", "cargo build && cargo test");

    expect(args.slice(-3)).toEqual(["sh", "-c", "cargo build && cargo test"]);
  });
});

describe("engine argument helpers", () => {
  it("builds an image from a dockerfile and context", () => {
    expect(buildImageArgs("safecrate_default", "/tmp/Dockerfile.safecrate", ".")).toEqual([
      "build", "-t", "safecrate_default", "-f", "/tmp/Dockerfile.safecrate", ".",
    ]);
  });

  it("lists containers by name, names only", () => {
    expect(listContainersArgs("proj_isolated")).toEqual([
      "ps", "-a", "--filter", "name=proj_isolated", "--format", "{{.Names}}",
    ]);
  });

  it("starts and attaches", () => {
    expect(startAttachArgs("proj_isolated")).toEqual(["start", "-ai", "proj_isolated"]);
  });

  it("removes with and without force", () => {
    expect(removeContainerArgs("proj_isolated")).toEqual(["rm", "proj_isolated"]);
    expect(removeContainerArgs("proj_isolated", true)).toEqual(["rm", "-f", "proj_isolated"]);
  });

  it("inspects an image", () => {
    expect(inspectImageArgs("safecrate_default")).toEqual(["image", "inspect", "safecrate_default"]);
  });
});
