import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { PathError } from "../../src/errors.js";
import { containerNameFor, getContainerName, resolveContainerTarget } from "../../src/naming.js";

describe("containerNameFor", () => {
  it("appends the suffix to the basename", () => {
    expect(containerNameFor("/home/u/proj")).toBe("proj_isolated");
  });

  it("does not special-case a basename that already carries the suffix", () => {
    expect(containerNameFor("/home/u/foo_isolated")).toBe("foo_isolated_isolated");
  });

  it("rejects the filesystem root", () => {
    expect(() => containerNameFor("/")).toThrow(PathError);
    expect(() => containerNameFor("/")).toThrow("Invalid directory name: /");
  });
});

describe("getContainerName", () => {
  let root: string;
  let project: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "safecrate-naming-")));
    project = join(root, "proj");
    mkdirSync(join(project, "sub"), { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("derives the same name for every spelling of a directory", () => {
    const link = join(root, "link-to-proj");
    symlinkSync(project, link);

    const names = [
      getContainerName(project),
      getContainerName(`${project}/`),
      getContainerName(join(project, "sub", "..")),
      getContainerName(`${project}/./sub/..`),
      getContainerName(link),
    ];

    expect(new Set(names)).toEqual(new Set(["proj_isolated"]));
  });

  it("resolves symlinks to the canonical host directory", () => {
    const link = join(root, "alias");
    symlinkSync(project, link);

    expect(resolveContainerTarget(link)).toEqual({
      hostDir: project,
      containerName: "proj_isolated",
    });
  });

  it("fails with a path error for a missing directory", () => {
    expect(() => getContainerName(join(root, "missing"))).toThrow(PathError);
  });

  it("fails with a path error for a regular file", () => {
    const file = join(root, "notes.txt");
    writeFileSync(file, "x");

    expect(() => getContainerName(file)).toThrow(`Path must be a directory: ${file}`);
  });
});
