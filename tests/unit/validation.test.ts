import { describe, expect, it } from "vitest";

import { ValidationError } from "../../src/errors.js";
import { isValidImageName, validateCommand, validateEngineName } from "../../src/validation.js";

describe("validateCommand", () => {
  it("returns the command unchanged", () => {
    expect(validateCommand("nvim .")).toBe("nvim .");
  });

  it("rejects blank commands", () => {
    expect(() => validateCommand("")).toThrow(ValidationError);
    expect(() => validateCommand(" \t")).toThrow(ValidationError);
  });

  it("rejects NUL bytes", () => {
    expect(() => validateCommand("ls\0rm")).toThrow("Command must not contain NUL bytes.");
  });
});

describe("isValidImageName", () => {
  it.each(["safecrate_default", "crate:dev", "ghcr.io/acme/crate:1.2", "a-b.c"])("accepts %s", (name) => {
    expect(isValidImageName(name)).toBe(true);
  });

  it.each(["", "Upper", "has space", "trailing-", "crate:", "-lead"])("rejects %j", (name) => {
    expect(isValidImageName(name)).toBe(false);
  });
});

describe("validateEngineName", () => {
  it("accepts a command or a path", () => {
    expect(validateEngineName("podman")).toBe("podman");
    expect(validateEngineName("/usr/local/bin/docker")).toBe("/usr/local/bin/docker");
  });

  it("rejects whitespace", () => {
    expect(() => validateEngineName("")).toThrow(ValidationError);
  });
});
