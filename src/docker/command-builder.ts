/**
 * Docker command construction for safecrate.
 *
 * Every engine invocation is an argument list (without the engine binary);
 * nothing here touches a process.
 *
 * Usage:
 *   const args = new DockerRunCommandBuilder("safecrate_default")
 *     .withInteractive()
 *     .withAutoRemove()
 *     .withName("proj_isolated")
 *     .withNetwork("bridge")
 *     .withMount({ host: "/home/u/proj", container: "/workspace" })
 *     .withWorkdir("/workspace")
 *     .withShellCommand("ls")
 *     .build();
 */

import { CONTAINER_SHELL } from "../constants.js";

/** Mount specification for Docker volumes. */
export interface MountSpec {
  host: string;
  container: string;
  /** Omitted from the volume spec when unset (engine default, rw). */
  mode?: "rw" | "ro";
}

/**
 * Builder for `docker run` commands.
 *
 * Flags are emitted in call order; the image and in-container command
 * always come last.
 */
export class DockerRunCommandBuilder {
  private readonly args: string[] = ["run"];
  private readonly imageName: string;
  private command: string[] = [];

  constructor(imageName: string) {
    this.imageName = imageName;
  }

  /** Interactive mode: `-it` with a TTY, `-i` without. */
  withInteractive(tty = true): this {
    this.args.push(tty ? "-it" : "-i");
    return this;
  }

  /** Remove the container when it exits. */
  withAutoRemove(): this {
    this.args.push("--rm");
    return this;
  }

  withName(name: string): this {
    this.args.push("--name", name);
    return this;
  }

  /** Network mode (`bridge`, `none`, `host`, or a named network). */
  withNetwork(mode: string): this {
    this.args.push("--network", mode);
    return this;
  }

  withMount(spec: MountSpec): this {
    const suffix = spec.mode ? `:${spec.mode}` : "";
    this.args.push("-v", `${spec.host}:${spec.container}${suffix}`);
    return this;
  }

  withWorkdir(dir: string): this {
    this.args.push("-w", dir);
    return this;
  }

  /** Run `cmd` inside the container through `sh -c`. */
  withShellCommand(cmd: string): this {
    this.command = [CONTAINER_SHELL, "-c", cmd];
    return this;
  }

  build(): string[] {
    return [...this.args, this.imageName, ...this.command];
  }
}

/** `build -t <image> -f <dockerfile> <context>` */
export function buildImageArgs(imageName: string, dockerfilePath: string, contextDir: string): string[] {
  return ["build", "-t", imageName, "-f", dockerfilePath, contextDir];
}

/** `ps -a --filter name=<name> --format {{.Names}}` */
export function listContainersArgs(nameFilter: string): string[] {
  return ["ps", "-a", "--filter", `name=${nameFilter}`, "--format", "{{.Names}}"];
}

/** `start -ai <name>`: start a stopped container and attach stdin/stdout. */
export function startAttachArgs(containerName: string): string[] {
  return ["start", "-ai", containerName];
}

/** `rm [-f] <name>` */
export function removeContainerArgs(containerName: string, force = false): string[] {
  const args = ["rm"];
  if (force) {args.push("-f");}
  args.push(containerName);
  return args;
}

/** `image inspect <image>` */
export function inspectImageArgs(imageName: string): string[] {
  return ["image", "inspect", imageName];
}
