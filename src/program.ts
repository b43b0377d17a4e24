/**
 * Commander program for safecrate.
 *
 * Built by a factory so tests can parse argument lists without touching
 * process.argv; the bin entry point lives in cli.ts.
 */

import { Command } from "commander";

import { init, open, remove, resume } from "./commands/index.js";
import { loadConfig, type SafecrateConfig } from "./config.js";
import { VERSION } from "./constants.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";

export interface ProgramOptions {
  /** Config source; defaults to loadConfig() (file + environment). */
  config?: () => SafecrateConfig;
}

interface OpenFlags {
  cmd?: string;
  keepContainer?: boolean;
  network: boolean;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const getConfig = options.config ?? (() => loadConfig());
  const program = new Command();

  program
    .name("safecrate")
    .description("Safely open and run untrusted code in isolated environments.")
    .version(VERSION)
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .option("-v, --verbose", "Show engine commands and debug details")
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
      if (opts.quiet) {
        enableQuietMode();
      } else if (opts.verbose) {
        setLogLevel(LogLevel.DEBUG);
      }
    });

  program
    .command("init")
    .description("Initialize a safecrate base image")
    .option("--dockerfile <path>", "Custom Dockerfile (overrides default)")
    .action(async (opts: { dockerfile?: string }) => {
      await init({ dockerfile: opts.dockerfile }, getConfig());
    });

  program
    .command("open")
    .description("Open a directory in an isolated container")
    .argument("<dir>", "Directory to open")
    .option("--cmd <string>", "Command to run inside container (default: nvim .)")
    .option("--keep-container", "Do not remove container after exit")
    .option("--no-network", "Disable network")
    .action(async (dir: string, opts: OpenFlags) => {
      await open(
        dir,
        { cmd: opts.cmd, keepContainer: opts.keepContainer ?? false, network: opts.network },
        getConfig()
      );
    });

  program
    .command("resume")
    .description("Open a previously created container")
    .argument("<dir>", "Project directory to resume container for")
    .action(async (dir: string) => {
      await resume(dir, getConfig());
    });

  program
    .command("remove")
    .description("Remove a previously created container")
    .argument("<dir>", "Project directory whose container to remove")
    .option("--force", "Force remove even if running")
    .action(async (dir: string, opts: { force?: boolean }) => {
      await remove(dir, { force: opts.force ?? false }, getConfig());
    });

  program.showHelpAfterError();
  return program;
}
