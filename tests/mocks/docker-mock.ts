/**
 * Docker engine mock for unit testing.
 *
 * Stands in for src/exec.ts so handlers can be exercised without Docker:
 * every call is recorded and answered from scripted replies.
 */

import type { ExecResult } from "../../src/exec.js";

export interface RecordedCall {
  cmd: string;
  args: string[];
  /** "captured" for exec (queries), "inherit" for execInherit (interactive). */
  mode: "captured" | "inherit";
}

export type MockReply = Partial<ExecResult>;

interface Responder {
  prefix: string[];
  reply: MockReply;
}

function startsWith(args: string[], prefix: string[]): boolean {
  return prefix.every((part, i) => args[i] === part);
}

/** Record of all mock calls for verification. */
export class DockerMockRecorder {
  readonly calls: RecordedCall[] = [];
  private readonly responders: Responder[] = [];

  /**
   * Reply to calls whose arguments start with `prefix`.
   * Later registrations win over earlier ones.
   */
  on(prefix: string[], reply: MockReply): this {
    this.responders.unshift({ prefix, reply });
    return this;
  }

  readonly exec = async (cmd: string, args: string[]): Promise<ExecResult> =>
    this.record({ cmd, args, mode: "captured" });

  readonly execInherit = async (cmd: string, args: string[]): Promise<ExecResult> =>
    this.record({ cmd, args, mode: "inherit" });

  /** Argument lists of every call whose first argument is `subcommand`. */
  argsFor(subcommand: string): string[][] {
    return this.calls.filter((call) => call.args[0] === subcommand).map((call) => call.args);
  }

  reset(): void {
    this.calls.length = 0;
    this.responders.length = 0;
  }

  private record(call: RecordedCall): ExecResult {
    this.calls.push(call);
    const responder = this.responders.find((r) => startsWith(call.args, r.prefix));
    return {
      exitCode: 0,
      stdout: "",
      stderr: "",
      timedOut: false,
      ...responder?.reply,
    };
  }
}
