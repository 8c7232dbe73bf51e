import type { ApplyOutcome } from "../applier";
import type { CommandResult, CommandRunner } from "../exec";

export const ok = (stdout = ""): CommandResult => ({ code: 0, stdout, stderr: "" });

export const exit = (code: number, stderr = ""): CommandResult => ({ code, stdout: "", stderr });

/**
 * Replies are matched by prefix against the command line joined with
 * spaces; the first match wins. Unmatched commands fail as not installed.
 */
export function fakeRunner(replies: Array<[prefix: string, reply: CommandResult]>) {
  const calls: string[] = [];
  const runner: CommandRunner = async (command, args) => {
    const line = [command, ...args].join(" ");
    calls.push(line);
    const match = replies.find(([prefix]) => line.startsWith(prefix));
    if (!match) throw Object.assign(new Error(`spawn ${command} ENOENT`), { code: "ENOENT" });
    return match[1];
  };
  return { runner, calls };
}

export function failure(outcome: ApplyOutcome): { kind: string; message: string } {
  if (outcome.ok) throw new Error(`expected a failure, got success via ${outcome.mechanism}`);
  return { kind: outcome.error.kind, message: outcome.error.message };
}
