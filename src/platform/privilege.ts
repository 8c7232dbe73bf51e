import { commandOutput, type CommandRunner } from "./exec";
import { query } from "./applier";

export type Privilege = { kind: "root" } | { kind: "sudo" } | { kind: "none"; detail: string };

/**
 * Root runs commands directly; otherwise `sudo -n` must work without a
 * password prompt, since the terminal belongs to the UI.
 */
export async function detectPosixPrivilege(
  runner: CommandRunner,
  uid: () => number | undefined = () => process.getuid?.(),
): Promise<Privilege> {
  if (uid() === 0) return { kind: "root" };

  const result = await query(runner, "sudo", ["-n", "true"]);
  if (!result) return { kind: "none", detail: "Root privileges are required and sudo is not installed" };
  if (result.code === 0) return { kind: "sudo" };
  const output = commandOutput(result);
  return {
    kind: "none",
    detail: `Root privileges are required; non-interactive sudo was refused${output ? ` (${output})` : ""}`,
  };
}

export function elevated(privilege: Privilege, command: string, args: readonly string[]): [string, string[]] {
  return privilege.kind === "sudo" ? ["sudo", ["-n", command, ...args]] : [command, [...args]];
}
