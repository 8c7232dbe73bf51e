import { spawn } from "node:child_process";

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

/** Rejects only when the command could not be started (for example ENOENT). */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

const COMMAND_TIMEOUT_MS = 15_000;

export const runCommand: CommandRunner = (command, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    // stdin is closed so nothing (sudo in particular) can prompt over the TUI.
    const child = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
      timeout: COMMAND_TIMEOUT_MS,
    });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });

export function commandOutput(result: CommandResult): string {
  return [result.stderr, result.stdout]
    .map((s) => s.trim())
    .filter(Boolean)
    .join(" | ");
}
