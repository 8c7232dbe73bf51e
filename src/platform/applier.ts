import { isIP } from "node:net";
import { errorMessage, isMissingExecutable, PlatformMechanismError, type PlatformFailureKind } from "../utils/errors";
import { commandOutput, type CommandResult, type CommandRunner } from "./exec";

export type ApplyOutcome = { ok: true; mechanism: string } | { ok: false; error: PlatformMechanismError };

export interface DnsApplier {
  readonly platform: string;
  apply(address: string): Promise<ApplyOutcome>;
}

export function applyFailure(kind: PlatformFailureKind, message: string, cause?: unknown): ApplyOutcome {
  return { ok: false, error: new PlatformMechanismError(kind, message, { cause }) };
}

const PERMISSION_PATTERNS = [
  /a password is required/i,
  /not in the sudoers/i,
  /permission denied/i,
  /not authori[sz]ed/i,
  /insufficient privileges/i,
  /operation not permitted/i,
  /requires elevation/i,
  /access is denied/i,
  /run as administrator/i,
];

export function looksLikePermissionError(text: string): boolean {
  return PERMISSION_PATTERNS.some((pattern) => pattern.test(text));
}

/** Classifies a mutating command that ran and exited non-zero. */
export function failureFromResult(description: string, result: CommandResult): ApplyOutcome {
  const output = commandOutput(result);
  const detail = `${description} exited with ${result.code ?? "a signal"}${output ? `: ${output}` : ""}`;
  return applyFailure(looksLikePermissionError(output) ? "permission-denied" : "invocation-failed", detail);
}

/**
 * Runs a read-only query command. `undefined` means the executable is not
 * installed; any other spawn error propagates.
 */
export async function query(runner: CommandRunner, command: string, args: readonly string[]): Promise<CommandResult | undefined> {
  try {
    return await runner(command, args);
  } catch (e) {
    if (isMissingExecutable(e)) return undefined;
    throw e;
  }
}

/**
 * Shared shell of every platform strategy: validates the address and turns
 * anything a strategy throws into an `invocation-failed` outcome.
 */
export abstract class BaseDnsApplier implements DnsApplier {
  abstract readonly platform: string;

  constructor(protected readonly runner: CommandRunner) {}

  async apply(address: string): Promise<ApplyOutcome> {
    if (isIP(address) === 0) {
      return applyFailure("invocation-failed", `${address} is not an IP address`);
    }
    try {
      return await this.applyAddress(address, isIP(address) === 6 ? 6 : 4);
    } catch (e) {
      return applyFailure("invocation-failed", errorMessage(e), e);
    }
  }

  protected abstract applyAddress(address: string, family: 4 | 6): Promise<ApplyOutcome>;
}
