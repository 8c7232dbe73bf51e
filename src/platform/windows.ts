import { applyFailure, BaseDnsApplier, failureFromResult, query, type ApplyOutcome } from "./applier";

const LIST_ADAPTERS = "Get-NetAdapter | Where-Object { $_.Status -eq 'Up' } | Select-Object -ExpandProperty Name";

export class WindowsDnsApplier extends BaseDnsApplier {
  readonly platform = "win32";

  protected async applyAddress(address: string, family: 4 | 6): Promise<ApplyOutcome> {
    const adapters = await query(this.runner, "powershell", ["-NoProfile", "-NonInteractive", "-Command", LIST_ADAPTERS]);
    if (!adapters) return applyFailure("mechanism-unavailable", "PowerShell is not available to list network adapters");
    if (adapters.code !== 0) return failureFromResult("powershell Get-NetAdapter", adapters);
    const adapter = adapters.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find(Boolean);
    if (!adapter) return applyFailure("invocation-failed", "No network adapter is up");

    // `net session` only succeeds in an elevated shell.
    const session = await query(this.runner, "net", ["session"]);
    if (!session) return applyFailure("mechanism-unavailable", "The net command is not available");
    if (session.code !== 0) {
      return applyFailure("permission-denied", "Administrator rights are required; run the terminal as Administrator");
    }

    const args =
      family === 6
        ? ["interface", "ipv6", "set", "dnsservers", `name=${adapter}`, "source=static", `address=${address}`]
        : ["interface", "ip", "set", "dns", `name=${adapter}`, "source=static", `addr=${address}`];
    const result = await query(this.runner, "netsh", args);
    if (!result) return applyFailure("mechanism-unavailable", "netsh is not available");
    if (result.code !== 0) return failureFromResult("netsh", result);
    return { ok: true, mechanism: `netsh (${adapter})` };
  }
}
