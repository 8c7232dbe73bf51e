import { applyFailure, BaseDnsApplier, failureFromResult, query, type ApplyOutcome } from "./applier";
import type { CommandRunner } from "./exec";
import { detectPosixPrivilege, elevated, type Privilege } from "./privilege";

/** Service names from `networksetup -listallnetworkservices`, minus the header and disabled (`*`) ones. */
export function parseNetworkServices(output: string): string[] {
  return output
    .split(/\r?\n/)
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("*"));
}

export function hasIpAddress(info: string): boolean {
  return /^IP address:\s*\d/m.test(info);
}

export class MacosDnsApplier extends BaseDnsApplier {
  readonly platform = "darwin";

  constructor(
    runner: CommandRunner,
    private readonly privilege: () => Promise<Privilege> = () => detectPosixPrivilege(runner),
  ) {
    super(runner);
  }

  protected async applyAddress(address: string): Promise<ApplyOutcome> {
    const listing = await query(this.runner, "networksetup", ["-listallnetworkservices"]);
    if (!listing) return applyFailure("mechanism-unavailable", "networksetup is not available");
    if (listing.code !== 0) return failureFromResult("networksetup -listallnetworkservices", listing);

    const service = await this.activeService(parseNetworkServices(listing.stdout));
    if (!service) return applyFailure("invocation-failed", "No enabled network service has an IP address");

    const privilege = await this.privilege();
    if (privilege.kind === "none") return applyFailure("permission-denied", privilege.detail);

    const [command, args] = elevated(privilege, "networksetup", ["-setdnsservers", service, address]);
    const result = await this.runner(command, args);
    if (result.code !== 0) return failureFromResult("networksetup -setdnsservers", result);
    return { ok: true, mechanism: `networksetup (${service})` };
  }

  private async activeService(services: string[]): Promise<string | undefined> {
    for (const service of services) {
      const info = await this.runner("networksetup", ["-getinfo", service]);
      if (info.code === 0 && hasIpAddress(info.stdout)) return service;
    }
    return undefined;
  }
}
