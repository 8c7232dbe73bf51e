import { applyFailure, type ApplyOutcome, type DnsApplier } from "./applier";
import { runCommand, type CommandRunner } from "./exec";
import { LinuxDnsApplier } from "./linux";
import { MacosDnsApplier } from "./macos";
import { WindowsDnsApplier } from "./windows";

export type { ApplyOutcome, DnsApplier } from "./applier";

class UnsupportedDnsApplier implements DnsApplier {
  constructor(readonly platform: string) {}

  async apply(): Promise<ApplyOutcome> {
    return applyFailure("mechanism-unavailable", `System DNS configuration is not supported on ${this.platform}`);
  }
}

/** Picks the strategy for `platform`. Called once at startup. */
export function createDnsApplier(platform: NodeJS.Platform = process.platform, runner: CommandRunner = runCommand): DnsApplier {
  switch (platform) {
    case "linux":
      return new LinuxDnsApplier(runner);
    case "darwin":
      return new MacosDnsApplier(runner);
    case "win32":
      return new WindowsDnsApplier(runner);
    default:
      return new UnsupportedDnsApplier(platform);
  }
}
