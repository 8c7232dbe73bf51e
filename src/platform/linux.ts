import { logger } from "../utils/logger";
import { applyFailure, BaseDnsApplier, failureFromResult, query, type ApplyOutcome } from "./applier";
import { commandOutput, type CommandRunner } from "./exec";
import { detectPosixPrivilege, elevated, type Privilege } from "./privilege";

type Mechanism =
  | { kind: "nmcli"; device: string }
  | { kind: "resolvectl"; iface: string }
  | { kind: "none"; detail: string };

/** First connected, non-loopback device from `nmcli -t -f DEVICE,TYPE,STATE device status`. */
export function parseNmcliDevice(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    const [device, type, state] = line.trim().split(":");
    if (!device || !type || type === "loopback" || state !== "connected") continue;
    return device;
  }
  return undefined;
}

/** Interface name after `dev` in `ip route show default`. */
export function parseDefaultRouteInterface(output: string): string | undefined {
  const words = output.split(/\s+/);
  const at = words.indexOf("dev");
  return at >= 0 ? words[at + 1] || undefined : undefined;
}

/**
 * NetworkManager first, when its daemon is running; systemd-resolved only
 * when NetworkManager is not available at all.
 */
export class LinuxDnsApplier extends BaseDnsApplier {
  readonly platform = "linux";

  constructor(
    runner: CommandRunner,
    private readonly privilege: () => Promise<Privilege> = () => detectPosixPrivilege(runner),
  ) {
    super(runner);
  }

  protected async applyAddress(address: string, family: 4 | 6): Promise<ApplyOutcome> {
    const mechanism = await this.findMechanism();
    if (mechanism.kind === "none") return applyFailure("mechanism-unavailable", mechanism.detail);

    const privilege = await this.privilege();
    if (privilege.kind === "none") return applyFailure("permission-denied", privilege.detail);

    if (mechanism.kind === "nmcli") {
      const ip = family === 6 ? "ipv6" : "ipv4";
      const [command, args] = elevated(privilege, "nmcli", [
        "device",
        "modify",
        mechanism.device,
        `${ip}.dns`,
        address,
        `${ip}.ignore-auto-dns`,
        "yes",
      ]);
      const result = await this.runner(command, args);
      if (result.code !== 0) return failureFromResult("nmcli device modify", result);
      return { ok: true, mechanism: `NetworkManager (${mechanism.device})` };
    }

    const [command, args] = elevated(privilege, "resolvectl", ["dns", mechanism.iface, address]);
    const result = await this.runner(command, args);
    if (result.code !== 0) return failureFromResult("resolvectl dns", result);

    const [flushCommand, flushArgs] = elevated(privilege, "resolvectl", ["flush-caches"]);
    const flushed = await this.runner(flushCommand, flushArgs);
    if (flushed.code !== 0) logger.warn(`resolvectl flush-caches failed: ${commandOutput(flushed)}`);

    return { ok: true, mechanism: `systemd-resolved (${mechanism.iface})` };
  }

  private async findMechanism(): Promise<Mechanism> {
    const nmState = await query(this.runner, "nmcli", ["-t", "-f", "RUNNING", "general"]);
    if (nmState && nmState.code === 0 && nmState.stdout.trim() === "running") {
      const devices = await this.runner("nmcli", ["-t", "-f", "DEVICE,TYPE,STATE", "device", "status"]);
      const device = parseNmcliDevice(devices.stdout);
      if (!device) throw new Error("NetworkManager reports no connected network device");
      return { kind: "nmcli", device };
    }
    logger.debug("NetworkManager not running, trying systemd-resolved");

    const resolvectl = await query(this.runner, "resolvectl", ["--version"]);
    if (!resolvectl || resolvectl.code !== 0) {
      return {
        kind: "none",
        detail: "Neither NetworkManager (nmcli) nor systemd-resolved (resolvectl) is available",
      };
    }

    const route = await query(this.runner, "ip", ["route", "show", "default"]);
    if (!route) return { kind: "none", detail: "The ip command is needed to find the default interface" };
    const iface = parseDefaultRouteInterface(route.stdout);
    if (!iface) throw new Error("Could not find the default route interface");
    return { kind: "resolvectl", iface };
  }
}
