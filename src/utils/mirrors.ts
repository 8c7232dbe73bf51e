import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Target } from "../types";
import { errorMessage, InitializationError } from "./errors";
import { logger } from "./logger";
import { makeTarget } from "./targets";

export const DISTROS = ["arch", "debian", "ubuntu", "kali", "linuxmint", "manjaro", "generic"] as const;

export type DistroId = (typeof DISTROS)[number];

export const DISTRO_NAMES: Record<DistroId, string> = {
  arch: "Arch",
  debian: "Debian",
  ubuntu: "Ubuntu",
  kali: "Kali",
  linuxmint: "Mint",
  manjaro: "Manjaro",
  generic: "Generic",
};

export const DEFAULT_CATALOG_PATH = join(__dirname, "..", "..", "data", "mirrors.json");

const catalogSchema = z.record(
  z.string(),
  z.array(z.object({ name: z.string().min(1), url: z.string().url() })),
);

export type MirrorCatalog = z.infer<typeof catalogSchema>;

function toDistro(id: string): DistroId | undefined {
  const lower = id.trim().toLowerCase();
  return DISTROS.find((d) => d === lower);
}

/** Distro from os-release content: `ID`, then each `ID_LIKE` entry, else `generic`. */
export function parseOsRelease(content: string): DistroId {
  const fields = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    fields.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim().replace(/^["']|["']$/g, ""));
  }

  const candidates = [fields.get("ID") ?? "", ...(fields.get("ID_LIKE") ?? "").split(/\s+/)];
  for (const candidate of candidates) {
    const distro = toDistro(candidate);
    if (distro && distro !== "generic") return distro;
  }
  return "generic";
}

export async function detectDistro(path = "/etc/os-release"): Promise<DistroId> {
  try {
    return parseOsRelease(await readFile(path, "utf8"));
  } catch (e) {
    logger.debug(`could not read ${path}: ${errorMessage(e)}`);
    return "generic";
  }
}

export async function loadMirrorCatalog(path = DEFAULT_CATALOG_PATH): Promise<MirrorCatalog> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, "utf8"));
  } catch (e) {
    throw new InitializationError(`Could not read mirror catalog ${path}: ${errorMessage(e)}`, { cause: e });
  }
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new InitializationError(`Mirror catalog ${path} is malformed`, { cause: parsed.error });
  }
  return parsed.data;
}

/** The distro's mirrors, falling back to the generic set. */
export function mirrorTargets(catalog: MirrorCatalog, distro: DistroId): Target[] {
  const entries = catalog[distro] ?? catalog.generic ?? [];
  return entries.map((entry) => makeTarget(entry.url, "mirror", entry.name));
}
