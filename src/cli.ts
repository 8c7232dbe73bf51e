import { readFileSync } from "node:fs";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import type { ConfigOverrides } from "./config";
import type { Target, TargetKind } from "./types";
import { errorMessage, InitializationError, InputValidationError } from "./utils/errors";
import { isTargetFile, loadTargetsFile, parseTargetList } from "./utils/targets";

export const HELP_TEXT = `Usage: dnspeed [targets|file] [options]

Benchmark DNS resolvers or distribution mirrors for latency and download speed.

Arguments:
  targets               comma-separated IPs (or mirror URLs with --mode mirror)
  file                  .csv with an ip/url column, or .json array of {"ip": ...}/{"url": ...}

Options:
  --mode <dns|mirror>   what to benchmark (default: dns)
  --timeout <ms>        hard limit per target (default: 7500)
  --bytes <n>           download size for the throughput test (default: 1000000)
  --best-by <latency|throughput>
                        ranking used to pick the fastest target (default: latency)
  --debug               log diagnostics to stderr
  -h, --help            show this help
  -v, --version         show the version
`;

export type CliOptions = {
  input?: string;
  help: boolean;
  version: boolean;
  overrides: ConfigOverrides;
};

export function parseCli(argv: readonly string[]): CliOptions {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        mode: { type: "string" },
        timeout: { type: "string" },
        bytes: { type: "string" },
        "best-by": { type: "string" },
        debug: { type: "boolean" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
    });
  } catch (e) {
    throw new InitializationError(`${errorMessage(e)}\n\n${HELP_TEXT}`, { cause: e });
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new InitializationError(`Expected at most one target list or file, got ${positionals.length}`);
  }

  return {
    input: positionals[0],
    help: values.help === true,
    version: values.version === true,
    overrides: {
      mode: values.mode,
      timeoutMs: values.timeout,
      downloadBytes: values.bytes,
      bestBy: values["best-by"],
      debug: values.debug,
    },
  };
}

export type InitialTargets = {
  targets: Target[];
  /** Malformed file rows; undefined when the targets did not come from a file. */
  skipped?: number;
  rejected: string[];
};

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Reads the positional argument: an existing .csv/.json file is imported,
 * anything else is treated as a comma-separated list.
 */
export async function resolveInitialTargets(input: string | undefined, kind: TargetKind): Promise<InitialTargets> {
  if (!input) return { targets: [], rejected: [] };

  if (isTargetFile(input) && (await isFile(input))) {
    try {
      const report = await loadTargetsFile(input, kind);
      return { ...report, rejected: [] };
    } catch (e) {
      const reason = e instanceof InputValidationError ? e.message : errorMessage(e);
      throw new InitializationError(`Could not load targets from ${input}: ${reason}`, { cause: e });
    }
  }

  const { targets, rejected } = parseTargetList(input, kind);
  return { targets, rejected };
}

export function packageVersion(): string {
  const file = join(__dirname, "..", "package.json");
  const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(file, "utf8")));
  return parsed.success ? parsed.data.version : "unknown";
}
