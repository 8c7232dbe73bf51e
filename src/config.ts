import { z } from "zod";
import type { BestBy, Mode } from "./types";
import { InitializationError } from "./utils/errors";

export const DEFAULT_TIMEOUT_MS = 7500;
export const DEFAULT_TEST_DOMAIN = "www.google.com";
export const DEFAULT_DOWNLOAD_URL = "https://speed.cloudflare.com/__down?bytes=1000000";
export const DEFAULT_DOWNLOAD_BYTES = 1_000_000;

const flag = z
  .union([z.boolean(), z.string()])
  .transform((v) => v === true || v === "true" || v === "1");

const configSchema = z.object({
  mode: z.enum(["dns", "mirror"]).default("dns"),
  timeoutMs: z.coerce.number().int().min(500).max(120_000).default(DEFAULT_TIMEOUT_MS),
  testDomain: z.string().min(1).default(DEFAULT_TEST_DOMAIN),
  downloadUrl: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), "must be an http(s) URL")
    .default(DEFAULT_DOWNLOAD_URL),
  downloadBytes: z.coerce.number().int().positive().default(DEFAULT_DOWNLOAD_BYTES),
  bestBy: z.enum(["latency", "throughput"]).default("latency"),
  debug: flag.default(false),
});

export type AppConfig = {
  mode: Mode;
  timeoutMs: number;
  testDomain: string;
  downloadUrl: string;
  downloadBytes: number;
  bestBy: BestBy;
  debug: boolean;
};

export type ConfigOverrides = Partial<Record<keyof AppConfig, string | boolean | undefined>>;

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    timeoutMs: env.DNSPEED_TIMEOUT_MS,
    testDomain: env.DNSPEED_TEST_DOMAIN,
    downloadUrl: env.DNSPEED_DOWNLOAD_URL,
    downloadBytes: env.DNSPEED_DOWNLOAD_BYTES,
    bestBy: env.DNSPEED_BEST_BY,
    debug: env.DNSPEED_DEBUG,
  };
}

const CONFIG_KEYS = [
  "mode",
  "timeoutMs",
  "testDomain",
  "downloadUrl",
  "downloadBytes",
  "bestBy",
  "debug",
] as const satisfies readonly (keyof AppConfig)[];

function defined(overrides: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

/**
 * Builds the runtime configuration. Command-line values win over
 * `DNSPEED_*` environment variables, which win over defaults.
 */
export function loadConfig(cli: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({ ...defined(fromEnv(env)), ...defined(cli) });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new InitializationError(`Invalid configuration: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}
