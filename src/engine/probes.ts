import { Resolver } from "node:dns/promises";
import https from "node:https";
import { isIP } from "node:net";
import type { Readable } from "node:stream";
import axios from "axios";
import type { Probe, ProbeMeasurement, Target } from "../types";
import { errorMessage } from "../utils/errors";

export type ProbeSettings = {
  testDomain: string;
  downloadUrl: string;
  downloadBytes: number;
};

export type DnsLookup = {
  resolve(hostname: string): Promise<string[]>;
  cancel(): void;
};

export type ResolverFactory = (server: string) => DnsLookup;

export type DownloadRequest = {
  url: string;
  maxBytes: number;
  signal: AbortSignal;
  /** Connect here instead of resolving the URL's host; TLS and Host still use the host name. */
  pinnedAddress?: string;
};

export type DownloadStats = {
  bytes: number;
  headersMs: number;
  totalMs: number;
};

export type Downloader = (request: DownloadRequest) => Promise<DownloadStats>;

const RESOLVER_TIMEOUT_MS = 2000;

/** A resolver that only asks `server`, once, over UDP port 53. */
export const createResolver: ResolverFactory = (server) => {
  const resolver = new Resolver({ timeout: RESOLVER_TIMEOUT_MS, tries: 1 });
  resolver.setServers([server]);
  return {
    resolve: (hostname) => resolver.resolve4(hostname),
    cancel: () => resolver.cancel(),
  };
};

function chunkSize(chunk: unknown): number {
  if (Buffer.isBuffer(chunk)) return chunk.length;
  if (typeof chunk === "string") return Buffer.byteLength(chunk);
  return 0;
}

export const boundedDownload: Downloader = async ({ url, maxBytes, signal, pinnedAddress }) => {
  const parsed = new URL(url);
  const headers: Record<string, string> = {};
  let httpsAgent: https.Agent | undefined;

  if (pinnedAddress) {
    headers.Host = parsed.host;
    if (parsed.protocol === "https:") httpsAgent = new https.Agent({ servername: parsed.hostname });
    parsed.hostname = isIP(pinnedAddress) === 6 ? `[${pinnedAddress}]` : pinnedAddress;
  }

  const started = performance.now();
  const response = await axios.get<Readable>(parsed.toString(), {
    responseType: "stream",
    signal,
    headers,
    httpsAgent,
    // A proxy would resolve the host itself and undo the pinning.
    proxy: pinnedAddress ? false : undefined,
    decompress: false,
    validateStatus: () => true,
  });
  const headersMs = performance.now() - started;

  if (response.status < 200 || response.status >= 300) {
    response.data.destroy();
    throw new Error(`HTTP ${response.status}`);
  }

  let bytes = 0;
  for await (const chunk of response.data) {
    bytes += chunkSize(chunk);
    if (bytes >= maxBytes) break;
  }

  return { bytes, headersMs, totalMs: performance.now() - started };
};

export function toMbps(bytes: number, elapsedMs: number): number {
  if (elapsedMs <= 0) return 0;
  return (bytes * 8) / 1_000_000 / (elapsedMs / 1000);
}

async function step<T>(label: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (e) {
    throw new Error(`${label}: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Latency is one lookup of the test domain through the target resolver. The
 * download host is then resolved through the same resolver and fetched from
 * the address it returned, so throughput reflects the CDN edge it picks.
 */
export function createDnsProbe(
  settings: ProbeSettings,
  resolverFactory: ResolverFactory = createResolver,
  download: Downloader = boundedDownload,
): Probe {
  const downloadHost = new URL(settings.downloadUrl).hostname;

  return async (target, signal): Promise<ProbeMeasurement> => {
    const lookup = resolverFactory(target.identifier);
    const onAbort = () => lookup.cancel();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const started = performance.now();
      await step("Latency test failed", () => lookup.resolve(settings.testDomain));
      const latencyMs = performance.now() - started;

      const stats = await step("Download test failed", async () => {
        const [address] = await lookup.resolve(downloadHost);
        if (!address) throw new Error(`no address for ${downloadHost}`);
        return download({ url: settings.downloadUrl, maxBytes: settings.downloadBytes, signal, pinnedAddress: address });
      });

      return { latencyMs, throughputMbps: toMbps(stats.bytes, stats.totalMs) };
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  };
}

/** Latency is time to response headers; throughput covers the whole bounded transfer. */
export function createMirrorProbe(settings: ProbeSettings, download: Downloader = boundedDownload): Probe {
  return async (target, signal) => {
    const stats = await step("Download test failed", () =>
      download({ url: target.identifier, maxBytes: settings.downloadBytes, signal }),
    );
    return { latencyMs: stats.headersMs, throughputMbps: toMbps(stats.bytes, stats.totalMs) };
  };
}

export function createProbe(settings: ProbeSettings): Probe {
  const dns = createDnsProbe(settings);
  const mirror = createMirrorProbe(settings);
  return (target: Target, signal: AbortSignal) => (target.kind === "dns" ? dns(target, signal) : mirror(target, signal));
}
