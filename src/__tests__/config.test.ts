import { describe, expect, it } from "@jest/globals";
import { DEFAULT_DOWNLOAD_BYTES, DEFAULT_DOWNLOAD_URL, DEFAULT_TEST_DOMAIN, loadConfig } from "../config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({}, {})).toEqual({
      mode: "dns",
      timeoutMs: 7500,
      testDomain: DEFAULT_TEST_DOMAIN,
      downloadUrl: DEFAULT_DOWNLOAD_URL,
      downloadBytes: DEFAULT_DOWNLOAD_BYTES,
      bestBy: "latency",
      debug: false,
    });
  });

  it("reads DNSPEED_* variables", () => {
    const config = loadConfig(
      {},
      {
        DNSPEED_TIMEOUT_MS: "3000",
        DNSPEED_TEST_DOMAIN: "example.test",
        DNSPEED_DOWNLOAD_URL: "http://download.example.test/1mb",
        DNSPEED_BEST_BY: "throughput",
        DNSPEED_DEBUG: "1",
      },
    );

    expect(config.timeoutMs).toBe(3000);
    expect(config.testDomain).toBe("example.test");
    expect(config.downloadUrl).toBe("http://download.example.test/1mb");
    expect(config.bestBy).toBe("throughput");
    expect(config.debug).toBe(true);
  });

  it("lets command-line values win over the environment", () => {
    const config = loadConfig({ timeoutMs: "5000", mode: "mirror" }, { DNSPEED_TIMEOUT_MS: "3000" });
    expect(config.timeoutMs).toBe(5000);
    expect(config.mode).toBe("mirror");
  });

  it("ignores empty values", () => {
    expect(loadConfig({ timeoutMs: undefined }, { DNSPEED_TIMEOUT_MS: "" }).timeoutMs).toBe(7500);
  });

  it("names every invalid field", () => {
    expect(() => loadConfig({ bestBy: "jitter" }, { DNSPEED_DOWNLOAD_URL: "ftp://download.example.test/" })).toThrow(
      "Invalid configuration: downloadUrl: must be an http(s) URL; bestBy: Invalid enum value. Expected 'latency' | 'throughput', received 'jitter'",
    );
  });

  it("rejects a timeout out of range", () => {
    expect(() => loadConfig({ timeoutMs: "100" }, {})).toThrow(
      "Invalid configuration: timeoutMs: Number must be greater than or equal to 500",
    );
  });
});
