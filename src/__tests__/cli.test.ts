import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "@jest/globals";
import { packageVersion, parseCli, resolveInitialTargets } from "../cli";
import { InitializationError } from "../utils/errors";

describe("parseCli", () => {
  it("maps options onto config overrides", () => {
    expect(parseCli(["--mode", "mirror", "--timeout", "5000", "--bytes", "2000000", "--best-by", "throughput", "--debug"])).toEqual({
      input: undefined,
      help: false,
      version: false,
      overrides: {
        mode: "mirror",
        timeoutMs: "5000",
        downloadBytes: "2000000",
        bestBy: "throughput",
        debug: true,
      },
    });
  });

  it("takes one positional target list", () => {
    const cli = parseCli(["1.1.1.1,8.8.8.8", "-h"]);
    expect(cli.input).toBe("1.1.1.1,8.8.8.8");
    expect(cli.help).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseCli(["--fast"])).toThrow(InitializationError);
  });

  it("rejects more than one positional", () => {
    expect(() => parseCli(["a.csv", "b.csv"])).toThrow("Expected at most one target list or file, got 2");
  });
});

describe("resolveInitialTargets", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "dnspeed-cli-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("is empty without input", async () => {
    await expect(resolveInitialTargets(undefined, "dns")).resolves.toEqual({ targets: [], rejected: [] });
  });

  it("parses a comma list and returns rejected entries", async () => {
    await expect(resolveInitialTargets("1.1.1.1,nope", "dns")).resolves.toEqual({
      targets: [{ identifier: "1.1.1.1", kind: "dns" }],
      rejected: ["nope"],
    });
  });

  it("loads a file with its skipped count", async () => {
    const path = join(dir, "servers.csv");
    await writeFile(path, "ip,name\n9.9.9.9,Quad9\nbad,Bad\n");

    await expect(resolveInitialTargets(path, "dns")).resolves.toEqual({
      targets: [{ identifier: "9.9.9.9", kind: "dns", label: "Quad9" }],
      skipped: 1,
      rejected: [],
    });
  });

  it("wraps file errors as initialization errors", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, '{"ip":"1.1.1.1"}');

    await expect(resolveInitialTargets(path, "dns")).rejects.toThrow(
      `Could not load targets from ${path}: JSON target file must contain an array`,
    );
  });
});

describe("packageVersion", () => {
  it("reads the version from package.json", () => {
    expect(packageVersion()).toBe("0.1.0");
  });
});
