import { describe, expect, it } from "@jest/globals";
import type { ProbeResult, ProbeStatus } from "../../types";
import { defaultSort, nextSortColumn, pickBest, sortResults } from "../ranking";

function result(
  index: number,
  identifier: string,
  latencyMs?: number,
  throughputMbps?: number,
  status: ProbeStatus = { kind: "success" },
  label?: string,
): ProbeResult {
  return {
    target: label ? { identifier, kind: "mirror", label } : { identifier, kind: "dns" },
    index,
    status,
    latencyMs,
    throughputMbps,
  };
}

const ids = (results: ProbeResult[]) => results.map((r) => r.target.identifier);

describe("sortResults", () => {
  const results = [
    result(0, "9.9.9.9", 30, 40),
    result(1, "1.1.1.1", 10, 90),
    result(2, "8.8.4.4", undefined, undefined, { kind: "timeout" }),
    result(3, "8.8.8.8", 20, 60),
    result(4, "4.2.2.2", undefined, undefined, { kind: "failed", reason: "refused" }),
  ];

  it("orders by latency ascending with failures last", () => {
    expect(ids(sortResults(results, { column: "latency", direction: "asc" }))).toEqual([
      "1.1.1.1",
      "8.8.8.8",
      "9.9.9.9",
      "8.8.4.4",
      "4.2.2.2",
    ]);
  });

  it("keeps failures last when the direction flips", () => {
    expect(ids(sortResults(results, { column: "latency", direction: "desc" }))).toEqual([
      "9.9.9.9",
      "8.8.8.8",
      "1.1.1.1",
      "8.8.4.4",
      "4.2.2.2",
    ]);
    expect(ids(sortResults(results, { column: "throughput", direction: "desc" }))).toEqual([
      "1.1.1.1",
      "8.8.8.8",
      "9.9.9.9",
      "8.8.4.4",
      "4.2.2.2",
    ]);
  });

  it("sorts identifiers as plain text", () => {
    expect(ids(sortResults(results, { column: "identifier", direction: "asc" }))).toEqual([
      "1.1.1.1",
      "4.2.2.2",
      "8.8.4.4",
      "8.8.8.8",
      "9.9.9.9",
    ]);
  });

  it("is stable for equal keys", () => {
    const tied = [result(0, "a", 10, 1), result(1, "b", 10, 2), result(2, "c", 10, 3)];
    expect(ids(sortResults(tied, { column: "latency", direction: "asc" }))).toEqual(["a", "b", "c"]);
    expect(ids(sortResults(tied, { column: "latency", direction: "desc" }))).toEqual(["a", "b", "c"]);
  });

  it("sorts by label, falling back to the identifier", () => {
    const mirrors = [
      result(0, "https://c.example/", 1, 1, { kind: "success" }, "Zeta"),
      result(1, "https://b.example/", 1, 1, { kind: "success" }, "Alpha"),
      result(2, "https://a.example/", 1, 1),
    ];
    expect(ids(sortResults(mirrors, { column: "label", direction: "asc" }))).toEqual([
      "https://b.example/",
      "https://c.example/",
      "https://a.example/",
    ]);
  });

  it("does not mutate its input", () => {
    const copy = [...results];
    sortResults(results, { column: "latency", direction: "asc" });
    expect(results).toEqual(copy);
  });
});

describe("pickBest", () => {
  it("returns undefined when nothing succeeded", () => {
    expect(pickBest([result(0, "a", undefined, undefined, { kind: "timeout" })])).toBeUndefined();
    expect(pickBest([])).toBeUndefined();
  });

  it("prefers the lowest latency and breaks ties on throughput", () => {
    const best = pickBest([result(0, "a", 15, 100), result(1, "b", 10, 20), result(2, "c", 10, 50)]);
    expect(best?.target.identifier).toBe("c");
  });

  it("falls back to list order on a full tie", () => {
    const best = pickBest([result(0, "a", 10, 50), result(1, "b", 10, 50)]);
    expect(best?.target.identifier).toBe("a");
  });

  it("ranks by throughput when asked", () => {
    const best = pickBest([result(0, "a", 5, 10), result(1, "b", 40, 95), result(2, "c", 30, 95)], "throughput");
    expect(best?.target.identifier).toBe("c");
  });

  it("skips successes without both metrics", () => {
    const best = pickBest([result(0, "a", 5, undefined), result(1, "b", 50, 10)]);
    expect(best?.target.identifier).toBe("b");
  });
});

describe("sort column helpers", () => {
  it("defaults to the best-by metric", () => {
    expect(defaultSort("latency")).toEqual({ column: "latency", direction: "asc" });
    expect(defaultSort("throughput")).toEqual({ column: "throughput", direction: "desc" });
  });

  it("cycles columns per mode", () => {
    expect(nextSortColumn("throughput", "dns")).toBe("identifier");
    expect(nextSortColumn("throughput", "mirror")).toBe("label");
    expect(nextSortColumn("label", "mirror")).toBe("identifier");
  });
});
