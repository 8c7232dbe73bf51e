import { describe, expect, it } from "@jest/globals";
import { render } from "ink-testing-library";
import type { ProbeResult } from "../../types";
import { progressLine } from "../ProgressBar";
import ResultsTable, { detail, headerLine, rowLine } from "../ResultsTable";
import StatusBanner from "../StatusBanner";
import KeyHints from "../KeyHints";

const stripAnsi = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, "");

const fast: ProbeResult = {
  target: { identifier: "1.1.1.1", kind: "dns" },
  index: 0,
  status: { kind: "success" },
  latencyMs: 12.4,
  throughputMbps: 85.456,
};

const broken: ProbeResult = {
  target: { identifier: "192.0.2.1", kind: "dns" },
  index: 1,
  status: { kind: "failed", reason: "Latency test failed: connection refused" },
};

describe("ResultsTable lines", () => {
  it("marks the sorted column in the header", () => {
    expect(headerLine("dns", { column: "latency", direction: "asc" })).toBe(
      "  DNS Server" + " ".repeat(18) + " " + " Latency ▲" + " " + " ".repeat(6) + "Download" + "  Status",
    );
  });

  it("right-aligns metrics and stars the best row", () => {
    expect(rowLine("dns", fast, true)).toBe(
      "★ 1.1.1.1" + " ".repeat(21) + " " + " ".repeat(5) + "12 ms" + " " + " ".repeat(4) + "85.46 Mbps" + "  ok",
    );
  });

  it("shows dashes and the reason for a failure", () => {
    expect(rowLine("dns", broken, false)).toBe(
      "  192.0.2.1" +
        " ".repeat(19) +
        " " +
        " ".repeat(9) +
        "–" +
        " " +
        " ".repeat(13) +
        "–" +
        "  failed: Latency test failed: connection refused",
    );
  });

  it("describes each status", () => {
    expect(detail({ ...fast, status: { kind: "pending" } })).toBe("…");
    expect(detail({ ...fast, status: { kind: "timeout" } })).toBe("timeout");
  });
});

describe("ResultsTable", () => {
  it("renders the header and a row per result", () => {
    const { lastFrame } = render(
      <ResultsTable mode="dns" results={[fast, broken]} sort={{ column: "latency", direction: "asc" }} best={fast} />,
    );
    const lines = stripAnsi(lastFrame() ?? "").split("\n");

    expect(lines).toHaveLength(3);
    expect(lines[1].startsWith("★ 1.1.1.1")).toBe(true);
    expect(lines[2].startsWith("  192.0.2.1")).toBe(true);
  });

  it("says so when there are no results", () => {
    const { lastFrame } = render(
      <ResultsTable mode="mirror" results={[]} sort={{ column: "latency", direction: "asc" }} />,
    );
    expect(stripAnsi(lastFrame() ?? "").split("\n")[1]).toBe("No results.");
  });
});

describe("small components", () => {
  it("draws progress proportionally", () => {
    expect(progressLine(1, 4, 8)).toBe("██░░░░░░ 1/4");
    expect(progressLine(0, 0, 4)).toBe("░░░░ 0/0");
  });

  it("renders the status text and nothing without one", () => {
    const { lastFrame } = render(<StatusBanner status={{ text: "Benchmark cancelled", tone: "info", expiresAt: 0 }} />);
    expect(stripAnsi(lastFrame() ?? "")).toBe("Benchmark cancelled");

    expect(render(<StatusBanner />).lastFrame()).toBe("");
  });

  it("joins key hints", () => {
    const { lastFrame } = render(<KeyHints hints={["s: Sort", "q: Quit"]} />);
    expect(stripAnsi(lastFrame() ?? "").trim()).toBe("s: Sort | q: Quit");
  });
});
