import { describe, expect, it } from "@jest/globals";
import { render } from "ink-testing-library";
import type { ProbeResult } from "../../types";
import InputPage from "../InputPage";
import ResultsPage from "../ResultsPage";
import RunningPage from "../RunningPage";

const stripAnsi = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, "");

const frameText = (frame: string | undefined) => stripAnsi(frame ?? "");

const success: ProbeResult = {
  target: { identifier: "9.9.9.9", kind: "dns", label: "Quad9" },
  index: 0,
  status: { kind: "success" },
  latencyMs: 18.2,
  throughputMbps: 64.5,
};

const timedOut: ProbeResult = {
  target: { identifier: "192.0.2.1", kind: "dns" },
  index: 1,
  status: { kind: "timeout" },
};

describe("InputPage", () => {
  it("lists targets with their labels and shows the draft", () => {
    const { lastFrame } = render(
      <InputPage
        mode="dns"
        targets={[{ identifier: "1.1.1.1", kind: "dns" }, success.target]}
        draft="8.8"
        error="Invalid IP address: nope"
      />,
    );
    const text = frameText(lastFrame());

    expect(text).toContain("Targets (2)");
    expect(text).toContain("  1. 1.1.1.1");
    expect(text).toContain("  2. Quad9  9.9.9.9");
    expect(text).toContain("DNS IP › 8.8");
    expect(text.split("\n").pop()).toBe("Invalid IP address: nope");
  });

  it("prompts for mirrors when the list is empty", () => {
    const text = frameText(render(<InputPage mode="mirror" targets={[]} draft="" />).lastFrame());

    expect(text).toContain("No mirrors yet. Type one below and press Enter.");
    expect(text).toContain("Mirror URL › ");
  });
});

describe("RunningPage", () => {
  it("shows the current target, progress and the latest result", () => {
    const text = frameText(
      render(
        <RunningPage
          frame={0}
          completed={1}
          total={2}
          current={timedOut.target}
          last={success}
          best={success}
          timeoutMs={7500}
        />,
      ).lastFrame(),
    );
    const lines = text.split("\n");

    expect(lines[0]).toBe("⠋ Testing 192.0.2.1  (limit 7.5s per target)");
    expect(lines[2]).toBe(`${"█".repeat(15)}${"░".repeat(15)} 1/2`);
    expect(lines).toContain("9.9.9.9  18 ms  64.50 Mbps");
  });

  it("waits for the first result", () => {
    const text = frameText(render(<RunningPage frame={3} completed={0} total={2} timeoutMs={2000} />).lastFrame());

    expect(text.split("\n")[0]).toBe("⠸ Finishing…  (limit 2.0s per target)");
    expect(text).toContain("No tests completed yet.");
    expect(text).toContain("Awaiting best result...");
  });
});

describe("ResultsPage", () => {
  it("summarises the run and names the fastest target", () => {
    const text = frameText(
      render(
        <ResultsPage
          mode="dns"
          results={[success, timedOut]}
          sort={{ column: "latency", direction: "asc" }}
          best={success}
          runStatus="cancelled"
        />,
      ).lastFrame(),
    );
    const lines = text.split("\n");

    expect(lines[0]).toBe("Results (cancelled)  1 ok, 1 failed or timed out");
    expect(lines[lines.length - 1]).toBe("Fastest: Quad9  18 ms  64.50 Mbps");
  });

  it("says when nothing succeeded", () => {
    const text = frameText(
      render(
        <ResultsPage mode="dns" results={[timedOut]} sort={{ column: "latency", direction: "asc" }} runStatus="completed" />,
      ).lastFrame(),
    );

    expect(text.split("\n")[0]).toBe("Results  0 ok, 1 failed or timed out");
    expect(text.split("\n").pop()).toBe("No target completed successfully.");
  });
});
