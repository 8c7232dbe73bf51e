import { Box, Text } from "ink";
import type { Mode, ProbeResult, SortColumn, SortSpec } from "../types";
import { fit, fmtMbps, fmtMs } from "../utils/format";

type Column = {
  key: SortColumn;
  title: string;
  width: number;
  align: "left" | "right";
  cell: (r: ProbeResult) => string;
};

const latency: Column = { key: "latency", title: "Latency", width: 10, align: "right", cell: (r) => fmtMs(r.latencyMs) };
const throughput: Column = {
  key: "throughput",
  title: "Download",
  width: 14,
  align: "right",
  cell: (r) => fmtMbps(r.throughputMbps),
};

export function columnsFor(mode: Mode): Column[] {
  if (mode === "dns") {
    return [
      { key: "identifier", title: "DNS Server", width: 28, align: "left", cell: (r) => r.target.identifier },
      latency,
      throughput,
    ];
  }
  return [
    { key: "label", title: "Mirror", width: 18, align: "left", cell: (r) => r.target.label ?? "" },
    { key: "identifier", title: "URL", width: 40, align: "left", cell: (r) => r.target.identifier },
    latency,
    throughput,
  ];
}

function cell(text: string, column: Column): string {
  return column.align === "right" ? fit(text, column.width).trimEnd().padStart(column.width) : fit(text, column.width);
}

export function headerLine(mode: Mode, sort: SortSpec): string {
  const titles = columnsFor(mode).map((c) =>
    cell(c.key === sort.column ? `${c.title} ${sort.direction === "asc" ? "▲" : "▼"}` : c.title, c),
  );
  return `  ${titles.join(" ")}  Status`;
}

export function detail(r: ProbeResult): string {
  switch (r.status.kind) {
    case "pending":
      return "…";
    case "success":
      return "ok";
    case "timeout":
      return "timeout";
    case "failed":
      return `failed: ${r.status.reason}`;
  }
}

export function rowLine(mode: Mode, r: ProbeResult, isBest: boolean): string {
  const cells = columnsFor(mode).map((c) => cell(c.cell(r), c));
  return `${isBest ? "★" : " "} ${cells.join(" ")}  ${detail(r)}`;
}

const TONE = { pending: "gray", success: "green", timeout: "yellow", failed: "red" } as const;

type Props = {
  mode: Mode;
  results: readonly ProbeResult[];
  sort: SortSpec;
  best?: ProbeResult;
};

export default function ResultsTable({ mode, results, sort, best }: Props) {
  return (
    <Box flexDirection="column">
      <Text bold>{headerLine(mode, sort)}</Text>
      {results.map((r) => (
        <Text key={`${r.index}:${r.target.identifier}`} color={TONE[r.status.kind]} wrap="truncate-end">
          {rowLine(mode, r, best !== undefined && best.index === r.index)}
        </Text>
      ))}
      {results.length === 0 && <Text dimColor>No results.</Text>}
    </Box>
  );
}
