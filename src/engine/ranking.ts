import type { BestBy, Mode, ProbeResult, SortColumn, SortSpec } from "../types";

const isSuccess = (r: ProbeResult) => r.status.kind === "success";

function metric(r: ProbeResult, column: "latency" | "throughput"): number | undefined {
  if (!isSuccess(r)) return undefined;
  return column === "latency" ? r.latencyMs : r.throughputMbps;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compare(a: ProbeResult, b: ProbeResult, spec: SortSpec): number {
  const sign = spec.direction === "asc" ? 1 : -1;
  switch (spec.column) {
    case "identifier":
      return sign * compareText(a.target.identifier, b.target.identifier);
    case "label":
      return sign * compareText(a.target.label ?? a.target.identifier, b.target.label ?? b.target.identifier);
    case "latency":
    case "throughput": {
      const av = metric(a, spec.column);
      const bv = metric(b, spec.column);
      // Anything that did not succeed stays below every success, whichever way we sort.
      if (av === undefined && bv === undefined) return 0;
      if (av === undefined) return 1;
      if (bv === undefined) return -1;
      return sign * (av - bv);
    }
  }
}

/** Stable: equal keys keep their order in `results`. Never mutates the input. */
export function sortResults(results: readonly ProbeResult[], spec: SortSpec): ProbeResult[] {
  return results
    .map((result, position) => ({ result, position }))
    .sort((a, b) => compare(a.result, b.result, spec) || a.position - b.position)
    .map(({ result }) => result);
}

/**
 * Best successful result. `latency` ranks by lowest latency with higher
 * throughput as tie-break; `throughput` the other way round. Input order
 * settles anything left.
 */
export function pickBest(results: readonly ProbeResult[], bestBy: BestBy = "latency"): ProbeResult | undefined {
  let best: ProbeResult | undefined;
  for (const r of results) {
    if (r.latencyMs === undefined || r.throughputMbps === undefined || !isSuccess(r)) continue;
    if (!best || beats(r, best, bestBy)) best = r;
  }
  return best;
}

function beats(r: ProbeResult, best: ProbeResult, bestBy: BestBy): boolean {
  const latency = (r.latencyMs ?? Infinity) - (best.latencyMs ?? Infinity);
  const throughput = (r.throughputMbps ?? 0) - (best.throughputMbps ?? 0);
  const [primary, secondary] = bestBy === "latency" ? [-latency, throughput] : [throughput, -latency];
  if (primary !== 0) return primary > 0;
  if (secondary !== 0) return secondary > 0;
  return r.index < best.index;
}

export function defaultSort(bestBy: BestBy): SortSpec {
  return bestBy === "latency" ? { column: "latency", direction: "asc" } : { column: "throughput", direction: "desc" };
}

export function sortColumnsFor(mode: Mode): SortColumn[] {
  return mode === "mirror" ? ["identifier", "latency", "throughput", "label"] : ["identifier", "latency", "throughput"];
}

export function nextSortColumn(current: SortColumn, mode: Mode): SortColumn {
  const columns = sortColumnsFor(mode);
  const at = columns.indexOf(current);
  return columns[(at + 1) % columns.length];
}
