import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Mode, ProbeResult } from "../types";
import { logger } from "./logger";

export function toSafeName(input: string, fallback = "data") {
  const base = (input || fallback).trim();
  return base.replace(/[^a-zA-Z0-9._-]/g, "_");
}

export function exportFileName(mode: Mode, at: Date = new Date()): string {
  const ts = at.toISOString().replace(/[:.]/g, "-");
  return `dnspeed-${toSafeName(mode)}-${ts}.csv`;
}

/** Writes `csv` into `dir` and returns the full path. */
export async function saveCsvAs(csv: string, suggestedName: string, dir: string = process.cwd()): Promise<string> {
  const path = join(dir, toSafeName(suggestedName, "results.csv"));
  try {
    await writeFile(path, csv, "utf8");
  } catch (err) {
    logger.error("Failed to export CSV:", err);
    throw err;
  }
  return path;
}

function csvEscape(value: string): string {
  const needsQuotes = /[",\n\r]/.test(value);
  const out = value.replace(/"/g, '""');
  return needsQuotes ? `"${out}"` : out;
}

function num(v: number | undefined, digits: number): string {
  return v != null && Number.isFinite(v) ? v.toFixed(digits) : "";
}

export function toResultsCsv(results: readonly ProbeResult[]): string {
  const headers = ["identifier", "label", "status", "latency_ms", "throughput_mbps", "error"];
  const lines: string[] = [];
  lines.push(headers.join(","));
  for (const r of results) {
    const row = [
      r.target.identifier,
      r.target.label ?? "",
      r.status.kind,
      num(r.latencyMs, 1),
      num(r.throughputMbps, 2),
      r.status.kind === "failed" ? r.status.reason : "",
    ].map(csvEscape);
    lines.push(row.join(","));
  }
  return lines.join("\n");
}
