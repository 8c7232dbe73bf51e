import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { isIP } from "node:net";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { LoadReport, Target, TargetKind } from "../types";
import { errorMessage, InputValidationError } from "./errors";

/** Returns the cleaned identifier or throws InputValidationError. */
export function validateIdentifier(raw: string, kind: TargetKind): string {
  const value = raw.trim();
  if (!value) throw new InputValidationError("Target is empty");

  if (kind === "dns") {
    if (isIP(value) === 0) throw new InputValidationError(`Invalid IP address: ${value}`);
    return value;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InputValidationError(`Invalid URL: ${value}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InputValidationError(`Mirror URL must use http or https: ${value}`);
  }
  return value;
}

export function makeTarget(raw: string, kind: TargetKind, label?: string): Target {
  const identifier = validateIdentifier(raw, kind);
  const name = label?.trim();
  return name ? { identifier, kind, label: name } : { identifier, kind };
}

/** Splits a comma-separated list; bad entries are returned, not thrown. */
export function parseTargetList(input: string, kind: TargetKind): { targets: Target[]; rejected: string[] } {
  const targets: Target[] = [];
  const rejected: string[] = [];
  for (const part of input.split(",")) {
    if (!part.trim()) continue;
    try {
      targets.push(makeTarget(part, kind));
    } catch (e) {
      if (!(e instanceof InputValidationError)) throw e;
      rejected.push(part.trim());
    }
  }
  return { targets, rejected };
}

const rowSchema = z.object({
  ip: z.string().optional(),
  url: z.string().optional(),
  name: z.string().optional(),
  label: z.string().optional(),
});

type Row = z.infer<typeof rowSchema>;

function rowsToReport(rows: readonly unknown[], kind: TargetKind): LoadReport {
  const targets: Target[] = [];
  let skipped = 0;
  for (const raw of rows) {
    const row = rowSchema.safeParse(raw);
    const identifier = row.success ? pickIdentifier(row.data, kind) : undefined;
    if (!row.success || identifier === undefined) {
      skipped++;
      continue;
    }
    try {
      targets.push(makeTarget(identifier, kind, row.data.name ?? row.data.label));
    } catch (e) {
      if (!(e instanceof InputValidationError)) throw e;
      skipped++;
    }
  }
  return { targets, skipped };
}

function pickIdentifier(row: Row, kind: TargetKind): string | undefined {
  return kind === "dns" ? (row.ip ?? row.url) : (row.url ?? row.ip);
}

const records = z.array(z.unknown());

/** CSV with a header row naming an `ip` or `url` column; `name`/`label` are optional. */
export function parseCsvTargets(text: string, kind: TargetKind): LoadReport {
  let headers: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: (header: string[]) => {
        headers = header.map((h) => h.trim().toLowerCase());
        return headers;
      },
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (e) {
    throw new InputValidationError(`Could not parse CSV: ${errorMessage(e)}`);
  }
  if (headers.length > 0 && !headers.includes("ip") && !headers.includes("url")) {
    throw new InputValidationError("CSV needs an ip or url column");
  }
  const rows = records.safeParse(parsed);
  if (!rows.success) throw new InputValidationError("CSV rows could not be read");
  return rowsToReport(rows.data, kind);
}

/** JSON array of objects with an `ip` or `url` field. */
export function parseJsonTargets(text: string, kind: TargetKind): LoadReport {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new InputValidationError(`Could not parse JSON: ${errorMessage(e)}`);
  }
  const rows = records.safeParse(data);
  if (!rows.success) throw new InputValidationError("JSON target file must contain an array");
  return rowsToReport(rows.data, kind);
}

export function isTargetFile(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === ".csv" || ext === ".json";
}

export async function loadTargetsFile(path: string, kind: TargetKind): Promise<LoadReport> {
  const text = await readFile(path, "utf8");
  return extname(path).toLowerCase() === ".csv" ? parseCsvTargets(text, kind) : parseJsonTargets(text, kind);
}
