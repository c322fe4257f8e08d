import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";

import { WorkflowValidationError } from "../errors.js";
import type { BatchFilePlan } from "../models.js";

const FIRST_NAME_ALIASES = ["first_name", "first name", "firstname", "first"];
const LAST_NAME_ALIASES = ["last_name", "last name", "lastname", "last"];
const EMAIL_ALIASES = ["email", "email_address", "email address", "emailwork"];
const DISTRICT_KEYS = new Set(["district", "district_name", "districtname", "district name", "company", "organization"]);

function normalizeHeader(name: string): string {
  return name.trim().toLowerCase();
}

export function pickCsvColumn(headers: string[], aliases: string[]): string | null {
  const byNormalized = new Map<string, string>();
  for (const h of headers) byNormalized.set(normalizeHeader(h), h);
  for (const alias of aliases) {
    const chosen = byNormalized.get(normalizeHeader(alias));
    if (chosen) return chosen;
  }
  return null;
}

export function campaignNameFromPath(csvPath: string): string {
  const base = path.basename(csvPath);
  const stem = path.parse(base).name.replace(/[_-]/g, " ").trim();
  return stem || base;
}

function readRecords(csvPath: string): string[][] {
  const content = fs.readFileSync(csvPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (err) {
    throw new WorkflowValidationError(`Invalid CSV: ${csvPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.map((row: unknown) => (Array.isArray(row) ? row.map((cell: unknown) => String(cell ?? "")) : []));
}

function districtFromRow(headers: string[], row: string[]): string | null {
  for (let i = 0; i < headers.length; i++) {
    const header = headers[i];
    const value = row[i];
    if (header === undefined || value === undefined) continue;
    if (!DISTRICT_KEYS.has(normalizeHeader(header))) continue;
    const cleaned = value.trim();
    if (cleaned) return cleaned;
  }
  return null;
}

/**
 * Reads one CSV into a plan: resolves the first/last/email columns, counts
 * non-blank rows and names the campaign after the first district value
 * found (or the file stem).
 */
export function buildBatchPlan(csvPath: string): BatchFilePlan {
  const [headers, ...rows] = readRecords(csvPath);
  if (!headers || headers.length === 0 || headers.every((h) => !h.trim())) {
    throw new WorkflowValidationError(`CSV has no header row: ${csvPath}`);
  }

  const firstName = pickCsvColumn(headers, FIRST_NAME_ALIASES);
  const lastName = pickCsvColumn(headers, LAST_NAME_ALIASES);
  const email = pickCsvColumn(headers, EMAIL_ALIASES);
  if (firstName === null || lastName === null || email === null) {
    throw new WorkflowValidationError(`CSV missing required columns (first_name,last_name,email): ${csvPath}`);
  }

  let leadCount = 0;
  let districtName: string | null = null;
  for (const row of rows) {
    if (row.some((cell) => cell.trim() !== "")) leadCount += 1;
    if (districtName === null) districtName = districtFromRow(headers, row);
  }

  if (leadCount <= 0) {
    throw new WorkflowValidationError(`CSV contains no lead rows: ${csvPath}`);
  }

  return {
    path: csvPath,
    campaign_name: districtName ?? campaignNameFromPath(csvPath),
    lead_count: leadCount,
    columns_to_map: { first_name: firstName, last_name: lastName, email }
  };
}

/** One plan per `*.csv` in `dir`, in filename order. Never touches the network. */
export function buildBatchPlans(dir: string): BatchFilePlan[] {
  const names = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.endsWith(".csv"))
    .map((d) => d.name)
    .sort();
  return names.map((name) => buildBatchPlan(path.join(dir, name)));
}
