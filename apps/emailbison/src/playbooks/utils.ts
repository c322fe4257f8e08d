import { ExtractionError } from "../errors.js";
import { isRecord, type JsonObject } from "../integrations/http.js";

export function coerceInt(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string") {
    const t = value.trim();
    if (/^\d+$/.test(t)) return Number(t);
  }
  return null;
}

function intField(obj: unknown, key: string): number | null {
  if (!isRecord(obj)) return null;
  const v = obj[key];
  return typeof v === "number" && Number.isInteger(v) ? v : null;
}

export function extractId(raw: JsonObject, what = "campaign"): number {
  const id = intField(raw.data, "id");
  if (id !== null) return id;
  throw new ExtractionError(`Could not extract ${what} id from response: ${JSON.stringify(raw)}`, raw);
}

export function extractStatus(raw: JsonObject): string | null {
  const data = raw.data;
  if (isRecord(data) && typeof data.status === "string") return data.status;
  return null;
}

/** Sequence id and created step ids, when the response carries them. */
export function extractSequenceIds(raw: JsonObject): { sequenceId: number | null; stepIds: number[] | null } {
  const data = raw.data;
  const sequenceId = intField(data, "id");
  let stepIds: number[] | null = null;
  if (isRecord(data) && Array.isArray(data.sequence_steps)) {
    const ids = data.sequence_steps.map((row) => intField(row, "id")).filter((id): id is number => id !== null);
    stepIds = ids.length ? ids : null;
  }
  return { sequenceId, stepIds };
}

// Upload responses vary: the list may be `data`, `data.lead_list`, a
// top-level `lead_list`, or the body itself.
function leadListCandidates(raw: JsonObject, includeTopLevelList: boolean): JsonObject[] {
  const candidates: JsonObject[] = [];
  const data = raw.data;
  if (isRecord(data)) {
    candidates.push(data);
    if (isRecord(data.lead_list)) candidates.push(data.lead_list);
  }
  if (includeTopLevelList && isRecord(raw.lead_list)) candidates.push(raw.lead_list);
  candidates.push(raw);
  return candidates;
}

export function extractLeadListInfo(raw: JsonObject): { leadListId: number; status: string | null } {
  let leadListId: number | null = null;
  let status: string | null = null;
  for (const candidate of leadListCandidates(raw, true)) {
    if (leadListId === null) leadListId = coerceInt(candidate.lead_list_id);
    if (leadListId === null) leadListId = coerceInt(candidate.id);
    if (status === null && typeof candidate.status === "string") status = candidate.status;
    if (leadListId !== null && status !== null) break;
  }
  if (leadListId === null) {
    throw new ExtractionError(`Could not extract lead list id from response: ${JSON.stringify(raw)}`, raw);
  }
  return { leadListId, status };
}

export function extractLeadListStatus(raw: JsonObject): string | null {
  for (const candidate of leadListCandidates(raw, false)) {
    if (typeof candidate.status === "string") return candidate.status;
  }
  return null;
}

export function listOf(raw: JsonObject): unknown[] | null {
  return Array.isArray(raw.data) ? raw.data : null;
}
