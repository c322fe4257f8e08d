import { WorkflowValidationError } from "./errors.js";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Accepts `YYYY-MM-DD` or an ISO datetime and returns the (UTC) calendar date. */
export function parseDateInput(value: string): string {
  const v = value.trim();
  if (DATE_ONLY.test(v)) {
    const d = new Date(`${v}T00:00:00Z`);
    if (!Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === v) return v;
    throw new WorkflowValidationError(`Invalid date: "${value}". Use YYYY-MM-DD.`);
  }
  const ms = Date.parse(v);
  if (!v || Number.isNaN(ms)) {
    throw new WorkflowValidationError(`Invalid datetime: "${value}". Use ISO format (e.g. 2025-01-15 or 2025-01-15T10:00:00Z).`);
  }
  return new Date(ms).toISOString().slice(0, 10);
}
