import { setTimeout as sleepMs } from "node:timers/promises";

import { LeadListTimeoutError, WorkflowValidationError } from "../errors.js";
import type { JsonResponse } from "../integrations/http.js";
import type { Logger } from "../logger.js";
import { extractLeadListStatus } from "./utils.js";

export const LEAD_LIST_PENDING_STATUSES = new Set(["unprocessed", "processing", "pending", "queued"]);
export const LEAD_LIST_FAILED_STATUSES = new Set(["failed", "error"]);
export const LEAD_LIST_POLL_INTERVAL_MS = 2000;
export const LEAD_LIST_POLL_TIMEOUT_MS = 300_000;

export type LeadListState = "pending" | "failed" | "ready";

export type LeadListSource = {
  getLeadList(leadListId: number): Promise<JsonResponse>;
};

export type PollOptions = {
  intervalMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
  log?: Logger;
};

/** Unrecognised statuses count as ready. */
export function classifyLeadListStatus(status: string): LeadListState {
  const normalized = status.trim().toLowerCase();
  if (LEAD_LIST_FAILED_STATUSES.has(normalized)) return "failed";
  if (LEAD_LIST_PENDING_STATUSES.has(normalized)) return "pending";
  return "ready";
}

/**
 * Blocks until the uploaded lead list leaves its pending state and returns
 * the final status. A poll without a readable status counts as pending.
 */
export async function waitForLeadList(
  source: LeadListSource,
  leadListId: number,
  initialStatus: string | null,
  opts: PollOptions = {}
): Promise<string> {
  const intervalMs = opts.intervalMs ?? LEAD_LIST_POLL_INTERVAL_MS;
  const timeoutMs = opts.timeoutMs ?? LEAD_LIST_POLL_TIMEOUT_MS;
  const sleep = opts.sleep ?? sleepMs;
  const now = opts.now ?? Date.now;

  if (initialStatus) {
    const state = classifyLeadListStatus(initialStatus);
    if (state === "failed") {
      throw new WorkflowValidationError(`Lead list ${leadListId} failed immediately: ${initialStatus}`);
    }
    if (state === "ready") return initialStatus;
  }

  const start = now();
  let polls = 0;
  while (now() - start <= timeoutMs) {
    const { body } = await source.getLeadList(leadListId);
    polls += 1;
    const status = extractLeadListStatus(body);
    if (status !== null) {
      const state = classifyLeadListStatus(status);
      if (state === "failed") {
        throw new WorkflowValidationError(`Lead list ${leadListId} processing failed: ${status}`);
      }
      if (state === "ready") {
        opts.log?.info({ leadListId, status, polls }, "Lead list processed");
        return status;
      }
    }
    opts.log?.debug({ leadListId, status, polls }, "Lead list still pending");
    await sleep(intervalMs);
  }

  throw new LeadListTimeoutError(leadListId, timeoutMs);
}
