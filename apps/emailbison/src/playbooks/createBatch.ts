import fs from "node:fs";

import {
  ApiError,
  AuthError,
  ExtractionError,
  NetworkError,
  WorkflowValidationError
} from "../errors.js";
import type { EmailBisonClient } from "../integrations/emailbison.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  BatchDryRunResult,
  BatchFilePlan,
  BatchFileResult,
  BatchResult,
  CampaignSchedule,
  CampaignSettings,
  SequenceSpec
} from "../models.js";
import { buildBatchPlans } from "./batchPlan.js";
import { waitForLeadList, type PollOptions } from "./leadListPoller.js";
import { extractId, extractLeadListInfo } from "./utils.js";

export type BatchInputs = {
  settings?: CampaignSettings;
  schedule?: CampaignSchedule;
  sequence?: SequenceSpec;
  senderEmailIds?: number[];
};

export type BatchOptions = BatchInputs & {
  poll?: PollOptions;
  log?: Logger;
  onFileResult?: (result: BatchFileResult) => void;
};

/** Failures that are recorded against one file instead of ending the batch. */
export function isIsolatedFailure(err: unknown): err is Error {
  return (
    err instanceof ApiError ||
    err instanceof AuthError ||
    err instanceof NetworkError ||
    err instanceof ExtractionError ||
    err instanceof WorkflowValidationError
  );
}

/**
 * Checks the batch inputs and builds the worklist. Sender emails are only
 * optional for a dry run.
 */
export function prepareBatch(dir: string, opts: { dryRun: boolean; senderEmailIds?: number[] }): BatchFilePlan[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new WorkflowValidationError(`Directory not found: ${dir}`);
  }
  if (!opts.dryRun && !opts.senderEmailIds?.length) {
    throw new WorkflowValidationError("Missing --sender-email-id (repeatable) unless --dry-run is used.");
  }
  const plans = buildBatchPlans(dir);
  if (!plans.length) throw new WorkflowValidationError(`No CSV files found in ${dir}`);
  return plans;
}

export function dryRunBatch(plans: BatchFilePlan[]): BatchDryRunResult {
  return {
    dry_run: true,
    summary: {
      total_processed: plans.length,
      succeeded: plans.length,
      failed: 0,
      leads_loaded: plans.reduce((n, p) => n + p.lead_count, 0)
    },
    files: plans.map((p) => ({ csv: p.path, campaign_name: p.campaign_name, lead_count: p.lead_count }))
  };
}

async function processPlan(
  client: EmailBisonClient,
  plan: BatchFilePlan,
  opts: BatchOptions,
  log: Logger
): Promise<BatchFileResult> {
  const upload = await client.uploadLeadsCsv(plan.campaign_name, plan.path, plan.columns_to_map);
  const { leadListId, status: initialStatus } = extractLeadListInfo(upload.body);
  const leadListStatus = await waitForLeadList(client, leadListId, initialStatus, { ...opts.poll, log });

  const created = await client.createCampaign(plan.campaign_name, "outbound");
  const campaignId = extractId(created.body);

  if (opts.settings) await client.updateCampaignSettings(campaignId, opts.settings);
  if (opts.schedule) await client.createCampaignSchedule(campaignId, opts.schedule);
  if (opts.sequence) await client.createSequenceSteps(campaignId, opts.sequence);
  if (opts.senderEmailIds?.length) await client.attachSenderEmails(campaignId, opts.senderEmailIds);

  await client.attachLeadList(campaignId, leadListId, false);

  return {
    ok: true,
    csv: plan.path,
    campaign_name: plan.campaign_name,
    campaign_id: campaignId,
    lead_list_id: leadListId,
    lead_list_status: leadListStatus,
    lead_count: plan.lead_count
  };
}

/**
 * Runs upload → poll → create → configure → attach for every plan, one at a
 * time. Anticipated failures are recorded per file and the batch moves on;
 * anything else propagates.
 */
export async function runBatch(client: EmailBisonClient, plans: BatchFilePlan[], opts: BatchOptions = {}): Promise<BatchResult> {
  const log = opts.log ?? createLogger("createBatch");
  const summary = { total_processed: 0, succeeded: 0, failed: 0, leads_loaded: 0 };
  const files: BatchFileResult[] = [];

  for (const plan of plans) {
    summary.total_processed += 1;
    let result: BatchFileResult;
    try {
      result = await processPlan(client, plan, opts, log.child({ csv: plan.path }));
      summary.succeeded += 1;
      summary.leads_loaded += plan.lead_count;
    } catch (err) {
      if (!isIsolatedFailure(err)) throw err;
      summary.failed += 1;
      log.warn({ csv: plan.path, err: err.message }, "Batch file failed");
      result = {
        ok: false,
        csv: plan.path,
        campaign_name: plan.campaign_name,
        lead_count: plan.lead_count,
        error_type: err.name,
        error: err.message
      };
    }
    files.push(result);
    opts.onFileResult?.(result);
  }

  return { dry_run: false, summary, files };
}
