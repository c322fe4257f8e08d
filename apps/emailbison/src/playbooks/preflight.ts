import { WorkflowValidationError } from "../errors.js";
import { isRecord } from "../integrations/http.js";
import type { EmailBisonClient } from "../integrations/emailbison.js";
import { extractStatus, listOf } from "./utils.js";
import type { StepLog } from "./stepLog.js";

export type PreflightReport = {
  total_leads: number | null;
  sender_email_count: number;
  sequence_step_count: number;
  missing: string[];
};

export type StartOutcome = {
  started: true;
  status: string | null;
  preflight: PreflightReport;
};

/**
 * Readiness checks before a campaign is resumed. All conditions are
 * collected; nothing short-circuits.
 */
export async function runPreflight(client: EmailBisonClient, campaignId: number, steps: StepLog): Promise<PreflightReport> {
  const missing: string[] = [];

  const details = await steps.run("campaign.details", () => client.campaignDetails(campaignId));
  const data = details.body.data;
  const totalLeads = isRecord(data) && Number.isInteger(data.total_leads) ? Number(data.total_leads) : null;
  if (!totalLeads) missing.push("no leads attached");

  const senders = await steps.run("campaign.sender_emails", () => client.getCampaignSenderEmails(campaignId));
  const senderRows = listOf(senders.body) ?? [];
  if (senderRows.length === 0) missing.push("no sender emails attached");

  const sequence = await steps.run("campaign.sequence.get", () => client.getSequenceSteps(campaignId));
  const seqData = sequence.body.data;
  const seqSteps = isRecord(seqData) && Array.isArray(seqData.sequence_steps) ? seqData.sequence_steps : [];
  if (seqSteps.length === 0) missing.push("no sequence steps");

  return {
    total_leads: totalLeads,
    sender_email_count: senderRows.length,
    sequence_step_count: seqSteps.length,
    missing
  };
}

/** Preflight, then resume and read back the resulting status. */
export async function startCampaign(
  client: EmailBisonClient,
  campaignId: number,
  steps: StepLog,
  force = false
): Promise<StartOutcome> {
  const preflight = await runPreflight(client, campaignId, steps);
  if (preflight.missing.length && !force) {
    throw new WorkflowValidationError(
      `Refusing to start campaign (preflight failed): ${preflight.missing.join(", ")}`
    );
  }

  await steps.run("campaign.resume", () => client.resumeCampaign(campaignId));
  const after = await steps.run("campaign.details_after_start", () => client.campaignDetails(campaignId));
  return { started: true, status: extractStatus(after.body), preflight };
}
