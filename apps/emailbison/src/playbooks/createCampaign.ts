import { nanoid } from "nanoid";

import { CampaignWorkflowError, WorkflowValidationError } from "../errors.js";
import { isRecord } from "../integrations/http.js";
import type { EmailBisonClient } from "../integrations/emailbison.js";
import { createLogger, type Logger } from "../logger.js";
import type { CampaignCreateSpec, CreateCampaignResult, SenderEmailSelector } from "../models.js";
import { startCampaign } from "./preflight.js";
import { StepLog } from "./stepLog.js";
import { extractId, extractSequenceIds, extractStatus, listOf } from "./utils.js";

/**
 * Client-side half of selector resolution: exact status match, ascending id
 * order, then the first `limit`.
 */
export function selectSenderEmailIds(rows: unknown[], selector: SenderEmailSelector): number[] {
  const candidates: number[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const id = row.id;
    if (typeof id !== "number" || !Number.isInteger(id)) continue;
    if (selector.status !== undefined && String(row.status) !== selector.status) continue;
    candidates.push(id);
  }
  return candidates.sort((a, b) => a - b).slice(0, selector.limit);
}

export async function resolveSenderEmailIds(
  client: EmailBisonClient,
  selector: SenderEmailSelector,
  steps: StepLog
): Promise<number[]> {
  const res = await steps.run("sender_emails.list", () =>
    client.listSenderEmails({
      search: selector.search,
      tag_ids: selector.tag_ids,
      excluded_tag_ids: selector.excluded_tag_ids,
      without_tags: selector.without_tags
    })
  );
  const ids = selectSenderEmailIds(listOf(res.body) ?? [], selector);
  if (!ids.length) {
    throw new WorkflowValidationError(
      "No sender emails matched sender_emails selector. Try `emailbison sender-emails list` to inspect available accounts."
    );
  }
  return ids;
}

export type CreateCampaignOptions = {
  log?: Logger;
};

/**
 * Provisions one campaign: create, settings, schedule, sequence, sender
 * emails, leads, then an optional preflighted start. Any failure aborts the
 * run; the partially built campaign is left in place and the error carries
 * the campaign id and steps so far.
 */
export async function createCampaignWorkflow(
  client: EmailBisonClient,
  spec: CampaignCreateSpec,
  opts: CreateCampaignOptions = {}
): Promise<CreateCampaignResult> {
  const runId = nanoid(10);
  const log = (opts.log ?? createLogger("createCampaign")).child({ runId });
  const steps = new StepLog(log);
  let campaignId: number | null = null;

  try {
    const created = await steps.run("campaign.create", () => client.createCampaign(spec.name, spec.type));
    const id = extractId(created.body);
    campaignId = id;
    log.info({ campaignId: id, name: spec.name }, "Campaign created");

    if (spec.settings) {
      const settings = spec.settings;
      await steps.run("campaign.update_settings", () => client.updateCampaignSettings(id, settings));
    }

    if (spec.schedule) {
      const schedule = spec.schedule;
      await steps.run("campaign.schedule", () => client.createCampaignSchedule(id, schedule));
    }

    let sequenceId: number | null = null;
    let sequenceStepIds: number[] | null = null;
    if (spec.sequence) {
      const sequence = spec.sequence;
      const res = await steps.run("campaign.sequence.create", () => client.createSequenceSteps(id, sequence));
      ({ sequenceId, stepIds: sequenceStepIds } = extractSequenceIds(res.body));
    }

    let senderIds: number[] | null = null;
    if (spec.sender_email_ids) {
      senderIds = spec.sender_email_ids;
    } else if (spec.sender_emails) {
      senderIds = await resolveSenderEmailIds(client, spec.sender_emails, steps);
    }

    let attachedSenderIds: number[] | null = null;
    if (senderIds?.length) {
      const ids = senderIds;
      await steps.run("campaign.attach_sender_emails", () => client.attachSenderEmails(id, ids));
      attachedSenderIds = ids;
    }

    const leads = spec.leads;
    if (leads?.lead_list_id !== undefined) {
      const leadListId = leads.lead_list_id;
      await steps.run("campaign.attach_lead_list", () =>
        client.attachLeadList(id, leadListId, leads.allow_parallel_sending)
      );
    } else if (leads?.lead_ids !== undefined) {
      const leadIds = leads.lead_ids;
      await steps.run("campaign.attach_leads", () => client.attachLeads(id, leadIds, leads.allow_parallel_sending));
    }

    let started = false;
    let startStatus: string | null = null;
    if (spec.start) {
      const outcome = await startCampaign(client, id, steps, spec.force_start);
      started = outcome.started;
      startStatus = outcome.status;
    }

    return {
      run_id: runId,
      id,
      name: spec.name,
      status: extractStatus(created.body),
      sender_email_ids: attachedSenderIds,
      sequence_id: sequenceId,
      sequence_step_ids: sequenceStepIds,
      started,
      start_status: startStatus,
      steps: steps.steps,
      raw: created.body
    };
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    log.warn({ campaignId, err: cause.message }, "Campaign workflow aborted");
    throw new CampaignWorkflowError(cause, campaignId, steps.steps, runId);
  }
}
