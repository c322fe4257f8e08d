import path from "node:path";
import { Option, type Command } from "commander";

import { createLogger } from "../logger.js";
import {
  CampaignCreateSpecSchema,
  CampaignScheduleSchema,
  CampaignSettingsSchema,
  SequenceSpecSchema,
  type BatchFileResult,
  type BatchSummary,
  type CampaignCreateSpec,
  type CampaignCreateSpecInput
} from "../models.js";
import { dryRunBatch, prepareBatch, runBatch } from "../playbooks/createBatch.js";
import { createCampaignWorkflow } from "../playbooks/createCampaign.js";
import { redactToken } from "../security.js";
import { registerCampaignAdminCommands } from "./campaignAdmin.js";
import { registerSequenceCommands } from "./campaignSequence.js";
import {
  addBaseUrlOption,
  collectInt,
  createOutput,
  guarded,
  loadJsonFile,
  parseIntArg,
  validate,
  withCommandClient,
  type CommandContext
} from "./shared.js";

type CreateFlags = {
  file?: string;
  name?: string;
  type: string;
  senderEmailId: number[];
  leadListId?: number;
  leadId: number[];
  allowParallelSending?: boolean;
  settingsFile?: string;
  scheduleFile?: string;
  sequenceFile?: string;
  start?: boolean;
  forceStart?: boolean;
  baseUrl?: string;
};

type BatchFlags = {
  dir: string;
  dryRun?: boolean;
  senderEmailId: number[];
  settingsFile?: string;
  scheduleFile?: string;
  sequenceFile?: string;
  baseUrl?: string;
};

/**
 * A `--file` spec is taken as-is (its `start`/`force_start` can still be
 * switched on from the command line); otherwise the campaign spec is built from
 * flags.
 */
export function specFromFlags(flags: CreateFlags): CampaignCreateSpec {
  if (flags.file) {
    const raw = loadJsonFile(flags.file, "Campaign spec");
    if (flags.start) raw.start = true;
    if (flags.forceStart) raw.force_start = true;
    return validate(CampaignCreateSpecSchema, raw);
  }

  const input: CampaignCreateSpecInput = {
    name: flags.name ?? "",
    type: flags.type === "reply_followup" ? "reply_followup" : "outbound",
    start: Boolean(flags.start),
    force_start: Boolean(flags.forceStart)
  };
  if (flags.senderEmailId.length) input.sender_email_ids = flags.senderEmailId;
  if (flags.leadListId !== undefined || flags.leadId.length) {
    input.leads = {
      lead_list_id: flags.leadListId,
      lead_ids: flags.leadId.length ? flags.leadId : undefined,
      allow_parallel_sending: Boolean(flags.allowParallelSending)
    };
  }
  if (flags.settingsFile) input.settings = validate(CampaignSettingsSchema, loadJsonFile(flags.settingsFile, "Settings file"));
  if (flags.scheduleFile) input.schedule = validate(CampaignScheduleSchema, loadJsonFile(flags.scheduleFile, "Schedule file"));
  if (flags.sequenceFile) input.sequence = validate(SequenceSpecSchema, loadJsonFile(flags.sequenceFile, "Sequence file"));
  return validate(CampaignCreateSpecSchema, input);
}

export function formatBatchFileLine(result: BatchFileResult): string {
  const csv = path.basename(result.csv);
  if (result.ok) {
    return `ok csv=${csv} campaign_id=${result.campaign_id} lead_list_id=${result.lead_list_id} leads=${result.lead_count}`;
  }
  return `error csv=${csv}: ${result.error}`;
}

export function formatBatchSummary(s: BatchSummary): string {
  return `summary: total_processed=${s.total_processed} succeeded=${s.succeeded} failed=${s.failed} leads_loaded=${s.leads_loaded}`;
}

function addSharedInputOptions(cmd: Command): Command {
  return cmd
    .option("--settings-file <path>", "JSON file with campaign settings.")
    .option("--schedule-file <path>", "JSON file with the sending schedule.")
    .option("--sequence-file <path>", "JSON file with the sequence (title + sequence_steps).");
}

export function registerCampaignCommands(program: Command, ctx: CommandContext) {
  const out = createOutput(ctx);
  const campaign = program.command("campaign").description("Create and manage campaigns.");

  const create = campaign
    .command("create")
    .description("Create a campaign and configure it end to end.")
    .option("--file <path>", "JSON campaign spec.")
    .option("--name <name>", "Campaign name.")
    .addOption(new Option("--type <type>", "Campaign type.").choices(["outbound", "reply_followup"]).default("outbound"))
    .option("--sender-email-id <id>", "Sender email id to attach (repeatable).", collectInt, [])
    .option("--lead-list-id <id>", "Existing lead list to attach.", parseIntArg)
    .option("--lead-id <id>", "Lead id to attach (repeatable).", collectInt, [])
    .option("--allow-parallel-sending", "Allow leads already in other campaigns.")
    .option("--start", "Start the campaign after preflight checks.")
    .option("--force-start", "Start even when preflight checks fail.");
  addSharedInputOptions(create);
  addBaseUrlOption(create);
  create.action(
    guarded(ctx, async (flags: CreateFlags) => {
      const spec = specFromFlags(flags);
      const result = await withCommandClient(ctx, flags.baseUrl, async (client) => {
        if (ctx.globals().debug) {
          out.debug(`base_url=${client.settings.baseUrl}`);
          out.debug(`auth=Bearer ${redactToken(client.settings.apiToken)}`);
        }
        return createCampaignWorkflow(client, spec);
      });

      const lines = [`id=${result.id} name=${result.name} status=${result.status ?? ""}`];
      if (result.sender_email_ids) lines.push(`sender_email_ids=${result.sender_email_ids.join(",")}`);
      if (result.sequence_id !== null) lines.push(`sequence_id=${result.sequence_id}`);
      if (result.started) lines.push(`started status=${result.start_status ?? ""}`);
      if (ctx.globals().debug) {
        for (const s of result.steps) out.debug(`${s.name} ${s.method} ${s.url} -> ${s.status_code ?? "-"}`);
      }
      out.result(result, lines);
    })
  );

  const batch = campaign
    .command("create-batch")
    .description("Create one campaign per CSV file in a directory.")
    .requiredOption("--dir <path>", "Directory containing *.csv lead files.")
    .option("--dry-run", "Validate the CSV files without calling the API.")
    .option("--sender-email-id <id>", "Sender email id to attach to every campaign (repeatable).", collectInt, []);
  addSharedInputOptions(batch);
  addBaseUrlOption(batch);
  batch.action(
    guarded(ctx, async (flags: BatchFlags) => {
      const dir = path.resolve(flags.dir);
      const plans = prepareBatch(dir, { dryRun: Boolean(flags.dryRun), senderEmailIds: flags.senderEmailId });

      const settings = flags.settingsFile
        ? validate(CampaignSettingsSchema, loadJsonFile(flags.settingsFile, "Settings file"))
        : undefined;
      const schedule = flags.scheduleFile
        ? validate(CampaignScheduleSchema, loadJsonFile(flags.scheduleFile, "Schedule file"))
        : undefined;
      const sequence = flags.sequenceFile
        ? validate(SequenceSpecSchema, loadJsonFile(flags.sequenceFile, "Sequence file"))
        : undefined;

      if (flags.dryRun) {
        const result = dryRunBatch(plans);
        out.result(result, [
          ...result.files.map((f) => `[DRY-RUN] csv=${path.basename(f.csv)} campaign=${f.campaign_name} leads=${f.lead_count}`),
          formatBatchSummary(result.summary)
        ]);
        return;
      }

      const json = ctx.globals().json;
      const result = await withCommandClient(ctx, flags.baseUrl, (client) =>
        runBatch(client, plans, {
          settings,
          schedule,
          sequence,
          senderEmailIds: flags.senderEmailId,
          poll: ctx.io.poll,
          log: createLogger("campaign.create-batch"),
          onFileResult: json
            ? undefined
            : (r) => (r.ok ? out.line(formatBatchFileLine(r)) : ctx.io.stderr(formatBatchFileLine(r)))
        })
      );

      out.result(result, [formatBatchSummary(result.summary)]);
    })
  );

  registerCampaignAdminCommands(campaign, ctx);
  registerSequenceCommands(campaign, ctx);
}
