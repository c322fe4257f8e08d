import type { Command } from "commander";

import { isRecord } from "../integrations/http.js";
import { runPreflight, startCampaign } from "../playbooks/preflight.js";
import { StepLog } from "../playbooks/stepLog.js";
import { parseDateInput } from "../time.js";
import {
  addBaseUrlOption,
  collectInt,
  createOutput,
  field,
  guarded,
  parseIntArg,
  recordLines,
  withCommandClient,
  type CommandContext
} from "./shared.js";

type BaseFlags = { baseUrl?: string };

function campaignIdArg(cmd: Command): Command {
  return cmd.argument("<campaignId>", "Campaign id.", parseIntArg);
}

export function registerCampaignAdminCommands(campaign: Command, ctx: CommandContext) {
  const out = createOutput(ctx);

  addBaseUrlOption(
    campaign
      .command("list")
      .description("List campaigns.")
      .option("--search <text>", "Filter by name.")
      .option("--status <status>", "Filter by status.")
      .option("--tag-id <id>", "Filter by tag (repeatable).", collectInt, [])
  ).action(
    guarded(ctx, async (flags: BaseFlags & { search?: string; status?: string; tagId: number[] }) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.listCampaigns({ search: flags.search, status: flags.status, tag_ids: flags.tagId })
      );
      out.result(
        res.body,
        recordLines(res.body, (r) => `id=${field(r, "id")} status=${field(r, "status")} name=${field(r, "name")}`)
      );
    })
  );

  addBaseUrlOption(campaignIdArg(campaign.command("get").description("Show campaign details."))).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.campaignDetails(campaignId));
      out.result(res.body);
    })
  );

  const lifecycle = [
    { name: "pause", description: "Pause a campaign.", call: "pauseCampaign" },
    { name: "resume", description: "Resume a paused campaign (no preflight).", call: "resumeCampaign" },
    { name: "archive", description: "Archive a campaign.", call: "archiveCampaign" }
  ] as const;
  for (const spec of lifecycle) {
    addBaseUrlOption(campaignIdArg(campaign.command(spec.name).description(spec.description))).action(
      guarded(ctx, async (campaignId: number, flags: BaseFlags) => {
        const res = await withCommandClient(ctx, flags.baseUrl, (client) => client[spec.call](campaignId));
        out.result(res.body);
      })
    );
  }

  addBaseUrlOption(
    campaignIdArg(campaign.command("start").description("Run preflight checks, then resume the campaign.")).option(
      "--force",
      "Start even when preflight checks fail."
    )
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { force?: boolean }) => {
      const steps = new StepLog();
      const outcome = await withCommandClient(ctx, flags.baseUrl, (client) =>
        startCampaign(client, campaignId, steps, Boolean(flags.force))
      );
      const lines = [`id=${campaignId} started status=${outcome.status ?? ""}`];
      if (outcome.preflight.missing.length) lines.push(`preflight warnings: ${outcome.preflight.missing.join(", ")}`);
      out.result({ campaign_id: campaignId, ...outcome, steps: steps.steps }, lines);
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("preflight").description("Report what a campaign is missing before it can start."))
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags) => {
      const report = await withCommandClient(ctx, flags.baseUrl, (client) =>
        runPreflight(client, campaignId, new StepLog())
      );
      out.result(
        { campaign_id: campaignId, ...report },
        [report.missing.length ? `missing: ${report.missing.join(", ")}` : "ready"]
      );
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("sender-emails").description("List sender emails attached to a campaign."))
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.getCampaignSenderEmails(campaignId));
      out.result(
        res.body,
        recordLines(res.body, (r) => `id=${field(r, "id")} status=${field(r, "status")} email=${field(r, "email")}`)
      );
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("attach-sender-emails").description("Attach sender emails to a campaign.")).requiredOption(
      "--sender-email-id <id>",
      "Sender email id (repeatable).",
      collectInt
    )
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { senderEmailId: number[] }) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.attachSenderEmails(campaignId, flags.senderEmailId)
      );
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("remove-sender-emails").description("Detach sender emails from a campaign.")).requiredOption(
      "--sender-email-id <id>",
      "Sender email id (repeatable).",
      collectInt
    )
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { senderEmailId: number[] }) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.removeSenderEmails(campaignId, flags.senderEmailId)
      );
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("stats").description("Campaign statistics for a date range."))
      .requiredOption("--start <date>", "Start date (YYYY-MM-DD or ISO datetime).")
      .requiredOption("--end <date>", "End date (YYYY-MM-DD or ISO datetime).")
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { start: string; end: string }) => {
      const startDate = parseDateInput(flags.start);
      const endDate = parseDateInput(flags.end);
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.campaignStats(campaignId, startDate, endDate)
      );
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("summary").description("Campaign details and statistics in one view."))
      .requiredOption("--start <date>", "Start date (YYYY-MM-DD or ISO datetime).")
      .requiredOption("--end <date>", "End date (YYYY-MM-DD or ISO datetime).")
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { start: string; end: string }) => {
      const startDate = parseDateInput(flags.start);
      const endDate = parseDateInput(flags.end);
      const summary = await withCommandClient(ctx, flags.baseUrl, async (client) => {
        const details = await client.campaignDetails(campaignId);
        const stats = await client.campaignStats(campaignId, startDate, endDate);
        return {
          campaign: details.body.data ?? details.body,
          stats: stats.body.data ?? stats.body,
          range: { start_date: startDate, end_date: endDate }
        };
      });
      const c = isRecord(summary.campaign) ? summary.campaign : {};
      out.result(summary, [
        `id=${field(c, "id") || campaignId} status=${field(c, "status")} name=${field(c, "name")}`,
        `range=${startDate}..${endDate}`,
        JSON.stringify(summary.stats, null, 2)
      ]);
    })
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("replies").description("List replies received by a campaign."))
      .option("--search <text>", "Full-text filter.")
      .option("--status <status>", "Reply status filter.")
      .option("--folder <folder>", "Folder filter.")
      .option("--read", "Only read replies.")
      .option("--unread", "Only unread replies.")
      .option("--sender-email-id <id>", "Filter by sender email.", parseIntArg)
      .option("--lead-id <id>", "Filter by lead.", parseIntArg)
      .option("--tag-id <id>", "Filter by tag (repeatable).", collectInt, [])
  ).action(
    guarded(
      ctx,
      async (
        campaignId: number,
        flags: BaseFlags & {
          search?: string;
          status?: string;
          folder?: string;
          read?: boolean;
          unread?: boolean;
          senderEmailId?: number;
          leadId?: number;
          tagId: number[];
        }
      ) => {
        const read = flags.read ? true : flags.unread ? false : undefined;
        const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
          client.campaignReplies(campaignId, {
            search: flags.search,
            status: flags.status,
            folder: flags.folder,
            read,
            sender_email_id: flags.senderEmailId,
            lead_id: flags.leadId,
            tag_ids: flags.tagId
          })
        );
        out.result(
          res.body,
          recordLines(
            res.body,
            (r) => `id=${field(r, "id")} from=${field(r, "from_email_address")} subject=${field(r, "subject")}`
          )
        );
      }
    )
  );

  addBaseUrlOption(
    campaignIdArg(campaign.command("stop-future-emails").description("Stop future emails for specific leads.")).requiredOption(
      "--lead-id <id>",
      "Lead id (repeatable).",
      collectInt
    )
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { leadId: number[] }) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.stopFutureEmails(campaignId, flags.leadId));
      out.result(res.body);
    })
  );
}
