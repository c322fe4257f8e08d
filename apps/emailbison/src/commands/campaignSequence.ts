import type { Command } from "commander";

import { isRecord } from "../integrations/http.js";
import { SequenceSpecSchema, SequenceUpdateSpecSchema } from "../models.js";
import {
  addBaseUrlOption,
  createOutput,
  field,
  guarded,
  loadJsonFile,
  parseIntArg,
  validate,
  withCommandClient,
  type CommandContext
} from "./shared.js";

type BaseFlags = { baseUrl?: string };

export function sequenceLines(raw: Record<string, unknown>): string[] {
  const data = raw.data;
  if (!isRecord(data)) return [];
  const lines: string[] = [];
  if (data.sequence_id !== undefined && data.sequence_id !== null) lines.push(`sequence_id=${field(data, "sequence_id")}`);
  const steps = Array.isArray(data.sequence_steps) ? data.sequence_steps : [];
  for (const step of steps) {
    if (!isRecord(step)) continue;
    lines.push(
      `step_id=${field(step, "id")} order=${field(step, "order")} wait_in_days=${field(step, "wait_in_days")} subject=${field(step, "email_subject")}`
    );
  }
  return lines;
}

export function registerSequenceCommands(campaign: Command, ctx: CommandContext) {
  const out = createOutput(ctx);
  const sequence = campaign.command("sequence").description("Manage campaign sequence steps (v1.1).");

  addBaseUrlOption(
    sequence.command("get").description("Show the sequence steps of a campaign.").argument("<campaignId>", "Campaign id.", parseIntArg)
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.getSequenceSteps(campaignId));
      out.result(res.body, sequenceLines(res.body));
    })
  );

  addBaseUrlOption(
    sequence
      .command("set")
      .description("Create the sequence steps of a campaign from a JSON file.")
      .argument("<campaignId>", "Campaign id.", parseIntArg)
      .requiredOption("--file <path>", "JSON file with title + sequence_steps.")
  ).action(
    guarded(ctx, async (campaignId: number, flags: BaseFlags & { file: string }) => {
      const spec = validate(SequenceSpecSchema, loadJsonFile(flags.file, "Sequence file"));
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.createSequenceSteps(campaignId, spec));
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    sequence
      .command("update")
      .description("Update existing sequence steps from a JSON file.")
      .argument("<sequenceId>", "Sequence id (see `sequence get`).", parseIntArg)
      .requiredOption("--file <path>", "JSON file with title + sequence_steps (each with id).")
  ).action(
    guarded(ctx, async (sequenceId: number, flags: BaseFlags & { file: string }) => {
      const spec = validate(SequenceUpdateSpecSchema, loadJsonFile(flags.file, "Sequence file"));
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.updateSequenceSteps(sequenceId, spec));
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    sequence
      .command("delete-step")
      .description("Delete one sequence step.")
      .argument("<sequenceStepId>", "Sequence step id.", parseIntArg)
  ).action(
    guarded(ctx, async (sequenceStepId: number, flags: BaseFlags) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) => client.deleteSequenceStep(sequenceStepId));
      out.result(res.body);
    })
  );

  addBaseUrlOption(
    sequence
      .command("test-email")
      .description("Send a test email for one sequence step.")
      .argument("<sequenceStepId>", "Sequence step id.", parseIntArg)
      .requiredOption("--email <address>", "Recipient address.")
  ).action(
    guarded(ctx, async (sequenceStepId: number, flags: BaseFlags & { email: string }) => {
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.sendSequenceStepTestEmail(sequenceStepId, flags.email)
      );
      out.result(res.body);
    })
  );
}
