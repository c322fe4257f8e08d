import type { Command } from "commander";

import {
  addBaseUrlOption,
  collectInt,
  createOutput,
  field,
  guarded,
  recordLines,
  withCommandClient,
  type CommandContext
} from "./shared.js";

type ListFlags = {
  search?: string;
  tagId: number[];
  excludedTagId: number[];
  withoutTags?: boolean;
  baseUrl?: string;
};

export function registerSenderEmailCommands(program: Command, ctx: CommandContext) {
  const out = createOutput(ctx);
  const senderEmails = program.command("sender-emails").description("Inspect sender email accounts.");

  addBaseUrlOption(
    senderEmails
      .command("list")
      .description("List sender email accounts for the workspace.")
      .option("--search <text>", "Filter by address or name.")
      .option("--tag-id <id>", "Only accounts with this tag (repeatable).", collectInt, [])
      .option("--excluded-tag-id <id>", "Skip accounts with this tag (repeatable).", collectInt, [])
      .option("--without-tags", "Only accounts without tags.")
      .option("--with-tags", "Only accounts with tags.")
  ).action(
    guarded(ctx, async (flags: ListFlags & { withTags?: boolean }) => {
      const withoutTags = flags.withoutTags ? true : flags.withTags ? false : undefined;
      const res = await withCommandClient(ctx, flags.baseUrl, (client) =>
        client.listSenderEmails({
          search: flags.search,
          tag_ids: flags.tagId,
          excluded_tag_ids: flags.excludedTagId,
          without_tags: withoutTags
        })
      );
      out.result(
        res.body,
        recordLines(
          res.body,
          (r) =>
            `id=${field(r, "id")} status=${field(r, "status")} daily_limit=${field(r, "daily_limit")} email=${field(r, "email")}`
        )
      );
    })
  );
}
