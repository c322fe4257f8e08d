import { Command, CommanderError } from "commander";

import { registerCampaignCommands } from "./commands/campaign.js";
import { registerSenderEmailCommands } from "./commands/senderEmails.js";
import type { CliIo, CommandContext, GlobalOptions } from "./commands/shared.js";
import { setLogLevel } from "./logger.js";

export const VERSION = "0.1.0";

export function createProgram(io: CliIo) {
  let exitCode = 0;
  const program = new Command();

  program
    .name("emailbison")
    .description("Provision and manage EmailBison campaigns from the command line.")
    .version(VERSION)
    .option("--json", "Print machine-readable JSON to stdout.")
    .option("--debug", "Print request diagnostics (tokens redacted) to stderr.")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout(s.trimEnd()),
      writeErr: (s) => io.stderr(s.trimEnd())
    })
    .hook("preAction", () => {
      if (program.opts<Partial<GlobalOptions>>().debug) setLogLevel("debug");
    });

  const ctx: CommandContext = {
    io,
    globals: () => {
      const o = program.opts<Partial<GlobalOptions>>();
      return { json: Boolean(o.json), debug: Boolean(o.debug) };
    },
    setExitCode: (code) => {
      exitCode = code;
    }
  };

  registerCampaignCommands(program, ctx);
  registerSenderEmailCommands(program, ctx);

  return { program, exitCode: () => exitCode };
}

/** Parses and runs one invocation; resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const { program, exitCode } = createProgram(io);
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    throw err;
  }
  return exitCode();
}
