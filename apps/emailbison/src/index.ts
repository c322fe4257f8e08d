#!/usr/bin/env node
import "dotenv/config";

import { runCli } from "./cli.js";
import { formatErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

async function main() {
  process.exitCode = await runCli(process.argv, {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`)
  });
}

main().catch((e) => {
  createLogger("emailbison").fatal({ err: e }, "fatal");
  process.stderr.write(`${formatErrorMessage(e)}\n`);
  process.exit(5);
});
