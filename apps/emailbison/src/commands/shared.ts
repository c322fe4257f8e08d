import fs from "node:fs";
import { InvalidArgumentError, type Command } from "commander";
import { z } from "zod";

import { loadSettings } from "../config.js";
import {
  CampaignWorkflowError,
  WorkflowValidationError,
  describeError,
  exitCodeFor,
  formatErrorMessage
} from "../errors.js";
import { withClient, type EmailBisonClient } from "../integrations/emailbison.js";
import { isRecord, type FetchLike, type JsonObject } from "../integrations/http.js";
import type { PollOptions } from "../playbooks/leadListPoller.js";
import { listOf } from "../playbooks/utils.js";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  configPaths?: string[];
  fetchImpl?: FetchLike;
  poll?: PollOptions;
};

export type GlobalOptions = {
  json: boolean;
  debug: boolean;
};

export type CommandContext = {
  io: CliIo;
  globals: () => GlobalOptions;
  setExitCode: (code: number) => void;
};

export function createOutput(ctx: CommandContext) {
  const { io } = ctx;
  return {
    /** JSON mode prints the payload; otherwise the human lines (or the payload) are printed. */
    result(payload: unknown, humanLines?: string[]) {
      if (ctx.globals().json) {
        io.stdout(JSON.stringify(payload, null, 2));
        return;
      }
      if (humanLines?.length) {
        for (const line of humanLines) io.stdout(line);
        return;
      }
      io.stdout(typeof payload === "string" ? payload : JSON.stringify(payload, null, 2));
    },
    line(text: string) {
      io.stdout(text);
    },
    debug(text: string) {
      if (ctx.globals().debug) io.stderr(`debug: ${text}`);
    }
  };
}

export function field(row: JsonObject, key: string): string {
  const v = row[key];
  return v === undefined || v === null ? "" : String(v);
}

export function recordLines(raw: JsonObject, format: (row: JsonObject) => string): string[] {
  return (listOf(raw) ?? []).filter(isRecord).map(format);
}

/**
 * Reports a terminal failure in both forms: a structured envelope on stdout
 * under --json, a human message on stderr otherwise.
 */
export function reportError(ctx: CommandContext, err: unknown, extra: JsonObject = {}) {
  if (ctx.globals().json) {
    ctx.io.stdout(JSON.stringify({ error: describeError(err), ...extra }, null, 2));
  } else {
    ctx.io.stderr(formatErrorMessage(err));
  }
  ctx.setExitCode(exitCodeFor(err));
}

/** Wraps a command body so every failure is reported and mapped to an exit code. */
export function guarded<A extends unknown[]>(ctx: CommandContext, body: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await body(...args);
    } catch (err) {
      if (err instanceof CampaignWorkflowError) {
        reportError(ctx, err, { run_id: err.runId, campaign_id: err.campaignId, steps: err.steps });
      } else {
        reportError(ctx, err);
      }
    }
  };
}

export function parseIntArg(value: string): number {
  const t = value.trim();
  if (!/^-?\d+$/.test(t)) throw new InvalidArgumentError(`Not an integer: ${value}`);
  return Number(t);
}

export function collectInt(value: string, previous: number[] = []): number[] {
  return [...previous, parseIntArg(value)];
}

export function addBaseUrlOption(cmd: Command): Command {
  return cmd.option("--base-url <url>", "Override the EmailBison base URL.");
}

export function loadJsonFile(p: string, what = "File"): JsonObject {
  if (!fs.existsSync(p)) throw new WorkflowValidationError(`File not found: ${p}`);
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(p, "utf-8"));
  } catch (e) {
    throw new WorkflowValidationError(`Invalid JSON in ${p}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new WorkflowValidationError(`${what} must contain a JSON object at the top level`);
  }
  return Object.fromEntries(Object.entries(data));
}

export function formatZodError(err: z.ZodError): string {
  return err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new WorkflowValidationError(`Validation error: ${formatZodError(parsed.error)}`);
  return parsed.data;
}

export async function withCommandClient<T>(
  ctx: CommandContext,
  baseUrl: string | undefined,
  fn: (client: EmailBisonClient) => Promise<T>
): Promise<T> {
  const settings = loadSettings({ baseUrl }, ctx.io.env ?? process.env, ctx.io.configPaths);
  return withClient(settings, { fetchImpl: ctx.io.fetchImpl, debug: ctx.globals().debug }, fn);
}
