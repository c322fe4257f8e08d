import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export type Settings = {
  baseUrl: string;
  apiToken: string;
  timeoutSeconds: number;
  campaignsPath: string;
  campaignsV11Path: string;
  senderEmailsPath: string;
};

export type SettingsOverrides = {
  baseUrl?: string;
  apiToken?: string;
  timeoutSeconds?: number;
  campaignsPath?: string;
};

const DEFAULT_BASE_URL = "https://dedi.emailbison.com";

// Keys accepted in config.json; snake_case to match the env var suffixes.
const FileConfigSchema = z
  .object({
    base_url: z.string().optional(),
    api_token: z.string().optional(),
    timeout_seconds: z.union([z.number(), z.string()]).optional(),
    campaigns_path: z.string().optional()
  })
  .passthrough();
type FileConfig = z.infer<typeof FileConfigSchema>;

const SettingsSchema = z.object({
  baseUrl: z.string().url(),
  apiToken: z.string().min(1),
  timeoutSeconds: z.coerce.number().positive(),
  campaignsPath: z.string().startsWith("/")
});

function readJsonFile(p: string): unknown {
  const raw = fs.readFileSync(p, "utf-8");
  return JSON.parse(raw);
}

export function defaultConfigPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const xdgBase = (env.XDG_CONFIG_HOME || "").trim() || path.join(os.homedir(), ".config");
  return [path.join(xdgBase, "emailbison", "config.json"), path.join(os.homedir(), ".emailbison.json")];
}

/** Later files override earlier ones; missing files are skipped. */
export function loadFileConfig(paths: string[]): FileConfig {
  let merged: FileConfig = {};
  for (const p of paths) {
    if (!fs.existsSync(p)) continue;
    let data: unknown;
    try {
      data = readJsonFile(p);
    } catch (e) {
      throw new ConfigError(`Failed to parse config file: ${p}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const parsed = FileConfigSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file: ${p}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    merged = { ...merged, ...parsed.data };
  }
  return merged;
}

function blankToUndefined(v: string | number | undefined): string | number | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "string" && v.trim() === "") return undefined;
  return v;
}

/**
 * Precedence: explicit overrides (flags) > EMAILBISON_* env vars > config
 * files > defaults.
 */
export function loadSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPaths: string[] = defaultConfigPaths(env)
): Settings {
  const file = loadFileConfig(configPaths);

  const pick = (explicit: string | number | undefined, envValue: string | undefined, fileValue: string | number | undefined) =>
    blankToUndefined(explicit) ?? blankToUndefined(envValue) ?? blankToUndefined(fileValue);

  const apiToken = pick(overrides.apiToken, env.EMAILBISON_API_TOKEN, file.api_token);
  if (apiToken === undefined) {
    throw new ConfigError("Missing api_token. Set EMAILBISON_API_TOKEN or add api_token to config.json.");
  }

  const parsed = SettingsSchema.safeParse({
    baseUrl: pick(overrides.baseUrl, env.EMAILBISON_BASE_URL, file.base_url) ?? DEFAULT_BASE_URL,
    apiToken: String(apiToken),
    timeoutSeconds: pick(overrides.timeoutSeconds, env.EMAILBISON_TIMEOUT_SECONDS, file.timeout_seconds) ?? 20,
    campaignsPath: pick(overrides.campaignsPath, env.EMAILBISON_CAMPAIGNS_PATH, file.campaigns_path) ?? "/api/campaigns"
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid setting ${issue?.path.join(".") || "value"}: ${issue?.message ?? "invalid"}`);
  }

  const campaignsPath = parsed.data.campaignsPath.replace(/\/+$/, "");
  return {
    baseUrl: parsed.data.baseUrl.replace(/\/+$/, ""),
    apiToken: parsed.data.apiToken,
    timeoutSeconds: parsed.data.timeoutSeconds,
    campaignsPath,
    campaignsV11Path: `${campaignsPath}/v1.1`,
    senderEmailsPath: "/api/sender-emails"
  };
}
