import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";

import { runCli } from "../cli.js";
import type { FetchLike } from "../integrations/http.js";
import { fakeFetch, type Route } from "./fakeFetch.js";

function harness(routes: Route[] = [], env: NodeJS.ProcessEnv = { EMAILBISON_API_TOKEN: "test-secret" }) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const { fetchImpl, calls } = fakeFetch(routes);
  const run = (...args: string[]) =>
    runCli(["node", "emailbison", ...args], {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      env: { EMAILBISON_BASE_URL: "https://bison.test", ...env },
      configPaths: [],
      fetchImpl,
      poll: { sleep: async () => undefined }
    });
  return { run, stdout, stderr, calls };
}

function parseJson(text: string | undefined): unknown {
  assert.ok(text !== undefined);
  return JSON.parse(text);
}

describe("campaign create", () => {
  it("prints the created campaign as a human line", async () => {
    const h = harness([{ method: "POST", path: "/api/campaigns", body: { data: { id: 42, status: "draft" } } }]);
    const code = await h.run("campaign", "create", "--name", "Fall push");
    assert.equal(code, 0);
    assert.deepEqual(h.stdout, ["id=42 name=Fall push status=draft"]);
  });

  it("prints the full result under --json", async () => {
    const h = harness([{ method: "POST", path: "/api/campaigns", body: { data: { id: 42, status: "draft" } } }]);
    const code = await h.run("--json", "campaign", "create", "--name", "Fall push");
    assert.equal(code, 0);
    const out = parseJson(h.stdout[0]);
    assert.ok(typeof out === "object" && out !== null && "id" in out);
    assert.equal(out.id, 42);
  });

  it("exits 2 with a validation message when the name is missing", async () => {
    const h = harness();
    const code = await h.run("campaign", "create");
    assert.equal(code, 2);
    assert.deepEqual(h.stderr, ["Validation error: name: String must contain at least 1 character(s)"]);
    assert.equal(h.calls.length, 0);
  });

  it("builds the campaign from a --file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-"));
    const file = path.join(dir, "campaign.json");
    fs.writeFileSync(file, JSON.stringify({ name: "From file", leads: { lead_ids: [9] } }));
    const h = harness([
      { method: "POST", path: "/api/campaigns", body: { data: { id: 5 } } },
      { method: "POST", path: "/api/campaigns/5/leads/attach-leads", body: { data: {} } }
    ]);
    const code = await h.run("campaign", "create", "--file", file);
    assert.equal(code, 0);
    assert.deepEqual(h.calls[0]?.body, { name: "From file", type: "outbound" });
    assert.deepEqual(h.calls[1]?.body, { lead_ids: [9], allow_parallel_sending: false });
  });

  it("emits the JSON error envelope with the steps so far", async () => {
    const h = harness([
      { method: "POST", path: "/api/campaigns", body: { data: { id: 42 } } },
      { method: "POST", path: "/api/campaigns/42/attach-sender-emails", status: 500, body: { message: "boom" } }
    ]);
    const code = await h.run("--json", "campaign", "create", "--name", "x", "--sender-email-id", "3");
    assert.equal(code, 3);
    const out = parseJson(h.stdout[0]);
    assert.ok(typeof out === "object" && out !== null && "run_id" in out);
    const { run_id: runId, ...rest } = out;
    assert.equal(typeof runId, "string");
    assert.deepEqual(rest, {
      error: { type: "ApiError", message: "API error (500).", status_code: 500, details: { message: "boom" } },
      campaign_id: 42,
      steps: [
        {
          name: "campaign.create",
          method: "POST",
          url: "https://bison.test/api/campaigns",
          status_code: 200,
          request_id: null,
          error: null
        },
        {
          name: "campaign.attach_sender_emails",
          method: "POST",
          url: "https://bison.test/api/campaigns/42/attach-sender-emails",
          status_code: 500,
          request_id: null,
          error: "API error (500)."
        }
      ]
    });
  });

  it("exits 3 when no token is configured", async () => {
    const h = harness([], {});
    const code = await h.run("campaign", "create", "--name", "x");
    assert.equal(code, 3);
    assert.deepEqual(h.stderr, ["Missing api_token. Set EMAILBISON_API_TOKEN or add api_token to config.json."]);
  });

  it("exits 4 on network failure", async () => {
    const stderr: string[] = [];
    const failing: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const code = await runCli(["node", "emailbison", "campaign", "get", "1"], {
      stdout: () => undefined,
      stderr: (line) => stderr.push(line),
      env: { EMAILBISON_API_TOKEN: "test-secret" },
      configPaths: [],
      fetchImpl: failing
    });
    assert.equal(code, 4);
    assert.deepEqual(stderr, ["Network error calling EmailBison"]);
  });
});

describe("campaign create-batch", () => {
  it("lists the plan on --dry-run without calling the API", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-batch-"));
    fs.writeFileSync(path.join(dir, "a.csv"), "first_name,last_name,email,district\nA,B,a@example.com,District A\n");
    const h = harness([], {});
    const code = await h.run("campaign", "create-batch", "--dir", dir, "--dry-run");
    assert.equal(code, 0);
    assert.deepEqual(h.stdout, [
      "[DRY-RUN] csv=a.csv campaign=District A leads=1",
      "summary: total_processed=1 succeeded=1 failed=0 leads_loaded=1"
    ]);
    assert.equal(h.calls.length, 0);
  });

  it("prints per-file lines and the summary", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-batch-"));
    fs.writeFileSync(path.join(dir, "a.csv"), "first_name,last_name,email\nA,B,a@example.com\nC,D,c@example.com\n");
    const h = harness([
      { method: "POST", path: "/api/leads/bulk/csv", body: { data: { id: 8, status: "processed" } } },
      { method: "POST", path: "/api/campaigns", body: { data: { id: 21 } } },
      { method: "POST", path: "/api/campaigns/21/attach-sender-emails", body: { data: {} } },
      { method: "POST", path: "/api/campaigns/21/leads/attach-lead-list", body: { data: {} } }
    ]);
    const code = await h.run("campaign", "create-batch", "--dir", dir, "--sender-email-id", "4");
    assert.equal(code, 0);
    assert.deepEqual(h.stdout, [
      "ok csv=a.csv campaign_id=21 lead_list_id=8 leads=2",
      "summary: total_processed=1 succeeded=1 failed=0 leads_loaded=2"
    ]);
  });

  it("requires a sender email outside dry-run", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-batch-"));
    fs.writeFileSync(path.join(dir, "a.csv"), "first_name,last_name,email\nA,B,a@example.com\n");
    const h = harness();
    const code = await h.run("campaign", "create-batch", "--dir", dir);
    assert.equal(code, 2);
    assert.deepEqual(h.stderr, ["Missing --sender-email-id (repeatable) unless --dry-run is used."]);
  });

  it("validates the sequence file before a dry run", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-batch-"));
    fs.writeFileSync(path.join(dir, "a.csv"), "first_name,last_name,email\nA,B,a@example.com\n");
    const seq = path.join(dir, "seq.json");
    fs.writeFileSync(seq, JSON.stringify({ title: "t", sequence_steps: [] }));
    const h = harness([], {});
    const code = await h.run("campaign", "create-batch", "--dir", dir, "--dry-run", "--sequence-file", seq);
    assert.equal(code, 2);
    assert.deepEqual(h.stdout, []);
    assert.deepEqual(h.stderr, ["Validation error: sequence_steps: Array must contain at least 1 element(s)"]);
  });

  it("exits 2 naming a malformed CSV", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-cli-batch-"));
    const csv = path.join(dir, "a.csv");
    fs.writeFileSync(csv, 'first_name,last_name,email\n"A,B,a@example.com\n');
    const h = harness([], {});
    const code = await h.run("campaign", "create-batch", "--dir", dir, "--dry-run");
    assert.equal(code, 2);
    assert.equal(h.stderr.length, 1);
    assert.ok(h.stderr[0]?.startsWith(`Invalid CSV: ${csv}: `));
  });
});

describe("admin commands", () => {
  it("lists campaigns one per line", async () => {
    const h = harness([
      {
        method: "GET",
        path: "/api/campaigns",
        body: {
          data: [
            { id: 1, status: "active", name: "One" },
            { id: 2, status: "paused", name: "Two" }
          ]
        }
      }
    ]);
    assert.equal(await h.run("campaign", "list"), 0);
    assert.deepEqual(h.stdout, ["id=1 status=active name=One", "id=2 status=paused name=Two"]);
  });

  it("lists sender emails with their daily limit", async () => {
    const h = harness([
      {
        method: "GET",
        path: "/api/sender-emails",
        body: { data: [{ id: 3, status: "Connected", daily_limit: 40, email: "ops@example.com" }] }
      }
    ]);
    assert.equal(await h.run("sender-emails", "list", "--tag-id", "2", "--without-tags"), 0);
    assert.deepEqual(h.stdout, ["id=3 status=Connected daily_limit=40 email=ops@example.com"]);
    assert.equal(h.calls[0]?.search, "?tag_ids=2&without_tags=true");
  });

  it("normalises stats dates before the request", async () => {
    const h = harness([{ method: "POST", path: "/api/campaigns/7/stats", body: { data: { sent: 10 } } }]);
    const code = await h.run("--json", "campaign", "stats", "7", "--start", "2025-01-01T08:00:00Z", "--end", "2025-01-31");
    assert.equal(code, 0);
    assert.deepEqual(h.calls[0]?.body, { start_date: "2025-01-01", end_date: "2025-01-31" });
    assert.deepEqual(parseJson(h.stdout[0]), { data: { sent: 10 } });
  });

  it("rejects an unparseable stats date with exit 2", async () => {
    const h = harness();
    const code = await h.run("campaign", "stats", "7", "--start", "yesterday-ish", "--end", "2025-01-31");
    assert.equal(code, 2);
    assert.equal(h.calls.length, 0);
  });

  it("shows sequence steps", async () => {
    const h = harness([
      {
        method: "GET",
        path: "/api/campaigns/v1.1/7/sequence-steps",
        body: { data: { sequence_id: 70, sequence_steps: [{ id: 701, order: 1, wait_in_days: 0, email_subject: "Hi" }] } }
      }
    ]);
    assert.equal(await h.run("campaign", "sequence", "get", "7"), 0);
    assert.deepEqual(h.stdout, ["sequence_id=70", "step_id=701 order=1 wait_in_days=0 subject=Hi"]);
  });

  it("rejects a non-integer campaign id as a usage error", async () => {
    const h = harness();
    assert.equal(await h.run("campaign", "get", "abc"), 2);
    assert.equal(h.calls.length, 0);
  });
});
