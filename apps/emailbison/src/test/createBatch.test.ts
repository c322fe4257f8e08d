import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";

import { WorkflowValidationError } from "../errors.js";
import { EmailBisonClient } from "../integrations/emailbison.js";
import type { BatchFileResult } from "../models.js";
import { dryRunBatch, prepareBatch, runBatch } from "../playbooks/createBatch.js";
import { fakeFetch, testSettings, type Route } from "./fakeFetch.js";

function batchDir() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-batch-"));
  fs.writeFileSync(
    path.join(dir, "a.csv"),
    "first_name,last_name,email,district\nAda,Lovelace,ada@example.com,District A\nAlan,Turing,alan@example.com,District A\n"
  );
  fs.writeFileSync(path.join(dir, "b.csv"), "first_name,last_name,email\nGrace,Hopper,grace@example.com\n");
  return dir;
}

const instantPoll = { sleep: async () => undefined, now: () => 0 };

describe("prepareBatch", () => {
  it("rejects a missing directory", () => {
    assert.throws(
      () => prepareBatch("/nonexistent/batch", { dryRun: true }),
      (err: unknown) => err instanceof WorkflowValidationError && err.message === "Directory not found: /nonexistent/batch"
    );
  });

  it("requires sender emails unless dry-running", () => {
    const dir = batchDir();
    assert.throws(
      () => prepareBatch(dir, { dryRun: false, senderEmailIds: [] }),
      (err: unknown) =>
        err instanceof WorkflowValidationError &&
        err.message === "Missing --sender-email-id (repeatable) unless --dry-run is used."
    );
    assert.equal(prepareBatch(dir, { dryRun: true }).length, 2);
  });

  it("rejects a directory without CSV files", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-batch-empty-"));
    assert.throws(
      () => prepareBatch(dir, { dryRun: true }),
      (err: unknown) => err instanceof WorkflowValidationError && err.message === `No CSV files found in ${dir}`
    );
  });
});

describe("dryRunBatch", () => {
  it("summarises the plans without any requests", () => {
    const dir = batchDir();
    const result = dryRunBatch(prepareBatch(dir, { dryRun: true }));
    assert.deepEqual(result, {
      dry_run: true,
      summary: { total_processed: 2, succeeded: 2, failed: 0, leads_loaded: 3 },
      files: [
        { csv: path.join(dir, "a.csv"), campaign_name: "District A", lead_count: 2 },
        { csv: path.join(dir, "b.csv"), campaign_name: "b", lead_count: 1 }
      ]
    });
  });
});

describe("runBatch", () => {
  const uploadAndPoll: Route[] = [
    { method: "POST", path: "/api/leads/bulk/csv", body: { data: { id: 100, status: "unprocessed" } } },
    { method: "GET", path: "/api/leads/lists/100", body: { data: { id: 100, status: "processed" } } }
  ];

  it("processes each file and isolates failures", async () => {
    const dir = batchDir();
    const plans = prepareBatch(dir, { dryRun: false, senderEmailIds: [7] });
    const { fetchImpl, calls } = fakeFetch([
      ...uploadAndPoll,
      { method: "POST", path: "/api/campaigns", body: { data: { id: 1 } } },
      { method: "POST", path: "/api/campaigns", status: 500, body: { message: "boom" } },
      { method: "POST", path: "/api/campaigns/1/attach-sender-emails", body: { data: {} } },
      { method: "POST", path: "/api/campaigns/1/leads/attach-lead-list", body: { data: {} } }
    ]);
    const client = new EmailBisonClient(testSettings, { fetchImpl });
    const seen: BatchFileResult[] = [];

    const result = await runBatch(client, plans, {
      senderEmailIds: [7],
      poll: instantPoll,
      onFileResult: (r) => seen.push(r)
    });

    assert.deepEqual(result.summary, { total_processed: 2, succeeded: 1, failed: 1, leads_loaded: 2 });
    assert.deepEqual(result.files, [
      {
        ok: true,
        csv: path.join(dir, "a.csv"),
        campaign_name: "District A",
        campaign_id: 1,
        lead_list_id: 100,
        lead_list_status: "processed",
        lead_count: 2
      },
      {
        ok: false,
        csv: path.join(dir, "b.csv"),
        campaign_name: "b",
        lead_count: 1,
        error_type: "ApiError",
        error: "API error (500)."
      }
    ]);
    assert.deepEqual(seen, result.files);

    const attach = calls.find((c) => c.path === "/api/campaigns/1/leads/attach-lead-list");
    assert.deepEqual(attach?.body, { lead_list_id: 100, allow_parallel_sending: false });
    const create = calls.find((c) => c.method === "POST" && c.path === "/api/campaigns");
    assert.deepEqual(create?.body, { name: "District A", type: "outbound" });
  });

  it("records a lead list that fails processing against that file only", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-batch-fail-"));
    fs.writeFileSync(path.join(dir, "only.csv"), "first_name,last_name,email\nA,B,a@example.com\n");
    const { fetchImpl, calls } = fakeFetch([
      { method: "POST", path: "/api/leads/bulk/csv", body: { data: { id: 5, status: "processing" } } },
      { method: "GET", path: "/api/leads/lists/5", body: { data: { status: "failed" } } }
    ]);
    const client = new EmailBisonClient(testSettings, { fetchImpl });

    const result = await runBatch(client, prepareBatch(dir, { dryRun: false, senderEmailIds: [1] }), {
      senderEmailIds: [1],
      poll: instantPoll
    });

    assert.deepEqual(result.summary, { total_processed: 1, succeeded: 0, failed: 1, leads_loaded: 0 });
    const file = result.files[0];
    assert.ok(file && !file.ok);
    assert.equal(file.error_type, "WorkflowValidationError");
    assert.equal(file.error, "Lead list 5 processing failed: failed");
    assert.equal(
      calls.some((c) => c.path === "/api/campaigns"),
      false
    );
  });

  it("records an upload response without a lead list id", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bison-batch-noid-"));
    fs.writeFileSync(path.join(dir, "only.csv"), "first_name,last_name,email\nA,B,a@example.com\n");
    const { fetchImpl } = fakeFetch([{ method: "POST", path: "/api/leads/bulk/csv", body: { message: "queued" } }]);
    const client = new EmailBisonClient(testSettings, { fetchImpl });

    const result = await runBatch(client, prepareBatch(dir, { dryRun: true }), { poll: instantPoll });
    const file = result.files[0];
    assert.ok(file && !file.ok);
    assert.equal(file.error_type, "ExtractionError");
  });
});
