import fs from "node:fs";
import path from "node:path";

import type { Settings } from "../config.js";
import { ApiError, EmailBisonError, NetworkError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  CampaignSchedule,
  CampaignSettings,
  CampaignType,
  ColumnsToMap,
  SequenceSpec,
  SequenceUpdateSpec
} from "../models.js";
import { bearerHeaders, redactedBearer } from "../security.js";
import { jsonRequest, type FetchLike, type HttpMethod, type JsonResponse, type QueryValue } from "./http.js";

export type ClientOptions = {
  fetchImpl?: FetchLike;
  debug?: boolean;
};

export type SenderEmailFilter = {
  search?: string;
  tag_ids?: number[];
  excluded_tag_ids?: number[];
  without_tags?: boolean;
};

export type CampaignListFilter = {
  search?: string;
  status?: string;
  tag_ids?: number[];
};

export type RepliesFilter = {
  search?: string;
  status?: string;
  folder?: string;
  read?: boolean;
  sender_email_id?: number;
  lead_id?: number;
  tag_ids?: number[];
};

export type LeadListLookup = { found: true; response: JsonResponse } | { found: false; notFound: ApiError };

/**
 * One way of fetching a lead list. `found: false` means the endpoint does not
 * exist on this deployment and the next resolver should be tried; any thrown
 * error is final.
 */
export type LeadListResolver = (client: EmailBisonClient, leadListId: number) => Promise<LeadListLookup>;

function pathResolver(template: (id: number) => string): LeadListResolver {
  return async (client, leadListId) => {
    try {
      return { found: true, response: await client.request("GET", template(leadListId)) };
    } catch (err) {
      if (err instanceof ApiError && err.isNotFound) return { found: false, notFound: err };
      throw err;
    }
  };
}

export const LEAD_LIST_RESOLVERS: LeadListResolver[] = [
  pathResolver((id) => `/api/leads/lists/${id}`),
  pathResolver((id) => `/api/lead-lists/${id}`)
];

/**
 * Session against one EmailBison workspace. Owns an abort signal shared by
 * every call it makes; `close()` releases it, after which the client refuses
 * further requests.
 */
export class EmailBisonClient {
  private readonly log: Logger = createLogger("EmailBisonClient");
  private readonly session = new AbortController();
  private readonly fetchImpl?: FetchLike;
  private closed = false;

  public readonly debug: boolean;

  constructor(
    public readonly settings: Settings,
    opts: ClientOptions = {}
  ) {
    this.fetchImpl = opts.fetchImpl;
    this.debug = Boolean(opts.debug);
  }

  get isClosed() {
    return this.closed;
  }

  debugRedactedHeaders(): Record<string, string> {
    return { Authorization: redactedBearer(this.settings.apiToken) };
  }

  resolveUrl(p: string): string {
    return p.startsWith("/") ? `${this.settings.baseUrl}${p}` : p;
  }

  async request(
    method: HttpMethod,
    p: string,
    opts: { body?: unknown; query?: Record<string, QueryValue>; form?: FormData } = {}
  ): Promise<JsonResponse> {
    if (this.closed) throw new EmailBisonError("EmailBisonClient is closed");
    const res = await jsonRequest({
      method,
      url: this.resolveUrl(p),
      headers: bearerHeaders(this.settings.apiToken),
      query: opts.query,
      body: opts.body,
      form: opts.form,
      timeoutMs: this.settings.timeoutSeconds * 1000,
      signal: this.session.signal,
      fetchImpl: this.fetchImpl
    });
    if (this.debug) {
      this.log.debug(
        { method: res.debug.method, url: res.debug.url, status: res.debug.statusCode, requestId: res.debug.requestId },
        "EmailBison call"
      );
    }
    return res;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.session.abort();
  }

  // Campaigns

  createCampaign(name: string, type: CampaignType = "outbound") {
    return this.request("POST", this.settings.campaignsPath, { body: { name, type } });
  }

  updateCampaignSettings(campaignId: number, payload: CampaignSettings) {
    return this.request("PATCH", `${this.settings.campaignsPath}/${campaignId}/update`, {
      body: payload
    });
  }

  createCampaignSchedule(campaignId: number, payload: CampaignSchedule) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/schedule`, { body: payload });
  }

  listCampaigns(filter: CampaignListFilter = {}) {
    // fetch refuses a body on GET; the API reads the same filters from the query.
    const query: Record<string, QueryValue> = {};
    if (filter.search) query.search = filter.search;
    if (filter.status) query.status = filter.status;
    if (filter.tag_ids?.length) query.tag_ids = filter.tag_ids;
    return this.request("GET", this.settings.campaignsPath, { query });
  }

  campaignDetails(campaignId: number) {
    return this.request("GET", `${this.settings.campaignsPath}/${campaignId}`);
  }

  pauseCampaign(campaignId: number) {
    return this.request("PATCH", `${this.settings.campaignsPath}/${campaignId}/pause`);
  }

  resumeCampaign(campaignId: number) {
    return this.request("PATCH", `${this.settings.campaignsPath}/${campaignId}/resume`);
  }

  archiveCampaign(campaignId: number) {
    return this.request("PATCH", `${this.settings.campaignsPath}/${campaignId}/archive`);
  }

  campaignStats(campaignId: number, startDate: string, endDate: string) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/stats`, {
      body: { start_date: startDate, end_date: endDate }
    });
  }

  campaignReplies(campaignId: number, filter: RepliesFilter = {}) {
    const query: Record<string, QueryValue> = {};
    if (filter.search) query.search = filter.search;
    if (filter.status) query.status = filter.status;
    if (filter.folder) query.folder = filter.folder;
    if (filter.read !== undefined) query.read = filter.read;
    if (filter.sender_email_id !== undefined) query.sender_email_id = filter.sender_email_id;
    if (filter.lead_id !== undefined) query.lead_id = filter.lead_id;
    if (filter.tag_ids?.length) query.tag_ids = filter.tag_ids;
    return this.request("GET", `${this.settings.campaignsPath}/${campaignId}/replies`, { query });
  }

  stopFutureEmails(campaignId: number, leadIds: number[]) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/leads/stop-future-emails`, {
      body: { lead_ids: leadIds }
    });
  }

  // Sequence steps (v1.1)

  getSequenceSteps(campaignId: number) {
    return this.request("GET", `${this.settings.campaignsV11Path}/${campaignId}/sequence-steps`);
  }

  createSequenceSteps(campaignId: number, spec: SequenceSpec) {
    return this.request("POST", `${this.settings.campaignsV11Path}/${campaignId}/sequence-steps`, {
      body: { title: spec.title, sequence_steps: spec.sequence_steps }
    });
  }

  updateSequenceSteps(sequenceId: number, spec: SequenceUpdateSpec) {
    return this.request("PUT", `${this.settings.campaignsV11Path}/sequence-steps/${sequenceId}`, {
      body: { title: spec.title, sequence_steps: spec.sequence_steps }
    });
  }

  deleteSequenceStep(sequenceStepId: number) {
    return this.request("DELETE", `${this.settings.campaignsPath}/sequence-steps/${sequenceStepId}`);
  }

  sendSequenceStepTestEmail(sequenceStepId: number, email: string) {
    return this.request("POST", `${this.settings.campaignsPath}/sequence-steps/${sequenceStepId}/test-email`, {
      body: { email }
    });
  }

  // Leads

  attachLeadList(campaignId: number, leadListId: number, allowParallelSending: boolean) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/leads/attach-lead-list`, {
      body: { lead_list_id: leadListId, allow_parallel_sending: allowParallelSending }
    });
  }

  attachLeads(campaignId: number, leadIds: number[], allowParallelSending: boolean) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/leads/attach-leads`, {
      body: { lead_ids: leadIds, allow_parallel_sending: allowParallelSending }
    });
  }

  async uploadLeadsCsv(name: string, csvPath: string, columnsToMap: ColumnsToMap) {
    let file: Blob;
    try {
      file = await fs.openAsBlob(csvPath, { type: "text/csv" });
    } catch (err) {
      throw new NetworkError(`CSV file not found: ${csvPath}`, null, { cause: err });
    }
    const form = new FormData();
    form.append("name", name);
    for (const [field, column] of Object.entries(columnsToMap)) {
      form.append(`columnsToMap[0][${field}]`, column);
    }
    form.append("csv", file, path.basename(csvPath));
    return this.request("POST", "/api/leads/bulk/csv", { form });
  }

  /**
   * Tries each known lead-list endpoint in order. Only a 404 moves on to the
   * next candidate.
   */
  async getLeadList(leadListId: number, resolvers: LeadListResolver[] = LEAD_LIST_RESOLVERS): Promise<JsonResponse> {
    let last: ApiError | null = null;
    for (const resolve of resolvers) {
      const lookup = await resolve(this, leadListId);
      if (lookup.found) return lookup.response;
      last = lookup.notFound;
    }
    throw new ApiError(
      `Unable to fetch lead list ${leadListId}; no supported endpoint found.`,
      last?.statusCode ?? null,
      last?.details ?? null,
      last?.debug ?? null
    );
  }

  // Sender emails

  listSenderEmails(filter: SenderEmailFilter = {}) {
    const query: Record<string, QueryValue> = {};
    if (filter.search) query.search = filter.search;
    if (filter.tag_ids?.length) query.tag_ids = filter.tag_ids;
    if (filter.excluded_tag_ids?.length) query.excluded_tag_ids = filter.excluded_tag_ids;
    if (filter.without_tags !== undefined) query.without_tags = filter.without_tags;
    return this.request("GET", this.settings.senderEmailsPath, { query });
  }

  getCampaignSenderEmails(campaignId: number) {
    return this.request("GET", `${this.settings.campaignsPath}/${campaignId}/sender-emails`);
  }

  attachSenderEmails(campaignId: number, senderEmailIds: number[]) {
    return this.request("POST", `${this.settings.campaignsPath}/${campaignId}/attach-sender-emails`, {
      body: { sender_email_ids: senderEmailIds.map(String) }
    });
  }

  removeSenderEmails(campaignId: number, senderEmailIds: number[]) {
    return this.request("DELETE", `${this.settings.campaignsPath}/${campaignId}/remove-sender-emails`, {
      body: { sender_email_ids: senderEmailIds.map(String) }
    });
  }
}

/** Scoped session: the client is closed on every exit path. */
export async function withClient<T>(
  settings: Settings,
  opts: ClientOptions,
  fn: (client: EmailBisonClient) => Promise<T>
): Promise<T> {
  const client = new EmailBisonClient(settings, opts);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
