import { ApiError, AuthError, NetworkError } from "../errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | Array<string | number> | null | undefined;

export type JsonObject = Record<string, unknown>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type RequestOptions = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  body?: unknown;
  form?: FormData;
  timeoutMs?: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
};

export type DebugInfo = {
  method: string;
  url: string;
  statusCode: number | null;
  requestId: string | null;
};

export type JsonResponse = {
  body: JsonObject;
  debug: DebugInfo;
};

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  const t = text.trim();
  if (!t) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(t) };
  } catch {
    return { ok: false };
  }
}

/** Objects pass through; other JSON is wrapped under `data`, non-JSON under `text`. */
export function normalizeBody(text: string): JsonObject {
  const parsed = tryParseJson(text);
  if (!parsed.ok) return { text };
  return isRecord(parsed.value) ? parsed.value : { data: parsed.value };
}

export function buildUrl(base: string, query?: Record<string, QueryValue>): string {
  const url = new URL(base);
  if (query) {
    for (const [k, v] of Object.entries(query)) {
      if (v === undefined || v === null) continue;
      if (Array.isArray(v)) {
        for (const item of v) url.searchParams.append(k, String(item));
      } else {
        url.searchParams.set(k, String(v));
      }
    }
  }
  return url.toString();
}

function withTimeout(timeoutMs: number, parent?: AbortSignal) {
  const ac = new AbortController();
  let timedOut = false;
  const t = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, timeoutMs);
  const onParentAbort = () => ac.abort();
  if (parent?.aborted) ac.abort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });
  return {
    signal: ac.signal,
    timedOut: () => timedOut,
    cancel: () => {
      clearTimeout(t);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}

function requestIdOf(res: Response): string | null {
  return res.headers.get("x-request-id") ?? res.headers.get("x-correlation-id");
}

/**
 * Maps a non-2xx response to the error taxonomy. 401/403 are auth failures;
 * 429 keeps the retry-after hint; anything else >= 400 is a plain API error.
 */
export function raiseForStatus(res: Response, body: JsonObject, debug: DebugInfo): void {
  if (res.status === 401 || res.status === 403) {
    throw new AuthError(
      `Auth failed (${res.status}). Set EMAILBISON_API_TOKEN or config api_token.`,
      debug
    );
  }
  if (res.status === 429) {
    const retryAfter = res.headers.get("retry-after");
    const msg = retryAfter ? `Rate limited (429). Retry-After: ${retryAfter}` : "Rate limited (429).";
    throw new ApiError(msg, res.status, body, debug, retryAfter);
  }
  if (res.status >= 400) {
    throw new ApiError(`API error (${res.status}).`, res.status, body, debug);
  }
}

export async function jsonRequest(opts: RequestOptions): Promise<JsonResponse> {
  const url = buildUrl(opts.url, opts.query);
  const method = opts.method.toUpperCase();
  const doFetch: FetchLike = opts.fetchImpl ?? fetch;

  const headers: Record<string, string> = {
    Accept: "application/json",
    ...(opts.headers || {})
  };

  let body: string | FormData | undefined;
  if (opts.form !== undefined) {
    // fetch sets the multipart boundary itself
    body = opts.form;
  } else if (opts.body !== undefined) {
    headers["Content-Type"] = headers["Content-Type"] || "application/json";
    body = JSON.stringify(opts.body);
  }

  const pending: DebugInfo = { method, url, statusCode: null, requestId: null };
  const timer = withTimeout(opts.timeoutMs ?? 20000, opts.signal);
  let res: Response;
  let text: string;
  try {
    res = await doFetch(url, { method, headers, body, signal: timer.signal });
    text = await res.text();
  } catch (err) {
    if (timer.timedOut()) {
      throw new NetworkError("Network timeout calling EmailBison", pending, { cause: err });
    }
    throw new NetworkError("Network error calling EmailBison", pending, { cause: err });
  } finally {
    timer.cancel();
  }

  const debug: DebugInfo = { method, url, statusCode: res.status, requestId: requestIdOf(res) };
  const parsed = normalizeBody(text);
  raiseForStatus(res, parsed, debug);
  return { body: parsed, debug };
}
