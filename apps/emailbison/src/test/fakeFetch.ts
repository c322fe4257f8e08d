import type { Settings } from "../config.js";
import type { FetchLike } from "../integrations/http.js";

export type RecordedCall = {
  method: string;
  url: string;
  path: string;
  search: string;
  body: unknown;
  form: FormData | null;
};

export type Route = {
  method: string;
  path: string | RegExp;
  status?: number;
  body?: unknown;
  text?: string;
  headers?: Record<string, string>;
};

export const testSettings: Settings = {
  baseUrl: "https://bison.test",
  apiToken: "test-secret",
  timeoutSeconds: 5,
  campaignsPath: "/api/campaigns",
  campaignsV11Path: "/api/campaigns/v1.1",
  senderEmailsPath: "/api/sender-emails"
};

function matches(route: Route, method: string, path: string) {
  if (route.method !== method) return false;
  return typeof route.path === "string" ? route.path === path : route.path.test(path);
}

/**
 * In-process stand-in for the EmailBison API. Routes are matched in order;
 * a route listed more than once is consumed once per call until only its
 * last copy remains, which then answers every later call.
 */
export function fakeFetch(routes: Route[]) {
  const calls: RecordedCall[] = [];
  const pending = [...routes];

  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = init.method ?? "GET";
    const form = init.body instanceof FormData ? init.body : null;
    const body = typeof init.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ method, url: input, path: url.pathname, search: url.search, body, form });

    const idx = pending.findIndex((r) => matches(r, method, url.pathname));
    if (idx === -1) return new Response(JSON.stringify({ message: "no route" }), { status: 404 });
    const route = pending[idx];
    if (route === undefined) throw new Error("unreachable");
    const hasLater = pending.slice(idx + 1).some((r) => matches(r, method, url.pathname));
    if (hasLater) pending.splice(idx, 1);

    const text = route.text ?? (route.body === undefined ? "" : JSON.stringify(route.body));
    return new Response(text, {
      status: route.status ?? 200,
      headers: { "content-type": "application/json", ...route.headers }
    });
  };

  return { fetchImpl, calls };
}
