import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stringify } from "yaml";
import { parseDashboardConfigs, type DashboardConfig } from "../dashboards.js";
import type { Clock } from "../capture/readiness.js";
import type { FetchLike } from "../grafana/session.js";
import type { ContextLogger } from "../logger.js";
import type { Timepoint } from "../timepoints.js";

export const GRAFANA_HOST = "http://grafana.test";

export const silentLogger: ContextLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  withContext: () => silentLogger
};

export function dashboardConfig(
  overrides: Record<string, unknown> = {},
  name = "main"
): DashboardConfig {
  const text = stringify({
    [name]: { dashTitle: "Main board", host: GRAFANA_HOST, auth: false, ...overrides }
  });
  return parseDashboardConfigs(text, "test")[0];
}

export function timepoint(id: number, overrides: Partial<Timepoint> = {}): Timepoint {
  return {
    id,
    tag: null,
    start: 1_700_000_000 + id * 3600,
    end: 1_700_000_600 + id * 3600,
    startHuman: "start",
    endHuman: "end",
    ...overrides
  };
}

/** Clock whose `sleep` advances time instantly and records every call. */
export function fakeClock(start = 0) {
  let now = start;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    }
  };
  return { clock, sleeps, advance: (ms: number) => (now += ms) };
}

export type RecordedRequest = { url: string; method: string; body?: string };

type Route = (request: RecordedRequest) => Response | Promise<Response> | undefined;

/** `fetch` stand-in answering from the first route that returns a response. */
export function fakeFetch(...routes: Route[]) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? "GET",
      body: typeof init?.body === "string" ? init.body : undefined
    };
    requests.push(request);
    for (const route of routes) {
      const response = await route(request);
      if (response) return response;
    }
    return new Response("not found", { status: 404 });
  };
  return { fetch: fetchImpl, requests };
}

export function jsonResponse(body: unknown, init: ResponseInit = {}) {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init
  });
}

export async function tempDir(prefix = "panel-reporter-") {
  return mkdtemp(join(tmpdir(), prefix));
}
