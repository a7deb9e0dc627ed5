import * as cheerio from "cheerio";
import JSON5 from "json5";
import { z } from "zod";
import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "../errors.js";
import type { ContextLogger } from "../logger.js";
import type { GrafanaSession } from "../grafana/session.js";

export type TrafficEntry = {
  url: string;
  /** `null` while the request has no response. */
  status: number | null;
};

export interface TrafficLog {
  entries(): readonly TrafficEntry[];
  clear(): void;
}

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  }
};

export type ReadinessTiming = {
  timeoutMs: number;
  graceMs: number;
  pollIntervalMs?: number;
};

export type ReadinessResult = {
  ready: boolean;
  waitedMs: number;
};

const DEFAULT_POLL_INTERVAL_MS = 100;
const BOOT_DATA_MARKER = "window.grafanaBootData";

const bootDataSchema = z.object({
  settings: z.object({
    datasources: z.record(z.object({ url: z.unknown().optional() }).passthrough())
  })
});

function isSuccess(status: number | null) {
  return status !== null && status >= 200 && status < 300;
}

export function isReady(entries: readonly TrafficEntry[], fragments: readonly string[]) {
  const relevant = entries.filter((entry) =>
    fragments.some((fragment) => entry.url.includes(fragment))
  );
  if (!relevant.every((entry) => isSuccess(entry.status))) {
    return false;
  }
  return fragments.every((fragment) =>
    relevant.some((entry) => entry.url.includes(fragment))
  );
}

/**
 * Waits until the data requests of the page have completed. Never fails:
 * once the deadline passes it returns `ready: false` and the caller
 * captures whatever is on screen.
 */
export async function waitForReadiness(
  traffic: TrafficLog,
  fragments: readonly string[],
  timing: ReadinessTiming,
  clock: Clock = systemClock
): Promise<ReadinessResult> {
  if (fragments.length === 0) {
    await clock.sleep(timing.timeoutMs);
    return { ready: false, waitedMs: timing.timeoutMs };
  }

  await clock.sleep(timing.graceMs);
  const startedAt = clock.now();
  const budget = timing.timeoutMs - timing.graceMs;
  const interval = timing.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  for (;;) {
    const elapsed = clock.now() - startedAt;
    if (isReady(traffic.entries(), fragments)) {
      return { ready: true, waitedMs: timing.graceMs + elapsed };
    }
    if (elapsed > budget) {
      return { ready: false, waitedMs: timing.graceMs + elapsed };
    }
    await clock.sleep(interval);
  }
}

/**
 * Reads the data-source URLs from the boot configuration embedded in the
 * page. Their substrings identify the panel's data requests.
 */
export async function discoverSignalFragments(
  session: GrafanaSession,
  url: string,
  log: ContextLogger
): Promise<string[]> {
  try {
    const response = await session.get(url);
    if (!response.ok) {
      log.warn("readiness.fragments.http", { status: response.status });
      return [];
    }
    const fragments = extractDataSourceUrls(await response.text());
    log.debug("readiness.fragments", { count: fragments.length });
    return fragments;
  } catch (error) {
    log.warn("readiness.fragments.failed", { error: describeError(error) });
    return [];
  }
}

export function extractDataSourceUrls(html: string): string[] {
  const literal = extractBootDataLiteral(html);
  if (!literal) return [];
  let parsed: unknown;
  try {
    parsed = JSON5.parse(literal);
  } catch {
    return [];
  }
  const result = bootDataSchema.safeParse(parsed);
  if (!result.success) return [];
  const urls: string[] = [];
  for (const datasource of Object.values(result.data.settings.datasources)) {
    if (typeof datasource.url === "string" && datasource.url.length > 0) {
      urls.push(datasource.url);
    }
  }
  return Array.from(new Set(urls));
}

export function extractBootDataLiteral(html: string): string | null {
  const $ = cheerio.load(html);
  const script = $("script")
    .toArray()
    .map((element) => $(element).html() ?? "")
    .find((content) => content.includes(BOOT_DATA_MARKER));
  if (!script) return null;

  const marker = script.indexOf(BOOT_DATA_MARKER);
  const assignment = script.indexOf("=", marker + BOOT_DATA_MARKER.length);
  if (assignment === -1) return null;
  const open = script.indexOf("{", assignment);
  if (open === -1) return null;
  const close = findClosingBrace(script, open);
  return close === -1 ? null : script.slice(open, close + 1);
}

/** Index of the brace closing the object opened at `open`, skipping string contents. */
function findClosingBrace(source: string, open: number) {
  let depth = 0;
  let quote: string | null = null;
  for (let index = open; index < source.length; index += 1) {
    const char = source[index];
    if (quote) {
      if (char === "\\") {
        index += 1;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'" || char === "`") {
      quote = char;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return -1;
}
