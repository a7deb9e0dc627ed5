import { z } from "zod";
import { ResolutionError } from "../errors.js";
import { retryTransient, withRetry, type RetryConfig } from "../retry.js";
import { createPanel, type Panel } from "../types.js";
import type { GrafanaSession } from "./session.js";
import type { DashboardRef } from "./links.js";

const searchResultSchema = z.array(
  z
    .object({
      uid: z.string(),
      title: z.string(),
      url: z.string()
    })
    .passthrough()
);

/** Panel model as stored by Grafana; layout, queries and options ride along untouched. */
export type RawPanel = {
  id?: number;
  type?: string;
  title?: string;
  panels?: RawPanel[];
  [field: string]: unknown;
};

const rawPanelSchema: z.ZodType<RawPanel> = z.lazy(() =>
  z
    .object({
      id: z.number().optional(),
      type: z.string().optional(),
      title: z.string().optional(),
      panels: z.array(rawPanelSchema).optional()
    })
    .passthrough()
);

const dashboardResponseSchema = z.object({
  dashboard: z
    .object({
      panels: z.array(rawPanelSchema).default([])
    })
    .passthrough()
});

export async function resolveDashboard(
  session: GrafanaSession,
  title: string,
  retry: RetryConfig
): Promise<DashboardRef> {
  const results = await withRetry(async () => {
    const response = await session.get("/api/search", { query: title });
    if (response.status !== 200) {
      throw new ResolutionError("Failed to retrieve dashboard list.", {
        title,
        status: response.status
      });
    }
    return searchResultSchema.parse(await response.json());
  }, retryTransient(retry)).catch((error: unknown) => {
    if (error instanceof ResolutionError) throw error;
    throw new ResolutionError("Dashboard search failed.", { title }, { cause: error });
  });

  const match = results.find((item) => item.title === title);
  if (!match) {
    throw new ResolutionError(`Dashboard with title "${title}" not found.`, {
      title,
      candidates: results.length
    });
  }
  return { uid: match.uid, url: match.url };
}

export type DashboardDefinition = z.infer<typeof dashboardResponseSchema>["dashboard"];

/** Raw dashboard model, kept whole so it can be posted back as a snapshot. */
export async function fetchDefinition(
  session: GrafanaSession,
  uid: string,
  retry: RetryConfig
): Promise<DashboardDefinition> {
  const response = await withRetry(async () => {
    const result = await session.get(`/api/dashboards/uid/${encodeURIComponent(uid)}`);
    if (result.status !== 200) {
      throw new ResolutionError("Failed to retrieve dashboard details.", {
        uid,
        status: result.status
      });
    }
    return dashboardResponseSchema.parse(await result.json());
  }, retryTransient(retry)).catch((error: unknown) => {
    if (error instanceof ResolutionError) throw error;
    throw new ResolutionError("Dashboard definition could not be loaded.", { uid }, { cause: error });
  });
  return response.dashboard;
}

export function panelsFromDefinition(
  definition: DashboardDefinition,
  uid: string,
  timepointCount: number
): Panel[] {
  return flattenPanels(definition.panels).map((raw) => {
    if (raw.id === undefined) {
      throw new ResolutionError("Panel without id in dashboard definition.", { uid });
    }
    return createPanel(raw.id, raw.type ?? "unknown", raw.title ?? "Row", timepointCount);
  });
}

export async function fetchPanels(
  session: GrafanaSession,
  uid: string,
  timepointCount: number,
  retry: RetryConfig
): Promise<Panel[]> {
  return panelsFromDefinition(await fetchDefinition(session, uid, retry), uid, timepointCount);
}

/**
 * Depth-first, document-order flattening of nested rows. Entries that carry
 * a `panels` array are replaced by their children.
 */
export function flattenPanels(panels: RawPanel[]): RawPanel[] {
  const result: RawPanel[] = [];
  const stack: RawPanel[] = [...panels].reverse();
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    if (next.panels) {
      for (let index = next.panels.length - 1; index >= 0; index -= 1) {
        stack.push(next.panels[index]);
      }
      continue;
    }
    result.push(next);
  }
  return result;
}
