import { writeFile } from "node:fs/promises";
import { buildPanelViewUrl, buildRenderUrl, toFullscreenUrl, type DashboardRef } from "../grafana/links.js";
import { describeError } from "../errors.js";
import type { DashboardConfig } from "../dashboards.js";
import type { GrafanaSession } from "../grafana/session.js";
import type { ContextLogger } from "../logger.js";
import type { CaptureStrategy, CaptureTask } from "./engine.js";

export type RenderStrategyDeps = {
  config: DashboardConfig;
  session: GrafanaSession;
  dashboard: DashboardRef;
};

/**
 * Server-side rendering through Grafana's image renderer. No per-worker
 * resource.
 */
export function createRenderStrategy(deps: RenderStrategyDeps): CaptureStrategy<never> {
  const { config, session, dashboard } = deps;
  const timeoutMs = config.timeout * 1000;

  async function renderImage(task: CaptureTask) {
    const url = buildRenderUrl(config, dashboard, task.panel.id, task.timepoint);
    const response = await session.get(url, undefined, timeoutMs);
    if (!response.ok) {
      await response.body?.cancel();
      return `render returned ${response.status}`;
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    await writeFile(task.filePath, bytes);
    return null;
  }

  /** First link variant whose request completes, whatever its status. */
  async function resolvePermalink(viewUrl: string, log: ContextLogger) {
    for (const candidate of [toFullscreenUrl(viewUrl), viewUrl]) {
      try {
        const response = await session.get(candidate, undefined, timeoutMs);
        await response.body?.cancel();
        return candidate;
      } catch (error) {
        log.debug("capture.link.unreachable", { url: candidate, error: describeError(error) });
      }
    }
    return null;
  }

  return {
    kind: "render",
    async capture(task, _context, log) {
      const viewUrl = buildPanelViewUrl(config, dashboard, task.panel.id, task.timepoint);

      let renderError: string | null;
      try {
        renderError = await renderImage(task);
      } catch (error) {
        renderError = error instanceof Error ? error.message : String(error);
      }
      const link = await resolvePermalink(viewUrl, log);

      const errors = [
        renderError,
        link === null ? "permalink could not be resolved" : null
      ].filter((message): message is string => message !== null);

      return {
        panelId: task.panel.id,
        timepointId: task.timepoint.id,
        filePath: task.filePath,
        link,
        ok: errors.length === 0,
        error: errors.length > 0 ? errors.join("; ") : undefined
      };
    }
  };
}
