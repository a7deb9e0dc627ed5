import { buildPanelViewUrl, toFullscreenUrl, type DashboardRef } from "../grafana/links.js";
import { CaptureError, describeError } from "../errors.js";
import {
  discoverSignalFragments,
  systemClock,
  waitForReadiness,
  type Clock
} from "./readiness.js";
import type { DashboardConfig } from "../dashboards.js";
import type { GrafanaSession } from "../grafana/session.js";
import type { ContextLogger } from "../logger.js";
import type { BrowserHandle, BrowserLauncher } from "./browser.js";
import type { CaptureStrategy } from "./engine.js";

export type BrowserStrategyDeps = {
  config: DashboardConfig;
  session: GrafanaSession;
  dashboard: DashboardRef;
  launcher: BrowserLauncher;
  clock?: Clock;
};

export function createBrowserStrategy(deps: BrowserStrategyDeps): CaptureStrategy<BrowserHandle> {
  const { config, session, dashboard, launcher } = deps;
  const clock = deps.clock ?? systemClock;
  const timing = {
    timeoutMs: config.timeout * 1000,
    graceMs: config.preloadTime * 1000
  };

  /** Navigates and checks the browser's own record of the document request. */
  async function tryNavigate(browser: BrowserHandle, url: string, log: ContextLogger) {
    browser.traffic.clear();
    try {
      await browser.navigate(url);
    } catch (error) {
      log.debug("capture.navigate.failed", { url, error: describeError(error) });
      return false;
    }
    const target = normalizeUrl(url);
    const ok = browser.traffic
      .entries()
      .some(
        (entry) =>
          normalizeUrl(entry.url) === target &&
          entry.status !== null &&
          entry.status >= 200 &&
          entry.status < 300
      );
    if (!ok) {
      log.debug("capture.navigate.rejected", { url });
    }
    return ok;
  }

  return {
    kind: "browser",
    acquire: (workerId) => launcher(workerId),
    release: (browser) => browser.close(),
    async capture(task, context, log) {
      const browser = await context.resource();
      const viewUrl = buildPanelViewUrl(config, dashboard, task.panel.id, task.timepoint);

      let link: string | null = null;
      for (const candidate of [toFullscreenUrl(viewUrl), viewUrl]) {
        if (await tryNavigate(browser, candidate, log)) {
          link = candidate;
          break;
        }
      }
      if (link === null) {
        throw new CaptureError(`Request to ${viewUrl} did not succeed.`, {
          dashboard: config.name,
          panelId: task.panel.id,
          timepointId: task.timepoint.id
        });
      }

      const fragments = await discoverSignalFragments(session, browser.currentUrl(), log);
      const readiness = await waitForReadiness(browser.traffic, fragments, timing, clock);
      log.debug("capture.readiness", {
        fragments: fragments.length,
        ready: readiness.ready,
        waitedMs: readiness.waitedMs
      });

      try {
        await browser.screenshot(task.filePath);
      } catch (error) {
        return {
          panelId: task.panel.id,
          timepointId: task.timepoint.id,
          filePath: task.filePath,
          link,
          ok: false,
          error: `screenshot failed: ${error instanceof Error ? error.message : String(error)}`
        };
      }

      return {
        panelId: task.panel.id,
        timepointId: task.timepoint.id,
        filePath: task.filePath,
        link,
        ok: true
      };
    }
  };
}

function normalizeUrl(url: string) {
  try {
    return new URL(url).href;
  } catch {
    return url;
  }
}
