import { describe, expect, it } from "vitest";
import { createBrowserStrategy } from "./browser-strategy.js";
import { GrafanaSession } from "../grafana/session.js";
import { CaptureError } from "../errors.js";
import { createPanel } from "../types.js";
import {
  GRAFANA_HOST,
  dashboardConfig,
  fakeClock,
  fakeFetch,
  silentLogger,
  timepoint
} from "../test-helpers/index.js";
import type { BrowserHandle } from "./browser.js";
import type { TrafficEntry } from "./readiness.js";

const dashboard = { uid: "abc", url: "/d/abc/main-board" };
const viewUrl =
  `${GRAFANA_HOST}/d/abc/main-board?orgId=1&panelId=3&viewPanel=3` +
  "&from=1700000000000&to=1700000600000&theme=dark";
const dataUrl = `${GRAFANA_HOST}/api/datasources/proxy/1/api/v1/query_range`;
const bootPage =
  "<script>window.grafanaBootData = { settings: { datasources: " +
  "{ Prometheus: { url: '/api/datasources/proxy/1' } } } };</script>";

type FakeBrowser = BrowserHandle & { navigations: string[]; screenshots: string[] };

type FakeOptions = { screenshotError?: Error; redirects?: Record<string, string> };

/** Status of the document request per navigated url; missing urls throw. */
function fakeBrowser(statuses: Record<string, number>, options: FakeOptions = {}): FakeBrowser {
  const entries: TrafficEntry[] = [];
  let current = "about:blank";
  const navigations: string[] = [];
  const screenshots: string[] = [];
  return {
    navigations,
    screenshots,
    traffic: {
      entries: () => entries,
      clear: () => {
        entries.length = 0;
      }
    },
    async navigate(url) {
      navigations.push(url);
      const status = statuses[url];
      if (status === undefined) throw new Error("net::ERR_CONNECTION_REFUSED");
      entries.push({ url, status }, { url: dataUrl, status: 200 });
      current = options.redirects?.[url] ?? url;
    },
    currentUrl: () => current,
    async screenshot(path) {
      if (options.screenshotError) throw options.screenshotError;
      screenshots.push(path);
    },
    async close() {}
  };
}

async function captureWith(browser: FakeBrowser) {
  const { fetch, requests } = fakeFetch(() => new Response(bootPage));
  const session = new GrafanaSession(GRAFANA_HOST, { timeoutMs: 1000, fetch });
  const { clock, sleeps } = fakeClock();
  const strategy = createBrowserStrategy({
    config: dashboardConfig({ render: false }),
    session,
    dashboard,
    launcher: async () => browser,
    clock
  });
  const outcome = await strategy.capture(
    {
      panel: createPanel(3, "graph", "CPU", 1),
      timepoint: timepoint(0),
      filePath: "/charts/main__3__0.png"
    },
    { workerId: 0, resource: async () => browser },
    silentLogger
  );
  return { outcome, sleeps, requests };
}

describe("browser strategy", () => {
  it("captures through the fullscreen link once the data has loaded", async () => {
    const browser = fakeBrowser({ [`${viewUrl}&fullscreen`]: 200 });
    const { outcome, sleeps } = await captureWith(browser);
    expect(outcome).toEqual({
      panelId: 3,
      timepointId: 0,
      filePath: "/charts/main__3__0.png",
      link: `${viewUrl}&fullscreen`,
      ok: true
    });
    expect(browser.navigations).toEqual([`${viewUrl}&fullscreen`]);
    expect(browser.screenshots).toEqual(["/charts/main__3__0.png"]);
    expect(sleeps).toEqual([2_500]);
  });

  it("reads the data sources from the page the browser landed on", async () => {
    const landed = `${GRAFANA_HOST}/d/abc/main-board?orgId=1&viewPanel=3&kiosk`;
    const browser = fakeBrowser(
      { [`${viewUrl}&fullscreen`]: 200 },
      { redirects: { [`${viewUrl}&fullscreen`]: landed } }
    );
    const { outcome, requests, sleeps } = await captureWith(browser);
    expect(outcome.link).toBe(`${viewUrl}&fullscreen`);
    expect(requests.map((request) => request.url)).toEqual([landed]);
    expect(sleeps).toEqual([2_500]);
  });

  it("falls back to the plain link when the fullscreen request fails", async () => {
    const browser = fakeBrowser({ [`${viewUrl}&fullscreen`]: 404, [viewUrl]: 200 });
    const { outcome } = await captureWith(browser);
    expect(outcome.link).toBe(viewUrl);
    expect(outcome.ok).toBe(true);
    expect(browser.traffic.entries().map((entry) => entry.url)).toEqual([viewUrl, dataUrl]);
  });

  it("fails the pair when neither link loads", async () => {
    const browser = fakeBrowser({});
    await expect(captureWith(browser)).rejects.toThrow(CaptureError);
    expect(browser.screenshots).toEqual([]);
  });

  it("keeps the link when the screenshot fails", async () => {
    const browser = fakeBrowser({ [`${viewUrl}&fullscreen`]: 200 }, { screenshotError: new Error("disk full") });
    const { outcome } = await captureWith(browser);
    expect(outcome.ok).toBe(false);
    expect(outcome.link).toBe(`${viewUrl}&fullscreen`);
    expect(outcome.error).toBe("screenshot failed: disk full");
  });
});
