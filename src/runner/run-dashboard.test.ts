import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { runBatch, runDashboard } from "./run-dashboard.js";
import { readManifest } from "../manifest.js";
import {
  GRAFANA_HOST,
  dashboardConfig,
  fakeClock,
  fakeFetch,
  jsonResponse,
  silentLogger,
  tempDir,
  timepoint,
  type RecordedRequest
} from "../test-helpers/index.js";
import type { BrowserHandle } from "../capture/browser.js";
import type { TrafficEntry } from "../capture/readiness.js";

const retry = { retries: 0, backoffMs: 1 };
const wiki = { login: "", password: "" };
const timepoints = [timepoint(0, { tag: "load" }), timepoint(1)];

function grafana() {
  return fakeFetch((request: RecordedRequest) => {
    const url = new URL(request.url);
    if (url.pathname === "/api/search") {
      return jsonResponse(
        url.searchParams.get("query") === "Main board"
          ? [{ uid: "abc", title: "Main board", url: "/d/abc/main-board" }]
          : []
      );
    }
    if (url.pathname === "/api/dashboards/uid/abc") {
      return jsonResponse({
        dashboard: {
          title: "Main board",
          panels: [
            { id: 1, type: "graph", title: "CPU" },
            { id: 2, type: "row", title: "Hosts", panels: [{ id: 3, type: "stat", title: "RAM" }] }
          ]
        }
      });
    }
    if (url.pathname.startsWith("/render/d-solo/")) {
      return new Response(new Uint8Array([1, 2, 3]));
    }
    if (url.pathname === "/api/snapshots" && request.method === "POST") {
      return jsonResponse({ key: "snap1", url: `${GRAFANA_HOST}/dashboard/snapshot/snap1` });
    }
    if (url.pathname === "/api/snapshots/snap1") {
      return jsonResponse({ dashboard: { title: "Main board" } });
    }
    if (url.pathname.startsWith("/d/abc/")) {
      return new Response("<html></html>");
    }
    return undefined;
  });
}

describe("runDashboard", () => {
  it("captures every pair, snapshots and writes the manifest", async () => {
    const runFolder = await tempDir();
    const { fetch, requests } = grafana();
    const result = await runDashboard({
      config: dashboardConfig({ snapshot: true }),
      timepoints,
      runFolder,
      wiki,
      retry,
      log: silentLogger,
      deps: { fetch }
    });

    expect(result.failedPairs).toBe(0);
    expect(result.dataset.panels.map((panel) => panel.id)).toEqual([1, 3]);
    expect(result.dataset.panels.every((panel) => panel.links.every((link) => link?.endsWith("&fullscreen")))).toBe(
      true
    );
    expect((await readdir(join(runFolder, "main"))).sort()).toEqual([
      "main__1__0.png",
      "main__1__1.png",
      "main__3__0.png",
      "main__3__1.png"
    ]);
    expect(result.dataset.snapshotLinks).toEqual([
      `${GRAFANA_HOST}/dashboard/snapshot/snap1`,
      `${GRAFANA_HOST}/dashboard/snapshot/snap1`
    ]);
    expect(JSON.parse(await readFile(join(runFolder, "main__load.json"), "utf8"))).toEqual({
      dashboard: { title: "Main board" }
    });
    await expect(readFile(join(runFolder, "main__1.json"), "utf8")).resolves.toBe(
      JSON.stringify({ dashboard: { title: "Main board" } })
    );

    const snapshotPost = requests.find((request) => request.method === "POST");
    expect(JSON.parse(snapshotPost?.body ?? "{}")).toMatchObject({
      name: "main__load",
      expires: 0,
      dashboard: {
        time: { from: "2023-11-14T22:13:20.000Z", to: "2023-11-14T22:23:20.000Z" }
      }
    });

    const manifest = await readManifest(result.manifestPath);
    expect(manifest.fullLinks).toEqual([
      `${GRAFANA_HOST}/d/abc/main-board?orgId=1&from=1700000000000&to=1700000600000`,
      `${GRAFANA_HOST}/d/abc/main-board?orgId=1&from=1700003600000&to=1700004200000`
    ]);
    expect(manifest.chartsPath).toBe(join(runFolder, "main"));
  });

  it("captures through a worker browser when rendering is off", async () => {
    const runFolder = await tempDir();
    const { fetch } = grafana();
    const { clock } = fakeClock();
    let launches = 0;
    let closes = 0;
    const launcher = () => async (): Promise<BrowserHandle> => {
      launches += 1;
      const entries: TrafficEntry[] = [];
      return {
        traffic: { entries: () => entries, clear: () => void entries.splice(0) },
        navigate: async (url) => {
          entries.push({ url, status: 200 });
        },
        currentUrl: () => entries[0]?.url ?? "about:blank",
        screenshot: async () => undefined,
        close: async () => {
          closes += 1;
        }
      };
    };

    const result = await runDashboard({
      config: dashboardConfig({ render: false, threads: 2 }),
      timepoints,
      runFolder,
      wiki,
      retry,
      log: silentLogger,
      deps: { fetch, launcher, clock }
    });

    expect(result.failedPairs).toBe(0);
    expect(launches).toBe(2);
    expect(closes).toBe(2);
    expect(result.dataset.panels[0].links).toHaveLength(2);
  });
});

describe("runBatch", () => {
  it("keeps running the other dashboards when one fails", async () => {
    const root = await tempDir();
    const { fetch } = grafana();
    const batch = await runBatch({
      configs: [dashboardConfig({}, "main"), dashboardConfig({ dashTitle: "Ghost board" }, "ghost")],
      timepoints,
      runFolder: join(root, "1__2024-01-01_00-00-00"),
      wiki,
      retry,
      threads: 2,
      deps: { fetch }
    });

    expect(batch.failed).toBe(1);
    expect(batch.results.map((result) => [result.name, result.status])).toEqual([
      ["main", "success"],
      ["ghost", "failed"]
    ]);
    expect(batch.results[1].error).toBe('Dashboard with title "Ghost board" not found.');
    expect(await readdir(batch.runFolder)).toContain("main.yaml");
  });
});
