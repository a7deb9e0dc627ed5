import { describe, expect, it } from "vitest";
import { fetchPanels, flattenPanels, resolveDashboard } from "./resolver.js";
import { GrafanaSession } from "./session.js";
import { ResolutionError } from "../errors.js";
import { GRAFANA_HOST, fakeFetch, jsonResponse } from "../test-helpers/index.js";

const retry = { retries: 0, backoffMs: 1 };

function sessionWith(fetchImpl: ReturnType<typeof fakeFetch>["fetch"]) {
  return new GrafanaSession(GRAFANA_HOST, { timeoutMs: 1000, fetch: fetchImpl });
}

describe("resolveDashboard", () => {
  it("returns the exact title match", async () => {
    const { fetch, requests } = fakeFetch(() =>
      jsonResponse([
        { uid: "x1", title: "Main board copy", url: "/d/x1/main-board-copy" },
        { uid: "x2", title: "Main board", url: "/d/x2/main-board" }
      ])
    );
    const ref = await resolveDashboard(sessionWith(fetch), "Main board", retry);
    expect(ref).toEqual({ uid: "x2", url: "/d/x2/main-board" });
    expect(requests[0].url).toBe(`${GRAFANA_HOST}/api/search?query=Main+board`);
  });

  it("fails when no title matches exactly", async () => {
    const { fetch } = fakeFetch(() =>
      jsonResponse([{ uid: "x1", title: "main board", url: "/d/x1/main-board" }])
    );
    await expect(resolveDashboard(sessionWith(fetch), "Main board", retry)).rejects.toThrow(
      ResolutionError
    );
  });

  it("fails when the search call fails", async () => {
    const { fetch } = fakeFetch(() => new Response("boom", { status: 500 }));
    await expect(resolveDashboard(sessionWith(fetch), "Main board", retry)).rejects.toThrow(
      "Failed to retrieve dashboard list."
    );
  });

  it("retries a failed search", async () => {
    let calls = 0;
    const { fetch } = fakeFetch(() => {
      calls += 1;
      return calls === 1
        ? new Response("busy", { status: 503 })
        : jsonResponse([{ uid: "x2", title: "Main board", url: "/d/x2/main-board" }]);
    });
    const ref = await resolveDashboard(sessionWith(fetch), "Main board", {
      retries: 1,
      backoffMs: 1
    });
    expect(ref.uid).toBe("x2");
    expect(calls).toBe(2);
  });

  it("does not retry a definitive client error", async () => {
    const { fetch, requests } = fakeFetch(() => new Response("forbidden", { status: 403 }));
    await expect(
      resolveDashboard(sessionWith(fetch), "Main board", { retries: 3, backoffMs: 1 })
    ).rejects.toThrow("Failed to retrieve dashboard list.");
    expect(requests).toHaveLength(1);
  });
});

describe("flattenPanels", () => {
  it("replaces groups by their children in document order", () => {
    const flat = flattenPanels([
      { id: 1, title: "A" },
      {
        id: 2,
        title: "Row",
        panels: [
          { id: 3, title: "B" },
          { id: 4, panels: [{ id: 5, title: "C" }] },
          { id: 6, title: "D" }
        ]
      },
      { id: 7, title: "E" }
    ]);
    expect(flat.map((panel) => panel.id)).toEqual([1, 3, 5, 6, 7]);
  });

  it("drops empty groups", () => {
    expect(flattenPanels([{ id: 1, panels: [] }])).toEqual([]);
  });
});

describe("fetchPanels", () => {
  it("creates panels with one empty link slot per timepoint", async () => {
    const { fetch, requests } = fakeFetch(() =>
      jsonResponse({
        dashboard: {
          title: "Main board",
          panels: [
            { id: 1, type: "graph", title: "CPU" },
            { id: 2, type: "row", panels: [{ id: 3, type: "stat" }] }
          ]
        }
      })
    );
    const panels = await fetchPanels(sessionWith(fetch), "x2", 2, retry);
    expect(requests[0].url).toBe(`${GRAFANA_HOST}/api/dashboards/uid/x2`);
    expect(panels).toEqual([
      { id: 1, type: "graph", title: "CPU", links: [null, null] },
      { id: 3, type: "stat", title: "Row", links: [null, null] }
    ]);
  });

  it("rejects a panel without id", async () => {
    const { fetch } = fakeFetch(() => jsonResponse({ dashboard: { panels: [{ title: "x" }] } }));
    await expect(fetchPanels(sessionWith(fetch), "x2", 1, retry)).rejects.toThrow(
      "Panel without id in dashboard definition."
    );
  });
});
