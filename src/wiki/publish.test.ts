import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { contentTypeOf, publishReport, readDirRecursive } from "./publish.js";
import { ConfluenceClient } from "./confluence.js";
import { PublishError } from "../errors.js";
import {
  fakeFetch,
  jsonResponse,
  silentLogger,
  tempDir,
  timepoint,
  type RecordedRequest
} from "../test-helpers/index.js";
import type { DashboardDataset } from "../types.js";

const WIKI = "https://wiki.example.test";

async function runFolder() {
  const folder = await tempDir();
  const chartsPath = join(folder, "main");
  await mkdir(chartsPath);
  await writeFile(join(chartsPath, "main__1__0.png"), "a");
  await writeFile(join(chartsPath, "main__2__0.png"), "b");
  await writeFile(join(folder, "main__load.json"), "{}");
  await writeFile(join(folder, "main.yaml"), "name: main");
  const dataset: DashboardDataset = {
    name: "main",
    chartsPath,
    fullLinks: ["http://g/full"],
    timepoints: [timepoint(0, { startHuman: "S0", endHuman: "E0" })],
    panels: [
      { id: 1, type: "graph", title: "CPU", links: ["http://g/p1"] },
      { id: 2, type: "graph", title: "RAM", links: ["http://g/p2"] }
    ]
  };
  return { folder, dataset };
}

/** Wiki stand-in; `failingPost` is the 1-based upload that is rejected. */
function wiki(failingPost?: number) {
  let posts = 0;
  return fakeFetch((request: RecordedRequest) => {
    if (request.url.includes("/child/attachment?filename=")) {
      return jsonResponse({ results: [] });
    }
    if (request.method === "POST") {
      posts += 1;
      return posts === failingPost
        ? new Response("too large", { status: 413 })
        : jsonResponse({});
    }
    if (request.method === "GET") {
      return jsonResponse({
        id: "42",
        title: "Load test",
        body: { storage: { value: "<p>Summary</p>%%%graphs%%%" } },
        version: { number: 1 }
      });
    }
    return jsonResponse({});
  });
}

function clientFor(fetchImpl: ReturnType<typeof fakeFetch>["fetch"]) {
  return new ConfluenceClient({
    baseUrl: WIKI,
    login: "reporter",
    password: "test-secret",
    retry: { retries: 0, backoffMs: 1 },
    fetch: fetchImpl
  });
}

describe("readDirRecursive", () => {
  it("lists files below a folder", async () => {
    const { folder } = await runFolder();
    const files = await readDirRecursive(folder);
    expect(files).toEqual([
      join(folder, "main.yaml"),
      join(folder, "main", "main__1__0.png"),
      join(folder, "main", "main__2__0.png"),
      join(folder, "main__load.json")
    ]);
  });
});

describe("contentTypeOf", () => {
  it("maps charts and backups", () => {
    expect(contentTypeOf("a/b.png")).toBe("image/png");
    expect(contentTypeOf("a/b.json")).toBe("application/json");
    expect(contentTypeOf("a/b.bin")).toBe("application/octet-stream");
  });
});

describe("publishReport", () => {
  it("attaches charts and backups, then fills the placeholder", async () => {
    const { folder, dataset } = await runFolder();
    const { fetch, requests } = wiki();
    await publishReport({
      client: clientFor(fetch),
      pageId: "42",
      datasets: [dataset],
      backupFolders: [folder],
      graphWidth: 600,
      threads: 1,
      log: silentLogger
    });

    const uploads = requests.filter((request) => request.method === "POST");
    expect(uploads).toHaveLength(3);
    const put = requests.find((request) => request.method === "PUT");
    const body: unknown = JSON.parse(put?.body ?? "{}");
    expect(body).toMatchObject({
      version: { number: 2 },
      body: { storage: { representation: "storage" } }
    });
    expect(put?.body).toContain("<p>Summary</p><h2>main</h2>");
    expect(put?.body).not.toContain("%%%graphs%%%");
  });

  it("still updates the page when an upload fails", async () => {
    const { folder, dataset } = await runFolder();
    const { fetch, requests } = wiki(2);
    await expect(
      publishReport({
        client: clientFor(fetch),
        pageId: "42",
        datasets: [dataset],
        backupFolders: [folder],
        graphWidth: 600,
        threads: 1,
        log: silentLogger
      })
    ).rejects.toThrow(PublishError);
    expect(requests.some((request) => request.method === "PUT")).toBe(true);
  });
});
