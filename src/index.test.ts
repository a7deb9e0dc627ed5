import { describe, expect, it } from "vitest";
import * as reporter from "./index.js";

describe("package entry point", () => {
  it("exposes the capture, merge and publish operations", () => {
    for (const name of [
      "loadConfig",
      "loadDashboardConfigs",
      "resolveDashboard",
      "fetchDefinition",
      "acquireAll",
      "runPool",
      "waitForReadiness",
      "mergeRuns",
      "takeSnapshots",
      "publishReport",
      "runCaptureReport",
      "runUploadReport"
    ] as const) {
      expect(typeof reporter[name]).toBe("function");
    }
    expect(new reporter.MergeError("bad run")).toBeInstanceOf(reporter.ReporterError);
  });

  it("parses dashboards through the public API", () => {
    const [config] = reporter.parseDashboardConfigs(
      "main:\n  dashTitle: Main board\n  host: http://grafana.test\n"
    );
    expect(config.name).toBe("main");
    expect(reporter.flattenPanels([{ id: 1, panels: [{ id: 2 }, { id: 3 }] }]).map((panel) => panel.id)).toEqual([
      2, 3
    ]);
  });
});
