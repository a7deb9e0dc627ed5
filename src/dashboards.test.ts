import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadDashboardConfigs, parseDashboardConfigs } from "./dashboards.js";
import { ConfigError } from "./errors.js";

describe("parseDashboardConfigs", () => {
  it("fills every default", () => {
    const [config] = parseDashboardConfigs(
      ["main:", "  dashTitle: Main board", "  host: http://grafana.test/"].join("\n")
    );
    expect(config).toEqual({
      name: "main",
      dashTitle: "Main board",
      host: "http://grafana.test",
      orgId: 1,
      render: true,
      width: 1920,
      height: 1080,
      whiteTheme: false,
      threads: 4,
      timeout: 30,
      preloadTime: 2.5,
      snapshot: false,
      snapshotExpires: 0,
      auth: true,
      domain: false,
      ignoreHttpsErrors: false
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("keeps dashboards in file order", () => {
    const configs = parseDashboardConfigs(
      [
        "b-board:",
        "  dashTitle: B",
        "  host: http://grafana.test",
        "a-board:",
        "  dashTitle: A",
        "  host: http://grafana.test",
        "  render: false",
        "  vars:",
        "    host: [web-1, web-2]"
      ].join("\n")
    );
    expect(configs.map((config) => config.name)).toEqual(["b-board", "a-board"]);
    expect(configs[1].render).toBe(false);
    expect(configs[1].vars).toEqual({ host: ["web-1", "web-2"] });
  });

  it("rejects unknown options", () => {
    expect(() =>
      parseDashboardConfigs("main:\n  dashTitle: A\n  host: http://grafana.test\n  colour: red\n")
    ).toThrow(ConfigError);
  });

  it("rejects a grace period as long as the timeout", () => {
    expect(() =>
      parseDashboardConfigs(
        "main:\n  dashTitle: A\n  host: http://grafana.test\n  timeout: 2\n  preloadTime: 2\n"
      )
    ).toThrow("Invalid dashboard configuration in config.");
  });

  it("rejects names that cannot be used in file names", () => {
    expect(() =>
      parseDashboardConfigs("a__b:\n  dashTitle: A\n  host: http://grafana.test\n")
    ).toThrow("Invalid dashboard name: a__b");
  });

  it("rejects an empty file", () => {
    expect(() => parseDashboardConfigs("")).toThrow("No dashboards defined in config.");
  });

  it("reports a missing file", async () => {
    await expect(loadDashboardConfigs("/does/not/exist.yaml")).rejects.toThrow(
      "Configuration file /does/not/exist.yaml not found."
    );
  });

  it("accepts the example configuration", async () => {
    const configs = await loadDashboardConfigs(
      fileURLToPath(new URL("../config.example.yaml", import.meta.url))
    );
    expect(configs.map((config) => [config.name, config.render, config.snapshot])).toEqual([
      ["api_latency", true, false],
      ["db_overview", false, true]
    ]);
    expect(configs[0].vars).toEqual({ env: "staging", instance: ["api-1", "api-2"] });
  });
});
