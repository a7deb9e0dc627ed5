export { loadConfig, type AppConfig } from "./config.js";
export { loadDashboardConfigs, parseDashboardConfigs, type DashboardConfig } from "./dashboards.js";
export {
  AuthError,
  CaptureError,
  ConfigError,
  MergeError,
  PublishError,
  ReporterError,
  ResolutionError
} from "./errors.js";
export { logger, setLoggerConfig, type ContextLogger } from "./logger.js";
export { parseTimepoint, parseTimepoints, type Timepoint } from "./timepoints.js";
export { GrafanaSession, type FetchLike } from "./grafana/session.js";
export { fetchDefinition, fetchPanels, flattenPanels, resolveDashboard } from "./grafana/resolver.js";
export { acquireAll, type CaptureStrategy } from "./capture/engine.js";
export { runPool, type WorkerContext } from "./capture/pool.js";
export { discoverSignalFragments, waitForReadiness } from "./capture/readiness.js";
export { createRenderStrategy } from "./capture/render-strategy.js";
export { createBrowserStrategy } from "./capture/browser-strategy.js";
export { createPlaywrightLauncher, type BrowserHandle } from "./capture/browser.js";
export { mergeRuns } from "./merge.js";
export { readRunFolder, writeManifest, type RunManifest } from "./manifest.js";
export { takeSnapshots } from "./snapshot.js";
export { ConfluenceClient } from "./wiki/confluence.js";
export { composePageBody, renderReport } from "./wiki/page.js";
export { publishReport } from "./wiki/publish.js";
export { runBatch, runDashboard } from "./runner/run-dashboard.js";
export { runCaptureReport, runUploadReport, type ReportOptions } from "./runner/run-report.js";
export type { CaptureOutcome, DashboardDataset, Panel } from "./types.js";
