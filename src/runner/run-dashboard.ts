import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { acquireAll, type AcquireResult } from "../capture/engine.js";
import { createRenderStrategy } from "../capture/render-strategy.js";
import { createBrowserStrategy } from "../capture/browser-strategy.js";
import { createPlaywrightLauncher, type BrowserLauncher } from "../capture/browser.js";
import { runPool } from "../capture/pool.js";
import { buildFullLink } from "../grafana/links.js";
import { fetchDefinition, panelsFromDefinition, resolveDashboard } from "../grafana/resolver.js";
import { GrafanaSession, type FetchLike, type WikiCredentials } from "../grafana/session.js";
import { writeManifest } from "../manifest.js";
import { takeSnapshots } from "../snapshot.js";
import { describeError } from "../errors.js";
import { logger as rootLogger, type ContextLogger } from "../logger.js";
import type { Clock } from "../capture/readiness.js";
import type { DashboardConfig } from "../dashboards.js";
import type { RetryConfig } from "../retry.js";
import type { Timepoint } from "../timepoints.js";
import type { DashboardDataset } from "../types.js";
import type { BatchRunResult, DashboardRunResult } from "./types.js";

export type LauncherFactory = (
  config: DashboardConfig,
  session: GrafanaSession,
  log: ContextLogger
) => BrowserLauncher;

/** Seams replaced in tests; production uses global fetch and Playwright. */
export type RunDependencies = {
  fetch?: FetchLike;
  launcher?: LauncherFactory;
  clock?: Clock;
};

export type RunDashboardArgs = {
  config: DashboardConfig;
  timepoints: readonly Timepoint[];
  runFolder: string;
  wiki: WikiCredentials;
  retry: RetryConfig;
  log: ContextLogger;
  deps?: RunDependencies;
};

/**
 * Resolves, captures and snapshots one dashboard, then writes its manifest.
 * Pair failures are counted; anything else propagates.
 */
export async function runDashboard(args: RunDashboardArgs) {
  const { config, timepoints, runFolder, log } = args;
  const deps = args.deps ?? {};

  const session = new GrafanaSession(config.host, {
    timeoutMs: config.timeout * 1000,
    fetch: deps.fetch
  });
  await session.authenticate(config, args.wiki, log);
  session.seal();

  const retry: RetryConfig = {
    ...args.retry,
    onRetry: (error, attempt, waitMs) =>
      log.warn("network.retry", { attempt, waitMs, error: describeError(error) })
  };
  const dashboard = await resolveDashboard(session, config.dashTitle, retry);
  const definition = await fetchDefinition(session, dashboard.uid, retry);
  const panels = panelsFromDefinition(definition, dashboard.uid, timepoints.length);
  log.info("dashboard.resolved", { uid: dashboard.uid, panels: panels.length });

  const chartsPath = join(runFolder, config.name);
  const common = { config, panels, timepoints, chartsPath, log };
  let acquired: AcquireResult;
  if (config.render) {
    acquired = await acquireAll({
      ...common,
      strategy: createRenderStrategy({ config, session, dashboard })
    });
  } else {
    const launcherFactory = deps.launcher ?? createPlaywrightLauncher;
    acquired = await acquireAll({
      ...common,
      strategy: createBrowserStrategy({
        config,
        session,
        dashboard,
        launcher: launcherFactory(config, session, log),
        clock: deps.clock
      })
    });
  }

  const snapshotLinks = config.snapshot
    ? await takeSnapshots({ config, session, definition, timepoints, runFolder, log })
    : undefined;

  const dataset: DashboardDataset = {
    name: config.name,
    chartsPath,
    fullLinks: timepoints.map((timepoint) => buildFullLink(config, dashboard, timepoint)),
    snapshotLinks,
    timepoints: [...timepoints],
    panels
  };
  const manifestPath = await writeManifest(runFolder, dataset);
  return { dataset, manifestPath, failedPairs: acquired.failed };
}

export type RunBatchArgs = {
  configs: readonly DashboardConfig[];
  timepoints: readonly Timepoint[];
  runFolder: string;
  wiki: WikiCredentials;
  retry: RetryConfig;
  threads: number;
  deps?: RunDependencies;
};

/** Runs every dashboard; one dashboard's failure leaves the others running. */
export async function runBatch(args: RunBatchArgs): Promise<BatchRunResult> {
  const { configs, runFolder } = args;
  await mkdir(runFolder, { recursive: true });
  rootLogger.info("batch.start", { dashboards: configs.length, runFolder, threads: args.threads });

  const results = configs.map((config): DashboardRunResult => ({
    name: config.name,
    status: "failed",
    error: "not run"
  }));
  await runPool(configs, { width: args.threads }, async (config, _context, index) => {
    const log = rootLogger.withContext({ dashboard: config.name });
    const startedAt = Date.now();
    log.info("dashboard.start", { render: config.render });
    try {
      const outcome = await runDashboard({ ...args, config, log });
      results[index] = {
        name: config.name,
        status: "success",
        dataset: outcome.dataset,
        manifestPath: outcome.manifestPath,
        failedPairs: outcome.failedPairs,
        durationMs: Date.now() - startedAt
      };
      log.info("dashboard.done", { failedPairs: outcome.failedPairs });
    } catch (error) {
      results[index] = {
        name: config.name,
        status: "failed",
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startedAt
      };
      log.error("dashboard.failed", { error: describeError(error) });
    }
  });

  const failed = results.filter((result) => result.status === "failed").length;
  rootLogger.info("batch.done", { succeeded: results.length - failed, failed });
  return { runFolder, results, failed };
}
