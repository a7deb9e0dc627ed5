import { ConfigError } from "../errors.js";
import { loadDashboardConfigs } from "../dashboards.js";
import { mergeRuns } from "../merge.js";
import { readRunFolder } from "../manifest.js";
import { parseTimepoints } from "../timepoints.js";
import { buildRunFolder } from "../utils.js";
import { logger } from "../logger.js";
import { ConfluenceClient } from "../wiki/confluence.js";
import { publishReport } from "../wiki/publish.js";
import { runBatch, type RunDependencies } from "./run-dashboard.js";
import type { FetchLike } from "../grafana/session.js";
import type { RetryConfig } from "../retry.js";
import type { DashboardDataset } from "../types.js";
import type { BatchRunResult } from "./types.js";

export type WikiTarget = {
  url?: string;
  login?: string;
  password?: string;
  pageId?: string;
  attachmentThreads: number;
};

export type ReportOptions = {
  wiki: WikiTarget;
  configPath: string;
  outputRoot: string;
  testId: string;
  timestamps: string[];
  threads: number;
  timeZone: string;
  graphWidth: number;
  onlyGraphs: boolean;
  retry: RetryConfig;
};

export type ReportDependencies = RunDependencies & {
  /** Used for the wiki client only. */
  wikiFetch?: FetchLike;
  now?: () => Date;
};

export type CaptureReport = BatchRunResult & { published: boolean };

export type UploadReport = {
  folder: string;
  datasets: DashboardDataset[];
  merged: boolean;
  published: boolean;
};

function createWikiClient(wiki: WikiTarget, retry: RetryConfig, deps: ReportDependencies) {
  const missing = [
    wiki.url ? null : "wiki url",
    wiki.login ? null : "wiki login",
    wiki.password ? null : "wiki password",
    wiki.pageId ? null : "page id"
  ].filter((item): item is string => item !== null);
  if (!wiki.url || !wiki.login || !wiki.password || !wiki.pageId) {
    throw new ConfigError(`Publishing needs: ${missing.join(", ")}.`, { missing });
  }
  return {
    pageId: wiki.pageId,
    client: new ConfluenceClient({
      baseUrl: wiki.url,
      login: wiki.login,
      password: wiki.password,
      retry,
      fetch: deps.wikiFetch
    })
  };
}

/**
 * Captures every configured dashboard into a new run folder and, unless
 * `onlyGraphs` is set, publishes the dashboards that succeeded.
 */
export async function runCaptureReport(
  options: ReportOptions,
  deps: ReportDependencies = {}
): Promise<CaptureReport> {
  if (options.timestamps.length === 0) {
    throw new ConfigError("At least one time window is required.");
  }
  const timepoints = parseTimepoints(options.timestamps, options.timeZone);
  const configs = await loadDashboardConfigs(options.configPath);
  const wiki = options.onlyGraphs ? null : createWikiClient(options.wiki, options.retry, deps);

  const now = deps.now ?? (() => new Date());
  const runFolder = buildRunFolder(options.outputRoot, options.testId, now(), options.timeZone);
  const batch = await runBatch({
    configs,
    timepoints,
    runFolder,
    wiki: { login: options.wiki.login ?? "", password: options.wiki.password ?? "" },
    retry: options.retry,
    threads: options.threads,
    deps
  });

  const datasets = batch.results.flatMap((result) => (result.dataset ? [result.dataset] : []));
  if (!wiki || datasets.length === 0) {
    return { ...batch, published: false };
  }
  await publishReport({
    client: wiki.client,
    pageId: wiki.pageId,
    datasets,
    backupFolders: [runFolder],
    graphWidth: options.graphWidth,
    threads: options.wiki.attachmentThreads,
    log: logger.withContext({ pageId: wiki.pageId })
  });
  return { ...batch, published: true };
}

/**
 * Publishes already captured run folders. Several folders are merged into a
 * new run folder first.
 */
export async function runUploadReport(
  folders: readonly string[],
  options: ReportOptions,
  deps: ReportDependencies = {}
): Promise<UploadReport> {
  if (folders.length === 0) {
    throw new ConfigError("No folders to upload.");
  }
  const wiki = options.onlyGraphs ? null : createWikiClient(options.wiki, options.retry, deps);

  let folder: string;
  let datasets: DashboardDataset[];
  const merged = folders.length > 1;
  if (merged) {
    const now = deps.now ?? (() => new Date());
    folder = buildRunFolder(options.outputRoot, options.testId, now(), options.timeZone);
    const result = await mergeRuns({
      folders,
      outputDir: folder,
      log: logger.withContext({ outputDir: folder })
    });
    datasets = result.datasets;
  } else {
    folder = folders[0];
    datasets = await readRunFolder(folder);
    if (datasets.length === 0) {
      throw new ConfigError(`Folder ${folder} contains no dashboard manifests.`, { folder });
    }
  }

  if (!wiki) {
    return { folder, datasets, merged, published: false };
  }
  await publishReport({
    client: wiki.client,
    pageId: wiki.pageId,
    datasets,
    backupFolders: [folder],
    graphWidth: options.graphWidth,
    threads: options.wiki.attachmentThreads,
    log: logger.withContext({ pageId: wiki.pageId })
  });
  return { folder, datasets, merged, published: true };
}
