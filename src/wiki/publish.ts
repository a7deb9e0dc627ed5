import { readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import { PublishError, describeError } from "../errors.js";
import { runPool } from "../capture/pool.js";
import { withDuration, type ContextLogger } from "../logger.js";
import { composePageBody, renderReport } from "./page.js";
import type { ConfluenceClient } from "./confluence.js";
import type { DashboardDataset } from "../types.js";

const contentTypes: Record<string, string> = {
  ".png": "image/png",
  ".json": "application/json"
};

export type PublishArgs = {
  client: ConfluenceClient;
  pageId: string;
  datasets: readonly DashboardDataset[];
  /** Folders whose top-level `.json` backups are attached as well. */
  backupFolders: readonly string[];
  graphWidth: number;
  threads: number;
  log: ContextLogger;
};

export function contentTypeOf(filePath: string) {
  return contentTypes[extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

export async function readDirRecursive(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await readDirRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

async function topLevelBackups(folder: string) {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => join(folder, entry.name))
    .sort();
}

/**
 * Attaches every chart and backup file to the page, then writes the report
 * into it. Upload failures are reported after the page has been updated.
 */
export async function publishReport(args: PublishArgs): Promise<void> {
  const { client, pageId, datasets, log } = args;
  const startedAt = Date.now();

  const files: string[] = [];
  try {
    for (const dataset of datasets) {
      files.push(...(await readDirRecursive(dataset.chartsPath)));
    }
    for (const folder of args.backupFolders) {
      files.push(...(await topLevelBackups(folder)));
    }
  } catch (error) {
    throw new PublishError("Files to attach cannot be listed.", {}, { cause: error });
  }

  log.info("publish.upload.start", { files: files.length, threads: args.threads });
  const upload = await runPool(files, { width: args.threads, logger: log }, async (file) => {
    await client.attachFile(pageId, file, contentTypeOf(file));
    log.debug("publish.upload.file", { file });
  });
  for (const failure of upload.failures) {
    log.error("publish.upload.failed", { file: failure.item, error: describeError(failure.error) });
  }

  const page = await client.getPage(pageId);
  const body = composePageBody(page.body, renderReport(datasets, args.graphWidth));
  await client.updatePage(page, body);
  log.info("publish.done", {
    pageId,
    uploaded: upload.completed,
    failed: upload.failures.length,
    ...withDuration(startedAt)
  });

  if (upload.failures.length > 0) {
    throw new PublishError(`${upload.failures.length} attachment(s) failed to upload.`, {
      pageId,
      files: upload.failures.map((failure) => failure.item)
    });
  }
}
