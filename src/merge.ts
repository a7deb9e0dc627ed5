import { copyFile, mkdir, readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { basename, join } from "node:path";
import { MergeError } from "./errors.js";
import { readRunFolder, writeManifest, type RunManifest } from "./manifest.js";
import { withDuration, type ContextLogger } from "./logger.js";
import type { DashboardDataset, Panel } from "./types.js";
import type { Timepoint } from "./timepoints.js";

export const BACKUP_EXTENSION = ".json";

const chartIdPattern = /__(\d+)\.png$/;

export type MergeOptions = {
  folders: readonly string[];
  outputDir: string;
  log: ContextLogger;
};

export type MergeResult = {
  outputDir: string;
  datasets: DashboardDataset[];
};

type CopyOp = { from: string; to: string };

type MergeState = {
  dataset: DashboardDataset;
  /** Timepoints contributed by the folders merged so far. */
  offset: number;
};

/** Separator-insensitive form used to match chart paths against folder names. */
export function normalizeFolderKey(path: string) {
  return path
    .replace(/^\.[\\/]/, "")
    .replace(/[\\/]+$/, "")
    .replace(/[\\/]+/g, "_");
}

/**
 * Rewrites the trailing timepoint id of a chart file name by `offset`.
 * Throws when the name carries no such id.
 */
export function shiftChartFileName(fileName: string, offset: number) {
  const match = chartIdPattern.exec(fileName);
  if (!match) {
    throw new MergeError(`Chart file ${fileName} does not end in __<timepointId>.png.`, {
      file: fileName
    });
  }
  const id = Number(match[1]) + offset;
  return `${fileName.slice(0, match.index)}__${id}.png`;
}

/**
 * Consolidates the run folders, in order, into `outputDir`. Every step that
 * can fail is checked before the first file is written.
 */
export async function mergeRuns(options: MergeOptions): Promise<MergeResult> {
  const { folders, outputDir, log } = options;
  if (folders.length === 0) {
    throw new MergeError("No folders to merge.");
  }
  const startedAt = Date.now();
  log.info("merge.start", { folders: folders.length, outputDir });

  const membership = await assignManifests(folders, log);
  assertSameDashboards(folders, membership);

  const states = new Map<string, MergeState>();
  const copies: CopyOp[] = [];

  for (const [folderIndex, members] of membership.entries()) {
    for (const manifest of members) {
      const state = states.get(manifest.name);
      const chartsDir = join(outputDir, manifest.name);
      if (!state) {
        states.set(manifest.name, {
          dataset: seedDataset(manifest, chartsDir),
          offset: manifest.timepoints.length
        });
        copies.push(...(await planChartCopies(manifest, chartsDir, null)));
        continue;
      }
      assertContiguous(manifest);
      appendManifest(state.dataset, manifest, state.offset);
      copies.push(...(await planChartCopies(manifest, chartsDir, state.offset)));
      state.offset += manifest.timepoints.length;
      log.debug("merge.folder.dashboard", {
        folder: folders[folderIndex],
        dashboard: manifest.name,
        timepoints: state.dataset.timepoints.length
      });
    }
  }
  copies.push(...(await planBackupCopies(folders, outputDir, log)));

  await mkdir(outputDir, { recursive: true });
  for (const state of states.values()) {
    await mkdir(state.dataset.chartsPath, { recursive: true });
  }
  for (const op of copies) {
    await copyFile(op.from, op.to);
  }

  const datasets = Array.from(states.values(), (state) => state.dataset);
  for (const dataset of datasets) {
    await writeManifest(outputDir, dataset);
  }

  log.info("merge.done", {
    dashboards: datasets.length,
    files: copies.length,
    ...withDuration(startedAt)
  });
  return { outputDir, datasets };
}

async function assignManifests(folders: readonly string[], log: ContextLogger) {
  const candidates: RunManifest[] = [];
  for (const folder of folders) {
    candidates.push(...(await readRunFolder(folder)));
  }

  const keys = folders.map(normalizeFolderKey);
  const membership: RunManifest[][] = folders.map(() => []);
  const seen = new Set<RunManifest>();

  for (const manifest of candidates) {
    if (seen.has(manifest)) continue;
    seen.add(manifest);
    const chartsKey = normalizeFolderKey(manifest.chartsPath);
    const owners = keys.flatMap((key, index) => (chartsKey.includes(key) ? [index] : []));
    if (owners.length > 1) {
      throw new MergeError(`Manifest ${manifest.name} matches more than one folder.`, {
        dashboard: manifest.name,
        chartsPath: manifest.chartsPath,
        folders: owners.map((index) => folders[index])
      });
    }
    if (owners.length === 0) {
      log.warn("merge.manifest.unmatched", {
        dashboard: manifest.name,
        chartsPath: manifest.chartsPath
      });
      continue;
    }
    membership[owners[0]].push(manifest);
  }

  for (const members of membership) {
    members.sort((a, b) => a.name.localeCompare(b.name));
  }
  return membership;
}

/** Every folder has to carry exactly the dashboards of the first one. */
function assertSameDashboards(folders: readonly string[], membership: RunManifest[][]) {
  const expected = namesOf(folders[0], membership[0]);
  if (expected.size === 0) {
    throw new MergeError(`Folder ${folders[0]} contains no dashboard manifests.`, {
      folder: folders[0]
    });
  }
  membership.forEach((members, index) => {
    const names = namesOf(folders[index], members);
    const missing = [...expected].filter((name) => !names.has(name));
    const extra = [...names].filter((name) => !expected.has(name));
    if (missing.length > 0 || extra.length > 0) {
      throw new MergeError(`Folder ${folders[index]} does not contain the same dashboards as ${folders[0]}.`, {
        folder: folders[index],
        missing,
        extra
      });
    }
  });
}

function namesOf(folder: string, members: RunManifest[]) {
  const names = new Set<string>();
  for (const manifest of members) {
    if (names.has(manifest.name)) {
      throw new MergeError(`Dashboard ${manifest.name} appears twice in ${folder}.`, {
        folder,
        dashboard: manifest.name
      });
    }
    names.add(manifest.name);
  }
  return names;
}

function assertContiguous(manifest: RunManifest) {
  manifest.timepoints.forEach((timepoint, index) => {
    if (timepoint.id !== index) {
      throw new MergeError(`Timepoints of ${manifest.name} are not numbered 0..n-1.`, {
        dashboard: manifest.name,
        chartsPath: manifest.chartsPath
      });
    }
  });
}

function copyTimepoint(timepoint: Timepoint, offset: number): Timepoint {
  return { ...timepoint, id: timepoint.id + offset };
}

function copyPanel(panel: Panel): Panel {
  return { ...panel, links: [...panel.links] };
}

function seedDataset(manifest: RunManifest, chartsPath: string): DashboardDataset {
  return {
    name: manifest.name,
    chartsPath,
    fullLinks: [...manifest.fullLinks],
    snapshotLinks: manifest.snapshotLinks ? [...manifest.snapshotLinks] : undefined,
    timepoints: manifest.timepoints.map((timepoint) => copyTimepoint(timepoint, 0)),
    panels: manifest.panels.map(copyPanel)
  };
}

/**
 * Appends a later folder's timepoints and links. Panels present on one side
 * only are padded with `null` so every panel keeps one link per timepoint.
 */
function appendManifest(dataset: DashboardDataset, manifest: RunManifest, offset: number) {
  const incomingCount = manifest.timepoints.length;
  const nulls = (length: number) => Array.from({ length }, (): string | null => null);
  const incoming = new Map(manifest.panels.map((panel) => [panel.id, panel]));

  for (const panel of dataset.panels) {
    const match = incoming.get(panel.id);
    panel.links.push(...(match ? match.links : nulls(incomingCount)));
    incoming.delete(panel.id);
  }
  for (const panel of incoming.values()) {
    dataset.panels.push({
      ...panel,
      links: [...nulls(offset), ...panel.links]
    });
  }

  dataset.timepoints.push(
    ...manifest.timepoints.map((timepoint) => copyTimepoint(timepoint, offset))
  );
  dataset.fullLinks.push(...manifest.fullLinks);
  if (dataset.snapshotLinks || manifest.snapshotLinks) {
    dataset.snapshotLinks = [
      ...(dataset.snapshotLinks ?? nulls(offset)),
      ...(manifest.snapshotLinks ?? nulls(incomingCount))
    ];
  }
}

async function listFiles(dir: string) {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new MergeError(`Chart folder ${dir} cannot be read.`, { dir }, { cause: error });
  }
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

/** `offset === null` keeps file names as they are. */
async function planChartCopies(
  manifest: RunManifest,
  targetDir: string,
  offset: number | null
): Promise<CopyOp[]> {
  const files = await listFiles(manifest.chartsPath);
  return files.map((file) => ({
    from: join(manifest.chartsPath, file),
    to: join(targetDir, offset === null ? file : shiftChartFileName(file, offset))
  }));
}

async function planBackupCopies(
  folders: readonly string[],
  outputDir: string,
  log: ContextLogger
): Promise<CopyOp[]> {
  const ops: CopyOp[] = [];
  const names = new Set<string>();
  for (const folder of folders) {
    const files = await listFiles(folder);
    for (const file of files.filter((name) => name.endsWith(BACKUP_EXTENSION))) {
      if (names.has(file)) {
        log.warn("merge.backup.duplicate", { folder, file: basename(file) });
        continue;
      }
      names.add(file);
      ops.push({ from: join(folder, file), to: join(outputDir, file) });
    }
  }
  return ops;
}
