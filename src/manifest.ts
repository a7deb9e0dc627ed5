import { readdir, readFile, writeFile } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { formatIssues } from "./config.js";
import type { DashboardDataset } from "./types.js";

export const MANIFEST_EXTENSION = ".yaml";

const timepointSchema = z.object({
  id: z.number().int().nonnegative(),
  tag: z.string().nullable(),
  start: z.number().int(),
  end: z.number().int(),
  startHuman: z.string(),
  endHuman: z.string()
});

const panelSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string(),
  links: z.array(z.string().nullable())
});

export const manifestSchema = z
  .object({
    name: z.string().min(1),
    chartsPath: z.string().min(1),
    fullLinks: z.array(z.string()),
    snapshotLinks: z.array(z.string().nullable()).optional(),
    timepoints: z.array(timepointSchema),
    panels: z.array(panelSchema)
  })
  .superRefine((manifest, ctx) => {
    manifest.panels.forEach((panel, index) => {
      if (panel.links.length !== manifest.timepoints.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["panels", index, "links"],
          message: `expected ${manifest.timepoints.length} links, got ${panel.links.length}`
        });
      }
    });
    if (manifest.snapshotLinks && manifest.snapshotLinks.length !== manifest.timepoints.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["snapshotLinks"],
        message: `expected ${manifest.timepoints.length} snapshot links, got ${manifest.snapshotLinks.length}`
      });
    }
  });

export type RunManifest = z.infer<typeof manifestSchema>;

export function manifestFileName(name: string) {
  return `${name}${MANIFEST_EXTENSION}`;
}

export function serializeManifest(dataset: DashboardDataset) {
  const manifest: RunManifest = {
    name: dataset.name,
    chartsPath: dataset.chartsPath,
    fullLinks: dataset.fullLinks,
    ...(dataset.snapshotLinks ? { snapshotLinks: dataset.snapshotLinks } : {}),
    timepoints: dataset.timepoints,
    panels: dataset.panels
  };
  return stringify(manifest, { lineWidth: 0 });
}

export async function writeManifest(runFolder: string, dataset: DashboardDataset) {
  const path = join(runFolder, manifestFileName(dataset.name));
  await writeFile(path, serializeManifest(dataset), "utf8");
  return path;
}

export function parseManifest(text: string, source: string): RunManifest {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigError(`Manifest ${source} is not valid YAML.`, { source }, { cause: error });
  }
  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Manifest ${source} is invalid.`, {
      source,
      issues: formatIssues(result.error)
    });
  }
  return result.data;
}

export async function readManifest(path: string): Promise<RunManifest> {
  return parseManifest(await readFile(path, "utf8"), path);
}

/** Manifests stored at the top level of a run folder, in file-name order. */
export async function readRunFolder(folder: string): Promise<RunManifest[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (error) {
    throw new ConfigError(`Run folder ${folder} cannot be read.`, { folder }, { cause: error });
  }
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(MANIFEST_EXTENSION))
    .map((entry) => entry.name)
    .sort();
  const manifests: RunManifest[] = [];
  for (const file of files) {
    manifests.push(await readManifest(join(folder, file)));
  }
  return manifests;
}
