import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { describeError } from "./errors.js";
import type { DashboardConfig } from "./dashboards.js";
import type { DashboardDefinition } from "./grafana/resolver.js";
import type { GrafanaSession } from "./grafana/session.js";
import type { ContextLogger } from "./logger.js";
import type { Timepoint } from "./timepoints.js";

const createdSnapshotSchema = z
  .object({
    key: z.string().min(1),
    url: z.string().optional()
  })
  .passthrough();

export type SnapshotArgs = {
  config: DashboardConfig;
  session: GrafanaSession;
  definition: DashboardDefinition;
  timepoints: readonly Timepoint[];
  runFolder: string;
  log: ContextLogger;
};

export function snapshotName(dashboardName: string, timepoint: Timepoint) {
  return `${dashboardName}__${timepoint.tag ?? timepoint.id}`;
}

/**
 * One local snapshot per timepoint, each also saved as a JSON backup in the
 * run folder. Returns one link per timepoint, `null` where creation failed.
 */
export async function takeSnapshots(args: SnapshotArgs): Promise<(string | null)[]> {
  const links: (string | null)[] = [];
  for (const timepoint of args.timepoints) {
    const log = args.log.withContext({ timepointId: timepoint.id });
    try {
      links.push(await takeSnapshot(args, timepoint, log));
    } catch (error) {
      log.error("snapshot.failed", { error: describeError(error) });
      links.push(null);
    }
  }
  return links;
}

async function takeSnapshot(args: SnapshotArgs, timepoint: Timepoint, log: ContextLogger) {
  const { config, session, definition, runFolder } = args;
  const name = snapshotName(config.name, timepoint);

  const created = await session.post("/api/snapshots", {
    name,
    expires: config.snapshotExpires,
    dashboard: {
      ...definition,
      time: {
        from: new Date(timepoint.start * 1000).toISOString(),
        to: new Date(timepoint.end * 1000).toISOString()
      }
    }
  });
  if (!created.ok) {
    await created.body?.cancel();
    throw new Error(`Snapshot creation returned ${created.status}.`);
  }
  const { key, url } = createdSnapshotSchema.parse(await created.json());
  const link = url ?? `${session.host}/dashboard/snapshot/${key}`;
  log.info("snapshot.created", { link });

  const stored = await session.get(`/api/snapshots/${encodeURIComponent(key)}`);
  if (!stored.ok) {
    await stored.body?.cancel();
    log.error("snapshot.backup.failed", { status: stored.status });
    return link;
  }
  const backup = join(runFolder, `${name}.json`);
  await writeFile(backup, JSON.stringify(await stored.json()), "utf8");
  log.info("snapshot.backup.saved", { file: backup });
  return link;
}
