import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { chartFileName } from "../grafana/links.js";
import { describeError } from "../errors.js";
import { withDuration, type ContextLogger } from "../logger.js";
import { runPool, type WorkerContext } from "./pool.js";
import type { DashboardConfig } from "../dashboards.js";
import type { Timepoint } from "../timepoints.js";
import type { CaptureOutcome, Panel } from "../types.js";

export type CaptureTask = {
  panel: Panel;
  timepoint: Timepoint;
  filePath: string;
};

/**
 * How one (panel, timepoint) pair is turned into an image file and a link.
 * `R` is the per-worker resource, if the strategy needs one.
 */
export type CaptureStrategy<R> = {
  kind: "render" | "browser";
  acquire?: (workerId: number) => Promise<R>;
  release?: (resource: R) => Promise<void>;
  capture: (
    task: CaptureTask,
    context: WorkerContext<R>,
    log: ContextLogger
  ) => Promise<CaptureOutcome>;
};

export type AcquireArgs<R> = {
  config: DashboardConfig;
  panels: Panel[];
  timepoints: readonly Timepoint[];
  chartsPath: string;
  strategy: CaptureStrategy<R>;
  log: ContextLogger;
};

export type AcquireResult = {
  outcomes: CaptureOutcome[];
  failed: number;
};

export async function acquireAll<R>(args: AcquireArgs<R>): Promise<AcquireResult> {
  const { config, panels, timepoints, chartsPath, strategy, log } = args;
  assertShape(panels, timepoints);
  await mkdir(chartsPath, { recursive: true });

  const tasks: CaptureTask[] = panels.flatMap((panel) =>
    timepoints.map((timepoint) => ({
      panel,
      timepoint,
      filePath: join(chartsPath, chartFileName(config.name, panel.id, timepoint.id))
    }))
  );

  const startedAt = Date.now();
  log.info("capture.start", {
    strategy: strategy.kind,
    panels: panels.length,
    timepoints: timepoints.length,
    tasks: tasks.length,
    threads: config.threads
  });

  const outcomes: CaptureOutcome[] = [];
  const pool = await runPool(
    tasks,
    {
      width: config.threads,
      acquire: strategy.acquire,
      release: strategy.release,
      logger: log
    },
    async (task, context) => {
      const pairLog = log.withContext({
        panelId: task.panel.id,
        timepointId: task.timepoint.id
      });
      let outcome: CaptureOutcome;
      try {
        outcome = await strategy.capture(task, context, pairLog);
      } catch (error) {
        outcome = {
          panelId: task.panel.id,
          timepointId: task.timepoint.id,
          filePath: task.filePath,
          link: null,
          ok: false,
          error: error instanceof Error ? error.message : String(error)
        };
        pairLog.debug("capture.pair.error", { error: describeError(error) });
      }
      recordLink(task, outcome.link);
      outcomes.push(outcome);
      if (outcome.ok) {
        pairLog.info("capture.pair.done", { file: outcome.filePath });
      } else {
        pairLog.error("capture.pair.failed", {
          file: outcome.filePath,
          link: outcome.link,
          error: outcome.error
        });
      }
    }
  );

  // capture errors are caught above; anything left is a broken invariant
  if (pool.failures.length > 0) {
    throw pool.failures[0].error;
  }

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  log.info("capture.done", {
    succeeded: outcomes.length - failed,
    failed,
    browsers: pool.resources,
    ...withDuration(startedAt)
  });
  return { outcomes, failed };
}

function recordLink(task: CaptureTask, link: string | null) {
  if (link === null) return;
  const index = task.timepoint.id;
  if (task.panel.links[index] !== null) {
    throw new Error(`Link for panel ${task.panel.id}, timepoint ${index} written twice.`);
  }
  task.panel.links[index] = link;
}

function assertShape(panels: readonly Panel[], timepoints: readonly Timepoint[]) {
  timepoints.forEach((timepoint, index) => {
    if (timepoint.id !== index) {
      throw new Error(`Timepoint ids must be 0..n-1, got ${timepoint.id} at ${index}.`);
    }
  });
  for (const panel of panels) {
    if (panel.links.length !== timepoints.length) {
      throw new Error(
        `Panel ${panel.id} has ${panel.links.length} link slots for ${timepoints.length} timepoints.`
      );
    }
  }
}
