import type { Timepoint } from "./timepoints.js";

export type Panel = {
  id: number;
  type: string;
  title: string;
  /** One entry per timepoint, `null` until that pair's capture records a link. */
  links: (string | null)[];
};

export type CaptureOutcome = {
  panelId: number;
  timepointId: number;
  filePath: string;
  link: string | null;
  ok: boolean;
  error?: string;
};

export type DashboardDataset = {
  name: string;
  chartsPath: string;
  fullLinks: string[];
  /** One entry per timepoint when snapshots are enabled, `null` where one failed. */
  snapshotLinks?: (string | null)[];
  timepoints: Timepoint[];
  panels: Panel[];
};

export function createPanel(id: number, type: string, title: string, timepointCount: number): Panel {
  return {
    id,
    type,
    title,
    links: Array.from({ length: timepointCount }, () => null)
  };
}
