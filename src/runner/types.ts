import type { DashboardDataset } from "../types.js";

export type DashboardRunResult = {
  name: string;
  status: "success" | "failed";
  dataset?: DashboardDataset;
  manifestPath?: string;
  /** Pairs whose capture failed; the dashboard itself still succeeded. */
  failedPairs?: number;
  durationMs?: number;
  error?: string;
};

export type BatchRunResult = {
  runFolder: string;
  results: DashboardRunResult[];
  failed: number;
};
