import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { formatIssues } from "./config.js";

// =============================================================================
// DASHBOARD SCHEMA (one entry per dashboard in the YAML file)
// =============================================================================

const dashboardSchema = z
  .object({
    // Identity
    dashTitle: z.string().min(1),
    host: z
      .string()
      .url()
      .transform((value) => value.replace(/\/+$/, "")),
    orgId: z.number().int().positive().default(1),

    // Capture strategy: server-side render API, or a real browser
    render: z.boolean().default(true),
    width: z.number().int().positive().default(1920),
    height: z.number().int().positive().default(1080),
    whiteTheme: z.boolean().default(false),
    tz: z.string().optional(),
    vars: z.record(z.union([z.string(), z.number(), z.array(z.string())])).optional(),

    // Scheduling and timing (seconds)
    threads: z.number().int().positive().default(4),
    timeout: z.number().positive().default(30),
    preloadTime: z.number().nonnegative().default(2.5),

    // Snapshot backups
    snapshot: z.boolean().default(false),
    snapshotExpires: z.number().int().nonnegative().default(0),

    // Authentication
    auth: z.boolean().default(true),
    domain: z.boolean().default(false),
    login: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(),

    ignoreHttpsErrors: z.boolean().default(false)
  })
  .strict()
  .refine((value) => value.preloadTime < value.timeout, {
    message: "preloadTime must be shorter than timeout",
    path: ["preloadTime"]
  });

const dashboardsFileSchema = z.record(dashboardSchema);

export type DashboardSettings = z.infer<typeof dashboardSchema>;

export type DashboardConfig = Readonly<DashboardSettings & { name: string }>;

export function parseDashboardConfigs(text: string, source = "config"): DashboardConfig[] {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source} as YAML.`, { source }, { cause: error });
  }
  const result = dashboardsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid dashboard configuration in ${source}.`, {
      source,
      issues: formatIssues(result.error)
    });
  }
  const entries = Object.entries(result.data);
  if (entries.length === 0) {
    throw new ConfigError(`No dashboards defined in ${source}.`, { source });
  }
  for (const [name] of entries) {
    // the name becomes a folder and a file-name prefix
    if (!/^[\w.-]+$/.test(name) || name.includes("__")) {
      throw new ConfigError(`Invalid dashboard name: ${name}`, { source });
    }
  }
  return entries.map(([name, settings]) => Object.freeze({ ...settings, name }));
}

export async function loadDashboardConfigs(path: string): Promise<DashboardConfig[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} not found.`, { path }, { cause: error });
  }
  return parseDashboardConfigs(text, path);
}
