import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";
import { ConfigError } from "./errors.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  WIKI_URL: z.string().optional(),
  WIKI_LOGIN: z.string().optional(),
  WIKI_PASSWORD: z.string().optional(),
  WIKI_ATTACHMENT_THREADS: z.coerce.number().int().positive().optional(),

  DASHBOARDS_CONFIG: z.string().optional(),
  OUTPUT_ROOT: z.string().optional(),
  TEST_ID: z.string().optional(),
  THREADS: z.coerce.number().int().positive().optional(),
  TIMEZONE: z.string().optional(),
  GRAPH_WIDTH: z.coerce.number().int().positive().optional(),

  RETRY_COUNT: z.coerce.number().int().nonnegative().optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_INCLUDE_TIMINGS: z.string().optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),
  LOG_TIMEZONE: z.string().optional()
});

export const fileConfigSchema = z.object({
  wiki: z
    .object({
      url: z.string().url().optional(),
      attachmentThreads: z.coerce.number().int().positive().default(4)
    })
    .default({}),
  capture: z
    .object({
      configPath: z.string().default("config.yaml"),
      outputRoot: z.string().default("graphs"),
      testId: z.string().default("-1"),
      threads: z.coerce.number().int().positive().default(4),
      timeZone: z.string().default("UTC"),
      graphWidth: z.coerce.number().int().positive().default(1500)
    })
    .default({}),
  network: z
    .object({
      retryCount: z.coerce.number().int().nonnegative().default(2),
      retryBackoffMs: z.coerce.number().int().positive().default(500)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      includeTimings: z.boolean().default(false),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      timeZone: z.string().optional()
    })
    .default({})
});

export type ConfigFile = z.infer<typeof fileConfigSchema>;

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const envResult = envSchema.safeParse(source);
  if (!envResult.success) {
    throw new ConfigError("Invalid environment configuration.", {
      issues: formatIssues(envResult.error)
    });
  }
  const env = envResult.data;
  const fileResult = fileConfigSchema.safeParse(defaultConfig);
  if (!fileResult.success) {
    throw new ConfigError("Invalid config.defaults.ts.", {
      issues: formatIssues(fileResult.error)
    });
  }
  const fileConfig = fileResult.data;

  return {
    wiki: {
      url: env.WIKI_URL ?? fileConfig.wiki.url,
      login: env.WIKI_LOGIN,
      password: env.WIKI_PASSWORD,
      attachmentThreads:
        env.WIKI_ATTACHMENT_THREADS ?? fileConfig.wiki.attachmentThreads
    },
    capture: {
      configPath: env.DASHBOARDS_CONFIG ?? fileConfig.capture.configPath,
      outputRoot: env.OUTPUT_ROOT ?? fileConfig.capture.outputRoot,
      testId: env.TEST_ID ?? fileConfig.capture.testId,
      threads: env.THREADS ?? fileConfig.capture.threads,
      timeZone: env.TIMEZONE ?? fileConfig.capture.timeZone,
      graphWidth: env.GRAPH_WIDTH ?? fileConfig.capture.graphWidth
    },
    network: {
      retryCount: env.RETRY_COUNT ?? fileConfig.network.retryCount,
      retryBackoffMs: env.RETRY_BACKOFF_MS ?? fileConfig.network.retryBackoffMs
    },
    logging: {
      level: env.LOG_LEVEL ?? fileConfig.logging.level,
      includeTimings: resolveBool(
        env.LOG_INCLUDE_TIMINGS,
        fileConfig.logging.includeTimings
      ),
      format: env.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(env.LOG_COLOR, fileConfig.logging.color),
      timeZone: env.LOG_TIMEZONE ?? fileConfig.logging.timeZone
    }
  };
}

export function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}
