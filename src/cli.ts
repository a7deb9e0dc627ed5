#!/usr/bin/env node
import { Command } from "commander";
import { z } from "zod";
import { formatIssues, loadConfig, type AppConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { logger, setLoggerConfig } from "./logger.js";
import { runCaptureReport, runUploadReport, type ReportOptions } from "./runner/run-report.js";

const cliOptionsSchema = z.object({
  wikiUrl: z.string().url().optional(),
  config: z.string().optional(),
  login: z.string().optional(),
  password: z.string().optional(),
  pageId: z.string().regex(/^\d+$/, "page id must be numeric").optional(),
  outputRoot: z.string().optional(),
  testId: z.string().optional(),
  timestamps: z.array(z.string()).default([]),
  threads: z.coerce.number().int().positive().optional(),
  tz: z.string().optional(),
  graphWidth: z.coerce.number().int().positive().optional(),
  onlyGraphs: z.boolean().default(false),
  uploadFolders: z.array(z.string()).optional(),
  json: z.boolean().default(false)
});

type CliOptions = z.infer<typeof cliOptionsSchema>;

const program = new Command();
program
  .name("panel-reporter")
  .description("Capture Grafana panels over time windows and publish them to a Confluence page")
  .version("0.1.0")
  .option("--wiki-url <url>", "Confluence base URL")
  .option("-c, --config <path>", "Dashboard configuration (YAML)")
  .option("--login <login>", "Confluence login (env WIKI_LOGIN)")
  .option("--password <password>", "Confluence password (env WIKI_PASSWORD)")
  .option("--page-id <id>", "Confluence page to update")
  .option("--output-root <dir>", "Root folder for run folders")
  .option("--test-id <id>", "Test id used in the run folder name")
  .option("--timestamps <specs...>", "Time windows: [tag__]...&from=<epoch>&to=<epoch>")
  .option("--threads <n>", "Dashboards processed concurrently")
  .option("--tz <zone>", "Time zone for human-readable times")
  .option("--graph-width <px>", "Image width on the page")
  .option("--only-graphs", "Capture or merge only, do not publish")
  .option("--upload-folders <folders...>", "Publish existing run folders, merging several")
  .option("--json", "JSON output")
  .action(async () => {
    const config = loadConfig();
    setLoggerConfig({
      level: config.logging.level,
      includeTimings: config.logging.includeTimings,
      format: config.logging.format,
      color: config.logging.color,
      timeZone: config.logging.timeZone
    });
    const cli = parseCliOptions(program.opts());
    const options = buildReportOptions(config, cli);

    if (cli.uploadFolders) {
      const report = await runUploadReport(cli.uploadFolders, options);
      printJsonOrText(
        {
          folder: report.folder,
          merged: report.merged,
          published: report.published,
          dashboards: report.datasets.map((dataset) => dataset.name)
        },
        cli.json
      );
      return;
    }

    const report = await runCaptureReport(options);
    printJsonOrText(
      {
        runFolder: report.runFolder,
        published: report.published,
        dashboards: report.results.map((result) => ({
          name: result.name,
          status: result.status,
          failedPairs: result.failedPairs,
          error: result.error
        }))
      },
      cli.json
    );
    if (report.failed > 0) {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("run.failed", { error: describeError(error) });
  process.exitCode = 1;
});

function parseCliOptions(raw: unknown): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid command line options.", {
      issues: formatIssues(result.error)
    });
  }
  return result.data;
}

/** Command line over environment over config.defaults.ts. */
function buildReportOptions(config: AppConfig, cli: CliOptions): ReportOptions {
  return {
    wiki: {
      url: cli.wikiUrl ?? config.wiki.url,
      login: cli.login ?? config.wiki.login,
      password: cli.password ?? config.wiki.password,
      pageId: cli.pageId,
      attachmentThreads: config.wiki.attachmentThreads
    },
    configPath: cli.config ?? config.capture.configPath,
    outputRoot: cli.outputRoot ?? config.capture.outputRoot,
    testId: cli.testId ?? config.capture.testId,
    timestamps: cli.timestamps,
    threads: cli.threads ?? config.capture.threads,
    timeZone: cli.tz ?? config.capture.timeZone,
    graphWidth: cli.graphWidth ?? config.capture.graphWidth,
    onlyGraphs: cli.onlyGraphs,
    retry: {
      retries: config.network.retryCount,
      backoffMs: config.network.retryBackoffMs
    }
  };
}

function printJsonOrText(value: Record<string, unknown>, json: boolean) {
  if (json) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }
  const lines = Object.entries(value).map(
    ([key, item]) => `${key}: ${typeof item === "string" ? item : JSON.stringify(item)}`
  );
  console.log(lines.join("\n"));
}
