import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  wiki: {
    url: undefined, // Base URL of the Confluence instance (or --wiki-url / WIKI_URL)
    attachmentThreads: 4 // Parallel attachment uploads per page
  },
  capture: {
    configPath: "config.yaml", // YAML file with one entry per dashboard
    outputRoot: "graphs", // Root folder for run folders
    testId: "-1", // Prefix of the run folder name
    threads: 4, // Dashboards processed in parallel
    timeZone: "UTC", // Time zone used for human-readable window bounds
    graphWidth: 1500 // Image width on the wiki page
  },
  network: {
    retryCount: 2, // Retries for idempotent metadata requests
    retryBackoffMs: 500 // Base delay, doubled on every retry
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    includeTimings: true, // Add durationMs to *.done events
    format: "pretty", // "pretty" (human-readable) or "json"
    color: true // Colored level and message in pretty mode
  }
};
