export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level: LogLevel;
  includeTimings: boolean;
  format: "json" | "pretty";
  color: boolean;
  timeZone?: string;
  baseContext?: Record<string, unknown>;
};

type LogData = Record<string, unknown>;

type LogEntry = {
  level: LogLevel;
  msg: string;
  ts: string;
  data?: LogData;
};

export type ContextLogger = {
  debug: (msg: string, data?: LogData) => void;
  info: (msg: string, data?: LogData) => void;
  warn: (msg: string, data?: LogData) => void;
  error: (msg: string, data?: LogData) => void;
  withContext: (context: LogData) => ContextLogger;
};

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let config: LoggerConfig = {
  level: "info",
  includeTimings: false,
  format: "json",
  color: false,
  timeZone: undefined,
  baseContext: {}
};

export function setLoggerConfig(next: Partial<LoggerConfig>) {
  config = { ...config, ...next };
}

export function getLoggerConfig(): LoggerConfig {
  return config;
}

export function log(level: LogLevel, msg: string, data?: LogData) {
  if (levelWeight[level] < levelWeight[config.level]) {
    return;
  }
  const entry: LogEntry = {
    level,
    msg,
    ts: formatTimestamp(new Date(), config.timeZone),
    data: mergeContext(config.baseContext, data)
  };

  const line = formatLine(entry);
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function createLogger(context?: LogData): ContextLogger {
  return {
    debug: (msg, data) => log("debug", msg, mergeContext(context, data)),
    info: (msg, data) => log("info", msg, mergeContext(context, data)),
    warn: (msg, data) => log("warn", msg, mergeContext(context, data)),
    error: (msg, data) => log("error", msg, mergeContext(context, data)),
    withContext: (extra) => createLogger(mergeContext(context, extra))
  };
}

export const logger = createLogger();

/** Produces `{ durationMs }` when timings are enabled, otherwise nothing. */
export function withDuration(startedAt: number): { durationMs?: number } {
  if (!config.includeTimings) return {};
  return { durationMs: Date.now() - startedAt };
}

function mergeContext(base?: LogData, extra?: LogData) {
  if (!base && !extra) return undefined;
  if (!base) return extra;
  if (!extra) return base;
  return { ...base, ...extra };
}

function formatLine(entry: LogEntry) {
  if (config.format === "pretty") {
    return formatPretty(entry);
  }
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry) {
  const level = config.color ? colorLevel(entry.level) : entry.level;
  const msg = config.color ? colorMsg(entry.msg) : entry.msg;
  const header = `[${entry.ts}] ${level} ${msg}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return header;
  }
  const fields = Object.entries(entry.data)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
  return `${header} ${fields}`;
}

function formatValue(value: unknown) {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value);
}

const colors = {
  reset: "\u001b[0m",
  red: "\u001b[31m",
  yellow: "\u001b[33m",
  green: "\u001b[32m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m"
};

function colorLevel(level: LogLevel) {
  switch (level) {
    case "debug":
      return `${colors.magenta}${level}${colors.reset}`;
    case "info":
      return `${colors.green}${level}${colors.reset}`;
    case "warn":
      return `${colors.yellow}${level}${colors.reset}`;
    case "error":
      return `${colors.red}${level}${colors.reset}`;
    default:
      return level;
  }
}

function colorMsg(msg: string) {
  return `${colors.blue}${msg}${colors.reset}`;
}

export function formatTimestamp(date: Date, timeZone?: string) {
  if (!timeZone) {
    return date.toISOString();
  }
  const parts = zonedParts(date, timeZone);
  const ms = String(date.getMilliseconds()).padStart(3, "0");
  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}:${parts.minute}:${parts.second}.${ms} ${timeZone}`;
}

export type ZonedParts = {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
};

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);
  const map = new Map(parts.map((part) => [part.type, part.value]));
  const pick = (type: Intl.DateTimeFormatPartTypes) => map.get(type) ?? "00";
  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second")
  };
}
