import { zonedParts } from "./logger.js";
import { ConfigError } from "./errors.js";

export type Timepoint = {
  id: number;
  tag: string | null;
  /** Epoch seconds. */
  start: number;
  /** Epoch seconds. */
  end: number;
  startHuman: string;
  endHuman: string;
};

const fromPattern = /&from=(\d+)/;
const toPattern = /&to=(\d+)/;

/**
 * Parses a window specifier of the form `[tag__]...&from=<n>...&to=<n>`.
 * Bounds with more than 10 digits are milliseconds.
 */
export function parseTimepoint(spec: string, id: number, timeZone: string): Timepoint {
  const from = fromPattern.exec(spec);
  const to = toPattern.exec(spec);
  if (!from || !to) {
    throw new ConfigError(`Invalid time window "${spec}": expected &from=<epoch>&to=<epoch>.`);
  }
  const start = toSeconds(from[1]);
  const end = toSeconds(to[1]);
  if (end < start) {
    throw new ConfigError(`Invalid time window "${spec}": end is before start.`);
  }
  const separator = spec.indexOf("__");
  const tag = separator > 0 ? spec.slice(0, separator) : null;

  return {
    id,
    tag,
    start,
    end,
    startHuman: formatHuman(start, timeZone),
    endHuman: formatHuman(end, timeZone)
  };
}

export function parseTimepoints(specs: string[], timeZone: string): Timepoint[] {
  assertTimeZone(timeZone);
  return specs.map((spec, index) => parseTimepoint(spec, index, timeZone));
}

export function formatHuman(epochSeconds: number, timeZone: string) {
  const parts = zonedParts(new Date(epochSeconds * 1000), timeZone);
  return `${parts.year}/${parts.month}/${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

function toSeconds(digits: string) {
  const value = Number(digits);
  if (digits.length > 10) {
    return Math.floor(value / 1000);
  }
  return value;
}

function assertTimeZone(timeZone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (error) {
    throw new ConfigError(`Unknown time zone: ${timeZone}`, undefined, { cause: error });
  }
}
