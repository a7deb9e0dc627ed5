import { join } from "node:path";
import { zonedParts } from "./logger.js";

export function formatRunTimestamp(date: Date, timeZone: string) {
  const parts = zonedParts(date, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}_${parts.hour}-${parts.minute}-${parts.second}`;
}

/** `<testId>__<YYYY-MM-DD_HH-mm-ss>` */
export function buildRunId(testId: string, date: Date, timeZone: string) {
  return `${testId}__${formatRunTimestamp(date, timeZone)}`;
}

export function buildRunFolder(outputRoot: string, testId: string, date: Date, timeZone: string) {
  return join(outputRoot, buildRunId(testId, date, timeZone));
}
