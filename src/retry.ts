import { setTimeout as delay } from "node:timers/promises";
import { ReporterError } from "./errors.js";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
  /** Return false to rethrow immediately, e.g. for a definitive 404. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      if (config.shouldRetry && !config.shouldRetry(error)) break;
      const wait = config.backoffMs * Math.pow(2, attempt);
      config.onRetry?.(error, attempt + 1, wait);
      await delay(wait);
      attempt += 1;
    }
  }

  throw lastError;
}

/** A 4xx answer other than 408/429 will not change on a second attempt. */
export function isDefinitiveFailure(error: unknown) {
  if (!(error instanceof ReporterError)) return false;
  const status = error.details?.status;
  return typeof status === "number" && status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export function retryTransient(config: RetryConfig): RetryConfig {
  return {
    ...config,
    shouldRetry: (error) =>
      !isDefinitiveFailure(error) && (config.shouldRetry ? config.shouldRetry(error) : true)
  };
}
