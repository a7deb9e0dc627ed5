export type ErrorCode =
  | "config"
  | "auth"
  | "resolution"
  | "capture"
  | "merge"
  | "publish";

export class ReporterError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Invalid or missing setting. Raised before any work starts. */
export class ConfigError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("config", message, details, options);
  }
}

export class AuthError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("auth", message, details, options);
  }
}

export class ResolutionError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("resolution", message, details, options);
  }
}

/** One (panel, timepoint) pair failed. Recovered by the acquisition engine. */
export class CaptureError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("capture", message, details, options);
  }
}

export class MergeError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("merge", message, details, options);
  }
}

export class PublishError extends ReporterError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("publish", message, details, options);
  }
}

export function describeError(error: unknown) {
  if (error instanceof ReporterError) {
    return { name: error.name, code: error.code, message: error.message, ...error.details };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
