export type ReviewErrorCode =
  | "TOOLING_ERROR"
  | "SERVICE_ERROR"
  | "PARSE_ERROR"
  | "CONFIG_ERROR";

/** Base class for every failure the review pipeline knows how to classify. */
export class ReviewError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ReviewError";
  }
}

/** External static tool missing, crashed or timed out. */
export class ToolingError extends ReviewError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly reason: "not-found" | "timeout" | "crashed",
    options?: { cause?: unknown }
  ) {
    super(message, "TOOLING_ERROR", options);
    this.name = "ToolingError";
  }
}

/** Remote AI call failed. `retryable` marks transient failures. */
export class ServiceError extends ReviewError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "SERVICE_ERROR", options);
    this.name = "ServiceError";
  }
}

/** Tool or AI output that could not be understood. */
export class ParseError extends ReviewError {
  constructor(
    message: string,
    public readonly raw: string,
    options?: { cause?: unknown }
  ) {
    super(message, "PARSE_ERROR", options);
    this.name = "ParseError";
  }
}

/** Invalid setup: bad root path, unknown language, invalid config. Aborts the run. */
export class ConfigError extends ReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
