/**
 * Unified error types for the scraper service
 *
 * Error classification enables:
 * - Retrying transient fetch failures only
 * - Telling per-match skips apart from fatal run errors
 * - Distinct exit messages for each failure class
 */

/**
 * Error codes for categorization
 */
export const ErrorCode = {
  // Fetch errors (may retry)
  FETCH_FAILED: "FETCH_FAILED",
  BLOCKED_RESPONSE: "BLOCKED_RESPONSE",
  HTTP_ERROR: "HTTP_ERROR",
  TIMEOUT_ERROR: "TIMEOUT_ERROR",

  // Page format errors (never retry)
  SOURCE_FORMAT_UNRECOGNIZED: "SOURCE_FORMAT_UNRECOGNIZED",

  // Empty results (fatal for a run)
  NO_MATCHES_AFTER_FILTERS: "NO_MATCHES_AFTER_FILTERS",
  NO_SHOTS_PARSED: "NO_SHOTS_PARSED",

  // Bad input or configuration (never retry)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // Unknown
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for the scraper service
 */
export class ScraperError extends Error {
  public readonly timestamp: string;

  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly context: Record<string, unknown> = {},
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "ScraperError";
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
      cause: this.cause?.message,
    };
  }
}

/**
 * Bad input or configuration, never retry
 */
export class ValidationError extends ScraperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context, false);
    this.name = "ValidationError";
  }
}

/**
 * Page could not be retrieved after all attempts
 */
export class FetchError extends ScraperError {
  constructor(url: string, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(`could not retrieve page ${url}: ${message}`, ErrorCode.FETCH_FAILED, { url, ...context }, false, cause);
    this.name = "FetchError";
  }
}

/**
 * Non-2xx response. 403/408/429/5xx are what a challenge page or an
 * overloaded origin answers with, so only those are retried.
 */
export class HttpError extends ScraperError {
  constructor(url: string, public readonly status: number, context?: Record<string, unknown>) {
    super(
      `HTTP ${status} for ${url}`,
      ErrorCode.HTTP_ERROR,
      { url, status, ...context },
      status === 403 || status === 408 || status === 429 || status >= 500
    );
    this.name = "HttpError";
  }
}

/**
 * 200 response that does not look like a stats page (challenge or empty body)
 */
export class BlockedResponseError extends ScraperError {
  constructor(url: string, context?: Record<string, unknown>) {
    super(`blocked or empty response for ${url}`, ErrorCode.BLOCKED_RESPONSE, { url, ...context }, true);
    this.name = "BlockedResponseError";
  }
}

/**
 * Timeout error - retryable
 */
export class TimeoutError extends ScraperError {
  constructor(operation: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      ErrorCode.TIMEOUT_ERROR,
      { operation, timeoutMs, ...context },
      true
    );
    this.name = "TimeoutError";
  }
}

/**
 * Neither the legacy blocks nor the hydration blob yielded usable JSON
 */
export class SourceFormatError extends ScraperError {
  constructor(what: string, context?: Record<string, unknown>) {
    super(
      `source format unrecognized: cannot find ${what} (legacy blocks and hydration blob both failed)`,
      ErrorCode.SOURCE_FORMAT_UNRECOGNIZED,
      context,
      false
    );
    this.name = "SourceFormatError";
  }
}

/**
 * A run that produced nothing to persist
 */
export class EmptyResultError extends ScraperError {
  constructor(kind: "matches" | "shots", context?: Record<string, unknown>) {
    super(
      kind === "matches"
        ? "no matches after filters; check season or round range"
        : "no shots parsed; requests may be blocked or the site changed",
      kind === "matches" ? ErrorCode.NO_MATCHES_AFTER_FILTERS : ErrorCode.NO_SHOTS_PARSED,
      context,
      false
    );
    this.name = "EmptyResultError";
  }
}

/**
 * Determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ScraperError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("429") || message.includes("rate limit")) return true;
    if (/\b5\d{2}\b/.test(message)) return true;
    if (message.includes("timeout") || message.includes("etimedout")) return true;
    if (message.includes("econnreset") || message.includes("enotfound")) return true;
    // Fetch errors (Node.js undici)
    if (message.includes("fetch failed")) return true;
    if (message.includes("socket hang up")) return true;
    if (message.includes("econnrefused")) return true;
    if (error.name === "AbortError") return true;
  }

  return false;
}

/**
 * Wrap an unknown error as ScraperError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): ScraperError {
  if (error instanceof ScraperError) {
    return error;
  }

  if (error instanceof Error) {
    return new ScraperError(error.message, ErrorCode.UNKNOWN_ERROR, context, isRetryableError(error), error);
  }

  return new ScraperError(String(error), ErrorCode.UNKNOWN_ERROR, context, false);
}

/**
 * Extract error info for logging
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  code: ErrorCodeType;
  isRetryable: boolean;
  context?: Record<string, unknown>;
} {
  if (error instanceof ScraperError) {
    return {
      message: error.message,
      code: error.code,
      isRetryable: error.isRetryable,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      code: ErrorCode.UNKNOWN_ERROR,
      isRetryable: isRetryableError(error),
    };
  }

  return {
    message: String(error),
    code: ErrorCode.UNKNOWN_ERROR,
    isRetryable: false,
  };
}
