/**
 * Structured logging for the scraper service
 *
 * Features:
 * - JSON-line logs, one object per entry
 * - Context propagation via child loggers
 * - Run ID for correlating every entry of one fetch run
 * - Minimum severity, lowered to DEBUG by the `debug` run option
 */

import { extractErrorInfo } from "./errors";

/**
 * Log severity levels
 */
export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

/**
 * Context that persists across all log entries
 */
export type LogContext = {
  runId?: string;
  league?: string;
  season?: number;
  matchId?: number;
  step?: string;
  service?: string;
  [key: string]: unknown;
};

export type LogEntry = {
  timestamp: string;
  severity: LogLevel;
  message: string;
  runId?: string;
  step?: string;
  service?: string;
  [key: string]: unknown;
};

export interface ILogger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, error?: unknown, extra?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(context: Partial<LogContext>): ILogger;

  getContext(): LogContext;
}

/**
 * Structured logger implementation
 */
export class Logger implements ILogger {
  constructor(
    private context: LogContext = {},
    private minLevel: LogLevel = "INFO"
  ) {}

  private log(severity: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[severity] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      ...this.context,
      ...extra,
    };

    // Remove undefined values
    const cleanEntry = Object.fromEntries(Object.entries(entry).filter(([, v]) => v !== undefined));

    const json = JSON.stringify(cleanEntry);

    switch (severity) {
      case "ERROR":
        console.error(json);
        break;
      case "WARNING":
        console.warn(json);
        break;
      default:
        console.log(json);
    }
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("DEBUG", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("INFO", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("WARNING", message, extra);
  }

  error(message: string, error?: unknown, extra?: Record<string, unknown>): void {
    let errorData: Record<string, unknown> = {};

    if (error !== undefined) {
      const errorInfo = extractErrorInfo(error);
      errorData = {
        errorMessage: errorInfo.message,
        errorCode: errorInfo.code,
        isRetryable: errorInfo.isRetryable,
        errorContext: errorInfo.context,
      };

      if (error instanceof Error && error.stack) {
        errorData.errorStack = error.stack.split("\n").slice(0, 5).join("\n");
      }
    }

    this.log("ERROR", message, { ...errorData, ...extra });
  }

  child(context: Partial<LogContext>): ILogger {
    return new Logger({ ...this.context, ...context }, this.minLevel);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

/**
 * Create a logger with common context for a fetch run
 */
export function createRunLogger(options: {
  league: string;
  season: number;
  debug?: boolean;
  runId?: string;
}): ILogger {
  return new Logger(
    {
      service: "scraper",
      league: options.league,
      season: options.season,
      runId: options.runId || generateRunId(),
    },
    options.debug ? "DEBUG" : "INFO"
  );
}

/**
 * Generate a run ID for log correlation
 */
export function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}

/**
 * Timing utility for measuring operation duration
 */
export function withTiming<T>(
  logger: ILogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  return fn()
    .then((result) => {
      const durationMs = Date.now() - startTime;
      logger.info(`${operation} completed`, { operation, durationMs });
      return result;
    })
    .catch((error: unknown) => {
      const durationMs = Date.now() - startTime;
      logger.error(`${operation} failed`, error, { operation, durationMs });
      throw error;
    });
}

export type StepLogger = ILogger & {
  progress(current: number, message?: string, extra?: Record<string, unknown>): void;
  complete(message?: string, extra?: Record<string, unknown>): void;
};

/**
 * Create a step logger with progress tracking
 */
export function createStepLogger(
  parentLogger: ILogger,
  stepName: string,
  options?: { totalItems?: number }
): StepLogger {
  const stepLogger = parentLogger.child({ step: stepName });
  const startTime = Date.now();

  return {
    debug: (message, extra) => stepLogger.debug(message, extra),
    info: (message, extra) => stepLogger.info(message, extra),
    warn: (message, extra) => stepLogger.warn(message, extra),
    error: (message, error, extra) => stepLogger.error(message, error, extra),
    child: (context) => stepLogger.child(context),
    getContext: () => stepLogger.getContext(),
    progress(current: number, message?: string, extra?: Record<string, unknown>) {
      const data: Record<string, unknown> = { current, ...extra };
      if (options?.totalItems) {
        data.total = options.totalItems;
        data.percent = Math.round((current / options.totalItems) * 100);
      }
      stepLogger.info(message || `${stepName} progress`, data);
    },
    complete(message?: string, extra?: Record<string, unknown>) {
      const durationMs = Date.now() - startTime;
      stepLogger.info(message || `${stepName} complete`, { durationMs, ...extra });
    },
  };
}

/**
 * Default logger instance (for quick usage)
 */
export const defaultLogger = new Logger({ service: "scraper" });
