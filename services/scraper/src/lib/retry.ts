/**
 * Retry utility with exponential backoff
 */

import { ScraperError, isRetryableError, TimeoutError } from "./errors";
import type { ILogger } from "./logger";

export type RetryConfig = {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Proportional jitter, as a fraction of the backoff delay (default: 0.3) */
  jitterRatio?: number;
  /** Additive jitter, uniform in [0, jitterMs) (default: 0) */
  jitterMs?: number;
  /** Timeout for each attempt in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for retry logging */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Logger instance for structured logging */
  logger?: ILogger;
  /** Operation name for logging context */
  operationName?: string;
  /** Delay implementation, swapped out in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Random source in [0, 1), swapped out in tests */
  random?: () => number;
};

type InternalConfig = Required<Omit<RetryConfig, "onRetry" | "logger" | "operationName">> &
  Pick<RetryConfig, "onRetry" | "logger" | "operationName">;

/**
 * Sleep for the specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const DEFAULT_CONFIG: InternalConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterRatio: 0.3,
  jitterMs: 0,
  timeoutMs: 60000,
  isRetryable: isRetryableError,
  onRetry: undefined,
  logger: undefined,
  operationName: undefined,
  sleep,
  random: Math.random,
};

/**
 * Execute a function with timeout
 */
async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (!settled) {
        settled = true;
        reject(new TimeoutError(operationName || "operation", timeoutMs));
      }
    }, timeoutMs);

    fn()
      .then((result) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve(result);
        }
      })
      .catch((error: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      });
  });
}

/**
 * Calculate delay with jitter for backoff
 */
function calculateDelay(attempt: number, config: InternalConfig): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const jitter = config.random() * config.jitterRatio * exponentialDelay + config.random() * config.jitterMs;
  return Math.min(exponentialDelay + jitter, config.maxDelayMs);
}

/**
 * Execute a function with retry and exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const mergedConfig: InternalConfig = { ...DEFAULT_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt <= mergedConfig.maxRetries; attempt++) {
    try {
      return await withTimeout(fn, mergedConfig.timeoutMs, mergedConfig.operationName);
    } catch (error) {
      lastError = error;

      const isLastAttempt = attempt === mergedConfig.maxRetries;
      const shouldRetry = !isLastAttempt && mergedConfig.isRetryable(error);

      if (!shouldRetry) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, mergedConfig);

      if (mergedConfig.logger) {
        mergedConfig.logger.warn("retry_attempt", {
          operation: mergedConfig.operationName,
          attempt: attempt + 1,
          maxRetries: mergedConfig.maxRetries,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
          errorCode: error instanceof ScraperError ? error.code : undefined,
        });
      }

      if (mergedConfig.onRetry) {
        mergedConfig.onRetry(attempt + 1, error, delayMs);
      }

      await mergedConfig.sleep(delayMs);
    }
  }

  throw lastError;
}
