/**
 * Page fetching with retry
 *
 * The stats site sits behind a bot challenge that answers with 403/429/503
 * or with a 200 placeholder page. Both are treated as transient and retried
 * with exponential backoff plus additive jitter.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  BlockedResponseError,
  FetchError,
  HttpError,
  ScraperError,
  TimeoutError,
} from "../lib/errors";
import { defaultLogger, type ILogger } from "../lib/logger";
import { sleep, withRetry } from "../lib/retry";

export type FetchPageOptions = {
  /** Write the page text here once retrieved */
  debugPath?: string;
};

export interface PageFetcher {
  fetchPage(url: string, options?: FetchPageOptions): Promise<string>;
}

export type HttpPageFetcherConfig = {
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** Additive jitter, uniform in [0, jitterMs) */
  jitterMs: number;
  headers: Record<string, string>;
  /** A real page contains at least one of these (case-insensitive) */
  pageMarkers: readonly string[];
  logger: ILogger;
  fetchImpl: typeof fetch;
  sleep: (ms: number) => Promise<void>;
};

export const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  Referer: "https://understat.com/",
  "Upgrade-Insecure-Requests": "1",
};

export const DEFAULT_PAGE_MARKERS = ["__NUXT__", "matchesData", "shotsData", "understat"] as const;

export const DEFAULT_HTTP_PAGE_FETCHER_CONFIG: HttpPageFetcherConfig = {
  timeoutMs: 35000,
  maxRetries: 6,
  initialDelayMs: 1400,
  backoffMultiplier: 1.6,
  maxDelayMs: 60000,
  jitterMs: 800,
  headers: BROWSER_HEADERS,
  pageMarkers: DEFAULT_PAGE_MARKERS,
  logger: defaultLogger,
  fetchImpl: (input, init) => fetch(input, init),
  sleep,
};

export class HttpPageFetcher implements PageFetcher {
  private config: HttpPageFetcherConfig;

  constructor(config?: Partial<HttpPageFetcherConfig>) {
    this.config = { ...DEFAULT_HTTP_PAGE_FETCHER_CONFIG, ...config };
  }

  async fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
    const { logger } = this.config;
    let attempts = 0;

    try {
      const text = await withRetry(
        () => {
          attempts += 1;
          return this.fetchOnce(url);
        },
        {
          maxRetries: this.config.maxRetries,
          initialDelayMs: this.config.initialDelayMs,
          backoffMultiplier: this.config.backoffMultiplier,
          maxDelayMs: this.config.maxDelayMs,
          jitterRatio: 0,
          jitterMs: this.config.jitterMs,
          // fetchOnce enforces its own timeout; this one only guards a hung body read
          timeoutMs: this.config.timeoutMs * 2,
          logger,
          operationName: `GET ${url}`,
          sleep: this.config.sleep,
        }
      );

      if (options.debugPath) {
        await mkdir(dirname(options.debugPath), { recursive: true });
        await writeFile(options.debugPath, text, "utf-8");
        logger.debug("page saved", { url, path: options.debugPath });
      }

      return text;
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new FetchError(url, cause?.message ?? String(error), { attempts }, cause);
    }
  }

  private async fetchOnce(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      this.config.logger.debug("page request", { url });
      const response = await this.config.fetchImpl(url, {
        method: "GET",
        headers: this.config.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpError(url, response.status);
      }

      const text = await response.text();
      if (!this.looksLikePage(text)) {
        throw new BlockedResponseError(url, { length: text.length });
      }
      return text;
    } catch (error) {
      if (error instanceof ScraperError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new TimeoutError(`GET ${url}`, this.config.timeoutMs, { url });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private looksLikePage(text: string): boolean {
    if (!text) return false;
    const lower = text.toLowerCase();
    return this.config.pageMarkers.some((marker) => lower.includes(marker.toLowerCase()));
  }
}
