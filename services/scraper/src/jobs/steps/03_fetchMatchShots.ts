import { join } from "node:path";
import type { MatchRef, Shot } from "@shotmaps/shared";
import { SourceFormatError } from "../../lib/errors";
import { createStepLogger, type ILogger } from "../../lib/logger";
import { extractMatchShots, type PageExtractionOptions } from "../../extract/pages";
import type { PageFetcher } from "../../source/pageFetcher";
import { buildMatchUrl } from "../../source/urls";

export type PolitenessDelay = {
  delayMs: number;
  jitterMs: number;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
};

export type FetchMatchShotsOptions = {
  fetcher: PageFetcher;
  baseUrl: string;
  matches: readonly MatchRef[];
  delay: PolitenessDelay;
  extraction?: PageExtractionOptions;
  debugDir?: string;
  logger: ILogger;
};

export type SkippedMatch = {
  matchId: number;
  message: string;
};

export type FetchMatchShotsResult = {
  shots: Shot[];
  skipped: SkippedMatch[];
  droppedCount: number;
};

/**
 * Fetch one match page and normalize its shots. Throws when neither page
 * format yields a shot.
 */
export async function fetchShotsForMatch(
  match: MatchRef,
  options: Pick<FetchMatchShotsOptions, "fetcher" | "baseUrl" | "extraction" | "debugDir" | "logger">
): Promise<{ shots: Shot[]; droppedCount: number }> {
  const url = buildMatchUrl(options.baseUrl, match.id);
  const markup = await options.fetcher.fetchPage(url, {
    debugPath: options.debugDir ? join(options.debugDir, `debug_match_${match.id}.html`) : undefined,
  });

  const extracted = extractMatchShots(markup, match.id, options.extraction);
  if (!extracted) {
    throw new SourceFormatError(`shots JSON for match ${match.id}`, { url });
  }

  for (const drop of extracted.dropped) {
    options.logger.debug("raw shot dropped", { matchId: match.id, ...drop });
  }
  options.logger.debug("match shots extracted", {
    matchId: match.id,
    source: extracted.source,
    shotCount: extracted.shots.length,
    droppedCount: extracted.dropped.length,
  });

  return { shots: extracted.shots, droppedCount: extracted.dropped.length };
}

/**
 * Fetch matches one at a time, pausing between requests. A failing match is
 * logged and skipped; the rest of the run carries on.
 */
export async function stepFetchMatchShots(options: FetchMatchShotsOptions): Promise<FetchMatchShotsResult> {
  const { matches, delay } = options;
  const stepLogger = createStepLogger(options.logger, "fetch_shots", { totalItems: matches.length });
  const shots: Shot[] = [];
  const skipped: SkippedMatch[] = [];
  let droppedCount = 0;

  for (const [index, match] of matches.entries()) {
    if (index > 0) {
      await delay.sleep(delay.delayMs + delay.random() * delay.jitterMs);
    }

    try {
      const result = await fetchShotsForMatch(match, { ...options, logger: stepLogger });
      shots.push(...result.shots);
      droppedCount += result.droppedCount;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      skipped.push({ matchId: match.id, message });
      stepLogger.warn(`match ${match.id} skipped: ${message}`, { matchId: match.id });
    }

    stepLogger.progress(index + 1, undefined, { matchId: match.id, shotCount: shots.length });
  }

  stepLogger.complete(undefined, { shotCount: shots.length, skippedCount: skipped.length, droppedCount });
  return { shots, skipped, droppedCount };
}
