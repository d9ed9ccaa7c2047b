import type { MatchRef, Shot } from "@shotmaps/shared";
import { EmptyResultError } from "../lib/errors";
import type { ILogger } from "../lib/logger";
import { sleep } from "../lib/retry";
import type { FetchConfig } from "../schemas/config";
import type { PageFetcher } from "../source/pageFetcher";
import { stepFetchMatchList } from "./steps/01_fetchMatchList";
import { selectMatches } from "./steps/02_selectMatches";
import { stepFetchMatchShots, type SkippedMatch } from "./steps/03_fetchMatchShots";
import { stepWriteShotTable } from "./steps/04_writeShotTable";

export type FetchPipelineDeps = {
  fetcher: PageFetcher;
  logger: ILogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export type FetchPipelineResult = {
  /** Matches that were selected for fetching, in fetch order */
  matches: MatchRef[];
  shots: Shot[];
  skipped: SkippedMatch[];
  droppedCount: number;
  outputPath: string;
};

/**
 * League page -> selected matches -> per-match shots -> CSV.
 *
 * Fatal: unrecognized league page, no matches after filters, no shots at
 * all. Anything that goes wrong for a single match only skips that match.
 */
export async function runFetchPipeline(config: FetchConfig, deps: FetchPipelineDeps): Promise<FetchPipelineResult> {
  const { fetcher, logger } = deps;
  const debugDir = config.debug ? config.debugDir : undefined;

  logger.info("pipeline start", {
    fromRound: config.fromRound,
    toRound: config.toRound,
    limitMostRecent: config.limitMostRecent,
  });

  const allMatches = await stepFetchMatchList({
    fetcher,
    baseUrl: config.baseUrl,
    league: config.league,
    season: config.season,
    debugDir,
    logger: logger.child({ step: "fetch_match_list" }),
  });

  const matches = selectMatches(allMatches, config);
  if (matches.length === 0) {
    throw new EmptyResultError("matches", { available: allMatches.length });
  }
  logger.info("matches selected", { available: allMatches.length, selected: matches.length });

  const { shots, skipped, droppedCount } = await stepFetchMatchShots({
    fetcher,
    baseUrl: config.baseUrl,
    matches,
    delay: {
      delayMs: config.delayMs,
      jitterMs: config.jitterMs,
      sleep: deps.sleep ?? sleep,
      random: deps.random ?? Math.random,
    },
    extraction: { strict: config.strictOutcomes },
    debugDir,
    logger,
  });

  if (shots.length === 0) {
    throw new EmptyResultError("shots", { matchCount: matches.length, skippedCount: skipped.length });
  }

  await stepWriteShotTable({
    path: config.outputPath,
    shots,
    logger: logger.child({ step: "write_table" }),
  });

  return { matches, shots, skipped, droppedCount, outputPath: config.outputPath };
}
