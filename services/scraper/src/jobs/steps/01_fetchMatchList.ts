import { join } from "node:path";
import type { MatchRef } from "@shotmaps/shared";
import { SourceFormatError } from "../../lib/errors";
import type { ILogger } from "../../lib/logger";
import { extractMatchList } from "../../extract/pages";
import type { PageFetcher } from "../../source/pageFetcher";
import { buildLeagueUrl, type League } from "../../source/urls";

export type FetchMatchListOptions = {
  fetcher: PageFetcher;
  baseUrl: string;
  league: League;
  season: number;
  /** Directory for raw page dumps; no dumps when unset */
  debugDir?: string;
  logger: ILogger;
};

/**
 * Fetch the league page and extract its fixtures. An unrecognized page is
 * fatal for the run.
 */
export async function stepFetchMatchList({
  fetcher,
  baseUrl,
  league,
  season,
  debugDir,
  logger,
}: FetchMatchListOptions): Promise<MatchRef[]> {
  const url = buildLeagueUrl(baseUrl, league, season);
  const markup = await fetcher.fetchPage(url, {
    debugPath: debugDir ? join(debugDir, "debug_league.html") : undefined,
  });

  const extracted = extractMatchList(markup);
  if (!extracted) {
    throw new SourceFormatError("matches JSON on league page", { url });
  }

  logger.info("match list extracted", {
    url,
    source: extracted.source,
    matchCount: extracted.matches.length,
  });
  return extracted.matches;
}
