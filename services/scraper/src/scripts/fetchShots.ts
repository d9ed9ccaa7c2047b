/**
 * Fetch shots for one league season and save them as CSV.
 *
 * Usage:
 *   npx tsx src/scripts/fetchShots.ts --season=2024
 *   npx tsx src/scripts/fetchShots.ts --season=2024 --fromRound=10 --toRound=20
 *   npx tsx src/scripts/fetchShots.ts --season=2024 --limitMostRecent=5 --debug
 */

import dotenv from "dotenv";
dotenv.config();

import { runFetchPipeline } from "../jobs/runFetchPipeline";
import { extractErrorInfo } from "../lib/errors";
import { createRunLogger, withTiming } from "../lib/logger";
import { FetchConfigSchema, parseConfig } from "../schemas/config";
import { HttpPageFetcher } from "../source/pageFetcher";
import { parseFlags, withEnvFallback } from "./cliArgs";

const FETCH_KEYS = [
  "season",
  "league",
  "fromRound",
  "toRound",
  "limitMostRecent",
  "outputPath",
  "debug",
  "debugDir",
  "delayMs",
  "jitterMs",
  "strictOutcomes",
  "baseUrl",
] as const;

async function main(): Promise<void> {
  const raw = withEnvFallback(parseFlags(process.argv.slice(2)), FETCH_KEYS);
  const config = parseConfig(FetchConfigSchema, raw);
  const logger = createRunLogger({ league: config.league, season: config.season, debug: config.debug });
  const fetcher = new HttpPageFetcher({ logger: logger.child({ component: "page_fetcher" }) });

  const result = await withTiming(logger, "fetch_shots", () => runFetchPipeline(config, { fetcher, logger }));
  const fetched = result.matches.length - result.skipped.length;
  console.log(`${result.shots.length} shots from ${fetched}/${result.matches.length} matches -> ${result.outputPath}`);
}

main().catch((error: unknown) => {
  // pipeline failures were already logged by withTiming
  console.error(`error: ${extractErrorInfo(error).message}`);
  process.exitCode = 1;
});
