/**
 * Render charts from a saved shot table.
 *
 * Usage:
 *   npx tsx src/scripts/makeCharts.ts --csv=data/shots_2024.csv
 *   npx tsx src/scripts/makeCharts.ts --csv=data/shots_2024.csv --player="Bukayo Saka" --minShots=8
 */

import dotenv from "dotenv";
dotenv.config();

import { makeCharts } from "../charts/makeCharts";
import { extractErrorInfo } from "../lib/errors";
import { Logger } from "../lib/logger";
import { ChartConfigSchema, parseConfig } from "../schemas/config";
import { parseFlags, withEnvFallback } from "./cliArgs";

const CHART_KEYS = ["csv", "player", "minShots", "outDir"] as const;

async function main(): Promise<void> {
  const raw = withEnvFallback(parseFlags(process.argv.slice(2)), CHART_KEYS);
  const config = parseConfig(ChartConfigSchema, raw);
  const written = await makeCharts(config, new Logger({ service: "charts" }));
  console.log(`${written.length} charts written to ${config.outDir}`);
}

main().catch((error: unknown) => {
  console.error(`error: ${extractErrorInfo(error).message}`);
  process.exitCode = 1;
});
