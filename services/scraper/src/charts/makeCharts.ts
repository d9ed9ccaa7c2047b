/**
 * Chart batch: shot table CSV in, SVG files out.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { calcConversion } from "../calculators/conversion";
import { topShooters } from "../calculators/playerTotals";
import { calcShotMap } from "../calculators/shotMap";
import { calcXgVsGoals } from "../calculators/xgVsGoals";
import { defaultLogger, type ILogger } from "../lib/logger";
import type { ChartConfig } from "../schemas/config";
import { readShotTable } from "../table/shotTable";
import { renderConversionChart } from "./conversionChart";
import { renderShotMap } from "./shotMapChart";
import { renderXgGoalsChart } from "./xgGoalsChart";

export function shotMapFileName(player: string): string {
  return `shotmap_${player.replaceAll(" ", "_")}.svg`;
}

export async function makeCharts(config: ChartConfig, logger: ILogger = defaultLogger): Promise<string[]> {
  const rows = await readShotTable(config.csv);
  logger.info("shot table loaded", { csv: config.csv, rows: rows.length });

  await mkdir(config.outDir, { recursive: true });
  const written: string[] = [];
  const save = async (fileName: string, svg: string) => {
    const path = join(config.outDir, fileName);
    await writeFile(path, svg, "utf-8");
    written.push(path);
    logger.info("chart saved", { path });
  };

  const players = config.player ? [config.player] : topShooters(rows, 3);
  for (const player of players) {
    await save(shotMapFileName(player), renderShotMap(player, calcShotMap(rows, player)));
  }

  const conversion = calcConversion(rows, { minShots: config.minShots });
  await save("efficiency_bar.svg", renderConversionChart(conversion, config.minShots));
  await save("xg_goals_scatter.svg", renderXgGoalsChart(calcXgVsGoals(rows, { minShots: config.minShots })));

  return written;
}
