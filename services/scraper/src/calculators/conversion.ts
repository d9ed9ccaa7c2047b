import { ValidationError } from "../lib/errors";
import type { ChartShot } from "../schemas/shotRow";
import { aggregateByPlayer } from "./playerTotals";

export type ConversionEntry = {
  player: string;
  shots: number;
  goals: number;
  conversion: number; // goals / shots, 0..1
};

export type ConversionOptions = {
  minShots?: number;
  topN?: number;
};

/**
 * Conversion rate (goals per shot) for players with at least `minShots`
 * shots, best first.
 */
export function calcConversion(rows: readonly ChartShot[], options: ConversionOptions = {}): ConversionEntry[] {
  const minShots = options.minShots ?? 10;
  const topN = options.topN ?? 15;

  const eligible = aggregateByPlayer(rows).filter((entry) => entry.shots >= minShots);
  if (eligible.length === 0) {
    throw new ValidationError("no players meet the minimum shots threshold", { minShots });
  }

  return eligible
    .map(({ player, shots, goals }) => ({ player, shots, goals, conversion: goals / shots }))
    .sort((a, b) => b.conversion - a.conversion)
    .slice(0, topN);
}
