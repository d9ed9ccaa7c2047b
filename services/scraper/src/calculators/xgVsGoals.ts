import { ValidationError } from "../lib/errors";
import type { ChartShot } from "../schemas/shotRow";
import { aggregateByPlayer } from "./playerTotals";

export type XgVsGoalsEntry = {
  player: string;
  shots: number;
  goals: number;
  totalXg: number;
  /** Among the top scorers that get a name label on the chart */
  labelled: boolean;
};

export type XgVsGoalsOptions = {
  minShots?: number;
  labelTop?: number;
};

export function calcXgVsGoals(rows: readonly ChartShot[], options: XgVsGoalsOptions = {}): XgVsGoalsEntry[] {
  const minShots = options.minShots ?? 10;
  const labelTop = options.labelTop ?? 8;

  const eligible = aggregateByPlayer(rows).filter((entry) => entry.shots >= minShots);
  if (eligible.length === 0) {
    throw new ValidationError("no players meet the minimum shots threshold", { minShots });
  }

  const labelled = new Set(
    [...eligible]
      .sort((a, b) => b.goals - a.goals)
      .slice(0, labelTop)
      .map((entry) => entry.player)
  );

  return eligible.map((entry) => ({ ...entry, labelled: labelled.has(entry.player) }));
}
