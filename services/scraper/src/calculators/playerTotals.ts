import type { ChartShot } from "../schemas/shotRow";

export type PlayerTotals = {
  player: string;
  shots: number;
  goals: number;
  totalXg: number;
};

/**
 * Per-player shot, goal and xG totals, ordered by player name.
 */
export function aggregateByPlayer(rows: readonly ChartShot[]): PlayerTotals[] {
  const totals = new Map<string, PlayerTotals>();

  for (const row of rows) {
    let entry = totals.get(row.player);
    if (!entry) {
      entry = { player: row.player, shots: 0, goals: 0, totalXg: 0 };
      totals.set(row.player, entry);
    }
    entry.shots += 1;
    entry.totalXg += row.xg;
    if (row.outcome === "goal") entry.goals += 1;
  }

  return [...totals.values()].sort((a, b) => a.player.localeCompare(b.player));
}

/**
 * Players with the most shots (ties by name).
 */
export function topShooters(rows: readonly ChartShot[], n = 3): string[] {
  return aggregateByPlayer(rows)
    .sort((a, b) => b.shots - a.shots)
    .slice(0, n)
    .map((entry) => entry.player);
}
