import type { ChartShot } from "../../schemas/shotRow";

export function chartShot(player: string, outcome: string, overrides: Partial<ChartShot> = {}): ChartShot {
  return { player, team: "Test FC", minute: 10, x: 95, y: 34, xg: 0.1, outcome, ...overrides };
}

/** `shots` rows for `player`, the first `goals` of them goals. */
export function playerShots(player: string, shots: number, goals: number): ChartShot[] {
  return Array.from({ length: shots }, (_, i) => chartShot(player, i < goals ? "goal" : "saved"));
}
