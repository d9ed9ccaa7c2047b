import { HALF_PITCH_LENGTH, PITCH_LENGTH } from "@shotmaps/shared";
import { ValidationError } from "../lib/errors";
import type { ChartShot } from "../schemas/shotRow";

export type ShotMarker = "circle" | "square" | "cross" | "triangle";

export type ShotMapPoint = {
  x: number; // meters, 0..52.5 after mirroring
  y: number; // meters, 0..68
  outcome: string;
  marker: ShotMarker;
  size: number;
  xg: number;
};

const MARKERS: Record<string, ShotMarker> = {
  goal: "circle",
  saved: "square",
  blocked: "cross",
  off_target: "triangle",
};

export function markerFor(outcome: string): ShotMarker {
  return MARKERS[outcome] ?? "circle";
}

/** Marker area grows with xG: 30 at 0, 150 at 1. */
export function markerSize(xg: number): number {
  return 30 + 120 * Math.min(Math.max(xg, 0), 1);
}

/**
 * One player's shots folded onto a single half pitch.
 */
export function calcShotMap(rows: readonly ChartShot[], player: string): ShotMapPoint[] {
  const shots = rows.filter((row) => row.player === player);
  if (shots.length === 0) {
    throw new ValidationError(`no shots found for player: ${player}`, { player });
  }

  return shots.map((row) => ({
    x: row.x > HALF_PITCH_LENGTH ? PITCH_LENGTH - row.x : row.x,
    y: row.y,
    outcome: row.outcome,
    marker: markerFor(row.outcome),
    size: markerSize(row.xg),
    xg: row.xg,
  }));
}
