import {
  BOX_LENGTH,
  BOX_WIDTH,
  HALF_PITCH_LENGTH,
  PENALTY_SPOT_DISTANCE,
  PITCH_WIDTH,
  SIX_YARD_LENGTH,
  SIX_YARD_WIDTH,
} from "@shotmaps/shared";
import type { ShotMapPoint, ShotMarker } from "../calculators/shotMap";
import { element, line, svgDocument, text } from "./svg";

const SCALE = 8; // px per meter
const MARGIN = 24;
const TITLE_HEIGHT = 28;
const LEGEND_WIDTH = 130;

const OUTCOME_COLORS: Record<string, string> = {
  goal: "#2a9d3a",
  saved: "#1f6fb4",
  blocked: "#8a8a8a",
  off_target: "#d9822b",
};

function colorFor(outcome: string): string {
  return OUTCOME_COLORS[outcome] ?? "#7b4fa0";
}

// Points carry the distance from the goal line being attacked; the goal is
// drawn on the right-hand edge.
function px(distanceFromGoal: number): number {
  return MARGIN + (HALF_PITCH_LENGTH - distanceFromGoal) * SCALE;
}

function py(y: number): number {
  return TITLE_HEIGHT + MARGIN + (PITCH_WIDTH - y) * SCALE;
}

function drawHalfPitch(): string[] {
  const boxTop = (PITCH_WIDTH + BOX_WIDTH) / 2;
  const boxBottom = (PITCH_WIDTH - BOX_WIDTH) / 2;
  const sixTop = (PITCH_WIDTH + SIX_YARD_WIDTH) / 2;
  const sixBottom = (PITCH_WIDTH - SIX_YARD_WIDTH) / 2;

  return [
    element("rect", {
      x: px(HALF_PITCH_LENGTH),
      y: py(PITCH_WIDTH),
      width: HALF_PITCH_LENGTH * SCALE,
      height: PITCH_WIDTH * SCALE,
      fill: "none",
      stroke: "#333",
    }),
    line(px(BOX_LENGTH), py(boxBottom), px(BOX_LENGTH), py(boxTop)),
    line(px(BOX_LENGTH), py(boxBottom), px(0), py(boxBottom)),
    line(px(BOX_LENGTH), py(boxTop), px(0), py(boxTop)),
    line(px(SIX_YARD_LENGTH), py(sixBottom), px(SIX_YARD_LENGTH), py(sixTop)),
    line(px(SIX_YARD_LENGTH), py(sixBottom), px(0), py(sixBottom)),
    line(px(SIX_YARD_LENGTH), py(sixTop), px(0), py(sixTop)),
    element("circle", { cx: px(PENALTY_SPOT_DISTANCE), cy: py(PITCH_WIDTH / 2), r: 2, fill: "#333" }),
  ];
}

function drawMarker(marker: ShotMarker, cx: number, cy: number, size: number, color: string): string {
  // size is a marker area; r is the matching half-width
  const r = Math.sqrt(size) / 2;
  const style = { fill: color, "fill-opacity": 0.8, stroke: color };
  switch (marker) {
    case "square":
      return element("rect", { x: cx - r, y: cy - r, width: 2 * r, height: 2 * r, ...style });
    case "triangle":
      return element("polygon", {
        points: [
          [cx, cy - r],
          [cx - r, cy + r],
          [cx + r, cy + r],
        ]
          .map(([x, y]) => `${x.toFixed(2)},${y.toFixed(2)}`)
          .join(" "),
        ...style,
      });
    case "cross":
      return element("path", {
        d: `M${(cx - r).toFixed(2)},${(cy - r).toFixed(2)}L${(cx + r).toFixed(2)},${(cy + r).toFixed(2)}` +
          `M${(cx - r).toFixed(2)},${(cy + r).toFixed(2)}L${(cx + r).toFixed(2)},${(cy - r).toFixed(2)}`,
        stroke: color,
        "stroke-width": 2,
        fill: "none",
      });
    default:
      return element("circle", { cx, cy, r, ...style });
  }
}

function drawLegend(points: readonly ShotMapPoint[]): string[] {
  const seen = new Map<string, ShotMarker>();
  for (const point of points) {
    if (!seen.has(point.outcome)) seen.set(point.outcome, point.marker);
  }
  const left = px(0) + 16;
  const top = TITLE_HEIGHT + MARGIN;
  const entries = [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return [
    text("Outcome", { x: left, y: top, "font-weight": "bold" }),
    ...entries.flatMap(([outcome, marker], i) => [
      drawMarker(marker, left + 6, top + 20 + i * 20, 60, colorFor(outcome)),
      text(outcome, { x: left + 18, y: top + 24 + i * 20 }),
    ]),
  ];
}

export function renderShotMap(player: string, points: readonly ShotMapPoint[]): string {
  const width = MARGIN * 2 + HALF_PITCH_LENGTH * SCALE + LEGEND_WIDTH;
  const height = TITLE_HEIGHT + MARGIN * 2 + PITCH_WIDTH * SCALE;

  return svgDocument(width, height, [
    text(`Shot map: ${player}`, { x: MARGIN, y: 20, "font-size": 16 }),
    ...drawHalfPitch(),
    ...points.map((p) => drawMarker(p.marker, px(p.x), py(p.y), p.size, colorFor(p.outcome))),
    ...drawLegend(points),
  ]);
}
