import type { XgVsGoalsEntry } from "../calculators/xgVsGoals";
import { element, fmt, line, svgDocument, text } from "./svg";

const MARGIN = 56;
const PLOT = 400;

/**
 * Total xG against goals per player, with the y = x calibration line.
 */
export function renderXgGoalsChart(entries: readonly XgVsGoalsEntry[]): string {
  const axisMax = Math.max(...entries.map((e) => Math.max(e.totalXg, e.goals))) + 1;
  const sx = (v: number) => MARGIN + (v / axisMax) * PLOT;
  const sy = (v: number) => MARGIN + PLOT - (v / axisMax) * PLOT;
  const size = MARGIN * 2 + PLOT;

  const ticks = Array.from({ length: Math.floor(axisMax) + 1 }, (_, i) => i).flatMap((tick) => [
    text(fmt(tick), { x: sx(tick), y: MARGIN + PLOT + 16, "text-anchor": "middle" }),
    text(fmt(tick), { x: MARGIN - 8, y: sy(tick) + 4, "text-anchor": "end" }),
  ]);

  return svgDocument(size, size, [
    text("xG vs goals (players with sufficient shots)", { x: MARGIN, y: 28, "font-size": 16 }),
    line(MARGIN, MARGIN + PLOT, MARGIN + PLOT, MARGIN + PLOT),
    line(MARGIN, MARGIN, MARGIN, MARGIN + PLOT),
    line(sx(0), sy(0), sx(axisMax), sy(axisMax), { stroke: "#d9822b", "stroke-dasharray": "4 3" }),
    ...ticks,
    ...entries.map((e) => element("circle", { cx: sx(e.totalXg), cy: sy(e.goals), r: 4, fill: "#1f6fb4" })),
    ...entries
      .filter((e) => e.labelled)
      .map((e) => text(e.player, { x: sx(e.totalXg) + 5, y: sy(e.goals) - 5 })),
    text("Total xG", { x: MARGIN + PLOT / 2, y: size - 12, "text-anchor": "middle" }),
    text("Goals", {
      x: 16,
      y: MARGIN + PLOT / 2,
      "text-anchor": "middle",
      transform: `rotate(-90 16 ${fmt(MARGIN + PLOT / 2)})`,
    }),
  ]);
}
