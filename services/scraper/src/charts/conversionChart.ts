import type { ConversionEntry } from "../calculators/conversion";
import { element, fmt, line, niceMax, svgDocument, text } from "./svg";

const LABEL_WIDTH = 170;
const PLOT_WIDTH = 420;
const BAR_HEIGHT = 22;
const BAR_GAP = 6;
const TOP = 40;
const BOTTOM = 44;

/**
 * Horizontal bars, best converter on top, with the rate printed after each
 * bar.
 */
export function renderConversionChart(entries: readonly ConversionEntry[], minShots: number): string {
  const axisMax = niceMax(Math.max(...entries.map((e) => e.conversion * 100)), 10);
  const scale = PLOT_WIDTH / axisMax;
  const plotHeight = entries.length * (BAR_HEIGHT + BAR_GAP);
  const width = LABEL_WIDTH + PLOT_WIDTH + 70;
  const height = TOP + plotHeight + BOTTOM;

  const bars = entries.flatMap((entry, i) => {
    const y = TOP + i * (BAR_HEIGHT + BAR_GAP);
    const percent = entry.conversion * 100;
    return [
      text(entry.player, { x: LABEL_WIDTH - 8, y: y + BAR_HEIGHT / 2 + 4, "text-anchor": "end" }),
      element("rect", { x: LABEL_WIDTH, y, width: percent * scale, height: BAR_HEIGHT, fill: "#1f6fb4" }),
      text(`${percent.toFixed(1)}%`, { x: LABEL_WIDTH + percent * scale + 4, y: y + BAR_HEIGHT / 2 + 4 }),
    ];
  });

  const ticks = Array.from({ length: axisMax / 10 + 1 }, (_, i) => i * 10).flatMap((tick) => [
    line(LABEL_WIDTH + tick * scale, TOP + plotHeight, LABEL_WIDTH + tick * scale, TOP + plotHeight + 4),
    text(fmt(tick), { x: LABEL_WIDTH + tick * scale, y: TOP + plotHeight + 16, "text-anchor": "middle" }),
  ]);

  return svgDocument(width, height, [
    text(`Top converters (min shots = ${minShots})`, { x: LABEL_WIDTH, y: 24, "font-size": 16 }),
    ...bars,
    line(LABEL_WIDTH, TOP + plotHeight, LABEL_WIDTH + PLOT_WIDTH, TOP + plotHeight),
    ...ticks,
    text("Conversion rate (%)", { x: LABEL_WIDTH + PLOT_WIDTH / 2, y: height - 8, "text-anchor": "middle" }),
  ]);
}
