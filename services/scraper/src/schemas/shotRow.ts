/**
 * Shot table row schema (CSV read-back)
 *
 * CSV cells are strings; numeric columns must hold a finite number and may
 * not be blank.
 */

import { z } from "zod";

const numericCell = z.string().trim().min(1, "is blank").pipe(z.coerce.number().finite());

export const ChartShotSchema = z.object({
  player: z.string(),
  team: z.string(),
  minute: numericCell,
  x: numericCell,
  y: numericCell,
  xg: numericCell,
  outcome: z.string(),
});

/** The slice of a shot row the chart builders read. */
export type ChartShot = z.output<typeof ChartShotSchema>;
